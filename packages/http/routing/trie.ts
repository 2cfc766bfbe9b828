/**
 * The nodes of the routing trie
 */

import type { BaseRouteHandler } from "../handlers.js"
import type { ConnectionHandler, HttpMethod } from "../index.js"
import type { PathParameterDefinition } from "./parameters.js"

/**
 * Child key shared by every parameter segment at a given depth, parameter
 * names are recovered from the route definitions and never stored here
 */
export const PATH_PARAMETER: unique symbol = Symbol("PATH_PARAMETER")

/** A literal segment, a full literal path (root only) or {@link PATH_PARAMETER} */
export type TrieKey = string | typeof PATH_PARAMETER

/** The connection kind a handler chain is stored under */
export type HandlerKey = HttpMethod | "websocket" | "raw"

/**
 * The cached chain for one connection kind on a node
 */
export interface HandlerBinding {
  /** The fully composed chain */
  readonly handler: ConnectionHandler
  /** The route handler the chain was built for */
  readonly routeHandler: BaseRouteHandler
  /** The route template the chain was registered with */
  readonly template: string
}

/**
 * A node in the routing trie
 */
export interface RouteTrieNode {
  /** Child nodes by {@link TrieKey} */
  readonly children: Map<TrieKey, RouteTrieNode>
  /** Snapshot of the children keys, refreshed after every descent */
  childKeys: Set<TrieKey>
  /** The node terminates a mount */
  isMount: boolean
  /** The mount serves a static file tree */
  isStatic: boolean
  /** {@link PATH_PARAMETER} is one of the children keys */
  isPathParameterNode: boolean
  /** The node was reached through a greedy `path` parameter */
  isPathType: boolean
  /** The node answers every connection kind with its raw handler */
  isRaw: boolean
  /** Ordered parameter definitions by {@link HandlerKey} */
  readonly pathParameters: Map<HandlerKey, readonly PathParameterDefinition[]>
  /** Cached chains by {@link HandlerKey} */
  readonly handlers: Map<HandlerKey, HandlerBinding>
}

/**
 * The trie with its auxiliary indexes
 */
export interface RouteMap {
  /** The root of the trie */
  readonly root: RouteTrieNode
  /** Templates without parameters, stored under their full path on the root */
  readonly plainRoutes: Set<string>
  /** Mount nodes by mount path */
  readonly mountRoutes: Map<string, RouteTrieNode>
  /** Mount paths ordered longest first */
  readonly mountPaths: string[]
}

/**
 * Create an empty {@link RouteTrieNode}
 *
 * @returns A new {@link RouteTrieNode}
 */
export function createNode(): RouteTrieNode {
  return {
    children: new Map(),
    childKeys: new Set(),
    isMount: false,
    isStatic: false,
    isPathParameterNode: false,
    isPathType: false,
    isRaw: false,
    pathParameters: new Map(),
    handlers: new Map(),
  }
}

/**
 * Create an empty {@link RouteMap}
 *
 * @returns A new {@link RouteMap}
 */
export function createRouteMap(): RouteMap {
  return {
    root: createNode(),
    plainRoutes: new Set(),
    mountRoutes: new Map(),
    mountPaths: [],
  }
}

/**
 * Get the child for the key, creating it if it does not exist yet
 *
 * @param node The parent {@link RouteTrieNode}
 * @param key The {@link TrieKey} to descend through
 * @returns The child {@link RouteTrieNode}
 */
export function getOrCreateChild(
  node: RouteTrieNode,
  key: TrieKey,
): RouteTrieNode {
  let child = node.children.get(key)
  if (child === undefined) {
    child = createNode()
    node.children.set(key, child)
  }

  node.childKeys = new Set(node.children.keys())
  node.isPathParameterNode = node.childKeys.has(PATH_PARAMETER)

  return child
}
