/**
 * Insertion of routes into the routing trie
 */

import {
  DefaultLogger,
  type LogLevel,
  type Logger,
} from "@trellis/core/logging.js"
import { RoutingError } from "../errors.js"
import type { BaseRouteHandler } from "../handlers.js"
import type { ConnectionHandler } from "../index.js"
import type { Route } from "../routes.js"
import { isPathParameterDefinition } from "./parameters.js"
import { buildRouteMiddlewareStack, type MiddlewareStackOptions } from "./stack.js"
import {
  PATH_PARAMETER,
  createNode,
  getOrCreateChild,
  type HandlerKey,
  type RouteMap,
  type RouteTrieNode,
} from "./trie.js"

const ROUTING_LOGGER: Logger = new DefaultLogger({
  name: "http.routing",
})

/**
 * Update the routing log levels
 *
 * @param level The new {@link LogLevel}
 */
export function setRoutingLogLevel(level: LogLevel): void {
  ROUTING_LOGGER.setLevel(level)
}

/**
 * Add the route to the trie, building and caching the chain for each of its
 * handlers on the terminal node
 *
 * @param map The {@link RouteMap} to update
 * @param route The {@link Route} to insert
 * @param options The {@link MiddlewareStackOptions} for the chains
 * @returns The terminal {@link RouteTrieNode}
 *
 * @throws A {@link RoutingError} when the route conflicts with one already in
 * the trie or a mount declares path parameters
 */
export function addRouteToTrie(
  map: RouteMap,
  route: Route,
  options: MiddlewareStackOptions,
): RouteTrieNode {
  const node =
    route.kind === "raw" && route.isMount
      ? addMount(map, route.path, route.pathParameters.length > 0)
      : route.pathParameters.length === 0
        ? addPlainRoute(map, route.path)
        : addParameterizedRoute(map, route)

  if (route.kind === "raw" && route.isMount) {
    node.isMount = true
    node.isStatic = route.routeHandler.isStatic
  }

  configureNode(node, route, options)

  ROUTING_LOGGER.debug(`Added ${route.kind} route ${route.path}`)
  return node
}

function addMount(
  map: RouteMap,
  path: string,
  hasParameters: boolean,
): RouteTrieNode {
  if (hasParameters) {
    throw new RoutingError(`Mount ${path} cannot declare path parameters`)
  }

  let node = map.mountRoutes.get(path)
  if (node === undefined) {
    if (path === "/") {
      // The root mount only answers through the mount fallback
      node = createNode()
    } else {
      node = map.root.children.get(path) ?? walkLiterals(map.root, path)
      map.root.children.set(path, node)
      map.root.childKeys = new Set(map.root.children.keys())
    }

    map.mountRoutes.set(path, node)
    map.mountPaths.push(path)
    map.mountPaths.sort((a, b) => b.length - a.length)
  }

  return node
}

function walkLiterals(root: RouteTrieNode, path: string): RouteTrieNode {
  let current = root
  for (const segment of path.split("/")) {
    if (segment.length > 0) {
      current = getOrCreateChild(current, segment)
    }
  }

  return current
}

function addPlainRoute(map: RouteMap, path: string): RouteTrieNode {
  map.plainRoutes.add(path)
  return getOrCreateChild(map.root, path)
}

function addParameterizedRoute(map: RouteMap, route: Route): RouteTrieNode {
  let current = map.root

  for (const component of route.pathComponents) {
    if (isPathParameterDefinition(component)) {
      current = getOrCreateChild(current, PATH_PARAMETER)
      if (component.type === "path") {
        current.isPathType = true
      }
    } else {
      current = getOrCreateChild(current, component)
    }
  }

  return current
}

function configureNode(
  node: RouteTrieNode,
  route: Route,
  options: MiddlewareStackOptions,
): void {
  const bind = (
    key: HandlerKey,
    routeHandler: BaseRouteHandler,
    handler: ConnectionHandler,
  ): void => {
    if (node.handlers.has(key)) {
      throw new RoutingError(`Duplicate ${key} handler for ${route.path}`)
    }

    node.handlers.set(key, { handler, routeHandler, template: route.path })
    node.pathParameters.set(key, route.pathParameters)
  }

  switch (route.kind) {
    case "http": {
      if (node.isRaw) {
        throw new RoutingError(
          `HTTP handlers for ${route.path} conflict with a raw handler`,
        )
      }

      // Handlers serving several methods share a single chain
      const chains = new Map<BaseRouteHandler, ConnectionHandler>()
      for (const [method, routeHandler] of route.handlerMap) {
        let chain = chains.get(routeHandler)
        if (chain === undefined) {
          chain = buildRouteMiddlewareStack(route, routeHandler, options)
          chains.set(routeHandler, chain)
        }

        bind(method, routeHandler, chain)
      }
      break
    }
    case "websocket":
      if (node.isRaw) {
        throw new RoutingError(
          `WebSocket handler for ${route.path} conflicts with a raw handler`,
        )
      }

      bind(
        "websocket",
        route.routeHandler,
        buildRouteMiddlewareStack(route, route.routeHandler, options),
      )
      break
    case "raw":
      if (node.handlers.size > 0 && !node.handlers.has("raw")) {
        throw new RoutingError(
          `Raw handler for ${route.path} conflicts with existing handlers`,
        )
      }

      bind(
        "raw",
        route.routeHandler,
        buildRouteMiddlewareStack(route, route.routeHandler, options),
      )
      node.isRaw = true
      break
  }
}
