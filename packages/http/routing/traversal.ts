/**
 * Lookup of a request path in the routing trie
 */

import type { Optional } from "@trellis/core/type/utils.js"
import {
  coercePathParameter,
  normalizePath,
  splitPath,
  type PathParameters,
} from "./parameters.js"
import {
  PATH_PARAMETER,
  type HandlerBinding,
  type HandlerKey,
  type RouteMap,
  type RouteTrieNode,
} from "./trie.js"

/**
 * A successful lookup
 */
export interface RouteMatch {
  readonly matched: true
  /** The node that answers the connection */
  readonly node: RouteTrieNode
  /** The {@link HandlerKey} the binding was selected by */
  readonly key: HandlerKey
  readonly binding: HandlerBinding
  /** The coerced path parameters */
  readonly pathParams: PathParameters
  /** The consumed prefix when a mount takes the connection */
  readonly mountPath?: string
  /** The path left for the mount, always starting with "/" */
  readonly remainder?: string
}

/** Why a lookup failed */
export type NoMatchReason = "notFound" | "methodNotAllowed" | "invalidParameter"

/**
 * A failed lookup
 */
export interface NoMatch {
  readonly matched: false
  readonly reason: NoMatchReason
  /** The keys the node does answer, set for `methodNotAllowed` */
  readonly allowed?: readonly HandlerKey[]
}

export type RouteResolution = RouteMatch | NoMatch

interface MountHandoff {
  mountPath: string
  remainder: string
}

const NOT_FOUND: NoMatch = { matched: false, reason: "notFound" }
const INVALID_PARAMETER: NoMatch = {
  matched: false,
  reason: "invalidParameter",
}

/**
 * Find the handler for the path and connection kind
 *
 * Literal segments are preferred over parameters at the same depth, a `path`
 * parameter takes every remaining segment and mounts take every path below
 * them. The map is never modified.
 *
 * @param map The {@link RouteMap} to search
 * @param path The request path
 * @param kind The {@link HandlerKey} requested by the connection
 * @returns The {@link RouteResolution}
 */
export function resolvePath(
  map: RouteMap,
  path: string,
  kind: HandlerKey,
): RouteResolution {
  const normalized = normalizePath(path)

  if (map.plainRoutes.has(normalized)) {
    const node = map.root.children.get(normalized)
    if (node !== undefined && node.handlers.size > 0) {
      return selectHandler(node, kind, [])
    }
  }

  if (normalized !== "/") {
    const mount = map.mountRoutes.get(normalized)
    if (mount !== undefined) {
      return selectHandler(mount, kind, [], {
        mountPath: normalized,
        remainder: "/",
      })
    }
  }

  const segments = splitPath(normalized)
  const values: string[] = []
  let current = map.root
  let greedy = false

  for (let n = 0; n < segments.length; ++n) {
    const segment = segments[n]
    const literal = current.children.get(segment)

    // A deeper literal (a nested mount) wins over the enclosing mount
    if (literal === undefined && current.isMount && current !== map.root) {
      return selectHandler(current, kind, [], {
        mountPath: `/${segments.slice(0, n).join("/")}`,
        remainder: `/${segments.slice(n).join("/")}`,
      })
    }

    if (literal !== undefined) {
      current = literal
      continue
    }

    const parameter = current.isPathParameterNode
      ? current.children.get(PATH_PARAMETER)
      : undefined

    if (parameter === undefined) {
      return mountFallback(map, normalized, kind)
    }

    current = parameter
    if (current.isPathType) {
      values.push(segments.slice(n).join("/"))
      greedy = true
      break
    }

    values.push(segment)
  }

  if (!greedy && current.isMount && current !== map.root) {
    return selectHandler(current, kind, [], {
      mountPath: normalized,
      remainder: "/",
    })
  }

  if (current.handlers.size === 0) {
    return mountFallback(map, normalized, kind)
  }

  return selectHandler(current, kind, values)
}

/**
 * Hand the path to the longest mount that prefixes it
 */
function mountFallback(
  map: RouteMap,
  path: string,
  kind: HandlerKey,
): RouteResolution {
  for (const mountPath of map.mountPaths) {
    const node = map.mountRoutes.get(mountPath)
    if (node === undefined) {
      continue
    }

    if (mountPath === "/") {
      return selectHandler(node, kind, [], { mountPath, remainder: path })
    }

    if (path === mountPath || path.startsWith(`${mountPath}/`)) {
      return selectHandler(node, kind, [], {
        mountPath,
        remainder: path.slice(mountPath.length) || "/",
      })
    }
  }

  return NOT_FOUND
}

function selectHandler(
  node: RouteTrieNode,
  kind: HandlerKey,
  values: readonly string[],
  mount?: MountHandoff,
): RouteResolution {
  const key: HandlerKey = node.isRaw ? "raw" : kind
  const binding: Optional<HandlerBinding> = node.handlers.get(key)

  if (binding === undefined) {
    return node.handlers.size > 0
      ? {
          matched: false,
          reason: "methodNotAllowed",
          allowed: [...node.handlers.keys()],
        }
      : NOT_FOUND
  }

  const pathParams: PathParameters = {}
  for (const definition of node.pathParameters.get(key) ?? []) {
    const raw = values[definition.index]
    const value =
      raw === undefined ? undefined : coercePathParameter(definition.type, raw)

    if (value === undefined) {
      return INVALID_PARAMETER
    }

    pathParams[definition.name] = value
  }

  return {
    matched: true,
    node,
    key,
    binding,
    pathParams,
    ...mount,
  }
}
