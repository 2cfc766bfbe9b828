/**
 * Assembly of the per route middleware chain
 */

import type { BaseRouteHandler } from "../handlers.js"
import { wrapInExceptionHandler } from "../exceptions.js"
import type { ConnectionHandler } from "../index.js"
import {
  allowedHostsMiddleware,
  type AllowedHostsConfig,
} from "../middleware/allowedHosts.js"
import {
  compressionMiddleware,
  type CompressionConfig,
} from "../middleware/compression.js"
import { csrfMiddleware, type CsrfConfig } from "../middleware/csrf.js"
import {
  asLayer,
  composeLayers,
  type ConnectionLayer,
} from "../middleware/types.js"
import type { Route } from "../routes.js"

/**
 * Application wide settings that shape every route chain
 */
export interface MiddlewareStackOptions {
  /** Render error details in the default exception handler */
  debug: boolean
  /** Reject connections for hosts outside the list */
  allowedHosts?: AllowedHostsConfig
  /** Compress responses the client accepts an encoding for */
  compression?: CompressionConfig
  /** Require a CSRF token on unsafe requests */
  csrf?: CsrfConfig
}

/**
 * Build the chain for one route and one of its handlers, outermost first:
 *
 * 1. exception wrapper
 * 2. allowed hosts
 * 3. compression
 * 4. csrf
 * 5. middleware from the application, routers and handler, first declared
 *    outermost
 * 6. exception wrapper around the route itself
 *
 * @param route The {@link Route} whose `handle` terminates the chain
 * @param routeHandler The handler supplying middleware and exception handlers
 * @param options The {@link MiddlewareStackOptions}
 * @returns The composed {@link ConnectionHandler}
 */
export function buildRouteMiddlewareStack(
  route: Route,
  routeHandler: BaseRouteHandler,
  options: MiddlewareStackOptions,
): ConnectionHandler {
  const exceptionHandlers = routeHandler.resolveExceptionHandlers()
  const exceptionLayer: ConnectionLayer = (next) =>
    wrapInExceptionHandler(next, exceptionHandlers, options.debug)

  const layers: ConnectionLayer[] = [exceptionLayer]

  const { allowedHosts, compression, csrf } = options
  if (allowedHosts !== undefined) {
    layers.push((next) => allowedHostsMiddleware(next, allowedHosts))
  }

  if (compression !== undefined) {
    layers.push((next) => compressionMiddleware(next, compression))
  }

  if (csrf !== undefined) {
    layers.push((next) => csrfMiddleware(next, csrf))
  }

  layers.push(...routeHandler.resolveMiddleware().map(asLayer))
  layers.push(exceptionLayer)

  return composeLayers(layers, (scope, receive, send) =>
    route.handle(scope, receive, send),
  )
}
