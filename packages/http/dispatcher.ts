/**
 * Dispatches connections to the chains cached in the routing trie
 */

import {
  DefaultLogger,
  type LogLevel,
  type Logger,
} from "@trellis/core/logging.js"
import { withSpan } from "@trellis/core/observability/tracing.js"
import { Timer } from "@trellis/core/time.js"
import { MethodNotAllowedException, NotFoundException } from "./errors.js"
import {
  wrapInExceptionHandler,
  type ExceptionHandler,
  type ExceptionHandlerKey,
} from "./exceptions.js"
import {
  HttpResponseHeaders,
  isHttpMethod,
  type ConnectionHandler,
  type ConnectionScope,
  type Receive,
  type Scope,
  type Send,
} from "./index.js"
import { RoutingMetrics } from "./metrics.js"
import type { Route } from "./routes.js"
import { addRouteToTrie } from "./routing/mapping.js"
import type { MiddlewareStackOptions } from "./routing/stack.js"
import { resolvePath, type RouteResolution } from "./routing/traversal.js"
import { createRouteMap, type HandlerKey, type RouteMap } from "./routing/trie.js"

const DISPATCHER_LOGGER: Logger = new DefaultLogger({
  name: "http.dispatcher",
})

/**
 * Update the dispatcher log levels
 *
 * @param level The new {@link LogLevel}
 */
export function setDispatcherLogLevel(level: LogLevel): void {
  DISPATCHER_LOGGER.setLevel(level)
}

/**
 * Options for a {@link RouteDispatcher}
 */
export interface RouteDispatcherOptions extends MiddlewareStackOptions {
  /** Handlers for errors raised before a route chain takes over (404, 405) */
  exceptionHandlers?: ReadonlyMap<ExceptionHandlerKey, ExceptionHandler>
}

/**
 * Builds the routing trie once and hands every connection to the chain of the
 * route that matches it
 */
export class RouteDispatcher {
  readonly routeMap: RouteMap
  readonly routes: readonly Route[]

  private readonly _handler: ConnectionHandler

  /**
   * @param routes The {@link Route}s to dispatch to
   * @param options The {@link RouteDispatcherOptions}
   *
   * @throws A {@link RoutingError} if the routes conflict
   */
  constructor(routes: readonly Route[], options: RouteDispatcherOptions) {
    const routeMap = createRouteMap()
    for (const route of routes) {
      addRouteToTrie(routeMap, route, options)
    }

    this.routeMap = routeMap
    this.routes = [...routes]
    this._handler = wrapInExceptionHandler(
      (scope, receive, send) => this._dispatch(scope, receive, send),
      options.exceptionHandlers ?? new Map(),
      options.debug,
    )

    DISPATCHER_LOGGER.info(
      `Dispatcher ready with ${routes.length} routes (${routeMap.plainRoutes.size} plain, ${routeMap.mountPaths.length} mounts)`,
    )
  }

  /**
   * Resolve the path for the connection kind
   *
   * @param path The request path
   * @param kind The {@link HandlerKey} of the connection
   * @returns The {@link RouteResolution}
   */
  resolve(path: string, kind: HandlerKey): RouteResolution {
    const result = resolvePath(this.routeMap, path, kind)
    RoutingMetrics.RouteLookups().add(1, {
      outcome: result.matched ? "matched" : result.reason,
    })
    return result
  }

  /**
   * The {@link ConnectionHandler} for the dispatcher
   */
  readonly handle: ConnectionHandler = (scope, receive, send) =>
    this._handler(scope, receive, send)

  private async _dispatch(
    scope: Scope,
    receive: Receive,
    send: Send,
  ): Promise<void> {
    if (scope.type === "lifespan") {
      DISPATCHER_LOGGER.debug("Ignoring lifespan scope")
      return
    }

    const kind: HandlerKey = scope.type === "http" ? scope.method : "websocket"
    const result = this.resolve(scope.path, kind)

    if (!result.matched) {
      DISPATCHER_LOGGER.debug(`No route for ${kind} ${scope.path}: ${result.reason}`)

      if (result.reason === "methodNotAllowed") {
        const allowed = (result.allowed ?? []).filter(isHttpMethod)
        throw new MethodNotAllowedException(undefined, {
          headers:
            allowed.length > 0
              ? { [HttpResponseHeaders.Allow]: allowed.join(", ") }
              : undefined,
        })
      }

      throw new NotFoundException()
    }

    const routed: ConnectionScope = { ...scope, pathParams: result.pathParams }
    if (result.mountPath !== undefined && result.remainder !== undefined) {
      routed.rootPath = `${scope.rootPath}${result.mountPath === "/" ? "" : result.mountPath}`
      routed.path = result.remainder
    }

    const template = result.binding.template
    const timer = Timer.startNew()

    try {
      await withSpan(
        `${kind} ${template}`,
        () => result.binding.handler(routed, receive, send),
        { "http.route": template },
      )
    } catch (err) {
      RoutingMetrics.RouteErrors().add(1, { template })
      throw err
    } finally {
      RoutingMetrics.RouteRequestDuration().record(timer.stop().seconds(), {
        template,
        kind,
      })
    }
  }
}
