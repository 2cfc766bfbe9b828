/**
 * Routers group route handlers below a common path and share middleware and
 * exception handlers with them
 */

import type { Optional } from "@trellis/core/type/utils.js"
import { RoutingError } from "./errors.js"
import type { ExceptionHandler, ExceptionHandlerKey } from "./exceptions.js"
import type {
  HandlerLayer,
  HandlerLayerOptions,
  HttpRouteHandler,
  RouteHandler,
} from "./handlers.js"
import type { Middleware } from "./middleware/types.js"
import { HttpRoute, RawRoute, WebSocketRoute, type Route } from "./routes.js"
import { joinPaths, normalizePath } from "./routing/parameters.js"

/**
 * Options for creating a {@link Router}
 */
export interface RouterOptions extends HandlerLayerOptions {
  /** The path prefix for everything registered on the router */
  path?: string
  /** Handlers or routers to register immediately */
  routeHandlers?: (RouteHandler | Router)[]
}

/**
 * A {@link HandlerLayer} holding route handlers and nested routers
 */
export class Router implements HandlerLayer {
  readonly path: string
  readonly middleware: readonly Middleware[]
  readonly exceptionHandlers: ReadonlyMap<ExceptionHandlerKey, ExceptionHandler>

  private _owner: Optional<HandlerLayer>
  private readonly _registered: (RouteHandler | Router)[] = []

  constructor(options?: RouterOptions) {
    this.path = normalizePath(options?.path ?? "/")
    this.middleware = [...(options?.middleware ?? [])]
    this.exceptionHandlers = new Map(options?.exceptionHandlers ?? [])

    for (const value of options?.routeHandlers ?? []) {
      this.register(value)
    }
  }

  get owner(): Optional<HandlerLayer> {
    return this._owner
  }

  /**
   * Attach the router to the layer that registers it
   *
   * @param owner The owning {@link HandlerLayer}
   *
   * @throws A {@link RoutingError} if the router is already owned by another layer
   */
  setOwner(owner: HandlerLayer): void {
    if (this._owner !== undefined && this._owner !== owner) {
      throw new RoutingError(
        `Router ${this.path} is already registered on another layer`,
      )
    }

    this._owner = owner
  }

  /**
   * Register a route handler or a nested router
   *
   * @param value The {@link RouteHandler} or {@link Router} to register
   * @returns False if the value was already registered
   *
   * @throws A {@link RoutingError} if the value is owned by another layer or
   * is this router
   */
  register(value: RouteHandler | Router): boolean {
    if (value === this) {
      throw new RoutingError(`Router ${this.path} cannot register itself`)
    }

    value.setOwner(this)
    if (this._registered.includes(value)) {
      return false
    }

    this._registered.push(value)
    return true
  }

  /**
   * Remove a registered value, it stays owned by this router
   *
   * @param value The {@link RouteHandler} or {@link Router} to remove
   * @returns True if the value was registered
   */
  remove(value: RouteHandler | Router): boolean {
    const idx = this._registered.indexOf(value)
    if (idx < 0) {
      return false
    }

    this._registered.splice(idx, 1)
    return true
  }

  /**
   * Build the routes for everything registered on the router and its nested
   * routers, HTTP handlers sharing a path are grouped into one route
   *
   * @returns The {@link Route}s in registration order
   */
  get routes(): Route[] {
    const routes: Route[] = []
    const httpRoutes = new Map<string, HttpRouteHandler[]>()

    for (const [path, handler] of this.collect("/")) {
      switch (handler.kind) {
        case "http": {
          const existing = httpRoutes.get(path)
          if (existing === undefined) {
            httpRoutes.set(path, [handler])
          } else {
            existing.push(handler)
          }
          break
        }
        case "websocket":
          routes.push(new WebSocketRoute(path, handler))
          break
        case "raw":
          routes.push(new RawRoute(path, handler))
          break
      }
    }

    for (const [path, handlers] of httpRoutes) {
      routes.push(new HttpRoute(path, handlers))
    }

    return routes
  }

  /**
   * Flatten the handlers with their full paths
   *
   * @param prefix The prefix of the owning routers
   * @returns The full path and handler pairs
   */
  collect(prefix: string): [string, RouteHandler][] {
    const base = joinPaths(prefix, this.path)

    return this._registered.flatMap((value): [string, RouteHandler][] =>
      value instanceof Router
        ? value.collect(base)
        : value.paths.map((p): [string, RouteHandler] => [
            joinPaths(base, p),
            value,
          ]),
    )
  }
}
