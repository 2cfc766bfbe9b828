/**
 * Route handler declarations and the layers that own them
 */

import type { MaybeAwaitable } from "@trellis/core/index.js"
import type { Optional } from "@trellis/core/type/utils.js"
import { RoutingError } from "./errors.js"
import type {
  ExceptionHandler,
  ExceptionHandlerKey,
  ExceptionHandlersMap,
} from "./exceptions.js"
import {
  HttpMethod,
  type ConnectionHandler,
  type HttpResponse,
} from "./index.js"
import type { Middleware } from "./middleware/types.js"
import type { HttpRequest } from "./request.js"
import type { WebSocketConnection } from "./websocket.js"

/**
 * A layer that contributes middleware and exception handlers to the handlers
 * it owns (an application, a router or a handler)
 */
export interface HandlerLayer {
  /** The layer that owns this one, undefined at the top */
  readonly owner: Optional<HandlerLayer>
  /** Middleware in declaration order */
  readonly middleware: readonly Middleware[]
  /** Exception handlers registered on this layer */
  readonly exceptionHandlers: ReadonlyMap<ExceptionHandlerKey, ExceptionHandler>
}

/**
 * Options shared by every {@link HandlerLayer}
 */
export interface HandlerLayerOptions {
  middleware?: Middleware[]
  exceptionHandlers?: Iterable<[ExceptionHandlerKey, ExceptionHandler]>
}

/**
 * Walk the owner chain from the top layer down to the given one
 *
 * @param layer The innermost {@link HandlerLayer}
 * @returns The chain, outermost first
 */
export function getOwnerChain(layer: HandlerLayer): HandlerLayer[] {
  const chain: HandlerLayer[] = []
  for (
    let current: Optional<HandlerLayer> = layer;
    current !== undefined;
    current = current.owner
  ) {
    chain.unshift(current)
  }

  return chain
}

/** The kinds of route handlers */
export type RouteHandlerKind = "http" | "websocket" | "raw"

/**
 * Options shared by every route handler
 */
export interface RouteHandlerOptions extends HandlerLayerOptions {
  /** One or more path templates relative to the owner */
  path?: string | string[]
  /** A name used in logs and spans */
  name?: string
}

/**
 * Base for handlers that terminate a route
 */
export abstract class BaseRouteHandler implements HandlerLayer {
  abstract readonly kind: RouteHandlerKind

  readonly paths: readonly string[]
  readonly name: Optional<string>
  readonly middleware: readonly Middleware[]
  readonly exceptionHandlers: ReadonlyMap<
    ExceptionHandlerKey,
    ExceptionHandler
  >

  private _owner: Optional<HandlerLayer>
  private _resolvedMiddleware: Optional<Middleware[]>
  private _resolvedExceptionHandlers: Optional<ExceptionHandlersMap>

  constructor(options: RouteHandlerOptions) {
    const paths = options.path ?? "/"
    this.paths = Array.isArray(paths) ? [...paths] : [paths]
    this.name = options.name
    this.middleware = [...(options.middleware ?? [])]
    this.exceptionHandlers = new Map(options.exceptionHandlers ?? [])
  }

  get owner(): Optional<HandlerLayer> {
    return this._owner
  }

  /**
   * Attach the handler to the layer that registers it
   *
   * @param owner The owning {@link HandlerLayer}
   *
   * @throws A {@link RoutingError} if the handler is already owned by another layer
   */
  setOwner(owner: HandlerLayer): void {
    if (this._owner !== undefined && this._owner !== owner) {
      throw new RoutingError(
        `Route handler ${this.name ?? this.paths.join(",")} is already registered on another router`,
      )
    }

    this._owner = owner
    this._resolvedMiddleware = undefined
    this._resolvedExceptionHandlers = undefined
  }

  /**
   * Collect the middleware of every layer, application first and the handler
   * last, each in declaration order
   *
   * @returns The resolved {@link Middleware}, outermost first
   */
  resolveMiddleware(): Middleware[] {
    return (this._resolvedMiddleware ??= getOwnerChain(this).flatMap((l) => [
      ...l.middleware,
    ]))
  }

  /**
   * Merge the exception handlers of every layer, inner layers overriding the
   * outer ones
   *
   * @returns The resolved {@link ExceptionHandlersMap}
   */
  resolveExceptionHandlers(): ExceptionHandlersMap {
    if (this._resolvedExceptionHandlers === undefined) {
      const merged: ExceptionHandlersMap = new Map()
      for (const layer of getOwnerChain(this)) {
        for (const [key, handler] of layer.exceptionHandlers) {
          merged.set(key, handler)
        }
      }
      this._resolvedExceptionHandlers = merged
    }

    return this._resolvedExceptionHandlers
  }
}

/**
 * Function that answers an HTTP request
 */
export type HttpHandlerFunction = (
  request: HttpRequest,
) => MaybeAwaitable<HttpResponse>

/**
 * Options for an {@link HttpRouteHandler}
 */
export interface HttpRouteHandlerOptions extends RouteHandlerOptions {
  /** The methods the handler answers */
  methods: HttpMethod[]
}

/**
 * Handler for one or more HTTP methods on one or more paths
 */
export class HttpRouteHandler extends BaseRouteHandler {
  readonly kind = "http"
  readonly methods: readonly HttpMethod[]
  readonly fn: HttpHandlerFunction

  constructor(options: HttpRouteHandlerOptions, fn: HttpHandlerFunction) {
    super(options)

    if (options.methods.length === 0) {
      throw new RoutingError(
        `HTTP handler for ${this.paths.join(",")} declares no methods`,
      )
    }

    this.methods = [...new Set(options.methods)]
    this.fn = fn
  }
}

/**
 * Function that runs a WebSocket session
 */
export type WebSocketHandlerFunction = (
  socket: WebSocketConnection,
) => Promise<void>

/**
 * Handler for WebSocket sessions
 */
export class WebSocketRouteHandler extends BaseRouteHandler {
  readonly kind = "websocket"
  readonly fn: WebSocketHandlerFunction

  constructor(options: RouteHandlerOptions, fn: WebSocketHandlerFunction) {
    super(options)
    this.fn = fn
  }
}

/**
 * Options for a {@link RawRouteHandler}
 */
export interface RawRouteHandlerOptions extends RouteHandlerOptions {
  /** Every path below the handler path is delegated to it */
  isMount?: boolean
  /** The mount serves a static file tree */
  isStatic?: boolean
}

/**
 * Handler that receives the connection primitives untouched, used for mounted
 * applications and static files
 */
export class RawRouteHandler extends BaseRouteHandler {
  readonly kind = "raw"
  readonly fn: ConnectionHandler
  readonly isMount: boolean
  readonly isStatic: boolean

  constructor(options: RawRouteHandlerOptions, fn: ConnectionHandler) {
    super(options)
    this.fn = fn
    this.isStatic = options.isStatic ?? false
    this.isMount = (options.isMount ?? false) || this.isStatic
  }
}

/** Any route handler */
export type RouteHandler = HttpRouteHandler | WebSocketRouteHandler | RawRouteHandler

type MethodHandlerOptions = Omit<HttpRouteHandlerOptions, "methods" | "path">

function methodHandler(
  method: HttpMethod,
): (
  path: string | string[],
  fn: HttpHandlerFunction,
  options?: MethodHandlerOptions,
) => HttpRouteHandler {
  return (path, fn, options) =>
    new HttpRouteHandler({ ...options, path, methods: [method] }, fn)
}

/** Declare a GET handler */
export const get = methodHandler(HttpMethod.GET)
/** Declare a POST handler */
export const post = methodHandler(HttpMethod.POST)
/** Declare a PUT handler */
export const put = methodHandler(HttpMethod.PUT)
/** Declare a PATCH handler */
export const patch = methodHandler(HttpMethod.PATCH)
/** Declare a DELETE handler */
export const del = methodHandler(HttpMethod.DELETE)
/** Declare a HEAD handler */
export const head = methodHandler(HttpMethod.HEAD)

/**
 * Declare a WebSocket handler
 *
 * @param path The path template(s)
 * @param fn The {@link WebSocketHandlerFunction}
 * @param options Additional {@link RouteHandlerOptions}
 * @returns A new {@link WebSocketRouteHandler}
 */
export function websocket(
  path: string | string[],
  fn: WebSocketHandlerFunction,
  options?: Omit<RouteHandlerOptions, "path">,
): WebSocketRouteHandler {
  return new WebSocketRouteHandler({ ...options, path }, fn)
}

/**
 * Declare a raw handler
 *
 * @param path The path template(s)
 * @param fn The {@link ConnectionHandler}
 * @param options Additional {@link RawRouteHandlerOptions}
 * @returns A new {@link RawRouteHandler}
 */
export function raw(
  path: string | string[],
  fn: ConnectionHandler,
  options?: Omit<RawRouteHandlerOptions, "path">,
): RawRouteHandler {
  return new RawRouteHandler({ ...options, path }, fn)
}

/**
 * Mount another application (anything exposing the connection contract) below
 * a path prefix
 *
 * @param path The mount path, parameters are not allowed
 * @param app The {@link ConnectionHandler} to delegate to
 * @param options Additional {@link RouteHandlerOptions}
 * @returns A new mounted {@link RawRouteHandler}
 */
export function mount(
  path: string,
  app: ConnectionHandler,
  options?: Omit<RouteHandlerOptions, "path">,
): RawRouteHandler {
  return new RawRouteHandler({ ...options, path, isMount: true }, app)
}
