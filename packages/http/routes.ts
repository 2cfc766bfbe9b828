/**
 * Route descriptors, one path with the handlers bound to it
 */

import { MethodNotAllowedException, RoutingError } from "./errors.js"
import type {
  HttpRouteHandler,
  RawRouteHandler,
  WebSocketRouteHandler,
} from "./handlers.js"
import {
  HttpMethod,
  type ConnectionHandler,
  type Receive,
  type Scope,
  type Send,
} from "./index.js"
import { HttpRequest } from "./request.js"
import {
  parsePathTemplate,
  type PathComponent,
  type PathParameterDefinition,
} from "./routing/parameters.js"
import { writeResponse } from "./utils.js"
import { WebSocketConnection, WebSocketDisconnectError } from "./websocket.js"

/**
 * Fields every route exposes to the trie builder
 */
abstract class BaseRoute {
  /** The normalized path template */
  readonly path: string
  /** The decomposed template */
  readonly pathComponents: readonly PathComponent[]
  /** The parameters in declaration order */
  readonly pathParameters: readonly PathParameterDefinition[]

  constructor(path: string) {
    const parsed = parsePathTemplate(path)
    this.path = parsed.path
    this.pathComponents = parsed.components
    this.pathParameters = parsed.parameters
  }

  /**
   * The terminal handler for the route
   */
  abstract handle(scope: Scope, receive: Receive, send: Send): Promise<void>
}

/**
 * A path with one handler per HTTP method
 */
export class HttpRoute extends BaseRoute {
  readonly kind = "http"
  readonly handlerMap: ReadonlyMap<HttpMethod, HttpRouteHandler>

  /**
   * @param path The path template
   * @param handlers The handlers bound to the path
   *
   * @throws A {@link RoutingError} if two handlers declare the same method
   */
  constructor(path: string, handlers: readonly HttpRouteHandler[]) {
    super(path)

    const handlerMap = new Map<HttpMethod, HttpRouteHandler>()
    for (const handler of handlers) {
      for (const method of handler.methods) {
        if (handlerMap.has(method)) {
          throw new RoutingError(
            `Multiple handlers for ${method} ${this.path}`,
          )
        }
        handlerMap.set(method, handler)
      }
    }

    this.handlerMap = handlerMap
  }

  get methods(): HttpMethod[] {
    return [...this.handlerMap.keys()]
  }

  async handle(scope: Scope, receive: Receive, send: Send): Promise<void> {
    if (scope.type !== "http") {
      throw new RoutingError(`HTTP route ${this.path} received ${scope.type}`)
    }

    const handler = this.handlerMap.get(scope.method)
    if (handler === undefined) {
      throw new MethodNotAllowedException(undefined, {
        headers: { allow: this.methods.join(", ") },
      })
    }

    const response = await handler.fn(new HttpRequest(scope, receive))
    await writeResponse(response, send, {
      omitBody: scope.method === HttpMethod.HEAD,
    })
  }
}

/**
 * A path with a WebSocket handler
 */
export class WebSocketRoute extends BaseRoute {
  readonly kind = "websocket"
  readonly routeHandler: WebSocketRouteHandler

  constructor(path: string, routeHandler: WebSocketRouteHandler) {
    super(path)
    this.routeHandler = routeHandler
  }

  async handle(scope: Scope, receive: Receive, send: Send): Promise<void> {
    if (scope.type !== "websocket") {
      throw new RoutingError(
        `WebSocket route ${this.path} received ${scope.type}`,
      )
    }

    try {
      await this.routeHandler.fn(new WebSocketConnection(scope, receive, send))
    } catch (err) {
      // The client is gone, nothing left to report to
      if (!(err instanceof WebSocketDisconnectError)) {
        throw err
      }
    }
  }
}

/**
 * A path (or mount) with a raw handler
 */
export class RawRoute extends BaseRoute {
  readonly kind = "raw"
  readonly routeHandler: RawRouteHandler

  constructor(path: string, routeHandler: RawRouteHandler) {
    super(path)
    this.routeHandler = routeHandler
  }

  get isMount(): boolean {
    return this.routeHandler.isMount
  }

  handle(scope: Scope, receive: Receive, send: Send): Promise<void> {
    const fn: ConnectionHandler = this.routeHandler.fn
    return fn(scope, receive, send)
  }
}

/** Any route */
export type Route = HttpRoute | WebSocketRoute | RawRoute
