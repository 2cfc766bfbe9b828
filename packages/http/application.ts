/**
 * The application ties the route table, the dispatcher and the lifespan hooks
 * together behind a single connection handler
 */

import { getErrorMessage } from "@trellis/core/errors.js"
import { EmitterFor } from "@trellis/core/events.js"
import type { MaybeAwaitable } from "@trellis/core/index.js"
import type { LifecycleEvents } from "@trellis/core/lifecycle.js"
import {
  DefaultLogger,
  type LogLevel,
  type Logger,
} from "@trellis/core/logging.js"
import type { Optional } from "@trellis/core/type/utils.js"
import { RouteDispatcher } from "./dispatcher.js"
import type { ExceptionHandler, ExceptionHandlerKey } from "./exceptions.js"
import type {
  HandlerLayer,
  HandlerLayerOptions,
  RouteHandler,
} from "./handlers.js"
import type {
  ConnectionHandler,
  Receive,
  Send,
} from "./index.js"
import type { AllowedHostsConfig } from "./middleware/allowedHosts.js"
import type { CompressionConfig } from "./middleware/compression.js"
import type { CsrfConfig } from "./middleware/csrf.js"
import type { Middleware } from "./middleware/types.js"
import { Router } from "./router.js"
import type { Route } from "./routes.js"
import type { MiddlewareStackOptions } from "./routing/stack.js"
import {
  createStaticFilesHandler,
  type StaticFilesConfig,
} from "./staticFiles.js"

const APPLICATION_LOGGER: Logger = new DefaultLogger({
  name: "http.application",
})

/**
 * Update the application log levels
 *
 * @param level The new {@link LogLevel}
 */
export function setApplicationLogLevel(level: LogLevel): void {
  APPLICATION_LOGGER.setLevel(level)
}

/**
 * A hook run when the application starts or stops
 */
export type LifespanHook = (app: Application) => MaybeAwaitable<void>

/**
 * Configuration for an {@link Application}
 */
export interface ApplicationConfig extends HandlerLayerOptions {
  /** Handlers and routers registered at the root */
  routeHandlers?: (RouteHandler | Router)[]
  /** Render error details in the default exception handler */
  debug?: boolean
  allowedHosts?: AllowedHostsConfig
  compression?: CompressionConfig
  csrf?: CsrfConfig
  /** Static file trees to mount */
  staticFiles?: StaticFilesConfig[]
  onStartup?: LifespanHook[]
  onShutdown?: LifespanHook[]
}

/**
 * Set of supported events on an {@link Application}
 */
export interface ApplicationEvents extends LifecycleEvents {
  /**
   * Fired when the route table was rebuilt
   *
   * @param routes The new {@link Route}s
   */
  routesChanged: (routes: readonly Route[]) => void

  /**
   * Fired when a lifespan hook fails
   *
   * @param error The error that was raised
   */
  error: (error: unknown) => void
}

/**
 * The top {@link HandlerLayer}, exposing the connection contract through
 * {@link Application.handle}
 */
export class Application
  extends EmitterFor<ApplicationEvents>
  implements HandlerLayer
{
  readonly owner: Optional<HandlerLayer> = undefined
  readonly middleware: readonly Middleware[]
  readonly exceptionHandlers: ReadonlyMap<ExceptionHandlerKey, ExceptionHandler>
  readonly debug: boolean
  readonly state: Record<string, unknown> = {}

  private readonly _options: MiddlewareStackOptions
  private readonly _router: Router
  private readonly _onStartup: LifespanHook[]
  private readonly _onShutdown: LifespanHook[]
  private _dispatcher: RouteDispatcher

  constructor(config?: ApplicationConfig) {
    super()

    this.middleware = [...(config?.middleware ?? [])]
    this.exceptionHandlers = new Map(config?.exceptionHandlers ?? [])
    this.debug = config?.debug ?? false
    this._onStartup = [...(config?.onStartup ?? [])]
    this._onShutdown = [...(config?.onShutdown ?? [])]
    this._options = {
      debug: this.debug,
      allowedHosts: config?.allowedHosts,
      compression: config?.compression,
      csrf: config?.csrf,
    }

    this._router = new Router()
    this._router.setOwner(this)

    for (const value of config?.routeHandlers ?? []) {
      this._router.register(value)
    }

    for (const staticFiles of config?.staticFiles ?? []) {
      this._router.register(createStaticFilesHandler(staticFiles))
    }

    this._dispatcher = this._buildDispatcher()
    this.emit("initializing")
  }

  /** The {@link RouteDispatcher} for the current route table */
  get dispatcher(): RouteDispatcher {
    return this._dispatcher
  }

  get routes(): readonly Route[] {
    return this._dispatcher.routes
  }

  /**
   * Register more handlers or routers, the route table is rebuilt from scratch
   *
   * @param values The {@link RouteHandler}s or {@link Router}s to register
   *
   * @throws A {@link RoutingError} if the new table has conflicts, the previous
   * table stays active in that case
   */
  register(...values: (RouteHandler | Router)[]): void {
    const added: (RouteHandler | Router)[] = []

    try {
      for (const value of values) {
        if (this._router.register(value)) {
          added.push(value)
        }
      }

      this._dispatcher = this._buildDispatcher()
    } catch (err) {
      for (const value of added) {
        this._router.remove(value)
      }

      throw err
    }

    this.emit("routesChanged", this._dispatcher.routes)
  }

  /**
   * The {@link ConnectionHandler} for the application
   */
  readonly handle: ConnectionHandler = async (scope, receive, send) => {
    if (scope.type === "lifespan") {
      return await this._lifespan(receive, send)
    }

    await this._dispatcher.handle(scope, receive, send)
  }

  /**
   * Run the startup hooks in order
   */
  async startup(): Promise<void> {
    for (const hook of this._onStartup) {
      await hook(this)
    }

    this.emit("started")
  }

  /**
   * Run the shutdown hooks in order, every hook runs even if one fails
   */
  async shutdown(): Promise<void> {
    this.emit("stopping")

    let failure: unknown
    for (const hook of this._onShutdown) {
      try {
        await hook(this)
      } catch (err) {
        APPLICATION_LOGGER.error("Shutdown hook failed", err)
        failure ??= err
      }
    }

    this.emit("finished")
    if (failure !== undefined) {
      throw failure
    }
  }

  private _buildDispatcher(): RouteDispatcher {
    return new RouteDispatcher(this._router.routes, {
      ...this._options,
      exceptionHandlers: this.exceptionHandlers,
    })
  }

  private async _lifespan(receive: Receive, send: Send): Promise<void> {
    for (;;) {
      const message = await receive()

      switch (message.type) {
        case "lifespan.startup":
          try {
            await this.startup()
            await send({ type: "lifespan.startup.complete" })
          } catch (err) {
            this._lifespanFailure(err)
            await send({
              type: "lifespan.startup.failed",
              message: getErrorMessage(err) ?? String(err),
            })
          }
          break
        case "lifespan.shutdown":
          try {
            await this.shutdown()
            await send({ type: "lifespan.shutdown.complete" })
          } catch (err) {
            this._lifespanFailure(err)
            await send({
              type: "lifespan.shutdown.failed",
              message: getErrorMessage(err) ?? String(err),
            })
          }
          return
        default:
          APPLICATION_LOGGER.warn(`Unexpected lifespan message ${message.type}`)
      }
    }
  }

  private _lifespanFailure(err: unknown): void {
    APPLICATION_LOGGER.error("Lifespan hook failed", err)
    if (this.listenerCount("error") > 0) {
      this.emit("error", err)
    }
  }
}
