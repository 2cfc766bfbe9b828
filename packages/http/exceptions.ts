/**
 * Translation of errors into responses
 */

import { asError } from "@trellis/core/errors.js"
import type { MaybeAwaitable } from "@trellis/core/index.js"
import {
  DefaultLogger,
  type LogLevel,
  type Logger,
} from "@trellis/core/logging.js"
import type { ClassOf, Optional } from "@trellis/core/type/utils.js"
import { HttpException, WebSocketException, statusText } from "./errors.js"
import {
  HttpStatusCode,
  type ConnectionHandler,
  type HttpResponse,
  type Send,
} from "./index.js"
import { HttpRequest } from "./request.js"
import { jsonContents, writeResponse } from "./utils.js"

const EXCEPTIONS_LOGGER: Logger = new DefaultLogger({
  name: "http.exceptions",
})

/**
 * Update the exception handling log levels
 *
 * @param level The new {@link LogLevel}
 */
export function setExceptionsLogLevel(level: LogLevel): void {
  EXCEPTIONS_LOGGER.setLevel(level)
}

/**
 * Turns an error raised while handling a request into a response
 */
export type ExceptionHandler = (
  request: HttpRequest,
  error: Error,
) => MaybeAwaitable<HttpResponse>

/**
 * Exception handlers are registered by status code or by error class
 */
export type ExceptionHandlerKey = number | ClassOf<Error>

export type ExceptionHandlersMap = Map<ExceptionHandlerKey, ExceptionHandler>

/** Close code for errors that are not WebSocket or HTTP exceptions */
export const INTERNAL_ERROR_CLOSE_CODE = 1011

/**
 * Get the status code that represents the error
 *
 * @param error The error to inspect
 * @returns The {@link HttpException} status or 500
 */
export function getStatusCode(error: Error): number {
  return error instanceof HttpException
    ? error.statusCode
    : HttpStatusCode.INTERNAL_SERVER_ERROR
}

/**
 * Find the handler for the error: the status code first, then the closest
 * registered class on the prototype chain
 *
 * @param handlers The {@link ExceptionHandlersMap} to search
 * @param error The error to handle
 * @returns The matching {@link ExceptionHandler} if any
 */
export function getExceptionHandler(
  handlers: ReadonlyMap<ExceptionHandlerKey, ExceptionHandler>,
  error: Error,
): Optional<ExceptionHandler> {
  const byStatus = handlers.get(getStatusCode(error))
  if (byStatus !== undefined) {
    return byStatus
  }

  let closest: Optional<ExceptionHandler>
  let closestDistance = Number.MAX_SAFE_INTEGER

  for (const [key, handler] of handlers) {
    if (typeof key === "function" && error instanceof key) {
      const distance = prototypeDistance(error, key)
      if (distance < closestDistance) {
        closest = handler
        closestDistance = distance
      }
    }
  }

  return closest
}

function prototypeDistance(error: Error, type: ClassOf<Error>): number {
  let distance = 0
  for (
    let proto: unknown = Object.getPrototypeOf(error);
    proto !== null && proto !== type.prototype;
    proto = Object.getPrototypeOf(proto)
  ) {
    distance++
  }

  return distance
}

/**
 * Build the default {@link ExceptionHandler}
 *
 * @param debug Include the error name and stack in the response
 * @returns An {@link ExceptionHandler} rendering `{ statusCode, detail }`
 */
export function createDefaultExceptionHandler(debug: boolean): ExceptionHandler {
  return (_request, error) => {
    const statusCode = getStatusCode(error)

    const content: Record<string, unknown> = {
      statusCode,
      detail:
        error instanceof HttpException
          ? error.detail
          : debug
            ? error.message
            : statusText(statusCode),
    }

    if (error instanceof HttpException && error.extra !== undefined) {
      content.extra = error.extra
    } else if (debug) {
      content.extra = { name: error.name, stack: error.stack }
    }

    const response = jsonContents(content, statusCode)
    if (error instanceof HttpException && error.headers) {
      for (const [name, value] of Object.entries(error.headers)) {
        response.headers.set(name, value)
      }
    }

    return response
  }
}

/**
 * Get the close code for an error raised on a WebSocket
 *
 * @param error The error that was raised
 * @returns The close code to send
 */
export function getWebSocketCloseCode(error: Error): number {
  if (error instanceof WebSocketException) {
    return error.code
  }

  if (error instanceof HttpException) {
    return 4000 + error.statusCode
  }

  return INTERNAL_ERROR_CLOSE_CODE
}

/**
 * Wrap the handler so errors become responses (or close frames) built by the
 * matching {@link ExceptionHandler}
 *
 * @param app The {@link ConnectionHandler} to wrap
 * @param handlers The {@link ExceptionHandlersMap} to consult
 * @param debug Flag for debug rendering in the default handler
 * @returns A new {@link ConnectionHandler}
 */
export function wrapInExceptionHandler(
  app: ConnectionHandler,
  handlers: ReadonlyMap<ExceptionHandlerKey, ExceptionHandler>,
  debug: boolean,
): ConnectionHandler {
  const defaultHandler = createDefaultExceptionHandler(debug)

  return async (scope, receive, send) => {
    if (scope.type === "lifespan") {
      return await app(scope, receive, send)
    }

    let started = false
    const tracked: Send = async (message) => {
      if (message.type === "http.response.start") {
        started = true
      }
      await send(message)
    }

    try {
      await app(scope, receive, tracked)
    } catch (err) {
      const error = asError(err)

      if (scope.type === "websocket") {
        const code = getWebSocketCloseCode(error)
        if (code === INTERNAL_ERROR_CLOSE_CODE) {
          EXCEPTIONS_LOGGER.error(
            `Unhandled error on websocket ${scope.path}`,
            error,
          )
        }

        await send({
          type: "websocket.close",
          code,
          reason: error instanceof HttpException ? error.detail : error.message,
        })
        return
      }

      if (started) {
        EXCEPTIONS_LOGGER.error(
          `Error after the response started for ${scope.method} ${scope.path}`,
          error,
        )
        throw error
      }

      const statusCode = getStatusCode(error)
      if (statusCode >= HttpStatusCode.INTERNAL_SERVER_ERROR) {
        EXCEPTIONS_LOGGER.error(
          `Error handling ${scope.method} ${scope.path}`,
          error,
        )
      } else {
        EXCEPTIONS_LOGGER.debug(
          `${statusCode} for ${scope.method} ${scope.path}: ${error.message}`,
        )
      }

      const handler = getExceptionHandler(handlers, error) ?? defaultHandler
      const response = await handler(new HttpRequest(scope, receive), error)
      await writeResponse(response, tracked)
    }
  }
}
