/**
 * Http Error Information
 */

import { HttpStatusCode, HttpStatusText } from "./index.js"

/**
 * Options for creating an {@link HttpException}
 */
export interface HttpExceptionOptions {
  /** The status code to respond with */
  statusCode?: HttpStatusCode | number
  /** Extra headers to add to the response */
  headers?: Record<string, string>
  /** Extra information to render with the response */
  extra?: unknown
  /** The underlying cause */
  cause?: unknown
}

/**
 * An error that maps directly to an HTTP response
 */
export class HttpException extends Error {
  readonly statusCode: number
  readonly detail: string
  readonly headers?: Record<string, string>
  readonly extra?: unknown

  constructor(detail?: string, options?: HttpExceptionOptions) {
    const statusCode =
      options?.statusCode ?? HttpStatusCode.INTERNAL_SERVER_ERROR
    const resolved = detail ?? statusText(statusCode)

    super(resolved, { cause: options?.cause })

    this.name = new.target.name
    this.statusCode = statusCode
    this.detail = resolved
    this.headers = options?.headers
    this.extra = options?.extra
  }
}

type FixedStatusOptions = Omit<HttpExceptionOptions, "statusCode">

export class ValidationException extends HttpException {
  constructor(detail?: string, options?: FixedStatusOptions) {
    super(detail, { ...options, statusCode: HttpStatusCode.BAD_REQUEST })
  }
}

export class NotAuthorizedException extends HttpException {
  constructor(detail?: string, options?: FixedStatusOptions) {
    super(detail, { ...options, statusCode: HttpStatusCode.UNAUTHORIZED })
  }
}

export class PermissionDeniedException extends HttpException {
  constructor(detail?: string, options?: FixedStatusOptions) {
    super(detail, { ...options, statusCode: HttpStatusCode.FORBIDDEN })
  }
}

export class NotFoundException extends HttpException {
  constructor(detail?: string, options?: FixedStatusOptions) {
    super(detail, { ...options, statusCode: HttpStatusCode.NOT_FOUND })
  }
}

export class MethodNotAllowedException extends HttpException {
  constructor(detail?: string, options?: FixedStatusOptions) {
    super(detail, {
      ...options,
      statusCode: HttpStatusCode.METHOD_NOT_ALLOWED,
    })
  }
}

export class InternalServerException extends HttpException {
  constructor(detail?: string, options?: FixedStatusOptions) {
    super(detail, {
      ...options,
      statusCode: HttpStatusCode.INTERNAL_SERVER_ERROR,
    })
  }
}

export class ServiceUnavailableException extends HttpException {
  constructor(detail?: string, options?: FixedStatusOptions) {
    super(detail, {
      ...options,
      statusCode: HttpStatusCode.SERVICE_UNAVAILABLE,
    })
  }
}

/**
 * Close code used when a {@link WebSocketException} does not name one
 */
export const DEFAULT_WEBSOCKET_CLOSE_CODE = 4500

/**
 * An error raised from a WebSocket handler that closes the session with the
 * given code
 */
export class WebSocketException extends Error {
  readonly code: number

  constructor(detail: string, code: number = DEFAULT_WEBSOCKET_CLOSE_CODE) {
    super(detail)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Raised when reading from a connection the client already left
 */
export class ClientDisconnectedError extends Error {
  constructor(message = "client disconnected") {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Raised while building the route table, always fatal for the application
 */
export class RoutingError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Lookup the reason phrase for a status code
 *
 * @param statusCode The status code
 * @returns The reason phrase or a generic description
 */
export function statusText(statusCode: number): string {
  for (const [code, text] of Object.entries(HttpStatusText)) {
    if (Number(code) === statusCode) {
      return text
    }
  }

  return statusCode >= 500 ? "Server Error" : "Client Error"
}
