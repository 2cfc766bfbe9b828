/**
 * Core package definitions and interfaces
 */

import type { Optional } from "@trellis/core/type/utils.js"
import type { PathParameters } from "./routing/parameters.js"

/**
 * Raw header pairs as they travel through a connection, names are lowercase
 */
export type RawHeaders = [string, string][]

/**
 * HttpHeaders are an ordered collection of key, value pairs where a key may
 * appear more than once
 */
export interface HttpHeaders {
  /**
   * Get the header with the given name, repeated values are joined with ","
   *
   * @param name The header name
   */
  get(name: string): Optional<string>

  /**
   * Get every value for the header with the given name
   *
   * @param name The header name
   */
  getAll(name: string): string[]

  /**
   * Check if the header with the name exists
   *
   * @param name The header name
   */
  has(name: string): boolean

  /**
   * Set the header, replacing any existing values
   *
   * @param name The header to set
   * @param value The value to set
   */
  set(name: string, value: string): void

  /**
   * Add another value for the header
   *
   * @param name The header to append
   * @param value The value to append
   */
  append(name: string, value: string): void

  /**
   * Delete the header with the given name
   *
   * @param name The header to delete
   */
  delete(name: string): void

  /**
   * Gets the raw underlying headers
   */
  readonly raw: RawHeaders
}

/**
 * Common headers for requests and responses (lowercase)
 */
export enum CommonHttpHeaders {
  CacheControl = "cache-control",
  ContentEncoding = "content-encoding",
  ContentLength = "content-length",
  ContentType = "content-type",
  Date = "date",
  Upgrade = "upgrade",
}

/**
 * Headers for requests (lowercase)
 */
export enum HttpRequestHeaders {
  Accept = "accept",
  AcceptEncoding = "accept-encoding",
  Cookie = "cookie",
  Host = "host",
  UserAgent = "user-agent",
}

/**
 * Headers for responses (lowercase)
 */
export enum HttpResponseHeaders {
  Allow = "allow",
  ETag = "etag",
  LastModified = "last-modified",
  Location = "location",
  SetCookie = "set-cookie",
  Vary = "vary",
}

/**
 * Supported methods for HTTP operations
 */
export enum HttpMethod {
  DELETE = "DELETE",
  GET = "GET",
  HEAD = "HEAD",
  OPTIONS = "OPTIONS",
  PATCH = "PATCH",
  POST = "POST",
  PUT = "PUT",
}

/**
 * Set of status codes with names
 */
export enum HttpStatusCode {
  OK = 200,
  CREATED = 201,
  ACCEPTED = 202,
  NO_CONTENT = 204,
  MOVED_PERMANENTLY = 301,
  FOUND = 302,
  SEE_OTHER = 303,
  NOT_MODIFIED = 304,
  TEMPORARY_REDIRECT = 307,
  PERMANENT_REDIRECT = 308,
  BAD_REQUEST = 400,
  UNAUTHORIZED = 401,
  FORBIDDEN = 403,
  NOT_FOUND = 404,
  METHOD_NOT_ALLOWED = 405,
  NOT_ACCEPTABLE = 406,
  CONFLICT = 409,
  PAYLOAD_TOO_LARGE = 413,
  UNSUPPORTED_MEDIA_TYPE = 415,
  UNPROCESSABLE_ENTITY = 422,
  TOO_MANY_REQUESTS = 429,
  INTERNAL_SERVER_ERROR = 500,
  NOT_IMPLEMENTED = 501,
  BAD_GATEWAY = 502,
  SERVICE_UNAVAILABLE = 503,
  GATEWAY_TIMEOUT = 504,
}

/**
 * Reason phrases for the {@link HttpStatusCode} values
 */
export const HttpStatusText: Readonly<Record<HttpStatusCode, string>> = {
  [HttpStatusCode.OK]: "OK",
  [HttpStatusCode.CREATED]: "Created",
  [HttpStatusCode.ACCEPTED]: "Accepted",
  [HttpStatusCode.NO_CONTENT]: "No Content",
  [HttpStatusCode.MOVED_PERMANENTLY]: "Moved Permanently",
  [HttpStatusCode.FOUND]: "Found",
  [HttpStatusCode.SEE_OTHER]: "See Other",
  [HttpStatusCode.NOT_MODIFIED]: "Not Modified",
  [HttpStatusCode.TEMPORARY_REDIRECT]: "Temporary Redirect",
  [HttpStatusCode.PERMANENT_REDIRECT]: "Permanent Redirect",
  [HttpStatusCode.BAD_REQUEST]: "Bad Request",
  [HttpStatusCode.UNAUTHORIZED]: "Unauthorized",
  [HttpStatusCode.FORBIDDEN]: "Forbidden",
  [HttpStatusCode.NOT_FOUND]: "Not Found",
  [HttpStatusCode.METHOD_NOT_ALLOWED]: "Method Not Allowed",
  [HttpStatusCode.NOT_ACCEPTABLE]: "Not Acceptable",
  [HttpStatusCode.CONFLICT]: "Conflict",
  [HttpStatusCode.PAYLOAD_TOO_LARGE]: "Payload Too Large",
  [HttpStatusCode.UNSUPPORTED_MEDIA_TYPE]: "Unsupported Media Type",
  [HttpStatusCode.UNPROCESSABLE_ENTITY]: "Unprocessable Entity",
  [HttpStatusCode.TOO_MANY_REQUESTS]: "Too Many Requests",
  [HttpStatusCode.INTERNAL_SERVER_ERROR]: "Internal Server Error",
  [HttpStatusCode.NOT_IMPLEMENTED]: "Not Implemented",
  [HttpStatusCode.BAD_GATEWAY]: "Bad Gateway",
  [HttpStatusCode.SERVICE_UNAVAILABLE]: "Service Unavailable",
  [HttpStatusCode.GATEWAY_TIMEOUT]: "Gateway Timeout",
}

/**
 * Check if the value is one of the supported {@link HttpMethod} values
 *
 * @param value The value to check
 * @returns True if the value is a {@link HttpMethod}
 */
export function isHttpMethod(value: unknown): value is HttpMethod {
  return (
    typeof value === "string" &&
    Object.values<string>(HttpMethod).includes(value)
  )
}

/**
 * Fields shared by every connection scope
 */
interface ConnectionScopeBase {
  /** The path after any mount prefix, always starting with "/" */
  path: string
  /** The mount prefix consumed so far, empty at the top level */
  rootPath: string
  /** The undecoded request target path */
  rawPath: string
  /** The query string without the leading "?" */
  queryString: string
  /** The request headers with lowercase names */
  headers: RawHeaders
  /** The typed path parameters, filled in when a route is resolved */
  pathParams: PathParameters
  /** Arbitrary per connection state shared between layers */
  state: Record<string, unknown>
  /** The remote address if known */
  client?: { host: string; port: number }
}

/**
 * Scope for a single HTTP request/response exchange
 */
export interface HttpScope extends ConnectionScopeBase {
  type: "http"
  method: HttpMethod
  scheme: "http" | "https"
  httpVersion: string
}

/**
 * Scope for a WebSocket session
 */
export interface WebSocketScope extends ConnectionScopeBase {
  type: "websocket"
  scheme: "ws" | "wss"
  subprotocols: string[]
}

/**
 * Scope for the application startup and shutdown exchange
 */
export interface LifespanScope {
  type: "lifespan"
  state: Record<string, unknown>
}

/** Scopes that carry a request path */
export type ConnectionScope = HttpScope | WebSocketScope

/** Every scope a {@link ConnectionHandler} may be invoked with */
export type Scope = ConnectionScope | LifespanScope

export interface HttpRequestMessage {
  type: "http.request"
  body: Buffer
  more: boolean
}

export interface HttpDisconnectMessage {
  type: "http.disconnect"
}

export interface WebSocketConnectMessage {
  type: "websocket.connect"
}

export interface WebSocketReceiveMessage {
  type: "websocket.receive"
  text?: string
  bytes?: Buffer
}

export interface WebSocketDisconnectMessage {
  type: "websocket.disconnect"
  code: number
}

export interface LifespanStartupMessage {
  type: "lifespan.startup"
}

export interface LifespanShutdownMessage {
  type: "lifespan.shutdown"
}

/** Messages flowing from the client towards the application */
export type ReceiveMessage =
  | HttpRequestMessage
  | HttpDisconnectMessage
  | WebSocketConnectMessage
  | WebSocketReceiveMessage
  | WebSocketDisconnectMessage
  | LifespanStartupMessage
  | LifespanShutdownMessage

export interface HttpResponseStartMessage {
  type: "http.response.start"
  status: number
  headers: RawHeaders
}

export interface HttpResponseBodyMessage {
  type: "http.response.body"
  body: Buffer
  more: boolean
}

export interface WebSocketAcceptMessage {
  type: "websocket.accept"
  subprotocol?: string
  headers?: RawHeaders
}

export interface WebSocketSendMessage {
  type: "websocket.send"
  text?: string
  bytes?: Buffer
}

export interface WebSocketCloseMessage {
  type: "websocket.close"
  code: number
  reason?: string
}

export interface LifespanCompleteMessage {
  type: "lifespan.startup.complete" | "lifespan.shutdown.complete"
}

export interface LifespanFailedMessage {
  type: "lifespan.startup.failed" | "lifespan.shutdown.failed"
  message: string
}

/** Messages flowing from the application towards the client */
export type SendMessage =
  | HttpResponseStartMessage
  | HttpResponseBodyMessage
  | WebSocketAcceptMessage
  | WebSocketSendMessage
  | WebSocketCloseMessage
  | LifespanCompleteMessage
  | LifespanFailedMessage

/**
 * Reads the next message from the client
 */
export type Receive = () => Promise<ReceiveMessage>

/**
 * Sends a message to the client, rejects once the client is gone
 */
export type Send = (message: SendMessage) => Promise<void>

/**
 * The contract shared by the dispatcher, every middleware, mounted
 * applications and static file trees
 */
export type ConnectionHandler = (
  scope: Scope,
  receive: Receive,
  send: Send,
) => Promise<void>

/**
 * The body of an {@link HttpResponse}, either fully buffered or streamed
 */
export type ResponseBody = Buffer | AsyncIterable<Buffer>

/**
 * An interface defining the shape of an HTTP Response
 */
export interface HttpResponse {
  /** The status code to return */
  status: HttpStatusCode | number
  /** The {@link HttpHeaders} to include in the response */
  readonly headers: HttpHeaders
  /** The optional body to return */
  body?: ResponseBody
}
