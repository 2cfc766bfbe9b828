/**
 * Utilities for HTTP operations
 */

import type { Optional } from "@trellis/core/type/utils.js"
import { Readable } from "stream"
import {
  CommonHttpHeaders,
  HttpResponseHeaders,
  HttpStatusCode,
  type HttpHeaders,
  type HttpResponse,
  type RawHeaders,
  type ResponseBody,
  type Send,
} from "./index.js"

/**
 * {@link HttpHeaders} backed by the ordered {@link RawHeaders} pairs so they
 * can be handed to the connection without copying
 */
export class IndexedHeaders implements HttpHeaders {
  private readonly _headers: RawHeaders

  constructor(headers?: RawHeaders | Record<string, string>) {
    this._headers = Array.isArray(headers)
      ? headers
      : Object.entries(headers ?? {}).map(([k, v]) => [k.toLowerCase(), v])
  }

  get(name: string): Optional<string> {
    const values = this.getAll(name)
    return values.length > 0 ? values.join(",") : undefined
  }

  getAll(name: string): string[] {
    const key = name.toLowerCase()
    return this._headers.filter((h) => h[0] === key).map((h) => h[1])
  }

  has(name: string): boolean {
    const key = name.toLowerCase()
    return this._headers.some((h) => h[0] === key)
  }

  set(name: string, value: string): void {
    this.delete(name)
    this.append(name, value)
  }

  append(name: string, value: string): void {
    this._headers.push([name.toLowerCase(), value])
  }

  delete(name: string): void {
    const key = name.toLowerCase()
    for (let n = this._headers.length - 1; n >= 0; --n) {
      if (this._headers[n][0] === key) {
        this._headers.splice(n, 1)
      }
    }
  }

  get raw(): RawHeaders {
    return this._headers
  }
}

/**
 * Create an empty set of {@link HttpHeaders}
 *
 * @returns An empty set of {@link HttpHeaders}
 */
export function emptyHeaders(): HttpHeaders {
  return new IndexedHeaders([])
}

/**
 * Creates a new no content {@link HttpResponse}
 *
 * @returns A new {@link HttpResponse}
 */
export function noContents(): HttpResponse {
  return {
    status: HttpStatusCode.NO_CONTENT,
    headers: emptyHeaders(),
  }
}

/**
 * Create a redirect {@link HttpResponse}
 *
 * @param location The target location
 * @param code The redirect status (default is 302)
 * @returns A new {@link HttpResponse}
 */
export function redirect(
  location: string,
  code: HttpStatusCode = HttpStatusCode.FOUND,
): HttpResponse {
  return {
    status: code,
    headers: new IndexedHeaders([[HttpResponseHeaders.Location, location]]),
  }
}

/**
 * Create a JSON formatted {@link HttpResponse}
 *
 * @param body The body to return as JSON
 * @param code The {@link HttpStatusCode} for the response (default is OK)
 * @returns A {@link HttpResponse} with the body in JSON format
 */
export function jsonContents(
  body: unknown,
  code: HttpStatusCode | number = HttpStatusCode.OK,
): HttpResponse {
  return bufferedContents(
    Buffer.from(JSON.stringify(body), "utf8"),
    "application/json",
    code,
  )
}

/**
 * Create a text/plain formatted {@link HttpResponse}
 *
 * @param body The body to return as text/plain
 * @param code The {@link HttpStatusCode} for the response (default is OK)
 * @returns A {@link HttpResponse} with the body in text/plain format
 */
export function textContents(
  body: string,
  code: HttpStatusCode | number = HttpStatusCode.OK,
): HttpResponse {
  return bufferedContents(
    Buffer.from(body, "utf8"),
    "text/plain; charset=utf-8",
    code,
  )
}

/**
 * Create a text/html formatted {@link HttpResponse}
 *
 * @param body The html document
 * @param code The {@link HttpStatusCode} for the response (default is OK)
 * @returns A {@link HttpResponse} with the body in text/html format
 */
export function htmlContents(
  body: string,
  code: HttpStatusCode | number = HttpStatusCode.OK,
): HttpResponse {
  return bufferedContents(
    Buffer.from(body, "utf8"),
    "text/html; charset=utf-8",
    code,
  )
}

/**
 * Create a streamed {@link HttpResponse}
 *
 * @param body The chunks to stream
 * @param contentType The media type of the body
 * @param code The {@link HttpStatusCode} for the response (default is OK)
 * @returns A {@link HttpResponse} that streams the body
 */
export function streamContents(
  body: AsyncIterable<Buffer>,
  contentType: string,
  code: HttpStatusCode | number = HttpStatusCode.OK,
): HttpResponse {
  return {
    status: code,
    headers: new IndexedHeaders([[CommonHttpHeaders.ContentType, contentType]]),
    body,
  }
}

function bufferedContents(
  body: Buffer,
  contentType: string,
  code: HttpStatusCode | number,
): HttpResponse {
  return {
    status: code,
    headers: new IndexedHeaders([
      [CommonHttpHeaders.ContentType, contentType],
      [CommonHttpHeaders.ContentLength, String(body.length)],
    ]),
    body,
  }
}

/**
 * Options for {@link writeResponse}
 */
export interface WriteResponseOptions {
  /** Send the headers only (HEAD requests) */
  omitBody?: boolean
}

/**
 * Write the {@link HttpResponse} through the connection, a streamed body is
 * released if sending fails
 *
 * @param response The {@link HttpResponse} to write
 * @param send The {@link Send} for the connection
 * @param options The {@link WriteResponseOptions}
 */
export async function writeResponse(
  response: HttpResponse,
  send: Send,
  options?: WriteResponseOptions,
): Promise<void> {
  const body = response.body

  try {
    await send({
      type: "http.response.start",
      status: response.status,
      headers: response.headers.raw,
    })

    if (body === undefined || options?.omitBody) {
      await send({ type: "http.response.body", body: EMPTY_BODY, more: false })
    } else if (Buffer.isBuffer(body)) {
      await send({ type: "http.response.body", body, more: false })
    } else {
      for await (const chunk of body) {
        await send({ type: "http.response.body", body: chunk, more: true })
      }
      await send({ type: "http.response.body", body: EMPTY_BODY, more: false })
    }
  } finally {
    releaseBody(body)
  }
}

/** Shared empty buffer for terminal body messages */
export const EMPTY_BODY: Buffer = Buffer.alloc(0)

/**
 * Release any resources held by a streamed body
 *
 * @param body The {@link ResponseBody} to release
 */
export function releaseBody(body: Optional<ResponseBody>): void {
  if (body instanceof Readable && !body.destroyed) {
    body.destroy()
  }
}

/**
 * Find the first header value in the raw pairs
 *
 * @param headers The {@link RawHeaders} to search
 * @param name The lowercase header name
 * @returns The value if present
 */
export function getHeader(headers: RawHeaders, name: string): Optional<string> {
  return headers.find((h) => h[0] === name)?.[1]
}

/**
 * Parse a cookie header into its values, the first occurrence of a name wins
 *
 * @param header The cookie header value
 * @returns A map of cookie names to values
 */
export function parseCookies(header: Optional<string>): Map<string, string> {
  const cookies = new Map<string, string>()

  for (const part of (header ?? "").split(";")) {
    const idx = part.indexOf("=")
    if (idx > 0) {
      const name = part.slice(0, idx).trim()
      if (name && !cookies.has(name)) {
        cookies.set(name, safeDecode(part.slice(idx + 1).trim()))
      }
    }
  }

  return cookies
}

/**
 * Options for {@link serializeCookie}
 */
export interface CookieOptions {
  path?: string
  domain?: string
  maxAge?: number
  secure?: boolean
  httpOnly?: boolean
  sameSite?: "lax" | "strict" | "none"
}

/**
 * Serialize a cookie for a set-cookie header
 *
 * @param name The cookie name
 * @param value The cookie value
 * @param options The {@link CookieOptions}
 * @returns The header value
 */
export function serializeCookie(
  name: string,
  value: string,
  options?: CookieOptions,
): string {
  const parts = [`${name}=${encodeURIComponent(value)}`]

  if (options?.path) parts.push(`Path=${options.path}`)
  if (options?.domain) parts.push(`Domain=${options.domain}`)
  if (options?.maxAge !== undefined) parts.push(`Max-Age=${options.maxAge}`)
  if (options?.secure) parts.push("Secure")
  if (options?.httpOnly) parts.push("HttpOnly")
  if (options?.sameSite) {
    parts.push(
      `SameSite=${options.sameSite[0].toUpperCase()}${options.sameSite.slice(1)}`,
    )
  }

  return parts.join("; ")
}

/**
 * Decode a URI component, leaving invalid sequences untouched
 *
 * @param value The value to decode
 * @returns The decoded value
 */
export function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}
