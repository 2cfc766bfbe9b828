/**
 * Host header allow-listing
 */

import { HttpException } from "../errors.js"
import {
  HttpRequestHeaders,
  HttpResponseHeaders,
  HttpStatusCode,
  type ConnectionHandler,
  type ConnectionScope,
} from "../index.js"
import { IndexedHeaders, getHeader, writeResponse } from "../utils.js"

/**
 * Configuration for {@link allowedHostsMiddleware}
 */
export interface AllowedHostsConfig {
  /** Hosts to accept, `*` accepts everything and `*.example.com` any subdomain */
  allowedHosts: string[]
  /** Redirect `example.com` to `www.example.com` when only the latter is allowed (default is true) */
  wwwRedirect?: boolean
}

/**
 * Check a host (without port) against a pattern
 *
 * @param host The lowercase host
 * @param pattern The allowed host pattern
 * @returns True if the host matches
 */
export function hostMatches(host: string, pattern: string): boolean {
  const normalized = pattern.toLowerCase()
  if (normalized === "*") {
    return true
  }

  return normalized.startsWith("*.")
    ? host.endsWith(normalized.slice(1))
    : host === normalized
}

/**
 * Extract the host name from a host header value
 *
 * @param header The host header value
 * @returns The lowercase host without the port
 */
export function parseHost(header: string): string {
  const value = header.trim().toLowerCase()

  // IPv6 literal
  if (value.startsWith("[")) {
    const end = value.indexOf("]")
    return end > 0 ? value.slice(0, end + 1) : value
  }

  const idx = value.indexOf(":")
  return idx >= 0 ? value.slice(0, idx) : value
}

/**
 * Reject connections whose host header is not on the allow-list
 *
 * @param app The next {@link ConnectionHandler}
 * @param config The {@link AllowedHostsConfig}
 * @returns A new {@link ConnectionHandler}
 */
export function allowedHostsMiddleware(
  app: ConnectionHandler,
  config: AllowedHostsConfig,
): ConnectionHandler {
  const patterns = config.allowedHosts
  const wwwRedirect = config.wwwRedirect ?? true

  if (patterns.includes("*")) {
    return app
  }

  const isAllowed = (host: string): boolean =>
    patterns.some((p) => hostMatches(host, p))

  return async (scope, receive, send) => {
    if (scope.type === "lifespan") {
      return await app(scope, receive, send)
    }

    const header = getHeader(scope.headers, HttpRequestHeaders.Host)
    const host = header === undefined ? "" : parseHost(header)

    if (host.length > 0 && isAllowed(host)) {
      return await app(scope, receive, send)
    }

    if (
      wwwRedirect &&
      scope.type === "http" &&
      host.length > 0 &&
      !host.startsWith("www.") &&
      isAllowed(`www.${host}`)
    ) {
      // keep any port from the original header
      const authority = `www.${(header ?? "").trim().toLowerCase()}`
      await writeResponse(
        {
          status: HttpStatusCode.MOVED_PERMANENTLY,
          headers: new IndexedHeaders([
            [HttpResponseHeaders.Location, redirectTarget(scope, authority)],
          ]),
        },
        send,
      )
      return
    }

    throw new HttpException("invalid host header", {
      statusCode: HttpStatusCode.BAD_REQUEST,
    })
  }
}

function redirectTarget(scope: ConnectionScope, host: string): string {
  const query = scope.queryString.length > 0 ? `?${scope.queryString}` : ""
  return `${scope.scheme}://${host}${scope.rootPath}${scope.path}${query}`
}
