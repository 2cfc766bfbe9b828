/**
 * Cross site request forgery protection using the double submit cookie pattern
 */

import type { Optional } from "@trellis/core/type/utils.js"
import { createHmac, randomBytes, timingSafeEqual } from "crypto"
import { PermissionDeniedException } from "../errors.js"
import {
  CommonHttpHeaders,
  HttpMethod,
  HttpRequestHeaders,
  HttpResponseHeaders,
  type ConnectionHandler,
  type HttpScope,
  type RawHeaders,
  type Receive,
  type Send,
} from "../index.js"
import { readBody } from "../request.js"
import {
  getHeader,
  parseCookies,
  serializeCookie,
  type CookieOptions,
} from "../utils.js"

/**
 * Configuration for {@link csrfMiddleware}
 */
export interface CsrfConfig {
  /** The secret used to sign tokens */
  secret: string
  /** The cookie holding the token (default is csrftoken) */
  cookieName?: string
  /** The header carrying the token on unsafe requests (default is x-csrftoken) */
  headerName?: string
  /** Methods that never require a token (default is GET and HEAD) */
  safeMethods?: HttpMethod[]
  /** Options for the token cookie (default path is "/", same site lax) */
  cookie?: CookieOptions
}

/** Form field checked when the header is missing */
export const CSRF_FORM_FIELD = "_csrf_token"

/** Key of the active token in the scope state */
export const CSRF_STATE_KEY = "csrfToken"

const TOKEN_SECRET_LENGTH = 64

function sign(value: string, secret: string): string {
  return createHmac("sha256", secret).update(value).digest("hex")
}

function safeEqual(left: string, right: string): boolean {
  const a = Buffer.from(left, "utf8")
  const b = Buffer.from(right, "utf8")
  return a.length === b.length && timingSafeEqual(a, b)
}

/**
 * Generate a new signed token
 *
 * @param secret The signing secret
 * @returns A token of 64 random hex characters followed by their signature
 */
export function generateCsrfToken(secret: string): string {
  const value = randomBytes(TOKEN_SECRET_LENGTH / 2).toString("hex")
  return `${value}${sign(value, secret)}`
}

/**
 * Verify the signature of a token
 *
 * @param token The token to decode
 * @param secret The signing secret
 * @returns The random part of the token when the signature is valid
 */
export function decodeCsrfToken(
  token: string,
  secret: string,
): Optional<string> {
  const value = token.slice(0, TOKEN_SECRET_LENGTH)
  const signature = token.slice(TOKEN_SECRET_LENGTH)

  return value.length === TOKEN_SECRET_LENGTH &&
    safeEqual(signature, sign(value, secret))
    ? value
    : undefined
}

/**
 * Check that the submitted token matches the cookie token and both carry a
 * valid signature
 *
 * @param submitted The token from the header or form
 * @param cookie The token from the cookie
 * @param secret The signing secret
 * @returns True if the tokens match
 */
export function csrfTokensMatch(
  submitted: string,
  cookie: string,
  secret: string,
): boolean {
  const left = decodeCsrfToken(submitted, secret)
  const right = decodeCsrfToken(cookie, secret)
  return left !== undefined && right !== undefined && safeEqual(left, right)
}

/**
 * Reject unsafe requests without a token matching the token cookie, and hand
 * out the cookie on safe requests
 *
 * @param app The next {@link ConnectionHandler}
 * @param config The {@link CsrfConfig}
 * @returns A new {@link ConnectionHandler}
 */
export function csrfMiddleware(
  app: ConnectionHandler,
  config: CsrfConfig,
): ConnectionHandler {
  const cookieName = config.cookieName ?? "csrftoken"
  const headerName = (config.headerName ?? "x-csrftoken").toLowerCase()
  const safeMethods = new Set(
    config.safeMethods ?? [HttpMethod.GET, HttpMethod.HEAD],
  )
  const cookieOptions: CookieOptions = {
    path: "/",
    sameSite: "lax",
    ...config.cookie,
  }

  return async (scope, receive, send) => {
    if (scope.type !== "http") {
      return await app(scope, receive, send)
    }

    const cookieToken = parseCookies(
      getHeader(scope.headers, HttpRequestHeaders.Cookie),
    ).get(cookieName)

    if (safeMethods.has(scope.method)) {
      if (
        cookieToken !== undefined &&
        decodeCsrfToken(cookieToken, config.secret) !== undefined
      ) {
        scope.state[CSRF_STATE_KEY] = cookieToken
        return await app(scope, receive, send)
      }

      const token = generateCsrfToken(config.secret)
      scope.state[CSRF_STATE_KEY] = token

      const cookie = serializeCookie(cookieName, token, cookieOptions)
      const withCookie: Send = async (message) => {
        if (message.type === "http.response.start") {
          const headers: RawHeaders = [
            ...message.headers,
            [HttpResponseHeaders.SetCookie, cookie],
          ]
          return await send({ ...message, headers })
        }

        await send(message)
      }

      return await app(scope, receive, withCookie)
    }

    let submitted = getHeader(scope.headers, headerName)
    let downstream = receive

    if (submitted === undefined && isFormRequest(scope)) {
      const body = await readBody(receive)
      submitted =
        new URLSearchParams(body.toString("utf8")).get(CSRF_FORM_FIELD) ??
        undefined
      downstream = replayBody(body, receive)
    }

    if (
      submitted === undefined ||
      cookieToken === undefined ||
      !csrfTokensMatch(submitted, cookieToken, config.secret)
    ) {
      throw new PermissionDeniedException("CSRF token verification failed")
    }

    scope.state[CSRF_STATE_KEY] = cookieToken
    await app(scope, downstream, send)
  }
}

function isFormRequest(scope: HttpScope): boolean {
  return (
    getHeader(scope.headers, CommonHttpHeaders.ContentType)
      ?.toLowerCase()
      .startsWith("application/x-www-form-urlencoded") ?? false
  )
}

/**
 * Hand the already consumed body to the next layer before falling back to the
 * connection
 */
function replayBody(body: Buffer, receive: Receive): Receive {
  let replayed = false
  return () => {
    if (!replayed) {
      replayed = true
      return Promise.resolve({ type: "http.request", body, more: false })
    }

    return receive()
  }
}
