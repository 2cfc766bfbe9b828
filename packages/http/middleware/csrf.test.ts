import { wrapInExceptionHandler } from "../exceptions.js"
import type { ConnectionHandler } from "../index.js"
import { HttpRequest } from "../request.js"
import { TestClient } from "../testUtils.js"
import { textContents, writeResponse } from "../utils.js"
import {
  CSRF_FORM_FIELD,
  CSRF_STATE_KEY,
  csrfMiddleware,
  csrfTokensMatch,
  decodeCsrfToken,
  generateCsrfToken,
  type CsrfConfig,
} from "./csrf.js"

const SECRET = "test-secret"

/**
 * Answers with the active token and the request body
 */
const echo: ConnectionHandler = async (scope, receive, send) => {
  if (scope.type !== "http") {
    return
  }

  const request = new HttpRequest(scope, receive)
  const body = await request.text()
  await writeResponse(
    textContents(`${String(request.state[CSRF_STATE_KEY])}|${body}`),
    send,
  )
}

function protectedClient(config?: Omit<CsrfConfig, "secret">): TestClient {
  return new TestClient(
    wrapInExceptionHandler(
      csrfMiddleware(echo, { secret: SECRET, ...config }),
      new Map(),
      false,
    ),
  )
}

describe("csrf tokens", () => {
  it("tokens should carry a verifiable signature", () => {
    const token = generateCsrfToken(SECRET)

    expect(token).toMatch(/^[0-9a-f]{128}$/)
    expect(decodeCsrfToken(token, SECRET)).toBe(token.slice(0, 64))
    expect(decodeCsrfToken(token, "other-secret")).toBeUndefined()
    const tampered = `${token.slice(0, 127)}${token.endsWith("0") ? "1" : "0"}`
    expect(decodeCsrfToken(tampered, SECRET)).toBeUndefined()
    expect(decodeCsrfToken("short", SECRET)).toBeUndefined()
  })

  it("only identical valid tokens should match", () => {
    const token = generateCsrfToken(SECRET)
    const other = generateCsrfToken(SECRET)

    expect(csrfTokensMatch(token, token, SECRET)).toBe(true)
    expect(csrfTokensMatch(token, other, SECRET)).toBe(false)
    expect(csrfTokensMatch(token, token, "other-secret")).toBe(false)
  })
})

describe("csrf middleware", () => {
  it("safe requests should receive a token cookie", async () => {
    const client = protectedClient({
      cookieName: "xsrf",
      cookie: { secure: true, httpOnly: true },
    })

    const response = await client.get("/")
    const [token] = response.text().split("|")

    expect(response.status).toBe(200)
    expect(response.headers.getAll("set-cookie")).toEqual([
      `xsrf=${token}; Path=/; Secure; HttpOnly; SameSite=Lax`,
    ])
    expect(client.cookies.get("xsrf")).toBe(token)
  })

  it("a valid cookie should be reused", async () => {
    const client = protectedClient()
    const token = generateCsrfToken(SECRET)
    client.cookies.set("csrftoken", token)

    const response = await client.get("/")

    expect(response.text()).toBe(`${token}|`)
    expect(response.headers.has("set-cookie")).toBe(false)
  })

  it("a forged cookie should be replaced", async () => {
    const client = protectedClient()
    const forged = generateCsrfToken("not-the-secret")
    client.cookies.set("csrftoken", forged)

    const response = await client.get("/")

    expect(response.headers.getAll("set-cookie")).toHaveLength(1)
    expect(client.cookies.get("csrftoken")).not.toBe(forged)
  })

  it("unsafe requests should require the header token", async () => {
    const client = protectedClient()
    const token = generateCsrfToken(SECRET)
    client.cookies.set("csrftoken", token)

    const missing = await client.post("/", { body: "payload" })
    expect(missing.status).toBe(403)

    const mismatched = await client.post("/", {
      body: "payload",
      headers: { "x-csrftoken": generateCsrfToken(SECRET) },
    })
    expect(mismatched.status).toBe(403)

    const accepted = await client.post("/", {
      body: "payload",
      headers: { "x-csrftoken": token },
    })
    expect(accepted.status).toBe(200)
    expect(accepted.text()).toBe(`${token}|payload`)
  })

  it("a missing cookie should reject unsafe requests", async () => {
    const response = await protectedClient().delete("/", {
      headers: { "x-csrftoken": generateCsrfToken(SECRET) },
    })

    expect(response.status).toBe(403)
    expect(response.json()).toEqual({
      statusCode: 403,
      detail: "CSRF token verification failed",
    })
  })

  it("form posts should be checked and replayed", async () => {
    const client = protectedClient()
    const token = generateCsrfToken(SECRET)
    client.cookies.set("csrftoken", token)

    const body = `${CSRF_FORM_FIELD}=${token}&name=widget`
    const response = await client.post("/", {
      body,
      headers: { "content-type": "application/x-www-form-urlencoded" },
    })

    expect(response.status).toBe(200)
    expect(response.text()).toBe(`${token}|${body}`)
  })

  it("the header name and safe methods should be configurable", async () => {
    const client = protectedClient({ headerName: "X-XSRF-Token" })
    const token = generateCsrfToken(SECRET)
    client.cookies.set("csrftoken", token)

    const accepted = await client.put("/", {
      headers: { "x-xsrf-token": token },
    })
    expect(accepted.status).toBe(200)

    const strict = await protectedClient({ safeMethods: [] }).get("/")
    expect(strict.status).toBe(403)
  })
})
