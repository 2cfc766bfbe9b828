import { wrapInExceptionHandler } from "../exceptions.js"
import type { ConnectionHandler } from "../index.js"
import { TestClient } from "../testUtils.js"
import { textContents, writeResponse } from "../utils.js"
import {
  allowedHostsMiddleware,
  hostMatches,
  parseHost,
  type AllowedHostsConfig,
} from "./allowedHosts.js"

const app: ConnectionHandler = async (scope, receive, send) => {
  if (scope.type === "http") {
    await writeResponse(textContents("hello"), send)
  } else if (scope.type === "websocket") {
    await receive()
    await send({ type: "websocket.accept" })
  }
}

function protectedApp(config: AllowedHostsConfig): ConnectionHandler {
  return wrapInExceptionHandler(
    allowedHostsMiddleware(app, config),
    new Map(),
    false,
  )
}

describe("allowed hosts", () => {
  it("hosts should be parsed without ports", () => {
    expect(parseHost("Example.com:8080")).toBe("example.com")
    expect(parseHost(" localhost ")).toBe("localhost")
    expect(parseHost("[::1]:8000")).toBe("[::1]")
  })

  it("patterns should support wildcards", () => {
    expect(hostMatches("example.com", "Example.COM")).toBe(true)
    expect(hostMatches("api.example.com", "*.example.com")).toBe(true)
    expect(hostMatches("example.com", "*.example.com")).toBe(false)
    expect(hostMatches("anything.test", "*")).toBe(true)
  })

  it("a wildcard list should not wrap the handler", () => {
    expect(allowedHostsMiddleware(app, { allowedHosts: ["*"] })).toBe(app)
  })

  it("allowed hosts should reach the handler", async () => {
    const handler = protectedApp({
      allowedHosts: ["www.example.com", "*.internal.test"],
    })

    const direct = await new TestClient(handler, {
      host: "www.example.com",
    }).get("/")
    expect(direct.status).toBe(200)
    expect(direct.text()).toBe("hello")

    const subdomain = await new TestClient(handler, {
      host: "api.internal.test:8443",
    }).get("/")
    expect(subdomain.status).toBe(200)
  })

  it("other hosts should be rejected", async () => {
    const handler = protectedApp({ allowedHosts: ["example.com"] })

    const response = await new TestClient(handler, { host: "evil.test" }).get(
      "/",
    )

    expect(response.status).toBe(400)
    expect(response.json()).toEqual({
      statusCode: 400,
      detail: "invalid host header",
    })
  })

  it("bare hosts should be redirected to the www host", async () => {
    const allowed: AllowedHostsConfig = { allowedHosts: ["www.example.com"] }

    const response = await new TestClient(protectedApp(allowed), {
      host: "example.com",
    }).get("/path?x=1")

    expect(response.status).toBe(301)
    expect(response.headers.get("location")).toBe(
      "http://www.example.com/path?x=1",
    )

    const disabled = await new TestClient(
      protectedApp({ ...allowed, wwwRedirect: false }),
      { host: "example.com" },
    ).get("/path")
    expect(disabled.status).toBe(400)
  })

  it("should keep the port when redirecting to the www host", async () => {
    const response = await new TestClient(
      protectedApp({ allowedHosts: ["www.example.com"] }),
      { host: "example.com:8443" },
    ).get("/a?x=1")

    expect(response.status).toBe(301)
    expect(response.headers.get("location")).toBe(
      "http://www.example.com:8443/a?x=1",
    )
  })

  it("websockets from other hosts should be closed", async () => {
    const client = new TestClient(
      protectedApp({ allowedHosts: ["example.com"] }),
      { host: "evil.test" },
    )

    await expect(client.websocketConnect("/ws")).rejects.toThrow(
      "websocket disconnected with code 4400",
    )
  })
})
