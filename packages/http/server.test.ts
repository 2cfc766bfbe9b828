import { Readable } from "stream"
import { HttpMethod, type ReceiveMessage } from "./index.js"
import { buildScope, createReceive } from "./server.js"

describe("node request translation", () => {
  it("requests should become http scopes", () => {
    const scope = buildScope({
      method: "get",
      url: "/a%20b/c?x=1&y=2",
      httpVersion: "1.1",
      rawHeaders: ["Host", "example.com", "X-Test", "1"],
      socket: { remoteAddress: "10.0.0.1", remotePort: 1234 },
    })

    expect(scope).toEqual({
      type: "http",
      method: HttpMethod.GET,
      scheme: "http",
      httpVersion: "1.1",
      path: "/a b/c",
      rootPath: "",
      rawPath: "/a%20b/c",
      queryString: "x=1&y=2",
      headers: [
        ["host", "example.com"],
        ["x-test", "1"],
      ],
      pathParams: {},
      state: {},
      client: { host: "10.0.0.1", port: 1234 },
    })
  })

  it("encrypted sockets should use the https scheme", () => {
    const scope = buildScope({
      method: "POST",
      url: "/",
      httpVersion: "2.0",
      rawHeaders: [],
      socket: { encrypted: true },
    })

    expect(scope?.scheme).toBe("https")
    expect(scope?.client).toBeUndefined()
  })

  it("unknown methods should not produce a scope", () => {
    expect(
      buildScope({
        method: "BREW",
        url: "/",
        httpVersion: "1.1",
        rawHeaders: [],
      }),
    ).toBeUndefined()
    expect(buildScope({ httpVersion: "1.1", rawHeaders: [] })).toBeUndefined()
  })

  it("request bodies should be received chunk by chunk", async () => {
    const receive = createReceive(Readable.from([Buffer.from("ab"), "cd"]))

    const messages: ReceiveMessage[] = []
    for (let n = 0; n < 4; ++n) {
      messages.push(await receive())
    }

    expect(messages).toEqual([
      { type: "http.request", body: Buffer.from("ab"), more: true },
      { type: "http.request", body: Buffer.from("cd"), more: true },
      { type: "http.request", body: Buffer.alloc(0), more: false },
      { type: "http.disconnect" },
    ])
  })

  it("a failed body should look like a disconnect", async () => {
    const body = new Readable({
      read() {
        this.destroy(new Error("connection reset"))
      },
    })

    const receive = createReceive(body)
    expect(await receive()).toEqual({ type: "http.disconnect" })
    expect(await receive()).toEqual({ type: "http.disconnect" })
  })
})
