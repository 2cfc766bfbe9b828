import fs, {
  mkdirSync,
  mkdtempSync,
  rmSync,
  statSync,
  writeFileSync,
} from "fs"
import { tmpdir } from "os"
import { join } from "path"
import { Application } from "./application.js"
import { wrapInExceptionHandler } from "./exceptions.js"
import {
  HttpMethod,
  type ConnectionHandler,
  type SendMessage,
} from "./index.js"
import { createStaticFilesHandler, fileToMediaType } from "./staticFiles.js"
import { TestClient } from "./testUtils.js"

describe("static files", () => {
  let base: string
  let publicDir: string
  let extraDir: string

  beforeAll(() => {
    base = mkdtempSync(join(tmpdir(), "static-files-"))
    publicDir = join(base, "public")
    extraDir = join(base, "extra")

    mkdirSync(join(publicDir, "css"), { recursive: true })
    mkdirSync(extraDir)

    writeFileSync(join(publicDir, "index.html"), "<h1>home</h1>")
    writeFileSync(join(publicDir, "404.html"), "<h1>lost</h1>")
    writeFileSync(join(publicDir, "css", "site.css"), "body { margin: 0; }")
    writeFileSync(join(extraDir, "notes.txt"), "from the second directory")
    writeFileSync(join(base, "secret.txt"), "keep out")
  })

  afterAll(() => {
    rmSync(base, { recursive: true, force: true })
  })

  function serve(htmlMode = false): ConnectionHandler {
    const handler = createStaticFilesHandler({
      path: "/static",
      directories: [publicDir, extraDir],
      htmlMode,
    })

    return wrapInExceptionHandler(handler.fn, new Map(), false)
  }

  it("media types should follow the extension", () => {
    expect(fileToMediaType("a/b/site.CSS")).toBe("text/css; charset=utf-8")
    expect(fileToMediaType("data.json")).toBe("application/json")
    expect(fileToMediaType("archive.unknown")).toBe("application/octet-stream")
    expect(fileToMediaType("README")).toBe("application/octet-stream")
  })

  it("missing directories should be rejected", () => {
    const missing = join(base, "missing")
    expect(() =>
      createStaticFilesHandler({ path: "/static", directories: [missing] }),
    ).toThrow(`${missing} does not exist`)
  })

  it("the handler should be a static mount", () => {
    const handler = createStaticFilesHandler({
      path: "/static",
      directories: [publicDir],
    })

    expect(handler.kind).toBe("raw")
    expect(handler.isStatic).toBe(true)
    expect(handler.isMount).toBe(true)
    expect(handler.paths).toEqual(["/static"])
  })

  it("files should be served with their metadata", async () => {
    const response = await new TestClient(serve()).get("/css/site.css")
    const stats = statSync(join(publicDir, "css", "site.css"))

    expect(response.status).toBe(200)
    expect(response.text()).toBe("body { margin: 0; }")
    expect(response.headers.get("content-type")).toBe(
      "text/css; charset=utf-8",
    )
    expect(response.headers.get("content-length")).toBe("19")
    expect(response.headers.get("last-modified")).toBe(
      stats.mtime.toUTCString(),
    )
    expect(response.headers.get("etag")).toBe(
      `"${Math.floor(stats.mtimeMs).toString(16)}-13"`,
    )
  })

  it("file streams should be closed when the client goes away", async () => {
    const streams = jest.spyOn(fs, "createReadStream")
    const handler = createStaticFilesHandler({
      path: "/static",
      directories: [publicDir],
    })
    const send = jest.fn((message: SendMessage) =>
      message.type === "http.response.start"
        ? Promise.reject(new Error("client gone"))
        : Promise.resolve(),
    )

    try {
      await expect(
        handler.fn(
          {
            type: "http",
            method: HttpMethod.GET,
            scheme: "http",
            httpVersion: "1.1",
            path: "/css/site.css",
            rootPath: "/static",
            rawPath: "/static/css/site.css",
            queryString: "",
            headers: [],
            pathParams: {},
            state: {},
          },
          () => Promise.resolve({ type: "http.disconnect" }),
          send,
        ),
      ).rejects.toThrow("client gone")

      expect(streams).toHaveBeenCalledTimes(1)
      expect(streams.mock.results[0].value.destroyed).toBe(true)
    } finally {
      streams.mockRestore()
    }
  })

  it("directories should be searched in order", async () => {
    const response = await new TestClient(serve()).get("/notes.txt")

    expect(response.status).toBe(200)
    expect(response.text()).toBe("from the second directory")
  })

  it("head requests should omit the body", async () => {
    const response = await new TestClient(serve()).head("/css/site.css")

    expect(response.status).toBe(200)
    expect(response.headers.get("content-length")).toBe("19")
    expect(response.body.length).toBe(0)
  })

  it("unsupported methods should be refused", async () => {
    const response = await new TestClient(serve()).post("/css/site.css")

    expect(response.status).toBe(405)
    expect(response.headers.get("allow")).toBe("GET, HEAD")
  })

  it("missing files should not be found", async () => {
    const client = new TestClient(serve())

    expect((await client.get("/nope.css")).status).toBe(404)
    // Directories are only served in html mode
    expect((await client.get("/")).status).toBe(404)
  })

  it("html mode should serve index and not found pages", async () => {
    const client = new TestClient(serve(true))

    const index = await client.get("/")
    expect(index.status).toBe(200)
    expect(index.text()).toBe("<h1>home</h1>")
    expect(index.headers.get("content-type")).toBe("text/html; charset=utf-8")

    const missing = await client.get("/nowhere")
    expect(missing.status).toBe(404)
    expect(missing.text()).toBe("<h1>lost</h1>")
  })

  it("paths escaping the directories should be denied", async () => {
    const response = await new TestClient(serve()).get("/..%2fsecret.txt")

    expect(response.status).toBe(403)
  })

  it("applications should serve the tree below the mount path", async () => {
    const app = new Application({
      staticFiles: [{ path: "/static", directories: [publicDir] }],
    })
    const client = new TestClient(app.handle)

    const response = await client.get("/static/css/site.css")
    expect(response.status).toBe(200)
    expect(response.text()).toBe("body { margin: 0; }")

    expect((await client.get("/static/missing.css")).status).toBe(404)
    expect((await client.get("/elsewhere")).status).toBe(404)
  })
})
