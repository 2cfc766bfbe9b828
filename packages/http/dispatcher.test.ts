import { RouteDispatcher } from "./dispatcher.js"
import type { ExceptionHandler, ExceptionHandlerKey } from "./exceptions.js"
import { get, mount, post, raw, websocket } from "./handlers.js"
import { HttpMethod, type ConnectionHandler } from "./index.js"
import { Router } from "./router.js"
import { TestClient } from "./testUtils.js"
import { jsonContents, textContents, writeResponse } from "./utils.js"

/**
 * Answers with the routing information the connection arrived with
 */
const echo: ConnectionHandler = async (scope, _receive, send) => {
  if (scope.type === "lifespan") {
    return
  }

  await writeResponse(
    jsonContents({
      rootPath: scope.rootPath,
      path: scope.path,
      pathParams: scope.pathParams,
    }),
    send,
  )
}

function createDispatcher(
  exceptionHandlers?: ReadonlyMap<ExceptionHandlerKey, ExceptionHandler>,
): RouteDispatcher {
  const router = new Router({
    routeHandlers: [
      get("/users/{id:int}", (request) =>
        jsonContents({ id: request.pathParams.id, path: request.path }),
      ),
      post("/users", () => textContents("created", 201)),
      websocket("/rooms/{room:str}", async (socket) => {
        await socket.accept()
        await socket.sendText(String(socket.pathParams.room))
        await socket.close()
      }),
      get("/rooms/{room:str}", () => textContents("room")),
      raw("/raw/{name:str}", echo),
      mount("/sub", echo),
    ],
  })

  return new RouteDispatcher(router.routes, {
    debug: false,
    exceptionHandlers,
  })
}

describe("route dispatcher", () => {
  it("matched routes should receive typed parameters", async () => {
    const client = new TestClient(createDispatcher().handle)

    const response = await client.get("/users/42")
    expect(response.status).toBe(200)
    expect(response.json()).toEqual({ id: 42, path: "/users/42" })

    const created = await client.post("/users")
    expect(created.status).toBe(201)
    expect(created.text()).toBe("created")
  })

  it("unmatched paths should not be found", async () => {
    const client = new TestClient(createDispatcher().handle)

    const missing = await client.get("/missing")
    expect(missing.status).toBe(404)
    expect(missing.json()).toEqual({ statusCode: 404, detail: "Not Found" })

    expect((await client.get("/users/abc")).status).toBe(404)
    expect((await client.get("/%zz")).status).toBe(404)
  })

  it("unsupported methods should list the allowed ones", async () => {
    const client = new TestClient(createDispatcher().handle)

    const users = await client.delete("/users/42")
    expect(users.status).toBe(405)
    expect(users.headers.get("allow")).toBe("GET")

    // The websocket handler is not an http method
    const rooms = await client.put("/rooms/lobby")
    expect(rooms.status).toBe(405)
    expect(rooms.headers.get("allow")).toBe("GET")
  })

  it("should not send an empty allow header for websocket only paths", async () => {
    const router = new Router({
      routeHandlers: [
        websocket("/chat", async (socket) => {
          await socket.accept()
          await socket.close()
        }),
      ],
    })
    const client = new TestClient(
      new RouteDispatcher(router.routes, { debug: false }).handle,
    )

    const response = await client.get("/chat")
    expect(response.status).toBe(405)
    expect(response.headers.get("allow")).toBeUndefined()
  })

  it("dispatcher exception handlers should answer lookup failures", async () => {
    const client = new TestClient(
      createDispatcher(
        new Map<ExceptionHandlerKey, ExceptionHandler>([
          [404, (request) => textContents(`nothing at ${request.path}`, 404)],
        ]),
      ).handle,
    )

    const response = await client.get("/missing")
    expect(response.status).toBe(404)
    expect(response.text()).toBe("nothing at /missing")
  })

  it("raw routes should answer every method", async () => {
    const client = new TestClient(createDispatcher().handle)

    for (const method of [HttpMethod.GET, HttpMethod.PATCH]) {
      const response = await client.request(method, "/raw/thing")
      expect(response.json()).toEqual({
        rootPath: "",
        path: "/raw/thing",
        pathParams: { name: "thing" },
      })
    }
  })

  it("mounts should see the path below the mount", async () => {
    const client = new TestClient(createDispatcher().handle)

    expect((await client.get("/sub/a/b?c=d")).json()).toEqual({
      rootPath: "/sub",
      path: "/a/b",
      pathParams: {},
    })
    expect((await client.get("/sub")).json()).toEqual({
      rootPath: "/sub",
      path: "/",
      pathParams: {},
    })
  })

  it("nested mounts should accumulate the root path", async () => {
    const inner = new RouteDispatcher(
      new Router({ routeHandlers: [mount("/inner", echo)] }).routes,
      { debug: false },
    )
    const outer = new RouteDispatcher(
      new Router({
        routeHandlers: [mount("/outer", inner.handle), mount("/", echo)],
      }).routes,
      { debug: false },
    )
    const client = new TestClient(outer.handle)

    expect((await client.get("/outer/inner/x")).json()).toEqual({
      rootPath: "/outer/inner",
      path: "/x",
      pathParams: {},
    })
    expect((await client.get("/anything/else")).json()).toEqual({
      rootPath: "",
      path: "/anything/else",
      pathParams: {},
    })
  })

  it("websocket routes should be dispatched by kind", async () => {
    const client = new TestClient(createDispatcher().handle)

    const session = await client.websocketConnect("/rooms/lobby")
    expect(await session.receiveText()).toBe("lobby")
    await expect(session.receiveText()).rejects.toThrow(
      "websocket disconnected with code 1000",
    )
    await session.finished()

    await expect(client.websocketConnect("/nowhere")).rejects.toThrow(
      "websocket disconnected with code 4404",
    )
  })

  it("lookups should report the outcome", () => {
    const dispatcher = createDispatcher()

    expect(dispatcher.resolve("/users/7", HttpMethod.GET)).toMatchObject({
      matched: true,
      pathParams: { id: 7 },
    })
    expect(dispatcher.resolve("/users", HttpMethod.GET)).toEqual({
      matched: false,
      reason: "methodNotAllowed",
      allowed: [HttpMethod.POST],
    })
    expect(dispatcher.routes).toHaveLength(6)
    expect(dispatcher.routeMap.mountPaths).toEqual(["/sub"])
  })

  it("lifespan scopes should be ignored", async () => {
    const dispatcher = createDispatcher()
    const send = jest.fn()

    await dispatcher.handle(
      { type: "lifespan", state: {} },
      () => Promise.resolve({ type: "lifespan.startup" }),
      send,
    )

    expect(send).not.toHaveBeenCalled()
  })
})
