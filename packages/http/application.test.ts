import { Application } from "./application.js"
import { HttpException, RoutingError } from "./errors.js"
import { get, websocket } from "./handlers.js"
import { LifespanError } from "./lifespan.js"
import { Router } from "./router.js"
import { TestClient, createRecordingMiddleware } from "./testUtils.js"
import { textContents } from "./utils.js"

describe("application lifespan", () => {
  it("startup and shutdown hooks should run in order", async () => {
    const calls: string[] = []
    const app = new Application({
      onStartup: [
        (a) => {
          calls.push("first")
          a.state.ready = true
        },
        async () => {
          calls.push("second")
        },
      ],
      onShutdown: [() => void calls.push("stop")],
    })

    const events: string[] = []
    app.on("started", () => events.push("started"))
    app.on("stopping", () => events.push("stopping"))
    app.on("finished", () => events.push("finished"))

    const client = new TestClient(app.handle)
    await client.startup()

    expect(calls).toEqual(["first", "second"])
    expect(app.state.ready).toBe(true)

    await client.shutdown()

    expect(calls).toEqual(["first", "second", "stop"])
    expect(events).toEqual(["started", "stopping", "finished"])
  })

  it("a failing startup hook should be reported", async () => {
    const app = new Application({
      onStartup: [
        () => {
          throw new Error("db down")
        },
      ],
    })

    const errors: unknown[] = []
    app.on("error", (err) => errors.push(err))

    const client = new TestClient(app.handle)
    await expect(client.startup()).rejects.toThrow(LifespanError)
    expect(errors).toHaveLength(1)

    await client.shutdown()
  })

  it("every shutdown hook should run when one fails", async () => {
    const calls: string[] = []
    const app = new Application({
      onShutdown: [
        () => {
          throw new Error("first failed")
        },
        () => void calls.push("second"),
      ],
    })

    const client = new TestClient(app.handle)
    await client.startup()

    await expect(client.shutdown()).rejects.toThrow("first failed")
    expect(calls).toEqual(["second"])
  })
})

describe("application routing", () => {
  it("registering handlers should rebuild the routes", async () => {
    const app = new Application()
    const changed = jest.fn()
    app.on("routesChanged", changed)

    const client = new TestClient(app.handle)
    expect((await client.get("/late")).status).toBe(404)

    app.register(get("/late", () => textContents("late")))

    expect(changed).toHaveBeenCalledTimes(1)
    expect(app.routes.map((r) => r.path)).toEqual(["/late"])

    const response = await client.get("/late")
    expect(response.status).toBe(200)
    expect(response.text()).toBe("late")
  })

  it("a conflicting registration should keep the previous routes", () => {
    const app = new Application({
      routeHandlers: [get("/items", () => textContents("items"))],
    })
    const changed = jest.fn()
    app.on("routesChanged", changed)

    expect(() =>
      app.register(get("/items", () => textContents("again"))),
    ).toThrow(RoutingError)
    expect(changed).not.toHaveBeenCalled()

    app.register(get("/other", () => textContents("other")))
    expect(app.routes.map((r) => r.path)).toEqual(["/items", "/other"])
  })

  it("middleware should run from the application inwards", async () => {
    const events: string[] = []
    const router = new Router({
      path: "/api",
      middleware: [createRecordingMiddleware("router", events)],
      routeHandlers: [
        get(
          "/ping",
          () => {
            events.push("handler")
            return textContents("pong")
          },
          { middleware: [createRecordingMiddleware("handler", events)] },
        ),
      ],
    })

    const app = new Application({
      middleware: [createRecordingMiddleware("app", events)],
      routeHandlers: [router],
    })

    const response = await new TestClient(app.handle).get("/api/ping")
    expect(response.status).toBe(200)
    expect(events).toEqual([
      "app:in",
      "router:in",
      "handler:in",
      "handler",
      "handler:out",
      "router:out",
      "app:out",
    ])
  })

  it("debug mode should render the error message", async () => {
    const failing = () => {
      throw new Error("kaboom")
    }

    const quiet = new TestClient(
      new Application({ routeHandlers: [get("/fail", failing)] }).handle,
    )
    expect((await quiet.get("/fail")).json()).toEqual({
      statusCode: 500,
      detail: "Internal Server Error",
    })

    const verbose = new TestClient(
      new Application({ debug: true, routeHandlers: [get("/fail", failing)] })
        .handle,
    )
    const response = await verbose.get("/fail")
    expect(response.status).toBe(500)
    expect(response.json()).toMatchObject({ statusCode: 500, detail: "kaboom" })
  })

  it("application exception handlers should apply to every route", async () => {
    const app = new Application({
      exceptionHandlers: [
        [
          HttpException,
          (_request, error) => textContents(`handled ${error.message}`, 409),
        ],
      ],
      routeHandlers: [
        get("/conflict", () => {
          throw new HttpException("taken", { statusCode: 409 })
        }),
      ],
    })

    const response = await new TestClient(app.handle).get("/conflict")
    expect(response.status).toBe(409)
    expect(response.text()).toBe("handled taken")
  })

  it("websocket sessions should run through the application", async () => {
    const app = new Application({
      routeHandlers: [
        websocket("/echo", async (socket) => {
          await socket.accept()
          for (;;) {
            const text = await socket.receiveText()
            await socket.sendText(text.toUpperCase())
          }
        }),
      ],
    })

    const session = await new TestClient(app.handle).websocketConnect("/echo")
    session.sendText("hi")
    expect(await session.receiveText()).toBe("HI")

    await session.close()
  })

  it("websocket handlers should see state set by middleware", async () => {
    const app = new Application({
      middleware: [
        (next) => async (scope, receive, send) => {
          if (scope.type !== "lifespan") {
            scope.state.user = "alice"
          }
          await next(scope, receive, send)
        },
      ],
      routeHandlers: [
        websocket("/whoami", async (socket) => {
          await socket.accept()
          await socket.sendText(String(socket.state.user))
          await socket.sendText(socket.connectionState)
          await socket.receiveText()
        }),
      ],
    })

    const session = await new TestClient(app.handle).websocketConnect("/whoami")
    expect(await session.receiveText()).toBe("alice")
    expect(await session.receiveText()).toBe("connected")

    await session.close()
  })
})
