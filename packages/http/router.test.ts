import { RoutingError } from "./errors.js"
import { get, post, raw, websocket } from "./handlers.js"
import { HttpMethod } from "./index.js"
import { Router } from "./router.js"
import { noContents } from "./utils.js"

const ok = () => noContents()

describe("router", () => {
  it("paths should be normalized", () => {
    expect(new Router().path).toBe("/")
    expect(new Router({ path: "api/" }).path).toBe("/api")
    expect(new Router({ path: "//api//v1" }).path).toBe("/api/v1")
  })

  it("nested routers should prefix their handlers", () => {
    const users = get("/users", ok)
    const items = get(["/a", "/b/{id:int}"], ok)

    const router = new Router({
      path: "/api",
      routeHandlers: [
        users,
        new Router({ path: "/v1", routeHandlers: [items] }),
      ],
    })

    expect(router.collect("/")).toEqual([
      ["/api/users", users],
      ["/api/v1/a", items],
      ["/api/v1/b/{id:int}", items],
    ])
    expect(router.collect("/root")[0]).toEqual(["/root/api/users", users])
  })

  it("http handlers sharing a path should form one route", () => {
    const router = new Router({
      routeHandlers: [
        get("/items", ok),
        websocket("/items", async () => {}),
        post("/items", ok),
        raw("/raw", async () => {}),
      ],
    })

    const routes = router.routes
    expect(routes.map((r) => `${r.kind} ${r.path}`)).toEqual([
      "websocket /items",
      "raw /raw",
      "http /items",
    ])

    const http = routes[2]
    expect(http.kind === "http" && [...http.handlerMap.keys()]).toEqual([
      HttpMethod.GET,
      HttpMethod.POST,
    ])
  })

  it("two handlers for the same method should conflict", () => {
    const router = new Router({
      routeHandlers: [get("/items", ok), get("/items", ok)],
    })

    expect(() => router.routes).toThrow("Multiple handlers for GET /items")
  })

  it("handlers should only belong to one router", () => {
    const handler = get("/items", ok)
    const first = new Router({ routeHandlers: [handler] })

    expect(first.register(handler)).toBe(false)
    expect(() => new Router({ routeHandlers: [handler] })).toThrow(
      RoutingError,
    )

    const nested = new Router({ path: "/nested" })
    first.register(nested)
    expect(() => new Router().register(nested)).toThrow(
      "Router /nested is already registered on another layer",
    )
    expect(() => nested.register(nested)).toThrow(
      "Router /nested cannot register itself",
    )
  })

  it("removed handlers should leave the routes", () => {
    const handler = get("/items", ok)
    const router = new Router({ routeHandlers: [handler] })

    expect(router.remove(handler)).toBe(true)
    expect(router.remove(handler)).toBe(false)
    expect(router.routes).toHaveLength(0)

    // Still owned, so it can come back
    expect(router.register(handler)).toBe(true)
    expect(router.routes).toHaveLength(1)
  })
})
