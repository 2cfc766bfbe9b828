import { InMemoryConfigurationManager } from "@trellis/core/configuration.js"
import { Application, type ApplicationConfig } from "./application.js"
import { get } from "./handlers.js"
import {
  APPLICATION_SETTINGS_KEY,
  applySettings,
  isApplicationSettings,
  loadApplicationSettings,
} from "./settings.js"
import { TestClient } from "./testUtils.js"
import { textContents } from "./utils.js"

describe("application settings", () => {
  it("complete settings should be accepted", () => {
    expect(isApplicationSettings({})).toBe(true)
    expect(
      isApplicationSettings({
        debug: true,
        logLevel: "warn",
        allowedHosts: ["*.example.com"],
        compression: { backend: "gzip", minimumSize: 10 },
        csrf: { secret: "test-secret", cookieName: "xsrf" },
      }),
    ).toBe(true)
  })

  it("malformed settings should be rejected", () => {
    expect(isApplicationSettings(null)).toBe(false)
    expect(isApplicationSettings([])).toBe(false)
    expect(isApplicationSettings({ debug: "yes" })).toBe(false)
    expect(isApplicationSettings({ logLevel: "loud" })).toBe(false)
    expect(isApplicationSettings({ logLevel: 15 })).toBe(false)
    expect(isApplicationSettings({ allowedHosts: [1] })).toBe(false)
    expect(isApplicationSettings({ compression: { backend: "zstd" } })).toBe(
      false,
    )
    expect(isApplicationSettings({ csrf: { cookieName: "xsrf" } })).toBe(false)
  })

  it("settings should be read through the configuration manager", () => {
    const manager = new InMemoryConfigurationManager([
      { key: APPLICATION_SETTINGS_KEY, item: { debug: true } },
    ])

    expect(loadApplicationSettings(manager)).toEqual({ debug: true })

    manager.set(APPLICATION_SETTINGS_KEY, { debug: "nope" })
    expect(loadApplicationSettings(manager)).toBeUndefined()

    manager.delete(APPLICATION_SETTINGS_KEY)
    expect(loadApplicationSettings(manager)).toBeUndefined()

    manager.close()
  })

  it("settings should override the declared configuration", () => {
    const config: ApplicationConfig = {
      debug: false,
      allowedHosts: { allowedHosts: ["localhost"], wwwRedirect: false },
      compression: { backend: "gzip", minimumSize: 100 },
    }

    const merged = applySettings(config, {
      allowedHosts: ["example.com"],
      compression: { backend: "brotli" },
      csrf: { secret: "test-secret" },
    })

    expect(merged.debug).toBe(false)
    expect(merged.allowedHosts).toEqual({
      allowedHosts: ["example.com"],
      wwwRedirect: false,
    })
    expect(merged.compression).toEqual({ backend: "brotli", minimumSize: 100 })
    expect(merged.csrf).toEqual({ secret: "test-secret" })

    // The declared configuration is left alone
    expect(config.compression).toEqual({ backend: "gzip", minimumSize: 100 })
  })

  it("applied settings should change the application behavior", async () => {
    // Handlers belong to a single application so each one gets its own
    const build = () =>
      new Application(
        applySettings(
          { routeHandlers: [get("/", () => textContents("home"))] },
          { allowedHosts: ["example.com"] },
        ),
      )

    const rejected = new TestClient(build().handle)
    expect((await rejected.get("/")).status).toBe(400)

    const accepted = new TestClient(build().handle, { host: "example.com" })
    const response = await accepted.get("/")
    expect(response.status).toBe(200)
    expect(response.text()).toBe("home")
  })
})
