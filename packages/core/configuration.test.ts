import { mkdtempSync, rmSync, writeFileSync } from "fs"
import { tmpdir } from "os"
import { join } from "path"
import {
  FileSystemConfigurationManager,
  InMemoryConfigurationManager,
  isConfigurationItem,
  type ConfigurationItem,
} from "./configuration.js"
import { DeferredPromise } from "./index.js"

interface TestItem {
  name: string
  createdAt: number
}

function isTestItem(value: unknown): value is TestItem {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    typeof value.name === "string" &&
    "createdAt" in value &&
    typeof value.createdAt === "number"
  )
}

describe("in memory configuration", () => {
  it("should return values that pass the guard", () => {
    const manager = new InMemoryConfigurationManager([
      { key: "foo", item: { name: "fooObj", createdAt: 1 } },
      { key: "bar", item: { name: 7 } },
    ])

    expect(manager.getConfiguration("foo", isTestItem)).toEqual({
      name: "fooObj",
      createdAt: 1,
    })
    expect(manager.getConfiguration("bar", isTestItem)).toBeUndefined()
    expect(Array.from(manager.getKeys())).toEqual(["foo", "bar"])
  })

  it("should fall back to the default value", () => {
    const manager = new InMemoryConfigurationManager()
    const fallback: TestItem = { name: "default", createdAt: 0 }

    expect(manager.getConfiguration("missing", isTestItem, fallback)).toBe(
      fallback,
    )
  })

  it("should fire added, changed and removed events", () => {
    const manager = new InMemoryConfigurationManager()
    const events: string[] = []

    manager.on("added", (key) => events.push(`added:${key}`))
    manager.on("changed", (key) => events.push(`changed:${key}`))
    manager.on("removed", (key) => events.push(`removed:${key}`))

    manager.set("foo", 1)
    manager.set("foo", 2)
    expect(manager.delete("foo")).toBe(true)
    expect(manager.delete("foo")).toBe(false)

    expect(events).toEqual(["added:foo", "changed:foo", "removed:foo"])
    expect(manager.getValue("foo")).toBeUndefined()
  })
})

describe("configuration item validation", () => {
  it("should require a string key and an item", () => {
    expect(isConfigurationItem({ key: "a", item: 1 })).toBe(true)
    expect(isConfigurationItem({ key: 1, item: 1 })).toBe(false)
    expect(isConfigurationItem({ key: "a" })).toBe(false)
    expect(isConfigurationItem(null)).toBe(false)
  })
})

describe("configuration should work for basic file system integrations", () => {
  let directory: string
  let manager: FileSystemConfigurationManager | undefined

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), "trellis-config-"))
  })

  afterEach(() => {
    manager?.close()
    manager = undefined
    rmSync(directory, { recursive: true, force: true })
  })

  it("should reject a missing directory", () => {
    expect(
      () =>
        new FileSystemConfigurationManager({
          configDirectory: join(directory, "missing"),
        }),
    ).toThrow(`${join(directory, "missing")} does not exist`)
  })

  it("should load existing files when created", () => {
    const items: ConfigurationItem<TestItem>[] = [
      { key: "first", item: { name: "one", createdAt: 1 } },
      { key: "second", item: { name: "two", createdAt: 2 } },
    ]

    writeFileSync(join(directory, "items.json"), JSON.stringify(items))
    writeFileSync(join(directory, "ignored.txt"), "not configuration")
    writeFileSync(join(directory, "broken.json"), "{ not json")

    manager = new FileSystemConfigurationManager({
      configDirectory: directory,
      watch: false,
    })

    expect(Array.from(manager.getKeys()).sort()).toEqual(["first", "second"])
    expect(manager.getConfiguration("second", isTestItem)?.name).toBe("two")
  })

  it("should fire events when files are added", async () => {
    manager = new FileSystemConfigurationManager({
      configDirectory: directory,
    })

    expect(Array.from(manager.getKeys())).toHaveLength(0)

    const added = new DeferredPromise<string>()
    manager.once("added", (key) => added.resolve(key))

    const item: ConfigurationItem<TestItem> = {
      key: "foo",
      item: { name: "fooObj", createdAt: Date.now() },
    }

    writeFileSync(join(directory, "foo.json"), JSON.stringify(item), {
      encoding: "utf8",
      flush: true,
    })

    expect(await added).toBe("foo")
    expect(manager.getConfiguration("foo", isTestItem)?.name).toBe("fooObj")
  })
})
