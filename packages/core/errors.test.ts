import { asError, getErrorMessage } from "./errors.js"

describe("error helpers", () => {
  it("should extract messages", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom")
    expect(getErrorMessage({ message: "plain" })).toBe("plain")
    expect(getErrorMessage({ message: 1 })).toBeUndefined()
    expect(getErrorMessage("text")).toBeUndefined()
  })

  it("should normalize thrown values", () => {
    const original = new RangeError("range")
    expect(asError(original)).toBe(original)

    const fromString = asError("text")
    expect(fromString.message).toBe("text")
    expect(fromString.cause).toBe("text")

    expect(asError({ message: "object" }).message).toBe("object")
    expect(asError(42).message).toBe("42")
  })
})
