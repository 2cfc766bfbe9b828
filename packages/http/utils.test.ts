import { Readable } from "stream"
import type { SendMessage } from "./index.js"
import { streamContents, writeResponse } from "./utils.js"

describe("response writing", () => {
  it("should destroy streamed bodies the client never received", async () => {
    const body = Readable.from([Buffer.from("first"), Buffer.from("second")])
    const send = jest.fn((message: SendMessage) =>
      message.type === "http.response.start"
        ? Promise.reject(new Error("client gone"))
        : Promise.resolve(),
    )

    await expect(
      writeResponse(streamContents(body, "text/plain"), send),
    ).rejects.toThrow("client gone")

    expect(send).toHaveBeenCalledTimes(1)
    expect(body.destroyed).toBe(true)
  })

  it("should stream every chunk before the terminal message", async () => {
    const messages: SendMessage[] = []
    const body = Readable.from([Buffer.from("a"), Buffer.from("b")])

    await writeResponse(streamContents(body, "text/plain"), (message) => {
      messages.push(message)
      return Promise.resolve()
    })

    expect(messages.map((m) => m.type)).toEqual([
      "http.response.start",
      "http.response.body",
      "http.response.body",
      "http.response.body",
    ])
    expect(
      messages.map((m) =>
        m.type === "http.response.body" ? m.body.toString() : "",
      ),
    ).toEqual(["", "a", "b", ""])
    expect(body.destroyed).toBe(true)
  })
})
