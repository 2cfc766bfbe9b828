import { SpanStatusCode } from "@opentelemetry/api"
import {
  InMemorySpanExporter,
  NodeTracerProvider,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-node"
import {
  Tracing,
  TracingContext,
  enableAsyncTracing,
  getActiveSpan,
  withSpan,
} from "./tracing.js"

describe("tracing", () => {
  const exporter = new InMemorySpanExporter()
  const provider = new NodeTracerProvider()

  beforeAll(() => {
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter))
    provider.register({ contextManager: null })
  })

  afterEach(() => exporter.reset())

  afterAll(async () => {
    await provider.shutdown()
    Tracing.disable()
    TracingContext.disable()
  })

  it("should track the active span across async calls", async () => {
    expect(enableAsyncTracing()).toBe(true)

    const result = await withSpan(
      "lookup",
      async (span) => {
        await Promise.resolve()
        expect(getActiveSpan()).toBe(span)
        return 42
      },
      { "test.key": "value" },
    )

    expect(result).toBe(42)
    expect(getActiveSpan()).toBeUndefined()

    const spans = exporter.getFinishedSpans()
    expect(spans).toHaveLength(1)
    expect(spans[0].name).toBe("lookup")
    expect(spans[0].attributes).toEqual({ "test.key": "value" })
    expect(spans[0].status.code).toBe(SpanStatusCode.UNSET)
  })

  it("should record failures on the span", async () => {
    await expect(
      withSpan("failing", () => Promise.reject(new Error("boom"))),
    ).rejects.toThrow("boom")

    const spans = exporter.getFinishedSpans()
    expect(spans).toHaveLength(1)
    expect(spans[0].status).toEqual({
      code: SpanStatusCode.ERROR,
      message: "boom",
    })
  })
})
