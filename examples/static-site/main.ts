import { FileSystemConfigurationManager } from "@trellis/core/configuration.js"
import { error, fatal, info } from "@trellis/core/logging.js"
import { enableFrameworkMetrics } from "@trellis/core/observability/metrics.js"
import { enableAsyncTracing } from "@trellis/core/observability/tracing.js"
import { Application } from "@trellis/http/application.js"
import { get } from "@trellis/http/handlers.js"
import { NodeHttpServer } from "@trellis/http/server.js"
import {
  applySettings,
  loadApplicationSettings,
} from "@trellis/http/settings.js"
import { jsonContents, textContents } from "@trellis/http/utils.js"
import {
  ConsoleSpanExporter,
  NodeTracerProvider,
  SimpleSpanProcessor,
} from "@opentelemetry/sdk-trace-node"
import path from "path"

const siteDir = path.dirname(__filename)

const provider = new NodeTracerProvider()
provider.addSpanProcessor(new SimpleSpanProcessor(new ConsoleSpanExporter()))
provider.register({ contextManager: null })
enableAsyncTracing()
enableFrameworkMetrics()

const configuration = new FileSystemConfigurationManager({
  configDirectory: path.join(siteDir, "config"),
  watch: false,
})

const app = new Application(
  applySettings(
    {
      routeHandlers: [
        get("/hello", () => textContents("Hello World")),
        get("/hello/{name:str}", (request) =>
          jsonContents({ greeting: `Hello ${String(request.pathParams.name)}` }),
        ),
      ],
      staticFiles: [
        {
          path: "/",
          directories: [path.join(siteDir, "public")],
          htmlMode: true,
        },
      ],
      onShutdown: [() => configuration.close()],
    },
    loadApplicationSettings(configuration) ?? {},
  ),
)

app.on("started", () => {
  info(`Serving ${app.routes.length} routes from ${siteDir}`)
})

const server = new NodeHttpServer({ name: "static-site", app: app.handle })

server.on("finished", () => {
  provider.shutdown().catch((err: unknown) => {
    error("Failed to flush spans", err)
  })
})

server.listen(3000).catch((err: unknown) => {
  fatal("Failed to start the server", err)
  process.exitCode = 1
})
