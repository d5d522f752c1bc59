/**
 * Server entry point: builds the pipeline once, wires the service and
 * serves the app until SIGINT/SIGTERM.
 */

import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadServerSettings } from "./config/ServerSettings";
import { CompromisePipeline } from "./pipeline/CompromisePipeline";
import { EntityOverlayService } from "./services/EntityOverlayService";
import { FileDocumentSink } from "./services/FileDocumentSink";
import { logger } from "./utils/logger";

function main(): void {
  const settings = loadServerSettings();
  const pipeline = new CompromisePipeline();
  const service = new EntityOverlayService({
    pipeline,
    sink: new FileDocumentSink(settings.outputDir),
    outputFileName: settings.outputFileName,
  });
  const app = createApp({ service, maxUploadBytes: settings.maxUploadBytes });

  const server = serve({ fetch: app.fetch, port: settings.port, hostname: settings.host }, (info) => {
    logger.info("Listening", {
      address: `http://${settings.host}:${info.port}`,
      pipeline: pipeline.name,
      labels: service.knownLabels,
    });
  });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    server.close((error) => {
      if (error) {
        logger.error("Server close failed", { signal }, error);
        process.exitCode = 1;
      }
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main();
