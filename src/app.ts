/**
 * HTTP surface: a Hono app wiring one route module per endpoint onto an
 * EntityOverlayService. Built by a factory so tests can drive it in-process
 * through `app.request(...)`.
 */

import { Hono } from "hono";
import type { EntityOverlayService } from "./services/EntityOverlayService";
import { filterRoute } from "./routes/filterRoute";
import { uploadRoute } from "./routes/uploadRoute";
import { saveRoute } from "./routes/saveRoute";
import { statsRoute } from "./routes/statsRoute";
import { healthRoute, labelsRoute } from "./routes/labelsRoute";
import { SERVER_DEFAULTS } from "./config/constants";
import { getErrorCode, httpStatusFor, isEntityOverlayError } from "./errors";
import { createLogger, type LoggerLike } from "./utils/logger";

export interface AppDeps {
  service: EntityOverlayService;
  maxUploadBytes?: number;
  logger?: LoggerLike;
}

export function createApp(deps: AppDeps): Hono {
  const { service } = deps;
  const log = deps.logger ?? createLogger({ component: "http" });
  const app = new Hono();

  app.use("*", async (c, next) => {
    const startedAt = Date.now();
    await next();
    log.info("request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - startedAt,
    });
  });

  app.get("/health", healthRoute(service));
  app.get("/labels", labelsRoute(service));
  app.post("/filter", filterRoute(service));
  app.post("/upload", uploadRoute(service, deps.maxUploadBytes ?? SERVER_DEFAULTS.MAX_UPLOAD_BYTES));
  app.post("/save", saveRoute(service));
  app.post("/stats", statsRoute(service));

  app.notFound((c) => c.json({ error: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.onError((error, c) => {
    const status = httpStatusFor(error);
    const code = getErrorCode(error);
    if (status === 500) {
      log.error("Request failed", { method: c.req.method, path: c.req.path, code }, error);
    } else {
      log.warn("Request rejected", { method: c.req.method, path: c.req.path, code }, error);
    }
    const message = isEntityOverlayError(error) ? error.toUserMessage() : "Internal server error";
    return c.json({ error: message, code }, status);
  });

  return app;
}
