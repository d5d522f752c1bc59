import type { Context } from "hono";
import type { EntityOverlayService } from "../services/EntityOverlayService";

/**
 * GET /labels: labels the pipeline can emit, with their preview colours.
 */
export function labelsRoute(service: EntityOverlayService) {
  return (c: Context): Response => c.json({ labels: service.labelCatalog() });
}

/**
 * GET /health
 */
export function healthRoute(service: EntityOverlayService) {
  return (c: Context): Response =>
    c.json({ status: "ok", pipeline: service.pipelineName, labels: service.knownLabels.length });
}
