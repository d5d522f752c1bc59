import type { Context } from "hono";
import type { EntityOverlayService } from "../services/EntityOverlayService";
import { toStatsPayload } from "../services/AnalyticsAggregator";
import { parseTextRequest, readJsonObject } from "./requestBody";

/**
 * POST /stats: { text } → entity/token/sentence statistics
 */
export function statsRoute(service: EntityOverlayService) {
  return async (c: Context): Promise<Response> => {
    const { text } = parseTextRequest(await readJsonObject(c, "stats"), "stats");
    const report = await service.stats(text);
    return c.json(toStatsPayload(report));
  };
}
