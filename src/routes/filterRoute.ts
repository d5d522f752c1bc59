import type { Context } from "hono";
import type { EntityOverlayService } from "../services/EntityOverlayService";
import { parseTextRequest, readJsonObject } from "./requestBody";

/**
 * POST /filter: { text, selected_entities } → { html }
 */
export function filterRoute(service: EntityOverlayService) {
  return async (c: Context): Promise<Response> => {
    const { text, selectedEntities } = parseTextRequest(await readJsonObject(c, "filter"), "filter");
    const { html } = await service.filter(text, selectedEntities);
    return c.json({ html });
  };
}
