import type { Context } from "hono";
import type { EntityOverlayService } from "../services/EntityOverlayService";
import { parseTextRequest, readJsonObject } from "./requestBody";

/**
 * POST /save: { text, selected_entities } → { success, file_path }
 */
export function saveRoute(service: EntityOverlayService) {
  return async (c: Context): Promise<Response> => {
    const { text, selectedEntities } = parseTextRequest(await readJsonObject(c, "save"), "save");
    const { success, filePath } = await service.save(text, selectedEntities);
    return c.json({ success, file_path: filePath });
  };
}
