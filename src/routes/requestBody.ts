/**
 * Hand-rolled request validation shared by the JSON routes.
 */

import type { Context } from "hono";
import { ValidationError } from "../errors";

export interface TextRequest {
  text: string;
  selectedEntities: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export async function readJsonObject(c: Context, operation: string): Promise<Record<string, unknown>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (error) {
    throw new ValidationError(
      "Request body must be a JSON object",
      undefined,
      { operation, field: "body" },
      { cause: error instanceof Error ? error : undefined }
    );
  }
  if (!isRecord(raw)) {
    throw ValidationError.invalidFormat("body", "a JSON object", raw, { operation });
  }
  return raw;
}

/** `text` defaults to "" and `selected_entities` to []. */
export function parseTextRequest(body: Record<string, unknown>, operation: string): TextRequest {
  const { text = "", selected_entities: selected = [] } = body;

  if (typeof text !== "string") {
    throw ValidationError.invalidFormat("text", "a string", text, { operation });
  }
  if (!Array.isArray(selected) || !selected.every((label): label is string => typeof label === "string")) {
    throw ValidationError.invalidFormat("selected_entities", "an array of strings", selected, { operation });
  }

  return { text, selectedEntities: selected };
}
