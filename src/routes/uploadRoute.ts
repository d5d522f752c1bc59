import type { Context } from "hono";
import type { EntityOverlayService } from "../services/EntityOverlayService";
import { ErrorCode, ValidationError } from "../errors";

function isUploadedFile(value: unknown): value is File {
  return (
    typeof value === "object" &&
    value !== null &&
    "name" in value &&
    "arrayBuffer" in value &&
    typeof value.arrayBuffer === "function"
  );
}

/**
 * POST /upload: multipart `file` (.pdf/.docx) → { text }
 */
export function uploadRoute(service: EntityOverlayService, maxUploadBytes: number) {
  return async (c: Context): Promise<Response> => {
    const contentType = c.req.header("content-type") ?? "";
    if (!contentType.includes("multipart/form-data")) {
      throw ValidationError.emptyInput("No file provided", "file", { operation: "upload" });
    }

    const form = await c.req.parseBody().catch((error: unknown) => {
      throw new ValidationError(
        "Invalid format for file: expected a multipart/form-data body",
        ErrorCode.VALIDATION_INVALID_FORMAT,
        { operation: "upload", field: "file" },
        { cause: error instanceof Error ? error : undefined }
      );
    });
    const file = form["file"];
    if (!isUploadedFile(file)) {
      throw ValidationError.emptyInput("No file provided", "file", { operation: "upload" });
    }
    if (file.size > maxUploadBytes) {
      throw ValidationError.payloadTooLarge("file", file.size, maxUploadBytes, {
        operation: "upload",
        fileName: file.name,
      });
    }

    const bytes = new Uint8Array(await file.arrayBuffer());
    const { text } = await service.upload(file.name, bytes);
    return c.json({ text });
  };
}
