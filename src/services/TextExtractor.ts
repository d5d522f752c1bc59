/**
 * Uploaded file → plain text.
 * Routes on the file-name extension; anything but .pdf/.docx is rejected
 * before an extractor is touched.
 */

import { PdfExtractor } from "./PdfExtractor";
import { DocxExtractor } from "./DocxExtractor";
import { UPLOAD_FORMATS } from "../config/constants";
import { ExtractionError, ValidationError } from "../errors";
import { createLogger } from "../utils/logger";

export type UploadFormat = "pdf" | "docx";

export interface ExtractedUpload {
  text: string;
  format: UploadFormat;
}

/** Minimal contract both extractors meet; lets tests swap them out. */
export interface BinaryTextExtractor {
  extract(buffer: Buffer | Uint8Array): Promise<{ text: string }>;
}

const log = createLogger({ component: "TextExtractor" });

export function detectUploadFormat(fileName: string): UploadFormat | null {
  const lower = fileName.toLowerCase();
  if (lower.endsWith(UPLOAD_FORMATS.PDF)) return "pdf";
  if (lower.endsWith(UPLOAD_FORMATS.DOCX)) return "docx";
  return null;
}

export class TextExtractor {
  private extractors: Record<UploadFormat, BinaryTextExtractor>;

  constructor(extractors: Partial<Record<UploadFormat, BinaryTextExtractor>> = {}) {
    this.extractors = {
      pdf: extractors.pdf ?? new PdfExtractor(),
      docx: extractors.docx ?? new DocxExtractor(),
    };
  }

  async extract(fileName: string, bytes: Uint8Array): Promise<ExtractedUpload> {
    if (fileName === "") {
      throw ValidationError.emptyInput("No selected file", "file", { operation: "upload" });
    }

    const format = detectUploadFormat(fileName);
    if (format === null) {
      throw ValidationError.unsupportedFormat(fileName, { operation: "upload" });
    }

    let text: string;
    try {
      ({ text } = await this.extractors[format].extract(bytes));
    } catch (error) {
      log.warn("Extraction failed", { fileName, format, bytes: bytes.byteLength }, error);
      throw ExtractionError.failed(fileName, format, error instanceof Error ? error : undefined, {
        operation: "upload",
      });
    }

    log.debug("Extracted upload", { fileName, format, chars: text.length });
    return { text: text.trim(), format };
  }
}
