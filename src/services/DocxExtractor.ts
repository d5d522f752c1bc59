/**
 * DocxExtractor: DOCX→text via mammoth's raw-text conversion.
 */

import mammoth from "mammoth";

export interface DocxExtractionResult {
  text: string;
  warnings: string[];
}

export class DocxExtractor {
  async extract(buffer: Buffer | Uint8Array): Promise<DocxExtractionResult> {
    const data = Buffer.isBuffer(buffer) ? buffer : Buffer.from(buffer);
    const result = await mammoth.extractRawText({ buffer: data });

    return {
      text: result.value.trim(),
      warnings: result.messages.map((message) => message.message),
    };
  }
}
