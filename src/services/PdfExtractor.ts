/**
 * PdfExtractor: PDF→text via unpdf.
 * No structured extraction (font-size heuristics unreliable).
 * Plain text only, pages joined with newlines.
 */

import { extractText, getDocumentProxy } from "unpdf";

export interface PdfExtractionResult {
  text: string;
  pageCount: number;
}

export class PdfExtractor {
  async extract(buffer: Buffer | Uint8Array): Promise<PdfExtractionResult> {
    // unpdf hands the array to pdf.js, which detaches it; work on a copy
    const data = new Uint8Array(buffer);
    const doc = await getDocumentProxy(data);

    const { text, totalPages } = await extractText(doc, { mergePages: true });

    return {
      text: text.trim(),
      pageCount: totalPages,
    };
  }
}
