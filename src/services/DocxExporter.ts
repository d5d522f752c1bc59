/**
 * DocxExporter: segment list → styled runs → .docx bytes → sink.
 *
 * Entity runs are bold and coloured from the registry's export table; plain
 * runs keep default styling. The sink is called exactly once per export and
 * its failures propagate unchanged.
 */

import { Document, Packer, Paragraph, TextRun } from "docx";
import type { Segment, StyledRun } from "./EntityOverlay.types";
import type { DocumentSink } from "./FileDocumentSink";
import { colorFor } from "../config/labelStyles";
import { EXPORT_DEFAULTS } from "../config/constants";

export interface ExportResult {
  filePath: string;
  runCount: number;
  byteLength: number;
}

export function toStyledRuns(segments: readonly Segment[]): StyledRun[] {
  return segments.map((segment) =>
    segment.label === null
      ? { text: segment.text }
      : {
          text: segment.text,
          bold: true,
          color: colorFor(segment.label, "export"),
          label: segment.label,
        }
  );
}

/**
 * docx does not turn "\n" inside a run into a line break, so each line after
 * the first becomes its own TextRun preceded by a break.
 */
function toTextRuns(run: StyledRun): TextRun[] {
  return run.text.split("\n").map(
    (line, i) =>
      new TextRun({
        text: line,
        bold: run.bold,
        color: run.color,
        size: EXPORT_DEFAULTS.FONT_SIZE_HALF_POINTS,
        break: i > 0 ? 1 : undefined,
      })
  );
}

export function buildDocument(runs: readonly StyledRun[]): Document {
  return new Document({
    sections: [
      {
        properties: {},
        children: [new Paragraph({ children: runs.flatMap(toTextRuns) })],
      },
    ],
  });
}

export async function packDocument(runs: readonly StyledRun[]): Promise<Buffer> {
  return Packer.toBuffer(buildDocument(runs));
}

export async function exportDocument(
  segments: readonly Segment[],
  sink: DocumentSink,
  fileName: string = EXPORT_DEFAULTS.FILE_NAME
): Promise<ExportResult> {
  const runs = toStyledRuns(segments);
  const bytes = await packDocument(runs);
  const filePath = await sink.write(fileName, bytes);
  return { filePath, runCount: runs.length, byteLength: bytes.byteLength };
}
