import { describe, it, expect, vi } from "vitest";
import { toStyledRuns, packDocument, exportDocument } from "../src/services/DocxExporter";
import { DocxExtractor } from "../src/services/DocxExtractor";
import { StorageError } from "../src/errors";
import type { DocumentSink } from "../src/services/FileDocumentSink";
import type { Segment } from "../src/services/EntityOverlay.types";
import { createMemorySink } from "./setup";

const SEGMENTS: Segment[] = [
  { text: "Dracula was written by ", label: null },
  { text: "Bram Stoker", label: "PERSON" },
  { text: ".", label: null },
];

describe("toStyledRuns", () => {
  it("styles entity runs bold with export colours", () => {
    expect(toStyledRuns(SEGMENTS)).toEqual([
      { text: "Dracula was written by " },
      { text: "Bram Stoker", bold: true, color: "32CD32", label: "PERSON" },
      { text: "." },
    ]);
  });

  it("falls back to grey for unknown labels", () => {
    expect(toStyledRuns([{ text: "Zorg", label: "ALIEN" }])).toEqual([
      { text: "Zorg", bold: true, color: "808080", label: "ALIEN" },
    ]);
  });

  it("maps no segments to no runs", () => {
    expect(toStyledRuns([])).toEqual([]);
  });
});

describe("packDocument", () => {
  it("produces a zip container", async () => {
    const bytes = await packDocument(toStyledRuns(SEGMENTS));
    expect(bytes[0]).toBe(0x50);
    expect(bytes[1]).toBe(0x4b);
  });

  it("keeps the text readable", async () => {
    const bytes = await packDocument(toStyledRuns(SEGMENTS));
    const { text } = await new DocxExtractor().extract(bytes);
    expect(text).toBe("Dracula was written by Bram Stoker.");
  });
});

describe("exportDocument", () => {
  it("hands the bytes to the sink exactly once", async () => {
    const { sink, files, write } = createMemorySink();
    const result = await exportDocument(SEGMENTS, sink);

    expect(write).toHaveBeenCalledTimes(1);
    expect(write.mock.calls[0][0]).toBe("Results.docx");
    expect(result.filePath).toBe("memory://Results.docx");
    expect(result.runCount).toBe(3);
    expect(result.byteLength).toBe(files.get("Results.docx")?.byteLength);
  });

  it("uses the given file name", async () => {
    const { sink, files } = createMemorySink();
    const result = await exportDocument(SEGMENTS, sink, "custom.docx");
    expect(result.filePath).toBe("memory://custom.docx");
    expect(files.has("custom.docx")).toBe(true);
  });

  it("propagates sink failures without retrying", async () => {
    const failure = StorageError.writeFailed("/nowhere/Results.docx");
    const write = vi.fn(async (): Promise<string> => {
      throw failure;
    });
    const sink: DocumentSink = { write };

    await expect(exportDocument(SEGMENTS, sink)).rejects.toBe(failure);
    expect(write).toHaveBeenCalledTimes(1);
  });
});
