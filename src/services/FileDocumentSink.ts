import { mkdir, open, rm } from "node:fs/promises";
import { join } from "node:path";
import { StorageError } from "../errors";
import { logger } from "../utils/logger";

/**
 * Where exported documents go. `write` persists the bytes once and returns
 * the location it wrote to.
 */
export interface DocumentSink {
  write(fileName: string, bytes: Uint8Array): Promise<string>;
}

/**
 * Writes documents into a directory on local disk. The file handle is closed
 * on every path; a write that fails after opening leaves no file behind,
 * and a file that could not be opened is left as it was.
 */
export class FileDocumentSink implements DocumentSink {
  constructor(private readonly outputDir: string) {}

  async write(fileName: string, bytes: Uint8Array): Promise<string> {
    const filePath = join(this.outputDir, fileName);

    let opened = false;
    try {
      await mkdir(this.outputDir, { recursive: true });
      const handle = await open(filePath, "w");
      opened = true;
      try {
        await handle.writeFile(bytes);
      } finally {
        await handle.close();
      }
    } catch (error) {
      // Only a file this call opened (and truncated) may be removed
      if (opened) {
        await rm(filePath, { force: true }).catch((rmError: unknown) => {
          logger.warn("Could not remove partial document", { filePath }, rmError);
        });
      }
      throw StorageError.writeFailed(filePath, error instanceof Error ? error : undefined, {
        operation: "FileDocumentSink.write",
      });
    }

    logger.debug("Document written", { filePath, bytes: bytes.byteLength });
    return filePath;
  }
}
