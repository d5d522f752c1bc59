import { describe, it, expect } from "vitest";
import { DEFAULT_SERVER_SETTINGS, loadServerSettings } from "../src/config/ServerSettings";
import { ErrorCode, ValidationError } from "../src/errors";

describe("loadServerSettings", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadServerSettings({})).toEqual({
      port: 5000,
      host: "127.0.0.1",
      outputDir: ".",
      outputFileName: "Results.docx",
      maxUploadBytes: 10 * 1024 * 1024,
    });
    expect(loadServerSettings({})).toEqual(DEFAULT_SERVER_SETTINGS);
  });

  it("reads overrides", () => {
    expect(
      loadServerSettings({
        PORT: "8080",
        HOST: "0.0.0.0",
        ENTITY_OVERLAY_OUTPUT_DIR: "/srv/exports",
        ENTITY_OVERLAY_OUTPUT_FILE: "highlighted.docx",
        ENTITY_OVERLAY_MAX_UPLOAD_BYTES: "2048",
      })
    ).toEqual({
      port: 8080,
      host: "0.0.0.0",
      outputDir: "/srv/exports",
      outputFileName: "highlighted.docx",
      maxUploadBytes: 2048,
    });
  });

  it("treats blank values as unset", () => {
    const settings = loadServerSettings({ PORT: " ", HOST: "", ENTITY_OVERLAY_OUTPUT_FILE: "  " });
    expect(settings.port).toBe(5000);
    expect(settings.host).toBe("127.0.0.1");
    expect(settings.outputFileName).toBe("Results.docx");
  });

  it("rejects invalid numbers", () => {
    for (const raw of ["abc", "0", "-1", "1.5"]) {
      expect(() => loadServerSettings({ PORT: raw })).toThrow(ValidationError);
    }
    expect(() => loadServerSettings({ ENTITY_OVERLAY_MAX_UPLOAD_BYTES: "lots" })).toThrow(
      "Invalid format for ENTITY_OVERLAY_MAX_UPLOAD_BYTES: expected a positive integer"
    );
  });

  it("reports the invalid-format code", () => {
    let caught: unknown;
    try {
      loadServerSettings({ PORT: "eighty" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    if (!(caught instanceof ValidationError)) return;
    expect(caught.code).toBe(ErrorCode.VALIDATION_INVALID_FORMAT);
    expect(caught.value).toBe("eighty");
  });
});
