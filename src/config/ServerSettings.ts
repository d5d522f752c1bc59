import { EXPORT_DEFAULTS, SERVER_DEFAULTS } from "./constants";
import { ValidationError } from "../errors";

export interface ServerSettings {
  port: number;
  host: string;
  outputDir: string;
  outputFileName: string;
  maxUploadBytes: number;
}

export const DEFAULT_SERVER_SETTINGS: ServerSettings = {
  port: SERVER_DEFAULTS.PORT,
  host: SERVER_DEFAULTS.HOST,
  outputDir: ".",
  outputFileName: EXPORT_DEFAULTS.FILE_NAME,
  maxUploadBytes: SERVER_DEFAULTS.MAX_UPLOAD_BYTES,
};

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw ValidationError.invalidFormat(key, "a positive integer", raw, { operation: "loadServerSettings" });
  }
  return parsed;
}

function readString(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim();
  return raw ? raw : fallback;
}

/**
 * Resolve settings from environment variables over the defaults.
 */
export function loadServerSettings(env: Env = process.env): ServerSettings {
  return {
    port: readPositiveInt(env, "PORT", DEFAULT_SERVER_SETTINGS.port),
    host: readString(env, "HOST", DEFAULT_SERVER_SETTINGS.host),
    outputDir: readString(env, "ENTITY_OVERLAY_OUTPUT_DIR", DEFAULT_SERVER_SETTINGS.outputDir),
    outputFileName: readString(env, "ENTITY_OVERLAY_OUTPUT_FILE", DEFAULT_SERVER_SETTINGS.outputFileName),
    maxUploadBytes: readPositiveInt(env, "ENTITY_OVERLAY_MAX_UPLOAD_BYTES", DEFAULT_SERVER_SETTINGS.maxUploadBytes),
  };
}
