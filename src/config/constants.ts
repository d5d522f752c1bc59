/**
 * Centralized constants for the entity overlay service.
 * Avoids magic numbers scattered throughout codebase
 */

export const SERVER_DEFAULTS = {
  PORT: 5000,
  HOST: "127.0.0.1",
  /** Uploads above this size are rejected before extraction */
  MAX_UPLOAD_BYTES: 10 * 1024 * 1024,
} as const;

export const EXPORT_DEFAULTS = {
  FILE_NAME: "Results.docx",
  /** docx font size is in half-points */
  FONT_SIZE_HALF_POINTS: 24,
} as const;

export const UPLOAD_FORMATS = {
  PDF: ".pdf",
  DOCX: ".docx",
} as const;

export const RENDER_DEFAULTS = {
  CONTAINER_CLASS: "entities",
  ENTITY_CLASS: "entity",
  LABEL_CLASS: "entity-label",
} as const;
