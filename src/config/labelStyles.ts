/**
 * Label style registry: display colours per entity label.
 *
 * Two independent colour spaces share the same label set. "screen" colours are
 * CSS colour names for the HTML preview; "export" colours are RGB hex strings
 * as the docx writer expects them. Unknown labels fall back to a neutral grey
 * in either space.
 */

export type ColorSpace = "screen" | "export";

export const SCREEN_FALLBACK_COLOR = "gray";
export const EXPORT_FALLBACK_COLOR = "808080";

const SCREEN_COLORS: Readonly<Record<string, string>> = Object.freeze({
  PERSON: "lime",
  LIT_WORK: "blue",
  ART_WORK: "green",
  ART_MOVEMENT: "orange",
  ORG: "purple",
  PLACE: "teal",
  EVENT: "cyan",
  GENRE: "pink",
  CHARACTER: "brown",
  QUOTE: "gold",
  AWARD: "lime",
  PERIOD: "magenta",
  TECHNIQUE: "indigo",
  MOVIE_TV: "violet",
});

const EXPORT_COLORS: Readonly<Record<string, string>> = Object.freeze({
  PERSON: "32CD32",
  LIT_WORK: "0000FF",
  ART_WORK: "008000",
  ART_MOVEMENT: "FFA500",
  ORG: "800080",
  PLACE: "008080",
  EVENT: "00FFFF",
  GENRE: "FF1493",
  CHARACTER: "A52A2A",
  QUOTE: "FFD700",
  AWARD: "32CD32",
  PERIOD: "FF00FF",
  TECHNIQUE: "4B0082",
  MOVIE_TV: "9400D3",
});

const TABLES: Record<ColorSpace, { colors: Readonly<Record<string, string>>; fallback: string }> = {
  screen: { colors: SCREEN_COLORS, fallback: SCREEN_FALLBACK_COLOR },
  export: { colors: EXPORT_COLORS, fallback: EXPORT_FALLBACK_COLOR },
};

export function colorFor(label: string, colorSpace: ColorSpace): string {
  const { colors, fallback } = TABLES[colorSpace];
  return Object.prototype.hasOwnProperty.call(colors, label) ? colors[label] : fallback;
}

/**
 * label → colour for each given label, fallback included.
 */
export function colorMap(labels: Iterable<string>, colorSpace: ColorSpace): Record<string, string> {
  return Object.fromEntries(Array.from(labels, (label) => [label, colorFor(label, colorSpace)]));
}
