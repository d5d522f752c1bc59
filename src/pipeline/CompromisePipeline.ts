/**
 * CompromisePipeline: rule-based NER on top of the compromise library.
 *
 * compromise reports sentences and matches as term lists without character
 * offsets, so terms are aligned against the source text (cursor + indexOf)
 * and entity matches are aligned against the resulting token list.
 */

import nlp from "compromise";
import type { RecognitionPipeline } from "./RecognitionPipeline";
import type {
  PipelineOutput,
  RecognizedEntity,
  SentenceSpan,
  Token,
} from "../services/EntityOverlay.types";
import { PipelineError } from "../errors";
import { createLogger } from "../utils/logger";

interface JsonMatch {
  terms: string[];
}

const ENTITY_LABELS: readonly string[] = Object.freeze(["ORG", "PERSON", "PLACE"]);

const PIPELINE_NAME = "compromise";

const log = createLogger({ component: "CompromisePipeline" });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Narrow compromise's `.json()` output to the term texts we need.
 * Empty terms (implicit contraction parts) are dropped.
 */
function parseMatches(raw: unknown, source: string): JsonMatch[] {
  if (!Array.isArray(raw)) {
    throw PipelineError.malformedOutput(PIPELINE_NAME, `${source} is not an array`);
  }
  return raw.map((match, i) => {
    if (!isRecord(match) || !Array.isArray(match.terms)) {
      throw PipelineError.malformedOutput(PIPELINE_NAME, `${source}[${i}] has no terms`);
    }
    const terms: string[] = [];
    for (const term of match.terms) {
      if (isRecord(term) && typeof term.text === "string" && term.text.length > 0) {
        terms.push(term.text);
      }
    }
    return { terms };
  });
}

function alignTokens(text: string, sentences: JsonMatch[]): { tokens: Token[]; sentences: SentenceSpan[] } {
  const tokens: Token[] = [];
  const spans: SentenceSpan[] = [];
  let cursor = 0;

  for (const sentence of sentences) {
    const tokenStart = tokens.length;
    for (const term of sentence.terms) {
      const start = text.indexOf(term, cursor);
      if (start === -1) {
        log.debug("Term not found in source text, skipped", { term, cursor });
        continue;
      }
      const end = start + term.length;
      tokens.push({ text: term, startChar: start, endChar: end });
      cursor = end;
    }
    spans.push({ tokenStart, tokenEnd: tokens.length });
  }

  return { tokens, sentences: spans };
}

/** First index >= from where `terms` appear as consecutive tokens, or -1. */
function findTokenRun(tokens: readonly Token[], terms: readonly string[], from: number): number {
  outer: for (let i = from; i + terms.length <= tokens.length; i++) {
    for (let j = 0; j < terms.length; j++) {
      if (tokens[i + j].text !== terms[j]) continue outer;
    }
    return i;
  }
  return -1;
}

/**
 * Sort by start (longer first on ties) and drop any span that overlaps one
 * already kept.
 */
export function resolveOverlaps(entities: RecognizedEntity[]): RecognizedEntity[] {
  const sorted = [...entities].sort(
    (a, b) => a.startChar - b.startChar || (b.endChar - b.startChar) - (a.endChar - a.startChar)
  );
  const kept: RecognizedEntity[] = [];
  let lastEnd = 0;
  for (const entity of sorted) {
    if (entity.startChar < lastEnd) continue;
    kept.push(entity);
    lastEnd = entity.endChar;
  }
  return kept;
}

export class CompromisePipeline implements RecognitionPipeline {
  readonly name = PIPELINE_NAME;

  labels(): readonly string[] {
    return ENTITY_LABELS;
  }

  async process(text: string): Promise<PipelineOutput> {
    const doc = nlp(text);
    const { tokens, sentences } = alignTokens(text, parseMatches(doc.json(), "sentences"));

    const matchesByLabel: Array<[string, unknown]> = [
      ["PERSON", doc.people().json()],
      ["PLACE", doc.places().json()],
      ["ORG", doc.organizations().json()],
    ];

    const found: RecognizedEntity[] = [];
    for (const [label, matches] of matchesByLabel) {
      let tokenCursor = 0;
      for (const match of parseMatches(matches, label)) {
        if (match.terms.length === 0) continue;
        const tokenStart = findTokenRun(tokens, match.terms, tokenCursor);
        if (tokenStart === -1) continue;
        const tokenEnd = tokenStart + match.terms.length;
        const startChar = tokens[tokenStart].startChar;
        const endChar = tokens[tokenEnd - 1].endChar;
        found.push({
          label,
          startChar,
          endChar,
          text: text.slice(startChar, endChar),
          tokenStart,
          tokenEnd,
        });
        tokenCursor = tokenEnd;
      }
    }

    return { entities: resolveOverlaps(found), tokens, sentences };
  }
}
