/**
 * Keyword normalization and word-boundary matchers
 */

import type { KeywordInput, KeywordWeights } from "../model";
import { logger } from "../logger";

export class InvalidWeightError extends Error {
  constructor(
    public readonly keyword: string,
    public readonly weight: unknown
  ) {
    super(`Invalid weight for keyword "${keyword}": ${String(weight)} (must be a positive finite number)`);
    this.name = "InvalidWeightError";
  }
}

export interface KeywordMatcher {
  keyword: string;
  weight: number;
  pattern: RegExp;
}

/**
 * Compiled matchers, one per keyword. Built once, read-only afterwards.
 */
export type KeywordMatcherSet = ReadonlyArray<Readonly<KeywordMatcher>>;

// Word characters for \b-style boundaries, extended to Unicode
const WORD_CHAR = "[\\p{L}\\p{M}\\p{N}\\p{Pc}]";
const WORD_CHAR_TEST = new RegExp(`^${WORD_CHAR}$`, "u");

function isWordChar(ch: string): boolean {
  return WORD_CHAR_TEST.test(ch);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Normalize list-or-map keyword input into lowercase term -> weight.
 * Throws InvalidWeightError before anything else is built.
 */
export function normalizeKeywords(input: KeywordInput): KeywordWeights {
  const entries: Array<[string, unknown]> = Array.isArray(input)
    ? input.map((term): [string, unknown] => [term, 1.0])
    : Object.entries(input);

  const weights = new Map<string, number>();

  for (const [term, weight] of entries) {
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight <= 0) {
      throw new InvalidWeightError(term, weight);
    }

    const key = term.trim().toLowerCase();
    if (!key) {
      logger.warn("Ignoring empty keyword");
      continue;
    }
    weights.set(key, weight);
  }

  return weights;
}

/**
 * Build a case-insensitive matcher that respects word boundaries on both ends.
 * Boundary rules mirror \b: a keyword edge that is a word character must not
 * touch another word character, and a non-word edge must touch one.
 */
export function buildKeywordPattern(keyword: string): RegExp {
  const chars = Array.from(keyword);
  const first = chars[0] ?? "";
  const last = chars[chars.length - 1] ?? "";

  const before = isWordChar(first) ? `(?<!${WORD_CHAR})` : `(?<=${WORD_CHAR})`;
  const after = isWordChar(last) ? `(?!${WORD_CHAR})` : `(?=${WORD_CHAR})`;

  return new RegExp(`${before}${escapeRegExp(keyword)}${after}`, "giu");
}

export function buildKeywordMatchers(weights: KeywordWeights): KeywordMatcherSet {
  return Object.freeze(
    Array.from(weights, ([keyword, weight]) =>
      Object.freeze({ keyword, weight, pattern: buildKeywordPattern(keyword) })
    )
  );
}

/**
 * Number of non-overlapping boundary-respecting matches
 */
export function countMatches(pattern: RegExp, text: string): number {
  return text.match(pattern)?.length ?? 0;
}

/**
 * Whitespace tokenization used for length normalization
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/\s+/)
    .filter((t) => t.length > 0);
}
