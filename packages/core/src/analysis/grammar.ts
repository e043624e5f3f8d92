/**
 * Token grammar for the extractor.
 *
 * Every pattern the analyzer scans with is defined here as a named constant so
 * callers and tests can target the grammar directly. Patterns carrying the `g`
 * flag are stateful (`lastIndex`); use them through `matchAll`, which clones
 * the regex, or through the helpers below.
 */

/**
 * Numeric literal: a signed decimal with a fractional part (`-0.5`, `+.25`,
 * `2.6`) or a bare run of digits (`124`). Signs only attach to decimals.
 */
export const NUMBER_PATTERN = /[-+]?\d*\.\d+|\d+/g;

/**
 * Measurement: a value glued to a unit-like token by an optional run of spaces
 * or hyphens. The unit class is permissive and also matches
 * ordinary words ("2.6 times").
 */
export const MEASUREMENT_PATTERN =
  /(?<value>[-+]?\d*\.\d+|\d+(?:e[-+]?\d+)?)[\s-]*(?<unit>[A-Za-z/%°μkmhdys]+)/gi;

/** A sentence ends at `.`, `?` or `!` followed by whitespace. */
export const SENTENCE_BOUNDARY = /(?<=[.?!])\s+/;

export const WHITESPACE_RUN = /\s+/g;

/** Micro signs (Greek mu and the legacy micro sign) normalize to `u`. */
export const MICRO_SIGN = /[μµ]/g;

/**
 * Convert a numeric token to a finite number.
 * Returns undefined for tokens that do not parse, so callers can filter the
 * failures out instead of catching them.
 */
export function parseNumberToken(token: string): number | undefined {
  const trimmed = token.trim();
  if (trimmed === '') return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/** Whether a text contains at least one measurement-shaped token. */
export function hasMeasurement(text: string): boolean {
  return new RegExp(MEASUREMENT_PATTERN.source, 'i').test(text);
}
