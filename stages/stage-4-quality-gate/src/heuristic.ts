/**
 * Cheap local score from vocabulary diversity and length adequacy:
 * 5 * (unique words / words) + 5 * min(1, words / minWords), in [0, 10].
 */

export const DEFAULT_MIN_WORDS = 40;

const EDGE_PUNCTUATION = /^[\p{P}\p{S}]+|[\p{P}\p{S}]+$/gu;

export function tokenize(text: string): string[] {
  return text
    .split(/\s+/)
    .map((word) => word.replace(EDGE_PUNCTUATION, "").toLowerCase())
    .filter(Boolean);
}

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(10, Math.max(0, value));
}

export function heuristicScore(
  text: string,
  options: { minWords?: number } = {}
): number {
  const minWords = Math.max(1, options.minWords ?? DEFAULT_MIN_WORDS);
  const words = tokenize(text);
  if (words.length === 0) {
    return 0;
  }
  const diversity = new Set(words).size / words.length;
  const adequacy = Math.min(1, words.length / minWords);
  return clampScore(Math.round((5 * diversity + 5 * adequacy) * 100) / 100);
}
