// ─────────────────────────────────────────────────────────────
// Text Normalizer — Canonical line text for heuristics
// ─────────────────────────────────────────────────────────────

const EXOTIC_SPACES = /[\u00A0\u1680\u2000-\u200A\u202F\u205F\u3000]/g;
const INVISIBLE_MARKS = /[\u200B-\u200D\u2060\uFEFF\u200E\u200F\u202A-\u202E\u2066-\u2069]/g;
const DASHES = /[\u2010\u2012-\u2015]/g;
const DOUBLE_QUOTES = /[\u201C\u201D\u201E\u00AB\u00BB]/g;
const SINGLE_QUOTES = /[\u2018\u2019\u201A\u2039\u203A]/g;
const BULLETS = /[\u25AA\u25CF\u25E6\u00B7]/g;
const SPACE_RUNS = /[ \t]+/g;

/**
 * Canonicalize a single line for downstream heuristics:
 * NFKC fold, plain spaces, no invisible marks, ASCII dashes and quotes,
 * one bullet glyph, collapsed spaces, trimmed.
 */
export function normalizeLine(text: string): string {
  return text
    .normalize("NFKC")
    .replace(EXOTIC_SPACES, " ")
    .replace(INVISIBLE_MARKS, "")
    .replace(DASHES, "-")
    .replace(DOUBLE_QUOTES, '"')
    .replace(SINGLE_QUOTES, "'")
    .replace(BULLETS, "•")
    .replace(SPACE_RUNS, " ")
    .trim();
}

/** Upper-case key with punctuation removed, used for cue comparisons */
export function normalizeKey(text: string): string {
  return normalizeLine(text)
    .replace(/[^\p{L}\p{N}\s]/gu, " ")
    .replace(/\s+/g, " ")
    .trim()
    .toUpperCase();
}

/** Whitespace tokenization; punctuation stays attached */
export function tokenize(text: string): string[] {
  return text.length > 0 ? text.split(" ").filter((t) => t.length > 0) : [];
}

/** 1 - edit distance / longer length; 1 for equal strings, 0 when one is empty */
export function stringSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;
  return 1 - levenshtein(a, b) / Math.max(a.length, b.length);
}

export function levenshtein(a: string, b: string): number {
  const matrix: number[][] = [];
  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i];
  }
  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j;
  }
  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      const cost = b.charAt(i - 1) === a.charAt(j - 1) ? 0 : 1;
      matrix[i][j] = Math.min(matrix[i - 1][j] + 1, matrix[i][j - 1] + 1, matrix[i - 1][j - 1] + cost);
    }
  }
  return matrix[b.length][a.length];
}
