// ─────────────────────────────────────────────────────────────
// Feature Extractor — Flat feature vectors per structural unit
// ─────────────────────────────────────────────────────────────

import {
  StructuralUnit,
  StyleMetadata,
  FeatureVector,
  ContextWindow,
  UNKNOWN,
  Unknown,
} from "../schema/templateSchema";
import { normalizeLine, tokenize } from "./textNormalizer";

// Other bullet glyphs are folded to "•" by normalizeLine
const BULLET_RE = /^([•∙○▸▶\-*])\s+/;
const DECIMAL_RE = /^((?:\d+\.)+\d+\.?|\d+[.)])\s+/;
const BRACKETED_RE = /^(\[(?:\d+|[A-Za-z])\])\s+/;
const ROMAN_RE = /^(\(?[ivxlcdmIVXLCDM]+\)?[.)])\s+/;
const ALPHA_RE = /^([A-Za-z][.)])\s+/;
const LEADER_DOTS_RE = /\.{3,}\s*\d+\s*$/;
const URL_LIKE_RE = /\b(?:https?:\/\/|www\.)\S+/i;
const EMAIL_RE = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const SENTENCE_RE = /[.!?](?=\s|$)/g;
const HEADING_STYLE_RE = /^(?:heading|titre|überschrift|título)\s*([1-9])$/iu;
const TITLE_STYLE_RE = /^(?:title|titre|subtitle)$/i;

const PUNCTUATION = new Set("!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~—–…“”‘’·•∙◦▪");

export const DEFAULT_CONTEXT_RADIUS = 2;

/**
 * Extract the feature vector of one unit.
 * `unitCount` is the length of the whole sequence, used for relative position.
 */
export function extractFeatures(
  unit: StructuralUnit,
  window: ContextWindow<StructuralUnit>,
  unitCount: number = unit.index + 1
): FeatureVector {
  const style = unit.style;
  const textNorm = normalizeLine(unit.text);
  const tokens = tokenize(textNorm);
  const alphaTokens = tokens.filter((t) => /\p{L}/u.test(t));
  const charLength = textNorm.length;

  const bullet = detectBulletPrefix(textNorm);
  const fontSize = style.fontSize ?? UNKNOWN;
  const previous = window.before[0];
  const next = window.after[0];

  return {
    position: unit.index,
    relativePosition: unitCount > 1 ? unit.index / (unitCount - 1) : 0,

    styleId: style.styleId ?? UNKNOWN,
    headingLevel: headingLevelFromStyle(style),
    fontSize,
    fontFamily: style.fontFamily ?? UNKNOWN,
    bold: style.bold ?? UNKNOWN,
    italic: style.italic ?? UNKNOWN,
    underline: style.underline ?? UNKNOWN,
    alignment: style.alignment ?? UNKNOWN,
    indentLevel: style.indentLevel ?? style.list?.level ?? 0,

    inList: style.list !== undefined,
    listLevel: style.list?.level ?? 0,
    listKind: style.list?.kind ?? "none",
    inTable: style.table !== undefined || unit.kind === "table-cell",
    tableRow: style.table?.row ?? -1,
    tableColumn: style.table?.column ?? -1,

    text: unit.text,
    textNorm,
    charLength,
    tokenCount: tokens.length,
    sentenceCount: charLength > 0 ? (textNorm.match(SENTENCE_RE) ?? []).length : 0,
    uppercaseRatio: uppercaseRatio(textNorm),
    titlecaseRate: alphaTokens.length > 0
      ? alphaTokens.filter(isTitlecaseWord).length / alphaTokens.length
      : 0,
    digitRatio: charLength > 0 ? countChars(textNorm, (ch) => /\p{Nd}/u.test(ch)) / charLength : 0,
    punctDensity: charLength > 0 ? countChars(textNorm, (ch) => PUNCTUATION.has(ch)) / charLength : 0,
    whitespaceDensity: unit.text.length > 0
      ? countChars(unit.text, (ch) => /\s/.test(ch)) / unit.text.length
      : 0,

    isEmpty: charLength === 0,
    endsWithPeriod: textNorm.endsWith("."),
    trailingColon: textNorm.endsWith(":"),
    startsWithBullet: bullet !== null,
    bulletGlyph: bullet,
    numberingPrefix: detectNumberingPrefix(textNorm),
    hasLeaderDots: LEADER_DOTS_RE.test(textNorm),
    hasAllcapsWord: tokens.some(isAllcapsWord),
    containsBar: textNorm.includes("|"),
    containsUrlLike: URL_LIKE_RE.test(textNorm),
    containsEmail: EMAIL_RE.test(textNorm),

    largerThanPrevious: previous !== undefined && isLarger(fontSize, previous.style.fontSize),
    largerThanNext: next !== undefined && isLarger(fontSize, next.style.fontSize),
    precededByEmpty: previous !== undefined && normalizeLine(previous.text) === "",
    followedByEmpty: next !== undefined && normalizeLine(next.text) === "",
  };
}

/**
 * Extract features for a whole unit sequence.
 * Each unit sees up to `radius` neighbours on each side, nearest first.
 */
export function extractFeatureSequence(
  units: readonly StructuralUnit[],
  radius: number = DEFAULT_CONTEXT_RADIUS
): FeatureVector[] {
  return units.map((unit, i) =>
    extractFeatures(unit, contextWindow(units, i, radius), units.length)
  );
}

/** Window of up to `radius` items on each side of position `i`, nearest first */
export function contextWindow<T>(items: readonly T[], i: number, radius: number): ContextWindow<T> {
  return {
    before: items.slice(Math.max(0, i - radius), i).reverse(),
    after: items.slice(i + 1, i + 1 + radius),
  };
}

/**
 * Heading level implied by a paragraph style.
 * Title styles count as level 0; "Heading 2" / "Heading2" as 2.
 */
export function headingLevelFromStyle(style: Readonly<StyleMetadata>): number | Unknown {
  for (const candidate of [style.styleId, style.styleName]) {
    if (!candidate) continue;
    const compact = candidate.trim();
    if (TITLE_STYLE_RE.test(compact)) return 0;
    const m = HEADING_STYLE_RE.exec(compact);
    if (m) return Number(m[1]);
  }
  return UNKNOWN;
}

// ── Helpers ──────────────────────────────────────────────────

function detectBulletPrefix(text: string): string | null {
  const m = BULLET_RE.exec(text);
  if (!m) return null;
  const glyph = m[1];
  // "- 3.5" is a negative number, not a bullet
  if (glyph === "-" || glyph === "*") {
    const tail = text.slice(m[0].length);
    if (/^\d/.test(tail)) return null;
  }
  return glyph;
}

function detectNumberingPrefix(text: string): string | null {
  for (const pattern of [DECIMAL_RE, BRACKETED_RE, ROMAN_RE, ALPHA_RE]) {
    const m = pattern.exec(text);
    if (m) return m[1].trim();
  }
  return null;
}

function uppercaseRatio(text: string): number {
  const letters = [...text].filter((ch) => /\p{L}/u.test(ch));
  if (letters.length === 0) return 0;
  return letters.filter((ch) => /\p{Lu}/u.test(ch)).length / letters.length;
}

function stripPunctuation(word: string): string {
  let start = 0;
  let end = word.length;
  while (start < end && PUNCTUATION.has(word[start])) start++;
  while (end > start && PUNCTUATION.has(word[end - 1])) end--;
  return word.slice(start, end);
}

function isTitlecaseWord(word: string): boolean {
  const core = stripPunctuation(word);
  if (core.length < 2) return false;
  const rest = core.slice(1);
  return /^\p{Lu}/u.test(core) && /\p{Ll}/u.test(rest) && !/\p{Lu}/u.test(rest);
}

function isAllcapsWord(word: string): boolean {
  const letters = [...stripPunctuation(word)].filter((ch) => /\p{L}/u.test(ch));
  return letters.length >= 2 && letters.every((ch) => /\p{Lu}/u.test(ch));
}

function countChars(text: string, predicate: (ch: string) => boolean): number {
  let n = 0;
  for (const ch of text) if (predicate(ch)) n++;
  return n;
}

function isLarger(size: number | Unknown, other: number | undefined): boolean {
  return typeof size === "number" && other !== undefined && size > other;
}
