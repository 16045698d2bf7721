// ─────────────────────────────────────────────────────────────
// Detectors — One pure scorer per structural role
//
// Every detector is additive: corroborating clues add weight,
// counter-clues subtract, the sum is clamped to [0, 1].
// Detectors only see features, never each other's results.
// ─────────────────────────────────────────────────────────────

import {
  FeatureVector,
  ContextWindow,
  DetectorId,
  DetectionResult,
  Detector,
} from "../schema/templateSchema";

const STOPWORDS = new Set(["the", "is", "of", "and", "in", "to", "a", "for", "with"]);

const MONTHS =
  "jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|jun(?:e)?|jul(?:y)?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?";
const DATE_RES: RegExp[] = [
  /\b\d{4}-\d{2}-\d{2}\b/,
  /\b\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}\b/,
  new RegExp(`\\b(?:${MONTHS})\\.?\\s+\\d{1,2}(?:st|nd|rd|th)?,?\\s+\\d{4}\\b`, "i"),
  new RegExp(`\\b\\d{1,2}(?:st|nd|rd|th)?\\s+(?:${MONTHS})\\.?,?\\s+\\d{4}\\b`, "i"),
  new RegExp(`\\b(?:${MONTHS})\\.?\\s+\\d{4}\\b`, "i"),
];

const SALUTATION_RE = /^(?:dear|hello|hi|greetings|to whom it may concern)\b\s*(.*?)\s*[,:]?$/i;
const CLOSING_RE =
  /^(?:sincerely(?: yours)?|yours (?:truly|faithfully|sincerely)|(?:best|kind|warm|warmest)(?: regards| wishes)?|regards|respectfully(?: yours)?|cordially|thank you|thanks|with gratitude)\s*[,.!]?$/i;
const SIGNATURE_KEYWORD_RE = /\b(?:signature|signed|authorized signatory|witness)\b/i;
const SIGNATURE_BY_RE = /^(?:by|name|title|date)\s*:/i;
const SIGNATURE_RULE_RE = /_{4,}/;
const SLASH_S_RE = /\/s\//i;
const PHONE_RE = /(?:\+\d{1,3}[\s.-]?)?\(?\d{2,4}\)?[\s.-]?\d{3,4}[\s.-]?\d{3,4}\b/;
const EMAIL_RE = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const URL_RE = /\b(?:https?:\/\/|www\.)\S+|\b[\w-]+\.(?:com|org|net|io|dev)(?:\/\S*)?\b/i;
const KEY_VALUE_RE = /^([^:]{1,40}?)\s*:\s+(.+)$/;
const CAPTION_RE = /^((?:figure|fig\.|table|chart|exhibit|image|illustration)\s+(?:\d+(?:\.\d+)*[a-z]?|[ivxlc]+))\s*[.:\-]?/i;
const WARNING_RE = /\b(?:warning|caution|black box)\b|^(?:note|important)\s*:/i;
const QUOTE_RE = /^["'>]/;
const ATTRIBUTION_RE = /^-\s*\p{Lu}\p{L}+(?:\s+\p{Lu}\p{L}+)*$/u;
const MONO_RE = /[;{}]|`.*`/;
const GRID_BORDER_RE = /^[+\-|=]+$/;
const DELIMITER_RE = /[|;\t]/;

// ── Helpers ──────────────────────────────────────────────────

function clamp01(value: number): number {
  return Math.round(Math.max(0, Math.min(1, value)) * 10000) / 10000;
}

function result(
  role: DetectorId,
  score: number,
  fields: Record<string, string> = {}
): DetectionResult {
  return { role, confidence: clamp01(score), fields };
}

function hasStopword(text: string): boolean {
  return text.toLowerCase().split(" ").some((w) => STOPWORDS.has(w));
}

function isAllCapsLine(f: FeatureVector): boolean {
  return f.uppercaseRatio >= 0.8 && /\p{L}{2,}/u.test(f.textNorm);
}

function isTitleCaseLine(f: FeatureVector): boolean {
  return f.titlecaseRate >= 0.6;
}

function isRomanPrefix(prefix: string | null): boolean {
  return prefix !== null && /^\(?[ivxlcdm]+\)?[.)]$/i.test(prefix);
}

function isDecimalPrefix(prefix: string | null): boolean {
  return prefix !== null && /^\d/.test(prefix);
}

/** Title-case text after a numbering prefix, e.g. "2. Scope Of Work" */
function titleAfterNumber(f: FeatureVector): boolean {
  if (f.numberingPrefix === null) return false;
  const rest = f.textNorm.slice(f.textNorm.indexOf(f.numberingPrefix) + f.numberingPrefix.length).trim();
  const words = rest.split(" ").filter((w) => /\p{L}/u.test(w));
  return words.length > 0 && /^\p{Lu}/u.test(words[0]) && words.length <= 10;
}

function findDate(text: string): string | null {
  for (const pattern of DATE_RES) {
    const m = pattern.exec(text);
    if (m) return m[0];
  }
  return null;
}

function calloutForm(f: FeatureVector): "warning" | "quote" | "code" | null {
  if (f.text.startsWith("    ") || f.text.startsWith("\t")) return "code";
  if (WARNING_RE.test(f.textNorm) && f.tokenCount <= 40) return "warning";
  if (QUOTE_RE.test(f.textNorm) || ATTRIBUTION_RE.test(f.textNorm)) return "quote";
  if (MONO_RE.test(f.textNorm) && !f.endsWithPeriod) return "code";
  return null;
}

// ── Detectors ────────────────────────────────────────────────

/**
 * Document title.
 * Clues: title/heading-1 style, first position, large or larger-than-next font,
 * bold, centered, short.
 */
export const detectTitle: Detector = (f) => {
  if (f.isEmpty) return result("title", 0);
  let s = 0;
  if (f.headingLevel === 0) s += 0.45;
  else if (f.headingLevel === 1) s += 0.15;
  if (f.position === 0) s += 0.35;
  else if (f.position <= 2) s += 0.15;
  if (typeof f.fontSize === "number" && f.fontSize >= 18) s += 0.2;
  if (f.largerThanNext) s += 0.1;
  if (f.bold === true) s += 0.1;
  if (f.alignment === "center") s += 0.1;
  if (f.tokenCount <= 10) s += 0.15;
  if (f.endsWithPeriod) s -= 0.2;
  if (f.tokenCount > 15) s -= 0.3;
  if (f.startsWithBullet) s -= 0.3;
  return result("title", s);
};

/**
 * Section heading.
 * Clues: ALL CAPS, Title Case, trailing colon, decimal or roman numbering
 * followed by a title, heading style, bold, font >= 14pt, larger than the
 * previous unit, blank line before.
 * Counter-clues: bullet glyph, TOC leader dots, long or sentence-like text.
 */
export const detectHeading: Detector = (f) => {
  if (f.isEmpty) return result("heading", 0);
  let s = 0;
  const allCaps = isAllCapsLine(f);
  const titleCase = isTitleCaseLine(f);
  const decimal = isDecimalPrefix(f.numberingPrefix);
  const roman = isRomanPrefix(f.numberingPrefix);
  const titledNumber = titleAfterNumber(f);

  if (allCaps) s += 0.55;
  if (titleCase) s += 0.39;
  if (f.trailingColon) s += 0.25;
  if (decimal) s += 0.3;
  if (roman) s += 0.3;
  if (titledNumber) s += 0.39;

  if (decimal && titledNumber) s += 0.5;
  if (roman && titledNumber) s += 0.1;
  if (f.trailingColon && titleCase) s += 0.25;

  if (typeof f.headingLevel === "number" && f.headingLevel >= 1) s += 0.4;
  if (f.bold === true) s += 0.1;
  if (typeof f.fontSize === "number" && f.fontSize >= 14) s += 0.1;
  if (f.largerThanPrevious) s += 0.1;
  if (f.precededByEmpty) s += 0.05;

  if (f.startsWithBullet) s -= 0.3;
  if (f.hasLeaderDots) s -= 0.2;
  if (f.tokenCount > 12) s -= 0.3;
  if (f.endsWithPeriod && f.sentenceCount > 1) s -= 0.2;
  return result("heading", s);
};

/**
 * Body paragraph.
 * Clues: eight or more tokens, punctuation, final period, several sentences,
 * average token length >= 4, stopwords.
 * Counter-clues: all caps, bullet, TOC dots, fewer than five tokens, trailing
 * colon, digit or symbol heavy text, bold, large font, heading style, table cell.
 */
export const detectBody: Detector = (f) => {
  if (f.isEmpty) return result("body", 0);
  const s = f.textNorm;
  const words = s.split(" ");
  let score = 0;

  if (f.tokenCount >= 8) score += 0.4;
  if (/[.,;:!?]/.test(s)) score += 0.2;
  if (f.endsWithPeriod) score += 0.2;
  if ((s.match(/\./g) ?? []).length >= 2) score += 0.2;
  const avgTokenLength = words.reduce((n, w) => n + w.length, 0) / Math.max(1, words.length);
  if (avgTokenLength >= 4) score += 0.1;
  if (hasStopword(s)) score += 0.1;

  if (/^[^\p{Ll}]+$/u.test(s)) score -= 0.5;
  if (f.startsWithBullet) score -= 0.5;
  if (f.hasLeaderDots) score -= 0.5;
  if (f.tokenCount < 5) score -= 0.5;
  if (f.trailingColon) score -= 0.3;
  if (f.uppercaseRatio > 0.7) score -= 0.4;
  if (f.digitRatio > 0.5) score -= 0.4;
  if ([...s].filter((c) => "-=*#_".includes(c)).length / Math.max(1, s.length) > 0.3) score -= 0.3;
  if (f.bold === true) score -= 0.25;
  if (typeof f.fontSize === "number" && f.fontSize >= 14) score -= 0.33;
  if (typeof f.headingLevel === "number") score -= 0.4;
  if (f.inTable) score -= 0.2;
  return result("body", score);
};

/**
 * Bulleted list item.
 * Clues: bullet glyph, bullet list numbering, indentation, list neighbour.
 */
export const detectBulletItem: Detector = (f, window) => {
  if (f.isEmpty) return result("bullet-item", 0);
  let s = 0;
  if (f.startsWithBullet) s += 0.9;
  if (f.listKind === "bullet") s += 0.9;
  else if (f.listKind === "unknown") s += 0.4;
  if (f.indentLevel > 0) s += 0.15;
  const previous = window.before[0];
  if (previous !== undefined && (previous.startsWithBullet || previous.listKind === "bullet")) s += 0.1;
  if (f.numberingPrefix !== null && !f.startsWithBullet) s -= 0.3;
  return result("bullet-item", s);
};

/**
 * Numbered list item. Field: `marker`.
 * Clues: numbering prefix, ordered list numbering, sentence-like or longer
 * text, numbered neighbour.
 */
export const detectNumberedItem: Detector = (f, window) => {
  if (f.isEmpty) return result("numbered-item", 0);
  let s = 0;
  if (f.numberingPrefix !== null) s += 0.7;
  if (f.listKind === "ordered") s += 0.7;
  if (f.endsWithPeriod || f.tokenCount > 6) s += 0.2;
  const previous = window.before[0];
  if (previous !== undefined && (previous.numberingPrefix !== null || previous.listKind === "ordered")) s += 0.1;
  if (f.startsWithBullet) s -= 0.3;
  return result("numbered-item", s, { marker: f.numberingPrefix ?? "" });
};

/**
 * Table row or cell.
 * Clues: table membership, column delimiters, digit-heavy text, ASCII grid
 * border. Counter-clue: prose stopwords.
 */
export const detectTableRow: Detector = (f) => {
  if (f.isEmpty) return result("table-row", 0);
  let s = 0;
  if (f.inTable) s += 0.7;
  if (DELIMITER_RE.test(f.text)) s += 0.3;
  if (f.textNorm.split("|").length >= 3) s += 0.3;
  if (f.digitRatio > 0.3) s += 0.3;
  if (GRID_BORDER_RE.test(f.textNorm)) s += 0.9;
  if (hasStopword(f.textNorm)) s -= 0.3;
  return result("table-row", s);
};

/**
 * Contact details. Fields: `email`, `phone`, `url` when present.
 * Clues: email, phone number, URL, bar separators, near the top.
 */
export const detectContactLine: Detector = (f) => {
  if (f.isEmpty) return result("contact-line", 0);
  const fields: Record<string, string> = {};
  let s = 0;
  const email = EMAIL_RE.exec(f.textNorm);
  if (email) {
    s += 0.5;
    fields.email = email[0];
  }
  const textWithoutEmail = email ? f.textNorm.replace(email[0], " ") : f.textNorm;
  const phone = PHONE_RE.exec(textWithoutEmail);
  if (phone) {
    s += 0.4;
    fields.phone = phone[0].trim();
  }
  const url = URL_RE.exec(textWithoutEmail);
  if (url) {
    s += 0.3;
    fields.url = url[0];
  }
  if (f.containsBar) s += 0.15;
  if (f.relativePosition <= 0.2) s += 0.1;
  if (f.tokenCount > 20) s -= 0.3;
  return result("contact-line", s, fields);
};

/**
 * Date line. Field: `date`.
 * Clues: recognised date, short line, the date is the whole line, "Date:" label.
 */
export const detectDateLine: Detector = (f) => {
  const date = findDate(f.textNorm);
  if (date === null) return result("date-line", 0);
  let s = 0.6;
  if (f.tokenCount <= 6) s += 0.2;
  if (date === f.textNorm.replace(/[.,]$/, "")) s += 0.2;
  if (/^date\s*:/i.test(f.textNorm)) s += 0.1;
  if (f.tokenCount > 15) s -= 0.4;
  return result("date-line", s, { date });
};

/**
 * Letter salutation. Field: `recipient`.
 * Clues: greeting word, trailing comma or colon, short line.
 */
export const detectSalutation: Detector = (f) => {
  const m = SALUTATION_RE.exec(f.textNorm);
  if (!m) return result("salutation", 0);
  let s = 0.75;
  if (/[,:]$/.test(f.textNorm)) s += 0.15;
  if (f.tokenCount <= 6) s += 0.1;
  return result("salutation", s, { recipient: m[1] });
};

/**
 * Complimentary close.
 * Clues: closing phrase, trailing comma, short line, late in the document.
 */
export const detectClosing: Detector = (f) => {
  if (!CLOSING_RE.test(f.textNorm)) return result("closing", 0);
  let s = 0.75;
  if (f.textNorm.endsWith(",")) s += 0.15;
  if (f.tokenCount <= 4) s += 0.1;
  if (f.relativePosition >= 0.5) s += 0.05;
  return result("closing", s);
};

/**
 * Signature block line.
 * Clues: signature rule, signature keyword, "/s/" mark, "By:"/"Name:" label,
 * late in the document, short line.
 */
export const detectSignatureBlock: Detector = (f) => {
  if (f.isEmpty) return result("signature-block", 0);
  let s = 0;
  if (SIGNATURE_RULE_RE.test(f.textNorm)) s += 0.5;
  if (SIGNATURE_KEYWORD_RE.test(f.textNorm)) s += 0.4;
  if (SLASH_S_RE.test(f.textNorm)) s += 0.4;
  if (SIGNATURE_BY_RE.test(f.textNorm)) s += 0.3;
  if (f.relativePosition >= 0.7) s += 0.1;
  if (f.tokenCount <= 8) s += 0.1;
  if (f.tokenCount > 20) s -= 0.4;
  return result("signature-block", s);
};

/**
 * Labelled field, e.g. "Subject: Budget". Fields: `key`, `value`.
 * Clues: "Key: value" shape, short key, short value.
 */
export const detectKeyValue: Detector = (f) => {
  const m = KEY_VALUE_RE.exec(f.textNorm);
  if (!m) return result("key-value", 0);
  const key = m[1].trim();
  const value = m[2].trim();
  let s = 0.6;
  if (key.split(" ").length <= 3) s += 0.2;
  if (value.split(" ").length <= 12) s += 0.1;
  if (/^https?$/i.test(key)) s -= 0.6;
  return result("key-value", s, { key, value });
};

/**
 * Call-out block (warning, quotation or code). Field: `form`.
 * A recognised form scores a fixed 0.9.
 */
export const detectCallout: Detector = (f) => {
  if (f.isEmpty) return result("callout", 0);
  const form = calloutForm(f);
  return form === null ? result("callout", 0) : result("callout", 0.9, { form });
};

/**
 * Figure or table caption. Field: `label`.
 * Clues: "Figure 1"-style label, italic, centered, short text.
 */
export const detectCaption: Detector = (f) => {
  const m = CAPTION_RE.exec(f.textNorm);
  if (!m) return result("caption", 0);
  let s = 0.7;
  if (f.italic === true) s += 0.1;
  if (f.alignment === "center") s += 0.1;
  if (f.tokenCount <= 20) s += 0.1;
  return result("caption", s, { label: m[1] });
};

// ── Registry ─────────────────────────────────────────────────

export const DETECTORS: Record<DetectorId, Detector> = {
  "title": detectTitle,
  "heading": detectHeading,
  "body": detectBody,
  "bullet-item": detectBulletItem,
  "numbered-item": detectNumberedItem,
  "table-row": detectTableRow,
  "contact-line": detectContactLine,
  "date-line": detectDateLine,
  "salutation": detectSalutation,
  "closing": detectClosing,
  "signature-block": detectSignatureBlock,
  "key-value": detectKeyValue,
  "callout": detectCallout,
  "caption": detectCaption,
};

export const DETECTOR_IDS = Object.keys(DETECTORS).filter(isDetectorId);

export function isDetectorId(value: string): value is DetectorId {
  return Object.prototype.hasOwnProperty.call(DETECTORS, value);
}

/** Run every detector over one unit */
export function detectAll(
  features: FeatureVector,
  window: ContextWindow<FeatureVector>
): DetectionResult[] {
  return DETECTOR_IDS.map((id) => DETECTORS[id](features, window));
}
