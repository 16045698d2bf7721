import { test } from "node:test";
import { strict as assert } from "assert";
import { levenshtein, normalizeLine, normalizeKey, stringSimilarity, tokenize } from "../parser/textNormalizer";

// ── normalizeLine ────────────────────────────────────────────

test("normalizeLine folds exotic spaces and drops invisible marks", () => {
  assert.equal(normalizeLine("  Hello\u00A0\u00A0world\u200B  "), "Hello world");
});

test("normalizeLine maps dashes, quotes and bullets to one form", () => {
  assert.equal(normalizeLine("2019\u20132021"), "2019-2021");
  assert.equal(normalizeLine("\u201Cquoted\u201D and \u2018single\u2019"), "\"quoted\" and 'single'");
  assert.equal(normalizeLine("\u25CF item"), "\u2022 item");
});

test("normalizeLine applies NFKC compatibility folding", () => {
  assert.equal(normalizeLine("\uFB01le"), "file");
});

test("normalizeLine collapses tab and space runs", () => {
  assert.equal(normalizeLine("a \t  b\t\tc"), "a b c");
});

// ── normalizeKey / tokenize ──────────────────────────────────

test("normalizeKey upper-cases and strips punctuation", () => {
  assert.equal(normalizeKey("Work Experience:"), "WORK EXPERIENCE");
  assert.equal(normalizeKey("  re:  budget-2025 "), "RE BUDGET 2025");
});

test("tokenize splits on single spaces and keeps punctuation attached", () => {
  assert.deepEqual(tokenize(""), []);
  assert.deepEqual(tokenize("Dear Ms. Rivera,"), ["Dear", "Ms.", "Rivera,"]);
});

// ── Similarity ───────────────────────────────────────────────

test("levenshtein counts single-character edits", () => {
  assert.equal(levenshtein("KITTEN", "SITTING"), 3);
  assert.equal(levenshtein("", "ABC"), 3);
});

test("stringSimilarity scales edit distance by the longer string", () => {
  assert.equal(stringSimilarity("SKILLS", "SKILLS"), 1);
  assert.equal(stringSimilarity("SKILL", "SKILLS"), 1 - 1 / 6);
  assert.equal(stringSimilarity("", "SKILLS"), 0);
});
