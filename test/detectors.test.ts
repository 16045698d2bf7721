import { test } from "node:test";
import { strict as assert } from "assert";
import {
  DETECTOR_IDS,
  detectAll,
  detectBody,
  detectBulletItem,
  detectCallout,
  detectCaption,
  detectClosing,
  detectContactLine,
  detectDateLine,
  detectHeading,
  detectKeyValue,
  detectNumberedItem,
  detectSalutation,
  detectSignatureBlock,
  detectTableRow,
  detectTitle,
  isDetectorId,
} from "../parser/detectors";
import { contextWindow } from "../parser/featureExtractor";
import { Detector, StyleMetadata } from "../schema/templateSchema";
import { features, UnitSpec } from "./fixtures";

/** Run a detector on a one-unit document */
function score(detector: Detector, text: string, style: StyleMetadata = {}) {
  return scoreAt(detector, [{ text, style }], 0);
}

function scoreAt(detector: Detector, specs: UnitSpec[], i: number) {
  const fs = features(specs);
  return detector(fs[i], contextWindow(fs, i, 2));
}

// ── Title ────────────────────────────────────────────────────

test("title: styled first line saturates at 1", () => {
  const result = score(detectTitle, "Quarterly Review", {
    styleId: "Title",
    fontSize: 24,
    bold: true,
    alignment: "center",
  });
  assert.equal(result.confidence, 1);
});

test("title: each corroborating clue raises confidence", () => {
  assert.equal(score(detectTitle, "Quarterly Review").confidence, 0.5);
  assert.equal(score(detectTitle, "Quarterly Review", { bold: true }).confidence, 0.6);
  assert.equal(score(detectTitle, "Quarterly Review", { bold: true, alignment: "center" }).confidence, 0.7);
});

// ── Heading ──────────────────────────────────────────────────

test("heading: all caps line", () => {
  assert.equal(score(detectHeading, "WORK EXPERIENCE").confidence, 0.55);
  assert.equal(score(detectHeading, "WORK EXPERIENCE", { bold: true }).confidence, 0.65);
});

test("heading: a blank line before adds weight", () => {
  assert.equal(scoreAt(detectHeading, ["", "WORK EXPERIENCE"], 1).confidence, 0.6);
});

test("heading: numbered title-case section", () => {
  assert.equal(score(detectHeading, "2. Scope Of Work").confidence, 1);
});

test("heading: a bullet line is not a heading", () => {
  assert.equal(score(detectHeading, "- Led the team").confidence, 0);
});

// ── Body / lists / tables ────────────────────────────────────

test("body: a plain sentence scores full, bold and large fonts count against it", () => {
  const text = "The committee reviewed the annual budget and approved it.";
  assert.equal(score(detectBody, text).confidence, 1);
  assert.equal(score(detectBody, text, { bold: true }).confidence, 0.75);
  assert.equal(score(detectBody, text, { fontSize: 16 }).confidence, 0.67);
});

test("bullet-item: glyph alone and glyph with list numbering", () => {
  assert.equal(score(detectBulletItem, "• Shipped the new billing system").confidence, 0.9);
  assert.equal(
    score(detectBulletItem, "• Shipped", { list: { kind: "bullet", level: 0 } }).confidence,
    1
  );
});

test("numbered-item: reports its marker", () => {
  const result = score(detectNumberedItem, "1. Define the scope");
  assert.equal(result.confidence, 0.7);
  assert.deepEqual(result.fields, { marker: "1." });
});

test("table-row: cells and delimited lines", () => {
  assert.equal(scoreAt(detectTableRow, [{ text: "42", kind: "table-cell" }], 0).confidence, 1);
  assert.equal(score(detectTableRow, "Name | Role | Team").confidence, 0.6);
});

// ── Letter and contact lines ─────────────────────────────────

test("contact-line: extracts email and phone", () => {
  const result = score(detectContactLine, "jane.doe@example.com | 555-123-4567");
  assert.equal(result.confidence, 1);
  assert.deepEqual(result.fields, { email: "jane.doe@example.com", phone: "555-123-4567" });
});

test("date-line: extracts the date", () => {
  const whole = score(detectDateLine, "March 3, 2024");
  assert.equal(whole.confidence, 1);
  assert.deepEqual(whole.fields, { date: "March 3, 2024" });

  const labelled = score(detectDateLine, "Date: 2024-01-15");
  assert.equal(labelled.confidence, 0.9);
  assert.deepEqual(labelled.fields, { date: "2024-01-15" });
});

test("salutation: extracts the recipient", () => {
  const result = score(detectSalutation, "Dear Ms. Rivera,");
  assert.equal(result.confidence, 1);
  assert.deepEqual(result.fields, { recipient: "Ms. Rivera" });
});

test("closing: trailing comma adds weight", () => {
  assert.equal(score(detectClosing, "Sincerely,").confidence, 1);
  assert.equal(score(detectClosing, "Best regards").confidence, 0.85);
  assert.equal(score(detectClosing, "Best of luck with the launch").confidence, 0);
});

test("signature-block: rule and label", () => {
  assert.equal(score(detectSignatureBlock, "By: ____________").confidence, 0.9);
});

test("key-value: splits key and value", () => {
  const result = score(detectKeyValue, "Subject: Budget review");
  assert.equal(result.confidence, 0.9);
  assert.deepEqual(result.fields, { key: "Subject", value: "Budget review" });
  assert.equal(score(detectKeyValue, "https://example.com").confidence, 0);
});

// ── Call-outs and captions ───────────────────────────────────

test("callout: warning, code and plain prose", () => {
  const warning = score(detectCallout, "WARNING: Do not exceed the stated dose.");
  assert.equal(warning.confidence, 0.9);
  assert.deepEqual(warning.fields, { form: "warning" });

  assert.deepEqual(score(detectCallout, "    const x = 1;").fields, { form: "code" });
  assert.equal(score(detectCallout, "Note that the results vary.").confidence, 0);
});

test("caption: label and italic", () => {
  const plain = score(detectCaption, "Figure 2: Revenue by quarter");
  assert.equal(plain.confidence, 0.8);
  assert.deepEqual(plain.fields, { label: "Figure 2" });
  assert.equal(score(detectCaption, "Figure 2: Revenue by quarter", { italic: true }).confidence, 0.9);
});

// ── Registry ─────────────────────────────────────────────────

test("detectAll runs every detector in registry order", () => {
  const fs = features(["Plain"]);
  const results = detectAll(fs[0], contextWindow(fs, 0, 2));
  assert.equal(results.length, 14);
  assert.deepEqual(results.map((r) => r.role), DETECTOR_IDS);
});

test("an empty unit scores zero everywhere", () => {
  const fs = features([""]);
  for (const result of detectAll(fs[0], contextWindow(fs, 0, 2))) {
    assert.equal(result.confidence, 0, result.role);
  }
});

test("confidences stay within [0, 1]", () => {
  const fs = features([
    "JOHN SMITH",
    "john@example.com | (555) 010-2000 | www.example.dev",
    "EXPERIENCE:",
    "• Led a team of five engineers.",
    "1. Reviewed the contract; signed by both parties on March 3, 2024.",
  ]);
  fs.forEach((f, i) => {
    for (const result of detectAll(f, contextWindow(fs, i, 2))) {
      assert.ok(result.confidence >= 0 && result.confidence <= 1, `${result.role} at ${i}`);
    }
  });
});

test("isDetectorId", () => {
  assert.equal(isDetectorId("salutation"), true);
  assert.equal(isDetectorId("toString"), false);
  assert.equal(isDetectorId("footnote"), false);
});
