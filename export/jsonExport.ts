// ─────────────────────────────────────────────────────────────
// JSON Export — Schema persistence & run result output
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import {
  Alignment,
  Cardinality,
  InputFormat,
  RunResult,
  Schema,
  SchemaDiagnostic,
  SchemaSlot,
  StyleMetadata,
} from "../schema/templateSchema";
import { isDetectorId } from "../parser/detectors";
import { computeCanonicalFingerprint } from "../integrity/canonicalizer";

/** Raised when a persisted schema does not have the expected shape */
export class SchemaFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaFormatError";
  }
}

const CARDINALITIES: readonly Cardinality[] = ["exactly-one", "optional", "repeatable"];
const FORMATS: readonly InputFormat[] = ["docx", "html"];
const ALIGNMENTS: readonly Alignment[] = ["left", "center", "right", "justify"];

/**
 * Write a schema as pretty JSON, stamped with its canonical fingerprint.
 */
export async function exportSchema(
  schema: Schema,
  outputDir: string,
  options?: { filename?: string }
): Promise<string> {
  await fs.promises.mkdir(outputDir, { recursive: true });

  const baseName = options?.filename || sanitizeFilename(schema.source.title || schema.domain);
  const jsonPath = path.join(outputDir, `${baseName}.schema.json`);
  const fingerprint = computeCanonicalFingerprint(schema);

  const record = {
    ...schema,
    integrity: { canonicalHash: fingerprint.canonicalHash, merkleRoot: fingerprint.merkleRoot },
    exportedAt: new Date().toISOString(),
  };
  await fs.promises.writeFile(jsonPath, JSON.stringify(record, null, 2), "utf-8");
  console.log(`[EXPORT] Schema → ${jsonPath}`);
  return jsonPath;
}

/** Read and validate a schema file */
export function loadSchema(filePath: string): Schema {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Schema file not found: ${filePath}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new SchemaFormatError(
      `Schema file is not valid JSON: ${filePath} (${err instanceof Error ? err.message : String(err)})`
    );
  }
  return parseSchema(raw);
}

/**
 * Validate a parsed JSON value as a Schema.
 * An embedded integrity hash, when present, must match the content.
 */
export function parseSchema(raw: unknown): Schema {
  const obj = record(raw, "schema");
  const source = record(obj.source, "source");
  const format = source.format;
  if (!FORMATS.some((f) => f === format)) {
    throw new SchemaFormatError(`source.format must be one of ${FORMATS.join(", ")}`);
  }

  const schema: Schema = {
    version: str(obj.version, "version"),
    domain: str(obj.domain, "domain"),
    confidence: num(obj.confidence, "confidence"),
    source: {
      title: str(source.title, "source.title"),
      format: format === "docx" ? "docx" : "html",
    },
    slots: list(obj.slots, "slots").map((s, i) => parseSlot(s, `slots[${i}]`)),
    diagnostics: list(obj.diagnostics, "diagnostics").map((d, i) => parseDiagnostic(d, `diagnostics[${i}]`)),
  };
  if (source.path !== undefined) schema.source.path = str(source.path, "source.path");

  if (obj.integrity !== undefined) {
    const integrity = record(obj.integrity, "integrity");
    const expected = str(integrity.canonicalHash, "integrity.canonicalHash");
    const actual = computeCanonicalFingerprint(schema).canonicalHash;
    if (expected !== actual) {
      throw new SchemaFormatError(`Schema integrity hash mismatch (expected ${expected}, got ${actual})`);
    }
  }
  return schema;
}

/** Write rendered units and diagnostics as JSON */
export async function exportRunResult(
  result: RunResult,
  outputDir: string,
  options?: { filename?: string }
): Promise<string> {
  await fs.promises.mkdir(outputDir, { recursive: true });
  const baseName = options?.filename || sanitizeFilename(result.domain);
  const jsonPath = path.join(outputDir, `${baseName}.run.json`);
  await fs.promises.writeFile(jsonPath, JSON.stringify(result, null, 2), "utf-8");
  console.log(`[EXPORT] Run result → ${jsonPath}`);
  return jsonPath;
}

export function sanitizeFilename(name: string): string {
  const cleaned = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .substring(0, 80);
  return cleaned || "document";
}

// ── Validation helpers ───────────────────────────────────────

function parseSlot(raw: unknown, where: string): SchemaSlot {
  const obj = record(raw, where);
  const detector = str(obj.detector, `${where}.detector`);
  if (!isDetectorId(detector)) {
    throw new SchemaFormatError(`${where}.detector is unknown: ${detector}`);
  }
  const unitIndices = list(obj.unitIndices, `${where}.unitIndices`).map((n, i) =>
    int(n, `${where}.unitIndices[${i}]`)
  );
  return {
    id: str(obj.id, `${where}.id`),
    role: str(obj.role, `${where}.role`),
    detector,
    cardinality: cardinality(obj.cardinality, `${where}.cardinality`),
    required: bool(obj.required, `${where}.required`),
    realizedCount: int(obj.realizedCount, `${where}.realizedCount`),
    unitIndices,
    confidence: num(obj.confidence, `${where}.confidence`),
    style: parseStyle(obj.style, `${where}.style`),
    placeholder: str(obj.placeholder, `${where}.placeholder`),
    ordinal: int(obj.ordinal, `${where}.ordinal`),
  };
}

function parseDiagnostic(raw: unknown, where: string): SchemaDiagnostic {
  const obj = record(raw, where);
  if (obj.kind !== "missing-role") {
    throw new SchemaFormatError(`${where}.kind must be "missing-role"`);
  }
  return {
    kind: "missing-role",
    role: str(obj.role, `${where}.role`),
    cardinality: cardinality(obj.cardinality, `${where}.cardinality`),
  };
}

function parseStyle(raw: unknown, where: string): StyleMetadata {
  const obj = record(raw, where);
  const style: StyleMetadata = {};
  if (obj.styleId !== undefined) style.styleId = str(obj.styleId, `${where}.styleId`);
  if (obj.styleName !== undefined) style.styleName = str(obj.styleName, `${where}.styleName`);
  if (obj.fontFamily !== undefined) style.fontFamily = str(obj.fontFamily, `${where}.fontFamily`);
  if (obj.fontSize !== undefined) style.fontSize = num(obj.fontSize, `${where}.fontSize`);
  if (obj.bold !== undefined) style.bold = bool(obj.bold, `${where}.bold`);
  if (obj.italic !== undefined) style.italic = bool(obj.italic, `${where}.italic`);
  if (obj.underline !== undefined) style.underline = bool(obj.underline, `${where}.underline`);
  if (obj.color !== undefined) style.color = str(obj.color, `${where}.color`);
  if (obj.alignment !== undefined) {
    const alignment = ALIGNMENTS.find((a) => a === obj.alignment);
    if (!alignment) throw new SchemaFormatError(`${where}.alignment is invalid`);
    style.alignment = alignment;
  }
  if (obj.indentLevel !== undefined) style.indentLevel = int(obj.indentLevel, `${where}.indentLevel`);
  if (obj.list !== undefined) {
    const list = record(obj.list, `${where}.list`);
    const kind = list.kind;
    if (kind !== "bullet" && kind !== "ordered" && kind !== "unknown") {
      throw new SchemaFormatError(`${where}.list.kind is invalid`);
    }
    style.list = { kind, level: int(list.level, `${where}.list.level`) };
    if (list.numId !== undefined) style.list.numId = str(list.numId, `${where}.list.numId`);
  }
  if (obj.table !== undefined) {
    const table = record(obj.table, `${where}.table`);
    style.table = {
      tableIndex: int(table.tableIndex, `${where}.table.tableIndex`),
      row: int(table.row, `${where}.table.row`),
      column: int(table.column, `${where}.table.column`),
      rowCount: int(table.rowCount, `${where}.table.rowCount`),
      columnCount: int(table.columnCount, `${where}.table.columnCount`),
    };
  }
  return style;
}

function record(value: unknown, where: string): Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new SchemaFormatError(`${where} must be an object`);
  }
  return Object.fromEntries(Object.entries(value));
}

function list(value: unknown, where: string): unknown[] {
  if (!Array.isArray(value)) throw new SchemaFormatError(`${where} must be an array`);
  return value;
}

function str(value: unknown, where: string): string {
  if (typeof value !== "string") throw new SchemaFormatError(`${where} must be a string`);
  return value;
}

function num(value: unknown, where: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new SchemaFormatError(`${where} must be a number`);
  }
  return value;
}

function int(value: unknown, where: string): number {
  const n = num(value, where);
  if (!Number.isInteger(n)) throw new SchemaFormatError(`${where} must be an integer`);
  return n;
}

function bool(value: unknown, where: string): boolean {
  if (typeof value !== "boolean") throw new SchemaFormatError(`${where} must be a boolean`);
  return value;
}

function cardinality(value: unknown, where: string): Cardinality {
  const found = CARDINALITIES.find((c) => c === value);
  if (!found) throw new SchemaFormatError(`${where} must be one of ${CARDINALITIES.join(", ")}`);
  return found;
}
