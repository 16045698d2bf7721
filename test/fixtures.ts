// ─────────────────────────────────────────────────────────────
// Test Fixtures — Hand-built units, trees, tables and schemas
// ─────────────────────────────────────────────────────────────

import {
  DocumentTree,
  FeatureVector,
  Schema,
  SchemaSlot,
  StructuralUnit,
  StyleMetadata,
  Cardinality,
  DetectorId,
} from "../schema/templateSchema";
import { extractFeatureSequence } from "../parser/featureExtractor";
import { ConfidenceTable } from "../parser/domainPacks";

export type UnitSpec = string | { text: string; style?: StyleMetadata; kind?: StructuralUnit["kind"] };

export function units(specs: UnitSpec[]): StructuralUnit[] {
  return specs.map((spec, index) =>
    typeof spec === "string"
      ? { index, kind: "paragraph", text: spec, style: {} }
      : { index, kind: spec.kind ?? "paragraph", text: spec.text, style: spec.style ?? {} }
  );
}

export function tree(specs: UnitSpec[], title: string = "Fixture"): DocumentTree {
  const list = units(specs);
  return {
    metadata: {
      title,
      format: "docx",
      sourceFile: "fixture.docx",
      unitCount: list.length,
      ingestedAt: "2025-01-01T00:00:00.000Z",
    },
    units: list,
  };
}

export function features(specs: UnitSpec[]): FeatureVector[] {
  return extractFeatureSequence(units(specs));
}

/** Confidence table from explicit per-role confidences */
export function table(pack: string, byRole: Record<string, number[]>): ConfidenceTable {
  const unitCount = Math.max(0, ...Object.values(byRole).map((v) => v.length));
  return { pack, unitCount, byRole, detections: [] };
}

interface SlotSpec {
  role: string;
  detector: DetectorId;
  cardinality: Cardinality;
  style?: StyleMetadata;
}

export function schema(domain: string, specs: SlotSpec[]): Schema {
  const slots: SchemaSlot[] = specs.map((spec, ordinal) => ({
    id: `slot-${ordinal + 1}`,
    role: spec.role,
    detector: spec.detector,
    cardinality: spec.cardinality,
    required: spec.cardinality !== "optional",
    realizedCount: 1,
    unitIndices: [ordinal],
    confidence: 0.9,
    style: spec.style ?? {},
    placeholder: `{{slot-${ordinal + 1}:${spec.role}}}`,
    ordinal,
  }));
  return {
    version: "1.0",
    domain,
    confidence: 0.8,
    source: { title: "Fixture", format: "docx" },
    slots,
    diagnostics: [],
  };
}
