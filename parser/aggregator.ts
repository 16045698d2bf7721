// ─────────────────────────────────────────────────────────────
// Aggregator — Merge role matches into the final Schema
// ─────────────────────────────────────────────────────────────

import {
  DomainPack,
  Schema,
  SchemaDiagnostic,
  SchemaSlot,
  SchemaSource,
  StructuralUnit,
} from "../schema/templateSchema";
import { isRequired } from "./domainPacks";
import { RoleMatch } from "./matcher";

export const SCHEMA_VERSION = "1.0";

/**
 * Fatal: the match list breaks an ordering or cardinality invariant.
 * This signals a pipeline defect, never bad input.
 */
export class SchemaIntegrityError extends Error {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(`Schema integrity violated:\n  - ${violations.join("\n  - ")}`);
    this.name = "SchemaIntegrityError";
    this.violations = violations;
  }
}

export interface AggregateContext {
  confidence: number;              // domain score
  source: SchemaSource;
}

/**
 * Build the schema from ordered matches.
 * Consecutive matches of a repeatable role share one slot; styles are
 * copied verbatim from each slot's first unit.
 */
export function aggregate(
  matches: readonly RoleMatch[],
  units: readonly StructuralUnit[],
  pack: DomainPack,
  context: AggregateContext
): Schema {
  const violations = validateMatches(matches, units, pack);
  if (violations.length > 0) throw new SchemaIntegrityError(violations);

  const unitByIndex = new Map(units.map((u) => [u.index, u]));
  const roleByName = new Map(pack.roles.map((r) => [r.name, r]));
  const groups: RoleMatch[][] = [];

  for (const m of matches) {
    const current = groups[groups.length - 1];
    const repeatable = roleByName.get(m.role)?.cardinality === "repeatable";
    if (current && repeatable && current[0].role === m.role) {
      current.push(m);
    } else {
      groups.push([m]);
    }
  }

  const slots: SchemaSlot[] = [];
  groups.forEach((group, ordinal) => {
    const role = roleByName.get(group[0].role);
    const first = unitByIndex.get(group[0].unitIndex);
    if (!role || !first) return;
    const id = `slot-${ordinal + 1}`;
    slots.push({
      id,
      role: role.name,
      detector: role.detector,
      cardinality: role.cardinality,
      required: isRequired(role),
      realizedCount: group.length,
      unitIndices: group.map((m) => m.unitIndex),
      confidence: round4(group.reduce((n, m) => n + m.confidence, 0) / group.length),
      style: structuredClone(first.style),
      placeholder: `{{${id}:${role.name}}}`,
      ordinal,
    });
  });

  const slotViolations = validateSlots(slots);
  if (slotViolations.length > 0) throw new SchemaIntegrityError(slotViolations);

  const present = new Set(slots.map((s) => s.role));
  const diagnostics: SchemaDiagnostic[] = pack.roles
    .filter((r) => isRequired(r) && !present.has(r.name))
    .map((r) => ({ kind: "missing-role", role: r.name, cardinality: r.cardinality }));

  return {
    version: SCHEMA_VERSION,
    domain: pack.name,
    confidence: round4(context.confidence),
    source: { ...context.source },
    slots,
    diagnostics,
  };
}

// ── Validation ───────────────────────────────────────────────

function validateMatches(
  matches: readonly RoleMatch[],
  units: readonly StructuralUnit[],
  pack: DomainPack
): string[] {
  const violations: string[] = [];
  const known = new Set(units.map((u) => u.index));
  const packIndex = new Map(pack.roles.map((r, i) => [r.name, i]));
  const exactlyOneSeen = new Set<string>();
  let lastUnit = -Infinity;
  let lastRequired = -1;

  for (const m of matches) {
    if (m.unitIndex <= lastUnit) {
      violations.push(`unit index ${m.unitIndex} does not follow ${lastUnit}`);
    }
    lastUnit = m.unitIndex;
    if (!known.has(m.unitIndex)) {
      violations.push(`unit index ${m.unitIndex} is not in the document`);
    }

    const position = packIndex.get(m.role);
    if (position === undefined) {
      violations.push(`role "${m.role}" is not part of pack "${pack.name}"`);
      continue;
    }
    const role = pack.roles[position];
    if (role.cardinality === "exactly-one") {
      if (exactlyOneSeen.has(role.name)) {
        violations.push(`exactly-one role "${role.name}" matched more than once`);
      }
      exactlyOneSeen.add(role.name);
    }
    if (isRequired(role)) {
      if (position < lastRequired) {
        violations.push(`required role "${role.name}" appears out of pack order`);
      }
      lastRequired = Math.max(lastRequired, position);
    }
  }
  return violations;
}

function validateSlots(slots: readonly SchemaSlot[]): string[] {
  const violations: string[] = [];
  for (let i = 1; i < slots.length; i++) {
    if (slots[i].ordinal <= slots[i - 1].ordinal) {
      violations.push(`slot ${slots[i].id} ordinal ${slots[i].ordinal} is not increasing`);
    }
  }
  return violations;
}

function round4(n: number): number {
  return Math.round(n * 10000) / 10000;
}
