// ─────────────────────────────────────────────────────────────
// Domain Packs — Registry of document domains and their roles
// ─────────────────────────────────────────────────────────────

import {
  Cardinality,
  ContextWindow,
  DetectionResult,
  DetectorId,
  DomainEvidence,
  DomainPack,
  FeatureVector,
  PackRole,
} from "../schema/templateSchema";
import { EngineConfig, DEFAULT_ENGINE_CONFIG } from "../config/engineConfig";
import { DETECTORS, isDetectorId } from "./detectors";
import { contextWindow } from "./featureExtractor";
import { normalizeKey, stringSimilarity } from "./textNormalizer";
import packDefinitions from "../config/domainPacks.json";

const CARDINALITIES: readonly Cardinality[] = ["exactly-one", "optional", "repeatable"];
const DEFAULT_PRIORITY = 100;
const EVIDENCE_FIELDS: readonly string[] = ["headings", "fuzzyHeadings", "keywords", "regexes", "stopwords"];

/** Evidence contributions before scaling by the cue boost */
export const EVIDENCE_WEIGHTS = {
  heading: 1,
  fuzzyHeading: 0.6,               // times the similarity ratio
  regex: 0.5,
  keyword: 0.1,
  keywordCap: 0.4,
  stopword: 0.3,
} as const;

export const FUZZY_HEADING_RATIO = 0.82;

export const NO_EVIDENCE: DomainEvidence = {
  headings: [],
  fuzzyHeadings: [],
  keywords: [],
  regexes: [],
  stopwords: [],
};

/** Raised when pack definitions are malformed. Carries every issue found. */
export class DomainPackConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid domain pack configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "DomainPackConfigError";
    this.issues = issues;
  }
}

/** Per-role, per-unit confidences of one pack over one document */
export interface ConfidenceTable {
  pack: string;
  unitCount: number;
  byRole: Record<string, number[]>;
  detections: DetectionResult[][];   // per unit, one result per detector the pack uses
}

export function isRequired(role: PackRole): boolean {
  return role.cardinality !== "optional";
}

// ── Loading & validation ─────────────────────────────────────

/**
 * Validate raw definitions (typically parsed JSON) and build packs.
 * Throws DomainPackConfigError listing every problem.
 */
export function loadDomainPacks(definitions: unknown): DomainPack[] {
  const issues: string[] = [];
  if (!Array.isArray(definitions)) {
    throw new DomainPackConfigError(["definitions must be an array of packs"]);
  }

  const packs: DomainPack[] = [];
  const packNames = new Set<string>();

  definitions.forEach((raw: unknown, i: number) => {
    const where = `pack[${i}]`;
    if (!isRecord(raw)) {
      issues.push(`${where} must be an object`);
      return;
    }
    const name = typeof raw.name === "string" ? raw.name.trim() : "";
    if (!name) {
      issues.push(`${where}.name must be a non-empty string`);
      return;
    }
    if (packNames.has(name)) issues.push(`duplicate pack name "${name}"`);
    packNames.add(name);

    const roles = parseRoles(raw.roles, name, issues);
    const roleNames = new Set(roles.map((r) => r.name));
    if (roles.length > 0 && !roles.some(isRequired)) {
      issues.push(`pack "${name}" needs at least one required role`);
    }

    const priority = raw.priority === undefined ? DEFAULT_PRIORITY : raw.priority;
    if (typeof priority !== "number" || !Number.isFinite(priority)) {
      issues.push(`pack "${name}" priority must be a number`);
    }

    packs.push({
      name,
      description: typeof raw.description === "string" ? raw.description : "",
      priority: typeof priority === "number" ? priority : DEFAULT_PRIORITY,
      roles,
      adjacency: parseAdjacency(raw.adjacency, name, roleNames, issues),
      evidence: parseEvidence(raw.evidence, name, issues),
    });
  });

  if (issues.length > 0) throw new DomainPackConfigError(issues);
  return packs;
}

let registry: ReadonlyMap<string, DomainPack> | null = null;

/** Built-in packs from config/domainPacks.json, loaded once, in file order */
export function getDomainPackRegistry(): ReadonlyMap<string, DomainPack> {
  if (registry === null) {
    registry = new Map(loadDomainPacks(packDefinitions).map((p) => [p.name, p]));
  }
  return registry;
}

export function getDomainPack(name: string): DomainPack {
  const pack = getDomainPackRegistry().get(name);
  if (!pack) {
    const available = [...getDomainPackRegistry().keys()].join(", ");
    throw new Error(`Unknown domain pack: ${name} (available: ${available})`);
  }
  return pack;
}

// ── Evaluation ───────────────────────────────────────────────

/**
 * Confidence that a unit plays `role`: the role's detector score, plus the
 * cue boost when the unit's text contains one of the role's cues, plus the
 * pack's evidence score scaled by the cue boost. Units the detector rejects
 * stay at 0.
 */
export function evaluateRole(
  role: PackRole,
  features: FeatureVector,
  window: ContextWindow<FeatureVector>,
  config: Pick<EngineConfig, "cueBoost"> = DEFAULT_ENGINE_CONFIG,
  evidence: DomainEvidence = NO_EVIDENCE
): number {
  const base = DETECTORS[role.detector](features, window).confidence;
  return applyBoosts(base, role, features, evidence, config.cueBoost);
}

/**
 * Domain evidence carried by one line of text.
 * Whole or near heading matches count only for title and heading roles;
 * keywords add up to a cap; any stopword subtracts.
 */
export function evidenceScore(text: string, evidence: DomainEvidence, headingRole: boolean): number {
  const key = normalizeKey(text);
  const padded = ` ${key} `;
  let score = 0;

  if (headingRole && key.length > 0) {
    if (evidence.headings.includes(key)) {
      score += EVIDENCE_WEIGHTS.heading;
    } else {
      const ratio = Math.max(
        0,
        ...[...evidence.headings, ...evidence.fuzzyHeadings].map((h) => stringSimilarity(key, h))
      );
      if (ratio >= FUZZY_HEADING_RATIO) score += EVIDENCE_WEIGHTS.fuzzyHeading * ratio;
    }
  }
  if (evidence.regexes.some((re) => re.test(text))) score += EVIDENCE_WEIGHTS.regex;

  const hits = evidence.keywords.filter((k) => padded.includes(` ${k} `)).length;
  score += Math.min(EVIDENCE_WEIGHTS.keywordCap, hits * EVIDENCE_WEIGHTS.keyword);
  if (evidence.stopwords.some((w) => padded.includes(` ${w} `))) score -= EVIDENCE_WEIGHTS.stopword;

  return round4(score);
}

/** Score every role of `pack` against every unit */
export function buildConfidenceTable(
  features: readonly FeatureVector[],
  pack: DomainPack,
  config: Pick<EngineConfig, "cueBoost" | "contextRadius"> = DEFAULT_ENGINE_CONFIG
): ConfidenceTable {
  const detectorIds: DetectorId[] = [...new Set(pack.roles.map((r) => r.detector))];
  const byRole: Record<string, number[]> = {};
  for (const role of pack.roles) byRole[role.name] = [];
  const detections: DetectionResult[][] = [];

  features.forEach((f, i) => {
    const window = contextWindow(features, i, config.contextRadius);
    const results = new Map<DetectorId, DetectionResult>();
    for (const id of detectorIds) results.set(id, DETECTORS[id](f, window));
    detections.push([...results.values()]);

    for (const role of pack.roles) {
      const base = results.get(role.detector)?.confidence ?? 0;
      byRole[role.name].push(applyBoosts(base, role, f, pack.evidence, config.cueBoost));
    }
  });

  return { pack: pack.name, unitCount: features.length, byRole, detections };
}

// ── Helpers ──────────────────────────────────────────────────

function applyBoosts(
  base: number,
  role: PackRole,
  f: FeatureVector,
  evidence: DomainEvidence,
  boost: number
): number {
  if (base <= 0) return base;
  const key = ` ${normalizeKey(f.textNorm)} `;
  let bonus = role.cues.some((cue) => key.includes(` ${cue} `)) ? boost : 0;
  const headingRole = role.detector === "title" || role.detector === "heading";
  bonus += boost * Math.max(-1, Math.min(1, evidenceScore(f.textNorm, evidence, headingRole)));
  return bonus === 0 ? base : round4(Math.max(0, Math.min(1, base + bonus)));
}

function round4(value: number): number {
  return Math.round(value * 10000) / 10000;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCardinality(value: unknown): value is Cardinality {
  return CARDINALITIES.some((c) => c === value);
}

function parseRoles(raw: unknown, pack: string, issues: string[]): PackRole[] {
  if (!Array.isArray(raw) || raw.length === 0) {
    issues.push(`pack "${pack}" must declare a non-empty roles array`);
    return [];
  }
  const roles: PackRole[] = [];
  const seen = new Set<string>();

  raw.forEach((entry: unknown, i: number) => {
    const where = `pack "${pack}" role[${i}]`;
    if (!isRecord(entry)) {
      issues.push(`${where} must be an object`);
      return;
    }
    const name = typeof entry.name === "string" ? entry.name.trim() : "";
    if (!name) {
      issues.push(`${where}.name must be a non-empty string`);
      return;
    }
    if (seen.has(name)) issues.push(`pack "${pack}" declares role "${name}" twice`);
    seen.add(name);

    const detector = entry.detector;
    if (typeof detector !== "string" || !isDetectorId(detector)) {
      issues.push(`${where} has unknown detector "${String(detector)}"`);
      return;
    }
    const cardinality = entry.cardinality;
    if (!isCardinality(cardinality)) {
      issues.push(`${where} has invalid cardinality "${String(cardinality)}"`);
      return;
    }
    const weight = entry.weight === undefined ? 1 : entry.weight;
    if (typeof weight !== "number" || !(weight > 0)) {
      issues.push(`${where} weight must be a positive number`);
      return;
    }
    const cues = entry.cues === undefined ? [] : entry.cues;
    if (!Array.isArray(cues) || !cues.every((c): c is string => typeof c === "string")) {
      issues.push(`${where} cues must be an array of strings`);
      return;
    }

    roles.push({
      name,
      detector,
      cardinality,
      weight,
      cues: cues.map(normalizeKey).filter((c) => c.length > 0),
    });
  });
  return roles;
}

function parseAdjacency(
  raw: unknown,
  pack: string,
  roleNames: ReadonlySet<string>,
  issues: string[]
): Record<string, string[]> {
  const adjacency: Record<string, string[]> = {};
  if (raw === undefined) return adjacency;
  if (!isRecord(raw)) {
    issues.push(`pack "${pack}" adjacency must be an object`);
    return adjacency;
  }
  for (const [from, followers] of Object.entries(raw)) {
    if (!roleNames.has(from)) {
      issues.push(`pack "${pack}" adjacency names unknown role "${from}"`);
      continue;
    }
    if (!Array.isArray(followers) || !followers.every((r): r is string => typeof r === "string")) {
      issues.push(`pack "${pack}" adjacency of "${from}" must be an array of role names`);
      continue;
    }
    for (const to of followers) {
      if (!roleNames.has(to)) issues.push(`pack "${pack}" adjacency of "${from}" names unknown role "${to}"`);
    }
    adjacency[from] = [...followers];
  }
  return adjacency;
}

function parseEvidence(raw: unknown, pack: string, issues: string[]): DomainEvidence {
  if (raw === undefined) return { ...NO_EVIDENCE };
  if (!isRecord(raw)) {
    issues.push(`pack "${pack}" evidence must be an object`);
    return { ...NO_EVIDENCE };
  }
  const fields: Record<string, unknown> = raw;
  for (const field of Object.keys(fields)) {
    if (!EVIDENCE_FIELDS.includes(field)) issues.push(`pack "${pack}" evidence has unknown field "${field}"`);
  }

  const terms = (field: string): string[] => {
    const value = fields[field];
    if (value === undefined) return [];
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
      issues.push(`pack "${pack}" evidence.${field} must be an array of strings`);
      return [];
    }
    return value;
  };
  const keys = (field: string) => terms(field).map(normalizeKey).filter((k) => k.length > 0);

  const regexes: RegExp[] = [];
  for (const pattern of terms("regexes")) {
    try {
      regexes.push(new RegExp(pattern, "i"));
    } catch (err) {
      issues.push(
        `pack "${pack}" evidence regex "${pattern}" is invalid (${err instanceof Error ? err.message : String(err)})`
      );
    }
  }

  return {
    headings: keys("headings"),
    fuzzyHeadings: keys("fuzzyHeadings"),
    keywords: keys("keywords"),
    regexes,
    stopwords: keys("stopwords"),
  };
}
