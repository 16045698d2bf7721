// ─────────────────────────────────────────────────────────────
// Matcher — Assign units to the winning pack's roles in order
// ─────────────────────────────────────────────────────────────

import { DomainPack, PackRole } from "../schema/templateSchema";
import { EngineConfig, DEFAULT_ENGINE_CONFIG } from "../config/engineConfig";
import { ConfidenceTable, isRequired } from "./domainPacks";

export interface RoleMatch {
  unitIndex: number;
  role: string;
  confidence: number;
}

export interface MatchOutcome {
  matches: RoleMatch[];            // strictly increasing unitIndex
  missingRoles: string[];          // required roles without a candidate
}

type MatchConfig = Pick<EngineConfig, "minConfidence" | "adjacencyPenalty">;

interface Committed {
  role: PackRole;
  unitIndex: number;
  confidence: number;
}

/**
 * Walk the pack's roles in order and give each one unit.
 * A role may contest the unit held by the role just before it; the
 * strictly more confident one keeps it (ties keep the earlier role) and
 * the loser searches again on its own side of that unit.
 * Repeatable roles then claim further units up to the next match.
 */
export function match(
  table: ConfidenceTable,
  pack: DomainPack,
  config: MatchConfig = DEFAULT_ENGINE_CONFIG
): MatchOutcome {
  const search = new CandidateSearch(table, pack, config);
  const committed: Committed[] = [];
  const missing = new Set<string>();

  for (const role of pack.roles) {
    const prev = committed[committed.length - 1];
    const from = prev ? prev.unitIndex : 0;
    let candidate = search.best(role, from, table.unitCount);

    if (candidate && prev && candidate.unitIndex === prev.unitIndex) {
      if (candidate.confidence > prev.confidence) {
        // Later role wins; the earlier one retreats before the contested unit
        const before = committed[committed.length - 2];
        search.release(prev.unitIndex);
        const retreat = search.best(prev.role, before ? before.unitIndex + 1 : 0, prev.unitIndex);
        committed.pop();
        if (retreat) {
          commit(committed, search, prev.role, retreat);
        } else if (isRequired(prev.role)) {
          missing.add(prev.role.name);
        }
      } else {
        candidate = search.best(role, prev.unitIndex + 1, table.unitCount);
      }
    }

    if (candidate) {
      commit(committed, search, role, candidate);
    } else if (isRequired(role)) {
      missing.add(role.name);
    }
  }

  const matches: RoleMatch[] = committed.map((c) => ({
    unitIndex: c.unitIndex,
    role: c.role.name,
    confidence: c.confidence,
  }));

  committed.forEach((c, k) => {
    if (c.role.cardinality !== "repeatable") return;
    const limit = k + 1 < committed.length ? committed[k + 1].unitIndex : table.unitCount;
    for (let i = c.unitIndex + 1; i < limit; i++) {
      const confidence = search.extensionConfidence(c.role, i);
      if (confidence !== null) {
        search.hold(i, c.role.name);
        matches.push({ unitIndex: i, role: c.role.name, confidence });
      }
    }
  });

  matches.sort((a, b) => a.unitIndex - b.unitIndex);
  const matchedRoles = new Set(matches.map((m) => m.role));
  return {
    matches,
    missingRoles: pack.roles
      .filter((r) => missing.has(r.name) && !matchedRoles.has(r.name))
      .map((r) => r.name),
  };
}

// ── Helpers ──────────────────────────────────────────────────

function commit(
  committed: Committed[],
  search: CandidateSearch,
  role: PackRole,
  candidate: { unitIndex: number; confidence: number }
): void {
  search.hold(candidate.unitIndex, role.name);
  committed.push({ role, unitIndex: candidate.unitIndex, confidence: candidate.confidence });
}

/** Candidate lookup over the confidence table with held units and adjacency */
class CandidateSearch {
  private readonly held = new Map<number, string>();

  constructor(
    private readonly table: ConfidenceTable,
    private readonly pack: DomainPack,
    private readonly config: MatchConfig
  ) {}

  hold(unitIndex: number, role: string): void {
    this.held.set(unitIndex, role);
  }

  release(unitIndex: number): void {
    this.held.delete(unitIndex);
  }

  /**
   * Best unit for `role` in [from, to). The unit held by the role's
   * predecessor at `from` stays eligible so it can be contested.
   */
  best(role: PackRole, from: number, to: number): { unitIndex: number; confidence: number } | null {
    let best: { unitIndex: number; confidence: number } | null = null;
    for (let i = Math.max(0, from); i < to; i++) {
      if (i !== from && this.held.has(i)) continue;
      const confidence = this.effectiveConfidence(role, i);
      if (confidence < this.config.minConfidence) continue;
      if (best === null || confidence > best.confidence) best = { unitIndex: i, confidence };
    }
    return best;
  }

  /** Confidence for claiming an extra unit, or null when another role outscores it */
  extensionConfidence(role: PackRole, unitIndex: number): number | null {
    if (this.held.has(unitIndex)) return null;
    const own = this.raw(role.name, unitIndex);
    if (own < this.config.minConfidence) return null;
    for (const other of this.pack.roles) {
      if (other.name !== role.name && this.raw(other.name, unitIndex) > own) return null;
    }
    return own;
  }

  private effectiveConfidence(role: PackRole, unitIndex: number): number {
    const base = this.raw(role.name, unitIndex);
    const previousRole = this.held.get(unitIndex - 1);
    if (previousRole === undefined || previousRole === role.name) return base;
    const allowed = this.pack.adjacency[previousRole];
    if (allowed === undefined || allowed.includes(role.name)) return base;
    return Math.round(base * this.config.adjacencyPenalty * 10000) / 10000;
  }

  private raw(role: string, unitIndex: number): number {
    return this.table.byRole[role]?.[unitIndex] ?? 0;
  }
}
