// ─────────────────────────────────────────────────────────────
// Domain Scorer — Rank domain packs against a feature sequence
// ─────────────────────────────────────────────────────────────

import { DomainPack, FeatureVector } from "../schema/templateSchema";
import { EngineConfig, DEFAULT_ENGINE_CONFIG } from "../config/engineConfig";
import { ConfidenceTable, buildConfidenceTable, isRequired } from "./domainPacks";

/** Best unit found for one required role */
export interface RoleHit {
  role: string;
  unitIndex: number | null;        // null when missing
  confidence: number;
}

export interface PackScore {
  domain: string;
  score: number;
  missingRoles: string[];
  roleHits: RoleHit[];
  priority: number;
}

export type DomainSelection =
  | {
      status: "selected";
      domain: string;
      score: number;
      ranking: PackScore[];
      proposals: PackScore[];
      table: ConfidenceTable;
    }
  | {
      status: "no-confident-domain";
      ranking: PackScore[];
      proposals: PackScore[];
    };

type ScoringConfig = Pick<EngineConfig, "minConfidence" | "missingRolePenalty">;

/**
 * Score one pack: greedy monotonic walk over the required roles.
 * Each role takes its best unit strictly after the previous hit
 * (ties go to the earlier unit). Hits below minConfidence are missing.
 */
export function scorePack(
  table: ConfidenceTable,
  pack: DomainPack,
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG
): PackScore {
  const roleHits: RoleHit[] = [];
  const missingRoles: string[] = [];
  let cursor = -1;
  let weighted = 0;
  let totalWeight = 0;

  for (const role of pack.roles.filter(isRequired)) {
    totalWeight += role.weight;
    const confidences = table.byRole[role.name] ?? [];

    let best = -1;
    let bestConfidence = -1;
    for (let i = cursor + 1; i < confidences.length; i++) {
      if (confidences[i] > bestConfidence) {
        best = i;
        bestConfidence = confidences[i];
      }
    }

    if (best === -1 || bestConfidence < config.minConfidence) {
      missingRoles.push(role.name);
      roleHits.push({ role: role.name, unitIndex: null, confidence: Math.max(0, bestConfidence) });
      continue;
    }
    weighted += role.weight * bestConfidence;
    cursor = best;
    roleHits.push({ role: role.name, unitIndex: best, confidence: bestConfidence });
  }

  const mean = totalWeight > 0 ? weighted / totalWeight : 0;
  const score = clamp01(mean - missingRoles.length * config.missingRolePenalty);

  return { domain: pack.name, score, missingRoles, roleHits, priority: pack.priority };
}

/**
 * Order independently computed pack scores.
 * Score desc, then fewer missing roles, then priority asc, then input order.
 */
export function rankScores(scores: readonly PackScore[]): PackScore[] {
  return scores
    .map((score, order) => ({ score, order }))
    .sort(
      (a, b) =>
        b.score.score - a.score.score ||
        a.score.missingRoles.length - b.score.missingRoles.length ||
        a.score.priority - b.score.priority ||
        a.order - b.order
    )
    .map((entry) => entry.score);
}

/**
 * Score every pack and pick the winner, or report that none clears the floor.
 */
export function selectDomain(
  features: readonly FeatureVector[],
  packs: readonly DomainPack[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): DomainSelection {
  const tables = new Map<string, ConfidenceTable>();
  const scores = packs.map((pack) => {
    const table = buildConfidenceTable(features, pack, config);
    tables.set(pack.name, table);
    return scorePack(table, pack, config);
  });

  const ranking = rankScores(scores);
  const proposals = ranking.slice(0, config.topK);
  const top = ranking[0];
  const table = top ? tables.get(top.domain) : undefined;

  if (!top || !table || top.score < config.scoreFloor) {
    return { status: "no-confident-domain", ranking, proposals };
  }
  return { status: "selected", domain: top.domain, score: top.score, ranking, proposals, table };
}

// ── Helpers ──────────────────────────────────────────────────

function clamp01(value: number): number {
  return Math.round(Math.max(0, Math.min(1, value)) * 10000) / 10000;
}
