// ─────────────────────────────────────────────────────────────
// Canonical Serializer — Deterministic schema fingerprints
//
// Guarantees: Same schema → Same canonical form → Same hash
//
// Rules:
//   1. Sort all object keys lexicographically (deep)
//   2. Keep array order (slot order is meaningful)
//   3. Normalize numeric precision (4 decimal places)
//   4. Strip volatile fields (export timestamps, embedded integrity, source path)
//   5. Produce compact JSON (no pretty-print)
// ─────────────────────────────────────────────────────────────

import crypto from "crypto";
import CryptoJS from "crypto-js";
import { Schema, SchemaSlot } from "../schema/templateSchema";

/** Fields that change per export and never take part in the hash */
const VOLATILE_FIELDS = new Set(["exportedAt", "ingestedAt", "integrity", "path"]);

export interface CanonicalFingerprint {
  canonicalHash: string;
  merkleRoot: string;
  slotCount: number;
  canonicalSize: number;     // byte length of canonical string
}

export interface ReplayVerification {
  match: boolean;
  hashA: string;
  hashB: string;
  merkleMatch: boolean;
  driftDetails?: string;
}

export interface StabilityResult {
  rounds: number;
  stable: boolean;
  driftRound?: number;
}

// ── Core Canonicalization ────────────────────────────────────

/**
 * Deterministic canonical string of any JSON-like value.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(deepCleanAndSort(value));
}

/** SHA-256 of a schema's canonical form */
export function canonicalHash(schema: Schema): string {
  return crypto.createHash("sha256").update(canonicalize(schema)).digest("hex");
}

/**
 * Merkle root over slot hashes.
 * Leaves are in ordinal order, so reordering slots changes the root.
 */
export function canonicalMerkleRoot(schema: Schema): string {
  const leaves = [...schema.slots]
    .sort((a, b) => a.ordinal - b.ordinal)
    .map((slot) => slotHash(slot));
  if (leaves.length === 0) {
    return CryptoJS.SHA256("empty-schema").toString();
  }
  return buildMerkleRoot(leaves);
}

export function slotHash(slot: SchemaSlot): string {
  return CryptoJS.SHA256(canonicalize(slot)).toString();
}

export function computeCanonicalFingerprint(schema: Schema): CanonicalFingerprint {
  const canonical = canonicalize(schema);
  return {
    canonicalHash: crypto.createHash("sha256").update(canonical).digest("hex"),
    merkleRoot: canonicalMerkleRoot(schema),
    slotCount: schema.slots.length,
    canonicalSize: Buffer.byteLength(canonical, "utf-8"),
  };
}

// ── Replay Verification ──────────────────────────────────────

/**
 * Compare two schemas by canonical form; reports the first divergence.
 */
export function verifyReplay(a: Schema, b: Schema): ReplayVerification {
  const canonA = canonicalize(a);
  const canonB = canonicalize(b);
  const hashA = crypto.createHash("sha256").update(canonA).digest("hex");
  const hashB = crypto.createHash("sha256").update(canonB).digest("hex");
  const match = hashA === hashB;

  let driftDetails: string | undefined;
  if (!match) {
    let divergeAt = -1;
    for (let i = 0; i < Math.min(canonA.length, canonB.length); i++) {
      if (canonA[i] !== canonB[i]) {
        divergeAt = i;
        break;
      }
    }
    if (divergeAt === -1) {
      driftDetails = `Length mismatch: ${canonA.length} vs ${canonB.length}`;
    } else {
      const start = Math.max(0, divergeAt - 40);
      driftDetails =
        `First divergence at byte ${divergeAt}:\n` +
        `  A: ...${canonA.substring(start, divergeAt + 40)}...\n` +
        `  B: ...${canonB.substring(start, divergeAt + 40)}...`;
    }
  }

  return {
    match,
    hashA,
    hashB,
    merkleMatch: canonicalMerkleRoot(a) === canonicalMerkleRoot(b),
    driftDetails,
  };
}

/**
 * Hash a schema produced by `produce` N times; any drift means a
 * nondeterministic stage.
 */
export function runHashStabilityTest(produce: () => Schema, rounds: number = 5): StabilityResult {
  const base = canonicalHash(produce());
  for (let i = 1; i < rounds; i++) {
    if (canonicalHash(produce()) !== base) {
      return { rounds, stable: false, driftRound: i };
    }
  }
  return { rounds, stable: true };
}

// ── Helpers ──────────────────────────────────────────────────

function deepCleanAndSort(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return normalizeNumber(value);
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (Array.isArray(value)) return value.map(deepCleanAndSort);
  if (typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (VOLATILE_FIELDS.has(key) || inner === undefined) continue;
      sorted[key] = deepCleanAndSort(inner);
    }
    return sorted;
  }
  return String(value);
}

function normalizeNumber(n: number): number {
  if (Number.isInteger(n)) return n;
  return Math.round(n * 10000) / 10000;
}

/** Pairwise SHA-256 up to a single root; an odd leaf is carried up */
function buildMerkleRoot(hashes: string[]): string {
  let level = hashes;
  while (level.length > 1) {
    const next: string[] = [];
    for (let i = 0; i < level.length; i += 2) {
      next.push(i + 1 < level.length ? CryptoJS.SHA256(level[i] + level[i + 1]).toString() : level[i]);
    }
    level = next;
  }
  return level[0];
}
