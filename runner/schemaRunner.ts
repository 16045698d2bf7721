// ─────────────────────────────────────────────────────────────
// Schema Runner — Pour new content into a schema's slots
// ─────────────────────────────────────────────────────────────

import {
  ContentBlock,
  FeatureVector,
  OVERFLOW_SLOT_ID,
  RenderedUnit,
  RunDiagnostic,
  RunResult,
  Schema,
  SchemaSlot,
  StructuralUnit,
} from "../schema/templateSchema";
import { BoundaryPolicy, DEFAULT_ENGINE_CONFIG } from "../config/engineConfig";
import { contextWindow, extractFeatureSequence } from "../parser/featureExtractor";
import { DETECTORS } from "../parser/detectors";

export interface RunOptions {
  boundaryPolicy?: BoundaryPolicy;
  minConfidence?: number;          // optional slots and run hand-offs need at least this
  contextRadius?: number;
}

/**
 * Map content blocks onto schema slots in order.
 *
 * exactly-one slots take the next block. An optional slot takes it only
 * when the slot's detector scores it at least `minConfidence`. A
 * repeatable slot takes a run of blocks that ends at the next boundary,
 * or earlier when the following slot's detector claims the next block
 * with a higher score than the current slot's. Required slots left
 * without content render empty and are reported. Blocks left after the
 * last slot are appended as unstyled overflow.
 */
export function runSchema(
  schema: Schema,
  blocks: readonly ContentBlock[],
  options: RunOptions = {}
): RunResult {
  const policy = options.boundaryPolicy ?? DEFAULT_ENGINE_CONFIG.boundaryPolicy;
  const minConfidence = options.minConfidence ?? DEFAULT_ENGINE_CONFIG.minConfidence;
  const scorer = new BlockScorer(blocks, options.contextRadius ?? DEFAULT_ENGINE_CONFIG.contextRadius);
  const units: RenderedUnit[] = [];
  const diagnostics: RunDiagnostic[] = [];
  let next = 0;

  schema.slots.forEach((slot, k) => {
    if (next >= blocks.length) {
      if (slot.required) {
        units.push(render(slot, "", null));
        diagnostics.push({ kind: "unfilled-slot", slotId: slot.id, role: slot.role });
      }
      return;
    }

    if (slot.cardinality === "optional" && scorer.score(slot, next) < minConfidence) return;

    units.push(render(slot, blocks[next].text, blocks[next].index));
    next++;
    if (slot.cardinality !== "repeatable") return;

    const following = schema.slots[k + 1];
    while (next < blocks.length && !isBoundary(blocks[next], policy)) {
      if (following && yieldsTo(scorer, slot, following, next, minConfidence)) break;
      units.push(render(slot, blocks[next].text, blocks[next].index));
      next++;
    }
  });

  if (next < blocks.length) {
    const leftover = blocks.slice(next);
    for (const block of leftover) {
      units.push({
        slotId: OVERFLOW_SLOT_ID,
        role: OVERFLOW_SLOT_ID,
        ordinal: schema.slots.length,
        text: block.text,
        style: null,
        blockIndex: block.index,
        overflow: true,
      });
    }
    diagnostics.push({ kind: "overflow", blockIndices: leftover.map((b) => b.index) });
  }

  return { domain: schema.domain, source: { ...schema.source }, units, diagnostics };
}

/** Whether a block starts a new run under the given policy */
export function isBoundary(block: ContentBlock, policy: BoundaryPolicy): boolean {
  return policy === "explicit" ? block.explicitBoundary : block.boundaryBefore || block.explicitBoundary;
}

// ── Helpers ──────────────────────────────────────────────────

/** Detector scores of content blocks, read as unstyled paragraphs */
class BlockScorer {
  private readonly features: FeatureVector[];
  private readonly cache = new Map<string, number>();

  constructor(blocks: readonly ContentBlock[], private readonly radius: number) {
    const plain: StructuralUnit[] = blocks.map((block, index) => ({
      index,
      kind: "paragraph",
      text: block.text,
      style: {},
    }));
    this.features = extractFeatureSequence(plain, radius);
  }

  score(slot: SchemaSlot, position: number): number {
    const key = `${slot.detector}:${position}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;
    const window = contextWindow(this.features, position, this.radius);
    const confidence = DETECTORS[slot.detector](this.features[position], window).confidence;
    this.cache.set(key, confidence);
    return confidence;
  }
}

function yieldsTo(
  scorer: BlockScorer,
  current: SchemaSlot,
  following: SchemaSlot,
  position: number,
  minConfidence: number
): boolean {
  const claim = scorer.score(following, position);
  return claim >= minConfidence && claim > scorer.score(current, position);
}

function render(slot: SchemaSlot, text: string, blockIndex: number | null): RenderedUnit {
  return {
    slotId: slot.id,
    role: slot.role,
    ordinal: slot.ordinal,
    text,
    style: structuredClone(slot.style),
    blockIndex,
    overflow: false,
  };
}
