// ─────────────────────────────────────────────────────────────
// Plaintext Ingest — Split new content into ContentBlocks
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import { ContentBlock } from "../schema/templateSchema";
import { BlockMode, DEFAULT_ENGINE_CONFIG } from "../config/engineConfig";

export interface PlaintextOptions {
  blockMode?: BlockMode;
  boundaryMarkers?: readonly string[];
}

const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF]/g;

/** Canonical form of raw content: no BOM, LF line endings, NFC, no zero-width marks */
export function cleanPlaintext(text: string): string {
  return text
    .replace(/^\uFEFF/, "")
    .replace(/\r\n?/g, "\n")
    .normalize("NFC")
    .replace(ZERO_WIDTH, "");
}

/**
 * Cut content into blocks.
 * "line": every non-blank line is a block.
 * "paragraph": consecutive non-blank lines are joined with a space.
 * A blank line marks the next block with boundaryBefore; a marker line
 * (e.g. "---") marks it with explicitBoundary and is not itself a block.
 */
export function parseContentBlocks(text: string, options: PlaintextOptions = {}): ContentBlock[] {
  const mode = options.blockMode ?? DEFAULT_ENGINE_CONFIG.blockMode;
  const markers = new Set(options.boundaryMarkers ?? DEFAULT_ENGINE_CONFIG.boundaryMarkers);
  const blocks: ContentBlock[] = [];

  let pending: string[] = [];
  let blankSeen = false;
  let markerSeen = false;
  let pendingBoundary = false;
  let pendingExplicit = false;

  const flush = () => {
    if (pending.length === 0) return;
    blocks.push({
      index: blocks.length,
      text: pending.join(" "),
      boundaryBefore: pendingBoundary,
      explicitBoundary: pendingExplicit,
    });
    pending = [];
  };

  for (const rawLine of cleanPlaintext(text).split("\n")) {
    const line = rawLine.trim();
    if (line === "") {
      if (mode === "paragraph") flush();
      blankSeen = true;
      continue;
    }
    if (markers.has(line)) {
      if (mode === "paragraph") flush();
      markerSeen = true;
      continue;
    }

    if (mode === "line" || pending.length === 0 || blankSeen || markerSeen) {
      flush();
      pendingBoundary = blankSeen && blocks.length > 0;
      pendingExplicit = markerSeen && blocks.length > 0;
      blankSeen = false;
      markerSeen = false;
    }
    pending.push(line);
  }
  flush();
  return blocks;
}

/** Read a content file into blocks */
export function ingestPlaintext(filePath: string, options: PlaintextOptions = {}): ContentBlock[] {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Content file not found: ${filePath}`);
  }
  const blocks = parseContentBlocks(fs.readFileSync(filePath, "utf-8"), options);
  console.log(`[INGEST] ${blocks.length} content blocks from ${filePath}`);
  return blocks;
}
