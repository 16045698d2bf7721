// ─────────────────────────────────────────────────────────────
// Ingest Index — Document intake dispatcher
// ─────────────────────────────────────────────────────────────

import path from "path";
import { DocumentTree, InputFormat } from "../schema/templateSchema";
import { ingestDOCX, parseDocx } from "./docxIngest";
import { ingestHTML, parseHtml } from "./htmlIngest";
import { ingestPlaintext, parseContentBlocks, cleanPlaintext } from "./plaintextIngest";

/** Map file extensions to input formats */
const EXT_MAP: Record<string, InputFormat> = {
  ".docx": "docx",
  ".html": "html",
  ".htm": "html",
};

/**
 * Ingest a source document, routed by file extension.
 */
export async function ingestDocument(filePath: string): Promise<DocumentTree> {
  const ext = path.extname(filePath).toLowerCase();
  const format = EXT_MAP[ext];

  if (!format) {
    throw new Error(
      `Unsupported file format: ${ext || "(none)"}\nSupported: ${Object.keys(EXT_MAP).join(", ")}`
    );
  }

  console.log(`[INGEST] Processing ${path.basename(filePath)} as ${format.toUpperCase()}...`);

  const tree = format === "docx" ? await ingestDOCX(filePath) : await ingestHTML(filePath);
  console.log(`[INGEST] ${tree.units.length} structural units`);
  return tree;
}

export {
  ingestDOCX,
  parseDocx,
  ingestHTML,
  parseHtml,
  ingestPlaintext,
  parseContentBlocks,
  cleanPlaintext,
};
