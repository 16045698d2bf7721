// ─────────────────────────────────────────────────────────────
// HTML Ingest — Block elements with inline style metadata
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { Alignment, DocumentTree, StructuralUnit, StyleMetadata } from "../schema/templateSchema";

const BLOCK_SELECTOR = "h1, h2, h3, h4, h5, h6, p, li, td, th, blockquote";
const CONTAINER_SELECTOR = "li, td, th, blockquote";

/**
 * Ingest an HTML file into structural units.
 */
export async function ingestHTML(filePath: string): Promise<DocumentTree> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`HTML file not found: ${filePath}`);
  }
  const content = await fs.promises.readFile(filePath, "utf-8");
  return parseHtml(content, path.basename(filePath));
}

/** Parse HTML markup held in memory */
export function parseHtml(html: string, sourceFile: string = "document.html"): DocumentTree {
  const $ = cheerio.load(html);
  const tables = $("table").toArray();
  const units: StructuralUnit[] = [];

  $("body")
    .find(BLOCK_SELECTOR)
    .each((_, el) => {
      const $el = $(el);
      const tag = el.tagName.toLowerCase();
      // Blocks inside list items, cells and quotes belong to their container;
      // only list items nested in list items stand on their own
      const containers = $el.parents(CONTAINER_SELECTOR);
      const nestedItem = tag === "li" && containers.not("li").length === 0;
      if (containers.length > 0 && !nestedItem) return;

      const text = (tag === "li" ? $el.clone().children("ul, ol").remove().end().text() : $el.text())
        .replace(/\s+/g, " ")
        .trim();
      const style: StyleMetadata = {};

      const heading = /^h([1-6])$/.exec(tag);
      if (heading) {
        style.styleId = `Heading${heading[1]}`;
        style.styleName = `heading ${heading[1]}`;
      } else if (tag === "blockquote") {
        style.styleId = "Quote";
      }

      applyInlineStyle(style, $el.attr("style"));

      const emphasis = (selector: string) => {
        const inner = $el.find(selector).first().text().replace(/\s+/g, " ").trim();
        return text.length > 0 && inner === text;
      };
      if (style.bold === undefined && (tag === "th" || emphasis("strong, b"))) style.bold = true;
      if (style.italic === undefined && emphasis("em, i")) style.italic = true;
      if (style.underline === undefined && emphasis("u")) style.underline = true;

      if (tag === "li") {
        const lists = $el.parents("ul, ol");
        const level = Math.max(0, lists.length - 1);
        const kind = lists.first().is("ol") ? "ordered" : "bullet";
        style.list = { kind, level };
        style.indentLevel = level;
      }

      if (tag === "td" || tag === "th") {
        const table = $el.closest("table");
        const rows: AnyNode[] = table.find("tr").toArray();
        const row = $el.closest("tr");
        const rowEl = row.toArray()[0];
        style.table = {
          tableIndex: tables.findIndex((t) => table.toArray()[0] === t),
          row: rowEl ? rows.indexOf(rowEl) : 0,
          column: row.children("td, th").index(el),
          rowCount: rows.length,
          columnCount: Math.max(0, ...rows.map((r) => $(r).children("td, th").length)),
        };
      }

      units.push({
        index: units.length,
        kind: tag === "td" || tag === "th" ? "table-cell" : "paragraph",
        text,
        style,
      });
    });

  const title = $("title").text().trim() || $("h1").first().text().trim();
  return {
    metadata: {
      title: title || path.parse(sourceFile).name,
      format: "html",
      sourceFile,
      unitCount: units.length,
      ingestedAt: new Date().toISOString(),
    },
    units,
  };
}

// ── Helpers ──────────────────────────────────────────────────

function applyInlineStyle(style: StyleMetadata, css: string | undefined): void {
  if (!css) return;
  for (const declaration of css.split(";")) {
    const colon = declaration.indexOf(":");
    if (colon < 0) continue;
    const property = declaration.slice(0, colon).trim().toLowerCase();
    const value = declaration.slice(colon + 1).trim();

    switch (property) {
      case "font-size": {
        const size = parseFontSize(value);
        if (size !== undefined) style.fontSize = size;
        break;
      }
      case "font-family": {
        const family = value.split(",")[0].replace(/["']/g, "").trim();
        if (family) style.fontFamily = family;
        break;
      }
      case "font-weight":
        style.bold = value === "bold" || value === "bolder" || Number(value) >= 600;
        break;
      case "font-style":
        style.italic = value === "italic" || value === "oblique";
        break;
      case "text-decoration":
      case "text-decoration-line":
        style.underline = value.includes("underline");
        break;
      case "text-align": {
        const alignment = toAlignment(value);
        if (alignment) style.alignment = alignment;
        break;
      }
      case "color": {
        const hex = /^#([0-9a-f]{6})$/i.exec(value);
        if (hex) style.color = hex[1].toUpperCase();
        break;
      }
    }
  }
}

/** CSS size in points; px are converted at 96 dpi */
function parseFontSize(value: string): number | undefined {
  const m = /^([\d.]+)\s*(pt|px)$/i.exec(value);
  if (!m) return undefined;
  const n = Number(m[1]);
  if (!Number.isFinite(n)) return undefined;
  return m[2].toLowerCase() === "px" ? Math.round(n * 0.75 * 100) / 100 : n;
}

function toAlignment(value: string): Alignment | undefined {
  switch (value.toLowerCase()) {
    case "left":
    case "start":
      return "left";
    case "center":
      return "center";
    case "right":
    case "end":
      return "right";
    case "justify":
      return "justify";
    default:
      return undefined;
  }
}
