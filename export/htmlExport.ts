// ─────────────────────────────────────────────────────────────
// HTML Export — Rendered units as a styled HTML document
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import { RenderedUnit, RunResult, StyleMetadata } from "../schema/templateSchema";
import { headingLevelFromStyle } from "../parser/featureExtractor";
import { sanitizeFilename } from "./jsonExport";
import { collectTableRun } from "./tableGrid";

/**
 * Write rendered units as a standalone HTML file.
 */
export async function exportHTML(
  result: RunResult,
  outputDir: string,
  options?: { filename?: string; title?: string }
): Promise<string> {
  await fs.promises.mkdir(outputDir, { recursive: true });
  const baseName = options?.filename || sanitizeFilename(options?.title || result.domain);
  const htmlPath = path.join(outputDir, `${baseName}.html`);
  await fs.promises.writeFile(htmlPath, renderHTML(result, options?.title), "utf-8");
  console.log(`[EXPORT] HTML → ${htmlPath}`);
  return htmlPath;
}

/** Render a run result to an HTML string */
export function renderHTML(result: RunResult, title: string = result.domain): string {
  const styled = result.units.filter((u) => !u.overflow);
  const overflow = result.units.filter((u) => u.overflow);

  const body = renderBlocks(styled);
  const overflowSection = overflow.length > 0
    ? `\n<section class="overflow">\n${overflow.map((u) => `  <p>${escapeHtml(u.text)}</p>`).join("\n")}\n</section>`
    : "";

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="utf-8">
<title>${escapeHtml(title)}</title>
</head>
<body data-domain="${escapeHtml(result.domain)}">
${body}${overflowSection}
</body>
</html>
`;
}

/** Inline CSS for captured style metadata */
export function styleToCss(style: StyleMetadata, options: { skipIndent?: boolean } = {}): string {
  const rules: string[] = [];
  if (style.fontFamily) rules.push(`font-family: '${style.fontFamily.replace(/'/g, "")}'`);
  if (style.fontSize !== undefined) rules.push(`font-size: ${style.fontSize}pt`);
  if (style.bold !== undefined) rules.push(`font-weight: ${style.bold ? "bold" : "normal"}`);
  if (style.italic !== undefined) rules.push(`font-style: ${style.italic ? "italic" : "normal"}`);
  if (style.underline !== undefined) rules.push(`text-decoration: ${style.underline ? "underline" : "none"}`);
  if (style.color) rules.push(`color: #${style.color}`);
  if (style.alignment) rules.push(`text-align: ${style.alignment}`);
  if (!options.skipIndent && style.indentLevel) rules.push(`margin-left: ${style.indentLevel * 36}pt`);
  return rules.join("; ");
}

// ── Helpers ──────────────────────────────────────────────────

function renderBlocks(units: RenderedUnit[]): string {
  const out: string[] = [];
  let i = 0;
  while (i < units.length) {
    const style: StyleMetadata = units[i].style ?? {};

    if (style.list) {
      const kind = style.list.kind;
      const tag = kind === "ordered" ? "ol" : "ul";
      const items: string[] = [];
      while (i < units.length && units[i].style?.list?.kind === kind) {
        items.push(`  ${element("li", units[i], { skipIndent: true })}`);
        i++;
      }
      out.push(`<${tag}>\n${items.join("\n")}\n</${tag}>`);
      continue;
    }

    if (style.table) {
      const run = collectTableRun(units, i);
      const body = run.rows
        .map((cells) => `  <tr>${cells.map((cell) => element("td", cell)).join("")}</tr>`)
        .join("\n");
      out.push(`<table>\n${body}\n</table>`);
      i = run.next;
      continue;
    }

    const level = headingLevelFromStyle(style);
    const tag = typeof level === "number" ? `h${Math.min(6, Math.max(1, level))}` : "p";
    out.push(element(tag, units[i]));
    i++;
  }
  return out.join("\n");
}

function element(tag: string, unit: RenderedUnit, options: { skipIndent?: boolean } = {}): string {
  const css = unit.style ? styleToCss(unit.style, options) : "";
  const styleAttr = css ? ` style="${escapeHtml(css)}"` : "";
  return `<${tag} data-slot="${escapeHtml(unit.slotId)}" data-role="${escapeHtml(unit.role)}"${styleAttr}>${escapeHtml(unit.text)}</${tag}>`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
