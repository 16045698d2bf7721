// ─────────────────────────────────────────────────────────────
// DOCX Export — Rendered units as a Word document
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import PizZip from "pizzip";
import { Alignment, ListShape, RenderedUnit, RunResult, StyleMetadata } from "../schema/templateSchema";
import { sanitizeFilename } from "./jsonExport";
import { collectTableRun } from "./tableGrid";

const W_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";
const BULLET_NUM_ID = "1";
const ORDERED_NUM_ID = "2";
const TWIPS_PER_INDENT = 720;

const JC: Record<Alignment, string> = {
  left: "left",
  center: "center",
  right: "right",
  justify: "both",
};

export interface DocxExportOptions {
  filename?: string;
  template?: string;               // .docx whose package is reused; defaults to the schema source
}

/**
 * Write rendered units as a .docx file.
 * When the schema was learned from a .docx that still exists, that file is
 * used as the template so its styles, numbering, headers, footers and theme
 * carry over.
 */
export async function exportDOCX(
  result: RunResult,
  outputDir: string,
  options?: DocxExportOptions
): Promise<string> {
  await fs.promises.mkdir(outputDir, { recursive: true });
  const baseName = options?.filename || sanitizeFilename(result.domain);
  const docxPath = path.join(outputDir, `${baseName}.docx`);

  const templatePath = options?.template ?? (result.source.format === "docx" ? result.source.path : undefined);
  let template: Buffer | undefined;
  if (templatePath && fs.existsSync(templatePath)) {
    template = await fs.promises.readFile(templatePath);
    console.log(`[EXPORT] Filling template ${path.basename(templatePath)}`);
  } else if (templatePath) {
    console.warn(`[EXPORT] Template not found: ${templatePath} — building a new document`);
  }

  await fs.promises.writeFile(docxPath, buildDocx(result, template));
  console.log(`[EXPORT] DOCX → ${docxPath}`);
  return docxPath;
}

/**
 * Build the .docx archive in memory.
 * With a template, only word/document.xml is replaced and every other part
 * is kept byte for byte; the body's section properties stay in place.
 */
export function buildDocx(result: RunResult, template?: Buffer): Buffer {
  if (template) return fillTemplate(result.units, template);

  const zip = new PizZip();
  zip.file("[Content_Types].xml", CONTENT_TYPES);
  zip.file("_rels/.rels", PACKAGE_RELS);
  zip.file("word/_rels/document.xml.rels", DOCUMENT_RELS);
  zip.file("word/numbering.xml", NUMBERING);
  zip.file("word/styles.xml", stylesXml(result.units));
  zip.file("word/document.xml", renderDocumentXml(result.units));
  return zip.generate({ type: "nodebuffer", compression: "DEFLATE" });
}

/** word/document.xml for a unit sequence, numbered against the built-in lists */
export function renderDocumentXml(units: readonly RenderedUnit[]): string {
  return (
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
    `<w:document xmlns:w="${W_NS}"><w:body>${renderBody(units, builtInNumId)}<w:sectPr/></w:body></w:document>`
  );
}

// ── Template fill ────────────────────────────────────────────

const BODY_RE = /(<w:body\b[^>]*>)([\s\S]*)(<\/w:body>)/;

function fillTemplate(units: readonly RenderedUnit[], template: Buffer): Buffer {
  const zip = new PizZip(template);
  const documentXml = zip.file("word/document.xml")?.asText();
  if (!documentXml) {
    throw new Error("DOCX template has no word/document.xml");
  }
  if (!BODY_RE.test(documentXml)) {
    throw new Error("DOCX template document has no body");
  }

  const filled = documentXml.replace(
    BODY_RE,
    (_whole: string, open: string, inner: string, close: string) =>
      `${open}${renderBody(units, templateNumId)}${trailingSectPr(inner)}${close}`
  );
  zip.file("word/document.xml", filled);
  return zip.generate({ type: "nodebuffer", compression: "DEFLATE" });
}

/** The body-level section properties: the last sectPr after the last paragraph */
function trailingSectPr(bodyXml: string): string {
  const start = bodyXml.lastIndexOf("<w:sectPr");
  if (start < 0) return "";
  const tail = bodyXml.slice(start);
  return tail.includes("</w:p>") || tail.includes("</w:tbl>") ? "" : tail.trim();
}

// ── Body ─────────────────────────────────────────────────────

type NumIdFor = (list: ListShape) => string | null;

const builtInNumId: NumIdFor = (list) => (list.kind === "ordered" ? ORDERED_NUM_ID : BULLET_NUM_ID);

// The template's own numbering definitions are reused as captured
const templateNumId: NumIdFor = (list) => list.numId ?? null;

function renderBody(units: readonly RenderedUnit[], numIdFor: NumIdFor): string {
  const body: string[] = [];
  let i = 0;
  while (i < units.length) {
    if (units[i].style?.table) {
      const run = collectTableRun(units, i);
      const rowXml = run.rows
        .map((cells) => `<w:tr>${cells.map((cell) => `<w:tc>${paragraphXml(cell, numIdFor)}</w:tc>`).join("")}</w:tr>`)
        .join("");
      body.push(`<w:tbl><w:tblPr><w:tblW w:w="0" w:type="auto"/></w:tblPr>${rowXml}</w:tbl>`);
      i = run.next;
      continue;
    }
    body.push(paragraphXml(units[i], numIdFor));
    i++;
  }
  return body.join("");
}

function paragraphXml(unit: RenderedUnit, numIdFor: NumIdFor): string {
  const style: StyleMetadata = unit.style ?? {};
  const pPr: string[] = [];
  if (style.styleId) pPr.push(`<w:pStyle w:val="${escapeXml(style.styleId)}"/>`);
  const numId = style.list ? numIdFor(style.list) : null;
  if (style.list && numId !== null) {
    pPr.push(`<w:numPr><w:ilvl w:val="${style.list.level}"/><w:numId w:val="${escapeXml(numId)}"/></w:numPr>`);
  } else if (style.indentLevel) {
    pPr.push(`<w:ind w:left="${style.indentLevel * TWIPS_PER_INDENT}"/>`);
  }
  if (style.alignment) pPr.push(`<w:jc w:val="${JC[style.alignment]}"/>`);

  const rPr: string[] = [];
  if (style.fontFamily) {
    const font = escapeXml(style.fontFamily);
    rPr.push(`<w:rFonts w:ascii="${font}" w:hAnsi="${font}"/>`);
  }
  if (style.bold !== undefined) rPr.push(style.bold ? "<w:b/>" : `<w:b w:val="0"/>`);
  if (style.italic !== undefined) rPr.push(style.italic ? "<w:i/>" : `<w:i w:val="0"/>`);
  if (style.color) rPr.push(`<w:color w:val="${escapeXml(style.color)}"/>`);
  if (style.fontSize !== undefined) rPr.push(`<w:sz w:val="${Math.round(style.fontSize * 2)}"/>`);
  if (style.underline !== undefined) rPr.push(`<w:u w:val="${style.underline ? "single" : "none"}"/>`);

  const pPrXml = pPr.length > 0 ? `<w:pPr>${pPr.join("")}</w:pPr>` : "";
  const rPrXml = rPr.length > 0 ? `<w:rPr>${rPr.join("")}</w:rPr>` : "";
  const run = unit.text === "" ? "" : `<w:r>${rPrXml}<w:t xml:space="preserve">${escapeXml(unit.text)}</w:t></w:r>`;
  return `<w:p>${pPrXml}${run}</w:p>`;
}

/** word/styles.xml defining every paragraph style the units refer to */
export function stylesXml(units: readonly RenderedUnit[]): string {
  const names = new Map<string, string>();
  for (const unit of units) {
    const id = unit.style?.styleId;
    if (id && !names.has(id)) names.set(id, unit.style?.styleName ?? id);
  }
  const styles = [...names.entries()]
    .map(
      ([id, name]) =>
        `<w:style w:type="paragraph" w:customStyle="1" w:styleId="${escapeXml(id)}"><w:name w:val="${escapeXml(name)}"/></w:style>`
    )
    .join("");
  return `<?xml version="1.0" encoding="UTF-8" standalone="yes"?><w:styles xmlns:w="${W_NS}">${styles}</w:styles>`;
}

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

// ── Package parts ────────────────────────────────────────────

const CONTENT_TYPES =
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
  `<Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types">` +
  `<Default Extension="rels" ContentType="application/vnd.openxmlformats-package.relationships+xml"/>` +
  `<Default Extension="xml" ContentType="application/xml"/>` +
  `<Override PartName="/word/document.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.document.main+xml"/>` +
  `<Override PartName="/word/numbering.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.numbering+xml"/>` +
  `<Override PartName="/word/styles.xml" ContentType="application/vnd.openxmlformats-officedocument.wordprocessingml.styles+xml"/>` +
  `</Types>`;

const PACKAGE_RELS =
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
  `<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">` +
  `<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="word/document.xml"/>` +
  `</Relationships>`;

const DOCUMENT_RELS =
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
  `<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">` +
  `<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/numbering" Target="numbering.xml"/>` +
  `<Relationship Id="rId2" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/styles" Target="styles.xml"/>` +
  `</Relationships>`;

function abstractNum(id: string, format: string, text: (level: number) => string): string {
  const levels = [0, 1, 2, 3, 4, 5, 6, 7, 8]
    .map(
      (l) =>
        `<w:lvl w:ilvl="${l}"><w:start w:val="1"/><w:numFmt w:val="${format}"/>` +
        `<w:lvlText w:val="${text(l)}"/><w:pPr><w:ind w:left="${(l + 1) * TWIPS_PER_INDENT}" w:hanging="360"/></w:pPr></w:lvl>`
    )
    .join("");
  return `<w:abstractNum w:abstractNumId="${id}">${levels}</w:abstractNum>`;
}

const NUMBERING =
  `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
  `<w:numbering xmlns:w="${W_NS}">` +
  abstractNum("0", "bullet", () => "•") +
  abstractNum("1", "decimal", (l) => `%${l + 1}.`) +
  `<w:num w:numId="${BULLET_NUM_ID}"><w:abstractNumId w:val="0"/></w:num>` +
  `<w:num w:numId="${ORDERED_NUM_ID}"><w:abstractNumId w:val="1"/></w:num>` +
  `</w:numbering>`;
