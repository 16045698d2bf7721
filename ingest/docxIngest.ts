// ─────────────────────────────────────────────────────────────
// DOCX Ingest — Paragraphs, table cells & resolved run styles
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import PizZip from "pizzip";
import * as cheerio from "cheerio";
import { Element, isTag, isText } from "domhandler";
import {
  Alignment,
  DocumentTree,
  ListShape,
  StructuralUnit,
  StyleMetadata,
  TableShape,
} from "../schema/templateSchema";

interface RunProps {
  fontFamily?: string;
  fontSize?: number;
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  color?: string;
}

interface ParagraphProps {
  alignment?: Alignment;
  indentTwips?: number;
  numId?: string;
  ilvl?: number;
}

interface StyleDef {
  id: string;
  name?: string;
  basedOn?: string;
  run: RunProps;
  paragraph: ParagraphProps;
}

interface StyleSheet {
  defaults: RunProps;
  styles: Map<string, StyleDef>;
  defaultParagraphStyle?: string;
}

/** numId → list level → numFmt */
type Numbering = Map<string, Map<number, string>>;

const TWIPS_PER_INDENT = 720;
const OFF_VALUES = new Set(["0", "false", "off", "none"]);

/**
 * Ingest a DOCX file into structural units.
 */
export async function ingestDOCX(filePath: string): Promise<DocumentTree> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`DOCX file not found: ${filePath}`);
  }
  const buffer = await fs.promises.readFile(filePath);
  return parseDocx(buffer, path.basename(filePath));
}

/**
 * Parse a DOCX archive held in memory.
 * Body paragraphs and table cells become units in document order.
 */
export function parseDocx(buffer: Buffer, sourceFile: string = "document.docx"): DocumentTree {
  let zip: PizZip;
  try {
    zip = new PizZip(buffer);
  } catch (err) {
    throw new Error(`Not a valid DOCX archive: ${sourceFile} (${err instanceof Error ? err.message : String(err)})`);
  }

  const documentXml = zip.file("word/document.xml")?.asText();
  if (!documentXml) {
    throw new Error(`DOCX archive has no word/document.xml: ${sourceFile}`);
  }

  const sheet = parseStyles(zip.file("word/styles.xml")?.asText());
  const numbering = parseNumbering(zip.file("word/numbering.xml")?.asText());
  const $ = cheerio.load(documentXml, { xml: true });
  const body = $("w\\:body").first().toArray()[0];
  if (!body) {
    throw new Error(`DOCX document has no body: ${sourceFile}`);
  }

  const units: StructuralUnit[] = [];
  let tableIndex = 0;

  for (const node of elementChildren(body)) {
    if (node.name === "w:p") {
      const { text, style } = readParagraph(node, sheet, numbering);
      units.push({ index: units.length, kind: "paragraph", text, style });
    } else if (node.name === "w:tbl") {
      const rows = elementChildren(node, "w:tr");
      const columnCount = Math.max(0, ...rows.map((r) => elementChildren(r, "w:tc").length));
      rows.forEach((row, r) => {
        elementChildren(row, "w:tc").forEach((cell, c) => {
          const paragraphs = elementChildren(cell, "w:p").map((p) => readParagraph(p, sheet, numbering));
          const first = paragraphs.find((p) => p.text.trim() !== "") ?? paragraphs[0];
          const table: TableShape = { tableIndex, row: r, column: c, rowCount: rows.length, columnCount };
          units.push({
            index: units.length,
            kind: "table-cell",
            text: paragraphs.map((p) => p.text).filter((t) => t !== "").join(" "),
            style: { ...(first ? first.style : {}), table },
          });
        });
      });
      tableIndex++;
    }
  }

  const coreTitle = readCoreTitle(zip.file("docProps/core.xml")?.asText());
  const firstText = units.find((u) => u.text.trim() !== "")?.text.trim();

  return {
    metadata: {
      title: coreTitle || firstText || path.parse(sourceFile).name,
      format: "docx",
      sourceFile,
      unitCount: units.length,
      ingestedAt: new Date().toISOString(),
    },
    units,
  };
}

// ── Paragraphs ───────────────────────────────────────────────

function readParagraph(
  p: Element,
  sheet: StyleSheet,
  numbering: Numbering
): { text: string; style: StyleMetadata } {
  const pPr = child(p, "w:pPr");
  const styleId = attr(child(pPr, "w:pStyle")) ?? sheet.defaultParagraphStyle;
  const chain = styleChain(styleId, sheet);

  const runs = collectRuns(p);
  const text = runs.map((r) => r.text).join("");
  const firstRun = runs.find((r) => r.text.trim() !== "");

  const run: RunProps = { ...sheet.defaults };
  for (const def of chain) Object.assign(run, def.run);
  Object.assign(run, readRunProps(child(pPr, "w:rPr")));
  if (firstRun) Object.assign(run, readRunProps(firstRun.rPr));

  const para: ParagraphProps = {};
  for (const def of chain) Object.assign(para, def.paragraph);
  Object.assign(para, readParagraphProps(pPr));

  const style: StyleMetadata = {};
  if (styleId) style.styleId = styleId;
  const leaf = chain[chain.length - 1];
  if (leaf?.name) style.styleName = leaf.name;
  if (run.fontFamily !== undefined) style.fontFamily = run.fontFamily;
  if (run.fontSize !== undefined) style.fontSize = run.fontSize;
  if (run.bold !== undefined) style.bold = run.bold;
  if (run.italic !== undefined) style.italic = run.italic;
  if (run.underline !== undefined) style.underline = run.underline;
  if (run.color !== undefined) style.color = run.color;
  if (para.alignment !== undefined) style.alignment = para.alignment;

  if (para.numId !== undefined && para.numId !== "0") {
    const level = para.ilvl ?? 0;
    style.list = { kind: listKind(numbering, para.numId, level), level, numId: para.numId };
    style.indentLevel = level;
  } else if (para.indentTwips !== undefined && para.indentTwips > 0) {
    style.indentLevel = Math.floor(para.indentTwips / TWIPS_PER_INDENT);
  }

  return { text, style };
}

interface RunText {
  text: string;
  rPr?: Element;
}

/** Runs in reading order, including those nested in hyperlinks and insertions */
function collectRuns(el: Element): RunText[] {
  const runs: RunText[] = [];
  for (const node of elementChildren(el)) {
    if (node.name === "w:pPr" || node.name === "w:del") continue;
    if (node.name === "w:r") {
      let text = "";
      for (const part of elementChildren(node)) {
        if (part.name === "w:t") text += textOf(part);
        else if (part.name === "w:tab") text += "\t";
        else if (part.name === "w:br" || part.name === "w:cr") text += " ";
      }
      runs.push({ text, rPr: child(node, "w:rPr") });
    } else {
      runs.push(...collectRuns(node));
    }
  }
  return runs;
}

function readRunProps(rPr: Element | undefined): RunProps {
  const props: RunProps = {};
  if (!rPr) return props;
  const fonts = child(rPr, "w:rFonts");
  const font = attr(fonts, "w:ascii") ?? attr(fonts, "w:hAnsi") ?? attr(fonts, "w:cs");
  if (font) props.fontFamily = font;
  const size = Number(attr(child(rPr, "w:sz")));
  if (Number.isFinite(size) && size > 0) props.fontSize = size / 2;
  const bold = onOff(child(rPr, "w:b"));
  if (bold !== undefined) props.bold = bold;
  const italic = onOff(child(rPr, "w:i"));
  if (italic !== undefined) props.italic = italic;
  const underline = onOff(child(rPr, "w:u"));
  if (underline !== undefined) props.underline = underline;
  const color = attr(child(rPr, "w:color"));
  if (color && color !== "auto") props.color = color.toUpperCase();
  return props;
}

function readParagraphProps(pPr: Element | undefined): ParagraphProps {
  const props: ParagraphProps = {};
  if (!pPr) return props;
  const alignment = toAlignment(attr(child(pPr, "w:jc")));
  if (alignment) props.alignment = alignment;
  const ind = child(pPr, "w:ind");
  const left = Number(attr(ind, "w:left") ?? attr(ind, "w:start"));
  if (Number.isFinite(left)) props.indentTwips = left;
  const numPr = child(pPr, "w:numPr");
  const numId = attr(child(numPr, "w:numId"));
  if (numId !== undefined) props.numId = numId;
  const ilvl = Number(attr(child(numPr, "w:ilvl")));
  if (Number.isInteger(ilvl)) props.ilvl = ilvl;
  return props;
}

function toAlignment(value: string | undefined): Alignment | undefined {
  switch (value) {
    case "left":
    case "start":
      return "left";
    case "center":
      return "center";
    case "right":
    case "end":
      return "right";
    case "both":
    case "distribute":
      return "justify";
    default:
      return undefined;
  }
}

function listKind(numbering: Numbering, numId: string, level: number): ListShape["kind"] {
  const format = numbering.get(numId)?.get(level);
  if (format === undefined || format === "none") return "unknown";
  return format === "bullet" ? "bullet" : "ordered";
}

// ── styles.xml / numbering.xml / core.xml ────────────────────

function parseStyles(xml: string | undefined): StyleSheet {
  const sheet: StyleSheet = { defaults: {}, styles: new Map() };
  if (!xml) return sheet;
  const $ = cheerio.load(xml, { xml: true });

  const defaults = $("w\\:docDefaults w\\:rPrDefault w\\:rPr").toArray()[0];
  sheet.defaults = readRunProps(defaults);

  for (const el of $("w\\:style").toArray()) {
    if (attr(el, "w:type") !== "paragraph") continue;
    const id = attr(el, "w:styleId");
    if (!id) continue;
    sheet.styles.set(id, {
      id,
      name: attr(child(el, "w:name")),
      basedOn: attr(child(el, "w:basedOn")),
      run: readRunProps(child(el, "w:rPr")),
      paragraph: readParagraphProps(child(el, "w:pPr")),
    });
    if (onOff(el, "w:default")) sheet.defaultParagraphStyle = id;
  }
  return sheet;
}

/** Style chain from the root ancestor down to `styleId` */
function styleChain(styleId: string | undefined, sheet: StyleSheet): StyleDef[] {
  const chain: StyleDef[] = [];
  const seen = new Set<string>();
  let current = styleId;
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    const def = sheet.styles.get(current);
    if (!def) break;
    chain.unshift(def);
    current = def.basedOn;
  }
  return chain;
}

function parseNumbering(xml: string | undefined): Numbering {
  const numbering: Numbering = new Map();
  if (!xml) return numbering;
  const $ = cheerio.load(xml, { xml: true });

  const abstracts = new Map<string, Map<number, string>>();
  for (const el of $("w\\:abstractNum").toArray()) {
    const id = attr(el, "w:abstractNumId");
    if (id === undefined) continue;
    const levels = new Map<number, string>();
    for (const lvl of elementChildren(el, "w:lvl")) {
      const format = attr(child(lvl, "w:numFmt"));
      const level = Number(attr(lvl, "w:ilvl"));
      if (format !== undefined && Number.isInteger(level)) levels.set(level, format);
    }
    abstracts.set(id, levels);
  }

  for (const el of $("w\\:num").toArray()) {
    const numId = attr(el, "w:numId");
    const abstractId = attr(child(el, "w:abstractNumId"));
    const levels = abstractId !== undefined ? abstracts.get(abstractId) : undefined;
    if (numId !== undefined && levels) numbering.set(numId, levels);
  }
  return numbering;
}

function readCoreTitle(xml: string | undefined): string {
  if (!xml) return "";
  const $ = cheerio.load(xml, { xml: true });
  return $("dc\\:title").first().text().trim();
}

// ── XML helpers ──────────────────────────────────────────────

function elementChildren(el: Element, name?: string): Element[] {
  return el.children.filter((c): c is Element => isTag(c) && (name === undefined || c.name === name));
}

function child(el: Element | undefined, name: string): Element | undefined {
  return el ? elementChildren(el, name)[0] : undefined;
}

function attr(el: Element | undefined, name: string = "w:val"): string | undefined {
  return el?.attribs[name];
}

/** OOXML toggle: present without a value means on */
function onOff(el: Element | undefined, name: string = "w:val"): boolean | undefined {
  if (!el) return undefined;
  const value = attr(el, name);
  if (name !== "w:val" && value === undefined) return false;
  return value === undefined || !OFF_VALUES.has(value.toLowerCase());
}

function textOf(el: Element): string {
  let text = "";
  for (const node of el.children) {
    if (isText(node)) text += node.data;
    else if (isTag(node)) text += textOf(node);
  }
  return text;
}
