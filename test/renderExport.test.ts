import { test } from "node:test";
import { strict as assert } from "assert";
import fs from "fs";
import os from "os";
import path from "path";
import { escapeHtml, exportHTML, renderHTML, styleToCss } from "../export/htmlExport";
import PizZip from "pizzip";
import { buildDocx, escapeXml, exportDOCX, renderDocumentXml, stylesXml } from "../export/docxExport";
import { parseDocx } from "../ingest/docxIngest";
import { RenderedUnit, RunResult, StyleMetadata } from "../schema/templateSchema";

function unit(slotId: string, role: string, text: string, style: StyleMetadata | null): RenderedUnit {
  return { slotId, role, ordinal: 0, text, style, blockIndex: 0, overflow: style === null };
}

function result(units: RenderedUnit[], source: RunResult["source"] = { title: "Report", format: "html" }): RunResult {
  return { domain: "report", source, units, diagnostics: [] };
}

function cell(text: string, row: number, column: number, rowCount = 1, columnCount = 1): RenderedUnit {
  return unit("slot-3", "cell", text, { table: { tableIndex: 0, row, column, rowCount, columnCount } });
}

// ── HTML ─────────────────────────────────────────────────────

test("headings render from their style id with inline CSS", () => {
  const html = renderHTML(
    result([unit("slot-1", "title", "Hello & welcome", { styleId: "Title", fontSize: 24, bold: true })])
  );
  assert.ok(
    html.includes(
      `<h1 data-slot="slot-1" data-role="title" style="font-size: 24pt; font-weight: bold">Hello &amp; welcome</h1>`
    )
  );
  assert.ok(html.includes("<title>report</title>"));
});

test("consecutive list units are grouped and indentation is left to the list", () => {
  const item = { list: { kind: "bullet" as const, level: 1 }, indentLevel: 1 };
  const html = renderHTML(result([unit("slot-2", "item", "One", item), unit("slot-2", "item", "Two", item)]));
  assert.ok(
    html.includes(
      `<ul>\n  <li data-slot="slot-2" data-role="item">One</li>\n  <li data-slot="slot-2" data-role="item">Two</li>\n</ul>`
    )
  );
});

test("overflow units go to an unstyled section after the body", () => {
  const html = renderHTML(
    result([unit("slot-1", "body", "Kept", {}), unit("overflow", "overflow", "Extra <b>", null)]),
    "Custom"
  );
  assert.ok(html.includes(`<p data-slot="slot-1" data-role="body">Kept</p>`));
  assert.ok(html.includes(`\n<section class="overflow">\n  <p>Extra &lt;b&gt;</p>\n</section>`));
  assert.ok(html.includes("<title>Custom</title>"));
});

test("repeated units of one table cell become rows of their own", () => {
  const html = renderHTML(result([cell("First", 0, 0), cell("Second", 0, 0), cell("Third", 0, 0)]));
  assert.ok(
    html.includes(
      `<table>\n` +
        `  <tr><td data-slot="slot-3" data-role="cell">First</td></tr>\n` +
        `  <tr><td data-slot="slot-3" data-role="cell">Second</td></tr>\n` +
        `  <tr><td data-slot="slot-3" data-role="cell">Third</td></tr>\n` +
        `</table>`
    )
  );
});

test("styleToCss emits properties in a fixed order", () => {
  assert.equal(
    styleToCss({
      indentLevel: 2,
      alignment: "right",
      color: "336699",
      underline: false,
      italic: true,
      bold: false,
      fontSize: 10.5,
      fontFamily: "O'Brien Sans",
    }),
    "font-family: 'OBrien Sans'; font-size: 10.5pt; font-weight: normal; font-style: italic; " +
      "text-decoration: none; color: #336699; text-align: right; margin-left: 72pt"
  );
  assert.equal(styleToCss({ indentLevel: 1 }, { skipIndent: true }), "");
});

test("escapeHtml", () => {
  assert.equal(escapeHtml(`<a href="x">'&'</a>`), "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
});

// ── DOCX ─────────────────────────────────────────────────────

test("document.xml paragraphs carry style and escaped text", () => {
  const xml = renderDocumentXml([
    unit("slot-1", "title", "", { styleId: "Title" }),
    unit("slot-2", "body", "A < B", { bold: true, fontSize: 11 }),
  ]);
  assert.ok(xml.includes(`<w:p><w:pPr><w:pStyle w:val="Title"/></w:pPr></w:p>`));
  assert.ok(
    xml.includes(`<w:p><w:r><w:rPr><w:b/><w:sz w:val="22"/></w:rPr><w:t xml:space="preserve">A &lt; B</w:t></w:r></w:p>`)
  );
});

test("escapeXml", () => {
  assert.equal(escapeXml(`"a" & <b>`), "&quot;a&quot; &amp; &lt;b&gt;");
});

test("a built document reads back with the same styles", () => {
  const buffer = buildDocx(
    result([
      unit("slot-1", "title", "Heading", { bold: true, color: "FF0000", fontSize: 14, alignment: "center" }),
      unit("slot-2", "step", "Step one", { list: { kind: "ordered", level: 1 }, indentLevel: 1 }),
      unit("slot-3", "cell", "A1", { table: { tableIndex: 0, row: 0, column: 0, rowCount: 1, columnCount: 2 } }),
      unit("slot-3", "cell", "B1", { table: { tableIndex: 0, row: 0, column: 1, rowCount: 1, columnCount: 2 } }),
    ])
  );
  const tree = parseDocx(buffer, "rendered.docx");
  assert.deepEqual(tree.units.map((u) => u.text), ["Heading", "Step one", "A1", "B1"]);
  assert.deepEqual(tree.units[0].style, { bold: true, color: "FF0000", fontSize: 14, alignment: "center" });
  assert.deepEqual(tree.units[1].style, { list: { kind: "ordered", level: 1, numId: "2" }, indentLevel: 1 });
  assert.deepEqual(tree.units[3].style, {
    table: { tableIndex: 0, row: 0, column: 1, rowCount: 1, columnCount: 2 },
  });
  assert.equal(tree.metadata.title, "Heading");
});

test("repeated table units read back as consecutive rows", () => {
  const units = [cell("Name", 0, 0, 2, 2), cell("Role", 0, 1, 2, 2), cell("Ada", 1, 0, 2, 2), cell("Grace", 1, 0, 2, 2)];
  assert.equal(renderDocumentXml(units).split("<w:tr>").length - 1, 3);

  const tree = parseDocx(buildDocx(result(units)), "rows.docx");
  assert.deepEqual(
    tree.units.map((u) => [u.text, u.style.table?.row, u.style.table?.column]),
    [
      ["Name", 0, 0],
      ["Role", 0, 1],
      ["Ada", 1, 0],
      ["Grace", 2, 0],
    ]
  );
  assert.equal(tree.units[3].style.table?.rowCount, 3);
  assert.equal(tree.units[3].style.table?.columnCount, 2);
});

test("a new document defines the paragraph styles it refers to", () => {
  const heading = unit("slot-1", "title", "Plan", { styleId: "Heading1", styleName: "heading 1" });
  const custom = unit("slot-2", "body", "Text", { styleId: "BodyCopy" });
  assert.equal(
    stylesXml([heading, custom, heading]),
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>` +
      `<w:styles xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main">` +
      `<w:style w:type="paragraph" w:customStyle="1" w:styleId="Heading1"><w:name w:val="heading 1"/></w:style>` +
      `<w:style w:type="paragraph" w:customStyle="1" w:styleId="BodyCopy"><w:name w:val="BodyCopy"/></w:style>` +
      `</w:styles>`
  );
  const tree = parseDocx(buildDocx(result([heading, custom])), "styled.docx");
  assert.deepEqual(tree.units[0].style, { styleId: "Heading1", styleName: "heading 1" });
  assert.deepEqual(tree.units[1].style, { styleId: "BodyCopy", styleName: "BodyCopy" });
});

// ── Template fill ────────────────────────────────────────────

const W = `xmlns:w="http://schemas.openxmlformats.org/wordprocessingml/2006/main"`;
const R = `xmlns:r="http://schemas.openxmlformats.org/officeDocument/2006/relationships"`;
const SECT_PR = `<w:sectPr><w:headerReference w:type="default" r:id="rId3"/><w:pgSz w:w="12240" w:h="15840"/></w:sectPr>`;

const TEMPLATE_PARTS: Record<string, string> = {
  "[Content_Types].xml": `<?xml version="1.0"?><Types xmlns="http://schemas.openxmlformats.org/package/2006/content-types"/>`,
  "word/document.xml":
    `<?xml version="1.0"?><w:document ${W} ${R}><w:body>` +
    `<w:p><w:pPr><w:pStyle w:val="Heading1"/></w:pPr><w:r><w:t>Old heading</w:t></w:r></w:p>` +
    `<w:p><w:pPr><w:numPr><w:ilvl w:val="0"/><w:numId w:val="7"/></w:numPr></w:pPr><w:r><w:t>Old item</w:t></w:r></w:p>` +
    `${SECT_PR}</w:body></w:document>`,
  "word/styles.xml":
    `<?xml version="1.0"?><w:styles ${W}>` +
    `<w:docDefaults><w:rPrDefault><w:rPr><w:rFonts w:ascii="Calibri"/><w:sz w:val="22"/></w:rPr></w:rPrDefault></w:docDefaults>` +
    `<w:style w:type="paragraph" w:styleId="Heading1"><w:name w:val="heading 1"/><w:rPr><w:b/><w:sz w:val="32"/></w:rPr></w:style>` +
    `</w:styles>`,
  "word/numbering.xml":
    `<?xml version="1.0"?><w:numbering ${W}>` +
    `<w:abstractNum w:abstractNumId="3"><w:lvl w:ilvl="0"><w:numFmt w:val="bullet"/></w:lvl></w:abstractNum>` +
    `<w:num w:numId="7"><w:abstractNumId w:val="3"/></w:num></w:numbering>`,
  "word/header1.xml": `<?xml version="1.0"?><w:hdr ${W}><w:p><w:r><w:t>Letterhead</w:t></w:r></w:p></w:hdr>`,
  "word/theme/theme1.xml": `<?xml version="1.0"?><a:theme xmlns:a="http://schemas.openxmlformats.org/drawingml/2006/main" name="Office"/>`,
  "word/_rels/document.xml.rels": `<?xml version="1.0"?><Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships"/>`,
};

function templateDocx(parts: Record<string, string> = TEMPLATE_PARTS): Buffer {
  const zip = new PizZip();
  for (const [name, content] of Object.entries(parts)) zip.file(name, content);
  return zip.generate({ type: "nodebuffer" });
}

const filledUnits = [
  unit("slot-1", "heading", "New heading", { styleId: "Heading1", styleName: "heading 1", bold: true, fontSize: 16 }),
  unit("slot-2", "item", "New item", { list: { kind: "bullet", level: 0, numId: "7" }, indentLevel: 0 }),
];

test("a template keeps every part except the document body", () => {
  const out = new PizZip(buildDocx(result(filledUnits), templateDocx()));
  for (const name of Object.keys(TEMPLATE_PARTS)) {
    if (name === "word/document.xml") continue;
    assert.equal(out.file(name)?.asText(), TEMPLATE_PARTS[name], name);
  }

  const documentXml = out.file("word/document.xml")?.asText() ?? "";
  assert.ok(documentXml.startsWith(`<?xml version="1.0"?><w:document ${W} ${R}><w:body><w:p>`));
  assert.ok(documentXml.endsWith(`${SECT_PR}</w:body></w:document>`));
  assert.ok(
    documentXml.includes(
      `<w:p><w:pPr><w:numPr><w:ilvl w:val="0"/><w:numId w:val="7"/></w:numPr></w:pPr>` +
        `<w:r><w:t xml:space="preserve">New item</w:t></w:r></w:p>`
    )
  );
  assert.equal(documentXml.includes("Old heading"), false);
});

test("text poured into a template resolves the template's styles and lists", () => {
  const tree = parseDocx(buildDocx(result(filledUnits), templateDocx()), "filled.docx");
  assert.deepEqual(tree.units.map((u) => u.text), ["New heading", "New item"]);
  assert.deepEqual(tree.units[0].style, {
    styleId: "Heading1",
    styleName: "heading 1",
    fontFamily: "Calibri",
    fontSize: 16,
    bold: true,
  });
  assert.deepEqual(tree.units[1].style, {
    fontFamily: "Calibri",
    fontSize: 11,
    list: { kind: "bullet", level: 0, numId: "7" },
    indentLevel: 0,
  });
});

test("a template without a document part is rejected", () => {
  const broken = templateDocx({ "word/styles.xml": TEMPLATE_PARTS["word/styles.xml"] });
  assert.throws(() => buildDocx(result(filledUnits), broken), /DOCX template has no word\/document\.xml/);
});

// ── Files ────────────────────────────────────────────────────

test("exportHTML and exportDOCX write into the output directory", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "render-"));
  const run = result([unit("slot-1", "body", "Text", {})]);

  const htmlPath = await exportHTML(run, dir, { title: "Weekly Notes" });
  assert.equal(htmlPath, path.join(dir, "weekly-notes.html"));
  assert.ok(fs.readFileSync(htmlPath, "utf-8").startsWith("<!DOCTYPE html>"));

  const docxPath = await exportDOCX(run, dir);
  assert.equal(docxPath, path.join(dir, "report.docx"));
  assert.deepEqual(parseDocx(fs.readFileSync(docxPath)).units.map((u) => u.text), ["Text"]);
  fs.rmSync(dir, { recursive: true, force: true });
});

test("exportDOCX fills the schema's source document when it still exists", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "render-"));
  const sourcePath = path.join(dir, "source.docx");
  fs.writeFileSync(sourcePath, templateDocx());

  const filled = await exportDOCX(
    result(filledUnits, { title: "Source", format: "docx", path: sourcePath }),
    dir,
    { filename: "filled" }
  );
  const kept = new PizZip(fs.readFileSync(filled));
  assert.equal(kept.file("word/header1.xml")?.asText(), TEMPLATE_PARTS["word/header1.xml"]);

  const fresh = await exportDOCX(
    result(filledUnits, { title: "Source", format: "docx", path: path.join(dir, "moved.docx") }),
    dir,
    { filename: "fresh" }
  );
  const rebuilt = new PizZip(fs.readFileSync(fresh));
  assert.equal(rebuilt.file("word/header1.xml"), null);
  assert.ok(rebuilt.file("word/styles.xml")?.asText().includes(`w:styleId="Heading1"`));
  fs.rmSync(dir, { recursive: true, force: true });
});
