import { test } from "node:test";
import { strict as assert } from "assert";
import { parseHtml } from "../ingest/htmlIngest";

const PAGE = `<!DOCTYPE html>
<html>
<head><title>Team Update</title></head>
<body>
  <h1 style="text-align: center; color: #1a2b3c">Weekly Update</h1>
  <p style="font-size: 16px; font-family: 'Georgia', serif">Progress was steady this week.</p>
  <p><strong>Highlights</strong></p>
  <ul>
    <li>Shipped search
      <ul><li>Nested item</li></ul>
    </li>
  </ul>
  <ol><li>Plan review</li></ol>
  <table>
    <tr><th>Metric</th><th>Value</th></tr>
    <tr><td>Uptime</td><td>99.9</td></tr>
  </table>
  <blockquote><p>Stay curious.</p></blockquote>
</body>
</html>`;

test("block elements become units in document order", () => {
  const tree = parseHtml(PAGE, "update.html");
  assert.equal(tree.metadata.title, "Team Update");
  assert.equal(tree.metadata.format, "html");
  assert.equal(tree.metadata.sourceFile, "update.html");
  assert.deepEqual(tree.units.map((u) => u.text), [
    "Weekly Update",
    "Progress was steady this week.",
    "Highlights",
    "Shipped search",
    "Nested item",
    "Plan review",
    "Metric",
    "Value",
    "Uptime",
    "99.9",
    "Stay curious.",
  ]);
});

test("heading tags, inline CSS and whole-text emphasis become style metadata", () => {
  const [heading, para, strong] = parseHtml(PAGE).units;
  assert.deepEqual(heading.style, {
    styleId: "Heading1",
    styleName: "heading 1",
    alignment: "center",
    color: "1A2B3C",
  });
  assert.deepEqual(para.style, { fontSize: 12, fontFamily: "Georgia" });
  assert.deepEqual(strong.style, { bold: true });
});

test("list items carry kind and nesting level", () => {
  const units = parseHtml(PAGE).units;
  assert.deepEqual(units[3].style, { list: { kind: "bullet", level: 0 }, indentLevel: 0 });
  assert.deepEqual(units[4].style, { list: { kind: "bullet", level: 1 }, indentLevel: 1 });
  assert.deepEqual(units[5].style, { list: { kind: "ordered", level: 0 }, indentLevel: 0 });
});

test("table cells carry their grid position; header cells are bold", () => {
  const units = parseHtml(PAGE).units;
  assert.equal(units[6].kind, "table-cell");
  assert.deepEqual(units[6].style, {
    bold: true,
    table: { tableIndex: 0, row: 0, column: 0, rowCount: 2, columnCount: 2 },
  });
  assert.deepEqual(units[9].style, {
    table: { tableIndex: 0, row: 1, column: 1, rowCount: 2, columnCount: 2 },
  });
});

test("a quote keeps its paragraph as one unit", () => {
  const units = parseHtml(PAGE).units;
  assert.equal(units.length, 11);
  assert.deepEqual(units[10].style, { styleId: "Quote" });
});

test("blocks nested in cells, items and quotes are read once, as part of their container", () => {
  const units = parseHtml(
    "<body><table><tr><td><h1>Cell heading</h1></td></tr></table>" +
      "<ul><li><blockquote>Quoted item</blockquote></li></ul>" +
      "<blockquote><h2>Quoted heading</h2></blockquote></body>"
  ).units;
  assert.deepEqual(
    units.map((u) => [u.kind, u.text]),
    [
      ["table-cell", "Cell heading"],
      ["paragraph", "Quoted item"],
      ["paragraph", "Quoted heading"],
    ]
  );
  assert.deepEqual(units[1].style, { list: { kind: "bullet", level: 0 }, indentLevel: 0 });
  assert.deepEqual(units[2].style, { styleId: "Quote" });
});

test("the title falls back to the first h1, then the file name", () => {
  assert.equal(parseHtml("<body><h1>Only Heading</h1></body>").metadata.title, "Only Heading");
  assert.equal(parseHtml("<body><p>Text</p></body>", "notes.html").metadata.title, "notes");
});
