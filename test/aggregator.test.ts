import { test } from "node:test";
import { strict as assert } from "assert";
import { aggregate, SchemaIntegrityError, SCHEMA_VERSION } from "../parser/aggregator";
import { loadDomainPacks } from "../parser/domainPacks";
import { RoleMatch } from "../parser/matcher";
import { canonicalHash } from "../integrity/canonicalizer";
import { units } from "./fixtures";

const [pack] = loadDomainPacks([
  {
    name: "cv",
    roles: [
      { name: "title", detector: "title", cardinality: "exactly-one" },
      { name: "heading", detector: "heading", cardinality: "repeatable" },
      { name: "entry", detector: "bullet-item", cardinality: "repeatable" },
      { name: "note", detector: "callout", cardinality: "optional" },
    ],
  },
]);

const doc = units([
  { text: "Jane Doe", style: { fontSize: 20, bold: true } },
  { text: "EXPERIENCE", style: { bold: true } },
  { text: "• Built things", style: { list: { kind: "bullet", level: 0 } } },
  { text: "• Fixed things", style: { list: { kind: "bullet", level: 0 } } },
]);

const context = { confidence: 0.87654, source: { title: "Jane Doe", format: "docx" as const } };

const matches: RoleMatch[] = [
  { unitIndex: 0, role: "title", confidence: 0.9 },
  { unitIndex: 1, role: "heading", confidence: 0.8 },
  { unitIndex: 2, role: "entry", confidence: 0.9 },
  { unitIndex: 3, role: "entry", confidence: 0.7 },
];

function violationsOf(list: RoleMatch[]): string[] {
  try {
    aggregate(list, doc, pack, context);
  } catch (err) {
    if (err instanceof SchemaIntegrityError) return err.violations;
    throw err;
  }
  return [];
}

// ── Slots ────────────────────────────────────────────────────

test("consecutive matches of a repeatable role share one slot", () => {
  const schema = aggregate(matches, doc, pack, context);
  assert.equal(schema.version, SCHEMA_VERSION);
  assert.equal(schema.domain, "cv");
  assert.equal(schema.confidence, 0.8765);
  assert.deepEqual(schema.source, { title: "Jane Doe", format: "docx" });
  assert.deepEqual(schema.slots, [
    {
      id: "slot-1",
      role: "title",
      detector: "title",
      cardinality: "exactly-one",
      required: true,
      realizedCount: 1,
      unitIndices: [0],
      confidence: 0.9,
      style: { fontSize: 20, bold: true },
      placeholder: "{{slot-1:title}}",
      ordinal: 0,
    },
    {
      id: "slot-2",
      role: "heading",
      detector: "heading",
      cardinality: "repeatable",
      required: true,
      realizedCount: 1,
      unitIndices: [1],
      confidence: 0.8,
      style: { bold: true },
      placeholder: "{{slot-2:heading}}",
      ordinal: 1,
    },
    {
      id: "slot-3",
      role: "entry",
      detector: "bullet-item",
      cardinality: "repeatable",
      required: true,
      realizedCount: 2,
      unitIndices: [2, 3],
      confidence: 0.8,
      style: { list: { kind: "bullet", level: 0 } },
      placeholder: "{{slot-3:entry}}",
      ordinal: 2,
    },
  ]);
  assert.deepEqual(schema.diagnostics, []);
});

test("slot style is a copy of the first unit's style", () => {
  const schema = aggregate(matches, doc, pack, context);
  assert.deepEqual(schema.slots[2].style, doc[2].style);
  assert.notStrictEqual(schema.slots[2].style, doc[2].style);
});

test("a repeatable role interrupted by another role gets a second slot", () => {
  const schema = aggregate(
    [
      { unitIndex: 0, role: "title", confidence: 0.9 },
      { unitIndex: 1, role: "entry", confidence: 0.8 },
      { unitIndex: 2, role: "note", confidence: 0.9 },
      { unitIndex: 3, role: "entry", confidence: 0.8 },
    ],
    doc,
    pack,
    context
  );
  assert.deepEqual(schema.slots.map((s) => s.role), ["title", "entry", "note", "entry"]);
  assert.deepEqual(schema.slots.map((s) => s.ordinal), [0, 1, 2, 3]);
});

test("missing required roles become diagnostics", () => {
  const schema = aggregate(
    [
      { unitIndex: 0, role: "title", confidence: 0.9 },
      { unitIndex: 2, role: "entry", confidence: 0.9 },
    ],
    doc,
    pack,
    context
  );
  assert.deepEqual(schema.diagnostics, [{ kind: "missing-role", role: "heading", cardinality: "repeatable" }]);
});

test("no matches yields an empty schema with every required role reported", () => {
  const schema = aggregate([], doc, pack, context);
  assert.deepEqual(schema.slots, []);
  assert.deepEqual(schema.diagnostics.map((d) => d.role), ["title", "heading", "entry"]);
});

test("aggregation is deterministic", () => {
  assert.equal(
    canonicalHash(aggregate(matches, doc, pack, context)),
    canonicalHash(aggregate(matches, doc, pack, context))
  );
});

// ── Integrity ────────────────────────────────────────────────

test("out-of-order matches are a fatal integrity error", () => {
  assert.deepEqual(
    violationsOf([
      { unitIndex: 1, role: "heading", confidence: 0.8 },
      { unitIndex: 0, role: "title", confidence: 0.9 },
    ]),
    ["unit index 0 does not follow 1", `required role "title" appears out of pack order`]
  );
});

test("an exactly-one role matched twice is a fatal integrity error", () => {
  assert.deepEqual(
    violationsOf([
      { unitIndex: 0, role: "title", confidence: 0.9 },
      { unitIndex: 1, role: "title", confidence: 0.9 },
    ]),
    [`exactly-one role "title" matched more than once`]
  );
});

test("unknown roles and units are fatal integrity errors", () => {
  assert.deepEqual(
    violationsOf([
      { unitIndex: 0, role: "ghost", confidence: 0.9 },
      { unitIndex: 9, role: "title", confidence: 0.9 },
    ]),
    [`role "ghost" is not part of pack "cv"`, "unit index 9 is not in the document"]
  );
});
