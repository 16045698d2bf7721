// ─────────────────────────────────────────────────────────────
// Template Schema Engine — Core Schema Definitions
// ─────────────────────────────────────────────────────────────

/** Supported source document formats */
export type InputFormat = "docx" | "html";

/** Sentinel for style data the source document does not provide */
export const UNKNOWN = "unknown";
export type Unknown = typeof UNKNOWN;

export type Alignment = "left" | "center" | "right" | "justify";

/** List shape of a paragraph that belongs to a numbered or bulleted list */
export interface ListShape {
  kind: "bullet" | "ordered" | "unknown";
  level: number;
  numId?: string;
}

/** Position of a table cell inside its table */
export interface TableShape {
  tableIndex: number;
  row: number;
  column: number;
  rowCount: number;
  columnCount: number;
}

/** Resolved visual style of one structural unit. Absent fields are unknown. */
export interface StyleMetadata {
  styleId?: string;
  styleName?: string;
  fontFamily?: string;
  fontSize?: number;       // points
  bold?: boolean;
  italic?: boolean;
  underline?: boolean;
  color?: string;          // hex, no leading #
  alignment?: Alignment;
  indentLevel?: number;
  list?: ListShape;
  table?: TableShape;
}

/** One paragraph or table cell extracted from the source document */
export interface StructuralUnit {
  readonly index: number;
  readonly kind: "paragraph" | "table-cell";
  readonly text: string;
  readonly style: Readonly<StyleMetadata>;
}

/** Metadata about the ingested document */
export interface DocumentMetadata {
  title: string;
  format: InputFormat;
  sourceFile: string;
  unitCount: number;
  ingestedAt: string;      // ISO timestamp
}

/** Parsed document handed over by the intake layer */
export interface DocumentTree {
  metadata: DocumentMetadata;
  units: StructuralUnit[];
}

// ── Features ─────────────────────────────────────────────────

/** Flat feature record for one structural unit */
export interface FeatureVector {
  // Position
  position: number;
  relativePosition: number;        // 0..1 across the document

  // Style (sentinel when missing)
  styleId: string;
  headingLevel: number | Unknown;
  fontSize: number | Unknown;
  fontFamily: string;
  bold: boolean | Unknown;
  italic: boolean | Unknown;
  underline: boolean | Unknown;
  alignment: Alignment | Unknown;
  indentLevel: number;

  // Membership
  inList: boolean;
  listLevel: number;
  listKind: ListShape["kind"] | "none";
  inTable: boolean;
  tableRow: number;
  tableColumn: number;

  // Text
  text: string;
  textNorm: string;
  charLength: number;
  tokenCount: number;
  sentenceCount: number;
  uppercaseRatio: number;
  titlecaseRate: number;
  digitRatio: number;
  punctDensity: number;
  whitespaceDensity: number;

  // Flags
  isEmpty: boolean;
  endsWithPeriod: boolean;
  trailingColon: boolean;
  startsWithBullet: boolean;
  bulletGlyph: string | null;
  numberingPrefix: string | null;
  hasLeaderDots: boolean;
  hasAllcapsWord: boolean;
  containsBar: boolean;
  containsUrlLike: boolean;
  containsEmail: boolean;

  // Relative to the context window
  largerThanPrevious: boolean;
  largerThanNext: boolean;
  precededByEmpty: boolean;
  followedByEmpty: boolean;
}

/** Units around the one being inspected, nearest first */
export interface ContextWindow<T> {
  before: T[];
  after: T[];
}

// ── Detection ────────────────────────────────────────────────

/** Structural roles a detector can recognise */
export type DetectorId =
  | "title"
  | "heading"
  | "body"
  | "bullet-item"
  | "numbered-item"
  | "table-row"
  | "contact-line"
  | "date-line"
  | "salutation"
  | "closing"
  | "signature-block"
  | "key-value"
  | "callout"
  | "caption";

export interface DetectionResult {
  role: DetectorId;
  confidence: number;              // 0..1
  fields: Record<string, string>;
}

export type Detector = (
  features: FeatureVector,
  window: ContextWindow<FeatureVector>
) => DetectionResult;

// ── Domain packs ─────────────────────────────────────────────

export type Cardinality = "exactly-one" | "optional" | "repeatable";

/** One expected role of a domain. Names are scoped to their pack. */
export interface PackRole {
  name: string;
  detector: DetectorId;
  cardinality: Cardinality;
  weight: number;
  cues: string[];                  // normalized upper-case keywords
}

/** Pack-level text evidence that a unit belongs to the domain */
export interface DomainEvidence {
  headings: string[];              // normalized keys, matched whole
  fuzzyHeadings: string[];         // normalized keys, matched by edit similarity
  keywords: string[];              // normalized keys, matched as words
  regexes: RegExp[];               // case-insensitive, tested on the normalized line
  stopwords: string[];             // normalized keys; count against the domain
}

export interface DomainPack {
  name: string;
  description: string;
  priority: number;                // lower wins ties
  roles: PackRole[];
  adjacency: Record<string, string[]>;
  evidence: DomainEvidence;
}

// ── Schema ───────────────────────────────────────────────────

/** One position of the inferred schema */
export interface SchemaSlot {
  id: string;
  role: string;
  detector: DetectorId;
  cardinality: Cardinality;
  required: boolean;
  realizedCount: number;
  unitIndices: number[];
  confidence: number;
  style: StyleMetadata;
  placeholder: string;
  ordinal: number;
}

export type SchemaDiagnostic =
  | { kind: "missing-role"; role: string; cardinality: Cardinality };

/** Where a schema was learned from */
export interface SchemaSource {
  title: string;
  format: InputFormat;
  path?: string;                   // absolute path of the source file, when built from one
}

/** The inferred, ordered and styled slot sequence of one document */
export interface Schema {
  version: string;
  domain: string;
  confidence: number;
  source: SchemaSource;
  slots: SchemaSlot[];
  diagnostics: SchemaDiagnostic[];
}

// ── Running ──────────────────────────────────────────────────

/** One unit of new plaintext content */
export interface ContentBlock {
  index: number;
  text: string;
  boundaryBefore: boolean;         // a blank line preceded this block
  explicitBoundary: boolean;       // an explicit marker line preceded this block
}

/** One output unit: content text wrapped in a slot's captured style */
export interface RenderedUnit {
  slotId: string;
  role: string;
  ordinal: number;
  text: string;
  style: StyleMetadata | null;     // null for overflow
  blockIndex: number | null;       // null when rendered empty
  overflow: boolean;
}

export type RunDiagnostic =
  | { kind: "unfilled-slot"; slotId: string; role: string }
  | { kind: "overflow"; blockIndices: number[] };

export interface RunResult {
  domain: string;
  source: SchemaSource;
  units: RenderedUnit[];
  diagnostics: RunDiagnostic[];
}

/** Slot id used for content that exceeds the schema's capacity */
export const OVERFLOW_SLOT_ID = "overflow";
