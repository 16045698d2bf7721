// ─────────────────────────────────────────────────────────────
// Schema Builder — Document tree → Schema pipeline
// ─────────────────────────────────────────────────────────────

import path from "path";
import { DocumentTree, DomainPack, Schema, SchemaSource } from "../schema/templateSchema";
import { EngineConfig, getEngineConfig } from "../config/engineConfig";
import { extractFeatureSequence } from "./featureExtractor";
import {
  ConfidenceTable,
  buildConfidenceTable,
  getDomainPack,
  getDomainPackRegistry,
} from "./domainPacks";
import { PackScore, rankScores, scorePack, selectDomain } from "./domainScorer";
import { match } from "./matcher";
import { aggregate } from "./aggregator";
import { ingestDocument } from "../ingest";

export type BuildOutcome =
  | { status: "built"; schema: Schema; ranking: PackScore[] }
  | { status: "no-confident-domain"; ranking: PackScore[] };

export interface BuildOptions {
  config?: Partial<EngineConfig>;
  packs?: readonly DomainPack[];   // defaults to the built-in registry
  domain?: string;                 // skip selection and use this pack
  sourcePath?: string;             // recorded on the schema for template export
}

/**
 * Infer the schema of an ingested document.
 * A forced domain is built even when its score is below the floor.
 */
export function buildSchema(tree: DocumentTree, options: BuildOptions = {}): BuildOutcome {
  const config = getEngineConfig(options.config);
  const packs = options.packs ?? [...getDomainPackRegistry().values()];
  const features = extractFeatureSequence(tree.units, config.contextRadius);

  let pack: DomainPack;
  let score: number;
  let ranking: PackScore[];
  let table: ConfidenceTable;

  if (options.domain) {
    pack = packs.find((p) => p.name === options.domain) ?? getDomainPack(options.domain);
    table = buildConfidenceTable(features, pack, config);
    const forced = scorePack(table, pack, config);
    ranking = rankScores([forced]);
    score = forced.score;
  } else {
    const selection = selectDomain(features, packs, config);
    ranking = selection.ranking;
    if (selection.status === "no-confident-domain") {
      return { status: "no-confident-domain", ranking };
    }
    const selected = packs.find((p) => p.name === selection.domain);
    if (!selected) throw new Error(`Selected domain pack disappeared: ${selection.domain}`);
    pack = selected;
    table = selection.table;
    score = selection.score;
  }

  const source: SchemaSource = { title: tree.metadata.title, format: tree.metadata.format };
  if (options.sourcePath) source.path = options.sourcePath;

  const outcome = match(table, pack, config);
  const schema = aggregate(outcome.matches, tree.units, pack, { confidence: score, source });
  return { status: "built", schema, ranking };
}

/** Ingest a document file and build its schema */
export async function buildSchemaFromFile(
  filePath: string,
  options: BuildOptions = {}
): Promise<BuildOutcome> {
  const tree = await ingestDocument(filePath);
  const outcome = buildSchema(tree, { ...options, sourcePath: path.resolve(filePath) });

  if (outcome.status === "built") {
    const { schema } = outcome;
    console.log(
      `[SCHEMA] ${schema.domain} (confidence ${schema.confidence.toFixed(2)}) — ${schema.slots.length} slots, ${schema.diagnostics.length} diagnostics`
    );
  } else {
    const best = outcome.ranking[0];
    console.log(
      `[SCHEMA] No confident domain` + (best ? ` (best: ${best.domain} at ${best.score.toFixed(2)})` : "")
    );
  }
  return outcome;
}
