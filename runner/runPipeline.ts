// ─────────────────────────────────────────────────────────────
// Run Pipeline — Schema + plaintext → rendered units
// ─────────────────────────────────────────────────────────────

import { RunResult, Schema } from "../schema/templateSchema";
import { EngineConfig, getEngineConfig } from "../config/engineConfig";
import { parseContentBlocks, ingestPlaintext } from "../ingest/plaintextIngest";
import { loadSchema } from "../export/jsonExport";
import { RunOptions, runSchema } from "./schemaRunner";

/** Run a schema over raw content text */
export function runSchemaOnText(
  schema: Schema,
  text: string,
  overrides: Partial<EngineConfig> = {}
): RunResult {
  const config = getEngineConfig(overrides);
  const blocks = parseContentBlocks(text, {
    blockMode: config.blockMode,
    boundaryMarkers: config.boundaryMarkers,
  });
  return runSchema(schema, blocks, runOptions(config));
}

/** Load a persisted schema and run it over a content file */
export function runSchemaFromFiles(
  schemaPath: string,
  contentPath: string,
  overrides: Partial<EngineConfig> = {}
): RunResult {
  const config = getEngineConfig(overrides);
  const schema = loadSchema(schemaPath);
  const blocks = ingestPlaintext(contentPath, {
    blockMode: config.blockMode,
    boundaryMarkers: config.boundaryMarkers,
  });
  const result = runSchema(schema, blocks, runOptions(config));

  const unfilled = result.diagnostics.filter((d) => d.kind === "unfilled-slot").length;
  const overflow = result.units.filter((u) => u.overflow).length;
  console.log(
    `[RUN] ${schema.domain}: ${result.units.length} units, ${unfilled} unfilled slots, ${overflow} overflow blocks`
  );
  return result;
}

function runOptions(config: EngineConfig): RunOptions {
  return {
    boundaryPolicy: config.boundaryPolicy,
    minConfidence: config.minConfidence,
    contextRadius: config.contextRadius,
  };
}
