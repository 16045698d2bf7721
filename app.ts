#!/usr/bin/env node
// ─────────────────────────────────────────────────────────────
// Template Schema Engine — Main Application Controller
// ─────────────────────────────────────────────────────────────
//
// Usage:
//   npx tsx app.ts build <document> [options]
//   npx tsx app.ts run <schema.json> <content.txt> [options]
//   npx tsx app.ts domains
//
// Examples:
//   npx tsx app.ts build ./input/resume.docx --out ./output
//   npx tsx app.ts build ./input/letter.html --domain letter
//   npx tsx app.ts run ./output/resume.schema.json ./input/new.txt --html --docx
//
// ─────────────────────────────────────────────────────────────

import path from "path";
import { EngineConfig, getEngineConfig, parseBlockMode, parseBoundaryPolicy } from "./config/engineConfig";
import { getDomainPackRegistry, isRequired } from "./parser/domainPacks";
import { buildSchemaFromFile } from "./parser/schemaBuilder";
import { runSchemaFromFiles } from "./runner/runPipeline";
import { exportSchema, exportRunResult } from "./export/jsonExport";
import { exportHTML } from "./export/htmlExport";
import { exportDOCX } from "./export/docxExport";
import { computeCanonicalFingerprint } from "./integrity/canonicalizer";

/** Exit code when no domain pack clears the score floor */
const EXIT_NO_CONFIDENT_DOMAIN = 2;

// ── CLI Argument Parsing ─────────────────────────────────────

type Command = "build" | "run" | "domains";

interface CLIOptions {
  command: Command;
  positional: string[];
  outputDir: string;
  domain: string | null;
  exportHTML: boolean;
  exportDOCX: boolean;
  template: string | null;
  config: Partial<EngineConfig>;
}

function parseArgs(): CLIOptions {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printHelp();
    process.exit(0);
  }

  const getFlag = (flag: string): string | null => {
    const idx = args.indexOf(flag);
    return idx !== -1 && idx + 1 < args.length ? args[idx + 1] : null;
  };

  const command = args[0];
  if (command !== "build" && command !== "run" && command !== "domains") {
    throw new Error(`Unknown command: ${command} (expected build | run | domains)`);
  }

  const flagsWithValues = new Set([
    "--out", "--domain", "--boundary", "--block-mode", "--min-confidence", "--score-floor", "--template",
  ]);
  const positional: string[] = [];
  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      if (flagsWithValues.has(arg)) i++; // skip the value too
      continue;
    }
    positional.push(arg);
  }

  const config: Partial<EngineConfig> = {};
  const boundary = getFlag("--boundary");
  if (boundary) config.boundaryPolicy = parseBoundaryPolicy(boundary);
  const blockMode = getFlag("--block-mode");
  if (blockMode) config.blockMode = parseBlockMode(blockMode);
  const minConfidence = getFlag("--min-confidence");
  if (minConfidence) config.minConfidence = parseNumberFlag("--min-confidence", minConfidence);
  const scoreFloor = getFlag("--score-floor");
  if (scoreFloor) config.scoreFloor = parseNumberFlag("--score-floor", scoreFloor);
  if (args.includes("--verbose")) config.verbose = true;

  return {
    command,
    positional,
    outputDir: getFlag("--out") || "./output",
    domain: getFlag("--domain"),
    exportHTML: args.includes("--html"),
    exportDOCX: args.includes("--docx"),
    template: getFlag("--template"),
    config,
  };
}

function parseNumberFlag(flag: string, value: string): number {
  const n = Number(value);
  if (Number.isNaN(n)) throw new Error(`${flag} expects a number, got "${value}"`);
  return n;
}

function printHelp(): void {
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║         TEMPLATE SCHEMA ENGINE v1.0.0                        ║
║         Infer document schemas · Re-run them on new text     ║
╚══════════════════════════════════════════════════════════════╝

USAGE:
  npx tsx app.ts build <document.docx|.html> [options]
  npx tsx app.ts run <schema.json> <content.txt> [options]
  npx tsx app.ts domains

BUILD OPTIONS:
  --domain <name>         Skip domain selection and use this pack
  --min-confidence <n>    Detector threshold (default 0.55)
  --score-floor <n>       Minimum domain score (default 0.35)

RUN OPTIONS:
  --boundary <policy>     blank-line | explicit (default blank-line)
  --block-mode <mode>     line | paragraph (default line)
  --html                  Also export as HTML
  --docx                  Also export as DOCX (fills the schema's source .docx when it exists)
  --template <file>       .docx to fill instead of the schema's source

COMMON:
  --out <dir>             Output directory (default ./output)
  --verbose               Print per-slot and per-domain details

ENVIRONMENT:
  TEMPLATE_ENGINE_MIN_CONFIDENCE, TEMPLATE_ENGINE_SCORE_FLOOR,
  TEMPLATE_ENGINE_MISSING_ROLE_PENALTY, TEMPLATE_ENGINE_CONTEXT_RADIUS,
  TEMPLATE_ENGINE_BOUNDARY_POLICY, TEMPLATE_ENGINE_BLOCK_MODE,
  TEMPLATE_ENGINE_VERBOSE=1

EXIT CODES:
  0  success
  1  fatal error
  2  no confident domain (build)
`);
}

// ── Commands ─────────────────────────────────────────────────

async function commandBuild(options: CLIOptions, config: EngineConfig): Promise<number> {
  const [documentPath] = options.positional;
  if (!documentPath) throw new Error("build requires a document path");

  const outcome = await buildSchemaFromFile(path.resolve(documentPath), {
    config: options.config,
    domain: options.domain ?? undefined,
  });

  if (config.verbose) {
    console.log("\n[SCHEMA] Domain ranking:");
    for (const score of outcome.ranking) {
      const missing = score.missingRoles.length > 0 ? ` missing: ${score.missingRoles.join(", ")}` : "";
      console.log(`  ${score.domain.padEnd(10)} ${score.score.toFixed(3)}${missing}`);
    }
  }

  if (outcome.status === "no-confident-domain") {
    console.log("[SCHEMA] Nothing exported. Use --domain <name> to force a pack.");
    return EXIT_NO_CONFIDENT_DOMAIN;
  }

  const { schema } = outcome;
  if (config.verbose) {
    console.log("\n[SCHEMA] Slots:");
    for (const slot of schema.slots) {
      console.log(
        `  ${slot.id.padEnd(8)} ${slot.role.padEnd(16)} ×${slot.realizedCount} ` +
        `conf ${slot.confidence.toFixed(2)} units [${slot.unitIndices.join(", ")}]`
      );
    }
    for (const diagnostic of schema.diagnostics) {
      console.log(`  [!] missing ${diagnostic.cardinality} role "${diagnostic.role}"`);
    }
  }

  const fingerprint = computeCanonicalFingerprint(schema);
  console.log(`[SCHEMA] Canonical hash ${fingerprint.canonicalHash.substring(0, 16)}…`);
  await exportSchema(schema, options.outputDir);
  return 0;
}

async function commandRun(options: CLIOptions, config: EngineConfig): Promise<number> {
  const [schemaPath, contentPath] = options.positional;
  if (!schemaPath || !contentPath) throw new Error("run requires <schema.json> <content.txt>");

  const result = runSchemaFromFiles(path.resolve(schemaPath), path.resolve(contentPath), options.config);
  const baseName = path.parse(contentPath).name;

  if (config.verbose) {
    for (const diagnostic of result.diagnostics) {
      if (diagnostic.kind === "unfilled-slot") {
        console.log(`  [!] slot ${diagnostic.slotId} (${diagnostic.role}) left empty`);
      } else {
        console.log(`  [!] ${diagnostic.blockIndices.length} blocks appended as overflow`);
      }
    }
  }

  await exportRunResult(result, options.outputDir, { filename: baseName });
  if (options.exportHTML) await exportHTML(result, options.outputDir, { filename: baseName, title: baseName });
  if (options.exportDOCX) {
    await exportDOCX(result, options.outputDir, { filename: baseName, template: options.template ?? undefined });
  }
  return 0;
}

function commandDomains(): number {
  console.log("\n[DOMAINS] Registered packs:");
  for (const pack of getDomainPackRegistry().values()) {
    console.log(`\n  ${pack.name} (priority ${pack.priority}) — ${pack.description}`);
    for (const role of pack.roles) {
      const flag = isRequired(role) ? "*" : " ";
      console.log(`    ${flag} ${role.name.padEnd(16)} ${role.detector.padEnd(16)} ${role.cardinality}`);
    }
  }
  return 0;
}

// ── Main ─────────────────────────────────────────────────────

async function main(): Promise<void> {
  const options = parseArgs();
  const config = getEngineConfig(options.config);

  let exitCode: number;
  switch (options.command) {
    case "build":
      exitCode = await commandBuild(options, config);
      break;
    case "run":
      exitCode = await commandRun(options, config);
      break;
    case "domains":
      exitCode = commandDomains();
      break;
  }
  process.exitCode = exitCode;
}

main().catch((err: unknown) => {
  console.error("\n[FATAL ERROR]", err instanceof Error ? err.message : err);
  process.exit(1);
});
