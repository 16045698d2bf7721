// ─────────────────────────────────────────────────────────────
// Engine Configuration — Thresholds & runner policies
// ─────────────────────────────────────────────────────────────

/** How a repeatable slot decides where its run of blocks ends */
export type BoundaryPolicy = "blank-line" | "explicit";

/** How plaintext is cut into content blocks */
export type BlockMode = "line" | "paragraph";

export interface EngineConfig {
  contextRadius: number;         // units before/after used for relative features
  minConfidence: number;         // detector hits below this are ignored
  missingRolePenalty: number;    // subtracted per required role without a hit
  scoreFloor: number;            // below this no domain is selected
  cueBoost: number;              // added when a role's keyword cue matches
  adjacencyPenalty: number;      // multiplier for a disallowed direct successor
  topK: number;                  // domain proposals kept on the selection
  boundaryPolicy: BoundaryPolicy;
  blockMode: BlockMode;
  boundaryMarkers: string[];
  verbose: boolean;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  contextRadius: 2,
  minConfidence: 0.55,
  missingRolePenalty: 0.15,
  scoreFloor: 0.35,
  cueBoost: 0.15,
  adjacencyPenalty: 0.5,
  topK: 3,
  boundaryPolicy: "blank-line",
  blockMode: "line",
  boundaryMarkers: ["---", "***", "==="],
  verbose: false,
};

/**
 * Resolve the engine configuration.
 * Precedence: explicit overrides → TEMPLATE_ENGINE_* environment → defaults.
 */
export function getEngineConfig(
  overrides: Partial<EngineConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): EngineConfig {
  const fromEnv: Partial<EngineConfig> = {};

  const radius = readNumber(env, "TEMPLATE_ENGINE_CONTEXT_RADIUS");
  if (radius !== undefined) fromEnv.contextRadius = radius;
  const minConfidence = readNumber(env, "TEMPLATE_ENGINE_MIN_CONFIDENCE");
  if (minConfidence !== undefined) fromEnv.minConfidence = minConfidence;
  const penalty = readNumber(env, "TEMPLATE_ENGINE_MISSING_ROLE_PENALTY");
  if (penalty !== undefined) fromEnv.missingRolePenalty = penalty;
  const floor = readNumber(env, "TEMPLATE_ENGINE_SCORE_FLOOR");
  if (floor !== undefined) fromEnv.scoreFloor = floor;

  const policy = env.TEMPLATE_ENGINE_BOUNDARY_POLICY;
  if (policy) fromEnv.boundaryPolicy = parseBoundaryPolicy(policy);
  const blockMode = env.TEMPLATE_ENGINE_BLOCK_MODE;
  if (blockMode) fromEnv.blockMode = parseBlockMode(blockMode);
  if (env.TEMPLATE_ENGINE_VERBOSE) fromEnv.verbose = env.TEMPLATE_ENGINE_VERBOSE === "1";

  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...fromEnv, ...overrides };
  validateConfig(config);
  return config;
}

export function parseBoundaryPolicy(value: string): BoundaryPolicy {
  if (value === "blank-line" || value === "explicit") return value;
  throw new Error(`Invalid boundary policy: ${value} (expected blank-line | explicit)`);
}

export function parseBlockMode(value: string): BlockMode {
  if (value === "line" || value === "paragraph") return value;
  throw new Error(`Invalid block mode: ${value} (expected line | paragraph)`);
}

// ── Helpers ──────────────────────────────────────────────────

function readNumber(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new Error(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function validateConfig(config: EngineConfig): void {
  const unitInterval: (keyof EngineConfig)[] = [
    "minConfidence",
    "missingRolePenalty",
    "scoreFloor",
    "cueBoost",
    "adjacencyPenalty",
  ];
  for (const key of unitInterval) {
    const value = config[key];
    if (typeof value !== "number" || value < 0 || value > 1) {
      throw new Error(`Config ${key} must be within [0, 1], got ${String(value)}`);
    }
  }
  if (!Number.isInteger(config.contextRadius) || config.contextRadius < 0) {
    throw new Error(`Config contextRadius must be a non-negative integer, got ${config.contextRadius}`);
  }
  if (!Number.isInteger(config.topK) || config.topK < 1) {
    throw new Error(`Config topK must be a positive integer, got ${config.topK}`);
  }
}
