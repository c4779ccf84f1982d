// Face Metrics Pipeline - Configuration
// Calibration constants are approximate, so every threshold is a named,
// overridable parameter with the defaults below.

import { config as loadDotenv } from "dotenv";
import { ContractViolationError } from "./errors.js";
import type { PipelineConfig, PipelineConfigOverrides } from "./types.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = freezeConfig({
  quality: {
    weights: {
      orientation: 0.4,
      eyeOpenness: 0.3,
      smileNeutrality: 0.1,
      landmarkCoverage: 0.2,
    },
    orientationWeights: {
      pitch: 0.4,
      roll: 0.3,
      yaw: 0.3,
    },
    maxAngleDeg: 45,
    landmarkTarget: 5,
  },
  extractor: {
    smilingThreshold: 0.7,
    eyesOpenThreshold: 0.5,
  },
  classifier: {
    tooFarRange: 150,
    tooCloseRange: 50,
    misalignedAngleDeg: 20,
    rangeScale: 40,
  },
  smoothing: {
    windowSize: 5,
    latestBoxWeight: 0.7,
  },
});

/** Freeze every section so the shared defaults cannot be changed through a component. */
function freezeConfig(config: PipelineConfig): PipelineConfig {
  Object.freeze(config.quality.weights);
  Object.freeze(config.quality.orientationWeights);
  Object.freeze(config.quality);
  Object.freeze(config.extractor);
  Object.freeze(config.classifier);
  Object.freeze(config.smoothing);
  return Object.freeze(config);
}

// ─── Merging ────────────────────────────────────────────────────────────────────

export function resolvePipelineConfig(
  overrides: PipelineConfigOverrides = {},
): PipelineConfig {
  const base = DEFAULT_PIPELINE_CONFIG;
  return {
    quality: {
      ...base.quality,
      ...overrides.quality,
      weights: { ...base.quality.weights, ...overrides.quality?.weights },
      orientationWeights: {
        ...base.quality.orientationWeights,
        ...overrides.quality?.orientationWeights,
      },
    },
    extractor: { ...base.extractor, ...overrides.extractor },
    classifier: { ...base.classifier, ...overrides.classifier },
    smoothing: { ...base.smoothing, ...overrides.smoothing },
  };
}

// ─── Environment ────────────────────────────────────────────────────────────────

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || String(value) !== raw.trim()) {
    throw new ContractViolationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

// parseFloat accepts trailing junk ("0.5abc"); the whole value must be a number
const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

function readFloat(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = parseFloat(raw);
  if (!Number.isFinite(value) || !DECIMAL_PATTERN.test(raw.trim())) {
    throw new ContractViolationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Build overrides from `FACE_*` variables. Pure: reads only the given env.
 * Unset variables leave the corresponding default in place.
 */
export function pipelineOverridesFromEnv(env: Env): PipelineConfigOverrides {
  const smilingThreshold = readFloat(env, "FACE_SMILING_THRESHOLD");
  const eyesOpenThreshold = readFloat(env, "FACE_EYES_OPEN_THRESHOLD");
  const tooFarRange = readFloat(env, "FACE_TOO_FAR_RANGE");
  const tooCloseRange = readFloat(env, "FACE_TOO_CLOSE_RANGE");
  const misalignedAngleDeg = readFloat(env, "FACE_MISALIGNED_ANGLE_DEG");
  const rangeScale = readFloat(env, "FACE_RANGE_SCALE");
  const windowSize = readInt(env, "FACE_SMOOTHING_WINDOW");

  return {
    extractor: {
      ...(smilingThreshold !== undefined && { smilingThreshold }),
      ...(eyesOpenThreshold !== undefined && { eyesOpenThreshold }),
    },
    classifier: {
      ...(tooFarRange !== undefined && { tooFarRange }),
      ...(tooCloseRange !== undefined && { tooCloseRange }),
      ...(misalignedAngleDeg !== undefined && { misalignedAngleDeg }),
      ...(rangeScale !== undefined && { rangeScale }),
    },
    smoothing: {
      ...(windowSize !== undefined && { windowSize }),
    },
  };
}

/**
 * Load `.env` (if present) into `process.env` and resolve the pipeline config
 * from it. Variables already set in the environment win over `.env`.
 */
export function loadPipelineConfigFromEnv(
  env: Env = process.env,
): PipelineConfig {
  if (env === process.env) {
    loadDotenv();
  }
  return resolvePipelineConfig(pipelineOverridesFromEnv(env));
}
