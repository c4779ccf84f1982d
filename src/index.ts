// Face Metrics Pipeline - Entry point
// Public API plus a factory that wires every component from one config.

import { resolvePipelineConfig } from "./config.js";
import { DetectionStatusClassifier, type RangeEstimator } from "./detection-status.js";
import { FaceMetricsSession, type FaceSessionCallbacks } from "./face-session.js";
import type { PipelineLogger } from "./logger.js";
import { MetricsExtractor } from "./metrics-extractor.js";
import { OverlayCoordinateMapper } from "./overlay-mapper.js";
import { QualityScorer } from "./quality-scorer.js";
import { TemporalSmoother } from "./temporal-smoother.js";
import type { PipelineConfig, PipelineConfigOverrides } from "./types.js";

export const APP_NAME = "Face Metrics Pipeline";
export const APP_VERSION = "0.1.0";

export * from "./types.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./config.js";
export * from "./geometry-normalizer.js";
export * from "./quality-scorer.js";
export * from "./metrics-extractor.js";
export * from "./detection-status.js";
export * from "./temporal-smoother.js";
export * from "./overlay-mapper.js";
export * from "./overlay-geometry.js";
export * from "./metrics-formatter.js";
export * from "./face-session.js";
export * from "./frame-gate.js";

export interface FaceMetricsPipelineOptions {
  /** Full config, e.g. from loadPipelineConfigFromEnv(). Takes precedence over `overrides`. */
  config?: PipelineConfig;
  overrides?: PipelineConfigOverrides;
  rangeEstimator?: RangeEstimator;
  logger?: PipelineLogger;
  callbacks?: FaceSessionCallbacks;
  mirrored?: boolean;
  rotationDegrees?: number;
}

/** Build a session whose every component honours the same configuration. */
export function createFaceMetricsPipeline(
  options: FaceMetricsPipelineOptions = {},
): FaceMetricsSession {
  const config = options.config ?? resolvePipelineConfig(options.overrides);

  const scorer = new QualityScorer(config.quality);
  return new FaceMetricsSession(
    {
      extractor: new MetricsExtractor(config.extractor, scorer),
      classifier: new DetectionStatusClassifier(config.classifier, options.rangeEstimator),
      smoother: new TemporalSmoother(config.smoothing, config.extractor),
      mapper: new OverlayCoordinateMapper(options.mirrored ?? false, options.rotationDegrees ?? 0),
      logger: options.logger,
    },
    options.callbacks,
  );
}
