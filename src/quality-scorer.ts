// Face Metrics Pipeline - Quality Scorer
// Composite [0,1] score: how well-posed a detection is for downstream use.

import { DEFAULT_PIPELINE_CONFIG } from "./config.js";
import { ContractViolationError } from "./errors.js";
import type { QualityConfig, RawDetection } from "./types.js";
import { clamp, sumsToOne } from "./utils.js";

export interface QualityBreakdown {
  orientation: number;
  eyeOpenness: number;
  smileNeutrality: number;
  landmarkCoverage: number;
  total: number;
}

export class QualityScorer {
  private config: QualityConfig;

  constructor(config: QualityConfig = DEFAULT_PIPELINE_CONFIG.quality) {
    const { weights, orientationWeights } = config;
    if (
      !sumsToOne([
        weights.orientation,
        weights.eyeOpenness,
        weights.smileNeutrality,
        weights.landmarkCoverage,
      ])
    ) {
      throw new ContractViolationError("Quality weights must sum to 1");
    }
    if (!sumsToOne([orientationWeights.pitch, orientationWeights.roll, orientationWeights.yaw])) {
      throw new ContractViolationError("Orientation weights must sum to 1");
    }
    if (!(config.maxAngleDeg > 0) || !(config.landmarkTarget > 0)) {
      throw new ContractViolationError("maxAngleDeg and landmarkTarget must be positive");
    }
    this.config = config;
  }

  /**
   * Score a detection. Eye and smile inputs are the already-defaulted
   * confidences (0 where the detector gave none).
   */
  score(
    detection: RawDetection,
    leftEyeOpen: number,
    rightEyeOpen: number,
    smile: number,
    pitch: number,
    roll: number,
    yaw: number,
  ): number {
    return this.breakdown(detection, leftEyeOpen, rightEyeOpen, smile, pitch, roll, yaw).total;
  }

  breakdown(
    detection: RawDetection,
    leftEyeOpen: number,
    rightEyeOpen: number,
    smile: number,
    pitch: number,
    roll: number,
    yaw: number,
  ): QualityBreakdown {
    const { weights } = this.config;

    const orientation = this.orientationScore(pitch, roll, yaw);
    const eyeOpenness = (leftEyeOpen + rightEyeOpen) / 2;
    const smileNeutrality = 1 - 2 * Math.abs(smile - 0.5);
    const landmarkCoverage = Math.min(
      1,
      countLandmarks(detection) / this.config.landmarkTarget,
    );

    const weighted =
      orientation * weights.orientation +
      eyeOpenness * weights.eyeOpenness +
      smileNeutrality * weights.smileNeutrality +
      landmarkCoverage * weights.landmarkCoverage;

    return {
      orientation,
      eyeOpenness,
      smileNeutrality,
      landmarkCoverage,
      total: clamp(weighted, 0, 1),
    };
  }

  /** 1 for a frontal face, falling linearly to 0 as every axis reaches maxAngleDeg. */
  orientationScore(pitch: number, roll: number, yaw: number): number {
    const { orientationWeights: w, maxAngleDeg } = this.config;
    const penalty = (angle: number) => Math.min(Math.abs(angle) / maxAngleDeg, 1);
    return 1 - (penalty(pitch) * w.pitch + penalty(roll) * w.roll + penalty(yaw) * w.yaw);
  }
}

function countLandmarks(detection: RawDetection): number {
  return Object.values(detection.landmarks).filter((p) => p !== undefined).length;
}
