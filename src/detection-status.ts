// Face Metrics Pipeline - Detection Status Classifier
// Maps a metrics record onto one discrete operational state. Rules are
// evaluated in order and the first match wins.

import { DEFAULT_PIPELINE_CONFIG } from "./config.js";
import { ContractViolationError } from "./errors.js";
import { DetectionStatus } from "./types.js";
import type { ClassifierConfig, FaceMetrics } from "./types.js";

// ─── Range Estimation ───────────────────────────────────────────────────────────

/**
 * Distance-from-camera estimate in the arbitrary unit the classifier's
 * tooFar/tooClose thresholds are calibrated against.
 */
export interface RangeEstimator {
  estimateRange(metrics: FaceMetrics): number;
}

/**
 * range = rangeScale / max(faceWidth, faceHeight)
 *
 * Both extents are fractions of their own axis, so on a landscape frame the
 * larger one is normally the height fraction and this reads as
 * `minImageDim / maxBoxPx * rangeScale`. With the default scale of 40 a face
 * spanning 40% of the frame sits at range 100; TooFar starts below ~26.7%
 * and TooClose above 80%. A zero-sized face is infinitely far.
 */
export class FaceSizeRangeEstimator implements RangeEstimator {
  private rangeScale: number;

  constructor(rangeScale: number = DEFAULT_PIPELINE_CONFIG.classifier.rangeScale) {
    this.rangeScale = rangeScale;
  }

  estimateRange(metrics: FaceMetrics): number {
    const extent = Math.max(metrics.faceWidth, metrics.faceHeight);
    if (!(extent > 0)) return Infinity;
    return this.rangeScale / extent;
  }
}

// ─── User-Facing Prompts ────────────────────────────────────────────────────────

export const STATUS_MESSAGES: Readonly<Record<DetectionStatus, string | null>> = {
  [DetectionStatus.NO_FACE]: "No face detected",
  [DetectionStatus.TOO_FAR]: "Move closer to the camera",
  [DetectionStatus.TOO_CLOSE]: "Move further from the camera",
  [DetectionStatus.MISALIGNED]: "Align your face with the camera",
  [DetectionStatus.DETECTED]: null,
};

// ─── Classifier ─────────────────────────────────────────────────────────────────

export class DetectionStatusClassifier {
  private config: ClassifierConfig;
  private rangeEstimator: RangeEstimator;

  constructor(
    config: ClassifierConfig = DEFAULT_PIPELINE_CONFIG.classifier,
    rangeEstimator?: RangeEstimator,
  ) {
    if (config.tooCloseRange > config.tooFarRange) {
      throw new ContractViolationError(
        `tooCloseRange (${config.tooCloseRange}) must not exceed tooFarRange (${config.tooFarRange})`,
      );
    }
    this.config = config;
    this.rangeEstimator = rangeEstimator ?? new FaceSizeRangeEstimator(config.rangeScale);
  }

  classify(metrics: FaceMetrics): DetectionStatus {
    if (metrics.detectionConfidence === 0) {
      return DetectionStatus.NO_FACE;
    }

    const range = this.rangeEstimator.estimateRange(metrics);
    if (range > this.config.tooFarRange) {
      return DetectionStatus.TOO_FAR;
    }
    if (range < this.config.tooCloseRange) {
      return DetectionStatus.TOO_CLOSE;
    }

    const limit = this.config.misalignedAngleDeg;
    if (Math.abs(metrics.pitch) > limit || Math.abs(metrics.roll) > limit || Math.abs(metrics.yaw) > limit) {
      return DetectionStatus.MISALIGNED;
    }

    return DetectionStatus.DETECTED;
  }
}
