// Face Metrics Pipeline - Metrics Extractor
// One immutable FaceMetrics record per frame, built from a raw detection.

import { DEFAULT_PIPELINE_CONFIG } from "./config.js";
import {
  assertImageDimensions,
  centeredPosition,
  interpupillaryDistance,
  normalizePoint,
  normalizeRect,
  rectHeight,
  rectWidth,
} from "./geometry-normalizer.js";
import { QualityScorer } from "./quality-scorer.js";
import { LANDMARK_ORDER, LandmarkType } from "./types.js";
import type { ExtractorConfig, FaceMetrics, Landmark, RawDetection, Rect } from "./types.js";
import { finiteOr } from "./utils.js";

// ─── Detection Confidence ───────────────────────────────────────────────────────

/** Confidence reported for a face the detector is tracking across frames. */
export const TRACKED_FACE_CONFIDENCE = 1;
/** Confidence reported for a face seen without a tracking id. */
export const UNTRACKED_FACE_CONFIDENCE = 0.5;

// ─── No-Face Sentinel ───────────────────────────────────────────────────────────

const NO_FACE: FaceMetrics = freezeMetrics({
  boundingBox: { left: 0, top: 0, right: 0, bottom: 0 },
  interpupillaryDistance: 0,
  faceWidth: 0,
  faceHeight: 0,
  facePosition: { x: 0, y: 0 },
  pitch: 0,
  roll: 0,
  yaw: 0,
  qualityScore: 0,
  smileConfidence: 0,
  isSmiling: false,
  leftEyeOpenConfidence: 0,
  rightEyeOpenConfidence: 0,
  areEyesOpen: false,
  hasGlasses: false,
  landmarks: [],
  detectionConfidence: 0,
});

/** The canonical "nothing to render" record. */
export function createNoFaceMetrics(): FaceMetrics {
  return NO_FACE;
}

export function isNoFace(metrics: FaceMetrics): boolean {
  return metrics.detectionConfidence === 0;
}

/** Deep-freeze a metrics record so no consumer can alias-mutate another frame's state. */
export function freezeMetrics(metrics: FaceMetrics): FaceMetrics {
  Object.freeze(metrics.boundingBox);
  Object.freeze(metrics.facePosition);
  for (const landmark of metrics.landmarks) {
    Object.freeze(landmark.position);
    Object.freeze(landmark);
  }
  Object.freeze(metrics.landmarks);
  return Object.freeze(metrics);
}

// ─── Primary Face Selection ─────────────────────────────────────────────────────

/**
 * Pick the face to report when the detector returns several: highest
 * tracking id wins, tracked faces beat untracked ones, ties keep the first.
 */
export function selectPrimaryFace(detections: readonly RawDetection[]): RawDetection | null {
  let best: RawDetection | null = null;
  for (const detection of detections) {
    if (best === null) {
      best = detection;
      continue;
    }
    if (detection.trackingId === undefined) continue;
    if (best.trackingId === undefined || detection.trackingId > best.trackingId) best = detection;
  }
  return best;
}

// ─── Input Sanitizing ───────────────────────────────────────────────────────────

function isFiniteRect(rect: Rect): boolean {
  return [rect.left, rect.top, rect.right, rect.bottom].every(Number.isFinite);
}

/** The detection's landmarks without any whose coordinates are not finite. */
function finiteLandmarks(detection: RawDetection): RawDetection["landmarks"] {
  const kept: RawDetection["landmarks"] = {};
  for (const type of LANDMARK_ORDER) {
    const point = detection.landmarks[type];
    if (point && Number.isFinite(point.x) && Number.isFinite(point.y)) kept[type] = point;
  }
  return kept;
}

// ─── Metrics Extractor ──────────────────────────────────────────────────────────

export class MetricsExtractor {
  private config: ExtractorConfig;
  private scorer: QualityScorer;

  constructor(
    config: ExtractorConfig = DEFAULT_PIPELINE_CONFIG.extractor,
    scorer: QualityScorer = new QualityScorer(),
  ) {
    this.config = config;
    this.scorer = scorer;
  }

  /**
   * Extract metrics from one detection. Missing or non-finite probabilities
   * and angles default to 0, and missing or non-finite landmarks are skipped.
   * A box that cannot be placed in the frame yields the no-face record; only
   * a non-positive image size throws.
   */
  extract(detection: RawDetection): FaceMetrics {
    const { imageWidth, imageHeight } = detection;
    assertImageDimensions(imageWidth, imageHeight);

    if (!isFiniteRect(detection.boundingBoxPx)) {
      return NO_FACE;
    }
    const boundingBox = normalizeRect(detection.boundingBoxPx, imageWidth, imageHeight);
    const sanitized: RawDetection = { ...detection, landmarks: finiteLandmarks(detection) };

    const smileConfidence = finiteOr(detection.smileProb, 0);
    const leftEyeOpenConfidence = finiteOr(detection.leftEyeOpenProb, 0);
    const rightEyeOpenConfidence = finiteOr(detection.rightEyeOpenProb, 0);

    const pitch = finiteOr(detection.pitchDeg, 0);
    const roll = finiteOr(detection.rollDeg, 0);
    const yaw = finiteOr(detection.yawDeg, 0);

    const qualityScore = this.scorer.score(
      sanitized,
      leftEyeOpenConfidence,
      rightEyeOpenConfidence,
      smileConfidence,
      pitch,
      roll,
      yaw,
    );

    return freezeMetrics({
      boundingBox,
      interpupillaryDistance: interpupillaryDistance(sanitized.landmarks, imageWidth),
      faceWidth: rectWidth(boundingBox),
      faceHeight: rectHeight(boundingBox),
      facePosition: centeredPosition(boundingBox),
      pitch,
      roll,
      yaw,
      qualityScore,
      smileConfidence,
      isSmiling: this.isSmiling(smileConfidence),
      leftEyeOpenConfidence,
      rightEyeOpenConfidence,
      areEyesOpen: this.areEyesOpen(leftEyeOpenConfidence, rightEyeOpenConfidence),
      hasGlasses: this.detectGlasses(sanitized, leftEyeOpenConfidence, rightEyeOpenConfidence),
      landmarks: this.extractLandmarks(sanitized),
      detectionConfidence:
        detection.trackingId !== undefined ? TRACKED_FACE_CONFIDENCE : UNTRACKED_FACE_CONFIDENCE,
    });
  }

  isSmiling(smileConfidence: number): boolean {
    return smileConfidence > this.config.smilingThreshold;
  }

  areEyesOpen(leftEyeOpen: number, rightEyeOpen: number): boolean {
    return (leftEyeOpen + rightEyeOpen) / 2 > this.config.eyesOpenThreshold;
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  /**
   * Coarse glasses proxy: an ear is visible and both eyes read as open.
   * Not a trained classifier; expect false positives on any frontal face
   * with open eyes and a visible ear.
   */
  private detectGlasses(detection: RawDetection, leftEyeOpen: number, rightEyeOpen: number): boolean {
    const earVisible =
      detection.landmarks[LandmarkType.LEFT_EAR] !== undefined ||
      detection.landmarks[LandmarkType.RIGHT_EAR] !== undefined;
    const threshold = this.config.eyesOpenThreshold;
    return earVisible && leftEyeOpen > threshold && rightEyeOpen > threshold;
  }

  private extractLandmarks(detection: RawDetection): Landmark[] {
    const landmarks: Landmark[] = [];
    for (const type of LANDMARK_ORDER) {
      const point = detection.landmarks[type];
      if (point) {
        landmarks.push({
          type,
          position: normalizePoint(point, detection.imageWidth, detection.imageHeight),
        });
      }
    }
    return landmarks;
  }
}
