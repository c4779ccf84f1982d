// Face Metrics Pipeline - Shared TypeScript interfaces and types
// Runtime helpers live in their own modules so this file stays a type barrel
// (the one exception is the enums, which are values by nature).

// ─── Geometry ───────────────────────────────────────────────────────────────────

export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle. Units depend on context (pixels or normalized). */
export interface Rect {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

// ─── Landmarks ──────────────────────────────────────────────────────────────────

export enum LandmarkType {
  LEFT_EYE = "left_eye",
  RIGHT_EYE = "right_eye",
  LEFT_EAR = "left_ear",
  RIGHT_EAR = "right_ear",
  LEFT_CHEEK = "left_cheek",
  RIGHT_CHEEK = "right_cheek",
  NOSE_BASE = "nose_base",
  MOUTH_LEFT = "mouth_left",
  MOUTH_RIGHT = "mouth_right",
  MOUTH_BOTTOM = "mouth_bottom",
}

/** Canonical ordering used whenever landmarks are listed. */
export const LANDMARK_ORDER: readonly LandmarkType[] = [
  LandmarkType.LEFT_EYE,
  LandmarkType.RIGHT_EYE,
  LandmarkType.LEFT_EAR,
  LandmarkType.RIGHT_EAR,
  LandmarkType.LEFT_CHEEK,
  LandmarkType.RIGHT_CHEEK,
  LandmarkType.NOSE_BASE,
  LandmarkType.MOUTH_LEFT,
  LandmarkType.MOUTH_RIGHT,
  LandmarkType.MOUTH_BOTTOM,
];

export interface Landmark {
  type: LandmarkType;
  position: Point;
}

// ─── Detector Output ────────────────────────────────────────────────────────────

/**
 * One face as reported by the external detector for a single frame.
 * Pixel values refer to the rotation-corrected frame (width and height
 * already swapped for 90°/270° sensors).
 */
export interface RawDetection {
  boundingBoxPx: Rect;
  imageWidth: number;
  imageHeight: number;
  /** Positive = head down. */
  pitchDeg: number;
  /** Positive = tilt to the viewer's right. */
  rollDeg: number;
  /** Positive = turn to the viewer's right. */
  yawDeg: number;
  landmarks: Partial<Record<LandmarkType, Point>>;
  leftEyeOpenProb?: number;
  rightEyeOpenProb?: number;
  smileProb?: number;
  trackingId?: number;
}

// ─── Face Metrics ───────────────────────────────────────────────────────────────

export interface FaceMetrics {
  /** Normalized to [0,1] on both axes. */
  readonly boundingBox: Readonly<Rect>;
  /** Eye-to-eye distance as a fraction of image width. Not a physical unit. */
  readonly interpupillaryDistance: number;
  readonly faceWidth: number;
  readonly faceHeight: number;
  /** Box center in [-0.5, 0.5]; (0,0) is the frame center. */
  readonly facePosition: Readonly<Point>;
  readonly pitch: number;
  readonly roll: number;
  readonly yaw: number;
  readonly qualityScore: number;
  readonly smileConfidence: number;
  readonly isSmiling: boolean;
  readonly leftEyeOpenConfidence: number;
  readonly rightEyeOpenConfidence: number;
  readonly areEyesOpen: boolean;
  readonly hasGlasses: boolean;
  readonly landmarks: readonly Readonly<Landmark>[];
  /** 0 = no face. Any positive value marks a valid detection; not a probability. */
  readonly detectionConfidence: number;
}

// ─── Detection Status ───────────────────────────────────────────────────────────

export enum DetectionStatus {
  NO_FACE = "no_face",
  DETECTED = "detected",
  TOO_FAR = "too_far",
  TOO_CLOSE = "too_close",
  MISALIGNED = "misaligned",
}

// ─── Overlay Transform ──────────────────────────────────────────────────────────

export type QuarterTurn = 0 | 90 | 180 | 270;

export interface TransformState {
  mirrored: boolean;
  rotationDegrees: QuarterTurn;
}

// ─── Configuration ──────────────────────────────────────────────────────────────

export interface QualityWeights {
  orientation: number;
  eyeOpenness: number;
  smileNeutrality: number;
  landmarkCoverage: number;
}

export interface OrientationWeights {
  pitch: number;
  roll: number;
  yaw: number;
}

export interface QualityConfig {
  weights: QualityWeights;
  orientationWeights: OrientationWeights;
  /** Angle (degrees) at which an axis contributes its full orientation penalty. Default: 45 */
  maxAngleDeg: number;
  /** Landmark count that earns full coverage. Default: 5 */
  landmarkTarget: number;
}

export interface ExtractorConfig {
  /** Smile confidence strictly above this marks the face as smiling. Default: 0.7 */
  smilingThreshold: number;
  /** Mean eye-open confidence strictly above this marks the eyes open. Default: 0.5 */
  eyesOpenThreshold: number;
}

export interface ClassifierConfig {
  /** Range estimate above this is TooFar. Default: 150 */
  tooFarRange: number;
  /** Range estimate below this is TooClose. Default: 50 */
  tooCloseRange: number;
  /** Any |pitch|, |roll| or |yaw| above this is Misaligned. Default: 20 */
  misalignedAngleDeg: number;
  /** Numerator of the face-size range estimate. Default: 40 */
  rangeScale: number;
}

export interface SmoothingConfig {
  /** Frames kept in the smoothing window. Default: 5 */
  windowSize: number;
  /** Weight of the newest raw box in the smoothed box blend. Default: 0.7 */
  latestBoxWeight: number;
}

export interface PipelineConfig {
  quality: QualityConfig;
  extractor: ExtractorConfig;
  classifier: ClassifierConfig;
  smoothing: SmoothingConfig;
}

/** Partial overrides, one level deep per section. */
export type PipelineConfigOverrides = {
  quality?: Partial<Omit<QualityConfig, "weights" | "orientationWeights">> & {
    weights?: Partial<QualityWeights>;
    orientationWeights?: Partial<OrientationWeights>;
  };
  extractor?: Partial<ExtractorConfig>;
  classifier?: Partial<ClassifierConfig>;
  smoothing?: Partial<SmoothingConfig>;
};
