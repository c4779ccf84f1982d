// Face Metrics Pipeline - Face Metrics Session
// Per-camera orchestrator: raw detections in, smoothed metrics, status and
// overlay-ready transform out. Holds the only long-lived state in the
// pipeline (smoothing window, transform, last status) and is meant to be
// driven from a single execution context, one frame at a time.

import { v4 as uuidv4 } from "uuid";
import { DetectionStatusClassifier } from "./detection-status.js";
import { defaultLogger, type PipelineLogger } from "./logger.js";
import { MetricsExtractor, createNoFaceMetrics, selectPrimaryFace } from "./metrics-extractor.js";
import { OverlayCoordinateMapper } from "./overlay-mapper.js";
import { TemporalSmoother } from "./temporal-smoother.js";
import type { DetectionStatus, FaceMetrics, Point, RawDetection, Rect, TransformState } from "./types.js";

// ─── Result & Callbacks ─────────────────────────────────────────────────────────

export interface FrameResult {
  /** 1-based count of frames this session has processed. */
  frame: number;
  /** Metrics for this frame alone. */
  metrics: FaceMetrics;
  /** Metrics after temporal smoothing; what overlays should draw. */
  smoothed: FaceMetrics;
  /** Status derived from the unsmoothed metrics. */
  status: DetectionStatus;
}

export type FaceSessionCallbacks = {
  /** Called only when the status differs from the previous frame's. */
  onStatusChange?: (status: DetectionStatus, previous: DetectionStatus | null) => void;
  /** Called for every processed frame. */
  onMetrics?: (result: FrameResult) => void;
};

function isDetectionList(
  value: RawDetection | readonly RawDetection[],
): value is readonly RawDetection[] {
  return Array.isArray(value);
}

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface FaceSessionDeps {
  extractor?: MetricsExtractor;
  classifier?: DetectionStatusClassifier;
  smoother?: TemporalSmoother;
  mapper?: OverlayCoordinateMapper;
  logger?: PipelineLogger;
}

export class FaceMetricsSession {
  readonly id: string;
  private extractor: MetricsExtractor;
  private classifier: DetectionStatusClassifier;
  private smoother: TemporalSmoother;
  private mapper: OverlayCoordinateMapper;
  private logger: PipelineLogger;
  private callbacks: FaceSessionCallbacks;

  private framesProcessed: number;
  private lastStatus: DetectionStatus | null;
  private lastResult: FrameResult | null;

  constructor(deps: FaceSessionDeps = {}, callbacks: FaceSessionCallbacks = {}) {
    this.id = uuidv4();
    this.extractor = deps.extractor ?? new MetricsExtractor();
    this.classifier = deps.classifier ?? new DetectionStatusClassifier();
    this.smoother = deps.smoother ?? new TemporalSmoother();
    this.mapper = deps.mapper ?? new OverlayCoordinateMapper();
    this.logger = deps.logger ?? defaultLogger;
    this.callbacks = callbacks;
    this.framesProcessed = 0;
    this.lastStatus = null;
    this.lastResult = null;
  }

  /**
   * Process one frame's detector output. `null` or an empty list is a frame
   * without a face; with several faces the primary one is used.
   */
  processDetections(detections: RawDetection | readonly RawDetection[] | null): FrameResult {
    const list = detections === null ? [] : isDetectionList(detections) ? detections : [detections];
    const primary = selectPrimaryFace(list);
    const metrics = primary ? this.extractor.extract(primary) : createNoFaceMetrics();
    return this.processMetrics(metrics);
  }

  /** Process an already-extracted metrics record (e.g. the no-face sentinel). */
  processMetrics(metrics: FaceMetrics): FrameResult {
    this.framesProcessed++;

    const smoothed = this.smoother.push(metrics);
    const status = this.classifier.classify(metrics);
    const result: FrameResult = { frame: this.framesProcessed, metrics, smoothed, status };

    if (status !== this.lastStatus) {
      const previous = this.lastStatus;
      this.lastStatus = status;
      this.logger.info(
        `[FaceMetricsSession] session ${this.id} frame ${result.frame}: status ${previous ?? "none"} → ${status}`,
      );
      this.callbacks.onStatusChange?.(status, previous);
    }

    this.lastResult = result;
    this.callbacks.onMetrics?.(result);
    return result;
  }

  // ─── Transform ──────────────────────────────────────────────────────────────

  setTransform(mirrored: boolean, rotationDegrees: number): void {
    this.mapper.setTransform(mirrored, rotationDegrees);
    const { rotationDegrees: applied } = this.mapper.getTransform();
    this.logger.info(
      `[FaceMetricsSession] session ${this.id} transform: mirrored=${mirrored} rotation=${applied}`,
    );
  }

  getTransform(): TransformState {
    return this.mapper.getTransform();
  }

  mapRect(rect: Rect): Rect {
    return this.mapper.mapRect(rect);
  }

  mapPoint(point: Point): Point {
    return this.mapper.mapPoint(point);
  }

  get overlayMapper(): OverlayCoordinateMapper {
    return this.mapper;
  }

  // ─── State ──────────────────────────────────────────────────────────────────

  get latest(): FrameResult | null {
    return this.lastResult;
  }

  get status(): DetectionStatus | null {
    return this.lastStatus;
  }

  get frameCount(): number {
    return this.framesProcessed;
  }

  /** Forget history and status; the transform is kept. */
  reset(): void {
    this.smoother.reset();
    this.framesProcessed = 0;
    this.lastStatus = null;
    this.lastResult = null;
  }
}
