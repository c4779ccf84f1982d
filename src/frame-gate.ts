/**
 * Frame gate at the detector boundary: at most one detection in flight.
 * Frames that arrive while the detector is busy are dropped, never queued,
 * so a slow detector yields stale frames rather than growing latency.
 */

import type { FaceMetricsSession, FrameResult } from "./face-session.js";
import { defaultLogger, type PipelineLogger } from "./logger.js";
import { createNoFaceMetrics } from "./metrics-extractor.js";
import type { RawDetection } from "./types.js";

// ─── Detector Interface ─────────────────────────────────────────────────────────

/**
 * External face-landmark detector. Resolves to every face found in the
 * frame (possibly none); the frame type is whatever the capture layer uses.
 */
export interface FaceDetector<TFrame> {
  detect(frame: TFrame): Promise<RawDetection[]>;
}

export interface FrameGateDeps<TFrame> {
  detector: FaceDetector<TFrame>;
  session: FaceMetricsSession;
  logger?: PipelineLogger;
}

export class DetectionFrameGate<TFrame> {
  private detector: FaceDetector<TFrame>;
  private session: FaceMetricsSession;
  private logger: PipelineLogger;
  private inFlight: boolean;
  private dropped: number;
  private failures: number;

  constructor(deps: FrameGateDeps<TFrame>) {
    this.detector = deps.detector;
    this.session = deps.session;
    this.logger = deps.logger ?? defaultLogger;
    this.inFlight = false;
    this.dropped = 0;
    this.failures = 0;
  }

  /**
   * Run detection on `frame` unless one is already running. Resolves to the
   * session's result, or null if the frame was dropped. A detector failure
   * is logged and reported to the session as a frame without a face.
   */
  async offer(frame: TFrame): Promise<FrameResult | null> {
    if (this.inFlight) {
      this.dropped++;
      this.logger.debug(`[FrameGate] detector busy, dropped frame (total ${this.dropped})`);
      return null;
    }

    this.inFlight = true;
    try {
      let detections: RawDetection[];
      try {
        detections = await this.detector.detect(frame);
      } catch (err) {
        this.failures++;
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`[FrameGate] face detection failed: ${message}`);
        return this.session.processMetrics(createNoFaceMetrics());
      }
      return this.session.processDetections(detections);
    } finally {
      this.inFlight = false;
    }
  }

  /** Frames skipped because a detection was still running. */
  get framesDropped(): number {
    return this.dropped;
  }

  /** Detector calls that rejected. */
  get detectionFailures(): number {
    return this.failures;
  }

  get busy(): boolean {
    return this.inFlight;
  }
}
