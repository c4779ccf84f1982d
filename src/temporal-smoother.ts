/**
 * Temporal smoother: damps frame-to-frame jitter in face metrics while staying
 * responsive to real motion.
 *
 * Keeps the last N records in a circular buffer (oldest evicted first) and
 * averages the continuous fields across the valid (face-present) ones.
 */

import { DEFAULT_PIPELINE_CONFIG } from "./config.js";
import { ContractViolationError } from "./errors.js";
import { freezeMetrics, isNoFace } from "./metrics-extractor.js";
import type { ExtractorConfig, FaceMetrics, Rect, SmoothingConfig } from "./types.js";
import { blend, clamp, mean } from "./utils.js";

export class TemporalSmoother {
  private buffer: (FaceMetrics | null)[];
  private head: number; // index of the oldest element
  private count: number;
  private capacity: number;
  private latestBoxWeight: number;
  private extractorConfig: ExtractorConfig;

  constructor(
    config: SmoothingConfig = DEFAULT_PIPELINE_CONFIG.smoothing,
    extractorConfig: ExtractorConfig = DEFAULT_PIPELINE_CONFIG.extractor,
  ) {
    if (!Number.isInteger(config.windowSize) || config.windowSize < 1) {
      throw new ContractViolationError(
        `windowSize must be a positive integer, got ${config.windowSize}`,
      );
    }
    if (!(config.latestBoxWeight >= 0 && config.latestBoxWeight <= 1)) {
      throw new ContractViolationError(
        `latestBoxWeight must be within [0, 1], got ${config.latestBoxWeight}`,
      );
    }
    this.capacity = config.windowSize;
    this.latestBoxWeight = config.latestBoxWeight;
    this.extractorConfig = extractorConfig;
    this.buffer = new Array<FaceMetrics | null>(this.capacity).fill(null);
    this.head = 0;
    this.count = 0;
  }

  /**
   * Record a frame and return the current smoothed estimate.
   * A no-face frame, or a window with fewer than two valid frames, comes back
   * unchanged.
   */
  push(metrics: FaceMetrics): FaceMetrics {
    this.record(metrics);

    if (isNoFace(metrics)) {
      return metrics;
    }

    const valid = this.validFrames();
    if (valid.length < 2) {
      return metrics;
    }

    return this.smooth(valid);
  }

  /** Drop all history. */
  reset(): void {
    this.buffer.fill(null);
    this.head = 0;
    this.count = 0;
  }

  /** Frames currently held, valid or not. */
  get size(): number {
    return this.count;
  }

  /** Frames currently held that carry a face. */
  get validCount(): number {
    return this.validFrames().length;
  }

  // ─── Private Helpers ────────────────────────────────────────────────────────

  private record(metrics: FaceMetrics): void {
    const copy = freezeMetrics(structuredClone(metrics));
    if (this.count === this.capacity) {
      // Full: overwrite the oldest slot and advance head
      this.buffer[this.head] = copy;
      this.head = (this.head + 1) % this.capacity;
      return;
    }
    this.buffer[(this.head + this.count) % this.capacity] = copy;
    this.count++;
  }

  /** Valid frames, oldest first. */
  private validFrames(): FaceMetrics[] {
    const frames: FaceMetrics[] = [];
    for (let i = 0; i < this.count; i++) {
      const frame = this.buffer[(this.head + i) % this.capacity];
      if (frame && !isNoFace(frame)) frames.push(frame);
    }
    return frames;
  }

  private smooth(valid: FaceMetrics[]): FaceMetrics {
    const latest = valid[valid.length - 1];
    const avg = (pick: (m: FaceMetrics) => number) => mean(valid.map(pick));

    const faceWidth = avg((m) => m.faceWidth);
    const faceHeight = avg((m) => m.faceHeight);
    const positionX = avg((m) => m.facePosition.x);
    const positionY = avg((m) => m.facePosition.y);
    const smileConfidence = avg((m) => m.smileConfidence);
    const leftEyeOpenConfidence = avg((m) => m.leftEyeOpenConfidence);
    const rightEyeOpenConfidence = avg((m) => m.rightEyeOpenConfidence);

    // Edge means equal (mean center) ± (mean size) / 2 for any extracted
    // record, and reproduce a repeated box bit-for-bit
    const averagedBox: Rect = {
      left: avg((m) => m.boundingBox.left),
      top: avg((m) => m.boundingBox.top),
      right: avg((m) => m.boundingBox.right),
      bottom: avg((m) => m.boundingBox.bottom),
    };

    const { smilingThreshold, eyesOpenThreshold } = this.extractorConfig;

    return freezeMetrics({
      boundingBox: this.blendBox(latest.boundingBox, averagedBox),
      interpupillaryDistance: avg((m) => m.interpupillaryDistance),
      faceWidth,
      faceHeight,
      facePosition: { x: positionX, y: positionY },
      pitch: avg((m) => m.pitch),
      roll: avg((m) => m.roll),
      yaw: avg((m) => m.yaw),
      qualityScore: avg((m) => m.qualityScore),
      smileConfidence,
      isSmiling: smileConfidence > smilingThreshold,
      leftEyeOpenConfidence,
      rightEyeOpenConfidence,
      areEyesOpen: (leftEyeOpenConfidence + rightEyeOpenConfidence) / 2 > eyesOpenThreshold,
      hasGlasses: latest.hasGlasses,
      landmarks: structuredClone(latest.landmarks),
      detectionConfidence: latest.detectionConfidence,
    });
  }

  private blendBox(latest: Readonly<Rect>, averaged: Rect): Rect {
    const w = this.latestBoxWeight;
    return {
      left: clamp(blend(latest.left, averaged.left, w), 0, 1),
      top: clamp(blend(latest.top, averaged.top, w), 0, 1),
      right: clamp(blend(latest.right, averaged.right, w), 0, 1),
      bottom: clamp(blend(latest.bottom, averaged.bottom, w), 0, 1),
    };
  }
}
