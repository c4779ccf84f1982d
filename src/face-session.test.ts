/**
 * Unit tests for face-session.ts
 */

import { describe, it, expect, vi } from "vitest";
import { FaceMetricsSession } from "./face-session.js";
import { createNoFaceMetrics } from "./metrics-extractor.js";
import { OverlayCoordinateMapper } from "./overlay-mapper.js";
import { ContractViolationError } from "./errors.js";
import { DetectionStatus, LandmarkType } from "./types.js";
import type { PipelineLogger } from "./logger.js";
import type { RawDetection } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeDetection(overrides: Partial<RawDetection> = {}): RawDetection {
  return {
    boundingBoxPx: { left: 100, top: 100, right: 300, bottom: 300 },
    imageWidth: 640,
    imageHeight: 480,
    pitchDeg: 0,
    rollDeg: 0,
    yawDeg: 0,
    landmarks: {
      [LandmarkType.LEFT_EYE]: { x: 160, y: 168 },
      [LandmarkType.RIGHT_EYE]: { x: 240, y: 168 },
      [LandmarkType.NOSE_BASE]: { x: 200, y: 216 },
    },
    leftEyeOpenProb: 0.95,
    rightEyeOpenProb: 0.95,
    smileProb: 0.1,
    trackingId: 1,
    ...overrides,
  };
}

function makeLogger(): PipelineLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ─── Processing ─────────────────────────────────────────────────────────────────

describe("FaceMetricsSession.processDetections", () => {
  it("extracts, classifies and numbers each frame", () => {
    const session = new FaceMetricsSession({ logger: makeLogger() });
    const first = session.processDetections(makeDetection());
    const second = session.processDetections([makeDetection()]);

    expect(first.frame).toBe(1);
    expect(first.status).toBe(DetectionStatus.DETECTED);
    expect(first.metrics.faceWidth).toBe(0.3125);
    expect(second.frame).toBe(2);
    expect(session.frameCount).toBe(2);
    expect(session.latest).toBe(second);
  });

  it("treats null and an empty list as a frame without a face", () => {
    const session = new FaceMetricsSession({ logger: makeLogger() });
    expect(session.processDetections(null).metrics).toBe(createNoFaceMetrics());
    expect(session.processDetections([]).status).toBe(DetectionStatus.NO_FACE);
  });

  it("reports the primary face when several are detected", () => {
    const session = new FaceMetricsSession({ logger: makeLogger() });
    const older = makeDetection({ trackingId: 2, yawDeg: 45 });
    const newer = makeDetection({ trackingId: 8 });
    const result = session.processDetections([older, newer]);
    expect(result.metrics.yaw).toBe(0);
    expect(result.status).toBe(DetectionStatus.DETECTED);
  });

  it("classifies the raw frame while smoothing for display", () => {
    const session = new FaceMetricsSession({ logger: makeLogger() });
    session.processDetections(makeDetection({ yawDeg: 0 }));
    const result = session.processDetections(makeDetection({ yawDeg: 30 }));

    expect(result.status).toBe(DetectionStatus.MISALIGNED);
    expect(result.metrics.yaw).toBe(30);
    expect(result.smoothed.yaw).toBe(15);
  });
});

// ─── Callbacks & Logging ────────────────────────────────────────────────────────

describe("FaceMetricsSession callbacks", () => {
  it("fires onStatusChange only when the status changes", () => {
    const onStatusChange = vi.fn();
    const onMetrics = vi.fn();
    const session = new FaceMetricsSession({ logger: makeLogger() }, { onStatusChange, onMetrics });

    session.processDetections(makeDetection());
    session.processDetections(makeDetection());
    session.processDetections(null);

    expect(onStatusChange).toHaveBeenCalledTimes(2);
    expect(onStatusChange).toHaveBeenNthCalledWith(1, DetectionStatus.DETECTED, null);
    expect(onStatusChange).toHaveBeenNthCalledWith(2, DetectionStatus.NO_FACE, DetectionStatus.DETECTED);
    expect(onMetrics).toHaveBeenCalledTimes(3);
    expect(session.status).toBe(DetectionStatus.NO_FACE);
  });

  it("logs status transitions at info level", () => {
    const logger = makeLogger();
    const session = new FaceMetricsSession({ logger });
    session.processDetections(makeDetection());

    expect(logger.info).toHaveBeenCalledWith(
      `[FaceMetricsSession] session ${session.id} frame 1: status none → detected`,
    );
  });
});

// ─── Transform ──────────────────────────────────────────────────────────────────

describe("FaceMetricsSession transform", () => {
  it("forwards the transform to its mapper", () => {
    const mapper = new OverlayCoordinateMapper();
    const session = new FaceMetricsSession({ mapper, logger: makeLogger() });
    session.setTransform(false, 450);

    expect(session.getTransform()).toEqual({ mirrored: false, rotationDegrees: 90 });
    expect(session.overlayMapper).toBe(mapper);
    const p = session.mapPoint({ x: 0.2, y: 0.3 });
    expect(p.x).toBeCloseTo(0.3, 12);
    expect(p.y).toBeCloseTo(0.8, 12);
    const r = session.mapRect({ left: 0.1, top: 0.2, right: 0.3, bottom: 0.5 });
    expect(r.left).toBeCloseTo(0.2, 12);
    expect(r.bottom).toBeCloseTo(0.9, 12);
  });

  it("propagates an invalid rotation", () => {
    const session = new FaceMetricsSession({ logger: makeLogger() });
    expect(() => session.setTransform(true, 45)).toThrow(ContractViolationError);
  });
});

// ─── Reset ──────────────────────────────────────────────────────────────────────

describe("FaceMetricsSession.reset", () => {
  it("clears history and status but keeps the transform", () => {
    const onStatusChange = vi.fn();
    const session = new FaceMetricsSession({ logger: makeLogger() }, { onStatusChange });
    session.setTransform(true, 180);
    session.processDetections(makeDetection({ yawDeg: 10 }));
    session.reset();

    expect(session.frameCount).toBe(0);
    expect(session.status).toBeNull();
    expect(session.latest).toBeNull();
    expect(session.getTransform()).toEqual({ mirrored: true, rotationDegrees: 180 });

    const result = session.processDetections(makeDetection({ yawDeg: 4 }));
    expect(result.frame).toBe(1);
    expect(result.smoothed.yaw).toBe(4);
    expect(onStatusChange).toHaveBeenLastCalledWith(DetectionStatus.DETECTED, null);
  });

  it("gives every session its own id", () => {
    const a = new FaceMetricsSession({ logger: makeLogger() });
    const b = new FaceMetricsSession({ logger: makeLogger() });
    expect(a.id).not.toBe(b.id);
    expect(a.id).toMatch(/^[0-9a-f-]{36}$/);
  });
});
