/**
 * Geometry normalizer: pixel-space detection geometry → resolution-independent
 * coordinates.
 *
 * Dimensions passed in must already be rotation-corrected; nothing here knows
 * about sensor orientation.
 */

import { ContractViolationError } from "./errors.js";
import { LandmarkType } from "./types.js";
import type { Point, RawDetection, Rect } from "./types.js";

/** Reject frame sizes that would make every normalized value NaN or Infinity. */
export function assertImageDimensions(width: number, height: number): void {
  if (!Number.isFinite(width) || width <= 0) {
    throw new ContractViolationError(`imageWidth must be a positive number, got ${width}`);
  }
  if (!Number.isFinite(height) || height <= 0) {
    throw new ContractViolationError(`imageHeight must be a positive number, got ${height}`);
  }
}

export function normalizeRect(rect: Rect, width: number, height: number): Rect {
  return {
    left: rect.left / width,
    top: rect.top / height,
    right: rect.right / width,
    bottom: rect.bottom / height,
  };
}

export function normalizePoint(point: Point, width: number, height: number): Point {
  return { x: point.x / width, y: point.y / height };
}

export function rectWidth(rect: Rect): number {
  return rect.right - rect.left;
}

export function rectHeight(rect: Rect): number {
  return rect.bottom - rect.top;
}

/** Center of a normalized rect, shifted so the frame center is (0,0). */
export function centeredPosition(rect: Rect): Point {
  return {
    x: (rect.left + rect.right) / 2 - 0.5,
    y: (rect.top + rect.bottom) / 2 - 0.5,
  };
}

/**
 * Eye-to-eye distance divided by image width, or 0 when either eye is missing.
 * A fraction of the frame, not millimetres: turning it into a physical
 * distance needs a calibration step this pipeline does not have.
 */
export function interpupillaryDistance(
  landmarks: RawDetection["landmarks"],
  imageWidth: number,
): number {
  const left = landmarks[LandmarkType.LEFT_EYE];
  const right = landmarks[LandmarkType.RIGHT_EYE];
  if (!left || !right) return 0;
  return Math.hypot(left.x - right.x, left.y - right.y) / imageWidth;
}
