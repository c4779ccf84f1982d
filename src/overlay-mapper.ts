// Face Metrics Pipeline - Overlay Coordinate Mapper
// Maps normalized sensor-space geometry into display space under the current
// sensor rotation and mirroring.
//
// The whole transform is one affine matrix composed from translate, scale and
// rotate primitives, so no rotation needs its own sign-flip branch:
//
//   M = translate(0.5, 0.5) · rotate(−θ) · scale(mirrored ? −1 : 1, 1) · translate(−0.5, −0.5)
//
// θ is negated because the map goes from sensor space to display space, the
// inverse of how the sensor itself is rotated.

import { ContractViolationError } from "./errors.js";
import type { Point, QuarterTurn, Rect, TransformState } from "./types.js";

// ─── Affine Primitives ──────────────────────────────────────────────────────────

/**
 * 2D affine matrix in column form:
 *
 *   | a  c  e |
 *   | b  d  f |
 *   | 0  0  1 |
 */
export interface AffineMatrix {
  readonly a: number;
  readonly b: number;
  readonly c: number;
  readonly d: number;
  readonly e: number;
  readonly f: number;
}

export const IDENTITY: AffineMatrix = Object.freeze({ a: 1, b: 0, c: 0, d: 1, e: 0, f: 0 });

export function translate(tx: number, ty: number): AffineMatrix {
  return { a: 1, b: 0, c: 0, d: 1, e: tx, f: ty };
}

export function scale(sx: number, sy: number): AffineMatrix {
  return { a: sx, b: 0, c: 0, d: sy, e: 0, f: 0 };
}

// Exact cos/sin per quarter turn; Math.cos(Math.PI / 2) is 6e-17, not 0
const QUARTER_TURN_TRIG: Record<QuarterTurn, { cos: number; sin: number }> = {
  0: { cos: 1, sin: 0 },
  90: { cos: 0, sin: 1 },
  180: { cos: -1, sin: 0 },
  270: { cos: 0, sin: -1 },
};

/** Counter-clockwise (in the math sense) rotation by a whole number of quarter turns. */
export function rotate(degrees: number): AffineMatrix {
  const { cos, sin } = QUARTER_TURN_TRIG[toQuarterTurn(degrees)];
  return { a: cos, b: sin, c: -sin, d: cos, e: 0, f: 0 };
}

/** Matrix product `m · n`: applying the result equals applying n, then m. */
export function multiply(m: AffineMatrix, n: AffineMatrix): AffineMatrix {
  return {
    a: m.a * n.a + m.c * n.b,
    b: m.b * n.a + m.d * n.b,
    c: m.a * n.c + m.c * n.d,
    d: m.b * n.c + m.d * n.d,
    e: m.a * n.e + m.c * n.f + m.e,
    f: m.b * n.e + m.d * n.f + m.f,
  };
}

/** Compose left to right in application order: `compose(A, B)` applies A first. */
export function compose(...steps: AffineMatrix[]): AffineMatrix {
  return steps.reduce((acc, step) => multiply(step, acc), IDENTITY);
}

export function applyToPoint(m: AffineMatrix, p: Point): Point {
  return {
    x: m.a * p.x + m.c * p.y + m.e,
    y: m.b * p.x + m.d * p.y + m.f,
  };
}

// ─── Rotation Normalization ─────────────────────────────────────────────────────

export function normalizeRotation(degrees: number): number {
  return ((degrees % 360) + 360) % 360;
}

/**
 * Reduce any angle into [0, 360) and require a quarter turn. Anything else
 * would produce a skewed, non-axis-aligned overlay, so it throws instead of
 * rounding.
 */
export function toQuarterTurn(degrees: number): QuarterTurn {
  if (!Number.isFinite(degrees)) {
    throw new ContractViolationError(`rotationDegrees must be finite, got ${degrees}`);
  }
  const normalized = normalizeRotation(degrees);
  switch (normalized) {
    case 0:
      return 0;
    case 90:
      return 90;
    case 180:
      return 180;
    case 270:
      return 270;
    default:
      throw new ContractViolationError(
        `rotationDegrees must be a multiple of 90, got ${degrees} (normalized ${normalized})`,
      );
  }
}

/** Sensor → display transform for a given state. */
export function transformMatrix(state: TransformState): AffineMatrix {
  return compose(
    translate(-0.5, -0.5),
    scale(state.mirrored ? -1 : 1, 1),
    rotate(-state.rotationDegrees),
    translate(0.5, 0.5),
  );
}

/**
 * The state whose transform undoes `state`. With mirroring the map is a
 * reflection, which is its own inverse; without it, the opposite rotation.
 */
export function inverseTransform(state: TransformState): TransformState {
  if (state.mirrored) {
    return { mirrored: true, rotationDegrees: state.rotationDegrees };
  }
  return { mirrored: false, rotationDegrees: toQuarterTurn(360 - state.rotationDegrees) };
}

// ─── Mapper ─────────────────────────────────────────────────────────────────────

interface Snapshot {
  state: TransformState;
  matrix: AffineMatrix;
}

export class OverlayCoordinateMapper {
  // State and matrix are swapped together so a map call never sees half an update
  private snapshot: Snapshot;

  constructor(mirrored: boolean = false, rotationDegrees: number = 0) {
    this.snapshot = OverlayCoordinateMapper.buildSnapshot(mirrored, rotationDegrees);
  }

  setTransform(mirrored: boolean, rotationDegrees: number): void {
    this.snapshot = OverlayCoordinateMapper.buildSnapshot(mirrored, rotationDegrees);
  }

  getTransform(): TransformState {
    return { ...this.snapshot.state };
  }

  mapPoint(point: Point): Point {
    return applyToPoint(this.snapshot.matrix, point);
  }

  /** Map all four corners and return their axis-aligned bounds. */
  mapRect(rect: Rect): Rect {
    const { matrix } = this.snapshot;
    const corners = [
      applyToPoint(matrix, { x: rect.left, y: rect.top }),
      applyToPoint(matrix, { x: rect.right, y: rect.top }),
      applyToPoint(matrix, { x: rect.right, y: rect.bottom }),
      applyToPoint(matrix, { x: rect.left, y: rect.bottom }),
    ];
    const xs = corners.map((p) => p.x);
    const ys = corners.map((p) => p.y);
    return {
      left: Math.min(...xs),
      top: Math.min(...ys),
      right: Math.max(...xs),
      bottom: Math.max(...ys),
    };
  }

  private static buildSnapshot(mirrored: boolean, rotationDegrees: number): Snapshot {
    const state: TransformState = Object.freeze({
      mirrored,
      rotationDegrees: toQuarterTurn(rotationDegrees),
    });
    return { state, matrix: transformMatrix(state) };
  }
}
