/**
 * Unit tests for geometry-normalizer.ts
 */

import { describe, it, expect } from "vitest";
import {
  assertImageDimensions,
  centeredPosition,
  interpupillaryDistance,
  normalizePoint,
  normalizeRect,
  rectHeight,
  rectWidth,
} from "./geometry-normalizer.js";
import { ContractViolationError } from "./errors.js";
import { LandmarkType } from "./types.js";

describe("assertImageDimensions", () => {
  it("accepts positive dimensions", () => {
    expect(() => assertImageDimensions(640, 480)).not.toThrow();
  });

  it("rejects a zero width", () => {
    expect(() => assertImageDimensions(0, 480)).toThrow(ContractViolationError);
  });

  it("rejects a zero height", () => {
    expect(() => assertImageDimensions(640, 0)).toThrow("imageHeight must be a positive number, got 0");
  });

  it("rejects negative and non-finite dimensions", () => {
    expect(() => assertImageDimensions(-1, 480)).toThrow(ContractViolationError);
    expect(() => assertImageDimensions(640, Number.NaN)).toThrow(ContractViolationError);
    expect(() => assertImageDimensions(Infinity, 480)).toThrow(ContractViolationError);
  });
});

describe("normalizeRect / normalizePoint", () => {
  it("divides x by width and y by height", () => {
    expect(normalizeRect({ left: 160, top: 120, right: 480, bottom: 360 }, 640, 480)).toEqual({
      left: 0.25,
      top: 0.25,
      right: 0.75,
      bottom: 0.75,
    });
    expect(normalizePoint({ x: 320, y: 120 }, 640, 480)).toEqual({ x: 0.5, y: 0.25 });
  });

  it("reports width and height of a rect", () => {
    const rect = { left: 0.25, top: 0.5, right: 0.75, bottom: 0.75 };
    expect(rectWidth(rect)).toBe(0.5);
    expect(rectHeight(rect)).toBe(0.25);
  });
});

describe("centeredPosition", () => {
  it("is (0,0) for a box centered in the frame", () => {
    expect(centeredPosition({ left: 0.25, top: 0.25, right: 0.75, bottom: 0.75 })).toEqual({ x: 0, y: 0 });
  });

  it("is (-0.5,-0.5) for a box collapsed at the top-left corner", () => {
    expect(centeredPosition({ left: 0, top: 0, right: 0, bottom: 0 })).toEqual({ x: -0.5, y: -0.5 });
  });

  it("is (0.5,0.5) for a box collapsed at the bottom-right corner", () => {
    expect(centeredPosition({ left: 1, top: 1, right: 1, bottom: 1 })).toEqual({ x: 0.5, y: 0.5 });
  });
});

describe("interpupillaryDistance", () => {
  it("is the eye distance as a fraction of image width", () => {
    const landmarks = {
      [LandmarkType.LEFT_EYE]: { x: 100, y: 100 },
      [LandmarkType.RIGHT_EYE]: { x: 130, y: 140 },
    };
    // hypot(30, 40) = 50
    expect(interpupillaryDistance(landmarks, 500)).toBe(0.1);
  });

  it("is 0 when an eye is missing", () => {
    expect(interpupillaryDistance({ [LandmarkType.LEFT_EYE]: { x: 1, y: 1 } }, 640)).toBe(0);
    expect(interpupillaryDistance({ [LandmarkType.RIGHT_EYE]: { x: 1, y: 1 } }, 640)).toBe(0);
    expect(interpupillaryDistance({}, 640)).toBe(0);
  });
});
