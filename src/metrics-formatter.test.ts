/**
 * Unit tests for metrics-formatter.ts
 */

import { describe, it, expect } from "vitest";
import {
  formatMetricsPanels,
  formatOrientationPanel,
  formatPositionPanel,
  formatQualityPanel,
} from "./metrics-formatter.js";
import type { FaceMetrics } from "./types.js";

function makeMetrics(overrides: Partial<FaceMetrics> = {}): FaceMetrics {
  return {
    boundingBox: { left: 0.15625, top: 0.2, right: 0.46875, bottom: 0.625 },
    interpupillaryDistance: 0.1,
    faceWidth: 0.3125,
    faceHeight: 0.425,
    facePosition: { x: -0.1875, y: -0.0875 },
    pitch: 0,
    roll: -7,
    yaw: 12.36,
    qualityScore: 0.8123,
    smileConfidence: 0.5,
    isSmiling: false,
    leftEyeOpenConfidence: 0.9,
    rightEyeOpenConfidence: 0.9,
    areEyesOpen: true,
    hasGlasses: false,
    landmarks: [],
    detectionConfidence: 1,
    ...overrides,
  };
}

describe("formatPositionPanel", () => {
  it("shows eye distance and center as percentages and size in canvas pixels", () => {
    expect(formatPositionPanel(makeMetrics(), 640, 480)).toEqual({
      title: "Position Metrics",
      lines: [
        "Eye distance: 10% of frame width",
        "Face size: 200x204px",
        "Center X: -19%",
        "Center Y: -9%",
      ],
    });
  });
});

describe("formatQualityPanel", () => {
  it("rounds quality to two places and smile confidence to one", () => {
    expect(formatQualityPanel(makeMetrics()).lines).toEqual([
      "Quality: 0.81",
      "Smiling: No (0.5)",
      "Eyes: Open",
      "Glasses: No",
    ]);
  });

  it("reflects the boolean flags", () => {
    const lines = formatQualityPanel(
      makeMetrics({ isSmiling: true, smileConfidence: 0.86, areEyesOpen: false, hasGlasses: true }),
    ).lines;
    expect(lines[1]).toBe("Smiling: Yes (0.9)");
    expect(lines[2]).toBe("Eyes: Closed");
    expect(lines[3]).toBe("Glasses: Yes");
  });
});

describe("formatOrientationPanel", () => {
  it("puts all three angles on one line with one decimal", () => {
    expect(formatOrientationPanel(makeMetrics())).toEqual({
      title: "Orientation Data",
      lines: ["Pitch: 0.0°   Roll: -7.0°   Yaw: 12.4°"],
    });
  });
});

describe("formatMetricsPanels", () => {
  it("returns position, quality and orientation panels in order", () => {
    expect(formatMetricsPanels(makeMetrics(), 640, 480).map((p) => p.title)).toEqual([
      "Position Metrics",
      "Quality Metrics",
      "Orientation Data",
    ]);
  });
});
