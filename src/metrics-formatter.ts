// Face Metrics Pipeline - Metrics Formatter
// Text for the three overlay panels. Interpupillary distance and face center
// are fractions of the frame, so they are shown as percentages; there is no
// calibration that would justify millimetres.

import type { FaceMetrics } from "./types.js";
import { roundMetric } from "./utils.js";

export interface MetricsPanel {
  title: string;
  lines: string[];
}

function percent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

function degrees(value: number): string {
  return `${value.toFixed(1)}°`;
}

export function formatPositionPanel(
  metrics: FaceMetrics,
  canvasWidth: number,
  canvasHeight: number,
): MetricsPanel {
  const widthPx = Math.round(metrics.faceWidth * canvasWidth);
  const heightPx = Math.round(metrics.faceHeight * canvasHeight);
  return {
    title: "Position Metrics",
    lines: [
      `Eye distance: ${percent(metrics.interpupillaryDistance)} of frame width`,
      `Face size: ${widthPx}x${heightPx}px`,
      `Center X: ${percent(metrics.facePosition.x)}`,
      `Center Y: ${percent(metrics.facePosition.y)}`,
    ],
  };
}

export function formatQualityPanel(metrics: FaceMetrics): MetricsPanel {
  const smile = roundMetric(metrics.smileConfidence, 1);
  return {
    title: "Quality Metrics",
    lines: [
      `Quality: ${roundMetric(metrics.qualityScore, 2)}`,
      `Smiling: ${metrics.isSmiling ? "Yes" : "No"} (${smile})`,
      `Eyes: ${metrics.areEyesOpen ? "Open" : "Closed"}`,
      `Glasses: ${metrics.hasGlasses ? "Yes" : "No"}`,
    ],
  };
}

export function formatOrientationPanel(metrics: FaceMetrics): MetricsPanel {
  return {
    title: "Orientation Data",
    lines: [
      `Pitch: ${degrees(metrics.pitch)}   Roll: ${degrees(metrics.roll)}   Yaw: ${degrees(metrics.yaw)}`,
    ],
  };
}

export function formatMetricsPanels(
  metrics: FaceMetrics,
  canvasWidth: number,
  canvasHeight: number,
): MetricsPanel[] {
  return [
    formatPositionPanel(metrics, canvasWidth, canvasHeight),
    formatQualityPanel(metrics),
    formatOrientationPanel(metrics),
  ];
}
