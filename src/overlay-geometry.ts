/**
 * Overlay geometry: turns (smoothed) metrics into canvas-pixel shapes for a
 * rendering collaborator. Drawing itself happens elsewhere.
 */

import { isNoFace } from "./metrics-extractor.js";
import type { OverlayCoordinateMapper } from "./overlay-mapper.js";
import type { FaceMetrics, LandmarkType, Point, Rect } from "./types.js";

/** Half-length of each crosshair arm, in canvas pixels. */
export const CROSSHAIR_ARM_PX = 15;

export interface Segment {
  from: Point;
  to: Point;
}

export interface OverlayGeometry {
  box: Rect;
  landmarks: Array<{ type: LandmarkType; position: Point }>;
  crosshair: { horizontal: Segment; vertical: Segment };
}

/**
 * Build canvas-space overlay shapes, or null for the no-face sentinel
 * (there is nothing to draw).
 */
export function buildOverlayGeometry(
  metrics: FaceMetrics,
  mapper: OverlayCoordinateMapper,
  canvasWidth: number,
  canvasHeight: number,
): OverlayGeometry | null {
  if (isNoFace(metrics)) return null;

  const toCanvas = (p: Point): Point => ({ x: p.x * canvasWidth, y: p.y * canvasHeight });

  const mappedBox = mapper.mapRect(metrics.boundingBox);
  const box: Rect = {
    left: mappedBox.left * canvasWidth,
    top: mappedBox.top * canvasHeight,
    right: mappedBox.right * canvasWidth,
    bottom: mappedBox.bottom * canvasHeight,
  };

  const landmarks = metrics.landmarks.map((landmark) => ({
    type: landmark.type,
    position: toCanvas(mapper.mapPoint(landmark.position)),
  }));

  const center = toCanvas(
    mapper.mapPoint({ x: metrics.facePosition.x + 0.5, y: metrics.facePosition.y + 0.5 }),
  );

  return {
    box,
    landmarks,
    crosshair: {
      horizontal: {
        from: { x: center.x - CROSSHAIR_ARM_PX, y: center.y },
        to: { x: center.x + CROSSHAIR_ARM_PX, y: center.y },
      },
      vertical: {
        from: { x: center.x, y: center.y - CROSSHAIR_ARM_PX },
        to: { x: center.x, y: center.y + CROSSHAIR_ARM_PX },
      },
    },
  };
}
