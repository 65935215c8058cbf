// src/geometry/ellipse.ts

import type { DetectorFrame, EllipseSpec } from "../types/mask-model";
import type { EllipseFromFrameOptions } from "../types/options";
import { DEFAULT_ELLIPSE_SEGMENTS } from "./constants";

export interface Point2 {
  x: number;
  y: number;
}

/**
 * Build an ellipse centred on the frame, shifted by the given offsets.
 * A missing or zero radiusY falls back to radius, giving a circle.
 */
export function ellipseFromFrame(
  frame: DetectorFrame,
  radius: number,
  options: EllipseFromFrameOptions = {}
): EllipseSpec {
  return {
    centerX: frame.width / 2 + (options.offsetX ?? 0),
    centerY: frame.height / 2 + (options.offsetY ?? 0),
    radiusX: radius,
    radiusY: options.radiusY || radius,
  };
}

/**
 * Boundary point at angle phi, measured clockwise from the +y axis.
 */
export function edgePointAt(ellipse: EllipseSpec, phi: number): Point2 {
  return {
    x: ellipse.centerX + ellipse.radiusX * Math.sin(phi),
    y: ellipse.centerY + ellipse.radiusY * Math.cos(phi),
  };
}

/**
 * True when the ellipse interior overlaps the frame rectangle [0, W] x [0, H].
 *
 * Scaling by 1/rx, 1/ry keeps the rectangle axis-aligned, so the nearest
 * frame point to the centre is found by clamping each axis.
 */
export function ellipseMeetsFrame(ellipse: EllipseSpec, frame: DetectorFrame): boolean {
  if (ellipse.radiusX <= 0 || ellipse.radiusY <= 0) return false;

  const nx = clamp(ellipse.centerX, 0, frame.width);
  const ny = clamp(ellipse.centerY, 0, frame.height);
  const u = (nx - ellipse.centerX) / ellipse.radiusX;
  const v = (ny - ellipse.centerY) / ellipse.radiusY;

  return u * u + v * v < 1;
}

/**
 * Inscribed polygon approximation of the ellipse, counter-clockwise,
 * first vertex repeated at the end.
 */
export function ellipsePolygon(
  ellipse: EllipseSpec,
  segments: number = DEFAULT_ELLIPSE_SEGMENTS
): Point2[] {
  const n = Math.max(3, Math.floor(segments));
  const pts: Point2[] = [];

  for (let i = 0; i < n; i++) {
    const t = (2 * Math.PI * i) / n;
    pts.push({
      x: ellipse.centerX + ellipse.radiusX * Math.cos(t),
      y: ellipse.centerY + ellipse.radiusY * Math.sin(t),
    });
  }
  pts.push({ ...pts[0] });

  return pts;
}

export function clamp(value: number, min: number, max: number): number {
  if (value < min) return min;
  if (value > max) return max;
  return value;
}
