// src/types/mask-model.ts

/**
 * Pixel grid of the detector. Bounds are [0, width) x [0, height).
 */
export interface DetectorFrame {
  width: number;
  height: number;
}

/**
 * Axis-aligned ellipse in pixel coordinates. A circle has radiusX === radiusY.
 */
export interface EllipseSpec {
  centerX: number;
  centerY: number;
  radiusX: number;
  radiusY: number;
}

/**
 * One row strip produced by the row scan.
 * xMin and xMax are inclusive column indices.
 */
export interface RejectRectangle {
  row: number;
  xMin: number;
  xMax: number;
}

/**
 * Row strips in ascending row order.
 */
export type MaskProgram = readonly RejectRectangle[];

/**
 * Rectangle as the rejectrect command takes it: origin corner and extent,
 * all in whole pixels.
 */
export interface RejectRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Border strips first (north, east, south, west), then corner rectangles
 * quadrant by quadrant (NE, SE, SW, NW).
 */
export type EdgeMaskProgram = readonly RejectRect[];

export type Quadrant = "ne" | "se" | "sw" | "nw";
export type FrameSide = "north" | "east" | "south" | "west";
