// src/geometry/edge-mask.ts

import type {
  DetectorFrame,
  EdgeMaskProgram,
  EllipseSpec,
  FrameSide,
  Quadrant,
  RejectRect,
} from "../types/mask-model";
import type { EdgeMaskOptions } from "../types/options";
import { logger } from "../logger";
import { DEFAULT_RESOLUTION } from "./constants";
import { clamp, edgePointAt, ellipseMeetsFrame } from "./ellipse";
import {
  InvalidGeometryError,
  isDegenerate,
  validateEllipse,
  validateFrame,
  validateResolution,
} from "./validation";

const SOURCE = "edge-mask";

/**
 * Distance from the ellipse's extreme point to the frame edge on each side.
 * Negative when the ellipse runs past that edge.
 */
export type EdgeGaps = Record<FrameSide, number>;

/**
 * Angular range of the boundary that lies inside the frame, per quadrant.
 * Angles are measured clockwise from +y.
 */
export interface QuadrantArc {
  quadrant: Quadrant;
  start: number;
  end: number;
  length: number;
}

export function computeGaps(ellipse: EllipseSpec, frame: DetectorFrame): EdgeGaps {
  return {
    north: frame.height - ellipse.centerY - ellipse.radiusY,
    east: frame.width - ellipse.centerX - ellipse.radiusX,
    south: ellipse.centerY - ellipse.radiusY,
    west: ellipse.centerX - ellipse.radiusX,
  };
}

/**
 * Quadrant arcs in NE, SE, SW, NW order. Where the ellipse clips a side,
 * the arc stops at the angle where the boundary crosses that frame edge.
 */
export function computeQuadrantArcs(ellipse: EllipseSpec, gaps: EdgeGaps): QuadrantArc[] {
  const { radiusX: rx, radiusY: ry } = ellipse;

  // Angles where the boundary meets each frame edge.
  const north = Math.acos(clamp(1 + gaps.north / ry, -1, 1));
  const east = Math.asin(clamp(1 + gaps.east / rx, -1, 1));
  const south = Math.acos(clamp(1 + gaps.south / ry, -1, 1));
  const west = Math.asin(clamp(1 + gaps.west / rx, -1, 1));

  const clipsNorth = gaps.north < 0;
  const clipsEast = gaps.east < 0;
  const clipsSouth = gaps.south < 0;
  const clipsWest = gaps.west < 0;

  return [
    arc("ne", clipsNorth ? north : 0, clipsEast ? east : Math.PI / 2),
    arc("se", clipsEast ? Math.PI - east : Math.PI / 2, clipsSouth ? Math.PI - south : Math.PI),
    arc("sw", clipsSouth ? Math.PI + south : Math.PI, clipsWest ? Math.PI + west : (3 * Math.PI) / 2),
    arc("nw", clipsWest ? 2 * Math.PI - west : (3 * Math.PI) / 2, clipsNorth ? 2 * Math.PI - north : 2 * Math.PI),
  ];
}

function arc(quadrant: Quadrant, start: number, end: number): QuadrantArc {
  return { quadrant, start, end, length: Math.max(0, end - start) };
}

/**
 * Round half to even, never below zero.
 */
export function toPixel(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  let rounded: number;
  if (diff > 0.5) rounded = floor + 1;
  else if (diff < 0.5) rounded = floor;
  else rounded = floor % 2 === 0 ? floor : floor + 1;
  return Math.max(0, rounded);
}

/**
 * Full-height or full-width strips covering the gap on every side the
 * ellipse does not reach. Strips that round to nothing are dropped.
 */
export function borderStrips(gaps: EdgeGaps, frame: DetectorFrame): RejectRect[] {
  const { width: W, height: H } = frame;
  const candidates: Array<[FrameSide, RejectRect]> = [
    ["north", rect(0, H - gaps.north, W, gaps.north)],
    ["east", rect(W - gaps.east, 0, gaps.east, H)],
    ["south", rect(0, 0, W, gaps.south)],
    ["west", rect(0, 0, gaps.west, H)],
  ];

  const strips: RejectRect[] = [];
  for (const [side, r] of candidates) {
    if (gaps[side] < 0) continue;
    if (r.width === 0 || r.height === 0) {
      logger.debug(`${side} strip rounds to zero size, dropped`, SOURCE);
      continue;
    }
    strips.push(r);
  }
  return strips;
}

/**
 * Rectangle from the boundary point at phi out to the frame corner of
 * its quadrant.
 */
export function cornerRectAt(
  quadrant: Quadrant,
  ellipse: EllipseSpec,
  frame: DetectorFrame,
  phi: number
): RejectRect {
  const { x, y } = edgePointAt(ellipse, phi);
  const { width: W, height: H } = frame;

  switch (quadrant) {
    case "ne":
      return rect(x, y, W - x, H - y);
    case "se":
      return rect(x, 0, W - x, y);
    case "sw":
      return rect(0, 0, x, y);
    case "nw":
      return rect(0, y, x, H - y);
  }
}

/**
 * Interior points of an even subdivision of [start, end] into count + 1 steps.
 */
export function sampleAngles(start: number, end: number, count: number): number[] {
  const step = (end - start) / (count + 1);
  const out: number[] = [];
  for (let i = 1; i <= count; i++) {
    out.push(i * step + start);
  }
  return out;
}

/**
 * Build the complement mask: everything on the frame outside the ellipse,
 * approximated within `resolution` commands.
 *
 * Border strips take their share of the budget first; what remains is
 * split between the four quadrant staircases in proportion to arc length.
 */
export function buildEdgeMask(
  ellipse: EllipseSpec,
  frame: DetectorFrame,
  options: EdgeMaskOptions = {}
): EdgeMaskProgram {
  const resolution = options.resolution ?? DEFAULT_RESOLUTION;

  validateFrame(frame);
  validateEllipse(ellipse);
  validateResolution(resolution);

  if (isDegenerate(ellipse, frame)) {
    logger.debug("degenerate ellipse or empty frame, nothing to mask", SOURCE);
    return [];
  }

  if (!ellipseMeetsFrame(ellipse, frame)) {
    const msg = `ellipse at (${ellipse.centerX}, ${ellipse.centerY}) does not meet the ${frame.width}x${frame.height} frame`;
    if (options.strict) {
      throw new InvalidGeometryError("ellipse", msg);
    }
    logger.warn(`${msg}; rejecting the whole frame`, SOURCE);
    return [{ x: 0, y: 0, width: frame.width, height: frame.height }];
  }

  const gaps = computeGaps(ellipse, frame);
  const rects = borderStrips(gaps, frame);

  const remaining = Math.max(0, resolution - rects.length);
  const arcs = computeQuadrantArcs(ellipse, gaps);
  const edgeLength = arcs[0].length + arcs[1].length + arcs[2].length + arcs[3].length;

  if (edgeLength > 0) {
    for (const a of arcs) {
      if (a.length <= 0) continue;
      const count = Math.floor((a.length / edgeLength) * remaining);
      for (const phi of sampleAngles(a.start, a.end, count)) {
        rects.push(cornerRectAt(a.quadrant, ellipse, frame, phi));
      }
    }
  }

  if (rects.length > resolution) {
    logger.warn(`${rects.length} strips exceed the resolution of ${resolution}`, SOURCE);
  }

  return rects;
}

function rect(x: number, y: number, width: number, height: number): RejectRect {
  return {
    x: toPixel(x),
    y: toPixel(y),
    width: toPixel(width),
    height: toPixel(height),
  };
}
