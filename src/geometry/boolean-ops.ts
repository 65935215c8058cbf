// src/geometry/boolean-ops.ts

import * as polygonClipping from "polygon-clipping";
import type { RejectRect } from "../types/mask-model";
import type { Point2 } from "./ellipse";
import { logger } from "../logger";

/**
 * polygon-clipping uses nested arrays:
 * - Pair: [x, y]
 * - Ring: Pair[]              // closed, first point repeated
 * - ClipPolygon: Ring[]       // [outer, hole1, hole2, ...]
 * - ClipMultiPolygon: ClipPolygon[]
 */
export type Pair = [number, number];
export type Ring = Pair[];
export type ClipPolygon = Ring[];
export type ClipMultiPolygon = ClipPolygon[];
type Geom = ClipPolygon | ClipMultiPolygon;

type ClipOp = "union" | "intersection" | "difference";
type ClipFn = (geom: Geom, ...geoms: Geom[]) => ClipMultiPolygon;

/**
 * The ESM build only has a default export while the CJS build has named
 * ones, so look in both places.
 */
function resolveClipFn(mod: unknown, op: ClipOp): ClipFn {
  const direct = pick(mod, op);
  if (direct) return direct;

  const nested = typeof mod === "object" && mod !== null ? pick(Reflect.get(mod, "default"), op) : null;
  if (nested) return nested;

  throw new Error(`Could not resolve polygon-clipping ${op} function`);
}

function pick(mod: unknown, op: ClipOp): ClipFn | null {
  if (typeof mod !== "object" || mod === null) return null;
  const fn: unknown = Reflect.get(mod, op);
  return typeof fn === "function" ? (fn as ClipFn) : null;
}

const clip: Record<ClipOp, ClipFn> = {
  union: resolveClipFn(polygonClipping, "union"),
  intersection: resolveClipFn(polygonClipping, "intersection"),
  difference: resolveClipFn(polygonClipping, "difference"),
};

export function rectToClipPolygon(r: RejectRect): ClipPolygon {
  const x2 = r.x + r.width;
  const y2 = r.y + r.height;
  return [
    [
      [r.x, r.y],
      [x2, r.y],
      [x2, y2],
      [r.x, y2],
      [r.x, r.y],
    ],
  ];
}

export function pointsToClipPolygon(points: Point2[]): ClipPolygon {
  return [points.map((p): Pair => [p.x, p.y])];
}

/**
 * Run a polygon-clipping operation, logging and returning an empty
 * result if the library throws.
 */
function safeClip(op: ClipOp, a: Geom, b: Geom[]): ClipMultiPolygon {
  try {
    return clip[op](a, ...b);
  } catch (err) {
    logger.warn(`polygon-clipping ${op} failed: ${String(err)}`, "boolean-ops");
    return [];
  }
}

/**
 * Union of rectangles. Zero-area rectangles are skipped.
 */
export function unionRects(rects: readonly RejectRect[]): ClipMultiPolygon {
  const polys = rects
    .filter((r) => r.width > 0 && r.height > 0)
    .map(rectToClipPolygon);
  if (!polys.length) return [];

  const [first, ...rest] = polys;
  return safeClip("union", first, rest);
}

export function intersect(a: ClipMultiPolygon, b: Geom): ClipMultiPolygon {
  if (!a.length) return [];
  return safeClip("intersection", a, [b]);
}

export function subtract(a: Geom, b: Geom): ClipMultiPolygon {
  return safeClip("difference", a, [b]);
}

/**
 * Shoelace area of a closed ring, always positive.
 */
export function ringArea(ring: Ring): number {
  let sum = 0;
  for (let i = 0; i < ring.length - 1; i++) {
    const [x1, y1] = ring[i];
    const [x2, y2] = ring[i + 1];
    sum += x1 * y2 - x2 * y1;
  }
  return Math.abs(sum) / 2;
}

/**
 * Area of a multipolygon: outer rings minus holes.
 */
export function multiPolygonArea(mp: ClipMultiPolygon): number {
  let area = 0;
  for (const poly of mp) {
    const [outer, ...holes] = poly;
    if (!outer) continue;
    area += ringArea(outer);
    for (const hole of holes) {
      area -= ringArea(hole);
    }
  }
  return area;
}

export function rectUnionArea(rects: readonly RejectRect[]): number {
  return multiPolygonArea(unionRects(rects));
}
