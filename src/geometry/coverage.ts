// src/geometry/coverage.ts

import type { DetectorFrame, EllipseSpec, RejectRect } from "../types/mask-model";
import { DEFAULT_ELLIPSE_SEGMENTS } from "./constants";
import { ellipsePolygon } from "./ellipse";
import {
  intersect,
  multiPolygonArea,
  pointsToClipPolygon,
  rectToClipPolygon,
  subtract,
  unionRects,
} from "./boolean-ops";

export interface MaskCoverage {
  /** Area rejected by the union of all rectangles, clipped to the frame. */
  maskedArea: number;
  /** Frame area outside the ellipse. */
  darkArea: number;
  /** Part of darkArea that the rectangles reject. */
  darkCovered: number;
  /** darkCovered / darkArea, or 1 when there is no dark area. */
  darkCoveredFraction: number;
  /** Area inside the ellipse that the rectangles reject anyway. */
  accessibleMaskedArea: number;
}

/**
 * Compare a set of reject rectangles against the ellipse they approximate.
 * The ellipse is polygonised with `segments` vertices.
 */
export function measureMaskCoverage(
  rects: readonly RejectRect[],
  ellipse: EllipseSpec,
  frame: DetectorFrame,
  segments: number = DEFAULT_ELLIPSE_SEGMENTS
): MaskCoverage {
  const framePoly = rectToClipPolygon({ x: 0, y: 0, width: frame.width, height: frame.height });
  const ellipsePoly = pointsToClipPolygon(ellipsePolygon(ellipse, segments));

  const dark = subtract(framePoly, ellipsePoly);
  const accessible = intersect([framePoly], ellipsePoly);
  const masked = intersect(unionRects(rects), framePoly);

  const darkArea = multiPolygonArea(dark);
  const darkCovered = dark.length ? multiPolygonArea(intersect(masked, dark)) : 0;
  const accessibleMaskedArea = accessible.length
    ? multiPolygonArea(intersect(masked, accessible))
    : 0;

  return {
    maskedArea: multiPolygonArea(masked),
    darkArea,
    darkCovered,
    darkCoveredFraction: darkArea > 0 ? darkCovered / darkArea : 1,
    accessibleMaskedArea,
  };
}
