// src/geometry/row-scan.ts

import type {
  DetectorFrame,
  EllipseSpec,
  MaskProgram,
  RejectRectangle,
} from "../types/mask-model";
import type { RowScanOptions } from "../types/options";
import { logger } from "../logger";
import { ellipseMeetsFrame } from "./ellipse";
import {
  InvalidGeometryError,
  isDegenerate,
  validateEllipse,
  validateFrame,
} from "./validation";

const SOURCE = "row-scan";

/**
 * Horizontal span of the ellipse on one row, before clipping and rounding.
 * Returns null when the row misses the ellipse.
 */
export function rowSpan(
  ellipse: EllipseSpec,
  row: number
): { left: number; right: number } | null {
  if (ellipse.radiusX === 0 || ellipse.radiusY === 0) return null;

  const t = (row - ellipse.centerY) / ellipse.radiusY;
  const q = 1 - t * t;
  if (q < 0) return null;

  const dx = ellipse.radiusX * Math.sqrt(q);
  return { left: ellipse.centerX - dx, right: ellipse.centerX + dx };
}

/**
 * Turns an ellipse into one strip per detector row it crosses.
 *
 * Left bounds are floored and right bounds ceiled, so a strip never
 * covers less than the continuous span. Both are then clipped to the
 * frame; rows whose span falls entirely outside are dropped.
 */
export class EllipseMaskRectanglizer {
  constructor(private readonly options: RowScanOptions = {}) {}

  compute(ellipse: EllipseSpec, frame: DetectorFrame): MaskProgram {
    validateFrame(frame);
    validateEllipse(ellipse);

    if (isDegenerate(ellipse, frame)) {
      logger.debug("degenerate ellipse or empty frame, nothing to scan", SOURCE);
      return [];
    }

    if (!ellipseMeetsFrame(ellipse, frame)) {
      const msg = `ellipse at (${ellipse.centerX}, ${ellipse.centerY}) does not meet the ${frame.width}x${frame.height} frame`;
      if (this.options.strict) {
        throw new InvalidGeometryError("ellipse", msg);
      }
      logger.warn(`${msg}; emitting an empty program`, SOURCE);
      return [];
    }

    const lastColumn = frame.width - 1;
    const rects: RejectRectangle[] = [];

    for (let y = 0; y < frame.height; y++) {
      const span = rowSpan(ellipse, y);
      if (!span) continue;

      const xMin = Math.max(0, Math.floor(span.left));
      const xMax = Math.min(lastColumn, Math.ceil(span.right));
      if (xMin > xMax) {
        logger.debug(`row ${y} lies outside the frame`, SOURCE);
        continue;
      }

      rects.push({ row: y, xMin, xMax });
    }

    return rects;
  }
}

/**
 * Convenience wrapper around EllipseMaskRectanglizer.compute.
 */
export function scanEllipseRows(
  ellipse: EllipseSpec,
  frame: DetectorFrame,
  options: RowScanOptions = {}
): MaskProgram {
  return new EllipseMaskRectanglizer(options).compute(ellipse, frame);
}
