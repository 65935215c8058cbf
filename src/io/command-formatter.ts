// src/io/command-formatter.ts

import type { RejectRect, RejectRectangle } from "../types/mask-model";
import { REJECT_RECT_COMMAND } from "../geometry/constants";

/**
 * A row strip as the one-pixel-high rectangle the command expects.
 */
export function rowToRect(r: RejectRectangle): RejectRect {
  return { x: r.xMin, y: r.row, width: r.xMax - r.xMin + 1, height: 1 };
}

export function formatRejectRect(r: RejectRect): string {
  return `${REJECT_RECT_COMMAND} ${r.x} ${r.y} ${r.width} ${r.height}`;
}

export function formatRejectRectangle(r: RejectRectangle): string {
  return formatRejectRect(rowToRect(r));
}

/**
 * One command line per rectangle, in program order.
 */
export function formatProgram(rects: readonly RejectRect[]): string[] {
  return rects.map(formatRejectRect);
}
