// src/parse/command-parser.ts

import type { RejectRect, RejectRectangle } from "../types/mask-model";

const REJECT_RECT_LINE = /^dc\s+rejectrect\s+(\d+)\s+(\d+)\s+(\d+)\s+(\d+)$/i;

/**
 * Parse one "dc rejectrect x y width height" line.
 *
 * Returns null for blank lines, comments (# or ;) and anything that is not
 * a rejectrect command with four non-negative integers.
 */
export function parseRejectRectLine(rawLine: string): RejectRect | null {
  const line = rawLine.trim();
  if (!line) return null;
  if (line.startsWith("#") || line.startsWith(";")) return null;

  const m = REJECT_RECT_LINE.exec(line);
  if (!m) return null;

  return {
    x: parseInt(m[1], 10),
    y: parseInt(m[2], 10),
    width: parseInt(m[3], 10),
    height: parseInt(m[4], 10),
  };
}

/**
 * Parse every rejectrect command in a macro file, in file order.
 * A leading BOM and any line-ending style are accepted; other lines
 * are ignored.
 */
export function parseMaskMacro(content: string): RejectRect[] {
  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  const rects: RejectRect[] = [];
  for (const line of text.split(/\r\n|\r|\n/)) {
    const r = parseRejectRectLine(line);
    if (r) rects.push(r);
  }
  return rects;
}

/**
 * Recover a row strip from a one-pixel-high rectangle.
 */
export function rectToRejectRectangle(r: RejectRect): RejectRectangle | null {
  if (r.height !== 1 || r.width < 1) return null;
  return { row: r.y, xMin: r.x, xMax: r.x + r.width - 1 };
}
