// src/types/options.ts
import type { DetectorFrame, EllipseSpec } from "./mask-model";

export type MaskMode = "edge" | "rows";

export interface RowScanOptions {
  /**
   * Throw InvalidGeometryError instead of returning an empty program
   * when the ellipse never meets the frame.
   */
  strict?: boolean;
}

export interface EdgeMaskOptions extends RowScanOptions {
  /**
   * Upper limit of commands emitted. The target software accepts
   * roughly 100 rejectrect commands, so keep this at 100 or below.
   */
  resolution?: number;
}

/**
 * Everything needed to produce one mask file.
 */
export interface MaskRequest extends EdgeMaskOptions {
  frame: DetectorFrame;
  ellipse: EllipseSpec;
  outputPath: string;
  /**
   * "edge" rejects the dark area outside the ellipse within the command
   * budget. "rows" emits one strip per row covering the ellipse itself.
   * Defaults to "edge".
   */
  mode?: MaskMode;
}

export interface EllipseFromFrameOptions {
  /** Vertical radius, when it differs from the horizontal one. 0 means the same. */
  radiusY?: number;
  /** Horizontal offset of the centre from the middle of the frame. */
  offsetX?: number;
  /** Vertical offset of the centre from the middle of the frame. */
  offsetY?: number;
}
