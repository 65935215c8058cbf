// src/core/mask-maker.ts

import type { EdgeMaskOptions, EllipseFromFrameOptions, MaskRequest } from "../types/options";
import { ellipseFromFrame } from "../geometry/ellipse";
import { DEFAULT_OUTPUT_PATH } from "../geometry/constants";
import type { MaskWriter } from "../io/mask-writer";
import { exportMask, type MaskExportResult } from "./pipeline";

export interface EdgeMaskFileOptions extends EllipseFromFrameOptions, EdgeMaskOptions {
  outputPath?: string;
}

/**
 * Request for an edge mask around an ellipse centred on the frame:
 *
 *   const req = edgeMaskRequest(2048, 2048, 1000, { offsetX: 12 });
 */
export function edgeMaskRequest(
  frameWidth: number,
  frameHeight: number,
  radius: number,
  options: EdgeMaskFileOptions = {}
): MaskRequest {
  const frame = { width: frameWidth, height: frameHeight };
  return {
    frame,
    ellipse: ellipseFromFrame(frame, radius, options),
    outputPath: options.outputPath ?? DEFAULT_OUTPUT_PATH,
    mode: "edge",
    resolution: options.resolution,
    strict: options.strict,
  };
}

/**
 * Thin wrapper around exportMask for the centred-ellipse case.
 */
export async function writeEdgeMask(
  frameWidth: number,
  frameHeight: number,
  radius: number,
  options: EdgeMaskFileOptions = {},
  writer?: MaskWriter
): Promise<MaskExportResult> {
  return exportMask(edgeMaskRequest(frameWidth, frameHeight, radius, options), writer);
}
