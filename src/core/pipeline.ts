// src/core/pipeline.ts

import type { RejectRect } from "../types/mask-model";
import type { MaskRequest } from "../types/options";
import { buildEdgeMask } from "../geometry/edge-mask";
import { EllipseMaskRectanglizer } from "../geometry/row-scan";
import { ellipseFromFrame } from "../geometry/ellipse";
import {
  DEFAULT_FRAME_SIZE,
  DEFAULT_OUTPUT_PATH,
  DEFAULT_RADIUS,
  DEFAULT_RESOLUTION,
} from "../geometry/constants";
import { formatProgram, rowToRect } from "../io/command-formatter";
import { createFileMaskWriter, type MaskWriter } from "../io/mask-writer";
import { logger } from "../logger";

export interface MaskExportResult {
  outputPath: string;
  lineCount: number;
  lines: string[];
}

/**
 * The stock request: 2048 x 2048 frame, centred circle of radius 1000,
 * edge mask within 100 commands, written to edge_mask.mac.
 */
export function createDefaultMaskRequest(overrides: Partial<MaskRequest> = {}): MaskRequest {
  const frame = overrides.frame ?? { width: DEFAULT_FRAME_SIZE, height: DEFAULT_FRAME_SIZE };
  return {
    frame,
    ellipse: overrides.ellipse ?? ellipseFromFrame(frame, DEFAULT_RADIUS),
    outputPath: overrides.outputPath ?? DEFAULT_OUTPUT_PATH,
    mode: overrides.mode ?? "edge",
    resolution: overrides.resolution ?? DEFAULT_RESOLUTION,
    strict: overrides.strict ?? false,
  };
}

/**
 * Compute the rectangles for a request. Row strips come back as
 * one-pixel-high rectangles so both modes share the formatter.
 */
export function buildMaskProgram(request: MaskRequest): RejectRect[] {
  const mode = request.mode ?? "edge";

  if (mode === "rows") {
    const rectanglizer = new EllipseMaskRectanglizer({ strict: request.strict });
    return rectanglizer.compute(request.ellipse, request.frame).map(rowToRect);
  }

  return buildEdgeMask(request.ellipse, request.frame, {
    resolution: request.resolution,
    strict: request.strict,
  }).slice();
}

export function buildMaskCommands(request: MaskRequest): string[] {
  return formatProgram(buildMaskProgram(request));
}

/**
 * Compute, format and write one mask file. The writer is called exactly
 * once, after the whole program has been computed.
 */
export async function exportMask(
  request: MaskRequest,
  writer: MaskWriter = createFileMaskWriter()
): Promise<MaskExportResult> {
  const lines = buildMaskCommands(request);
  await writer.write(request.outputPath, lines);

  logger.info(`wrote ${lines.length} commands to ${request.outputPath}`, "pipeline");

  return {
    outputPath: request.outputPath,
    lineCount: lines.length,
    lines,
  };
}
