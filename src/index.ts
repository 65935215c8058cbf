// src/index.ts

export type {
  DetectorFrame,
  EllipseSpec,
  RejectRectangle,
  MaskProgram,
  RejectRect,
  EdgeMaskProgram,
  Quadrant,
  FrameSide,
} from "./types/mask-model";
export type {
  MaskMode,
  MaskRequest,
  RowScanOptions,
  EdgeMaskOptions,
  EllipseFromFrameOptions,
} from "./types/options";

export { EllipseMaskRectanglizer, scanEllipseRows, rowSpan } from "./geometry/row-scan";
export { buildEdgeMask, computeGaps, computeQuadrantArcs } from "./geometry/edge-mask";
export { ellipseFromFrame, ellipseMeetsFrame } from "./geometry/ellipse";
export { measureMaskCoverage, type MaskCoverage } from "./geometry/coverage";
export { rectUnionArea } from "./geometry/boolean-ops";
export { InvalidGeometryError } from "./geometry/validation";
export * from "./geometry/constants";

export {
  formatRejectRect,
  formatRejectRectangle,
  formatProgram,
  rowToRect,
} from "./io/command-formatter";
export { createFileMaskWriter, type MaskWriter } from "./io/mask-writer";
export { parseRejectRectLine, parseMaskMacro, rectToRejectRectangle } from "./parse/command-parser";

export {
  buildMaskProgram,
  buildMaskCommands,
  exportMask,
  createDefaultMaskRequest,
  type MaskExportResult,
} from "./core/pipeline";
export { edgeMaskRequest, writeEdgeMask, type EdgeMaskFileOptions } from "./core/mask-maker";
export { logger, setLogLevel, type LogLevel } from "./logger";
