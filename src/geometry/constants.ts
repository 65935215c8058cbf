// src/geometry/constants.ts

/**
 * Defaults matching a 2048 x 2048 detector with a centred circular
 * accessible area of radius 1000 pixels.
 */
export const DEFAULT_FRAME_SIZE = 2048;
export const DEFAULT_RADIUS = 1000;

/** The target software accepts roughly 100 rejectrect commands. */
export const DEFAULT_RESOLUTION = 100;

export const DEFAULT_OUTPUT_PATH = "edge_mask.mac";

/** Vertices used when an ellipse is turned into a polygon. */
export const DEFAULT_ELLIPSE_SEGMENTS = 256;

export const REJECT_RECT_COMMAND = "dc rejectrect";
