// src/geometry/validation.ts

import type { DetectorFrame, EllipseSpec } from "../types/mask-model";

/**
 * Raised for inputs that cannot describe a mask. Nothing is emitted once
 * this is thrown.
 */
export class InvalidGeometryError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = "InvalidGeometryError";
    this.field = field;
  }
}

/**
 * Zero width or height is allowed and yields an empty program.
 */
export function validateFrame(frame: DetectorFrame): void {
  checkDimension("frame.width", frame.width);
  checkDimension("frame.height", frame.height);
}

/**
 * Zero radii are allowed (degenerate ellipse, empty program).
 */
export function validateEllipse(ellipse: EllipseSpec): void {
  checkFinite("ellipse.centerX", ellipse.centerX);
  checkFinite("ellipse.centerY", ellipse.centerY);
  checkRadius("ellipse.radiusX", ellipse.radiusX);
  checkRadius("ellipse.radiusY", ellipse.radiusY);
}

export function validateResolution(resolution: number): void {
  if (!Number.isInteger(resolution) || resolution < 0) {
    throw new InvalidGeometryError(
      "resolution",
      `expected a non-negative integer, got ${resolution}`
    );
  }
}

export function isDegenerate(ellipse: EllipseSpec, frame: DetectorFrame): boolean {
  return (
    ellipse.radiusX === 0 ||
    ellipse.radiusY === 0 ||
    frame.width === 0 ||
    frame.height === 0
  );
}

function checkDimension(field: string, value: number) {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidGeometryError(field, `expected a non-negative integer pixel count, got ${value}`);
  }
}

function checkFinite(field: string, value: number) {
  if (!Number.isFinite(value)) {
    throw new InvalidGeometryError(field, `expected a finite number, got ${value}`);
  }
}

function checkRadius(field: string, value: number) {
  checkFinite(field, value);
  if (value < 0) {
    throw new InvalidGeometryError(field, `radius must not be negative, got ${value}`);
  }
}
