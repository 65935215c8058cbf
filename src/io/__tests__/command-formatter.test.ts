import { describe, expect, it } from "vitest";
import {
  formatProgram,
  formatRejectRect,
  formatRejectRectangle,
  rowToRect,
} from "../command-formatter";

describe("formatRejectRect", () => {
  it("writes origin and extent after the command name", () => {
    expect(formatRejectRect({ x: 0, y: 2024, width: 2048, height: 24 })).toBe(
      "dc rejectrect 0 2024 2048 24"
    );
  });
});

describe("formatRejectRectangle", () => {
  it("writes a row strip as a one-pixel-high rectangle", () => {
    expect(formatRejectRectangle({ row: 7, xMin: 3, xMax: 12 })).toBe("dc rejectrect 3 7 10 1");
  });

  it("gives a single-pixel strip a width of one", () => {
    expect(rowToRect({ row: 24, xMin: 1024, xMax: 1024 })).toEqual({
      x: 1024,
      y: 24,
      width: 1,
      height: 1,
    });
  });
});

describe("formatProgram", () => {
  it("keeps program order", () => {
    expect(
      formatProgram([
        { x: 1, y: 2, width: 3, height: 4 },
        { x: 0, y: 0, width: 5, height: 6 },
      ])
    ).toEqual(["dc rejectrect 1 2 3 4", "dc rejectrect 0 0 5 6"]);
  });
});
