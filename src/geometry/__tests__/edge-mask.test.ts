import { describe, expect, it } from "vitest";
import {
  buildEdgeMask,
  computeGaps,
  computeQuadrantArcs,
  sampleAngles,
  toPixel,
} from "../edge-mask";
import { ellipseFromFrame } from "../ellipse";
import { InvalidGeometryError } from "../validation";
import type { DetectorFrame } from "../../types/mask-model";

const FRAME_2048: DetectorFrame = { width: 2048, height: 2048 };
const CIRCLE_1000 = ellipseFromFrame(FRAME_2048, 1000);

describe("toPixel", () => {
  it("rounds halves to the even neighbour", () => {
    expect(toPixel(2.5)).toBe(2);
    expect(toPixel(3.5)).toBe(4);
    expect(toPixel(0.5)).toBe(0);
  });

  it("rounds other values to the nearest pixel and never below zero", () => {
    expect(toPixel(1.4)).toBe(1);
    expect(toPixel(1.6)).toBe(2);
    expect(toPixel(-0.6)).toBe(0);
  });
});

describe("sampleAngles", () => {
  it("drops both ends of the subdivision", () => {
    expect(sampleAngles(0, 1, 3)).toEqual([0.25, 0.5, 0.75]);
  });

  it("returns nothing for a zero count", () => {
    expect(sampleAngles(0, 1, 0)).toEqual([]);
  });
});

describe("computeGaps", () => {
  it("measures each side of an offset ellipse", () => {
    const frame = { width: 100, height: 80 };
    const ellipse = ellipseFromFrame(frame, 45, { radiusY: 30, offsetX: 3, offsetY: -2 });

    expect(computeGaps(ellipse, frame)).toEqual({ north: 12, east: 2, south: 8, west: 8 });
  });
});

describe("computeQuadrantArcs", () => {
  it("spans full quadrants when nothing clips", () => {
    const arcs = computeQuadrantArcs(CIRCLE_1000, computeGaps(CIRCLE_1000, FRAME_2048));

    expect(arcs.map((a) => a.quadrant)).toEqual(["ne", "se", "sw", "nw"]);
    expect(arcs[0]).toMatchObject({ start: 0, end: Math.PI / 2 });
    expect(arcs[1]).toMatchObject({ start: Math.PI / 2, end: Math.PI });
    for (const a of arcs) {
      expect(a.length).toBeCloseTo(Math.PI / 2, 12);
    }
  });

  it("stops each arc where the boundary crosses a frame edge", () => {
    const frame = { width: 100, height: 100 };
    const ellipse = ellipseFromFrame(frame, 60);
    const [ne] = computeQuadrantArcs(ellipse, computeGaps(ellipse, frame));

    expect(ne.start).toBeCloseTo(Math.acos(50 / 60), 12);
    expect(ne.end).toBeCloseTo(Math.asin(50 / 60), 12);
  });
});

describe("buildEdgeMask", () => {
  it("uses only border strips when the budget allows nothing else", () => {
    expect(buildEdgeMask(CIRCLE_1000, FRAME_2048, { resolution: 4 })).toEqual([
      { x: 0, y: 2024, width: 2048, height: 24 },
      { x: 2024, y: 0, width: 24, height: 2048 },
      { x: 0, y: 0, width: 2048, height: 24 },
      { x: 0, y: 0, width: 24, height: 2048 },
    ]);
  });

  it("shares the remaining budget between the four corners", () => {
    const rects = buildEdgeMask(CIRCLE_1000, FRAME_2048, { resolution: 20 });

    expect(rects).toHaveLength(20);
    expect(rects[4]).toEqual({ x: 1333, y: 1975, width: 715, height: 73 });
    expect(rects[8]).toEqual({ x: 1975, y: 0, width: 73, height: 715 });
    expect(rects[12]).toEqual({ x: 0, y: 0, width: 715, height: 73 });
    expect(rects[19]).toEqual({ x: 0, y: 1975, width: 715, height: 73 });
  });

  it("builds corner staircases only when the ellipse clips every side", () => {
    const frame = { width: 100, height: 100 };
    const rects = buildEdgeMask(ellipseFromFrame(frame, 60), frame, { resolution: 10 });

    expect(rects).toEqual([
      { x: 90, y: 95, width: 10, height: 5 },
      { x: 95, y: 90, width: 5, height: 10 },
      { x: 95, y: 0, width: 5, height: 10 },
      { x: 90, y: 0, width: 10, height: 5 },
      { x: 0, y: 0, width: 10, height: 5 },
      { x: 0, y: 0, width: 5, height: 10 },
      { x: 0, y: 90, width: 5, height: 10 },
      { x: 0, y: 95, width: 10, height: 5 },
    ]);
  });

  it("drops strips that round to zero size", () => {
    const frame = { width: 11, height: 9 };
    const rects = buildEdgeMask(ellipseFromFrame(frame, 4), frame, { resolution: 4 });

    expect(rects).toEqual([
      { x: 10, y: 0, width: 2, height: 9 },
      { x: 0, y: 0, width: 2, height: 9 },
    ]);
  });

  it("gives the whole budget to the corners when the ellipse touches every side", () => {
    const frame = { width: 512, height: 512 };
    const rects = buildEdgeMask(ellipseFromFrame(frame, 256), frame, { resolution: 4 });

    expect(rects).toEqual([
      { x: 437, y: 437, width: 75, height: 75 },
      { x: 437, y: 0, width: 75, height: 75 },
      { x: 0, y: 0, width: 75, height: 75 },
      { x: 0, y: 437, width: 75, height: 75 },
    ]);
  });

  it("emits nothing when the ellipse covers the whole frame", () => {
    const frame = { width: 100, height: 100 };
    expect(buildEdgeMask(ellipseFromFrame(frame, 1000), frame)).toEqual([]);
  });

  it("rejects the whole frame when the ellipse misses it", () => {
    const frame = { width: 100, height: 100 };
    const outside = { centerX: -300, centerY: -300, radiusX: 100, radiusY: 100 };

    expect(buildEdgeMask(outside, frame)).toEqual([{ x: 0, y: 0, width: 100, height: 100 }]);
    expect(() => buildEdgeMask(outside, frame, { strict: true })).toThrow(InvalidGeometryError);
  });

  it("returns an empty program for degenerate input", () => {
    expect(buildEdgeMask({ ...CIRCLE_1000, radiusX: 0 }, FRAME_2048)).toEqual([]);
    expect(buildEdgeMask(CIRCLE_1000, { width: 2048, height: 0 })).toEqual([]);
  });

  it("rejects a negative or fractional resolution", () => {
    expect(() => buildEdgeMask(CIRCLE_1000, FRAME_2048, { resolution: -1 })).toThrow("resolution");
    expect(() => buildEdgeMask(CIRCLE_1000, FRAME_2048, { resolution: 2.5 })).toThrow("resolution");
  });

  it("keeps every rectangle inside the frame", () => {
    const frame = { width: 300, height: 200 };
    const ellipse = ellipseFromFrame(frame, 140, { radiusY: 90, offsetX: 25, offsetY: -15 });

    for (const r of buildEdgeMask(ellipse, frame, { resolution: 60 })) {
      expect(r.x).toBeGreaterThanOrEqual(0);
      expect(r.y).toBeGreaterThanOrEqual(0);
      expect(r.x + r.width).toBeLessThanOrEqual(frame.width);
      expect(r.y + r.height).toBeLessThanOrEqual(frame.height);
    }
  });
});
