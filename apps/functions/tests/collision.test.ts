import { describe, expect, it } from "vitest";
import {
  BitmapCollisionProvider,
  CircularCollisionProvider,
  CollisionOracle,
  buildBaseMask,
  createCollisionProvider,
  isMaskCellSolid,
  quantizeAngle,
  rotateMask,
  type AlphaBitmap,
} from "../src/collision";

const solidBitmap = (width: number, height: number): AlphaBitmap => ({
  width,
  height,
  alpha: new Uint8Array(width * height).fill(255),
});

const noseBitmap = (): AlphaBitmap => {
  // 4x2 sprite with only its top-right (east, top) pixel opaque.
  const alpha = new Uint8Array(8);
  alpha[3] = 255;
  return { width: 4, height: 2, alpha };
};

const solidCount = (cells: Uint8Array): number => cells.reduce((sum, cell) => sum + cell, 0);

describe("occupancy masks", () => {
  it("treats alpha above 128 as solid", () => {
    const mask = buildBaseMask({ width: 4, height: 1, alpha: Uint8Array.from([0, 128, 129, 255]) });
    expect(Array.from(mask.cells)).toEqual([0, 0, 1, 1]);
  });

  it("rejects an alpha channel of the wrong size", () => {
    expect(() => buildBaseMask({ width: 3, height: 3, alpha: new Uint8Array(4) })).toThrow(
      "alpha channel has 4 bytes, expected 9"
    );
  });

  it("quantizes angles to 5 degree steps", () => {
    expect(quantizeAngle(2.4)).toBe(0);
    expect(quantizeAngle(2.5)).toBe(5);
    expect(quantizeAngle(357.6)).toBe(0);
    expect(quantizeAngle(-3)).toBe(355);
    expect(quantizeAngle(367)).toBe(5);
  });

  it("rotates clockwise on screen into an expanded box", () => {
    const base = buildBaseMask(noseBitmap());

    const quarter = rotateMask(base, 90);
    expect(quarter.width).toBe(2);
    expect(quarter.height).toBe(4);
    expect(solidCount(quarter.cells)).toBe(1);
    expect(isMaskCellSolid(quarter, 1, 3)).toBe(true);

    const half = rotateMask(base, 180);
    expect(half.width).toBe(4);
    expect(half.height).toBe(2);
    expect(solidCount(half.cells)).toBe(1);
    expect(isMaskCellSolid(half, 0, 1)).toBe(true);
  });

  it("produces the same mask for a heading and that heading plus a full turn", () => {
    const base = buildBaseMask(solidBitmap(12, 6));
    expect(rotateMask(base, 390)).toEqual(rotateMask(base, 30));

    const oracle = new CollisionOracle([["hull", solidBitmap(12, 6)]]);
    const mask = oracle.getRotatedMask("hull", 30);
    expect(oracle.getRotatedMask("hull", 390)).toBe(mask);
    expect(oracle.getRotatedMask("hull", -330)).toBe(mask);
  });

  it("recomputes rotations evicted from the per-plating cache", () => {
    const oracle = new CollisionOracle([["hull", solidBitmap(8, 4)]], 2);
    const first = oracle.getRotatedMask("hull", 5);
    oracle.getRotatedMask("hull", 10);
    oracle.getRotatedMask("hull", 15);

    const again = oracle.getRotatedMask("hull", 5);
    expect(again).not.toBe(first);
    expect(again).toEqual(first);
  });
});

describe("collision oracle queries", () => {
  const oracle = new CollisionOracle([
    ["square", solidBitmap(10, 10)],
    ["bar", solidBitmap(10, 4)],
  ]);
  const center = { x: 500, y: 500 };

  it("answers hit, miss and unavailable", () => {
    expect(oracle.queryPoint("square", { x: 503, y: 500 }, center, 0)).toBe("hit");
    expect(oracle.queryPoint("square", { x: 506, y: 500 }, center, 0)).toBe("miss");
    expect(oracle.queryPoint("unknown", { x: 500, y: 500 }, center, 0)).toBe("unavailable");
  });

  it("follows the body orientation", () => {
    expect(oracle.queryPoint("bar", { x: 504, y: 500 }, center, 0)).toBe("hit");
    expect(oracle.queryPoint("bar", { x: 500, y: 504 }, center, 0)).toBe("miss");

    expect(oracle.queryPoint("bar", { x: 504, y: 500 }, center, 90)).toBe("miss");
    expect(oracle.queryPoint("bar", { x: 500, y: 504 }, center, 90)).toBe("hit");
  });
});

describe("collision providers", () => {
  it("falls back to the circle for platings without a mask", () => {
    const oracle = new CollisionOracle([["square", solidBitmap(10, 10)]]);
    const provider = new BitmapCollisionProvider(oracle, new CircularCollisionProvider(32));
    const body = { platingId: "other", position: { x: 500, y: 500 }, orientation: 0 };

    expect(provider.hitTest({ x: 520, y: 500 }, body)).toBe(true);
    expect(provider.hitTest({ x: 540, y: 500 }, body)).toBe(false);
  });

  it("uses the mask instead of the circle when one exists", () => {
    const oracle = new CollisionOracle([["square", solidBitmap(10, 10)]]);
    const provider = new BitmapCollisionProvider(oracle, new CircularCollisionProvider(32));
    const body = { platingId: "square", position: { x: 500, y: 500 }, orientation: 0 };

    expect(provider.hitTest({ x: 520, y: 500 }, body)).toBe(false);
    expect(provider.hitTest({ x: 502, y: 502 }, body)).toBe(true);
  });

  it("picks the implementation once from the supplied bitmaps", () => {
    expect(createCollisionProvider([], 32).kind).toBe("circular");
    expect(createCollisionProvider([["square", solidBitmap(10, 10)]], 32).kind).toBe("bitmap");
  });
});
