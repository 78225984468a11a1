import { describe, it, expect } from "vitest";
import {
  createFieldTransform,
  snapToGrid,
  clampToField,
  gridSpacingForZoom,
  DEFAULT_FIELD_BOUNDS,
  TILE_SIZE_INCHES,
} from "./coordinates.js";

describe("createFieldTransform", () => {
  const transform = createFieldTransform({
    fieldSize: 144,
    surface: { left: 0, top: 0, width: 720, height: 720 },
  });

  it("maps the field center to the surface center", () => {
    expect(transform.fieldToSurface(0, 0)).toEqual({ x: 360, y: 360 });
  });

  it("maps the top-left field corner to the surface origin", () => {
    expect(transform.fieldToSurface(-72, 72)).toEqual({ x: 0, y: 0 });
  });

  it("inverts the y axis", () => {
    expect(transform.fieldToSurface(0, 36)).toEqual({ x: 360, y: 180 });
    expect(transform.fieldToSurface(0, -36)).toEqual({ x: 360, y: 540 });
  });

  it("maps surface pixels back to field inches", () => {
    expect(transform.surfaceToField(720, 720)).toEqual({ x: 72, y: -72 });
    expect(transform.surfaceToField(460, 260)).toEqual({ x: 20, y: 20 });
  });

  it("round-trips through an offset, non-square surface", () => {
    const offset = createFieldTransform({
      surface: { left: 35, top: -12, width: 1000, height: 640 },
    });
    for (const [x, y] of [[0, 0], [13.25, -40.5], [-72, 72], [71.9, -0.1]] as const) {
      const surface = offset.fieldToSurface(x, y);
      const back = offset.surfaceToField(surface.x, surface.y);
      expect(back.x).toBeCloseTo(x, 9);
      expect(back.y).toBeCloseTo(y, 9);
    }
  });

  it("defaults the field size", () => {
    const t = createFieldTransform({ surface: { left: 0, top: 0, width: 144, height: 144 } });
    expect(t.fieldSize).toBe(144);
    expect(t.fieldToSurface(0, 0)).toEqual({ x: 72, y: 72 });
  });

  it("rejects a zero-width surface", () => {
    expect(() =>
      createFieldTransform({ surface: { left: 0, top: 0, width: 0, height: 100 } })
    ).toThrow(RangeError);
  });

  it("rejects a non-finite field size", () => {
    expect(() =>
      createFieldTransform({
        fieldSize: Number.POSITIVE_INFINITY,
        surface: { left: 0, top: 0, width: 100, height: 100 },
      })
    ).toThrow("fieldSize must be a positive finite number, got Infinity");
  });
});

describe("snapToGrid", () => {
  it("rounds each coordinate to the nearest multiple", () => {
    expect(snapToGrid(13.2, 47.9, 5)).toEqual({ x: 15, y: 50 });
  });

  it("snaps to tile spacing", () => {
    expect(snapToGrid(30, -20, TILE_SIZE_INCHES)).toEqual({ x: 23.5, y: -23.5 });
  });

  it("treats axes independently", () => {
    expect(snapToGrid(1.4, 2.6, 1)).toEqual({ x: 1, y: 3 });
  });

  it("rejects a non-positive resolution", () => {
    expect(() => snapToGrid(1, 1, 0)).toThrow(RangeError);
    expect(() => snapToGrid(1, 1, -2)).toThrow(RangeError);
  });
});

describe("clampToField", () => {
  it("leaves interior points alone", () => {
    expect(clampToField(10, -10)).toEqual({ x: 10, y: -10 });
  });

  it("clamps to the field edge", () => {
    expect(clampToField(100, -90)).toEqual({ x: 72, y: -72 });
  });

  it("honors a custom field size", () => {
    expect(clampToField(100, 100, 141)).toEqual({ x: 70.5, y: 70.5 });
  });
});

describe("gridSpacingForZoom", () => {
  it("uses a full tile when zoomed out", () => {
    expect(gridSpacingForZoom(0.5)).toBe(23.5);
    expect(gridSpacingForZoom(1)).toBe(23.5);
  });

  it("halves with each zoom doubling", () => {
    expect(gridSpacingForZoom(1.5)).toBe(11.75);
    expect(gridSpacingForZoom(3)).toBe(5.875);
    expect(gridSpacingForZoom(8)).toBe(2.9375);
    expect(gridSpacingForZoom(16)).toBe(1.46875);
  });

  it("bottoms out at one inch", () => {
    expect(gridSpacingForZoom(40)).toBe(1);
  });
});

describe("DEFAULT_FIELD_BOUNDS", () => {
  it("covers the full field", () => {
    expect(DEFAULT_FIELD_BOUNDS).toEqual({ minX: -72, maxX: 72, minY: -72, maxY: 72 });
  });
});
