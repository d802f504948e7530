import { describe, expect, it } from "vitest";
import { InvalidGridSpec } from "./errors.js";
import {
  columnExtent,
  columnSpan,
  computeGrid,
  layerExtent,
  referenceGridSpec,
  span,
  type GridSpec,
} from "./geometry.js";

const SPECS: GridSpec[] = [
  referenceGridSpec,
  { columnCount: 1, columnWidth: 10, columnSpacing: 2, layerCount: 1, layerDepth: 4, layerSpacing: 3 },
  { columnCount: 7, columnWidth: 3.5, columnSpacing: 0.25, layerCount: 9, layerDepth: 2, layerSpacing: 1.5 },
  { columnCount: 2, columnWidth: 100, columnSpacing: 40, layerCount: 12, layerDepth: 7, layerSpacing: 1 },
];

describe("computeGrid", () => {
  it("matches the reference plot size", () => {
    const grid = computeGrid(referenceGridSpec);
    expect(grid.width).toBe(137);
    expect(grid.height).toBe(113);
  });

  it("places the reference columns", () => {
    const grid = computeGrid(referenceGridSpec);
    expect(grid.columns).toEqual([
      { near: 5, center: 19, far: 33 },
      { near: 38, center: 52, far: 66 },
      { near: 71, center: 85, far: 99 },
      { near: 104, center: 118, far: 132 },
    ]);
  });

  it("places the reference layers from the top down", () => {
    const grid = computeGrid(referenceGridSpec);
    expect(grid.layers).toEqual([
      { near: 92, center: 98.5, far: 105 },
      { near: 71, center: 77.5, far: 84 },
      { near: 50, center: 56.5, far: 63 },
      { near: 29, center: 35.5, far: 42 },
      { near: 8, center: 14.5, far: 21 },
    ]);
  });

  it.each(SPECS)("keeps the size identities for %o", (spec) => {
    const grid = computeGrid(spec);
    expect(grid.width).toBeCloseTo(spec.columnCount * spec.columnWidth + (spec.columnCount + 1) * spec.columnSpacing);
    expect(grid.height).toBeCloseTo(spec.layerCount * spec.layerDepth + (spec.layerCount + 1) * spec.layerSpacing);
    expect(grid.columns).toHaveLength(spec.columnCount);
    expect(grid.layers).toHaveLength(spec.layerCount);
  });

  it.each(SPECS)("orders columns left to right without overlap for %o", (spec) => {
    const grid = computeGrid(spec);
    expect(grid.columns[0].near).toBeCloseTo(spec.columnSpacing);
    for (let i = 1; i < grid.columns.length; i += 1) {
      expect(grid.columns[i].near).toBeGreaterThan(grid.columns[i - 1].far);
      expect(grid.columns[i].near - grid.columns[i - 1].far).toBeCloseTo(spec.columnSpacing);
    }
    for (const c of grid.columns) {
      expect(c.far - c.near).toBeCloseTo(spec.columnWidth);
      expect(c.center).toBeCloseTo((c.near + c.far) / 2);
    }
  });

  it.each(SPECS)("orders layers top to bottom without overlap for %o", (spec) => {
    const grid = computeGrid(spec);
    expect(grid.layers[grid.layers.length - 1].near).toBeCloseTo(spec.layerSpacing);
    for (let i = 1; i < grid.layers.length; i += 1) {
      expect(grid.layers[i].far).toBeLessThan(grid.layers[i - 1].near);
      expect(grid.layers[i - 1].near - grid.layers[i].far).toBeCloseTo(spec.layerSpacing);
    }
  });

  it("handles a single cell grid with the same recurrence", () => {
    const grid = computeGrid(SPECS[1]);
    expect(grid.width).toBe(14);
    expect(grid.height).toBe(10);
    expect(grid.columns).toEqual([{ near: 2, center: 7, far: 12 }]);
    expect(grid.layers).toEqual([{ near: 3, center: 5, far: 7 }]);
  });

  it("returns frozen extents", () => {
    const grid = computeGrid(referenceGridSpec);
    expect(Object.isFrozen(grid.columns[0])).toBe(true);
    expect(Object.isFrozen(grid.layers)).toBe(true);
  });

  const invalid: Array<[Partial<GridSpec>, string]> = [
    [{ columnCount: 0 }, "columnCount must be a positive integer, got 0"],
    [{ layerCount: 2.5 }, "layerCount must be a positive integer, got 2.5"],
    [{ columnWidth: -1 }, "columnWidth must be a positive number, got -1"],
    [{ layerSpacing: 0 }, "layerSpacing must be a positive number, got 0"],
    [{ layerDepth: Number.NaN }, "layerDepth must be a positive number, got NaN"],
  ];

  it.each(invalid)("rejects %o", (patch, message) => {
    const spec = { ...referenceGridSpec, ...patch };
    expect(() => computeGrid(spec)).toThrow(InvalidGridSpec);
    expect(() => computeGrid(spec)).toThrow(message);
  });
});

describe("extent accessors", () => {
  const grid = computeGrid(referenceGridSpec);

  it("is 1-based", () => {
    expect(columnExtent(grid, 1)).toEqual({ near: 5, center: 19, far: 33 });
    expect(layerExtent(grid, 5)).toEqual({ near: 8, center: 14.5, far: 21 });
  });

  it("rejects indices outside the grid", () => {
    expect(() => columnExtent(grid, 5)).toThrow("column 5 is outside 1..4");
    expect(() => layerExtent(grid, 0)).toThrow("layer 0 is outside 1..5");
  });

  it("spans two columns and the gap between them", () => {
    expect(columnSpan(grid, 2, 3)).toEqual({ near: 38, center: 68.5, far: 99 });
    expect(columnSpan(grid, 3, 2)).toEqual({ near: 38, center: 68.5, far: 99 });
  });

  it("computes a single axis span", () => {
    expect(span(4, 28, 5)).toBe(137);
  });
});
