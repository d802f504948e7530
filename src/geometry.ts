import { InvalidGridSpec } from "./errors.js";

export type GridSpec = {
  columnCount: number;
  columnWidth: number;
  columnSpacing: number;
  layerCount: number;
  layerDepth: number;
  layerSpacing: number;
};

/**
 * Placement of one column (x axis) or layer (y axis).
 * For columns `near` is the left edge; for layers it is the bottom edge,
 * since plot y grows upwards and layer 1 sits at the top.
 */
export type Extent = Readonly<{
  near: number;
  center: number;
  far: number;
}>;

export type Grid = Readonly<{
  spec: Readonly<GridSpec>;
  width: number;
  height: number;
  columns: readonly Extent[];
  layers: readonly Extent[];
}>;

export const referenceGridSpec: Readonly<GridSpec> = Object.freeze({
  columnCount: 4,
  columnWidth: 28,
  columnSpacing: 5,
  layerCount: 5,
  layerDepth: 13,
  layerSpacing: 8,
});

function checkCount(name: string, v: number): void {
  if (!Number.isInteger(v) || v <= 0) {
    throw new InvalidGridSpec(`${name} must be a positive integer, got ${v}`);
  }
}

function checkSize(name: string, v: number): void {
  if (!Number.isFinite(v) || v <= 0) {
    throw new InvalidGridSpec(`${name} must be a positive number, got ${v}`);
  }
}

export function validateGridSpec(spec: GridSpec): void {
  checkCount("columnCount", spec.columnCount);
  checkSize("columnWidth", spec.columnWidth);
  checkSize("columnSpacing", spec.columnSpacing);
  checkCount("layerCount", spec.layerCount);
  checkSize("layerDepth", spec.layerDepth);
  checkSize("layerSpacing", spec.layerSpacing);
}

export function span(count: number, size: number, spacing: number): number {
  return count * size + (count + 1) * spacing;
}

// Walks inwards from the far end of the axis: each far edge is the previous near edge minus spacing.
function stackFromFar(count: number, size: number, spacing: number, total: number): Extent[] {
  const out: Extent[] = [];
  let far = total - spacing;
  for (let k = 0; k < count; k += 1) {
    const near = far - size;
    out.push(Object.freeze({ near, center: (near + far) / 2, far }));
    far = near - spacing;
  }
  return out;
}

export function computeGrid(spec: GridSpec): Grid {
  validateGridSpec(spec);
  const width = span(spec.columnCount, spec.columnWidth, spec.columnSpacing);
  const height = span(spec.layerCount, spec.layerDepth, spec.layerSpacing);
  // Columns come out rightmost first; layers come out topmost first, which is already index order.
  const columns = stackFromFar(spec.columnCount, spec.columnWidth, spec.columnSpacing, width).reverse();
  const layers = stackFromFar(spec.layerCount, spec.layerDepth, spec.layerSpacing, height);
  return Object.freeze({
    spec: Object.freeze({ ...spec }),
    width,
    height,
    columns: Object.freeze(columns),
    layers: Object.freeze(layers),
  });
}

export function columnExtent(grid: Grid, column: number): Extent {
  const e = grid.columns[column - 1];
  if (!Number.isInteger(column) || e === undefined) {
    throw new InvalidGridSpec(`column ${column} is outside 1..${grid.spec.columnCount}`);
  }
  return e;
}

export function layerExtent(grid: Grid, layer: number): Extent {
  const e = grid.layers[layer - 1];
  if (!Number.isInteger(layer) || e === undefined) {
    throw new InvalidGridSpec(`layer ${layer} is outside 1..${grid.spec.layerCount}`);
  }
  return e;
}

/** Horizontal extent covering columns `from`..`to` and the gaps between them. */
export function columnSpan(grid: Grid, from: number, to: number): Extent {
  const a = columnExtent(grid, Math.min(from, to));
  const b = columnExtent(grid, Math.max(from, to));
  return Object.freeze({ near: a.near, center: (a.near + b.far) / 2, far: b.far });
}
