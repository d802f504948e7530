import { cellKey, exclusionKey, type CellContent, type ResolvedContent } from "./content.js";
import { columnExtent, columnSpan, layerExtent, type Extent, type Grid } from "./geometry.js";
import { assertTemplateFits, type ArrowSource, type ClosedCellTemplate, type ConsortTemplate } from "./template.js";

export type CellPosition = Readonly<{ layer: number; column: number }>;

export type BoxStyle = "root" | "closed";
export type ArrowStyle = "flow" | "exclusion";
export type TextAlign = "left" | "center" | "right";

export type BoxPrimitive = Readonly<{
  kind: "box";
  at: CellPosition;
  x: Extent;
  y: Extent;
  style: BoxStyle;
}>;

export type LabelPrimitive = Readonly<{
  kind: "label";
  at: CellPosition;
  x: number;
  y: number;
  lines: readonly string[];
  align: TextAlign;
  /** Horizontal room the text may take from `x`, on the side `align` points to. */
  width?: number;
}>;

export type ArrowPrimitive = Readonly<{
  kind: "arrow";
  at: CellPosition;
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  style: ArrowStyle;
}>;

export type Primitive = BoxPrimitive | LabelPrimitive | ArrowPrimitive;

/** Visual tuning in plot units; none of these affect which cells are drawn. */
export type CellStyle = {
  exclusionArrowLength: number;
  exclusionTextGap: number;
  /** Approximate advance of one character, used to wrap exclusion text. */
  exclusionCharWidth: number;
};

export const defaultCellStyle: CellStyle = {
  exclusionArrowLength: 3,
  exclusionTextGap: 1,
  exclusionCharWidth: 1,
};

export type DiagramInput = Readonly<{
  grid: Grid;
  content: ResolvedContent;
  template: ConsortTemplate;
  style: CellStyle;
}>;

export function fillLabel(text: string, count: number): string[] {
  return text.replace(/\{n\}/g, String(count)).split("\n");
}

export function drawRootCell(input: DiagramInput, at: CellPosition, cell: CellContent): Primitive[] {
  const [from, to] = input.template.root.columns;
  const x = columnSpan(input.grid, from, to);
  const y = layerExtent(input.grid, at.layer);
  return [
    { kind: "box", at, x, y, style: "root" },
    { kind: "label", at, x: x.center, y: y.center, lines: fillLabel(cell.label, cell.count), align: "center" },
  ];
}

/**
 * Box, centered label and inbound arrow. The arrow ends on the top edge of
 * this cell; its start is the bottom edge of the source cell, by default the
 * same column one layer up.
 */
export function drawClosedCell(
  input: DiagramInput,
  at: CellPosition,
  cell: CellContent,
  arrowFrom: ArrowSource = {},
): Primitive[] {
  const x = columnExtent(input.grid, at.column);
  const y = layerExtent(input.grid, at.layer);
  const srcX = columnExtent(input.grid, arrowFrom.column ?? at.column);
  const srcY = layerExtent(input.grid, arrowFrom.layer ?? at.layer - 1);
  return [
    { kind: "box", at, x, y, style: "closed" },
    { kind: "label", at, x: x.center, y: y.center, lines: fillLabel(cell.label, cell.count), align: "center" },
    {
      kind: "arrow",
      at,
      x1: srcX.center + (arrowFrom.dx ?? 0),
      y1: srcY.near + (arrowFrom.dy ?? 0),
      x2: x.center,
      y2: y.far,
      style: "flow",
    },
  ];
}

/** Greedy word wrap; a word longer than `maxChars` keeps a line to itself. */
export function wrapLine(line: string, maxChars: number): string[] {
  const words = line.split(" ").filter((w) => w.length > 0);
  if (words.length === 0) return [line];
  const out: string[] = [];
  let cur = "";
  for (const w of words) {
    if (cur.length === 0) {
      cur = w;
    } else if (cur.length + 1 + w.length <= maxChars) {
      cur += ` ${w}`;
    } else {
      out.push(cur);
      cur = w;
    }
  }
  out.push(cur);
  return out;
}

function isLeftHalf(grid: Grid, column: number): boolean {
  return column <= grid.spec.columnCount / 2;
}

/**
 * Horizontal band an exclusion annotation may fill: from just past its arrow
 * tip up to the next flow line on that side. Where a left-half and a
 * right-half column face each other the gap between them is split in two.
 */
export function exclusionBand(grid: Grid, style: CellStyle, column: number): { x: number; width: number } {
  const own = columnExtent(grid, column).center;
  const reach = style.exclusionArrowLength + style.exclusionTextGap;
  if (isLeftHalf(grid, column)) {
    const x = own + reach;
    let limit = grid.width;
    if (column < grid.spec.columnCount) {
      const next = columnExtent(grid, column + 1).center;
      limit = isLeftHalf(grid, column + 1) ? next - style.exclusionTextGap : (own + next) / 2 - style.exclusionTextGap / 2;
    }
    return { x, width: Math.max(0, limit - x) };
  }
  const x = own - reach;
  let limit = 0;
  if (column > 1) {
    const prev = columnExtent(grid, column - 1).center;
    limit = isLeftHalf(grid, column - 1) ? (own + prev) / 2 + style.exclusionTextGap / 2 : prev + style.exclusionTextGap;
  }
  return { x, width: Math.max(0, x - limit) };
}

/**
 * Exclusion annotation: a short horizontal arrow leaving the column's flow
 * line and the reason lines beyond it, wrapped to the column's band.
 * Left-half columns point right, towards the middle of the diagram;
 * right-half columns mirror them.
 */
export function drawOpenCell(input: DiagramInput, at: CellPosition, lines: readonly string[]): Primitive[] {
  const { grid, style } = input;
  const x = columnExtent(grid, at.column);
  const y = layerExtent(grid, at.layer);
  const leftHalf = isLeftHalf(grid, at.column);
  const dir = leftHalf ? 1 : -1;
  const band = exclusionBand(grid, style, at.column);
  const maxChars = Math.max(1, Math.floor(band.width / style.exclusionCharWidth));
  const wrapped = lines.flatMap((l) => wrapLine(l, maxChars));
  return [
    { kind: "label", at, x: band.x, y: y.center, lines: wrapped, align: leftHalf ? "left" : "right", width: band.width },
    {
      kind: "arrow",
      at,
      x1: x.center,
      y1: y.center,
      x2: x.center + dir * style.exclusionArrowLength,
      y2: y.center,
      style: "exclusion",
    },
  ];
}

function exclusionLines(input: DiagramInput, column: number): string[] | undefined {
  const lines: string[] = [];
  for (const reason of input.template.exclusion.reasons) {
    const count = input.content.exclusions.get(exclusionKey(reason.code, column));
    if (count === undefined) return undefined;
    lines.push(...fillLabel(reason.label, count));
  }
  return lines;
}

/**
 * Emits primitives layer by layer, left to right within a layer. Positions
 * with no content produce nothing.
 */
export function renderDiagram(input: DiagramInput): Primitive[] {
  const { grid, content, template } = input;
  assertTemplateFits(template, grid.spec);

  const closed = new Map<string, ClosedCellTemplate>();
  for (const c of template.cells) closed.set(cellKey(c.layer, c.column), c);
  const rootKey = cellKey(template.root.layer, template.root.columns[0]);

  const out: Primitive[] = [];
  for (let layer = 1; layer <= grid.spec.layerCount; layer += 1) {
    for (let column = 1; column <= grid.spec.columnCount; column += 1) {
      const at: CellPosition = { layer, column };
      const key = cellKey(layer, column);
      if (layer === template.exclusion.layer) {
        if (!template.exclusion.columns.includes(column)) continue;
        const lines = exclusionLines(input, column);
        if (lines) out.push(...drawOpenCell(input, at, lines));
        continue;
      }
      const cell = content.cells.get(key);
      if (!cell) continue;
      if (key === rootKey) {
        out.push(...drawRootCell(input, at, cell));
      } else {
        out.push(...drawClosedCell(input, at, cell, closed.get(key)?.arrowFrom));
      }
    }
  }
  return out;
}

/** Distinct grid positions that received at least one primitive. */
export function populatedPositions(primitives: readonly Primitive[]): CellPosition[] {
  const seen = new Map<string, CellPosition>();
  for (const p of primitives) {
    const key = cellKey(p.at.layer, p.at.column);
    if (!seen.has(key)) seen.set(key, p.at);
  }
  return Array.from(seen.values());
}
