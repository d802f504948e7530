import { InvalidGridSpec } from "./errors.js";
import type { GridSpec } from "./geometry.js";

export const STANDARD_FIELDS = {
  allocation: "allocation",
  subgroup: "subgroup",
  exclusion: "exclusion",
  analysis: "analysis",
} as const;

/**
 * Where a closed cell's inbound arrow starts. Unset members fall back to the
 * layer directly above and the cell's own column; dx/dy shift the start point.
 */
export type ArrowSource = {
  layer?: number;
  column?: number;
  dx?: number;
  dy?: number;
};

export type RootCellTemplate = {
  layer: number;
  columns: readonly [number, number];
  label: string;
};

export type ClosedCellTemplate = {
  layer: number;
  column: number;
  field: string;
  label: string;
  arrowFrom?: ArrowSource;
};

export type ExclusionReason = {
  code: number;
  label: string;
};

export type ExclusionTemplate = {
  layer: number;
  field: string;
  priorField: string;
  columns: readonly number[];
  reasons: readonly ExclusionReason[];
};

export type ConsortTemplate = {
  root: RootCellTemplate;
  cells: readonly ClosedCellTemplate[];
  exclusion: ExclusionTemplate;
};

/** Label texts by column (or by reason code for `exclusion`). `{n}` is replaced by the count. */
export type TemplateLabels = {
  root: string;
  allocation: Record<number, string>;
  subgroup: Record<number, string>;
  exclusion: Record<number, string>;
  analysis: Record<number, string>;
};

export const defaultLabels: TemplateLabels = {
  root: "Randomised\n(n = {n})",
  allocation: {
    2: "Allocated to intervention\n(n = {n})",
    3: "Allocated to control\n(n = {n})",
  },
  subgroup: {
    1: "Intervention, stratum 1\n(n = {n})",
    2: "Intervention, stratum 2\n(n = {n})",
    3: "Control, stratum 1\n(n = {n})",
    4: "Control, stratum 2\n(n = {n})",
  },
  exclusion: {
    1: "Lost to follow-up\n(n = {n})",
    2: "Discontinued\n(n = {n})",
    3: "Withdrew consent\n(n = {n})",
  },
  analysis: {
    1: "Analysed\n(n = {n})",
    2: "Analysed\n(n = {n})",
    3: "Analysed\n(n = {n})",
    4: "Analysed\n(n = {n})",
  },
};

function label(table: Record<number, string>, key: number): string {
  return table[key] ?? "(n = {n})";
}

/**
 * The fixed five-layer CONSORT layout: randomised total, two arms, four
 * strata, the exclusion annotations and four analysed groups.
 */
export function buildTemplate(labels: TemplateLabels = defaultLabels, splitOffset = 6): ConsortTemplate {
  const { allocation, subgroup, exclusion, analysis } = STANDARD_FIELDS;
  return {
    root: { layer: 1, columns: [2, 3], label: labels.root },
    cells: [
      { layer: 2, column: 2, field: allocation, label: label(labels.allocation, 2) },
      { layer: 2, column: 3, field: allocation, label: label(labels.allocation, 3) },
      { layer: 3, column: 1, field: subgroup, label: label(labels.subgroup, 1), arrowFrom: { column: 2, dx: -splitOffset } },
      { layer: 3, column: 2, field: subgroup, label: label(labels.subgroup, 2) },
      { layer: 3, column: 3, field: subgroup, label: label(labels.subgroup, 3) },
      { layer: 3, column: 4, field: subgroup, label: label(labels.subgroup, 4), arrowFrom: { column: 3, dx: splitOffset } },
      { layer: 5, column: 1, field: analysis, label: label(labels.analysis, 1), arrowFrom: { layer: 3 } },
      { layer: 5, column: 2, field: analysis, label: label(labels.analysis, 2), arrowFrom: { layer: 3 } },
      { layer: 5, column: 3, field: analysis, label: label(labels.analysis, 3), arrowFrom: { layer: 3 } },
      { layer: 5, column: 4, field: analysis, label: label(labels.analysis, 4), arrowFrom: { layer: 3 } },
    ],
    exclusion: {
      layer: 4,
      field: exclusion,
      priorField: subgroup,
      columns: [1, 2, 3, 4],
      reasons: [1, 2, 3].map((code) => ({ code, label: label(labels.exclusion, code) })),
    },
  };
}

/** Every field the template reads from the dataset, in flow order. */
export function templateFields(template: ConsortTemplate): string[] {
  const fields: string[] = [];
  const add = (f: string) => {
    if (!fields.includes(f)) fields.push(f);
  };
  for (const c of [...template.cells].sort((a, b) => a.layer - b.layer)) add(c.field);
  add(template.exclusion.priorField);
  add(template.exclusion.field);
  return fields;
}

export function assertTemplateFits(template: ConsortTemplate, spec: GridSpec): void {
  const check = (what: string, layer: number, column: number) => {
    if (layer < 1 || layer > spec.layerCount || column < 1 || column > spec.columnCount) {
      throw new InvalidGridSpec(
        `${what} (${layer},${column}) lies outside a ${spec.layerCount}x${spec.columnCount} grid`,
      );
    }
  };
  for (const c of template.root.columns) check("root cell", template.root.layer, c);
  for (const c of template.cells) {
    check("cell", c.layer, c.column);
    const srcLayer = c.arrowFrom?.layer ?? c.layer - 1;
    const srcColumn = c.arrowFrom?.column ?? c.column;
    if (srcLayer >= c.layer) {
      throw new InvalidGridSpec(`arrow into cell (${c.layer},${c.column}) must start in an earlier layer`);
    }
    check("arrow source", srcLayer, srcColumn);
  }
  for (const c of template.exclusion.columns) check("exclusion cell", template.exclusion.layer, c);
}
