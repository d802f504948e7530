import { layerValue, type Dataset } from "./dataset.js";
import { InvalidDataset, UnknownLayerReference } from "./errors.js";
import { templateFields, type ConsortTemplate } from "./template.js";

export type CellContent = Readonly<{
  label: string;
  count: number;
}>;

/** Keyed by {@link cellKey}. Positions outside the template have no entry. */
export type ContentTable = ReadonlyMap<string, CellContent>;

/** Keyed by {@link exclusionKey}. */
export type ExclusionTable = ReadonlyMap<string, number>;

/** The template's layer fields of one subject, coerced to column indices. */
export type LayerRow = Readonly<Record<string, number>>;

export type ResolvedContent = Readonly<{
  cells: ContentTable;
  exclusions: ExclusionTable;
}>;

export function cellKey(layer: number, column: number): string {
  return `${layer}:${column}`;
}

export function exclusionKey(reason: number, column: number): string {
  return `${reason}:${column}`;
}

export function assertFieldsKnown(dataset: Dataset, template: ConsortTemplate): void {
  const missing = templateFields(template).filter((f) => !dataset.fields.includes(f));
  if (missing.length > 0) throw new UnknownLayerReference(missing, dataset.fields);
}

/** Coerces only the fields the template reads; other columns are left alone. */
export function layerRows(dataset: Dataset, template: ConsortTemplate): LayerRow[] {
  const fields = templateFields(template);
  return dataset.rows.map((row, i) => {
    const out: Record<string, number> = {};
    for (const f of fields) out[f] = layerValue(row, f, i);
    return Object.freeze(out);
  });
}

function flowChain(template: ConsortTemplate): Array<{ layer: number; field: string; columns: Set<number> }> {
  const byField = new Map<string, { layer: number; columns: Set<number> }>();
  for (const c of template.cells) {
    const entry = byField.get(c.field);
    if (!entry) {
      byField.set(c.field, { layer: c.layer, columns: new Set([c.column]) });
    } else {
      entry.layer = Math.min(entry.layer, c.layer);
      entry.columns.add(c.column);
    }
  }
  return Array.from(byField.entries())
    .map(([field, e]) => ({ field, ...e }))
    .sort((a, b) => a.layer - b.layer);
}

/**
 * Every subject must land in a drawn cell: a column value needs a templated
 * cell at that layer, a subject present at a layer was present at the layer
 * before it, and an excluded subject carries a known reason and goes no further.
 */
export function assertFlowConsistent(rows: readonly LayerRow[], template: ConsortTemplate): void {
  const chain = flowChain(template);
  const ex = template.exclusion;
  const after = chain.filter((s) => s.layer > ex.layer);
  const reasons = ex.reasons.map((r) => r.code);
  rows.forEach((row, i) => {
    for (const step of chain) {
      const v = row[step.field];
      if (v > 0 && !step.columns.has(v)) {
        throw new InvalidDataset(`"${step.field}" = ${v} has no cell in layer ${step.layer}`, i);
      }
    }
    for (let k = 1; k < chain.length; k += 1) {
      const prev = chain[k - 1];
      const cur = chain[k];
      if (row[cur.field] > 0 && row[prev.field] === 0) {
        throw new InvalidDataset(`present at "${cur.field}" but absent at "${prev.field}"`, i);
      }
    }
    const reason = row[ex.field];
    if (reason > 0) {
      if (!reasons.includes(reason)) {
        throw new InvalidDataset(`exclusion reason ${reason} is not one of ${reasons.join(", ")}`, i);
      }
      const prior = row[ex.priorField];
      if (prior === 0) {
        throw new InvalidDataset(`excluded but absent at "${ex.priorField}"`, i);
      }
      if (!ex.columns.includes(prior)) {
        throw new InvalidDataset(`excluded from "${ex.priorField}" = ${prior}, which has no exclusion cell`, i);
      }
      const reached = after.find((s) => row[s.field] > 0);
      if (reached) {
        throw new InvalidDataset(`excluded but present at "${reached.field}"`, i);
      }
    }
  });
}

function countWhere(rows: readonly LayerRow[], pred: (r: LayerRow) => boolean): number {
  let n = 0;
  for (const r of rows) if (pred(r)) n += 1;
  return n;
}

/**
 * Counts subjects per templated cell. The root cell counts every row; a
 * closed cell counts rows whose layer field equals its column; the exclusion
 * table splits each templated column by reason code.
 */
export function resolveContent(dataset: Dataset, template: ConsortTemplate): ResolvedContent {
  assertFieldsKnown(dataset, template);
  const rows = layerRows(dataset, template);
  assertFlowConsistent(rows, template);

  const cells = new Map<string, CellContent>();
  const root = template.root;
  cells.set(cellKey(root.layer, root.columns[0]), Object.freeze({ label: root.label, count: rows.length }));
  for (const c of template.cells) {
    const count = countWhere(rows, (r) => r[c.field] === c.column);
    cells.set(cellKey(c.layer, c.column), Object.freeze({ label: c.label, count }));
  }

  const ex = template.exclusion;
  const exclusions = new Map<string, number>();
  for (const column of ex.columns) {
    for (const reason of ex.reasons) {
      const count = countWhere(rows, (r) => r[ex.priorField] === column && r[ex.field] === reason.code);
      exclusions.set(exclusionKey(reason.code, column), count);
    }
  }

  return Object.freeze({ cells, exclusions });
}
