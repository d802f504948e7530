import fs from "fs";
import yaml from "js-yaml";
import { InvalidDataset } from "./errors.js";
import { STANDARD_FIELDS } from "./template.js";
import { asNum, isRecord, readText } from "./util.js";

export type DatasetValue = string | number | boolean | null;

/**
 * One subject, as read. Layer fields hold the column the subject occupies at
 * that layer (0, blank or missing when absent); other columns such as a
 * subject id pass through untouched.
 */
export type DatasetRow = Readonly<Record<string, DatasetValue>>;

export type Dataset = Readonly<{
  fields: readonly string[];
  rows: readonly DatasetRow[];
}>;

function parseRow(raw: unknown, index: number): DatasetRow {
  if (!isRecord(raw)) {
    throw new InvalidDataset(`expected an object, got ${JSON.stringify(raw)}`, index);
  }
  const row: Record<string, DatasetValue> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    if (value !== null && typeof value !== "string" && typeof value !== "number" && typeof value !== "boolean") {
      throw new InvalidDataset(`field "${key}" must be a scalar, got ${JSON.stringify(value)}`, index);
    }
    row[key] = value;
  }
  return Object.freeze(row);
}

function parseFields(raw: unknown): string[] {
  if (!Array.isArray(raw) || raw.some((f) => typeof f !== "string")) {
    throw new InvalidDataset(`"fields" must be a list of column names`);
  }
  return raw.filter((f): f is string => typeof f === "string");
}

/**
 * Accepts a bare list of rows or `{ fields, rows }`. Without `fields` the
 * schema is the union of the row keys and the standard CONSORT fields, since
 * a layer nobody reached may be left out of every row.
 */
export function parseDataset(raw: unknown): Dataset {
  let rawRows: unknown;
  let fields: string[] | undefined;
  if (Array.isArray(raw)) {
    rawRows = raw;
  } else if (isRecord(raw)) {
    rawRows = raw.rows ?? [];
    if (raw.fields !== undefined) fields = parseFields(raw.fields);
  } else if (raw === undefined || raw === null) {
    rawRows = [];
  } else {
    throw new InvalidDataset(`expected a list of rows or an object with "rows"`);
  }
  if (!Array.isArray(rawRows)) {
    throw new InvalidDataset(`"rows" must be a list`);
  }

  const rows = rawRows.map((r, i) => parseRow(r, i));
  if (!fields) {
    const seen = new Set<string>();
    for (const r of rows) for (const k of Object.keys(r)) seen.add(k);
    for (const f of Object.values(STANDARD_FIELDS)) seen.add(f);
    fields = Array.from(seen);
  }
  return Object.freeze({ fields: Object.freeze(fields), rows: Object.freeze(rows) });
}

/** Reads a JSON or YAML dataset file. */
export function loadDataset(file: string): Dataset {
  if (!fs.existsSync(file)) {
    throw new InvalidDataset(`dataset not found: ${file}`);
  }
  let doc: unknown;
  try {
    doc = yaml.load(readText(file));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new InvalidDataset(`cannot parse ${file}: ${msg}`);
  }
  return parseDataset(doc);
}

/** Column index held in a layer field; 0 when blank or missing. */
export function layerValue(row: DatasetRow, field: string, index?: number): number {
  const v = row[field];
  if (v === undefined || v === null || v === "") return 0;
  const n = typeof v === "boolean" ? undefined : asNum(v);
  if (n === undefined || !Number.isInteger(n) || n < 0) {
    throw new InvalidDataset(`field "${field}" must be a non-negative integer, got ${JSON.stringify(v)}`, index);
  }
  return n;
}
