import fs from "fs";
import yaml from "js-yaml";
import { InvalidRules } from "./errors.js";
import { referenceGridSpec, type GridSpec } from "./geometry.js";
import { defaultCellStyle } from "./render.js";
import { defaultLabels, type TemplateLabels } from "./template.js";
import { asNum, asStr, isRecord, readText } from "./util.js";

export type StyleRules = {
  /** Horizontal shift of arrow starts where one cell splits into two. */
  split_offset: number;
  exclusion_arrow_length: number;
  exclusion_text_gap: number;
  exclusion_char_width: number;
  /** SVG pixels per plot unit. */
  scale: number;
  margin: number;
  font_size: number;
  line_height: number;
};

export type Rules = {
  grid: GridSpec;
  labels: TemplateLabels;
  style: StyleRules;
};

export const defaultStyle: StyleRules = {
  split_offset: 6,
  exclusion_arrow_length: defaultCellStyle.exclusionArrowLength,
  exclusion_text_gap: defaultCellStyle.exclusionTextGap,
  exclusion_char_width: defaultCellStyle.exclusionCharWidth,
  scale: 6,
  margin: 12,
  font_size: 11,
  line_height: 1.2,
};

export const defaultRules: Rules = {
  grid: { ...referenceGridSpec },
  labels: defaultLabels,
  style: defaultStyle,
};

function section(raw: unknown, key: string): Record<string, unknown> {
  if (!isRecord(raw)) return {};
  const v = raw[key];
  return isRecord(v) ? v : {};
}

// YAML keys may be written in either snake_case or camelCase.
function pick(raw: Record<string, unknown>, snake: string, camel: string): unknown {
  return raw[snake] ?? raw[camel];
}

function mergeGrid(raw: Record<string, unknown>): GridSpec {
  const d = defaultRules.grid;
  return {
    columnCount: asNum(pick(raw, "column_count", "columnCount")) ?? d.columnCount,
    columnWidth: asNum(pick(raw, "column_width", "columnWidth")) ?? d.columnWidth,
    columnSpacing: asNum(pick(raw, "column_spacing", "columnSpacing")) ?? d.columnSpacing,
    layerCount: asNum(pick(raw, "layer_count", "layerCount")) ?? d.layerCount,
    layerDepth: asNum(pick(raw, "layer_depth", "layerDepth")) ?? d.layerDepth,
    layerSpacing: asNum(pick(raw, "layer_spacing", "layerSpacing")) ?? d.layerSpacing,
  };
}

function mergeLabelTable(base: Record<number, string>, raw: unknown): Record<number, string> {
  const out: Record<number, string> = { ...base };
  if (!isRecord(raw)) return out;
  for (const [k, v] of Object.entries(raw)) {
    const key = asNum(k);
    const text = asStr(v);
    if (key !== undefined && Number.isInteger(key) && text !== undefined) out[key] = text;
  }
  return out;
}

function mergeLabels(raw: Record<string, unknown>): TemplateLabels {
  const d = defaultRules.labels;
  return {
    root: asStr(raw.root) ?? d.root,
    allocation: mergeLabelTable(d.allocation, raw.allocation),
    subgroup: mergeLabelTable(d.subgroup, raw.subgroup),
    exclusion: mergeLabelTable(d.exclusion, raw.exclusion),
    analysis: mergeLabelTable(d.analysis, raw.analysis),
  };
}

function mergeStyle(raw: Record<string, unknown>): StyleRules {
  const d = defaultRules.style;
  return {
    split_offset: asNum(raw.split_offset) ?? d.split_offset,
    exclusion_arrow_length: asNum(raw.exclusion_arrow_length) ?? d.exclusion_arrow_length,
    exclusion_text_gap: asNum(raw.exclusion_text_gap) ?? d.exclusion_text_gap,
    exclusion_char_width: asNum(raw.exclusion_char_width) ?? d.exclusion_char_width,
    scale: asNum(raw.scale) ?? d.scale,
    margin: asNum(raw.margin) ?? d.margin,
    font_size: asNum(raw.font_size) ?? d.font_size,
    line_height: asNum(raw.line_height) ?? d.line_height,
  };
}

/** Overlays a parsed rules document on {@link defaultRules}. Unparseable values keep their default. */
export function mergeRules(raw: unknown): Rules {
  return {
    grid: mergeGrid(section(raw, "grid")),
    labels: mergeLabels(section(raw, "labels")),
    style: mergeStyle(section(raw, "style")),
  };
}

export function loadRules(file?: string): Rules {
  if (!file) return mergeRules(undefined);
  if (!fs.existsSync(file)) {
    throw new InvalidRules(`Rules file not found: ${file}`);
  }
  let doc: unknown;
  try {
    doc = yaml.load(readText(file));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new InvalidRules(`cannot parse ${file}: ${msg}`);
  }
  return mergeRules(doc);
}
