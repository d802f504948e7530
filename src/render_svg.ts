import fs from "fs";
import { XMLValidator } from "fast-xml-parser";
import { RenderError } from "./errors.js";
import type { Grid } from "./geometry.js";
import type { LabelPrimitive, Primitive, TextAlign } from "./render.js";
import { defaultStyle, type StyleRules } from "./rules.js";
import { esc, fmt } from "./util.js";

export type SvgOptions = {
  cssPath?: string;
  style?: Partial<StyleRules>;
};

const ANCHOR: Record<TextAlign, string> = {
  left: "start",
  center: "middle",
  right: "end",
};

type Projection = {
  x: (v: number) => number;
  y: (v: number) => number;
  len: (v: number) => number;
};

// Plot y grows upwards, SVG y grows downwards.
function project(grid: Grid, scale: number, margin: number): Projection {
  return {
    x: (v) => margin + v * scale,
    y: (v) => margin + (grid.height - v) * scale,
    len: (v) => v * scale,
  };
}

function cellAttrs(p: Primitive): string {
  return `data-layer="${p.at.layer}" data-column="${p.at.column}"`;
}

function renderLabel(p: LabelPrimitive, pr: Projection, lineHeight: number): string {
  const first = -((p.lines.length - 1) / 2) * lineHeight;
  const x = fmt(pr.x(p.x));
  const spans = p.lines
    .map((line, i) => `<tspan x="${x}" dy="${fmt(i === 0 ? first : lineHeight)}em">${esc(line)}</tspan>`)
    .join("");
  return `\n    <text class="cellLabel ${p.align}" ${cellAttrs(p)} x="${x}" y="${fmt(pr.y(p.y))}" text-anchor="${ANCHOR[p.align]}" dominant-baseline="middle">${spans}</text>`;
}

function renderPrimitive(p: Primitive, pr: Projection, lineHeight: number): string {
  switch (p.kind) {
    case "box":
      return `\n    <rect class="cell ${p.style}" ${cellAttrs(p)} x="${fmt(pr.x(p.x.near))}" y="${fmt(pr.y(p.y.far))}" width="${fmt(pr.len(p.x.far - p.x.near))}" height="${fmt(pr.len(p.y.far - p.y.near))}" rx="4" ry="4"/>`;
    case "label":
      return renderLabel(p, pr, lineHeight);
    case "arrow": {
      const marker = p.style === "exclusion" ? "arrowhead-exclusion" : "arrowhead";
      return `\n    <line class="arrow ${p.style}" ${cellAttrs(p)} x1="${fmt(pr.x(p.x1))}" y1="${fmt(pr.y(p.y1))}" x2="${fmt(pr.x(p.x2))}" y2="${fmt(pr.y(p.y2))}" marker-end="url(#${marker})"/>`;
    }
  }
}

/** Serialises primitives in their given order, so later primitives paint over earlier ones. */
export function renderSvg(grid: Grid, primitives: readonly Primitive[], opts: SvgOptions = {}): string {
  const style: StyleRules = { ...defaultStyle, ...opts.style };
  const pr = project(grid, style.scale, style.margin);
  const width = fmt(pr.len(grid.width) + 2 * style.margin);
  const height = fmt(pr.len(grid.height) + 2 * style.margin);
  const css = opts.cssPath ? fs.readFileSync(opts.cssPath, "utf8") : "";
  const body = primitives.map((p) => renderPrimitive(p, pr, style.line_height)).join("");

  const svg = `<?xml version="1.0" encoding="UTF-8"?>\n<svg xmlns="http://www.w3.org/2000/svg" xmlns:inkscape="http://www.inkscape.org/namespaces/inkscape" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">\n<style>\n${css}\n.cellLabel {\n  font-size: ${fmt(style.font_size)}px;\n}\n</style>\n<defs>\n  <marker id="arrowhead" markerWidth="8" markerHeight="6" refX="7" refY="3" orient="auto" markerUnits="strokeWidth">\n    <path d="M0,0 L8,3 L0,6 z" fill="#222"/>\n  </marker>\n  <marker id="arrowhead-exclusion" markerWidth="8" markerHeight="6" refX="7" refY="3" orient="auto" markerUnits="strokeWidth">\n    <path d="M0,0 L8,3 L0,6 z" fill="#6b7280"/>\n  </marker>\n</defs>\n<g id="layer-diagram" class="layer diagram" inkscape:groupmode="layer" inkscape:label="diagram">${body}\n</g>\n</svg>`;

  const check = XMLValidator.validate(svg);
  if (check !== true) {
    throw new RenderError(`generated SVG is not well-formed: ${check.err.msg} (line ${check.err.line})`);
  }
  return svg;
}
