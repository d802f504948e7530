import { resolveContent, type ResolvedContent } from "./content.js";
import { loadDataset, type Dataset } from "./dataset.js";
import { computeGrid, type Grid } from "./geometry.js";
import { populatedPositions, renderDiagram, type Primitive } from "./render.js";
import { renderSvg } from "./render_svg.js";
import { loadRules, type Rules } from "./rules.js";
import { assertTemplateFits, buildTemplate, type ConsortTemplate } from "./template.js";
import { writeText } from "./util.js";

export type Diagram = {
  grid: Grid;
  template: ConsortTemplate;
  content: ResolvedContent;
  primitives: Primitive[];
};

/** Validates everything up front, then emits primitives; nothing is emitted for a failing input. */
export function buildDiagram(dataset: Dataset, rules: Rules): Diagram {
  const grid = computeGrid(rules.grid);
  const template = buildTemplate(rules.labels, rules.style.split_offset);
  assertTemplateFits(template, grid.spec);
  const content = resolveContent(dataset, template);
  const primitives = renderDiagram({
    grid,
    content,
    template,
    style: {
      exclusionArrowLength: rules.style.exclusion_arrow_length,
      exclusionTextGap: rules.style.exclusion_text_gap,
      exclusionCharWidth: rules.style.exclusion_char_width,
    },
  });
  return { grid, template, content, primitives };
}

export type WriteDiagramArgs = {
  datasetPath: string;
  rulesPath?: string;
  outSvg: string;
  outJson?: string;
  cssPath?: string;
};

export type WriteDiagramSummary = {
  rows: number;
  cells: number;
  primitives: number;
  width: number;
  height: number;
};

export function writeDiagram(args: WriteDiagramArgs): WriteDiagramSummary {
  const dataset = loadDataset(args.datasetPath);
  const rules = loadRules(args.rulesPath);
  const diagram = buildDiagram(dataset, rules);
  const svg = renderSvg(diagram.grid, diagram.primitives, { cssPath: args.cssPath, style: rules.style });
  writeText(args.outSvg, svg);
  if (args.outJson) {
    const dump = { grid: diagram.grid, primitives: diagram.primitives };
    writeText(args.outJson, JSON.stringify(dump, null, 2));
  }
  return {
    rows: dataset.rows.length,
    cells: populatedPositions(diagram.primitives).length,
    primitives: diagram.primitives.length,
    width: diagram.grid.width,
    height: diagram.grid.height,
  };
}
