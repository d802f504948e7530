#!/usr/bin/env node
import { fileURLToPath } from "url";
import { writeDiagram } from "./diagram.js";
import { ConsortError } from "./errors.js";

async function main() {
  const [datasetPath, rulesPath, outSvg, outJson] = process.argv.slice(2);
  if (!datasetPath || !rulesPath || !outSvg) {
    console.error("Usage: consort-flow <dataset.json|yaml> <rules.yaml> <out.svg> [out.json]");
    process.exit(1);
  }
  const summary = writeDiagram({
    datasetPath,
    rulesPath,
    outSvg,
    outJson,
    cssPath: fileURLToPath(new URL("../styles/consort.css", import.meta.url)),
  });
  console.error(
    `consort-flow: rows=${summary.rows} cells=${summary.cells} primitives=${summary.primitives} plot=${summary.width}x${summary.height}`,
  );
  console.error(`SVG: ${outSvg}`);
  if (outJson) console.error(`JSON: ${outJson}`);
}

main().catch((e) => {
  if (e instanceof ConsortError) {
    console.error(`${e.name}: ${e.message}`);
  } else {
    console.error(e);
  }
  process.exit(1);
});
