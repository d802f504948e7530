import { pathToFileURL } from "url";
import type { Dataset, DatasetRow } from "./dataset.js";
import { STANDARD_FIELDS } from "./template.js";
import { writeText } from "./util.js";

/**
 * Deterministic 100-subject cohort: two arms of 50, four strata of 25, and
 * in each stratum 10 analysed and 15 excluded (5 per reason).
 */
export function sampleDataset(): Dataset {
  const { allocation, subgroup, exclusion, analysis } = STANDARD_FIELDS;
  const rows: DatasetRow[] = [];
  for (let i = 0; i < 100; i += 1) {
    const arm = i < 50 ? 2 : 3;
    const j = i % 50;
    const stratum = arm === 2 ? (j < 25 ? 1 : 2) : (j < 25 ? 3 : 4);
    const k = j % 25;
    const analysed = k < 10;
    rows.push(Object.freeze({
      id: i + 1,
      [allocation]: arm,
      [subgroup]: stratum,
      [exclusion]: analysed ? 0 : ((k - 10) % 3) + 1,
      [analysis]: analysed ? stratum : 0,
    }));
  }
  return Object.freeze({
    fields: Object.freeze(["id", allocation, subgroup, exclusion, analysis]),
    rows: Object.freeze(rows),
  });
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  const output = process.argv[2] ?? "-";
  const data = JSON.stringify(sampleDataset(), null, 2);
  if (output === "-") {
    process.stdout.write(data);
  } else {
    writeText(output, data);
    console.error(`sample_data: rows=100 -> ${output}`);
  }
}
