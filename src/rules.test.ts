import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { InvalidRules } from "./errors.js";
import { defaultRules, loadRules, mergeRules } from "./rules.js";

describe("mergeRules", () => {
  it("returns the defaults for an empty document", () => {
    expect(mergeRules(undefined)).toEqual(defaultRules);
    expect(mergeRules("not a mapping")).toEqual(defaultRules);
  });

  it("accepts snake_case and camelCase grid keys", () => {
    const rules = mergeRules({ grid: { column_count: "3", layerDepth: 20 } });
    expect(rules.grid).toEqual({ ...defaultRules.grid, columnCount: 3, layerDepth: 20 });
  });

  it("keeps the default for values that do not parse", () => {
    const rules = mergeRules({ style: { scale: "large", margin: 4 } });
    expect(rules.style.scale).toBe(6);
    expect(rules.style.margin).toBe(4);
  });

  it("keeps zero so the grid check can reject it", () => {
    expect(mergeRules({ grid: { column_width: 0 } }).grid.columnWidth).toBe(0);
  });

  it("overrides individual labels", () => {
    const rules = mergeRules({ labels: { root: "Enrolled {n}", allocation: { 2: "Arm A {n}" } } });
    expect(rules.labels.root).toBe("Enrolled {n}");
    expect(rules.labels.allocation).toEqual({ 2: "Arm A {n}", 3: "Allocated to control\n(n = {n})" });
    expect(rules.labels.analysis).toEqual(defaultRules.labels.analysis);
  });
});

describe("loadRules", () => {
  it("ships a rules file that matches the defaults", () => {
    const file = fileURLToPath(new URL("../rules/consort.yaml", import.meta.url));
    expect(loadRules(file)).toEqual(defaultRules);
  });

  it("uses the defaults when no file is given", () => {
    expect(loadRules()).toEqual(defaultRules);
  });

  it("reads YAML overrides", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "consort-rules-"));
    const file = path.join(dir, "rules.yaml");
    fs.writeFileSync(file, "grid:\n  layer_spacing: 4\nstyle:\n  split_offset: 2\n", "utf8");
    const rules = loadRules(file);
    expect(rules.grid.layerSpacing).toBe(4);
    expect(rules.style.split_offset).toBe(2);
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("fails on a missing file", () => {
    expect(() => loadRules("/nonexistent/rules.yaml")).toThrow(InvalidRules);
    expect(() => loadRules("/nonexistent/rules.yaml")).toThrow("Rules file not found: /nonexistent/rules.yaml");
  });

  it("fails on a file that is not YAML", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "consort-rules-"));
    const file = path.join(dir, "rules.yaml");
    fs.writeFileSync(file, "grid: [unclosed\n", "utf8");
    expect(() => loadRules(file)).toThrow(InvalidRules);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
