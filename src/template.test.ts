import { describe, expect, it } from "vitest";
import { InvalidGridSpec } from "./errors.js";
import { referenceGridSpec } from "./geometry.js";
import { assertTemplateFits, buildTemplate, defaultLabels, templateFields } from "./template.js";

describe("buildTemplate", () => {
  it("lays out ten closed cells around the exclusion layer", () => {
    const t = buildTemplate();
    expect(t.root).toEqual({ layer: 1, columns: [2, 3], label: "Randomised\n(n = {n})" });
    expect(t.cells.map((c) => `${c.layer}:${c.column}`)).toEqual([
      "2:2", "2:3", "3:1", "3:2", "3:3", "3:4", "5:1", "5:2", "5:3", "5:4",
    ]);
    expect(t.exclusion.layer).toBe(4);
    expect(t.exclusion.reasons.map((r) => r.code)).toEqual([1, 2, 3]);
  });

  it("uses the split offset for the outer strata", () => {
    const t = buildTemplate(defaultLabels, 3);
    expect(t.cells.find((c) => c.layer === 3 && c.column === 1)?.arrowFrom).toEqual({ column: 2, dx: -3 });
    expect(t.cells.find((c) => c.layer === 3 && c.column === 4)?.arrowFrom).toEqual({ column: 3, dx: 3 });
  });

  it("falls back to a bare count label", () => {
    const t = buildTemplate({ ...defaultLabels, analysis: { 1: "Analysed {n}" } });
    expect(t.cells.find((c) => c.layer === 5 && c.column === 2)?.label).toBe("(n = {n})");
  });

  it("lists the fields it reads in flow order", () => {
    expect(templateFields(buildTemplate())).toEqual(["allocation", "subgroup", "analysis", "exclusion"]);
  });
});

describe("assertTemplateFits", () => {
  it("accepts the reference grid", () => {
    expect(() => assertTemplateFits(buildTemplate(), referenceGridSpec)).not.toThrow();
  });

  it("rejects a grid without room for the analysed layer", () => {
    expect(() => assertTemplateFits(buildTemplate(), { ...referenceGridSpec, layerCount: 4 })).toThrow(
      "cell (5,1) lies outside a 4x4 grid",
    );
  });

  it("rejects an arrow that does not come from an earlier layer", () => {
    const t = buildTemplate();
    const cells = t.cells.map((c) => (c.layer === 2 && c.column === 2 ? { ...c, arrowFrom: { layer: 2 } } : c));
    expect(() => assertTemplateFits({ ...t, cells }, referenceGridSpec)).toThrow(InvalidGridSpec);
    expect(() => assertTemplateFits({ ...t, cells }, referenceGridSpec)).toThrow(
      "arrow into cell (2,2) must start in an earlier layer",
    );
  });
});
