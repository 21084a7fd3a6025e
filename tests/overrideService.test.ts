import fs from "fs/promises";
import os from "os";
import path from "path";
import { describe, it, expect } from "vitest";
import { applyOverrides, loadOverrideRules, type OverrideRule } from "../services/overrideService.js";
import { PipelineError } from "../services/errors.js";
import { austria, withGermany } from "./fakes.js";

describe("applyOverrides", () => {
  it("replaces the field of the first matching edition only", () => {
    const snapshot = withGermany(austria());
    snapshot.Germany.editions[0].flavor = "Dragon Fruit";
    const rule: OverrideRule = {
      id: "summer-at",
      field: "flavor",
      search: "Dragon Fruit",
      replace: "Curuba-Elderflower Mix"
    };

    const { snapshot: patched, report } = applyOverrides(snapshot, [rule]);

    expect(patched.Austria.editions[0].flavor).toBe("Curuba-Elderflower Mix");
    expect(patched.Germany.editions[0].flavor).toBe("Dragon Fruit");
    expect(report).toEqual([
      {
        status: "applied",
        rule,
        locale: "Austria",
        before: "Dragon Fruit",
        after: "Curuba-Elderflower Mix"
      }
    ]);
  });

  it("replaces part of a value and leaves unmatched ids alone", () => {
    const snapshot = withGermany(austria());
    snapshot.Austria.editions[0].flavor = "Dragon Fruit Mix";
    const fix: OverrideRule = { id: "summer-at", field: "flavor", search: "Dragon Fruit", replace: "Curuba-Elderflower" };
    const stray: OverrideRule = { ...fix, id: "summer-ch" };

    const { snapshot: patched, report } = applyOverrides(snapshot, [fix, stray]);

    expect(patched.Austria.editions[0].flavor).toBe("Curuba-Elderflower Mix");
    expect(report[1]).toEqual({ status: "not_found", rule: stray });
    const expected = structuredClone(snapshot);
    expected.Austria.editions[0].flavor = "Curuba-Elderflower Mix";
    expect(patched).toEqual(expected);
  });

  it("does not modify the input snapshot", () => {
    const snapshot = austria();
    const before = structuredClone(snapshot);
    applyOverrides(snapshot, [{ id: "summer-at", field: "flavor", search: "Dragon", replace: "Pitaya" }]);
    expect(snapshot).toEqual(before);
  });

  it("replaces mixed-case search text case-insensitively", () => {
    const snapshot = austria();
    snapshot.Austria.editions[0].standfirst = "dragon fruit and DRAGON FRUIT";
    const { snapshot: patched } = applyOverrides(snapshot, [
      { id: "summer-at", field: "standfirst", search: "Dragon Fruit", replace: "pitaya" }
    ]);
    expect(patched.Austria.editions[0].standfirst).toBe("pitaya and pitaya");
  });

  it("replaces lower-case search text case-sensitively", () => {
    const snapshot = austria();
    snapshot.Austria.editions[0].standfirst = "Tastes of dragon fruit. Dragon Fruit!";
    const { snapshot: patched, report } = applyOverrides(snapshot, [
      { id: "summer-at", field: "standfirst", search: "dragon fruit", replace: "pitaya" }
    ]);
    expect(patched.Austria.editions[0].standfirst).toBe("Tastes of pitaya. Dragon Fruit!");
    expect(report[0].status).toBe("applied");
  });

  it("does not report a lower-case rule as applied when no exact-case text matches", () => {
    const snapshot = austria();
    snapshot.Austria.editions[0].flavor = "Dragon Fruit Mix";
    const rule: OverrideRule = { id: "summer-at", field: "flavor", search: "dragon fruit", replace: "Pitaya" };

    const { snapshot: patched, report } = applyOverrides(snapshot, [rule]);

    expect(report).toEqual([{ status: "not_applicable", rule, locale: "Austria" }]);
    expect(patched.Austria.editions[0].flavor).toBe("Dragon Fruit Mix");
  });

  it("applies rules in table order", () => {
    const { snapshot: patched, report } = applyOverrides(austria(), [
      { id: "summer-at", field: "flavor", search: "Dragon Fruit", replace: "Pitaya" },
      { id: "summer-at", field: "flavor", search: "Pitaya", replace: "Pitaya Lime" }
    ]);
    expect(patched.Austria.editions[0].flavor).toBe("Pitaya Lime");
    expect(report[1]).toMatchObject({ status: "applied", before: "Pitaya", after: "Pitaya Lime" });
  });

  it("reports rules that cannot be applied", () => {
    const snapshot = austria();
    snapshot.Austria.editions[0].alt_text = null;
    const rules: OverrideRule[] = [
      { id: "missing", field: "name", search: "Summer", replace: "Spring" },
      { id: "summer-at", field: "flavor", search: "Mango", replace: "Peach" },
      { id: "summer-at", field: "alt_text", search: "can", replace: "tin" }
    ];

    const { snapshot: patched, report } = applyOverrides(snapshot, rules);

    expect(report).toEqual([
      { status: "not_found", rule: rules[0] },
      { status: "not_applicable", rule: rules[1], locale: "Austria" },
      { status: "not_applicable", rule: rules[2], locale: "Austria" }
    ]);
    expect(patched).toEqual(snapshot);
  });
});

describe("loadOverrideRules", () => {
  it("loads the bundled override table", async () => {
    const rules = await loadOverrideRules("data/overrides.json");
    expect(rules).toHaveLength(3);
    expect(rules[0]).toEqual({
      id: "summer-edition-curuba-elderflower-at",
      field: "flavor",
      search: "Dragon Fruit",
      replace: "Curuba-Elderflower"
    });
  });

  it("rejects rules naming a field that cannot be overridden", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "overrides-"));
    const file = path.join(dir, "overrides.json");
    await fs.writeFile(file, JSON.stringify([{ id: "x", field: "color", search: "a", replace: "b" }]));

    const error = await loadOverrideRules(file).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(PipelineError);
    expect(error).toMatchObject({ code: "OVERRIDES_INVALID" });

    await fs.rm(dir, { recursive: true, force: true });
  });

  it("rejects a missing table", async () => {
    await expect(loadOverrideRules("data/does-not-exist.json")).rejects.toMatchObject({
      code: "OVERRIDES_INVALID"
    });
  });
});
