import { describe, it, expect } from "vitest";
import { compareWithPrior, diffSnapshots } from "../services/diffService.js";
import { austria, edition, withGermany } from "./fakes.js";

describe("diffSnapshots", () => {
  it("reports an initial release when there is no prior snapshot", () => {
    expect(diffSnapshots(austria())).toEqual({ changed: true, summary: { kind: "initial" } });
  });

  it("reports an added locale and leaves unchanged ones out", () => {
    expect(diffSnapshots(withGermany(austria()), austria())).toEqual({
      changed: true,
      summary: { kind: "update", updated: [], added: ["Germany"], removed: [] }
    });
  });

  it("reports nothing for identical snapshots", () => {
    expect(diffSnapshots(austria(), austria())).toEqual({
      changed: false,
      summary: { kind: "update", updated: [], added: [], removed: [] }
    });
  });

  it("detects a changed edition field", () => {
    const next = austria();
    next.Austria.editions[0].color = "#000000";
    const result = diffSnapshots(next, austria());
    expect(result.changed).toBe(true);
    expect(result.summary).toEqual({ kind: "update", updated: ["Austria"], added: [], removed: [] });
  });

  it("detects a new edition within a locale", () => {
    const next = austria();
    next.Austria.editions.push(edition({ id: "red-at", name: "Red Bull Energy Drink" }));
    expect(diffSnapshots(next, austria()).summary).toEqual({
      kind: "update",
      updated: ["Austria"],
      added: [],
      removed: []
    });
  });

  it("sorts every list", () => {
    const base = austria().Austria;
    const next = { Zambia: base, Albania: base, Malta: base };
    const prior = { Peru: base, Chile: base, Malta: base };
    expect(diffSnapshots(next, prior).summary).toEqual({
      kind: "update",
      updated: [],
      added: ["Albania", "Zambia"],
      removed: ["Chile", "Peru"]
    });
  });

  it("is symmetric in added and removed", () => {
    const a = withGermany(austria());
    const b = austria();
    const forward = diffSnapshots(a, b).summary;
    const backward = diffSnapshots(b, a).summary;
    if (forward.kind !== "update" || backward.kind !== "update") {
      throw new Error("expected update summaries");
    }
    expect(forward.added).toEqual(backward.removed);
    expect(forward.removed).toEqual(backward.added);
  });
});

describe("compareWithPrior", () => {
  it("treats a missing prior as the initial release", () => {
    expect(compareWithPrior(austria(), { status: "missing" })).toEqual({
      changed: true,
      summary: { kind: "initial" }
    });
  });

  it("fails open on an unreadable prior", () => {
    expect(compareWithPrior(austria(), { status: "unreadable", error: "Unexpected token" })).toEqual({
      changed: true,
      summary: { kind: "unreadable", error: "Unexpected token" }
    });
  });

  it("diffs against a loaded prior", () => {
    expect(compareWithPrior(austria(), { status: "loaded", snapshot: austria() }).changed).toBe(false);
  });
});
