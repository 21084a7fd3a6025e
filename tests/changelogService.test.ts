import { describe, it, expect } from "vitest";
import { describeAnomaly, renderChangelog } from "../services/changelogService.js";
import type { OverrideRule } from "../services/overrideService.js";

describe("renderChangelog", () => {
  it("renders the initial release", () => {
    expect(renderChangelog({ summary: { kind: "initial" }, overrides: [], anomalies: [] })).toBe(
      "# Initial Data Release\n\nFirst-time generation of all edition data."
    );
  });

  it("lists only the non-empty change sections", () => {
    const text = renderChangelog({
      summary: { kind: "update", updated: [], added: ["Germany"], removed: [] },
      overrides: [],
      anomalies: []
    });
    expect(text).toBe("# Edition Data Update\n\n## ➕ Added Countries\n- Germany");
  });

  it("renders all change sections in order", () => {
    const text = renderChangelog({
      summary: { kind: "update", updated: ["Austria", "Chile"], added: ["Germany"], removed: ["Peru"] },
      overrides: [],
      anomalies: []
    });
    expect(text).toBe(
      [
        "# Edition Data Update\n",
        "## 🔄 Updated Countries\n- Austria\n- Chile",
        "## ➕ Added Countries\n- Germany",
        "## ➖ Removed Countries\n- Peru"
      ].join("\n")
    );
  });

  it("includes the comparison error for an unreadable prior", () => {
    expect(
      renderChangelog({ summary: { kind: "unreadable", error: "Unexpected token" }, overrides: [], anomalies: [] })
    ).toBe("# Data Update\n\nCould not compare with previous data due to an error: Unexpected token");
  });

  it("appends the override report and anomalies", () => {
    const rule: OverrideRule = {
      id: "summer-at",
      field: "flavor",
      search: "Dragon Fruit",
      replace: "Curuba-Elderflower Mix"
    };
    const text = renderChangelog({
      summary: { kind: "reprocess" },
      overrides: [
        { status: "applied", rule, locale: "Austria", before: "Dragon Fruit", after: "Curuba-Elderflower Mix" },
        { status: "not_found", rule: { ...rule, id: "gone" } }
      ],
      anomalies: [{ kind: "product_missing_from_result", id: "winter-at" }]
    });

    expect(text).toBe(
      [
        "# Data Reprocessed\n",
        "Catalog regenerated from the previously fetched raw data.",
        "## 🛠️ Manual Overrides",
        '- Applied `summer-at` (Austria) flavor: "Dragon Fruit" → "Curuba-Elderflower Mix"',
        "- Skipped `gone` flavor: no edition with this id",
        "## ⚠️ Anomalies",
        "- id `winter-at` missing from normalized result"
      ].join("\n")
    );
  });
});

describe("describeAnomaly", () => {
  it("describes a renamed field", () => {
    expect(
      describeAnomaly({ kind: "field_renamed", locale: "Austria", id: "summer-at", from: "description", to: "flavor_description" })
    ).toBe('Austria: id `summer-at` field "description" renamed to "flavor_description"');
  });

  it("describes an edition without an id by position", () => {
    expect(describeAnomaly({ kind: "edition_without_id", locale: "Germany", index: 1 })).toBe(
      "Germany: edition #2 has no id"
    );
  });
});
