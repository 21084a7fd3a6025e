// services/changelogService.ts
import type { ExtractionAnomaly } from "./buildNormalizationInput.js";
import type { ChangeSummary } from "./diffService.js";
import type { OverrideOutcome } from "./overrideService.js";
import type { RehydrationAnomaly } from "./rehydrateService.js";

export interface ChangelogInput {
  summary: ChangeSummary;
  overrides: OverrideOutcome[];
  anomalies: Array<ExtractionAnomaly | RehydrationAnomaly>;
}

function bulletList(items: string[]): string {
  return items.map(item => `- ${item}`).join("\n");
}

function summaryHeading(summary: ChangeSummary): string[] {
  switch (summary.kind) {
    case "initial":
      return ["# Initial Data Release\n", "First-time generation of all edition data."];
    case "unreadable":
      return ["# Data Update\n", `Could not compare with previous data due to an error: ${summary.error}`];
    case "reprocess":
      return ["# Data Reprocessed\n", "Catalog regenerated from the previously fetched raw data."];
    case "update": {
      const parts = ["# Edition Data Update\n"];
      if (summary.updated.length) parts.push(`## 🔄 Updated Countries\n${bulletList(summary.updated)}`);
      if (summary.added.length) parts.push(`## ➕ Added Countries\n${bulletList(summary.added)}`);
      if (summary.removed.length) parts.push(`## ➖ Removed Countries\n${bulletList(summary.removed)}`);
      return parts;
    }
  }
}

export function describeOverride(outcome: OverrideOutcome): string {
  const { rule } = outcome;
  switch (outcome.status) {
    case "applied":
      return `Applied \`${rule.id}\` (${outcome.locale}) ${rule.field}: "${outcome.before}" → "${outcome.after}"`;
    case "not_found":
      return `Skipped \`${rule.id}\` ${rule.field}: no edition with this id`;
    case "not_applicable":
      return `Skipped \`${rule.id}\` (${outcome.locale}) ${rule.field}: "${rule.search}" not present`;
  }
}

export function describeAnomaly(anomaly: ExtractionAnomaly | RehydrationAnomaly): string {
  switch (anomaly.kind) {
    case "edition_without_id":
      return `${anomaly.locale}: edition #${anomaly.index + 1} has no id`;
    case "duplicate_product_id":
      return `${anomaly.locale}: id \`${anomaly.id}\` already used in ${anomaly.firstLocale}`;
    case "locale_preserved_missing":
      return `${anomaly.locale}: no preserved locale details for this name`;
    case "locale_missing_from_result":
      return `${anomaly.locale}: locale missing from normalized result`;
    case "product_preserved_missing":
      return `${anomaly.locale}: no preserved product details for id \`${anomaly.id ?? "(none)"}\``;
    case "product_duplicated":
      return `${anomaly.locale}: id \`${anomaly.id}\` returned more than once`;
    case "product_missing_from_result":
      return `id \`${anomaly.id}\` missing from normalized result`;
    case "field_renamed":
      return `${anomaly.locale}: id \`${anomaly.id ?? "(none)"}\` field "${anomaly.from}" renamed to "${anomaly.to}"`;
  }
}

/**
 * Markdown changelog for a processed run: locale changes first, then the
 * override report and anomalies that need a human look.
 */
export function renderChangelog(input: ChangelogInput): string {
  const parts = summaryHeading(input.summary);

  if (input.overrides.length) {
    parts.push(`## 🛠️ Manual Overrides\n${bulletList(input.overrides.map(describeOverride))}`);
  }
  if (input.anomalies.length) {
    parts.push(`## ⚠️ Anomalies\n${bulletList(input.anomalies.map(describeAnomaly))}`);
  }

  return parts.join("\n");
}
