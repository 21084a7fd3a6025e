// services/overrideService.ts
import fs from "fs/promises";
import { z } from "zod";
import type { RawEdition, RawSnapshot } from "../types.js";
import { escapeRegExp } from "./canonicalizeText.js";
import { PipelineError, errorMessage } from "./errors.js";

export const OVERRIDABLE_FIELDS = ["name", "flavor", "standfirst", "alt_text"] as const;

export type OverridableField = (typeof OVERRIDABLE_FIELDS)[number];

export interface OverrideRule {
  id: string;
  field: OverridableField;
  search: string;
  replace: string;
}

export type OverrideOutcome =
  | {
      status: "applied";
      rule: OverrideRule;
      locale: string;
      before: string;
      after: string;
    }
  | { status: "not_found"; rule: OverrideRule }
  | { status: "not_applicable"; rule: OverrideRule; locale: string };

export interface OverrideResult {
  snapshot: RawSnapshot;
  report: OverrideOutcome[];
}

const overrideTableSchema = z.array(
  z.object({
    id: z.string().min(1),
    field: z.enum(OVERRIDABLE_FIELDS),
    search: z.string().min(1),
    replace: z.string()
  })
);

export async function loadOverrideRules(filePath: string): Promise<OverrideRule[]> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    throw new PipelineError({
      code: "OVERRIDES_INVALID",
      message: `Could not read override table '${filePath}': ${errorMessage(err)}`
    });
  }

  const result = overrideTableSchema.safeParse(parsed);
  if (!result.success) {
    throw new PipelineError({
      code: "OVERRIDES_INVALID",
      message: `Override table '${filePath}' is malformed`,
      details: result.error.issues
    });
  }
  return result.data;
}

function findEdition(
  snapshot: RawSnapshot,
  id: string
): { locale: string; edition: RawEdition } | null {
  for (const [locale, content] of Object.entries(snapshot)) {
    const edition = content.editions.find(e => e.id === id);
    if (edition) return { locale, edition };
  }
  return null;
}

/**
 * Lower-case search text is replaced case-sensitively; anything else is
 * replaced case-insensitively. Existing fixes depend on this split.
 */
function replaceText(value: string, search: string, replace: string): string {
  if (search === search.toLowerCase()) {
    return value.split(search).join(replace);
  }
  return value.replace(new RegExp(escapeRegExp(search), "gi"), () => replace);
}

/**
 * Applies the manual corrections in table order to a copy of the snapshot.
 * Rules that do not match are reported, never thrown.
 */
export function applyOverrides(
  snapshot: RawSnapshot,
  rules: readonly OverrideRule[]
): OverrideResult {
  const patched = structuredClone(snapshot);
  const report: OverrideOutcome[] = [];

  for (const rule of rules) {
    const match = findEdition(patched, rule.id);
    if (!match) {
      report.push({ status: "not_found", rule });
      continue;
    }

    const current = match.edition[rule.field];
    if (
      typeof current !== "string" ||
      !current.toLowerCase().includes(rule.search.toLowerCase())
    ) {
      report.push({ status: "not_applicable", rule, locale: match.locale });
      continue;
    }

    const updated = replaceText(current, rule.search, rule.replace);
    // lower-case search text can match case-insensitively yet replace nothing
    if (updated === current) {
      report.push({ status: "not_applicable", rule, locale: match.locale });
      continue;
    }
    match.edition[rule.field] = updated;
    report.push({
      status: "applied",
      rule,
      locale: match.locale,
      before: current,
      after: updated
    });
  }

  return { snapshot: patched, report };
}
