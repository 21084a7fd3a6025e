// services/rehydrateService.ts
import type {
  FinalCatalog,
  FinalEdition,
  NormalizedEdition,
  NormalizedResult,
  SideMaps
} from "../types.js";
import { EMPTY_PRESERVED, SERVICE_TEXT_PUNCTUATION } from "./buildNormalizationInput.js";
import {
  EMPTY_VOCABULARY,
  capitalizeSecondToken,
  normalizeVocabulary,
  repairPunctuationSpacing,
  stripDisallowedCharacters,
  type Vocabulary
} from "./canonicalizeText.js";

// Names the model has been seen to use instead of the expected field.
export const FIELD_ALIASES: Record<"flavor_description" | "flavor", readonly string[]> = {
  flavor_description: ["description", "flavour_description", "standfirst"],
  flavor: ["flavour"]
};

export type RehydrationAnomaly =
  | { kind: "locale_preserved_missing"; locale: string }
  | { kind: "locale_missing_from_result"; locale: string }
  | { kind: "product_preserved_missing"; locale: string; id: string | null }
  | { kind: "product_duplicated"; locale: string; id: string }
  | { kind: "product_missing_from_result"; id: string }
  | { kind: "field_renamed"; locale: string; id: string | null; from: string; to: string };

export interface RehydrationResult {
  catalog: FinalCatalog;
  anomalies: RehydrationAnomaly[];
}

/**
 * Cleanup for model-authored text, always in this order:
 * strip, punctuation spacing (ending with the trailing period), vocabulary,
 * and for flavors the second hyphen token capitalized.
 */
export function canonicalizeServiceText(
  value: unknown,
  vocabulary: Vocabulary,
  options: { capitalizeSecond?: boolean } = {}
): string | null {
  if (typeof value !== "string") return null;

  let text = stripDisallowedCharacters(value, SERVICE_TEXT_PUNCTUATION);
  text = repairPunctuationSpacing(text);
  text = normalizeVocabulary(text, vocabulary);
  if (options.capitalizeSecond) {
    text = capitalizeSecondToken(text);
  }
  return text;
}

function reconcileAliases(
  fields: Record<string, unknown>,
  locale: string,
  id: string | null,
  anomalies: RehydrationAnomaly[]
): void {
  for (const [expected, aliases] of Object.entries(FIELD_ALIASES)) {
    if (fields[expected] !== undefined) continue;

    const alias = aliases.find(name => fields[name] !== undefined);
    if (alias === undefined) continue;

    fields[expected] = fields[alias];
    delete fields[alias];
    anomalies.push({ kind: "field_renamed", locale, id, from: alias, to: expected });
  }
}

/**
 * Merges the service output with the preserved side-maps.
 * Misses are collected as anomalies; every other entity is still merged.
 * Neither argument is modified.
 */
export function rehydrateCatalog(
  result: NormalizedResult,
  sideMaps: SideMaps,
  vocabulary: Vocabulary = EMPTY_VOCABULARY
): RehydrationResult {
  const catalog: FinalCatalog = {};
  const anomalies: RehydrationAnomaly[] = [];
  const consumed = new Set<string>();

  const rehydrateEdition = (locale: string, edition: NormalizedEdition): FinalEdition => {
    const { id, ...rest } = edition;
    const productId = typeof id === "string" && id ? id : null;
    const fields: Record<string, unknown> = { ...rest };

    reconcileAliases(fields, locale, productId, anomalies);

    const preserved = productId === null ? undefined : sideMaps.products.get(productId);
    if (productId !== null && preserved) {
      if (consumed.has(productId)) {
        anomalies.push({ kind: "product_duplicated", locale, id: productId });
      }
      consumed.add(productId);
    } else {
      anomalies.push({ kind: "product_preserved_missing", locale, id: productId });
    }

    return {
      ...fields,
      name: canonicalizeServiceText(fields.name, vocabulary),
      flavor: canonicalizeServiceText(fields.flavor, vocabulary, { capitalizeSecond: true }),
      flavor_description: canonicalizeServiceText(fields.flavor_description, vocabulary),
      ...(preserved ?? EMPTY_PRESERVED)
    };
  };

  for (const [locale, content] of Object.entries(result)) {
    const { editions, ...localeFields } = content;

    const preservedLocale = sideMaps.locales.get(locale);
    if (!preservedLocale) {
      anomalies.push({ kind: "locale_preserved_missing", locale });
    }

    catalog[locale] = {
      ...localeFields,
      flag: typeof localeFields.flag === "string" ? localeFields.flag : null,
      flag_url: preservedLocale?.flag_url ?? null,
      editions: editions.map(edition => rehydrateEdition(locale, edition))
    };
  }

  for (const locale of [...sideMaps.locales.keys()].sort()) {
    if (!Object.hasOwn(result, locale)) {
      anomalies.push({ kind: "locale_missing_from_result", locale });
    }
  }

  for (const id of [...sideMaps.products.keys()].sort()) {
    if (!consumed.has(id)) {
      anomalies.push({ kind: "product_missing_from_result", id });
    }
  }

  return { catalog, anomalies };
}
