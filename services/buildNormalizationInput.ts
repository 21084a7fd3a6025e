// services/buildNormalizationInput.ts
import type {
  PreservedEdition,
  RawEdition,
  RawSnapshot,
  SideMaps,
  StrippedEdition,
  StrippedPayload
} from "../types.js";
import { stripDisallowedCharacters } from "./canonicalizeText.js";

// Punctuation that survives the pre-call strip; everything else non-alphanumeric goes.
export const SERVICE_TEXT_PUNCTUATION = "-'&.,!?:%()";

export type ExtractionAnomaly =
  | { kind: "edition_without_id"; locale: string; index: number }
  | { kind: "duplicate_product_id"; locale: string; id: string; firstLocale: string };

export interface NormalizationInput {
  payload: StrippedPayload;
  sideMaps: SideMaps;
  anomalies: ExtractionAnomaly[];
}

export const EMPTY_PRESERVED: PreservedEdition = {
  color: null,
  image_url: null,
  alt_text: null,
  product_url: null
};

function stripText(value: string | null): string | null {
  return value === null ? null : stripDisallowedCharacters(value, SERVICE_TEXT_PUNCTUATION);
}

export function preservedFields(edition: RawEdition): PreservedEdition {
  return {
    color: edition.color,
    image_url: edition.image_url,
    alt_text: edition.alt_text,
    product_url: edition.product_url
  };
}

/**
 * Adapter between the raw snapshot and the normalization service.
 * Strips everything the model does not need (colors, images, URLs) into
 * side-maps keyed by product id and locale name. The input is not modified.
 */
export function buildNormalizationInput(snapshot: RawSnapshot): NormalizationInput {
  const payload: StrippedPayload = {};
  const sideMaps: SideMaps = { products: new Map(), locales: new Map() };
  const anomalies: ExtractionAnomaly[] = [];
  const firstSeenIn = new Map<string, string>();

  for (const [locale, content] of Object.entries(snapshot)) {
    sideMaps.locales.set(locale, { flag_url: content.flag_url });

    const editions: StrippedEdition[] = content.editions.map((edition, index) => {
      if (!edition.id) {
        anomalies.push({ kind: "edition_without_id", locale, index });
      } else {
        const firstLocale = firstSeenIn.get(edition.id);
        if (firstLocale !== undefined) {
          anomalies.push({ kind: "duplicate_product_id", locale, id: edition.id, firstLocale });
        } else {
          firstSeenIn.set(edition.id, locale);
          sideMaps.products.set(edition.id, preservedFields(edition));
        }
      }

      return {
        id: edition.id,
        name: stripText(edition.name),
        flavor: stripText(edition.flavor),
        standfirst: stripText(edition.standfirst)
      };
    });

    payload[locale] = { flag: content.flag, editions };
  }

  return { payload, sideMaps, anomalies };
}

/**
 * Inverse of buildNormalizationInput on the stripped payload itself.
 * For text that is already canonical this reproduces the input snapshot.
 */
export function restoreNormalizationInput(payload: StrippedPayload, sideMaps: SideMaps): RawSnapshot {
  const snapshot: RawSnapshot = {};

  for (const [locale, content] of Object.entries(payload)) {
    snapshot[locale] = {
      flag: content.flag,
      editions: content.editions.map(edition => ({
        ...edition,
        ...(sideMaps.products.get(edition.id) ?? EMPTY_PRESERVED)
      })),
      flag_url: sideMaps.locales.get(locale)?.flag_url ?? null
    };
  }

  return snapshot;
}
