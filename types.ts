export interface RawEdition {
  id: string;
  name: string | null;
  flavor: string | null;
  standfirst: string | null;
  color: string | null;
  image_url: string | null;
  alt_text: string | null;
  product_url: string | null;
}

export interface RawLocale {
  flag: string;
  editions: RawEdition[];
  flag_url: string | null;
}

export type RawSnapshot = Record<string, RawLocale>;

// On-disk shape of a full fetch cycle.
export interface RawSnapshotDocument {
  raw_data_by_locale: RawSnapshot;
}

export type PreservedEdition = Pick<RawEdition, "color" | "image_url" | "alt_text" | "product_url">;
export type PreservedLocale = Pick<RawLocale, "flag_url">;

export type StrippedEdition = Pick<RawEdition, "id" | "name" | "flavor" | "standfirst">;

export interface StrippedLocale {
  flag: string;
  editions: StrippedEdition[];
}

export type StrippedPayload = Record<string, StrippedLocale>;

/**
 * Preserved data that never crosses the service boundary.
 * Built right before the normalization call and consumed right after it.
 */
export interface SideMaps {
  products: Map<string, PreservedEdition>;
  locales: Map<string, PreservedLocale>;
}

// Service output; only `editions[].id` is relied on structurally.
export type NormalizedEdition = { id?: string } & Record<string, unknown>;

export type NormalizedLocale = { editions: NormalizedEdition[] } & Record<string, unknown>;

export type NormalizedResult = Record<string, NormalizedLocale>;

export interface FinalEdition extends PreservedEdition {
  name: string | null;
  flavor: string | null;
  flavor_description: string | null;
  [extra: string]: unknown;
}

export interface FinalLocale {
  flag: string | null;
  flag_url: string | null;
  editions: FinalEdition[];
  [extra: string]: unknown;
}

export type FinalCatalog = Record<string, FinalLocale>;
