// services/feedService.ts
import { setTimeout as delay } from "timers/promises";
import fetch from "node-fetch";
import { z } from "zod";
import type { RawEdition, RawLocale, RawSnapshot } from "../types.js";
import { collapseDuplicateWords, titlecaseAllCapsWords } from "./canonicalizeText.js";
import { PipelineError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

const USER_AGENT = "Mozilla/5.0 (compatible; EditionsCatalogBot/1.0)";
const PRODUCT_ID_PREFIX = "rrn:content:energy-drinks:";
const IMAGE_TRANSFORM = "e_trim:1:transparent/c_limit,w_800,h_800/bo_5px_solid_rgb:00000000";
const INDEX_LOCALE = "int-en";
const WORLDWIDE_FLAG = "Worldwide";

/* -----------------------------
   Types
----------------------------- */

export interface SourceFeed {
  fetchAll(): Promise<RawSnapshot>;
}

export type FetchJson = (url: string) => Promise<unknown>;

export interface FeedOptions {
  // Templates: {locale}, {product_id}, {flag_code}
  localesUrl: string;
  productUrl: string;
  flagUrl: string;
  delayMinMs: number;
  delayMaxMs: number;
  timeoutMs: number;
  fetchJson?: FetchJson;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

const localeListSchema = z.object({
  selectableLocales: z.array(
    z.object({
      domain: z.string(),
      countryName: z.string(),
      flagCode: z.string().nullish()
    })
  )
});

const localeListingSchema = z.object({
  featuredEnergyDrinks: z
    .array(z.object({ reference: z.object({ id: z.string().nullish() }).nullish() }))
    .nullish()
});

const productDetailSchema = z.object({
  data: z
    .object({
      id: z.string().nullish(),
      title: z.string().nullish(),
      flavour: z.string().nullish(),
      standfirst: z.string().nullish(),
      brandingHexColorCode: z.string().nullish(),
      image: z
        .object({
          imageEssence: z.object({ imageURL: z.string().nullish() }).nullish(),
          altText: z.string().nullish()
        })
        .nullish(),
      reference: z.object({ externalUrl: z.string().nullish() }).nullish()
    })
    .nullish()
});

export type LocaleInfo = z.infer<typeof localeListSchema>["selectableLocales"][number];
export type ProductDetail = NonNullable<z.infer<typeof productDetailSchema>["data"]>;

/* -----------------------------
   Mapping
----------------------------- */

function fillTemplate(template: string, values: Record<string, string>): string {
  return Object.entries(values).reduce(
    (url, [key, value]) => url.split(`{${key}}`).join(value),
    template
  );
}

function editionName(title: string | null | undefined): string | null {
  if (!title) return null;
  const cleaned = titlecaseAllCapsWords(collapseDuplicateWords(title));
  if (!cleaned) return null;
  return cleaned.includes("Edition") && !/^the\s/i.test(cleaned) ? `The ${cleaned}` : cleaned;
}

export function mapProductDetail(data: ProductDetail): RawEdition | null {
  const id = (data.id ?? "").replace(PRODUCT_ID_PREFIX, "");
  if (!id) return null;

  const imageTemplate = data.image?.imageEssence?.imageURL;
  const flavour = data.flavour ? collapseDuplicateWords(data.flavour) : "";

  return {
    id,
    name: editionName(data.title),
    flavor: flavour || null,
    standfirst: data.standfirst ? data.standfirst.replace(/^[ "]+|[ "]+$/g, "") : null,
    color: data.brandingHexColorCode ?? null,
    image_url: imageTemplate ? imageTemplate.split("{op}").join(IMAGE_TRANSFORM) : null,
    alt_text: data.image?.altText ?? null,
    product_url: data.reference?.externalUrl?.replace(/^http:\/\//, "https://") ?? null
  };
}

export function resolveFlag(flagCode: string | null | undefined): string {
  if (!flagCode || flagCode.includes("INT")) return WORLDWIDE_FLAG;
  return flagCode;
}

/* -----------------------------
   HTTP
----------------------------- */

async function fetchJsonWithTimeout(url: string, timeoutMs: number): Promise<unknown> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      signal: controller.signal,
      headers: {
        "User-Agent": USER_AGENT,
        Accept: "application/json"
      }
    });
    if (!res.ok) {
      throw new Error(`HTTP ${res.status} for ${url}`);
    }
    return await res.json();
  } finally {
    clearTimeout(timeout);
  }
}

/* -----------------------------
   Public API
----------------------------- */

export function createSourceFeed(options: FeedOptions): SourceFeed {
  const {
    localesUrl,
    productUrl,
    flagUrl,
    delayMinMs,
    delayMaxMs,
    timeoutMs,
    fetchJson = (url: string) => fetchJsonWithTimeout(url, timeoutMs),
    sleep = (ms: number) => delay(ms),
    random = Math.random,
    logger = createLogger("feed")
  } = options;

  const politeDelay = () => sleep(delayMinMs + Math.floor(random() * (delayMaxMs - delayMinMs + 1)));

  async function fetchProduct(productId: string): Promise<RawEdition | null> {
    await politeDelay();
    try {
      const body = productDetailSchema.parse(await fetchJson(fillTemplate(productUrl, { product_id: productId })));
      return body.data ? mapProductDetail(body.data) : null;
    } catch (err) {
      logger.error(`Error fetching or parsing product data for ${productId}: ${errorMessage(err)}`);
      return null;
    }
  }

  async function fetchLocale(info: LocaleInfo): Promise<RawLocale | null> {
    const flag = resolveFlag(info.flagCode);
    logger.info(`Fetching data for: ${info.countryName} (${info.domain})`);

    let productIds: string[];
    try {
      const listing = localeListingSchema.parse(await fetchJson(fillTemplate(localesUrl, { locale: info.domain })));
      productIds = (listing.featuredEnergyDrinks ?? [])
        .map(entry => entry.reference?.id)
        .filter((id): id is string => typeof id === "string" && id.length > 0);
    } catch (err) {
      logger.error(`Could not process locale ${info.domain}: ${errorMessage(err)}`);
      return null;
    }

    if (productIds.length === 0) {
      logger.warn(`No editions found for ${info.countryName}. Skipping.`);
      return null;
    }

    const editions: RawEdition[] = [];
    for (const productId of productIds) {
      const edition = await fetchProduct(productId);
      if (edition) editions.push(edition);
    }

    if (editions.length === 0) return null;
    return { flag, editions, flag_url: fillTemplate(flagUrl, { flag_code: flag }) };
  }

  return {
    async fetchAll(): Promise<RawSnapshot> {
      logger.info("Fetching list of all available locales...");

      let locales: LocaleInfo[];
      try {
        const index = localeListSchema.parse(await fetchJson(fillTemplate(localesUrl, { locale: INDEX_LOCALE })));
        locales = index.selectableLocales;
      } catch (err) {
        throw new PipelineError({
          code: "FEED_UNAVAILABLE",
          message: `Could not fetch the locale list: ${errorMessage(err)}`
        });
      }

      const snapshot: RawSnapshot = {};
      for (const info of locales) {
        const locale = await fetchLocale(info);
        if (locale) snapshot[info.countryName] = locale;
      }

      logger.info(`Finished fetching raw data for ${Object.keys(snapshot).length} locales.`);
      return snapshot;
    }
  };
}
