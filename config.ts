import "dotenv/config";
import fs from "fs/promises";
import { z } from "zod";
import type { Vocabulary } from "./services/canonicalizeText.js";
import { PipelineError, errorMessage } from "./services/errors.js";
import { PAYLOAD_PLACEHOLDER } from "./services/normalizeService.js";

const envSchema = z
  .object({
    GEMINI_API_KEY: z.string().min(1).optional(),
    GEMINI_MODEL: z.string().min(1).default("gemini-2.5-flash-lite"),

    OUTPUT_DIR: z.string().min(1).default("output"),
    PROMPT_FILE: z.string().min(1).default("prompts/normalize_prompt.txt"),
    OVERRIDES_FILE: z.string().min(1).default("data/overrides.json"),
    VOCABULARY_FILE: z.string().min(1).default("data/vocabulary.json"),

    NORMALIZE_TIMEOUT_MS: z.coerce.number().int().positive().default(300_000),
    NORMALIZE_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(60_000),
    NORMALIZE_MAX_RETRIES: z.coerce.number().int().nonnegative().default(2),

    FEED_LOCALES_URL: z
      .string()
      .default("https://www.redbull.com/v3/api/custom/header/v2?locale={locale}"),
    FEED_PRODUCT_URL: z
      .string()
      .default("https://www.redbull.com/v3/api/graphql/v1/?rb3ResourceId={product_id}&rb3Schema=v1:assetInfo"),
    FEED_FLAG_URL: z
      .string()
      .default("https://rbds-static.redbull.com/@cosmos/foundation/latest/flags/cosmos-flag-{flag_code}.svg"),
    FEED_DELAY_MIN_MS: z.coerce.number().int().nonnegative().default(1_000),
    FEED_DELAY_MAX_MS: z.coerce.number().int().nonnegative().default(3_000),
    FEED_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

    PORT: z.coerce.number().int().positive().default(3000)
  })
  .refine(env => env.FEED_DELAY_MIN_MS <= env.FEED_DELAY_MAX_MS, {
    message: "FEED_DELAY_MIN_MS must not exceed FEED_DELAY_MAX_MS",
    path: ["FEED_DELAY_MIN_MS"]
  });

export interface AppConfig {
  geminiApiKey?: string;
  geminiModel: string;
  outputDir: string;
  promptFile: string;
  overridesFile: string;
  vocabularyFile: string;
  normalize: {
    timeoutMs: number;
    retryDelayMs: number;
    maxRetries: number;
  };
  feed: {
    localesUrl: string;
    productUrl: string;
    flagUrl: string;
    delayMinMs: number;
    delayMaxMs: number;
    timeoutMs: number;
  };
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`);
    throw new PipelineError({
      code: "CONFIG_INVALID",
      message: `Invalid configuration: ${details.join("; ")}`,
      details
    });
  }

  const e = parsed.data;
  return {
    geminiApiKey: e.GEMINI_API_KEY,
    geminiModel: e.GEMINI_MODEL,
    outputDir: e.OUTPUT_DIR,
    promptFile: e.PROMPT_FILE,
    overridesFile: e.OVERRIDES_FILE,
    vocabularyFile: e.VOCABULARY_FILE,
    normalize: {
      timeoutMs: e.NORMALIZE_TIMEOUT_MS,
      retryDelayMs: e.NORMALIZE_RETRY_DELAY_MS,
      maxRetries: e.NORMALIZE_MAX_RETRIES
    },
    feed: {
      localesUrl: e.FEED_LOCALES_URL,
      productUrl: e.FEED_PRODUCT_URL,
      flagUrl: e.FEED_FLAG_URL,
      delayMinMs: e.FEED_DELAY_MIN_MS,
      delayMaxMs: e.FEED_DELAY_MAX_MS,
      timeoutMs: e.FEED_TIMEOUT_MS
    },
    port: e.PORT
  };
}

export function requireGeminiApiKey(config: AppConfig): string {
  if (!config.geminiApiKey) {
    throw new PipelineError({
      code: "CONFIG_INVALID",
      message: "GEMINI_API_KEY environment variable not set"
    });
  }
  return config.geminiApiKey;
}

export async function loadInstructions(filePath: string): Promise<string> {
  let template: string;
  try {
    template = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new PipelineError({
      code: "INSTRUCTIONS_MISSING",
      message: `Prompt file '${filePath}' could not be read: ${errorMessage(err)}`
    });
  }

  if (!template.includes(PAYLOAD_PLACEHOLDER)) {
    throw new PipelineError({
      code: "INSTRUCTIONS_MISSING",
      message: `Prompt file '${filePath}' has no ${PAYLOAD_PLACEHOLDER} placeholder`
    });
  }
  return template;
}

const vocabularySchema = z.object({
  diacriticVariants: z.array(z.object({ canonical: z.string().min(1), base: z.string().min(1) })).default([]),
  wordForms: z.array(z.object({ from: z.string().min(1), to: z.string() })).default([])
});

export async function loadVocabulary(filePath: string): Promise<Vocabulary> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    throw new PipelineError({
      code: "VOCABULARY_INVALID",
      message: `Could not read vocabulary '${filePath}': ${errorMessage(err)}`
    });
  }

  const parsed = vocabularySchema.safeParse(raw);
  if (!parsed.success) {
    throw new PipelineError({
      code: "VOCABULARY_INVALID",
      message: `Vocabulary '${filePath}' is malformed`,
      details: parsed.error.issues
    });
  }
  return parsed.data;
}
