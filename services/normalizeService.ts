// services/normalizeService.ts
import { setTimeout as delay } from "timers/promises";
import { z } from "zod";
import type { NormalizedResult, StrippedPayload } from "../types.js";
import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";

export const PAYLOAD_PLACEHOLDER = "{raw_json_str}";

export const SYSTEM_INSTRUCTION =
  "You are an expert data normalization and translation AI. Your task is to process a raw JSON " +
  "object containing product edition data from various countries and transform it into a clean, " +
  "standardized, internationalized English-language and consolidated JSON format.";

const DEFAULT_MAX_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 60_000;
const DEFAULT_TIMEOUT_MS = 300_000;

export type ServiceFailureKind = "overloaded" | "service_error" | "timeout" | "malformed_output";

export type NormalizationFailureKind = ServiceFailureKind | "retries_exhausted";

/**
 * Raised by a NormalizationClient. Only `overloaded` is retried.
 */
export class NormalizationServiceError extends Error {
  public readonly kind: ServiceFailureKind;

  constructor(kind: ServiceFailureKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NormalizationServiceError";
    this.kind = kind;
  }
}

export interface NormalizationRequest {
  systemInstruction: string;
  prompt: string;
  timeoutMs: number;
}

export interface NormalizationClient {
  // One request, one response body. Throws NormalizationServiceError on failure.
  generate(request: NormalizationRequest): Promise<string>;
}

export interface NormalizeOptions {
  client: NormalizationClient;
  // Instruction template containing PAYLOAD_PLACEHOLDER
  instructions: string;
  maxRetries?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export interface NormalizationFailure {
  kind: NormalizationFailureKind;
  message: string;
  attempts: number;
  responseText?: string;
}

export type NormalizationOutcome =
  | { ok: true; result: NormalizedResult; attempts: number }
  | { ok: false; failure: NormalizationFailure };

const normalizedEditionSchema = z.object({ id: z.string().optional() }).catchall(z.unknown());

const normalizedResultSchema = z.record(
  z.string(),
  z.object({ editions: z.array(normalizedEditionSchema).default([]) }).catchall(z.unknown())
);

export function renderPrompt(template: string, payload: StrippedPayload): string {
  return template.split(PAYLOAD_PLACEHOLDER).join(JSON.stringify(payload, null, 2));
}

function unwrapJsonText(text: string): string {
  const cleaned = text.replace(/^\uFEFF/, "").trim();

  if (cleaned.startsWith("```")) {
    const lines = cleaned.split("\n");
    // Drop the opening ``` / ```json line and the closing fence
    return lines.slice(1, lines[lines.length - 1].trim() === "```" ? -1 : undefined).join("\n").trim();
  }
  return cleaned;
}

export function parseNormalizedResult(
  text: string
): { ok: true; result: NormalizedResult } | { ok: false; message: string } {
  const body = unwrapJsonText(text);
  if (!body) {
    return { ok: false, message: "Empty response text" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    return { ok: false, message: `Response is not valid JSON: ${errorMessage(err)}` };
  }

  const validated = normalizedResultSchema.safeParse(parsed);
  if (!validated.success) {
    const issue = validated.error.issues[0];
    return {
      ok: false,
      message: `Response does not match the catalog shape at '${issue.path.join(".")}': ${issue.message}`
    };
  }
  return { ok: true, result: validated.data };
}

/**
 * Sends the stripped payload to the normalization service.
 * Overload is retried with a fixed cooldown; any other failure is final.
 */
export async function normalizeCatalog(
  payload: StrippedPayload,
  options: NormalizeOptions
): Promise<NormalizationOutcome> {
  const {
    client,
    instructions,
    maxRetries = DEFAULT_MAX_RETRIES,
    retryDelayMs = DEFAULT_RETRY_DELAY_MS,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    sleep = (ms: number) => delay(ms),
    logger = createLogger("normalize")
  } = options;

  const prompt = renderPrompt(instructions, payload);
  const maxAttempts = maxRetries + 1;
  logger.debug("Rendered normalization prompt", { length: prompt.length });

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    logger.info(`Sending request to normalization service (attempt ${attempt}/${maxAttempts})`);

    let text: string;
    try {
      text = await client.generate({ systemInstruction: SYSTEM_INSTRUCTION, prompt, timeoutMs });
    } catch (err) {
      const kind: ServiceFailureKind =
        err instanceof NormalizationServiceError ? err.kind : "service_error";

      if (kind === "overloaded" && attempt < maxAttempts) {
        logger.warn(
          `Normalization service overloaded, retrying in ${retryDelayMs} ms (attempt ${attempt}/${maxAttempts})`
        );
        await sleep(retryDelayMs);
        continue;
      }

      const failure: NormalizationFailure = {
        kind: kind === "overloaded" ? "retries_exhausted" : kind,
        message:
          kind === "overloaded"
            ? `All ${maxAttempts} attempts failed: ${errorMessage(err)}`
            : errorMessage(err),
        attempts: attempt
      };
      logger.error(`Normalization failed (${failure.kind}): ${failure.message}`);
      return { ok: false, failure };
    }

    logger.info("Received response from normalization service, parsing JSON");
    const parsed = parseNormalizedResult(text);
    if (!parsed.ok) {
      logger.error(`Normalization response rejected: ${parsed.message}`);
      logger.debug("Normalization response text", text);
      return {
        ok: false,
        failure: { kind: "malformed_output", message: parsed.message, attempts: attempt, responseText: text }
      };
    }

    return { ok: true, result: parsed.result, attempts: attempt };
  }

  return {
    ok: false,
    failure: { kind: "retries_exhausted", message: "No attempts were made", attempts: 0 }
  };
}
