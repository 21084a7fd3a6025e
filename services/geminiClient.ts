// services/geminiClient.ts
import { ApiError, GoogleGenAI } from "@google/genai";
import {
  NormalizationServiceError,
  type NormalizationClient,
  type NormalizationRequest
} from "./normalizeService.js";

// Fixed so repeated runs on identical input decode identically.
const GENERATION_SEED = 42;

export function classifyGeminiError(err: unknown): NormalizationServiceError {
  const message = err instanceof Error ? err.message : String(err);

  if (err instanceof ApiError) {
    if (err.status === 503 || message.includes("UNAVAILABLE")) {
      return new NormalizationServiceError("overloaded", `Gemini overloaded (${err.status}): ${message}`, { cause: err });
    }
    return new NormalizationServiceError("service_error", `Gemini API error ${err.status}: ${message}`, { cause: err });
  }

  if (err instanceof Error && (err.name === "AbortError" || /timed?\s?out/i.test(message))) {
    return new NormalizationServiceError("timeout", `Gemini request timed out: ${message}`, { cause: err });
  }

  return new NormalizationServiceError("service_error", message, { cause: err });
}

export function createGeminiClient(options: { apiKey: string; model: string }): NormalizationClient {
  const client = new GoogleGenAI({ apiKey: options.apiKey });

  return {
    async generate({ systemInstruction, prompt, timeoutMs }: NormalizationRequest): Promise<string> {
      let text: string | undefined;
      try {
        const response = await client.models.generateContent({
          model: options.model,
          contents: prompt,
          config: {
            systemInstruction,
            responseMimeType: "application/json",
            temperature: 0,
            seed: GENERATION_SEED,
            httpOptions: { timeout: timeoutMs }
          }
        });
        text = response.text;
      } catch (err) {
        throw classifyGeminiError(err);
      }

      if (!text || !text.trim()) {
        throw new NormalizationServiceError("malformed_output", "Gemini returned no text");
      }
      return text;
    }
  };
}
