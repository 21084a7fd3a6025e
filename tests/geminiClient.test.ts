import { ApiError } from "@google/genai";
import { describe, it, expect } from "vitest";
import { classifyGeminiError } from "../services/geminiClient.js";

describe("classifyGeminiError", () => {
  it("marks 503 as overloaded", () => {
    const err = classifyGeminiError(new ApiError({ message: "The model is overloaded", status: 503 }));
    expect(err.kind).toBe("overloaded");
  });

  it("marks an UNAVAILABLE status message as overloaded", () => {
    const err = classifyGeminiError(new ApiError({ message: '{"status":"UNAVAILABLE"}', status: 500 }));
    expect(err.kind).toBe("overloaded");
  });

  it("does not retry other API errors", () => {
    const err = classifyGeminiError(new ApiError({ message: "API key not valid", status: 400 }));
    expect(err.kind).toBe("service_error");
    expect(err.message).toBe("Gemini API error 400: API key not valid");
  });

  it("recognizes timeouts", () => {
    const aborted = new Error("This operation was aborted");
    aborted.name = "AbortError";
    expect(classifyGeminiError(aborted).kind).toBe("timeout");
    expect(classifyGeminiError(new Error("Request timed out")).kind).toBe("timeout");
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");
    const err = classifyGeminiError(cause);
    expect(err.kind).toBe("service_error");
    expect(err.cause).toBe(cause);
  });

  it("handles non-Error values", () => {
    expect(classifyGeminiError("boom").message).toBe("boom");
  });
});
