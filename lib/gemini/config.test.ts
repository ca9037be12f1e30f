import { describe, expect, it } from "vitest";

import { getGeminiRuntimeConfig } from "./config";

describe("getGeminiRuntimeConfig", () => {
  it("uses a single attempt against the default model when nothing is configured", () => {
    const config = getGeminiRuntimeConfig({});

    expect(config.apiKey).toBeNull();
    expect(config.model).toBe("gemini-2.0-flash");
    expect(config.modelCandidates).toEqual(["gemini-2.0-flash"]);
    expect(config.maxRetries).toBe(0);
  });

  it("falls back to GOOGLE_API_KEY when GEMINI_API_KEY is missing", () => {
    expect(getGeminiRuntimeConfig({ GOOGLE_API_KEY: "test-google-key" }).apiKey).toBe(
      "test-google-key",
    );
    expect(
      getGeminiRuntimeConfig({ GEMINI_API_KEY: "test-gemini-key", GOOGLE_API_KEY: "test-google-key" })
        .apiKey,
    ).toBe("test-gemini-key");
  });

  it("parses and deduplicates model candidates", () => {
    const config = getGeminiRuntimeConfig({
      GEMINI_MODEL: "gemini-2.0-flash",
      GEMINI_MODEL_CANDIDATES: " gemini-2.0-flash, gemini-1.5-flash , gemini-2.0-flash ,,",
    });

    expect(config.modelCandidates).toEqual(["gemini-2.0-flash", "gemini-1.5-flash"]);
  });

  it("uses the configured model when candidates are empty entries only", () => {
    const config = getGeminiRuntimeConfig({
      GEMINI_MODEL: "gemini-1.5-pro",
      GEMINI_MODEL_CANDIDATES: " , , ",
    });

    expect(config.modelCandidates).toEqual(["gemini-1.5-pro"]);
  });

  it("rejects an out-of-range temperature", () => {
    expect(() => getGeminiRuntimeConfig({ GEMINI_TEMPERATURE: "3" })).toThrowError(
      "GEMINI_TEMPERATURE must be a number between 0 and 2.",
    );
  });
});
