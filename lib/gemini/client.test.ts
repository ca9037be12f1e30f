import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { AppError } from "@/lib/errors/app-error";

const generateContentMock = vi.fn();

vi.mock("@google/genai", () => {
  class GoogleGenAI {
    models = {
      generateContent: generateContentMock,
    };
  }

  return { GoogleGenAI };
});

import type { GeminiRuntimeConfig } from "./config";
import { generateWithGemini } from "./client";

const QUIZ_TEXT = "1. What does a stack return first?\n    A. The last pushed item\nAnswer: A";

function buildConfig(overrides: Partial<GeminiRuntimeConfig> = {}): GeminiRuntimeConfig {
  return {
    apiKey: "test-api-key",
    model: "gemini-2.0-flash",
    modelCandidates: ["gemini-2.0-flash"],
    apiVersion: "v1",
    timeoutMs: 1_000,
    maxRetries: 0,
    retryBaseDelayMs: 1,
    maxOutputTokens: 800,
    temperature: 0.2,
    topP: 0.9,
    ...overrides,
  };
}

beforeEach(() => {
  generateContentMock.mockReset();
  vi.spyOn(console, "info").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("generateWithGemini", () => {
  it("returns trimmed text and forwards generation settings", async () => {
    generateContentMock.mockResolvedValueOnce({ text: `\n  ${QUIZ_TEXT}  \n` });

    const result = await generateWithGemini("prompt", buildConfig(), { requestId: "test-request" });

    expect(result).toBe(QUIZ_TEXT);
    expect(generateContentMock).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "gemini-2.0-flash",
        contents: "prompt",
        config: expect.objectContaining({ maxOutputTokens: 800, temperature: 0.2, topP: 0.9 }),
      }),
    );
  });

  it("throws MISSING_GEMINI_KEY without calling the SDK when no key is configured", async () => {
    await expect(
      generateWithGemini("prompt", buildConfig({ apiKey: null })),
    ).rejects.toMatchObject({ code: "MISSING_GEMINI_KEY" });
    expect(generateContentMock).not.toHaveBeenCalled();
  });

  it("throws GEMINI_EMPTY_RESPONSE when the model returns blank text", async () => {
    generateContentMock.mockResolvedValueOnce({ text: "   " });

    await expect(generateWithGemini("prompt", buildConfig())).rejects.toMatchObject({
      code: "GEMINI_EMPTY_RESPONSE",
    });
  });

  it("makes a single attempt by default", async () => {
    generateContentMock.mockRejectedValueOnce(Object.assign(new Error("rate limit"), { status: 429 }));

    await expect(generateWithGemini("prompt", buildConfig())).rejects.toMatchObject({
      code: "GEMINI_REQUEST_FAILED",
    });
    expect(generateContentMock).toHaveBeenCalledTimes(1);
  });

  it("retries a rate-limited model when retries are configured", async () => {
    generateContentMock
      .mockRejectedValueOnce(Object.assign(new Error("rate limit"), { status: 429 }))
      .mockResolvedValueOnce({ text: QUIZ_TEXT });

    const result = await generateWithGemini("prompt", buildConfig({ maxRetries: 1 }));

    expect(result).toBe(QUIZ_TEXT);
    expect(generateContentMock).toHaveBeenCalledTimes(2);
  });

  it("fails over to next model candidate when first model is repeatedly rate-limited", async () => {
    generateContentMock
      .mockRejectedValueOnce(Object.assign(new Error("rate limit"), { status: 429 }))
      .mockRejectedValueOnce(Object.assign(new Error("rate limit"), { status: 429 }))
      .mockResolvedValueOnce({ text: QUIZ_TEXT });

    const result = await generateWithGemini(
      "prompt",
      buildConfig({ modelCandidates: ["gemini-2.0-flash", "gemini-1.5-flash"], maxRetries: 1 }),
      { requestId: "test-request" },
    );

    expect(result).toBe(QUIZ_TEXT);
    expect(generateContentMock.mock.calls.map((call) => call[0]?.model)).toEqual([
      "gemini-2.0-flash",
      "gemini-2.0-flash",
      "gemini-1.5-flash",
    ]);
  });

  it("does not switch model for non-retryable errors", async () => {
    generateContentMock.mockRejectedValueOnce(Object.assign(new Error("bad request"), { status: 400 }));

    await expect(
      generateWithGemini(
        "prompt",
        buildConfig({ modelCandidates: ["gemini-2.0-flash", "gemini-1.5-flash"] }),
      ),
    ).rejects.toBeInstanceOf(AppError);
    expect(generateContentMock.mock.calls.map((call) => call[0]?.model)).toEqual([
      "gemini-2.0-flash",
    ]);
  });

  it("switches candidate when current model is unavailable (404)", async () => {
    generateContentMock
      .mockRejectedValueOnce(
        Object.assign(new Error("Model gemini-1.5-flash not found for API version v1"), {
          status: 404,
        }),
      )
      .mockResolvedValueOnce({ text: QUIZ_TEXT });

    const result = await generateWithGemini(
      "prompt",
      buildConfig({ modelCandidates: ["gemini-1.5-flash", "gemini-2.0-flash"] }),
    );

    expect(result).toBe(QUIZ_TEXT);
    expect(generateContentMock.mock.calls.map((call) => call[0]?.model)).toEqual([
      "gemini-1.5-flash",
      "gemini-2.0-flash",
    ]);
  });

  it("throws GEMINI_CONFIG_INVALID when no usable model candidate remains", async () => {
    generateContentMock.mockRejectedValueOnce(
      Object.assign(new Error("Model gemini-1.5-flash not found for API version v1"), {
        status: 404,
      }),
    );

    await expect(
      generateWithGemini("prompt", buildConfig({ modelCandidates: ["gemini-1.5-flash"] })),
    ).rejects.toMatchObject({ code: "GEMINI_CONFIG_INVALID" });
    expect(generateContentMock).toHaveBeenCalledTimes(1);
  });

  it("maps abort errors to GEMINI_TIMEOUT", async () => {
    generateContentMock.mockRejectedValueOnce(
      Object.assign(new Error("This operation was aborted"), { name: "AbortError" }),
    );

    await expect(generateWithGemini("prompt", buildConfig())).rejects.toMatchObject({
      code: "GEMINI_TIMEOUT",
      statusCode: 504,
    });
  });
});
