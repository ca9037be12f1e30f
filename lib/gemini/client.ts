import { randomUUID } from "node:crypto";

import { GoogleGenAI } from "@google/genai";

import { AppError } from "@/lib/errors/app-error";
import type { GeminiRuntimeConfig } from "@/lib/gemini/config";
import { createLogger, type LogLevel, summarizeErrorMessage } from "@/lib/logging/logger";

interface GenerateWithGeminiOptions {
  requestId?: string;
  logLevel?: LogLevel;
}

interface GeminiAttemptContext {
  requestId: string;
  model: string;
  modelIndex: number;
  candidateCount: number;
  apiVersion: string;
  attempt: number;
  maxRetries: number;
}

interface GeminiClientCache {
  apiKey: string;
  apiVersion: string;
  client: GoogleGenAI;
}

let cachedClient: GeminiClientCache | null = null;
const RETRYABLE_HTTP_STATUSES = new Set([429, 500, 502, 503, 504]);
const MAX_BACKOFF_MS = 12_000;

function getGeminiClient(apiKey: string, apiVersion: string): GoogleGenAI {
  if (
    cachedClient &&
    cachedClient.apiKey === apiKey &&
    cachedClient.apiVersion === apiVersion
  ) {
    return cachedClient.client;
  }

  const client = new GoogleGenAI({
    apiKey,
    apiVersion,
  });
  cachedClient = {
    apiKey,
    apiVersion,
    client,
  };

  return client;
}

function resolveStatus(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error) {
    const { status } = error;
    return typeof status === "number" ? status : undefined;
  }

  return undefined;
}

function resolveErrorName(error: unknown): string {
  if (error instanceof Error && error.name) {
    return error.name;
  }
  return "UnknownError";
}

function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (error.name === "AbortError") {
    return true;
  }

  return /timeout|timed out|deadline/i.test(error.message);
}

function isRetryableRequestError(error: unknown, status: number | undefined): boolean {
  if (typeof status === "number" && RETRYABLE_HTTP_STATUSES.has(status)) {
    return true;
  }

  if (!(error instanceof Error)) {
    return false;
  }

  return /rate limit|too many requests|resource exhausted|overloaded|temporar(?:y|ily) unavailable/i.test(
    error.message,
  );
}

function isModelSelectionError(error: unknown, status: number | undefined): boolean {
  if (status === 404) {
    return true;
  }

  if (status !== 400 || !(error instanceof Error)) {
    return false;
  }

  const lowered = error.message.toLowerCase();
  return (
    lowered.includes("not found for api version") ||
    lowered.includes("not supported for generatecontent") ||
    (lowered.includes("model") && lowered.includes("not found"))
  );
}

function backoffDelayMs(baseDelayMs: number, attempt: number): number {
  return Math.min(baseDelayMs * 2 ** attempt, MAX_BACKOFF_MS);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/**
 * Sends a single-turn prompt to Gemini and returns the trimmed response text.
 *
 * Model candidates are tried in order. Within one candidate, retryable failures
 * (429/5xx, timeouts) are retried up to `config.maxRetries` times with exponential
 * backoff; a candidate that is unavailable or still failing moves on to the next.
 * Every failure surfaces as an {@link AppError} with a `GEMINI_*` code.
 */
export async function generateWithGemini(
  prompt: string,
  config: GeminiRuntimeConfig,
  options: GenerateWithGeminiOptions = {},
): Promise<string> {
  const modelCandidates =
    config.modelCandidates.length > 0 ? config.modelCandidates : [config.model];
  const requestId = options.requestId ?? randomUUID();
  const logger = createLogger("gemini", options.logLevel);

  if (!config.apiKey) {
    throw new AppError(
      "GEMINI_API_KEY is not set. Check your .env.local file.",
      "MISSING_GEMINI_KEY",
      500,
    );
  }

  const ai = getGeminiClient(config.apiKey, config.apiVersion);

  for (let modelIndex = 0; modelIndex < modelCandidates.length; modelIndex += 1) {
    const model = modelCandidates[modelIndex];
    let attempt = 0;

    while (true) {
      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), config.timeoutMs);
      const startedAt = Date.now();
      const context: GeminiAttemptContext = {
        requestId,
        model,
        modelIndex: modelIndex + 1,
        candidateCount: modelCandidates.length,
        apiVersion: config.apiVersion,
        attempt: attempt + 1,
        maxRetries: config.maxRetries,
      };

      logger.debug("request started", { ...context });

      try {
        const response = await ai.models.generateContent({
          model,
          contents: prompt,
          config: {
            abortSignal: controller.signal,
            httpOptions: {
              timeout: config.timeoutMs,
            },
            maxOutputTokens: config.maxOutputTokens,
            temperature: config.temperature,
            topP: config.topP,
          },
        });

        const durationMs = Date.now() - startedAt;
        const text = response.text?.trim() ?? "";

        if (!text) {
          logger.error("empty response", {
            ...context,
            durationMs,
            errorCode: "GEMINI_EMPTY_RESPONSE",
          });
          throw new AppError("Gemini returned no text.", "GEMINI_EMPTY_RESPONSE", 502);
        }

        logger.info("request completed", {
          ...context,
          durationMs,
          responseChars: text.length,
        });

        return text;
      } catch (error) {
        const durationMs = Date.now() - startedAt;
        const status = resolveStatus(error);
        const timeoutError = isTimeoutError(error);
        const modelSelectionError = isModelSelectionError(error, status);
        const retryableError = timeoutError || isRetryableRequestError(error, status);
        const failure = {
          ...context,
          durationMs,
          status,
          errorName: resolveErrorName(error),
          errorMessageHead: summarizeErrorMessage(error),
        };

        if (attempt < config.maxRetries && retryableError) {
          const retryDelayMs = backoffDelayMs(config.retryBaseDelayMs, attempt);
          logger.info("request retry scheduled", {
            ...failure,
            retryDelayMs,
            errorCode: timeoutError ? "GEMINI_TIMEOUT" : "GEMINI_REQUEST_FAILED",
          });
          attempt += 1;
          await sleep(retryDelayMs);
          continue;
        }

        const hasNextCandidate = modelIndex < modelCandidates.length - 1;
        if (modelSelectionError && hasNextCandidate) {
          logger.info("switching model candidate (unavailable)", {
            ...failure,
            errorCode: "GEMINI_CONFIG_INVALID",
          });
          break;
        }

        if (modelSelectionError) {
          logger.error("model unavailable", { ...failure, errorCode: "GEMINI_CONFIG_INVALID" });
          throw new AppError(
            `Requested Gemini model is unavailable: ${model}. Check GEMINI_MODEL/GEMINI_MODEL_CANDIDATES.`,
            "GEMINI_CONFIG_INVALID",
            500,
          );
        }

        if (retryableError && hasNextCandidate) {
          logger.info("switching model candidate", {
            ...failure,
            errorCode: timeoutError ? "GEMINI_TIMEOUT" : "GEMINI_REQUEST_FAILED",
          });
          break;
        }

        if (error instanceof AppError) {
          throw error;
        }

        if (timeoutError) {
          logger.error("request timeout", { ...failure, errorCode: "GEMINI_TIMEOUT" });
          throw new AppError("Gemini request timed out.", "GEMINI_TIMEOUT", 504);
        }

        if (error instanceof Error) {
          logger.error("request failed", { ...failure, errorCode: "GEMINI_REQUEST_FAILED" });
          throw new AppError(
            `Gemini SDK call failed${status ? ` (${status})` : ""}: ${error.message.slice(0, 240)}`,
            "GEMINI_REQUEST_FAILED",
            502,
          );
        }

        logger.error("unknown error", { ...failure, errorCode: "GEMINI_UNKNOWN_ERROR" });
        throw new AppError("Unknown error while calling Gemini.", "GEMINI_UNKNOWN_ERROR", 500);
      } finally {
        clearTimeout(timeout);
      }
    }
  }

  throw new AppError(
    "No Gemini model candidate produced a response.",
    "GEMINI_REQUEST_FAILED",
    502,
  );
}
