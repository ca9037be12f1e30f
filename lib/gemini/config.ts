import {
  type EnvSource,
  parseIntegerConfig,
  parseListConfig,
  parseNumberConfig,
  readTrimmed,
} from "@/lib/config/env";

export interface GeminiRuntimeConfig {
  apiKey: string | null;
  model: string;
  modelCandidates: string[];
  apiVersion: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  maxOutputTokens: number;
  temperature: number;
  topP: number;
}

const CONFIG_ERROR_CODE = "GEMINI_CONFIG_INVALID";

const DEFAULTS = {
  model: "gemini-2.0-flash",
  apiVersion: "v1",
  timeoutMs: 45_000,
  maxRetries: 0,
  retryBaseDelayMs: 700,
  maxOutputTokens: 4096,
  temperature: 0.4,
  topP: 0.9,
};

export function getGeminiRuntimeConfig(env: EnvSource = process.env): GeminiRuntimeConfig {
  const apiKey = readTrimmed(env, "GEMINI_API_KEY") ?? readTrimmed(env, "GOOGLE_API_KEY") ?? null;
  const model = readTrimmed(env, "GEMINI_MODEL") ?? DEFAULTS.model;
  const modelCandidates = parseListConfig(env.GEMINI_MODEL_CANDIDATES, [model]);
  const apiVersion = readTrimmed(env, "GEMINI_API_VERSION") ?? DEFAULTS.apiVersion;
  const timeoutMs = parseIntegerConfig(
    "GEMINI_TIMEOUT_MS",
    env.GEMINI_TIMEOUT_MS,
    DEFAULTS.timeoutMs,
    CONFIG_ERROR_CODE,
  );
  const maxRetries = parseIntegerConfig(
    "GEMINI_MAX_RETRIES",
    env.GEMINI_MAX_RETRIES,
    DEFAULTS.maxRetries,
    CONFIG_ERROR_CODE,
    { min: 0, max: 10 },
  );
  const retryBaseDelayMs = parseIntegerConfig(
    "GEMINI_RETRY_BASE_DELAY_MS",
    env.GEMINI_RETRY_BASE_DELAY_MS,
    DEFAULTS.retryBaseDelayMs,
    CONFIG_ERROR_CODE,
  );
  const maxOutputTokens = parseIntegerConfig(
    "GEMINI_MAX_OUTPUT_TOKENS",
    env.GEMINI_MAX_OUTPUT_TOKENS,
    DEFAULTS.maxOutputTokens,
    CONFIG_ERROR_CODE,
  );
  const temperature = parseNumberConfig(
    "GEMINI_TEMPERATURE",
    env.GEMINI_TEMPERATURE,
    DEFAULTS.temperature,
    CONFIG_ERROR_CODE,
    0,
    2,
  );
  const topP = parseNumberConfig("GEMINI_TOP_P", env.GEMINI_TOP_P, DEFAULTS.topP, CONFIG_ERROR_CODE, 0, 1);

  return {
    apiKey,
    model,
    modelCandidates,
    apiVersion,
    timeoutMs,
    maxRetries,
    retryBaseDelayMs,
    maxOutputTokens,
    temperature,
    topP,
  };
}
