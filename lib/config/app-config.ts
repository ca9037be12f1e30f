import { type EnvSource, parseIntegerConfig } from "@/lib/config/env";
import { AppError } from "@/lib/errors/app-error";
import { type GeminiRuntimeConfig, getGeminiRuntimeConfig } from "@/lib/gemini/config";
import { DEFAULT_QUESTION_COUNT } from "@/lib/gemini/prompts";
import type { LogLevel } from "@/lib/logging/logger";
import { getTranscriptRuntimeConfig, type TranscriptRuntimeConfig } from "@/lib/youtube/config";

export const MIN_QUESTION_COUNT = 1;
export const MAX_QUESTION_COUNT = 50;

export interface QuizRuntimeConfig {
  questionCount: number;
}

export interface AppConfig {
  logLevel: LogLevel;
  gemini: GeminiRuntimeConfig;
  transcript: TranscriptRuntimeConfig;
  quiz: QuizRuntimeConfig;
}

let cachedConfig: AppConfig | null = null;

function parseLogLevel(rawValue: string | undefined): LogLevel {
  if (!rawValue || rawValue.trim() === "") {
    return "info";
  }

  const normalized = rawValue.trim().toLowerCase();
  if (normalized === "info" || normalized === "debug") {
    return normalized;
  }

  throw new AppError("LOG_LEVEL must be either info or debug.", "LOG_CONFIG_INVALID", 500);
}

export function loadAppConfig(env: EnvSource = process.env): AppConfig {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    gemini: getGeminiRuntimeConfig(env),
    transcript: getTranscriptRuntimeConfig(env),
    quiz: {
      questionCount: parseIntegerConfig(
        "QUIZ_QUESTION_COUNT",
        env.QUIZ_QUESTION_COUNT,
        DEFAULT_QUESTION_COUNT,
        "QUIZ_CONFIG_INVALID",
        { min: MIN_QUESTION_COUNT, max: MAX_QUESTION_COUNT },
      ),
    },
  };
}

/** Builds the process-wide configuration on first use and returns the same object afterwards. */
export function getAppConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadAppConfig();
  }
  return cachedConfig;
}

export function resetAppConfigForTests(): void {
  cachedConfig = null;
}
