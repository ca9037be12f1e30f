import { AppError } from "@/lib/errors/app-error";
import { type EnvSource, parseIntegerConfig, readTrimmed } from "@/lib/config/env";

export interface TranscriptProxyConfig {
  url: string;
  username: string;
  password: string;
}

export interface TranscriptRuntimeConfig {
  primaryLanguage: string;
  fallbackLanguage: string;
  timeoutMs: number;
  proxy: TranscriptProxyConfig | null;
}

const CONFIG_ERROR_CODE = "TRANSCRIPT_CONFIG_INVALID";

const DEFAULTS = {
  primaryLanguage: "en",
  fallbackLanguage: "hi",
  timeoutMs: 12_000,
  proxyUrl: "http://p.webshare.io:80",
};

function parseProxyConfig(env: EnvSource): TranscriptProxyConfig | null {
  const username = readTrimmed(env, "TRANSCRIPT_PROXY_USERNAME");
  const password = readTrimmed(env, "TRANSCRIPT_PROXY_PASSWORD");

  if (!username && !password) {
    return null;
  }

  if (!username || !password) {
    throw new AppError(
      "TRANSCRIPT_PROXY_USERNAME and TRANSCRIPT_PROXY_PASSWORD must be set together.",
      CONFIG_ERROR_CODE,
      500,
    );
  }

  const url = readTrimmed(env, "TRANSCRIPT_PROXY_URL") ?? DEFAULTS.proxyUrl;
  try {
    new URL(url);
  } catch {
    throw new AppError(`TRANSCRIPT_PROXY_URL is not a valid URL: ${url}`, CONFIG_ERROR_CODE, 500);
  }

  return { url, username, password };
}

export function getTranscriptRuntimeConfig(env: EnvSource = process.env): TranscriptRuntimeConfig {
  return {
    primaryLanguage:
      readTrimmed(env, "TRANSCRIPT_PRIMARY_LANGUAGE")?.toLowerCase() ?? DEFAULTS.primaryLanguage,
    fallbackLanguage:
      readTrimmed(env, "TRANSCRIPT_FALLBACK_LANGUAGE")?.toLowerCase() ?? DEFAULTS.fallbackLanguage,
    timeoutMs: parseIntegerConfig(
      "TRANSCRIPT_TIMEOUT_MS",
      env.TRANSCRIPT_TIMEOUT_MS,
      DEFAULTS.timeoutMs,
      CONFIG_ERROR_CODE,
    ),
    proxy: parseProxyConfig(env),
  };
}
