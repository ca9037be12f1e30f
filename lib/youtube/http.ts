import { ProxyAgent, fetch as undiciFetch } from "undici";

import type { TranscriptProxyConfig } from "@/lib/youtube/config";

export interface YouTubeHttpRequest {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface YouTubeHttpResponse {
  ok: boolean;
  status: number;
  url: string;
  text(): Promise<string>;
}

export type YouTubeFetch = (url: string, init: YouTubeHttpRequest) => Promise<YouTubeHttpResponse>;

interface ProxyAgentCache {
  key: string;
  agent: ProxyAgent;
}

let cachedProxyAgent: ProxyAgentCache | null = null;

function getProxyAgent(proxy: TranscriptProxyConfig): ProxyAgent {
  const key = `${proxy.url}|${proxy.username}|${proxy.password}`;
  if (cachedProxyAgent && cachedProxyAgent.key === key) {
    return cachedProxyAgent.agent;
  }

  const credentials = Buffer.from(`${proxy.username}:${proxy.password}`).toString("base64");
  const agent = new ProxyAgent({ uri: proxy.url, token: `Basic ${credentials}` });
  cachedProxyAgent = { key, agent };

  return agent;
}

export function createYouTubeFetch(proxy: TranscriptProxyConfig | null): YouTubeFetch {
  if (!proxy) {
    return (url, init) => fetch(url, { ...init, cache: "no-store", redirect: "follow" });
  }

  const dispatcher = getProxyAgent(proxy);
  return (url, init) => undiciFetch(url, { ...init, redirect: "follow", dispatcher });
}

export interface YouTubeTextResponse {
  ok: boolean;
  status: number;
  url: string;
  body: string;
}

// The abort deadline covers both the response headers and the body read.
export async function fetchWithTimeout(
  http: YouTubeFetch,
  url: string,
  init: YouTubeHttpRequest,
  timeoutMs: number,
): Promise<YouTubeTextResponse> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await http(url, { ...init, signal: controller.signal });
    const body = await response.text();
    return { ok: response.ok, status: response.status, url: response.url, body };
  } finally {
    clearTimeout(timeout);
  }
}
