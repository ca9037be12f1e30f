import type { AppConfig } from "@/lib/config/app-config";
import { AppError } from "@/lib/errors/app-error";
import { createLogger, type Logger, summarizeErrorMessage } from "@/lib/logging/logger";
import type { TranscriptRuntimeConfig } from "@/lib/youtube/config";
import {
  createYouTubeFetch,
  fetchWithTimeout,
  type YouTubeFetch,
  type YouTubeHttpRequest,
  type YouTubeTextResponse,
} from "@/lib/youtube/http";

export interface CaptionTrack {
  baseUrl?: string;
  kind?: string;
  languageCode?: string;
}

interface PlayerResponse {
  playabilityStatus?: {
    status?: string;
    reason?: string;
  };
  captions?: {
    playerCaptionsTracklistRenderer?: {
      captionTracks?: CaptionTrack[];
    };
  };
}

export interface TranscriptFragment {
  text: string;
  start: number;
  duration: number;
}

export interface TranscriptContext {
  http: YouTubeFetch;
  timeoutMs: number;
  logger: Logger;
}

const INNERTUBE_PLAYER_URL = "https://www.youtube.com/youtubei/v1/player";
const INNERTUBE_CLIENT_NAME = "ANDROID";
const INNERTUBE_CLIENT_VERSION = "20.10.38";
const USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

const BROWSER_HEADERS = {
  "accept-language": "en-US,en;q=0.9",
  "user-agent": USER_AGENT,
};

const PLAYER_RESPONSE_MARKERS = [
  "var ytInitialPlayerResponse = ",
  "ytInitialPlayerResponse = ",
  'window["ytInitialPlayerResponse"] = ',
];
const BLOCKED_BODY_MARKERS = [
  "consent.youtube.com",
  "before you continue to youtube",
  "sign in to confirm you",
  "unusual traffic",
  "www.google.com/sorry",
  "captcha",
];
const FORMATTING_TAG_REGEX = /<\/?(?:b|i|u|em|strong|small|mark|del|ins|sub|sup|font|c)(?:\s[^>]*)?>/gi;

function extractJsonBlock(source: string, fromIndex: number): string | null {
  const start = source.indexOf("{", fromIndex);
  if (start < 0) {
    return null;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let index = start; index < source.length; index += 1) {
    const char = source[index];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) {
        return source.slice(start, index + 1);
      }
    }
  }

  return null;
}

function extractPlayerResponse(html: string): PlayerResponse | null {
  for (const marker of PLAYER_RESPONSE_MARKERS) {
    const markerIndex = html.indexOf(marker);
    if (markerIndex < 0) {
      continue;
    }

    const block = extractJsonBlock(html, markerIndex + marker.length);
    if (!block) {
      continue;
    }

    try {
      return JSON.parse(block) as PlayerResponse;
    } catch {
      continue;
    }
  }

  return null;
}

function isBlockedWatchHtml(body: string, responseUrl: string): boolean {
  if (responseUrl.includes("consent.youtube.com") || responseUrl.includes("google.com/sorry")) {
    return true;
  }

  const lowered = body.toLowerCase();
  return BLOCKED_BODY_MARKERS.some((marker) => lowered.includes(marker));
}

async function fetchPlayerResponseViaInnertube(
  videoId: string,
  context: TranscriptContext,
): Promise<PlayerResponse | null> {
  const request: YouTubeHttpRequest = {
    method: "POST",
    headers: {
      ...BROWSER_HEADERS,
      "content-type": "application/json",
      accept: "*/*",
      origin: "https://www.youtube.com",
      referer: "https://www.youtube.com/",
    },
    body: JSON.stringify({
      videoId,
      context: {
        client: {
          clientName: INNERTUBE_CLIENT_NAME,
          clientVersion: INNERTUBE_CLIENT_VERSION,
          hl: "en",
        },
      },
    }),
  };

  try {
    const response = await fetchWithTimeout(
      context.http,
      INNERTUBE_PLAYER_URL,
      request,
      context.timeoutMs,
    );
    if (!response.ok) {
      context.logger.info("innertube player not ok", { videoId, status: response.status });
      return null;
    }

    const data = JSON.parse(response.body) as PlayerResponse;
    if (!data.playabilityStatus && !data.captions) {
      return null;
    }
    return data;
  } catch (error) {
    context.logger.info("innertube player failed", {
      videoId,
      message: summarizeErrorMessage(error),
    });
    return null;
  }
}

async function fetchPlayerResponseViaWatchPage(
  videoId: string,
  context: TranscriptContext,
): Promise<PlayerResponse> {
  const watchUrl = `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}&hl=en`;

  let response: YouTubeTextResponse;
  try {
    response = await fetchWithTimeout(
      context.http,
      watchUrl,
      {
        headers: {
          ...BROWSER_HEADERS,
          accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
          cookie: "CONSENT=YES+cb; SOCS=CAI",
        },
      },
      context.timeoutMs,
    );
  } catch (error) {
    throw new AppError(
      `YouTube watch page request failed: ${summarizeErrorMessage(error)}`,
      "YOUTUBE_METADATA_FETCH_FAILED",
      502,
    );
  }

  if (!response.ok) {
    throw new AppError(
      `YouTube watch page responded with ${response.status}`,
      response.status === 429 ? "YOUTUBE_TRANSCRIPT_BLOCKED" : "YOUTUBE_METADATA_FETCH_FAILED",
      502,
    );
  }

  const html = response.body;
  const playerResponse = extractPlayerResponse(html);
  if (playerResponse) {
    return playerResponse;
  }

  if (isBlockedWatchHtml(html, response.url)) {
    throw new AppError(
      "YouTube blocked the server request for video metadata.",
      "YOUTUBE_TRANSCRIPT_BLOCKED",
      502,
    );
  }

  throw new AppError("Could not parse YouTube video metadata.", "YOUTUBE_METADATA_FETCH_FAILED", 502);
}

/**
 * Lists the caption tracks published for a video. Innertube is tried first;
 * the player response embedded in the watch page is the fallback.
 */
export async function listCaptionTracks(
  videoId: string,
  context: TranscriptContext,
): Promise<CaptionTrack[]> {
  const playerResponse =
    (await fetchPlayerResponseViaInnertube(videoId, context)) ??
    (await fetchPlayerResponseViaWatchPage(videoId, context));

  const captionTracks = (
    playerResponse.captions?.playerCaptionsTracklistRenderer?.captionTracks ?? []
  ).filter((track) => typeof track.baseUrl === "string" && track.baseUrl.length > 0);

  if (captionTracks.length > 0) {
    return captionTracks;
  }

  const playability = playerResponse.playabilityStatus;
  if (playability?.status && playability.status !== "OK") {
    throw new AppError(
      `Video ${videoId} is unavailable: ${playability.reason ?? playability.status}`,
      "YOUTUBE_VIDEO_UNAVAILABLE",
      422,
    );
  }

  throw new AppError(`Transcripts are disabled for video ${videoId}.`, "YOUTUBE_TRANSCRIPTS_DISABLED", 422);
}

/**
 * Picks the track for one language code. A manually created track wins over an
 * auto-generated (`asr`) one.
 */
export function findTranscriptTrack(tracks: CaptionTrack[], languageCode: string): CaptionTrack {
  const wanted = languageCode.toLowerCase();
  const matching = tracks.filter((track) => track.languageCode?.toLowerCase() === wanted);
  const selected = matching.find((track) => track.kind !== "asr") ?? matching[0];

  if (!selected) {
    const available = tracks.map((track) => track.languageCode ?? "?").join(", ");
    throw new AppError(
      `No transcript found for language "${languageCode}" (available: ${available || "none"}).`,
      "YOUTUBE_TRANSCRIPT_LANGUAGE_NOT_FOUND",
      422,
    );
  }

  return selected;
}

// Only a missing primary language triggers the fallback; other errors propagate.
export function selectTranscriptTrack(
  tracks: CaptionTrack[],
  config: Pick<TranscriptRuntimeConfig, "primaryLanguage" | "fallbackLanguage">,
): CaptionTrack {
  try {
    return findTranscriptTrack(tracks, config.primaryLanguage);
  } catch (error) {
    if (error instanceof AppError && error.code === "YOUTUBE_TRANSCRIPT_LANGUAGE_NOT_FOUND") {
      return findTranscriptTrack(tracks, config.fallbackLanguage);
    }
    throw error;
  }
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: "&",
  lt: "<",
  gt: ">",
  quot: '"',
  apos: "'",
  nbsp: "\u00a0",
};

function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body.startsWith("#")) {
      const codePoint =
        body[1] === "x" || body[1] === "X"
          ? Number.parseInt(body.slice(2), 16)
          : Number.parseInt(body.slice(1), 10);
      return Number.isFinite(codePoint) && codePoint <= 0x10ffff
        ? String.fromCodePoint(codePoint)
        : entity;
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function readNumberAttribute(attributes: string, name: string): number {
  const match = new RegExp(`\\b${name}="([^"]*)"`).exec(attributes);
  const parsed = match ? Number(match[1]) : NaN;
  return Number.isFinite(parsed) ? parsed : 0;
}

/**
 * Parses a timed-text XML document into caption fragments in document order.
 * Formatting tags are removed, and cues left without visible text are skipped.
 */
export function parseTranscriptXml(raw: string): TranscriptFragment[] {
  const fragments: TranscriptFragment[] = [];
  const regex = /<text\b([^>]*)>([\s\S]*?)<\/text>/gi;
  let match: RegExpExecArray | null = regex.exec(raw);

  while (match) {
    const attributes = match[1] ?? "";
    // Cue text arrives XML-escaped around HTML-escaped content.
    const text = decodeEntities(decodeEntities(match[2] ?? "").replace(FORMATTING_TAG_REGEX, ""));
    if (text.trim()) {
      fragments.push({
        text,
        start: readNumberAttribute(attributes, "start"),
        duration: readNumberAttribute(attributes, "dur"),
      });
    }
    match = regex.exec(raw);
  }

  return fragments;
}

export function joinTranscriptFragments(fragments: TranscriptFragment[]): string {
  return fragments.map((fragment) => fragment.text).join(" ");
}

export async function fetchTranscriptFragments(
  track: CaptionTrack,
  context: TranscriptContext,
): Promise<TranscriptFragment[]> {
  if (!track.baseUrl) {
    throw new AppError("Caption track has no URL.", "YOUTUBE_TRANSCRIPT_FETCH_FAILED", 502);
  }

  const transcriptUrl = track.baseUrl.replace("&fmt=srv3", "");
  let response: YouTubeTextResponse;
  try {
    response = await fetchWithTimeout(
      context.http,
      transcriptUrl,
      { headers: { ...BROWSER_HEADERS, accept: "application/xml,text/xml;q=0.9,*/*;q=0.8" } },
      context.timeoutMs,
    );
  } catch (error) {
    throw new AppError(
      `YouTube transcript request failed: ${summarizeErrorMessage(error)}`,
      "YOUTUBE_TRANSCRIPT_FETCH_FAILED",
      502,
    );
  }

  if (!response.ok) {
    throw new AppError(
      `YouTube transcript responded with ${response.status}`,
      response.status === 429 ? "YOUTUBE_TRANSCRIPT_BLOCKED" : "YOUTUBE_TRANSCRIPT_FETCH_FAILED",
      502,
    );
  }

  return parseTranscriptXml(response.body);
}

/**
 * Returns the transcript of a video as one space-joined string, preferring the
 * configured primary language and falling back to the secondary one. Every
 * failure is logged and reported as an empty string.
 */
export async function fetchTranscriptText(
  videoId: string,
  config: Pick<AppConfig, "transcript" | "logLevel">,
  options: { requestId?: string; http?: YouTubeFetch } = {},
): Promise<string> {
  const logger = createLogger("youtube-transcript", config.logLevel);
  const context: TranscriptContext = {
    http: options.http ?? createYouTubeFetch(config.transcript.proxy),
    timeoutMs: config.transcript.timeoutMs,
    logger,
  };
  const startedAt = Date.now();

  try {
    const tracks = await listCaptionTracks(videoId, context);
    const track = selectTranscriptTrack(tracks, config.transcript);
    const fragments = await fetchTranscriptFragments(track, context);
    const transcript = joinTranscriptFragments(fragments);

    if (!transcript) {
      logger.info("transcript empty", {
        requestId: options.requestId,
        videoId,
        languageCode: track.languageCode ?? null,
        errorCode: "YOUTUBE_TRANSCRIPT_EMPTY",
      });
      return "";
    }

    logger.info("transcript fetched", {
      requestId: options.requestId,
      videoId,
      languageCode: track.languageCode ?? null,
      kind: track.kind ?? null,
      fragmentCount: fragments.length,
      transcriptChars: transcript.length,
      durationMs: Date.now() - startedAt,
    });
    return transcript;
  } catch (error) {
    logger.error("error fetching transcript", {
      requestId: options.requestId,
      videoId,
      durationMs: Date.now() - startedAt,
      errorCode: error instanceof AppError ? error.code : "YOUTUBE_TRANSCRIPT_FETCH_FAILED",
      errorMessageHead: summarizeErrorMessage(error),
    });
    return "";
  }
}

export const __testables = {
  extractPlayerResponse,
  isBlockedWatchHtml,
};
