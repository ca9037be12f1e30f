import { AppError } from "@/lib/errors/app-error";

const SHORT_LINK_HOSTS = new Set(["youtu.be"]);
const WATCH_HOSTS = new Set(["www.youtube.com", "youtube.com"]);
const WATCH_PATH = "/watch";

function invalidUrl(value: string): AppError {
  return new AppError(`Invalid YouTube URL: ${value.slice(0, 200)}`, "YOUTUBE_URL_INVALID", 400);
}

/**
 * Pulls the video id out of a `youtu.be/<id>` short link or a
 * `youtube.com/watch?v=<id>` URL. Hostnames and the watch path are matched
 * exactly; anything else throws `YOUTUBE_URL_INVALID`.
 */
export function extractVideoId(value: string): string {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw invalidUrl(value);
  }

  if (SHORT_LINK_HOSTS.has(parsed.hostname)) {
    const id = parsed.pathname.slice(1);
    if (id) {
      return id;
    }
  } else if (WATCH_HOSTS.has(parsed.hostname) && parsed.pathname === WATCH_PATH) {
    const id = parsed.searchParams.get("v");
    if (id) {
      return id;
    }
  }

  throw invalidUrl(value);
}
