import { MAX_QUESTION_COUNT, MIN_QUESTION_COUNT } from "@/lib/config/app-config";

export interface QuizRequest {
  videoUrl: string;
  questionCount?: number;
}

export type QuizRequestParseResult =
  | { ok: true; request: QuizRequest }
  | { ok: false; code: "VIDEO_URL_REQUIRED" | "QUESTION_COUNT_INVALID" };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseQuestionCount(value: unknown): number | null | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (
    typeof value !== "number" ||
    !Number.isInteger(value) ||
    value < MIN_QUESTION_COUNT ||
    value > MAX_QUESTION_COUNT
  ) {
    return null;
  }

  return value;
}

export function parseQuizRequestPayload(body: unknown): QuizRequestParseResult {
  if (!isRecord(body)) {
    return { ok: false, code: "VIDEO_URL_REQUIRED" };
  }

  const videoUrl = typeof body.video_url === "string" ? body.video_url.trim() : "";
  if (!videoUrl) {
    return { ok: false, code: "VIDEO_URL_REQUIRED" };
  }

  const questionCount = parseQuestionCount(body.num_questions);
  if (questionCount === null) {
    return { ok: false, code: "QUESTION_COUNT_INVALID" };
  }

  return {
    ok: true,
    request: questionCount === undefined ? { videoUrl } : { videoUrl, questionCount },
  };
}
