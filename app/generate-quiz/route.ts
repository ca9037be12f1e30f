import { randomUUID } from "node:crypto";

import { NextResponse } from "next/server";

import { getAppConfig } from "@/lib/config/app-config";
import { resolveErrorResponse, toUserFacingErrorMessage } from "@/lib/errors/error-messages";
import { generateQuiz } from "@/lib/gemini/quiz";
import { createLogger, summarizeErrorMessage } from "@/lib/logging/logger";
import { parseQuizRequestPayload } from "@/lib/validators/quiz-request";
import { extractVideoId } from "@/lib/validators/youtube";
import { fetchTranscriptText } from "@/lib/youtube/transcript";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

function errorJson(code: string, status: number) {
  return NextResponse.json({ error: toUserFacingErrorMessage(code) }, { status });
}

export async function POST(request: Request) {
  const requestId = request.headers.get("x-request-id")?.trim() || randomUUID();
  let logger = createLogger("generate-quiz");

  try {
    let body: unknown;
    try {
      body = await request.json();
    } catch {
      return errorJson("INVALID_JSON_BODY", 400);
    }

    const payload = parseQuizRequestPayload(body);
    if (!payload.ok) {
      return errorJson(payload.code, 400);
    }

    const videoId = extractVideoId(payload.request.videoUrl);
    const config = getAppConfig();
    logger = createLogger("generate-quiz", config.logLevel);
    logger.debug("request accepted", { requestId, videoId });

    const transcript = await fetchTranscriptText(videoId, config, { requestId });
    if (!transcript) {
      return errorJson("TRANSCRIPT_UNAVAILABLE", 500);
    }

    const quiz = (
      await generateQuiz(transcript, config, {
        requestId,
        questionCount: payload.request.questionCount,
      })
    ).trim();
    if (!quiz) {
      return errorJson("QUIZ_GENERATION_FAILED", 500);
    }

    logger.info("quiz generated", { requestId, videoId, quizChars: quiz.length });
    return NextResponse.json({ quiz }, { status: 200 });
  } catch (error) {
    const resolved = resolveErrorResponse(error);
    const log = resolved.status >= 500 ? logger.error : logger.info;
    log("request failed", {
      requestId,
      status: resolved.status,
      errorCode: resolved.code,
      errorMessageHead: summarizeErrorMessage(error),
    });

    return NextResponse.json({ error: resolved.message }, { status: resolved.status });
  }
}
