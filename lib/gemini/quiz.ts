import type { AppConfig } from "@/lib/config/app-config";
import { isAppError } from "@/lib/errors/app-error";
import { generateWithGemini } from "@/lib/gemini/client";
import { buildQuizPrompt } from "@/lib/gemini/prompts";
import { createLogger, summarizeErrorMessage } from "@/lib/logging/logger";

interface GenerateQuizOptions {
  requestId?: string;
  questionCount?: number;
}

/**
 * Asks Gemini for MCQs about the transcript. Returns the trimmed quiz text, or an
 * empty string when the provider fails for any reason (the failure is logged).
 */
export async function generateQuiz(
  transcript: string,
  config: Pick<AppConfig, "gemini" | "quiz" | "logLevel">,
  options: GenerateQuizOptions = {},
): Promise<string> {
  const logger = createLogger("quiz", config.logLevel);
  const questionCount = options.questionCount ?? config.quiz.questionCount;
  const prompt = buildQuizPrompt(transcript, questionCount);

  try {
    const text = await generateWithGemini(prompt, config.gemini, {
      requestId: options.requestId,
      logLevel: config.logLevel,
    });
    return text.trim();
  } catch (error) {
    logger.error("generation failed", {
      requestId: options.requestId,
      questionCount,
      errorCode: isAppError(error) ? error.code : "GEMINI_UNKNOWN_ERROR",
      errorMessageHead: summarizeErrorMessage(error),
    });
    return "";
  }
}
