import { isAppError } from "@/lib/errors/app-error";

export const INTERNAL_ERROR_MESSAGE = "Internal server error";

const CODE_MESSAGE_MAP: Record<string, string> = {
  INVALID_JSON_BODY: "Request body must be valid JSON",
  VIDEO_URL_REQUIRED: "video_url is required",
  QUESTION_COUNT_INVALID: "num_questions must be an integer between 1 and 50",
  YOUTUBE_URL_INVALID: "Invalid YouTube URL",
  TRANSCRIPT_UNAVAILABLE: "Could not fetch transcript",
  QUIZ_GENERATION_FAILED: "Failed to generate MCQs",
};

export interface ErrorResponseDescriptor {
  code: string;
  message: string;
  status: number;
}

export function toUserFacingErrorMessage(
  code: string | null | undefined,
  fallbackMessage = INTERNAL_ERROR_MESSAGE,
): string {
  if (!code) {
    return fallbackMessage;
  }

  return CODE_MESSAGE_MAP[code] ?? fallbackMessage;
}

// Only codes listed above reach the client; everything else becomes a generic 500.
export function resolveErrorResponse(error: unknown): ErrorResponseDescriptor {
  if (isAppError(error) && CODE_MESSAGE_MAP[error.code]) {
    return {
      code: error.code,
      message: toUserFacingErrorMessage(error.code),
      status: error.statusCode,
    };
  }

  return {
    code: isAppError(error) ? error.code : "INTERNAL_ERROR",
    message: INTERNAL_ERROR_MESSAGE,
    status: 500,
  };
}
