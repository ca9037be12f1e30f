import { describe, expect, it } from "vitest";

import { AppError } from "./app-error";
import { resolveErrorResponse, toUserFacingErrorMessage } from "./error-messages";

describe("toUserFacingErrorMessage", () => {
  it("maps known error code", () => {
    expect(toUserFacingErrorMessage("VIDEO_URL_REQUIRED")).toBe("video_url is required");
  });

  it("maps transcript failure code", () => {
    expect(toUserFacingErrorMessage("TRANSCRIPT_UNAVAILABLE")).toBe("Could not fetch transcript");
  });

  it("returns fallback when code is empty", () => {
    expect(toUserFacingErrorMessage("", "fallback")).toBe("fallback");
  });

  it("returns internal error message for unknown code", () => {
    expect(toUserFacingErrorMessage("GEMINI_TIMEOUT")).toBe("Internal server error");
  });
});

describe("resolveErrorResponse", () => {
  it("keeps status of mapped app errors", () => {
    expect(
      resolveErrorResponse(new AppError("bad url", "YOUTUBE_URL_INVALID", 400)),
    ).toEqual({ code: "YOUTUBE_URL_INVALID", message: "Invalid YouTube URL", status: 400 });
  });

  it("hides unmapped app errors behind a generic 500", () => {
    expect(
      resolveErrorResponse(new AppError("GEMINI_TOP_P is invalid", "GEMINI_CONFIG_INVALID", 500)),
    ).toEqual({ code: "GEMINI_CONFIG_INVALID", message: "Internal server error", status: 500 });
  });

  it("hides plain errors behind a generic 500", () => {
    expect(resolveErrorResponse(new TypeError("boom"))).toEqual({
      code: "INTERNAL_ERROR",
      message: "Internal server error",
      status: 500,
    });
  });
});
