import { afterEach, describe, expect, it, vi } from "vitest";

import { createLogger, summarizeErrorMessage } from "./logger";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createLogger", () => {
  it("prefixes messages with the tag and forwards the payload", () => {
    const infoSpy = vi.spyOn(console, "info").mockImplementation(() => undefined);

    createLogger("quiz").info("request completed", { requestId: "req-1" });

    expect(infoSpy).toHaveBeenCalledWith("[quiz] request completed", { requestId: "req-1" });
  });

  it("drops debug lines unless the level is debug", () => {
    const debugSpy = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    createLogger("quiz", "info").debug("hidden");
    createLogger("quiz", "debug").debug("shown");

    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(debugSpy).toHaveBeenCalledWith("[quiz] shown", {});
  });

  it("routes errors to console.error", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);

    createLogger("youtube-transcript").error("fetch failed");

    expect(errorSpy).toHaveBeenCalledWith("[youtube-transcript] fetch failed", {});
  });
});

describe("summarizeErrorMessage", () => {
  it("collapses whitespace and clips to 240 characters", () => {
    const message = summarizeErrorMessage(new Error(`line one\n\n  line two ${"x".repeat(300)}`));

    expect(message.startsWith("line one line two x")).toBe(true);
    expect(message).toHaveLength(240);
  });

  it("falls back for non-error values", () => {
    expect(summarizeErrorMessage({ status: 500 })).toBe("unknown error");
  });
});
