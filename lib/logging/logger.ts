export type LogLevel = "info" | "debug";

type LogPayload = Record<string, unknown>;

export interface Logger {
  debug(message: string, payload?: LogPayload): void;
  info(message: string, payload?: LogPayload): void;
  error(message: string, payload?: LogPayload): void;
}

export function createLogger(tag: string, logLevel: LogLevel = "info"): Logger {
  const write = (level: "info" | "debug" | "error", message: string, payload: LogPayload = {}) => {
    if (level === "debug" && logLevel !== "debug") {
      return;
    }

    const logger =
      level === "error" ? console.error : level === "debug" ? console.debug : console.info;
    logger(`[${tag}] ${message}`, payload);
  };

  return {
    debug: (message, payload) => write("debug", message, payload),
    info: (message, payload) => write("info", message, payload),
    error: (message, payload) => write("error", message, payload),
  };
}

export function summarizeErrorMessage(error: unknown): string {
  if (error instanceof Error && typeof error.message === "string") {
    return error.message.replace(/\s+/g, " ").trim().slice(0, 240);
  }
  if (typeof error === "string") {
    return error.replace(/\s+/g, " ").trim().slice(0, 240);
  }
  return "unknown error";
}
