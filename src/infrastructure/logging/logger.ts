import { randomUUID } from "node:crypto";
import type { NextFunction, Request, Response } from "express";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogThreshold = LogLevel | "silent";

type LogContext = Record<string, unknown>;

export type RequestWithId = Request & { requestId?: string };

const severity: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

let threshold: LogThreshold = "info";

export function setLogLevel(level: LogThreshold) {
  threshold = level;
}

const basePayload = (level: LogLevel, message: string, context: LogContext) => ({
  level,
  message,
  time: new Date().toISOString(),
  ...context
});

export function log(level: LogLevel, message: string, context: LogContext = {}) {
  if (severity[level] < severity[threshold]) {
    return;
  }
  const line = JSON.stringify(basePayload(level, message, context));
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

function describeError(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return error;
}

export function logError(message: string, error: unknown, context: LogContext = {}) {
  log("error", message, { ...context, error: describeError(error) });
}

// Infrastructure failures the caller recovers from (unreachable user, dropped event).
export function logWarning(message: string, error: unknown, context: LogContext = {}) {
  log("warn", message, { ...context, error: describeError(error) });
}

export function requestLogger(req: RequestWithId, res: Response, next: NextFunction) {
  const requestId = req.header("x-request-id") ?? randomUUID();
  req.requestId = requestId;
  res.setHeader("x-request-id", requestId);

  const start = Date.now();
  res.on("finish", () => {
    log("info", "request.end", {
      requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - start
    });
  });

  next();
}
