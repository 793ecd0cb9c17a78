import pino from "pino";

type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";
type LogContext = Record<string, unknown>;

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace"];

function resolveLogLevel(): pino.LevelWithSilent {
  const raw = (process.env.LOG_LEVEL || "").toLowerCase();
  const match = LEVELS.find((level) => level === raw);
  if (match) return match;

  // 测试环境默认静默，避免污染输出
  if (process.env.NODE_ENV === "test") return "silent";
  if (process.env.NODE_ENV === "development") return "debug";
  return "info";
}

const REDACT_PATHS = [
  "token",
  "cookie",
  "csrfToken",
  "authorization",
  "headers.authorization",
  "headers.cookie",
  "encryptionKey",
  "signingKey",
];

const base = pino({
  level: resolveLogLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: "console-session-gate",
    env: process.env.NODE_ENV || "development",
  },
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: REDACT_PATHS,
    censor: "[redacted]",
  },
});

function normalizeContext(context: unknown): LogContext | undefined {
  if (context === undefined) return undefined;
  if (context instanceof Error) {
    return { error: context.message, stack: context.stack };
  }
  if (context && typeof context === "object" && !Array.isArray(context)) {
    return { ...context };
  }
  return { detail: context };
}

function write(level: LogLevel, message: string, context?: unknown): void {
  const normalized = normalizeContext(context);
  if (normalized) {
    base[level](normalized, message);
  } else {
    base[level](message);
  }
}

/**
 * Message-first logger facade over pino.
 *
 * `logger.warn("[Component] What happened", { structured: "context" })`
 */
export const logger = {
  fatal: (message: string, context?: unknown) => write("fatal", message, context),
  error: (message: string, context?: unknown) => write("error", message, context),
  warn: (message: string, context?: unknown) => write("warn", message, context),
  info: (message: string, context?: unknown) => write("info", message, context),
  debug: (message: string, context?: unknown) => write("debug", message, context),
  trace: (message: string, context?: unknown) => write("trace", message, context),
};

export type Logger = typeof logger;

export function toLogError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Session ids are bearer material once signed; only a prefix goes to logs.
 */
export function maskSessionId(sessionId: string | null | undefined): string | undefined {
  if (!sessionId) return undefined;
  return sessionId.length <= 8 ? "***" : `${sessionId.slice(0, 8)}…`;
}
