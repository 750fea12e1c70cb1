export type LogLevel =
  | "error"
  | "warn"
  | "info"
  | "http"
  | "verbose"
  | "debug"
  | "silly";

export const LOG_LEVELS: readonly LogLevel[] = [
  "error",
  "warn",
  "info",
  "http",
  "verbose",
  "debug",
  "silly",
];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export function parseLogLevel(value: string): LogLevel {
  const normalized = value.trim().toLowerCase();
  if (normalized === "warning") {
    return "warn";
  }
  if (!isLogLevel(normalized)) {
    throw new Error(`Unknown log level: ${value}`);
  }
  return normalized;
}
