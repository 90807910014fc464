/**
 * @module utils/log
 * @fileoverview Scoped log lines written to stderr.
 *
 * Every line has the shape `[scope] message key=value key=value`. Values
 * containing whitespace, quotes or `=` are JSON-quoted so a line can be
 * split on spaces without ambiguity. Stdout is left for the CLI's final
 * report.
 */

export type LogValue = string | number | boolean | null | undefined;
export type LogFields = Record<string, LogValue>;

type Level = "info" | "warn" | "error";

function formatValue(value: LogValue): string {
  const text = String(value);
  return /[\s"=]/.test(text) || text === "" ? JSON.stringify(text) : text;
}

/**
 * Build the text of a log line. Fields whose value is `undefined` are left
 * out.
 *
 * @example
 * ```ts
 * formatLogLine("info", "transport", "request failed", { url: "https://x.test/a", kind: "timeout" });
 * // => "[transport] request failed url=https://x.test/a kind=timeout"
 * ```
 */
export function formatLogLine(
  level: Level,
  scope: string,
  message: string,
  fields: LogFields = {},
): string {
  const parts = [`[${scope}]`];
  if (level !== "info") {
    parts.push(level.toUpperCase());
  }
  parts.push(message);

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined) {
      parts.push(`${key}=${formatValue(value)}`);
    }
  }

  return parts.join(" ");
}

function write(level: Level, scope: string, message: string, fields?: LogFields): void {
  console.error(formatLogLine(level, scope, message, fields));
}

export const log = {
  info: (scope: string, message: string, fields?: LogFields) =>
    write("info", scope, message, fields),
  warn: (scope: string, message: string, fields?: LogFields) =>
    write("warn", scope, message, fields),
  error: (scope: string, message: string, fields?: LogFields) =>
    write("error", scope, message, fields),
};
