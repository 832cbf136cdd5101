import pino from "pino";

/**
 * Creates the pino logger shared by the CLI, the pipeline and its adapters.
 *
 * - String level labels instead of numeric ones
 * - ISO 8601 timestamps
 * - Level from `LOG_LEVEL`, defaults to `info`
 * - Plain JSON on stdout
 *
 * @param level - Optional override for the log level
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    name: "article-harvester",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
