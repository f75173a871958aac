import pino from "pino";

/**
 * Creates the process logger: structured JSON, stdout unless a destination
 * stream is given.
 *
 * - Level rendered as its string label rather than the numeric value
 * - ISO 8601 timestamps
 * - Level taken from `LOG_LEVEL`, defaults to `info`
 *
 * @param level - Optional override for the log level
 * @param destination - Optional stream to write to instead of stdout
 */
export function createLogger(
  level?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = {
    name: "channel-digest",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  return destination ? pino(options, destination) : pino(options);
}
