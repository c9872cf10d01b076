/**
 * Structured logging.
 *
 * pino writes JSON lines to stderr, or to LOG_FILE when set; the terminal
 * front end always uses a file so log lines never land on the screen.
 */

import pino, { type Logger, type LoggerOptions } from "pino";

export interface LoggerSettings {
  level?: string;
  /** Append to this file instead of stderr. */
  file?: string;
}

function defaultLevel(): string {
  return process.env["LOG_LEVEL"] ?? (process.env["VITEST"] ? "silent" : "info");
}

export function createLogger(settings: LoggerSettings = {}): Logger {
  const options: LoggerOptions = {
    level: settings.level ?? defaultLevel(),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  const destination = settings.file
    ? pino.destination({ dest: settings.file, mkdir: true, sync: false })
    : pino.destination(2);
  return pino(options, destination);
}

export const logger: Logger = createLogger();

export type LoggerLayer = "rag" | "index" | "llm";

export function layerLogger(layer: LoggerLayer, base: Logger = logger): Logger {
  return base.child({ layer });
}

export function truncateText(text: string, maxLength = 80): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength)}... (${text.length} chars total)`;
}

export type { Logger } from "pino";
