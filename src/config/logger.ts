/**
 * Logger setup
 * pino-based structured logging
 *
 * Outputs:
 * - stdout: JSON lines (pretty, colored lines when LOG_PRETTY=true in development)
 * - file: LOG_DIR/YYYY-MM-DD/{SERVICE_NAME}.log, rotated daily, 30 files kept
 * - file: LOG_DIR/YYYY-MM-DD/error.log for error and fatal lines
 *
 * Under NODE_ENV=test the level defaults to "silent" and nothing is written
 * to disk.
 */

import pino from "pino";
import type { DestinationStream } from "pino";
import { createStream, type RotatingFileStream } from "rotating-file-stream";
import path from "path";
import fs from "fs";
import {
  getDateStringWithDash,
  getTimestampWithTimezone,
} from "@/utils/timestamp";

const NODE_ENV = process.env.NODE_ENV || "development";
const LOG_LEVEL =
  process.env.LOG_LEVEL ||
  (NODE_ENV === "test"
    ? "silent"
    : NODE_ENV === "production"
      ? "info"
      : "debug");
const LOG_DIR = process.env.LOG_DIR || path.join(process.cwd(), "logs");
const LOG_PRETTY = process.env.LOG_PRETTY === "true";
const LOG_TO_FILE = process.env.LOG_TO_FILE !== "false" && NODE_ENV !== "test";
const SERVICE_NAME = process.env.SERVICE_NAME || "harvest";

const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/**
 * Rotating file stream writing to LOG_DIR/YYYY-MM-DD/{prefix}.log
 */
function createRotatingStream(prefix: string): RotatingFileStream {
  return createStream(
    (time: number | Date | null) => {
      const date = time instanceof Date ? time : new Date();
      const dateDir = getDateStringWithDash(date);
      fs.mkdirSync(path.join(LOG_DIR, dateDir), { recursive: true });
      return path.join(dateDir, `${prefix}.log`);
    },
    {
      path: LOG_DIR,
      interval: "1d",
      intervalBoundary: true,
      initialRotation: true,
      immutable: true,
      maxFiles: 30,
      maxSize: "100M",
    },
  );
}

/**
 * Routes each line to the service file, and error lines to error.log too.
 * Lines flagged with skip_file_log stay on the console.
 */
class FileRoutingStream implements DestinationStream {
  private readonly serviceStream = createRotatingStream(SERVICE_NAME);
  private readonly errorStream = createRotatingStream("error");

  write(chunk: string): void {
    let level: unknown;
    let skip = false;
    try {
      const parsed: unknown = JSON.parse(chunk);
      if (typeof parsed === "object" && parsed !== null) {
        level = "level" in parsed ? parsed.level : undefined;
        skip = "skip_file_log" in parsed && parsed.skip_file_log === true;
      }
    } catch {
      // not JSON: keep it in the service file
    }

    if (skip) return;
    if (level === "error" || level === "fatal") {
      this.errorStream.write(chunk);
    }
    this.serviceStream.write(chunk);
  }
}

/**
 * Colored one-line console output for local development
 */
class PrettyConsoleStream implements DestinationStream {
  private static readonly HIDDEN_FIELDS = new Set([
    "level",
    "time",
    "service",
    "env",
    "pid",
    "hostname",
    "msg",
    "important",
    "skip_file_log",
  ]);

  write(chunk: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(chunk);
    } catch {
      process.stderr.write(chunk);
      return;
    }
    if (typeof parsed !== "object" || parsed === null) {
      process.stderr.write(chunk);
      return;
    }
    const record: Record<string, unknown> = { ...parsed };

    const label = typeof record.level === "string" ? record.level : "info";
    const numeric = pino.levels.values[label] ?? LOG_LEVELS.INFO;
    const color =
      numeric >= LOG_LEVELS.ERROR
        ? "\x1b[31m"
        : numeric >= LOG_LEVELS.WARN
          ? "\x1b[33m"
          : "\x1b[32m";
    const time = new Date().toLocaleTimeString("en-US", { hour12: false });
    const star = record.important === true ? " *" : "";
    const msg = typeof record.msg === "string" ? record.msg : "";

    const lines = [
      `[${time}] ${color}${label.toUpperCase()}\x1b[0m${star} \x1b[36m${msg}\x1b[0m`,
    ];
    for (const [key, value] of Object.entries(record)) {
      if (PrettyConsoleStream.HIDDEN_FIELDS.has(key)) continue;
      const rendered =
        typeof value === "object" ? JSON.stringify(value) : String(value);
      lines.push(`  ${key}: ${rendered}`);
    }
    process.stderr.write(lines.join("\n") + "\n");
  }
}

const baseConfig: pino.LoggerOptions = {
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: () => `,"time":"${getTimestampWithTimezone()}"`,
  base: {
    service: "product-harvest",
    env: NODE_ENV,
  },
};

function buildStreams(): pino.StreamEntry[] {
  const streams: pino.StreamEntry[] = [
    {
      level: "trace",
      stream:
        NODE_ENV === "development" && LOG_PRETTY
          ? new PrettyConsoleStream()
          : process.stdout,
    },
  ];

  if (LOG_TO_FILE) {
    fs.mkdirSync(LOG_DIR, { recursive: true });
    streams.push({ level: "trace", stream: new FileRoutingStream() });
  }

  return streams;
}

/**
 * Main logger instance
 */
const logger: pino.Logger = pino(baseConfig, pino.multistream(buildStreams()));

export { logger };

export type Logger = pino.Logger;
