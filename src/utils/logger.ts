import { Config } from "../config";
import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";
import { Writable } from "stream";

// stdout carries the filtered document, so every record goes to stderr.

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: stdTimeFunctions.isoTime,
  base: undefined,
  formatters: {
    level(label) {
      return { level: label.toUpperCase() };
    },
  },
};

type LogObject = {
  level?: string;
  time?: string;
  msg?: string;
  file?: string;
  [key: string]: unknown;
};

export function formatSimpleLine(text: string): string {
  try {
    const obj = JSON.parse(text) as LogObject;
    const level = typeof obj.level === "string" ? obj.level : "";
    const time = (typeof obj.time === "string" ? obj.time : "").replace(/\..*/, "");
    const file = (typeof obj.file === "string" ? obj.file : "").slice(0, 9);
    const msg = typeof obj.msg === "string" ? obj.msg : text;
    return `${level.padEnd(5)} ${time} ${file.padEnd(10)} ${msg}\n`;
  } catch {
    return text + "\n";
  }
}

class SimpleStderrStream extends Writable {
  _write(chunk: Buffer, encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    for (const line of chunk.toString("utf8").split("\n")) {
      const text = line.trim();
      if (text.length > 0) process.stderr.write(formatSimpleLine(text));
    }
    callback();
  }
}

function build(): Logger {
  if (Config.LOG_FORMAT === "simple") {
    return pino(options, new SimpleStderrStream());
  }
  return pino(options, pino.destination(2));
}

type GlobalWithLogger = typeof globalThis & { __TEXFILTER_LOGGER__?: Logger };
const g = globalThis as GlobalWithLogger;

export const logger: Logger = g.__TEXFILTER_LOGGER__ ?? (g.__TEXFILTER_LOGGER__ = build());
export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);
