import pino, { type Logger } from "pino";
import { PinoPretty } from "pino-pretty";
import type { LogFormat, LogLevel } from "../config/env.js";

export type { Logger } from "pino";

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
}

const redact = {
  paths: ["apiToken", "*.apiToken", "headers.authorization", "*.headers.authorization"],
  censor: "[redacted]"
};

// Progress goes to stderr; stdout stays free for whatever the deploy hook pipes it into.
export function createLogger(options: LoggerOptions): Logger {
  if (options.format === "json") {
    return pino({ level: options.level, redact }, pino.destination({ dest: 2, sync: true }));
  }
  const stream = PinoPretty({
    colorize: process.stderr.isTTY === true,
    translateTime: "HH:MM:ss",
    ignore: "pid,hostname,component",
    messageFormat: "{if component}[{component}] {end}{msg}",
    destination: 2,
    sync: true
  });
  return pino({ level: options.level, redact }, stream);
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
