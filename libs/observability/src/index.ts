import crypto from "node:crypto";
import pino from "pino";

export type Logger = pino.Logger;

export type LoggerOptions = {
  level?: string;
  destination?: pino.DestinationStream;
};

export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  return pino(
    {
      base: { service },
      level: options.level ?? process.env.LOG_LEVEL ?? "info",
      redact: {
        paths: [
          "password",
          "*.password",
          "re_password",
          "*.re_password",
          "token",
          "*.token",
          "authorization",
          "*.authorization",
          "headers.authorization",
          "*.headers.authorization"
        ],
        censor: "[REDACTED]"
      }
    },
    options.destination
  );
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export function newTraceId(): string {
  return crypto.randomUUID();
}
