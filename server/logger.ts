import pino from "pino";
import type { Logger } from "pino";

export interface LoggerOptions {
  level: string;
  pretty: boolean;
}

/** Logs go to stderr so command output on stdout stays parseable JSON. */
export function createLogger({ level, pretty }: LoggerOptions): Logger {
  if (pretty) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
          destination: 2,
        },
      },
    });
  }

  return pino({ level }, pino.destination(2));
}
