import * as dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_USER_AGENT } from "./audit/types";

const EnvSchema = z.object({
  CRAWL_MAX_PAGES: z.coerce.number().int().positive().default(500),
  CRAWL_CONCURRENCY: z.coerce.number().int().positive().default(5),
  CRAWL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  CRAWL_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  CRAWL_DELAY_MS: z.coerce.number().int().nonnegative().default(0),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_PRETTY: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
});

export interface CliDefaults {
  maxPages: number;
  maxConcurrentFetches: number;
  timeoutMs: number;
  userAgent: string;
  requestDelayMs: number;
  logLevel: string;
  logPretty: boolean;
}

export function readCliDefaults(env: NodeJS.ProcessEnv): CliDefaults {
  const parsed = EnvSchema.parse(env);
  return {
    maxPages: parsed.CRAWL_MAX_PAGES,
    maxConcurrentFetches: parsed.CRAWL_CONCURRENCY,
    timeoutMs: parsed.CRAWL_TIMEOUT_MS,
    userAgent: parsed.CRAWL_USER_AGENT,
    requestDelayMs: parsed.CRAWL_DELAY_MS,
    logLevel: parsed.LOG_LEVEL,
    logPretty: parsed.LOG_PRETTY,
  };
}

/** Loads `.env` into the process environment, then reads the defaults. */
export function loadCliDefaults(): CliDefaults {
  dotenv.config();
  return readCliDefaults(process.env);
}
