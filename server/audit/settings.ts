import type { ZodIssue } from "zod";
import { CrawlSettingsSchema } from "./types";
import type { CrawlSettings, CrawlSettingsInput } from "./types";
import { CrawlValidationError } from "./errors";
import { normalizeUrl } from "./url-utils";

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.join(".");
  return path ? `${path}: ${issue.message}` : issue.message;
}

/** Applies defaults and normalizes the seed. Throws CrawlValidationError. */
export function validateCrawlSettings(input: CrawlSettingsInput): CrawlSettings {
  const parsed = CrawlSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new CrawlValidationError(parsed.error.issues.map(describeIssue));
  }

  const seed = normalizeUrl(parsed.data.url);
  if (!seed.ok) {
    throw new CrawlValidationError([`url: ${seed.error}`]);
  }

  return { ...parsed.data, url: seed.url };
}
