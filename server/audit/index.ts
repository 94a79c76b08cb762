import type { CrawlOutcome, CrawlSettingsInput } from "./types";
import { runCrawl } from "./crawler";
import type { CrawlOptions } from "./crawler";

/** Crawls a site and resolves with its run, page records and audit summary. */
export async function runAudit(settings: CrawlSettingsInput, options: CrawlOptions = {}): Promise<CrawlOutcome> {
  return runCrawl(settings, options).done;
}

export { runCrawl, CrawlScheduler } from "./crawler";
export type { CrawlHandle, CrawlOptions } from "./crawler";
export { validateCrawlSettings } from "./settings";
export { CrawlRunError, CrawlValidationError } from "./errors";
export { normalizeUrl, isInternal, extractDomain } from "./url-utils";
export type { NormalizeResult } from "./url-utils";
export { fetchPage, httpFetcher } from "./fetcher";
export { analyze, detectPageIssues, isIndexable, scorePage } from "./analyzer";
export { aggregate, finalizeRun, listIssues, rankIssues } from "./scorer";
export type { IssuePage, IssueQuery } from "./scorer";
export {
  deriveSiteStatus,
  diffPage,
  nextCheckAt,
  runMonitoringCheck,
  selectMonitoredPages,
  summarizeMonitoring,
} from "./monitor";
export type { MonitoringFrequency, MonitoringOptions, MonitoringSummary } from "./monitor";
export { CrawlSettingsSchema, DEFAULT_USER_AGENT } from "./types";
export type * from "./types";
