import pLimit from "p-limit";
import pino from "pino";
import type { Logger } from "pino";
import type {
  ContentChange,
  MetaChange,
  MonitoringCheck,
  MonitoringDiff,
  PageFetcher,
  PageRecord,
  SiteStatus,
  StatusChange,
} from "./types";
import { DEFAULT_USER_AGENT } from "./types";
import { analyze } from "./analyzer";
import { httpFetcher } from "./fetcher";
import { extractDomain } from "./url-utils";

export const CONTENT_CHANGE_THRESHOLD = 0.1;
export const DEFAULT_MONITORED_PAGES = 10;

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export type MonitoringFrequency = "12h" | "daily" | "3d" | "weekly" | "monthly";

const FREQUENCY_MS: Record<MonitoringFrequency, number> = {
  "12h": 12 * HOUR_MS,
  daily: DAY_MS,
  "3d": 3 * DAY_MS,
  weekly: 7 * DAY_MS,
  monthly: 30 * DAY_MS,
};

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function fetchFailureDetail(page: PageRecord): string | undefined {
  return page.issues.find((issue) => issue.category === "crawlability")?.description;
}

function detectMetaChanges(baseline: PageRecord, fresh: PageRecord): MetaChange[] {
  const changes: MetaChange[] = [];

  if (fresh.title && fresh.title !== baseline.title) {
    changes.push({ field: "title", oldValue: baseline.title, newValue: fresh.title });
  }
  if (fresh.metaDescription && fresh.metaDescription !== baseline.metaDescription) {
    changes.push({ field: "meta_description", oldValue: baseline.metaDescription, newValue: fresh.metaDescription });
  }

  const freshH1 = fresh.h1[0];
  const baselineH1 = baseline.h1[0] ?? null;
  if (freshH1 && freshH1 !== baselineH1) {
    changes.push({ field: "h1", oldValue: baselineH1, newValue: freshH1 });
  }

  return changes;
}

export function detectContentChange(oldWordCount: number, newWordCount: number): ContentChange | null {
  if (oldWordCount <= 0) return null;
  if (Math.abs(newWordCount - oldWordCount) <= oldWordCount * CONTENT_CHANGE_THRESHOLD) return null;

  const percentage = ((newWordCount - oldWordCount) * 100) / oldWordCount;
  return {
    oldWordCount,
    newWordCount,
    changePercentage: Math.round(percentage * 100) / 100,
  };
}

/**
 * Compares a fresh analysis of a page with its baseline record. Meta and
 * content are only compared when the fresh fetch succeeded.
 */
export function diffPage(baseline: PageRecord, fresh: PageRecord): MonitoringDiff {
  let statusChange: StatusChange | null = null;
  if (fresh.statusCode !== baseline.statusCode) {
    statusChange = { oldStatus: baseline.statusCode, newStatus: fresh.statusCode };
    const detail = fresh.statusCode === 0 ? fetchFailureDetail(fresh) : undefined;
    if (detail) statusChange.error = detail;
  }

  if (!isSuccess(fresh.statusCode)) {
    return { url: baseline.url, contentChange: null, metaChanges: [], statusChange };
  }

  return {
    url: baseline.url,
    contentChange: detectContentChange(baseline.wordCount, fresh.wordCount),
    metaChanges: detectMetaChanges(baseline, fresh),
    statusChange,
  };
}

export function hasChanges(diff: MonitoringDiff): boolean {
  return diff.statusChange !== null || diff.contentChange !== null || diff.metaChanges.length > 0;
}

export function deriveSiteStatus(diffs: MonitoringDiff[]): SiteStatus {
  if (diffs.some((diff) => diff.statusChange !== null && diff.statusChange.newStatus >= 500)) {
    return "down";
  }
  if (diffs.some(hasChanges)) {
    return "issues";
  }
  return "up";
}

/** The best-scoring indexable pages of a crawl, highest first. */
export function selectMonitoredPages(baseline: PageRecord[], limit = DEFAULT_MONITORED_PAGES): PageRecord[] {
  return baseline
    .filter((page) => page.indexable)
    .sort((a, b) => b.score - a.score)
    .slice(0, limit);
}

export interface MonitoringOptions {
  fetcher?: PageFetcher;
  logger?: Logger;
  limit?: number;
  concurrency?: number;
  timeoutMs?: number;
  userAgent?: string;
  blockPrivateNetworks?: boolean;
  now?: () => Date;
}

export async function runMonitoringCheck(
  baseline: PageRecord[],
  options: MonitoringOptions = {}
): Promise<MonitoringCheck> {
  const fetcher = options.fetcher ?? httpFetcher;
  const logger = options.logger ?? pino({ level: "silent" });
  const now = options.now ?? (() => new Date());
  const limit = pLimit(options.concurrency ?? 5);
  const pages = selectMonitoredPages(baseline, options.limit);

  logger.info({ pages: pages.length }, "Starting monitoring check");

  const diffs = await Promise.all(
    pages.map((page) =>
      limit(async () => {
        const result = await fetcher.fetch(page.url, {
          timeoutMs: options.timeoutMs ?? 30000,
          userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
          blockPrivateNetworks: options.blockPrivateNetworks,
        });
        const fresh = analyze(page.url, result, { baseHost: extractDomain(page.url), depth: page.depth });
        const diff = diffPage(page, fresh);
        if (hasChanges(diff)) {
          logger.debug({ url: page.url, status: fresh.statusCode }, "Page changed since baseline");
        }
        return diff;
      })
    )
  );

  const changed = diffs.filter(hasChanges);
  const check: MonitoringCheck = {
    checkedAt: now(),
    status: deriveSiteStatus(diffs),
    totalPages: pages.length,
    changedPages: changed.length,
    diffs: changed,
  };

  logger.info({ status: check.status, changedPages: check.changedPages }, "Monitoring check finished");
  return check;
}

export interface MonitoringSummary {
  totalChecks: number;
  daysMonitored: number;
  uptimePercentage: number;
  totalChanges: number;
  changesByType: { content: number; meta: number; status: number };
  mostChangedPages: Array<{ url: string; changesCount: number }>;
}

export function summarizeMonitoring(
  checks: MonitoringCheck[],
  options: { days?: number; now?: Date } = {}
): MonitoringSummary {
  const days = options.days ?? 30;
  const since = (options.now ?? new Date()).getTime() - days * DAY_MS;
  const inWindow = checks.filter((check) => check.checkedAt.getTime() >= since);

  const changesByType = { content: 0, meta: 0, status: 0 };
  const changesByPage = new Map<string, number>();

  for (const check of inWindow) {
    for (const diff of check.diffs) {
      const content = diff.contentChange ? 1 : 0;
      const status = diff.statusChange ? 1 : 0;
      const meta = diff.metaChanges.length;
      changesByType.content += content;
      changesByType.status += status;
      changesByType.meta += meta;

      const count = content + status + meta;
      if (count > 0) {
        changesByPage.set(diff.url, (changesByPage.get(diff.url) ?? 0) + count);
      }
    }
  }

  const upChecks = inWindow.filter((check) => check.status === "up").length;
  const mostChangedPages = Array.from(changesByPage, ([url, changesCount]) => ({ url, changesCount }))
    .sort((a, b) => b.changesCount - a.changesCount)
    .slice(0, 5);

  return {
    totalChecks: inWindow.length,
    daysMonitored: days,
    uptimePercentage: inWindow.length > 0 ? Math.round((upChecks / inWindow.length) * 10000) / 100 : 0,
    totalChanges: changesByType.content + changesByType.meta + changesByType.status,
    changesByType,
    mostChangedPages,
  };
}

export function nextCheckAt(lastCheck: Date, frequency: MonitoringFrequency): Date {
  return new Date(lastCheck.getTime() + FREQUENCY_MS[frequency]);
}
