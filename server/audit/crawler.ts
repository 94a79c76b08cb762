import { randomUUID } from "crypto";
import pino from "pino";
import type { Logger } from "pino";
import type {
  CrawlNotifier,
  CrawlOutcome,
  CrawlProgress,
  CrawlRun,
  CrawlSettings,
  CrawlSettingsInput,
  FetchRequest,
  FetchResult,
  PageFetcher,
  PageRecord,
  PageSink,
} from "./types";
import { analyze } from "./analyzer";
import { CrawlRunError, errorMessage } from "./errors";
import { httpFetcher } from "./fetcher";
import { Frontier } from "./frontier";
import type { FrontierEntry } from "./frontier";
import { PolitenessGate, sleep } from "./politeness";
import { EMPTY_ROBOTS_RULES, isPathAllowed, parseRobotsTxt } from "./robots";
import type { RobotsRules } from "./robots";
import { aggregate, emptySeverityCounts, finalizeRun } from "./scorer";
import { validateCrawlSettings } from "./settings";
import { extractDomain, getRobotsUrl } from "./url-utils";

const MAX_CRAWL_DELAY_MS = 10_000;
const PROGRESS_LOG_INTERVAL = 10;
const RETRYABLE_STATUSES = new Set([429, 503]);

export interface CrawlOptions {
  fetcher?: PageFetcher;
  sink?: PageSink;
  notifier?: CrawlNotifier;
  logger?: Logger;
  now?: () => Date;
  runId?: string;
}

export interface CrawlHandle {
  readonly id: string;
  /** Settles once with the terminal outcome. Never rejects. */
  readonly done: Promise<CrawlOutcome>;
  cancel(reason?: string): void;
  progress(): CrawlProgress;
}

function isRetryable(result: FetchResult): boolean {
  if (result.kind !== "success") return true;
  return RETRYABLE_STATUSES.has(result.status);
}

function describeResult(result: FetchResult): string {
  if (result.kind === "timeout") return "timeout";
  if (result.kind === "network_error") return result.detail;
  return `HTTP ${result.status}`;
}

export class CrawlScheduler {
  readonly id: string;
  private run: CrawlRun;
  private readonly frontier: Frontier;
  private readonly gate: PolitenessGate;
  private readonly controller = new AbortController();
  private readonly fetcher: PageFetcher;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly seedDomain: string;
  private readonly pages: PageRecord[] = [];
  private robots: RobotsRules = EMPTY_ROBOTS_RULES;
  private failure: CrawlRunError | null = null;
  private cancelReason: string | null = null;

  constructor(
    private readonly settings: CrawlSettings,
    private readonly options: CrawlOptions = {}
  ) {
    this.id = options.runId ?? randomUUID();
    this.now = options.now ?? (() => new Date());
    this.fetcher = options.fetcher ?? httpFetcher;
    this.logger = (options.logger ?? pino({ level: "silent" })).child({ runId: this.id });
    this.frontier = new Frontier(settings.maxPages);
    this.gate = new PolitenessGate(settings.requestDelayMs, () => this.now().getTime());
    this.seedDomain = extractDomain(settings.url);
    this.run = {
      id: this.id,
      settings,
      startedAt: this.now(),
      endedAt: null,
      status: "in_progress",
      cancelled: false,
      failureReason: null,
      totalPages: 0,
      crawledPages: 0,
      indexablePages: 0,
      siteScore: null,
      issuesCount: emptySeverityCounts(),
    };
  }

  start(): CrawlHandle {
    const done = this.execute();
    return {
      id: this.id,
      done,
      cancel: (reason?: string) => this.cancel(reason),
      progress: () => this.progress(),
    };
  }

  cancel(reason = "cancelled"): void {
    if (this.run.status !== "in_progress" || this.stopped) return;
    this.cancelReason = reason;
    this.logger.warn({ reason }, "Crawl cancelled");
    this.stop();
  }

  progress(): CrawlProgress {
    const counts = this.frontier.counts();
    let progressPercentage: number | null = null;
    if (this.run.status === "in_progress") {
      progressPercentage = counts.accepted === 0 ? 0 : Math.round((counts.done / counts.accepted) * 10000) / 100;
    }

    return {
      status: this.run.status,
      queued: counts.queued,
      inFlight: counts.inFlight,
      done: counts.done,
      rejected: counts.rejected,
      crawledPages: this.pages.length,
      progressPercentage,
    };
  }

  private get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  private stop(): void {
    this.controller.abort();
    this.frontier.close();
  }

  private fail(error: unknown): void {
    if (this.failure) return;
    this.failure = error instanceof CrawlRunError ? error : new CrawlRunError(errorMessage(error), error);
    this.logger.error({ err: this.failure }, "Crawl failed");
    this.stop();
  }

  private async execute(): Promise<CrawlOutcome> {
    this.logger.info(
      { url: this.settings.url, maxPages: this.settings.maxPages, workers: this.settings.maxConcurrentFetches },
      "Starting crawl"
    );

    try {
      if (this.settings.respectRobots) {
        await this.loadRobots();
      }

      if (!this.stopped) {
        this.frontier.offer({ url: this.settings.url, depth: 0, leaf: false });
        const workers = Array.from({ length: this.settings.maxConcurrentFetches }, () => this.work());
        await Promise.all(workers);
      }
    } catch (error) {
      this.fail(error);
    }

    return this.finish();
  }

  private async loadRobots(): Promise<void> {
    const robotsUrl = getRobotsUrl(this.settings.url);
    if (!robotsUrl) return;

    await this.gate.wait(this.seedDomain, this.controller.signal);
    const result = await this.fetcher.fetch(robotsUrl, this.fetchRequest());

    if (result.kind !== "success" || result.status < 200 || result.status >= 300) {
      this.logger.debug({ robotsUrl, result: describeResult(result) }, "No robots.txt rules applied");
      return;
    }

    this.robots = parseRobotsTxt(result.body, this.settings.userAgent);
    if (this.robots.crawlDelaySeconds !== null) {
      const crawlDelayMs = Math.min(this.robots.crawlDelaySeconds * 1000, MAX_CRAWL_DELAY_MS);
      this.gate.setDelay(Math.max(this.settings.requestDelayMs, crawlDelayMs));
    }

    this.logger.info(
      {
        robotsUrl,
        disallow: this.robots.disallow.length,
        allow: this.robots.allow.length,
        delayMs: this.gate.delay,
      },
      "Loaded robots.txt"
    );
  }

  private async work(): Promise<void> {
    for (;;) {
      const entry = await this.frontier.take();
      if (!entry) return;

      try {
        await this.process(entry);
      } catch (error) {
        this.fail(error);
      } finally {
        this.frontier.complete(entry.url);
      }
    }
  }

  private async process(entry: FrontierEntry): Promise<void> {
    const result = await this.fetchWithRetry(entry.url);
    // Results that land after a stop are abandoned
    if (this.stopped) return;

    const record = analyze(entry.url, result, { baseHost: this.seedDomain, depth: entry.depth });
    this.pages.push(record);
    this.logger.debug(
      { url: record.url, status: record.statusCode, issues: record.issues.length },
      "Crawled page"
    );

    if (!entry.leaf) {
      this.discover(record, entry.depth + 1);
    }

    if (this.options.sink) {
      try {
        await this.options.sink.onPage(this.run, record);
      } catch (error) {
        throw new CrawlRunError(`Page sink failed for ${record.url}: ${errorMessage(error)}`, error);
      }
    }

    if (this.pages.length % PROGRESS_LOG_INTERVAL === 0) {
      const counts = this.frontier.counts();
      this.logger.info(
        { crawled: this.pages.length, queued: counts.queued, accepted: counts.accepted },
        "Crawl progress"
      );
    }
  }

  private fetchRequest(): FetchRequest {
    return {
      timeoutMs: this.settings.timeoutMs,
      userAgent: this.settings.userAgent,
      blockPrivateNetworks: this.settings.blockPrivateNetworks,
      signal: this.controller.signal,
    };
  }

  private async fetchWithRetry(url: string): Promise<FetchResult> {
    const host = extractDomain(url);

    for (let attempt = 0; ; attempt++) {
      await this.gate.wait(host, this.controller.signal);
      if (this.stopped) return { kind: "network_error", detail: "Request aborted" };

      const result = await this.fetcher.fetch(url, this.fetchRequest());
      if (!isRetryable(result) || attempt >= this.settings.retries || this.stopped) {
        return result;
      }

      const backoffMs = this.settings.retryBackoffMs * 2 ** attempt;
      this.logger.warn(
        { url, attempt: attempt + 1, backoffMs, reason: describeResult(result) },
        "Retrying page fetch"
      );
      await sleep(backoffMs, this.controller.signal);
    }
  }

  private discover(record: PageRecord, depth: number): void {
    const { maxDepth, followNofollow, followExternal } = this.settings;
    const links = [...record.internalLinks, ...record.externalLinks];
    if (
      (maxDepth !== undefined && depth > maxDepth) ||
      (!followNofollow && record.metaRobots?.toLowerCase().includes("nofollow"))
    ) {
      for (const link of links) this.frontier.reject(link.url);
      return;
    }

    for (const link of record.internalLinks) {
      if (link.nofollow && !followNofollow) {
        this.frontier.reject(link.url);
        continue;
      }
      this.enqueue(link.url, depth, false);
    }

    for (const link of record.externalLinks) {
      if (!followExternal || (link.nofollow && !followNofollow)) {
        this.frontier.reject(link.url);
        continue;
      }
      this.enqueue(link.url, depth, true);
    }
  }


  private enqueue(url: string, depth: number, leaf: boolean): void {
    if (this.settings.respectRobots && extractDomain(url) === this.seedDomain && !isPathAllowed(this.robots, url)) {
      if (this.frontier.reject(url)) {
        this.logger.debug({ url }, "Disallowed by robots.txt");
      }
      return;
    }

    this.frontier.offer({ url, depth, leaf });
  }

  private async finish(): Promise<CrawlOutcome> {
    const pages = [...this.pages];
    const counts = this.frontier.counts();
    const summary = aggregate(this.run, pages);

    const failed = this.failure !== null || this.cancelReason !== null;
    const endedAt = this.now();
    this.run = finalizeRun(
      {
        ...this.run,
        endedAt,
        status: failed ? "failed" : "completed",
        cancelled: this.failure === null && this.cancelReason !== null,
        failureReason: this.failure?.message ?? this.cancelReason,
        totalPages: counts.accepted,
      },
      summary
    );

    const outcome: CrawlOutcome = { run: this.run, pages, summary };
    this.logger.info(
      {
        status: this.run.status,
        crawled: this.run.crawledPages,
        indexable: this.run.indexablePages,
        siteScore: this.run.siteScore,
        durationMs: endedAt.getTime() - this.run.startedAt.getTime(),
      },
      "Crawl finished"
    );

    if (this.options.notifier) {
      try {
        await this.options.notifier.onFinish(outcome);
      } catch (error) {
        this.logger.error({ err: error }, "Crawl notifier failed");
      }
    }

    return outcome;
  }
}

/**
 * Validates `input` and starts a crawl. Invalid settings throw
 * CrawlValidationError before any request is made.
 */
export function runCrawl(input: CrawlSettingsInput, options: CrawlOptions = {}): CrawlHandle {
  const settings = validateCrawlSettings(input);
  return new CrawlScheduler(settings, options).start();
}
