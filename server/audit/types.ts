import { z } from "zod";

export const DEFAULT_USER_AGENT = "site-audit-crawler/1.0 (+https://example.com/bot)";

export const CrawlSettingsSchema = z.object({
  url: z.string().min(1),
  maxPages: z.number().int().positive().default(500),
  maxConcurrentFetches: z.number().int().positive().default(5),
  timeoutMs: z.number().int().positive().default(30000),
  userAgent: z.string().min(1).default(DEFAULT_USER_AGENT),
  respectRobots: z.boolean().default(true),
  followExternal: z.boolean().default(false),
  followNofollow: z.boolean().default(false),
  maxDepth: z.number().int().positive().optional(),
  requestDelayMs: z.number().int().nonnegative().default(0),
  retries: z.number().int().nonnegative().default(1),
  retryBackoffMs: z.number().int().nonnegative().default(500),
  blockPrivateNetworks: z.boolean().default(true),
});

export type CrawlSettingsInput = z.input<typeof CrawlSettingsSchema>;

/** Validated settings; `url` holds the normalized seed once a run is built. */
export type CrawlSettings = Readonly<z.infer<typeof CrawlSettingsSchema>>;

export type Severity = "critical" | "warning" | "opportunity" | "notice";

export type IssueCategory = "crawlability" | "meta_tags" | "headings";

export type IssueType =
  | "fetch_error"
  | "timeout"
  | `http_error:${number}`
  | "not_html"
  | "parse_error"
  | "missing_title"
  | "title_too_short"
  | "title_too_long"
  | "missing_meta_description"
  | "meta_description_too_short"
  | "meta_description_too_long"
  | "missing_h1"
  | "multiple_h1";

export interface Issue {
  type: IssueType;
  severity: Severity;
  category: IssueCategory;
  description: string;
  /** 1 on a page record; the number of affected pages once aggregated. */
  affectedPages: number;
}

export interface LinkRecord {
  url: string;
  text: string;
  nofollow: boolean;
}

export interface PageRecord {
  url: string;
  finalUrl: string;
  statusCode: number;
  title: string | null;
  metaDescription: string | null;
  h1: string[];
  canonicalUrl: string | null;
  metaRobots: string | null;
  contentType: string | null;
  sizeBytes: number;
  wordCount: number;
  indexable: boolean;
  score: number;
  internalLinks: LinkRecord[];
  externalLinks: LinkRecord[];
  issues: Issue[];
  depth: number;
}

export type FetchResult =
  | {
      kind: "success";
      status: number;
      headers: Record<string, string>;
      body: string;
      finalUrl: string;
    }
  | { kind: "timeout" }
  | { kind: "network_error"; detail: string };

export interface FetchRequest {
  timeoutMs: number;
  userAgent: string;
  blockPrivateNetworks?: boolean;
  signal?: AbortSignal;
}

export interface PageFetcher {
  fetch(url: string, request: FetchRequest): Promise<FetchResult>;
}

export type CrawlRunStatus = "in_progress" | "completed" | "failed";

export type SeverityCounts = Record<Severity, number>;

export interface CrawlRun {
  id: string;
  settings: CrawlSettings;
  startedAt: Date;
  endedAt: Date | null;
  status: CrawlRunStatus;
  cancelled: boolean;
  failureReason: string | null;
  totalPages: number;
  crawledPages: number;
  indexablePages: number;
  siteScore: number | null;
  issuesCount: SeverityCounts;
}

export interface AuditSummary {
  runId: string;
  siteScore: number;
  crawledPages: number;
  indexablePages: number;
  issuesCount: SeverityCounts;
  categories: Record<string, Partial<Record<Severity, number>>>;
  topIssues: Issue[];
  issues: Issue[];
  inboundLinks: Record<string, number>;
}

export interface CrawlOutcome {
  run: CrawlRun;
  pages: PageRecord[];
  summary: AuditSummary;
}

export interface CrawlProgress {
  status: CrawlRunStatus;
  queued: number;
  inFlight: number;
  done: number;
  rejected: number;
  crawledPages: number;
  progressPercentage: number | null;
}

/** Persistence collaborator. A throw fails the run. */
export interface PageSink {
  onPage(run: CrawlRun, page: PageRecord): Promise<void> | void;
}

/** Notification collaborator, called once per run on its terminal state. */
export interface CrawlNotifier {
  onFinish(outcome: CrawlOutcome): Promise<void> | void;
}

export interface MetaChange {
  field: "title" | "meta_description" | "h1";
  oldValue: string | null;
  newValue: string;
}

export interface ContentChange {
  oldWordCount: number;
  newWordCount: number;
  changePercentage: number;
}

export interface StatusChange {
  oldStatus: number;
  newStatus: number;
  error?: string;
}

export interface MonitoringDiff {
  url: string;
  contentChange: ContentChange | null;
  metaChanges: MetaChange[];
  statusChange: StatusChange | null;
}

export type SiteStatus = "up" | "issues" | "down";

export interface MonitoringCheck {
  checkedAt: Date;
  status: SiteStatus;
  totalPages: number;
  changedPages: number;
  diffs: MonitoringDiff[];
}
