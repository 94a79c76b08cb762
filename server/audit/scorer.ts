import type {
  AuditSummary,
  CrawlRun,
  Issue,
  IssueCategory,
  PageRecord,
  Severity,
  SeverityCounts,
} from "./types";

const TOP_ISSUES_LIMIT = 10;
const CRITICAL_PAGE_PENALTY = 30;
const WARNING_PAGE_PENALTY = 15;

export function emptySeverityCounts(): SeverityCounts {
  return { critical: 0, warning: 0, opportunity: 0, notice: 0 };
}

function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}

function hasSeverity(page: PageRecord, severity: Severity): boolean {
  return page.issues.some((issue) => issue.severity === severity);
}

export function computeSiteScore(pages: PageRecord[]): number {
  const totalPages = pages.length;
  if (totalPages === 0) return 0;

  const indexable = pages.filter((p) => p.indexable);
  const averageScore =
    indexable.length > 0 ? indexable.reduce((sum, p) => sum + p.score, 0) / indexable.length : 0;

  const criticalPages = pages.filter((p) => hasSeverity(p, "critical")).length;
  const warningPages = pages.filter((p) => hasSeverity(p, "warning")).length;
  const penalty =
    (CRITICAL_PAGE_PENALTY * criticalPages) / totalPages + (WARNING_PAGE_PENALTY * warningPages) / totalPages;

  return Math.round(clampScore(averageScore - penalty));
}

/** One entry per category and type, counting the pages it appears on. */
export function groupIssues(pages: PageRecord[]): Issue[] {
  const grouped = new Map<string, Issue>();

  for (const page of pages) {
    const seenOnPage = new Set<string>();
    for (const issue of page.issues) {
      const key = `${issue.category}:${issue.type}`;
      if (seenOnPage.has(key)) continue;
      seenOnPage.add(key);

      const existing = grouped.get(key);
      if (existing) {
        existing.affectedPages++;
      } else {
        grouped.set(key, { ...issue, affectedPages: 1 });
      }
    }
  }

  return Array.from(grouped.values());
}

function pressingRank(severity: Severity): number {
  return severity === "critical" || severity === "warning" ? 1 : 0;
}

/** Critical and warning issues first, then by affected pages. Stable. */
export function rankIssues(issues: Issue[]): Issue[] {
  return [...issues].sort(
    (a, b) => pressingRank(b.severity) - pressingRank(a.severity) || b.affectedPages - a.affectedPages
  );
}

function countInboundLinks(pages: PageRecord[]): Record<string, number> {
  const inbound: Record<string, number> = {};
  for (const page of pages) {
    const targets = new Set(page.internalLinks.map((link) => link.url));
    targets.delete(page.url);
    for (const target of targets) {
      inbound[target] = (inbound[target] ?? 0) + 1;
    }
  }
  return inbound;
}

export function aggregate(run: CrawlRun, pages: PageRecord[]): AuditSummary {
  const issuesCount = emptySeverityCounts();
  const categories: Record<string, Partial<Record<Severity, number>>> = {};

  for (const page of pages) {
    for (const issue of page.issues) {
      issuesCount[issue.severity]++;
      const bySeverity = categories[issue.category] ?? {};
      bySeverity[issue.severity] = (bySeverity[issue.severity] ?? 0) + 1;
      categories[issue.category] = bySeverity;
    }
  }

  const issues = rankIssues(groupIssues(pages));

  return {
    runId: run.id,
    siteScore: computeSiteScore(pages),
    crawledPages: pages.length,
    indexablePages: pages.filter((p) => p.indexable).length,
    issuesCount,
    categories,
    topIssues: issues.slice(0, TOP_ISSUES_LIMIT),
    issues,
    inboundLinks: countInboundLinks(pages),
  };
}

export function finalizeRun(run: CrawlRun, summary: AuditSummary): CrawlRun {
  return {
    ...run,
    crawledPages: summary.crawledPages,
    indexablePages: summary.indexablePages,
    siteScore: summary.siteScore,
    issuesCount: { ...summary.issuesCount },
  };
}

export interface IssueQuery {
  severity?: Severity;
  category?: IssueCategory;
  page?: number;
  pageSize?: number;
}

export interface IssuePage {
  items: Issue[];
  page: number;
  pageSize: number;
  totalItems: number;
  totalPages: number;
}

export function listIssues(summary: AuditSummary, query: IssueQuery = {}): IssuePage {
  const page = Math.max(1, Math.floor(query.page ?? 1));
  const pageSize = Math.max(1, Math.floor(query.pageSize ?? 50));

  const matching = summary.issues.filter(
    (issue) =>
      (!query.severity || issue.severity === query.severity) &&
      (!query.category || issue.category === query.category)
  );

  const start = (page - 1) * pageSize;
  return {
    items: matching.slice(start, start + pageSize),
    page,
    pageSize,
    totalItems: matching.length,
    totalPages: Math.ceil(matching.length / pageSize),
  };
}
