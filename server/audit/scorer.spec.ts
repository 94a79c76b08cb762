import { describe, it, expect } from "vitest";
import { aggregate, computeSiteScore, emptySeverityCounts, finalizeRun, groupIssues, listIssues } from "./scorer";
import type { CrawlRun, Issue, PageRecord } from "./types";
import { CrawlSettingsSchema } from "./types";

const RUN: CrawlRun = {
  id: "run-1",
  settings: CrawlSettingsSchema.parse({ url: "https://example.com/" }),
  startedAt: new Date("2026-01-01T00:00:00Z"),
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

const MISSING_TITLE: Issue = {
  type: "missing_title",
  severity: "critical",
  category: "meta_tags",
  description: "The page has no title tag.",
  affectedPages: 1,
};

const MISSING_H1: Issue = {
  type: "missing_h1",
  severity: "warning",
  category: "headings",
  description: "The page has no H1 heading.",
  affectedPages: 1,
};

const SHORT_META: Issue = {
  type: "meta_description_too_short",
  severity: "notice",
  category: "meta_tags",
  description: "The meta description is shorter than 50 characters.",
  affectedPages: 1,
};

function makePage(url: string, overrides: Partial<PageRecord> = {}): PageRecord {
  return {
    url,
    finalUrl: url,
    statusCode: 200,
    title: "A page title",
    metaDescription: null,
    h1: [],
    canonicalUrl: null,
    metaRobots: null,
    contentType: "text/html",
    sizeBytes: 100,
    wordCount: 10,
    indexable: true,
    score: 100,
    internalLinks: [],
    externalLinks: [],
    issues: [],
    depth: 0,
    ...overrides,
  };
}

describe("computeSiteScore", () => {
  it("subtracts the critical and warning page shares from the average", () => {
    const pages = Array.from({ length: 10 }, (_, i) => {
      const issues = i < 2 ? [MISSING_TITLE] : i < 5 ? [MISSING_H1] : [];
      return makePage(`https://example.com/p${i}`, { score: 80, issues });
    });

    expect(computeSiteScore(pages)).toBe(70);
  });

  it("is zero without pages", () => {
    expect(computeSiteScore([])).toBe(0);
  });

  it("averages indexable pages only and clamps at zero", () => {
    const pages = [
      makePage("https://example.com/a", { score: 90 }),
      makePage("https://example.com/b", { score: 10, indexable: false }),
    ];
    expect(computeSiteScore(pages)).toBe(90);

    const broken = [makePage("https://example.com/x", { score: 0, indexable: false, issues: [MISSING_TITLE] })];
    expect(computeSiteScore(broken)).toBe(0);
  });
});

describe("groupIssues", () => {
  it("counts each issue type once per page", () => {
    const pages = [
      makePage("https://example.com/a", { issues: [MISSING_TITLE, MISSING_H1] }),
      makePage("https://example.com/b", { issues: [MISSING_H1] }),
      makePage("https://example.com/c", { issues: [MISSING_H1, MISSING_H1] }),
    ];

    expect(groupIssues(pages).map((issue) => [issue.type, issue.affectedPages])).toEqual([
      ["missing_title", 1],
      ["missing_h1", 3],
    ]);
  });
});

describe("aggregate", () => {
  const pages = [
    makePage("https://example.com/", {
      issues: [SHORT_META, MISSING_H1],
      internalLinks: [
        { url: "https://example.com/a", text: "A", nofollow: false },
        { url: "https://example.com/a", text: "A again", nofollow: false },
        { url: "https://example.com/", text: "Home", nofollow: false },
      ],
    }),
    makePage("https://example.com/a", {
      issues: [SHORT_META, MISSING_TITLE],
      indexable: false,
      internalLinks: [{ url: "https://example.com/", text: "Home", nofollow: false }],
    }),
    makePage("https://example.com/b", { issues: [SHORT_META] }),
  ];

  it("rolls up issues by severity and category", () => {
    const summary = aggregate(RUN, pages);

    expect(summary.runId).toBe("run-1");
    expect(summary.crawledPages).toBe(3);
    expect(summary.indexablePages).toBe(2);
    expect(summary.issuesCount).toEqual({ critical: 1, warning: 1, opportunity: 0, notice: 3 });
    expect(summary.categories).toEqual({
      meta_tags: { notice: 3, critical: 1 },
      headings: { warning: 1 },
    });
  });

  it("ranks pressing issues first, then by affected pages, keeping first-seen order on ties", () => {
    const summary = aggregate(RUN, pages);

    expect(summary.topIssues.map((issue) => [issue.type, issue.affectedPages])).toEqual([
      ["missing_h1", 1],
      ["missing_title", 1],
      ["meta_description_too_short", 3],
    ]);
  });

  it("counts distinct linking pages per target", () => {
    expect(aggregate(RUN, pages).inboundLinks).toEqual({
      "https://example.com/a": 1,
      "https://example.com/": 1,
    });
  });

  it("caps the top issues at ten", () => {
    const many = Array.from({ length: 12 }, (_, i) =>
      makePage(`https://example.com/e${i}`, {
        issues: [{ ...MISSING_TITLE, type: `http_error:${500 + i}`, category: "crawlability" }],
      })
    );

    const summary = aggregate(RUN, many);
    expect(summary.issues).toHaveLength(12);
    expect(summary.topIssues).toHaveLength(10);
  });
});

describe("finalizeRun", () => {
  it("copies the totals onto the run", () => {
    const summary = aggregate(RUN, [makePage("https://example.com/", { issues: [MISSING_H1], score: 95 })]);

    const run = finalizeRun(RUN, summary);

    expect(run.siteScore).toBe(80);
    expect(run.crawledPages).toBe(1);
    expect(run.indexablePages).toBe(1);
    expect(run.issuesCount).toEqual({ critical: 0, warning: 1, opportunity: 0, notice: 0 });
    expect(RUN.siteScore).toBeNull();
  });
});

describe("listIssues", () => {
  const summary = aggregate(
    RUN,
    Array.from({ length: 5 }, (_, i) =>
      makePage(`https://example.com/e${i}`, {
        issues: [{ ...MISSING_TITLE, type: `http_error:${400 + i}`, category: "crawlability" }, SHORT_META],
      })
    )
  );

  it("filters by severity and category", () => {
    expect(listIssues(summary, { severity: "notice" }).items.map((issue) => issue.type)).toEqual([
      "meta_description_too_short",
    ]);
    expect(listIssues(summary, { category: "crawlability" }).totalItems).toBe(5);
  });

  it("paginates the ranked list", () => {
    const second = listIssues(summary, { page: 2, pageSize: 2 });

    expect(second.items.map((issue) => issue.type)).toEqual(["http_error:402", "http_error:403"]);
    expect(second).toMatchObject({ page: 2, pageSize: 2, totalItems: 6, totalPages: 3 });
  });
});
