import { describe, it, expect } from "vitest";
import { MemoryCrawlStore } from "./store";
import { runCrawl } from "./audit";
import { emptySeverityCounts } from "./audit/scorer";
import { CrawlSettingsSchema } from "./audit/types";
import type { CrawlRun, Issue, PageRecord } from "./audit/types";
import { FakeFetcher, linksPage } from "./test/fake-fetcher";

const MISSING_H1: Issue = {
  type: "missing_h1",
  severity: "warning",
  category: "headings",
  description: "The page has no H1 heading.",
  affectedPages: 1,
};

function makeRun(id: string, startedAt: Date): CrawlRun {
  return {
    id,
    settings: CrawlSettingsSchema.parse({ url: "https://example.com/" }),
    startedAt,
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

function makePage(url: string, issues: Issue[]): PageRecord {
  return {
    url,
    finalUrl: url,
    statusCode: 200,
    title: "Title of the page",
    metaDescription: null,
    h1: [],
    canonicalUrl: null,
    metaRobots: null,
    contentType: "text/html",
    sizeBytes: 10,
    wordCount: 2,
    indexable: true,
    score: 95,
    internalLinks: [],
    externalLinks: [],
    issues,
    depth: 0,
  };
}

describe("MemoryCrawlStore", () => {
  it("shares one issue record per type within a run", async () => {
    const store = new MemoryCrawlStore();
    const run = makeRun("run-1", new Date("2026-01-01T00:00:00Z"));

    await store.onPage(run, makePage("https://example.com/a", [MISSING_H1]));
    await store.onPage(run, makePage("https://example.com/b", [MISSING_H1]));
    await store.onPage(run, makePage("https://example.com/b", [MISSING_H1]));

    const issues = await store.getIssues("run-1");
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({ runId: "run-1", type: "missing_h1", affectedPages: 2 });
    expect((await store.getPages("run-1")).map((page) => page.url)).toEqual([
      "https://example.com/a",
      "https://example.com/b",
    ]);
  });

  it("keeps the newest runs only", async () => {
    const store = new MemoryCrawlStore();
    for (let i = 0; i < 105; i++) {
      await store.onPage(makeRun(`run-${i}`, new Date(Date.UTC(2026, 0, 1, 0, i))), makePage("https://example.com/", []));
    }

    expect(await store.getRun("run-0")).toBeUndefined();
    expect(await store.getRun("run-5")).toBeDefined();
    expect((await store.listRuns(2)).map((run) => run.id)).toEqual(["run-104", "run-103"]);
  });

  it("records a crawl as its sink and notifier", async () => {
    const store = new MemoryCrawlStore();
    const fetcher = new FakeFetcher({
      "https://example.com/": linksPage("Home page", ["/a"]),
      "https://example.com/a": linksPage("Page A", []),
    });

    const outcome = await runCrawl(
      { url: "https://example.com", respectRobots: false, retries: 0 },
      { fetcher, sink: store, notifier: store }
    ).done;

    expect(await store.getRun(outcome.run.id)).toBe(outcome.run);
    expect(await store.getSummary(outcome.run.id)).toBe(outcome.summary);
    expect(await store.getPages(outcome.run.id)).toHaveLength(2);
    expect(await store.getSummary("unknown")).toBeUndefined();
  });
});
