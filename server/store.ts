import { randomUUID } from "crypto";
import type {
  AuditSummary,
  CrawlNotifier,
  CrawlOutcome,
  CrawlRun,
  Issue,
  PageRecord,
  PageSink,
} from "./audit/types";

const MAX_STORED_RUNS = 100;

export interface StoredIssue extends Issue {
  id: string;
  runId: string;
}

/**
 * Persistence side of a crawl. Receives pages while the run is going and
 * the outcome once it ends; issue records are shared per category and type
 * within a run, counting the pages they affect.
 */
export interface CrawlStore extends PageSink, CrawlNotifier {
  getRun(runId: string): Promise<CrawlRun | undefined>;
  listRuns(limit?: number): Promise<CrawlRun[]>;
  getPages(runId: string): Promise<PageRecord[]>;
  getIssues(runId: string): Promise<StoredIssue[]>;
  getSummary(runId: string): Promise<AuditSummary | undefined>;
}

interface RunEntry {
  run: CrawlRun;
  pages: Map<string, PageRecord>;
  issues: Map<string, StoredIssue>;
  summary: AuditSummary | null;
}

export class MemoryCrawlStore implements CrawlStore {
  private runs: Map<string, RunEntry> = new Map();

  async onPage(run: CrawlRun, page: PageRecord): Promise<void> {
    const entry = this.entryFor(run);
    if (entry.pages.has(page.url)) return;
    entry.pages.set(page.url, page);

    for (const issue of page.issues) {
      const key = `${issue.category}:${issue.type}`;
      const existing = entry.issues.get(key);
      if (existing) {
        existing.affectedPages += 1;
      } else {
        entry.issues.set(key, { ...issue, id: randomUUID(), runId: run.id, affectedPages: 1 });
      }
    }
  }

  async onFinish(outcome: CrawlOutcome): Promise<void> {
    const entry = this.entryFor(outcome.run);
    entry.run = outcome.run;
    entry.summary = outcome.summary;
  }

  async getRun(runId: string): Promise<CrawlRun | undefined> {
    return this.runs.get(runId)?.run;
  }

  async listRuns(limit = 20): Promise<CrawlRun[]> {
    return Array.from(this.runs.values())
      .map((entry) => entry.run)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit);
  }

  async getPages(runId: string): Promise<PageRecord[]> {
    return Array.from(this.runs.get(runId)?.pages.values() ?? []);
  }

  async getIssues(runId: string): Promise<StoredIssue[]> {
    return Array.from(this.runs.get(runId)?.issues.values() ?? []);
  }

  async getSummary(runId: string): Promise<AuditSummary | undefined> {
    return this.runs.get(runId)?.summary ?? undefined;
  }

  private entryFor(run: CrawlRun): RunEntry {
    const existing = this.runs.get(run.id);
    if (existing) return existing;

    const entry: RunEntry = { run, pages: new Map(), issues: new Map(), summary: null };
    this.runs.set(run.id, entry);

    // Oldest runs go first once the store is full
    while (this.runs.size > MAX_STORED_RUNS) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
    }
    return entry;
  }
}
