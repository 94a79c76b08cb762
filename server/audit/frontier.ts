export type UrlState = "queued" | "in_flight" | "done" | "rejected";

export interface FrontierEntry {
  url: string;
  depth: number;
  /** Fetched and analyzed, but its links are not followed. */
  leaf: boolean;
}

export type OfferResult = "queued" | "duplicate" | "budget_exhausted" | "closed";

export interface FrontierCounts {
  accepted: number;
  queued: number;
  inFlight: number;
  done: number;
  rejected: number;
}

type Waiter = (entry: FrontierEntry | null) => void;

/**
 * The crawl's single source of truth for which URLs exist. Every URL holds
 * exactly one state, and a check-and-insert never yields to the event loop,
 * so two workers offering the same link cannot both enqueue it.
 *
 * `take()` hands out entries in discovery order. It waits while the queue is
 * empty but fetches are still running (they may discover more), and yields
 * null once nothing is queued or in flight, or after `close()`.
 */
export class Frontier {
  private readonly states = new Map<string, UrlState>();
  private readonly queue: FrontierEntry[] = [];
  private head = 0;
  private waiters: Waiter[] = [];
  private accepted = 0;
  private inFlight = 0;
  private done = 0;
  private rejected = 0;
  private closed = false;

  constructor(private readonly maxPages: number) {}

  offer(entry: FrontierEntry): OfferResult {
    if (this.closed) return "closed";
    if (this.states.has(entry.url)) return "duplicate";

    if (this.accepted >= this.maxPages) {
      this.markRejected(entry.url);
      return "budget_exhausted";
    }

    this.accepted++;
    const waiter = this.waiters.shift();
    if (waiter) {
      this.start(entry);
      waiter(entry);
    } else {
      this.states.set(entry.url, "queued");
      this.queue.push(entry);
    }
    return "queued";
  }

  /** Records a URL that will never be fetched. Known URLs keep their state. */
  reject(url: string): boolean {
    if (this.states.has(url)) return false;
    this.markRejected(url);
    return true;
  }

  take(): Promise<FrontierEntry | null> {
    if (this.closed) return Promise.resolve(null);

    if (this.head < this.queue.length) {
      const entry = this.queue[this.head++];
      this.compact();
      this.start(entry);
      return Promise.resolve(entry);
    }

    if (this.inFlight === 0) return Promise.resolve(null);

    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  complete(url: string): void {
    if (this.states.get(url) !== "in_flight") return;
    this.states.set(url, "done");
    this.inFlight--;
    this.done++;

    if (this.inFlight === 0 && this.head >= this.queue.length) {
      this.release();
    }
  }

  /** Stops handing out work. In-flight entries may still be completed. */
  close(): void {
    this.closed = true;
    this.release();
  }

  stateOf(url: string): UrlState | undefined {
    return this.states.get(url);
  }

  counts(): FrontierCounts {
    return {
      accepted: this.accepted,
      queued: this.closed ? 0 : this.queue.length - this.head,
      inFlight: this.inFlight,
      done: this.done,
      rejected: this.rejected,
    };
  }

  private start(entry: FrontierEntry): void {
    this.states.set(entry.url, "in_flight");
    this.inFlight++;
  }

  private markRejected(url: string): void {
    this.states.set(url, "rejected");
    this.rejected++;
  }

  private release(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(null);
  }

  private compact(): void {
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue.splice(0, this.head);
      this.head = 0;
    }
  }
}
