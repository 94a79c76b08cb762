/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }

    const finish = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", finish);
      resolve();
    };
    const timer = setTimeout(finish, ms);
    signal?.addEventListener("abort", finish, { once: true });
  });
}

/**
 * Spaces requests to the same host at least `delayMs` apart. Slots are
 * reserved synchronously, so concurrent callers queue up behind each other.
 */
export class PolitenessGate {
  private readonly nextSlot = new Map<string, number>();

  constructor(
    private delayMs: number,
    private readonly clock: () => number = Date.now
  ) {}

  get delay(): number {
    return this.delayMs;
  }

  setDelay(delayMs: number): void {
    this.delayMs = Math.max(0, delayMs);
  }

  async wait(host: string, signal?: AbortSignal): Promise<void> {
    if (this.delayMs <= 0) return;

    const now = this.clock();
    const slot = Math.max(now, this.nextSlot.get(host) ?? now);
    this.nextSlot.set(host, slot + this.delayMs);

    await sleep(slot - now, signal);
  }
}
