import { CONFIG, DEBUG } from "../../config";
import { describeCause } from "../errors";
import type { SessionStore } from "./session-store";

export interface SweeperOptions {
  intervalMs?: number;
  now?: () => number;
}

/**
 * Periodically deletes sessions whose TTL has elapsed. A tick never overlaps
 * the previous one.
 */
export class ExpirySweeper {
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<number> | null = null;
  private readonly intervalMs: number;
  private readonly now: () => number;

  constructor(
    private readonly store: SessionStore,
    options: SweeperOptions = {},
  ) {
    this.intervalMs = options.intervalMs ?? CONFIG.SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
  }

  /** One pass over the store. Resolves to the number of sessions removed. */
  tick(): Promise<number> {
    if (!this.running) {
      this.running = this.sweep().finally(() => {
        this.running = null;
      });
    }
    return this.running;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        console.error(`[sweeper] Tick failed: ${describeCause(err)}`);
      });
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  private async sweep(): Promise<number> {
    const now = this.now();
    const stale = this.store
      .list()
      .filter((summary) => this.store.isExpired(summary, now));

    let removed = 0;
    for (const summary of stale) {
      try {
        if (await this.store.deleteIfExpired(summary.id, now)) {
          removed += 1;
          if (DEBUG) console.log(`[sweeper] Expired session ${summary.id}`);
        }
      } catch (err) {
        console.error(
          `[sweeper] Failed to remove session ${summary.id}: ${describeCause(err)}`,
        );
      }
    }
    if (removed > 0) {
      console.log(`[sweeper] Removed ${removed} expired session(s)`);
    }
    return removed;
  }
}
