export type LockMode = "read" | "write";

export type LockHandle = {
  release: () => void;
};

type Waiter = {
  mode: LockMode;
  grant: () => void;
};

type LockState = {
  readers: number;
  writer: boolean;
  queue: Waiter[];
};

/**
 * Reader/writer lock keyed by an arbitrary string (a session id here).
 * Waiters are served in arrival order: a queued writer blocks readers that
 * arrive after it, and consecutive readers at the head of the queue are
 * admitted together. Keys with no holders and no waiters are forgotten.
 */
export class KeyedLock {
  private states = new Map<string, LockState>();

  acquire(key: string, mode: LockMode): Promise<LockHandle> {
    const state = this.stateFor(key);
    if (state.queue.length === 0 && this.canGrant(state, mode)) {
      this.take(state, mode);
      return Promise.resolve(this.handle(key, mode));
    }
    return new Promise((resolve) => {
      state.queue.push({
        mode,
        grant: () => resolve(this.handle(key, mode)),
      });
    });
  }

  acquireWriter(key: string): Promise<LockHandle> {
    return this.acquire(key, "write");
  }

  acquireReader(key: string): Promise<LockHandle> {
    return this.acquire(key, "read");
  }

  /**
   * Runs `fn` while holding the lock, releasing it on every exit path.
   */
  async run<T>(key: string, mode: LockMode, fn: () => Promise<T> | T): Promise<T> {
    const handle = await this.acquire(key, mode);
    try {
      return await fn();
    } finally {
      handle.release();
    }
  }

  isLocked(key: string): boolean {
    const state = this.states.get(key);
    return state !== undefined && (state.writer || state.readers > 0);
  }

  /** Number of keys currently tracked (held or waited on). */
  get size(): number {
    return this.states.size;
  }

  private stateFor(key: string): LockState {
    let state = this.states.get(key);
    if (!state) {
      state = { readers: 0, writer: false, queue: [] };
      this.states.set(key, state);
    }
    return state;
  }

  private canGrant(state: LockState, mode: LockMode): boolean {
    if (mode === "write") return !state.writer && state.readers === 0;
    return !state.writer;
  }

  private take(state: LockState, mode: LockMode): void {
    if (mode === "write") state.writer = true;
    else state.readers += 1;
  }

  private handle(key: string, mode: LockMode): LockHandle {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.releaseOne(key, mode);
      },
    };
  }

  private releaseOne(key: string, mode: LockMode): void {
    const state = this.states.get(key);
    if (!state) return;
    if (mode === "write") state.writer = false;
    else state.readers -= 1;

    while (state.queue.length > 0) {
      const next = state.queue[0];
      if (!this.canGrant(state, next.mode)) break;
      state.queue.shift();
      this.take(state, next.mode);
      next.grant();
      if (next.mode === "write") break;
    }

    if (!state.writer && state.readers === 0 && state.queue.length === 0) {
      this.states.delete(key);
    }
  }
}
