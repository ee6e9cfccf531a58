import { v4 as uuidv4 } from "uuid";
import { CONFIG } from "../../config";
import { NotFoundError } from "../errors";
import { KeyedLock, type LockMode } from "../utils/lock";
import { releaseContent, type Session, type SessionSummary } from "./types";

export interface SessionStoreOptions {
  ttlMs?: number;
  now?: () => number;
  newId?: () => string;
}

/**
 * Process-lifetime registry of sessions. Starts empty; `close()` drops
 * everything. Other components never keep a `Session` around between calls:
 * they look it up by id inside `withSession`.
 */
export class SessionStore {
  private sessions = new Map<string, Session>();
  private locks = new KeyedLock();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly newId: () => string;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? CONFIG.SESSION_TTL_MS;
    this.now = options.now ?? Date.now;
    this.newId = options.newId ?? uuidv4;
  }

  get ttl(): number {
    return this.ttlMs;
  }

  /**
   * Returns the session for `token`, refreshing its activity, or creates a
   * fresh one when the token is missing, unknown or expired.
   */
  getOrCreate(token?: string | null): Session {
    if (token) {
      const existing = this.lookup(token);
      if (existing) return existing;
    }
    const now = this.now();
    const session: Session = {
      id: this.newId(),
      createdAt: now,
      lastActivityAt: now,
      files: new Map(),
      totalBytes: 0,
    };
    this.sessions.set(session.id, session);
    return session;
  }

  get(token: string): Session {
    const session = this.lookup(token);
    if (!session) throw new NotFoundError("session", token);
    return session;
  }

  has(token: string): boolean {
    return this.sessions.has(token);
  }

  /**
   * Runs `fn` inside the session's scope: `write` is exclusive, `read` is
   * shared with other readers. The session is looked up again once the scope
   * is held, so a session deleted while we waited surfaces as NotFound.
   */
  async withSession<T>(
    token: string,
    mode: LockMode,
    fn: (session: Session) => Promise<T> | T,
  ): Promise<T> {
    this.get(token);
    return this.locks.run(token, mode, async () => {
      const session = this.get(token);
      try {
        return await fn(session);
      } finally {
        session.lastActivityAt = Math.max(session.lastActivityAt, this.now());
      }
    });
  }

  /**
   * Removes the session and releases every record's bytes. Waits for any
   * operation holding the session's scope to finish first.
   */
  async delete(token: string): Promise<boolean> {
    if (!this.sessions.has(token)) return false;
    return this.locks.run(token, "write", () => this.drop(token));
  }

  /**
   * Sweeper path: deletes only if the session is still expired once its scope
   * is held, since activity during the wait pushes expiry back.
   */
  async deleteIfExpired(token: string, now = this.now()): Promise<boolean> {
    if (!this.sessions.has(token)) return false;
    return this.locks.run(token, "write", () => {
      const session = this.sessions.get(token);
      if (!session || !this.isExpired(session, Math.max(now, this.now()))) {
        return false;
      }
      return this.drop(token);
    });
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.values(), (session) => ({
      id: session.id,
      createdAt: session.createdAt,
      lastActivityAt: session.lastActivityAt,
      fileCount: session.files.size,
      totalBytes: session.totalBytes,
    }));
  }

  isExpired(session: Pick<Session, "lastActivityAt">, now = this.now()): boolean {
    return now - session.lastActivityAt >= this.ttlMs;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Drops every session at shutdown. Sessions with an operation in flight are
   * deleted once that operation releases its scope.
   */
  async close(): Promise<void> {
    const ids = Array.from(this.sessions.keys());
    await Promise.all(ids.map((id) => this.delete(id)));
  }

  private lookup(token: string): Session | undefined {
    const session = this.sessions.get(token);
    if (!session) return undefined;
    const now = this.now();
    if (this.isExpired(session, now)) return undefined;
    session.lastActivityAt = now;
    return session;
  }

  private drop(token: string): boolean {
    const session = this.sessions.get(token);
    if (!session) return false;
    this.sessions.delete(token);
    for (const record of session.files.values()) {
      releaseContent(record);
    }
    session.files.clear();
    session.totalBytes = 0;
    return true;
  }
}
