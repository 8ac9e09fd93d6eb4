import crypto from "crypto";
import type { SearchSession } from "../collector/session.js";

export type SessionStoreOptions = {
  maxSessions: number;
  idleMs: number;
  clock?: () => number;
};

type Entry = { session: SearchSession; lastUsed: number };

/**
 * Sessions by id, least recently used first. Idle sessions expire on access
 * and the oldest is evicted once the store is full.
 */
export class SessionStore {
  private readonly entries = new Map<string, Entry>();
  private readonly clock: () => number;

  constructor(private readonly options: SessionStoreOptions) {
    if (!Number.isInteger(options.maxSessions) || options.maxSessions <= 0) {
      throw new RangeError(`maxSessions must be a positive integer, got ${options.maxSessions}`);
    }
    this.clock = options.clock ?? Date.now;
  }

  get size() {
    this.expire();
    return this.entries.size;
  }

  create(session: SearchSession) {
    this.expire();
    while (this.entries.size >= this.options.maxSessions) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    const id = crypto.randomUUID();
    this.entries.set(id, { session, lastUsed: this.clock() });
    return id;
  }

  get(id: string) {
    this.expire();
    const entry = this.entries.get(id);
    if (!entry) return undefined;
    // Re-insert so Map order stays least recently used first.
    this.entries.delete(id);
    entry.lastUsed = this.clock();
    this.entries.set(id, entry);
    return entry.session;
  }

  delete(id: string) {
    return this.entries.delete(id);
  }

  private expire() {
    const cutoff = this.clock() - this.options.idleMs;
    for (const [id, entry] of this.entries) {
      if (entry.lastUsed > cutoff) break;
      this.entries.delete(id);
    }
  }
}
