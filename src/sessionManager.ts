import type { SessionContext, SessionState, SessionTurn } from './types.js';

/**
 * Storage contract for session state. Implementations hand out copies, so a
 * caller never observes another request's half-finished update.
 */
export interface SessionStore {
  get(sessionId: string): Promise<SessionState | undefined>;
  put(state: SessionState): Promise<void>;
  evict(sessionId: string): Promise<void>;
}

export interface MemorySessionStoreOptions {
  ttlMs: number;
  maxSessions: number;
  now?: () => number;
}

/**
 * Process-local store with an idle TTL and a cap on live sessions. Map
 * insertion order doubles as recency order: the first key is the least
 * recently used.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, SessionState>();
  private readonly now: () => number;

  constructor(private readonly options: MemorySessionStoreOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  async get(sessionId: string): Promise<SessionState | undefined> {
    const state = this.sessions.get(sessionId);
    if (!state) return undefined;
    if (this.isExpired(state)) {
      this.sessions.delete(sessionId);
      return undefined;
    }
    this.sessions.delete(sessionId);
    this.sessions.set(sessionId, state);
    return structuredClone(state);
  }

  async put(state: SessionState): Promise<void> {
    this.sessions.delete(state.sessionId);
    this.sessions.set(state.sessionId, structuredClone(state));
    this.sweep();
  }

  async evict(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  private isExpired(state: SessionState): boolean {
    return this.now() - state.lastActivity > this.options.ttlMs;
  }

  private sweep(): void {
    for (const [id, state] of this.sessions) {
      if (this.isExpired(state)) this.sessions.delete(id);
    }
    while (this.sessions.size > this.options.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      this.sessions.delete(oldest.value);
    }
  }
}

/** Serializes async tasks that share a key; tasks on other keys run freely. */
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}

export type RateDecision =
  | { allowed: true; remaining: number; epoch: number }
  | { allowed: false; retryAfterMs: number };

export interface SessionManagerOptions {
  maxTurns: number;
  /** Requests allowed per session within `windowMs`. */
  rateLimit: number;
  windowMs?: number;
  now?: () => number;
}

const DEFAULT_WINDOW_MS = 60_000;

/**
 * Owns conversation memory and the per-session request budget. Every change
 * is a read-modify-write of the whole state under the session's lock.
 */
export class SessionManager {
  private readonly lock = new KeyedLock();
  private epochs = 0;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(private readonly store: SessionStore, private readonly options: SessionManagerOptions) {
    this.windowMs = options.windowMs ?? DEFAULT_WINDOW_MS;
    this.now = options.now ?? Date.now;
  }

  /** Current state; a missing or expired session comes back empty. */
  async get(sessionId: string): Promise<SessionState> {
    return (await this.store.get(sessionId)) ?? this.fresh(sessionId);
  }

  async contextFor(sessionId: string): Promise<SessionContext> {
    const state = await this.get(sessionId);
    return { turns: state.turns.slice(-this.options.maxTurns) };
  }

  /**
   * Sliding-window check. An allowed request is recorded in the same
   * critical section; a refused one leaves the state untouched. The epoch
   * of an allowed request identifies the conversation it belongs to.
   */
  async checkAndRecord(sessionId: string): Promise<RateDecision> {
    return this.lock.run(sessionId, async () => {
      const state = await this.get(sessionId);
      const now = this.now();
      const recent = state.requestTimestamps.filter((ts) => now - ts < this.windowMs);
      if (recent.length >= this.options.rateLimit) {
        return { allowed: false, retryAfterMs: recent[0] + this.windowMs - now };
      }
      recent.push(now);
      await this.store.put({ ...state, requestTimestamps: recent, lastActivity: now });
      return { allowed: true, remaining: this.options.rateLimit - recent.length, epoch: state.epoch };
    });
  }

  /**
   * Appends a turn, dropping the oldest beyond the context limit. A turn
   * tagged with an epoch the session no longer has is discarded: the
   * conversation it belonged to was reset or expired while it ran.
   */
  async append(sessionId: string, turn: SessionTurn, epoch?: number): Promise<SessionState> {
    return this.lock.run(sessionId, async () => {
      const state = await this.get(sessionId);
      if (epoch !== undefined && epoch !== state.epoch) {
        console.warn(`🧹 Session ${sessionId} was reset during the request; its turn is dropped`);
        return state;
      }
      const turns = [...state.turns, turn].slice(-this.options.maxTurns);
      const next: SessionState = { ...state, turns, lastActivity: this.now() };
      await this.store.put(next);
      return next;
    });
  }

  async reset(sessionId: string): Promise<void> {
    await this.lock.run(sessionId, () => this.store.evict(sessionId));
  }

  private fresh(sessionId: string): SessionState {
    const now = this.now();
    return { sessionId, epoch: ++this.epochs, turns: [], requestTimestamps: [], createdAt: now, lastActivity: now };
  }
}
