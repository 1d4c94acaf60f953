import { randomBytes } from "node:crypto";

import type { GameState } from "../../src/game/gameState.ts";
import type { SessionId, SessionPhase } from "../../src/shared/chessProtocol.ts";
import type { SessionBusyPolicy } from "./config.ts";
import { SessionLock } from "./sessionLock.ts";

export type GameSession = {
  readonly sessionId: SessionId;
  readonly createdAtMs: number;
  lastActiveAtMs: number;
  state: GameState;
  phase: SessionPhase;
  /** Engine search depth for this game. */
  depth: number;
  readonly lock: SessionLock;
  /** Engine work running for this session; aborted when the session goes away. */
  inflight: AbortController | null;
};

export type SessionStoreOpts = {
  ttlMs: number;
  busyPolicy: SessionBusyPolicy;
};

/** 24 random bytes, hex encoded: unguessable and safe in URLs. */
export function newSessionId(): SessionId {
  return randomBytes(24).toString("hex");
}

export class SessionStore {
  private sessions = new Map<SessionId, GameSession>();
  private sweeper: NodeJS.Timeout | null = null;

  constructor(private readonly opts: SessionStoreOpts) {}

  get size(): number {
    return this.sessions.size;
  }

  get ttlMs(): number {
    return this.opts.ttlMs;
  }

  create(state: GameState, depth: number, nowMs = Date.now()): GameSession {
    const session: GameSession = {
      sessionId: newSessionId(),
      createdAtMs: nowMs,
      lastActiveAtMs: nowMs,
      state,
      phase: "awaiting_human",
      depth,
      lock: new SessionLock(this.opts.busyPolicy),
      inflight: null,
    };
    this.sessions.set(session.sessionId, session);
    return session;
  }

  /** Sessions idle past the TTL read as missing even before the sweeper removes them. */
  get(sessionId: SessionId, nowMs = Date.now()): GameSession | null {
    const s = this.sessions.get(sessionId) ?? null;
    if (!s) return null;
    if (this.isExpired(s, nowMs)) {
      this.delete(sessionId);
      return null;
    }
    return s;
  }

  touch(sessionId: SessionId, nowMs = Date.now()): boolean {
    const s = this.sessions.get(sessionId);
    if (!s) return false;
    s.lastActiveAtMs = Math.max(s.lastActiveAtMs, nowMs);
    return true;
  }

  delete(sessionId: SessionId): boolean {
    const s = this.sessions.get(sessionId);
    if (!s) return false;
    this.sessions.delete(sessionId);
    s.inflight?.abort();
    return true;
  }

  evictIdle(ttlMs = this.opts.ttlMs, nowMs = Date.now()): SessionId[] {
    const evicted: SessionId[] = [];
    for (const s of this.sessions.values()) {
      if (nowMs - s.lastActiveAtMs > ttlMs) evicted.push(s.sessionId);
    }
    for (const id of evicted) this.delete(id);
    return evicted;
  }

  startSweeper(intervalMs: number): void {
    if (this.sweeper || intervalMs <= 0) return;
    this.sweeper = setInterval(() => {
      const evicted = this.evictIdle();
      if (evicted.length > 0) {
        // eslint-disable-next-line no-console
        console.log(`[chess-server] evicted ${evicted.length} idle session(s)`);
      }
    }, intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (!this.sweeper) return;
    clearInterval(this.sweeper);
    this.sweeper = null;
  }

  clear(): void {
    for (const id of Array.from(this.sessions.keys())) this.delete(id);
  }

  private isExpired(s: GameSession, nowMs: number): boolean {
    return nowMs - s.lastActiveAtMs > this.opts.ttlMs;
  }
}
