import { describe, it, expect } from "vitest";

import { SessionStore, newSessionId } from "../server/src/sessionStore.ts";
import { ChessJsRules } from "./game/chessRules.ts";
import { createInitialGameState } from "./game/gameState.ts";

const rules = new ChessJsRules();

function storeWithTtl(ttlMs: number): SessionStore {
  return new SessionStore({ ttlMs, busyPolicy: "reject" });
}

describe("newSessionId", () => {
  it("produces distinct 48-character hex ids", () => {
    const ids = new Set(Array.from({ length: 200 }, () => newSessionId()));
    expect(ids.size).toBe(200);
    for (const id of ids) expect(id).toMatch(/^[0-9a-f]{48}$/);
  });
});

describe("SessionStore", () => {
  it("creates sessions waiting for the human", () => {
    const store = storeWithTtl(1_000);
    const s = store.create(createInitialGameState(rules), 4, 5_000);

    expect(store.get(s.sessionId, 5_000)).toBe(s);
    expect(s).toMatchObject({ createdAtMs: 5_000, lastActiveAtMs: 5_000, phase: "awaiting_human", depth: 4 });
    expect(s.inflight).toBeNull();
    expect(store.size).toBe(1);
  });

  it("treats a session idle past the TTL as gone", () => {
    const store = storeWithTtl(100);
    const s = store.create(createInitialGameState(rules), 1, 1_000);

    expect(store.get(s.sessionId, 1_100)).toBe(s);
    expect(store.get(s.sessionId, 1_101)).toBeNull();
    expect(store.size).toBe(0);
  });

  it("extends the lifetime on touch", () => {
    const store = storeWithTtl(100);
    const s = store.create(createInitialGameState(rules), 1, 1_000);

    expect(store.touch(s.sessionId, 1_080)).toBe(true);
    expect(store.get(s.sessionId, 1_150)).toBe(s);
    expect(store.touch("no-such-session", 1_100)).toBe(false);
  });

  it("evicts idle sessions and aborts their engine work", () => {
    const store = storeWithTtl(100);
    const idle = store.create(createInitialGameState(rules), 1, 1_000);
    const active = store.create(createInitialGameState(rules), 1, 1_000);
    const inflight = new AbortController();
    idle.inflight = inflight;
    store.touch(active.sessionId, 1_150);

    expect(store.evictIdle(100, 1_200)).toEqual([idle.sessionId]);
    expect(inflight.signal.aborted).toBe(true);
    expect(store.size).toBe(1);
    expect(store.get(active.sessionId, 1_200)).toBe(active);
  });

  it("deletes and clears", () => {
    const store = storeWithTtl(1_000);
    const a = store.create(createInitialGameState(rules), 1);
    store.create(createInitialGameState(rules), 1);

    expect(store.delete(a.sessionId)).toBe(true);
    expect(store.delete(a.sessionId)).toBe(false);
    store.clear();
    expect(store.size).toBe(0);
  });
});
