// @vitest-environment node
import { describe, it, expect, afterEach } from "vitest";

import { startChessServer, type ChessAppOpts } from "../server/src/app.ts";
import { EngineTimeoutError } from "./shared/chessErrors.ts";
import { deferred, fakeEngineFactory, preferMoves, sleep, type FakeEngineBehavior } from "./test/fakeEngine.ts";

const START = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

type Started = Awaited<ReturnType<typeof startChessServer>>;

let running: Started | null = null;

afterEach(async () => {
  await running?.close();
  running = null;
});

async function start(behavior?: () => FakeEngineBehavior, opts: ChessAppOpts = {}) {
  const fakes = fakeEngineFactory(behavior);
  running = await startChessServer({
    port: 0,
    requestLog: false,
    sessionSweepMs: 0,
    poolSize: 2,
    poolAcquireTimeoutMs: 1_000,
    sessionBusyPolicy: "reject",
    sessionTtlMs: 60_000,
    engineFactory: fakes.factory,
    ...opts,
  });
  return { s: running, created: fakes.created };
}

async function post(base: string, path: string, body: unknown): Promise<{ status: number; json: any }> {
  const res = await fetch(`${base}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
  return { status: res.status, json: (await res.json()) as any };
}

async function get(base: string, path: string): Promise<{ status: number; json: any }> {
  const res = await fetch(`${base}${path}`);
  return { status: res.status, json: (await res.json()) as any };
}

describe("HTTP endpoints", () => {
  it("plays a move and reports status and PGN", async () => {
    const { s } = await start(() => ({ pick: preferMoves("e7e5") }));

    const created = await post(s.url, "/new_game", {});
    expect(created.status).toBe(200);
    expect(created.json).toMatchObject({ success: true, position: START, phase: "awaiting_human" });
    const sessionId: string = created.json.session_id;

    const moved = await post(s.url, "/move", { session_id: sessionId, move: "e2e4" });
    expect(moved.status).toBe(200);
    expect(moved.json).toMatchObject({
      success: true,
      engine_move: "e7e5",
      history: ["e2e4", "e7e5"],
      status: "Ongoing",
      game_over: false,
    });

    const status = await get(s.url, `/status?session_id=${sessionId}`);
    expect(status.status).toBe(200);
    expect(status.json).toMatchObject({ session_id: sessionId, move_count: 2, side_to_move: "white" });

    const history = await get(s.url, `/history?session_id=${sessionId}`);
    const isoTime = expect.stringMatching(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(history.json.history).toEqual([
      { ply: 1, move: "e2e4", player: "human", timestamp: isoTime },
      { ply: 2, move: "e7e5", player: "engine", timestamp: isoTime },
    ]);

    const pgnRes = await fetch(`${s.url}/pgn?session_id=${sessionId}`);
    expect(pgnRes.status).toBe(200);
    expect(pgnRes.headers.get("content-type")).toContain("text/plain");
    const pgn = await pgnRes.text();
    expect(pgn).toContain('[Result "*"]');
    expect(pgn.endsWith("\n\n1. e4 e5 *\n")).toBe(true);
  });

  it("answers an illegal move with 200 and success false", async () => {
    const { s } = await start();
    const { json } = await post(s.url, "/new_game", {});

    const moved = await post(s.url, "/move", { session_id: json.session_id, move: "e2e5" });
    expect(moved.status).toBe(200);
    expect(moved.json).toEqual({ success: false, error: "Invalid move" });
  });

  it("rejects requests without a session id or move", async () => {
    const { s } = await start();

    const noSession = await post(s.url, "/move", { move: "e2e4" });
    expect(noSession.status).toBe(400);
    expect(noSession.json).toEqual({ success: false, error: "Missing session_id", code: "BAD_REQUEST" });

    const { json } = await post(s.url, "/new_game", {});
    const noMove = await post(s.url, "/move", { session_id: json.session_id });
    expect(noMove.status).toBe(400);
    expect(noMove.json.error).toBe("Move required");
  });

  it("starts a new session when new_game names an expired one", async () => {
    const { s } = await start(undefined, { sessionTtlMs: 40 });
    const { json } = await post(s.url, "/new_game", {});
    await sleep(80);

    const again = await post(s.url, "/new_game", { session_id: json.session_id, depth: 4 });
    expect(again.status).toBe(200);
    expect(again.json.session_id).not.toBe(json.session_id);
    expect(again.json).toMatchObject({ history: [], depth: 4, position: START });
  });

  it("validates request bodies", async () => {
    const { s } = await start();

    const badDepth = await post(s.url, "/new_game", { depth: "hard" });
    expect(badDepth.status).toBe(400);
    expect(badDepth.json).toEqual({ success: false, error: "depth must be a number", code: "BAD_REQUEST" });

    const { json } = await post(s.url, "/new_game", { session_id: "   " });
    expect(json.session_id).toMatch(/^[0-9a-f]{48}$/);

    const blankMove = await post(s.url, "/move", { session_id: json.session_id, move: "  " });
    expect(blankMove.status).toBe(400);
    expect(blankMove.json.error).toBe("Move required");
  });

  it("returns 404 for an unknown session", async () => {
    const { s } = await start();
    const res = await get(s.url, "/status?session_id=not-a-session");
    expect(res.status).toBe(404);
    expect(res.json).toEqual({ success: false, error: "Session not found: not-a-session", code: "SESSION_NOT_FOUND" });
  });

  it("returns 400 for a malformed JSON body", async () => {
    const { s } = await start();
    const res = await fetch(`${s.url}/move`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ success: false, error: "Malformed JSON body", code: "BAD_REQUEST" });
  });

  it("maps engine failures to 500 and keeps the game", async () => {
    const { s } = await start(() => ({ searchError: new EngineTimeoutError("engine-1 bestmove", 1_000) }));
    const { json } = await post(s.url, "/new_game", {});

    const moved = await post(s.url, "/move", { session_id: json.session_id, move: "e2e4" });
    expect(moved.status).toBe(500);
    expect(moved.json).toEqual({
      success: false,
      error: "Engine timeout: engine-1 bestmove (1000ms)",
      code: "ENGINE_TIMEOUT",
    });

    const status = await get(s.url, `/status?session_id=${json.session_id}`);
    expect(status.json.position).toBe(START);
  });

  it("returns 409 while a session is busy", async () => {
    const gate = deferred();
    const { s } = await start(() => ({ gate: gate.promise }));
    const { json } = await post(s.url, "/new_game", {});

    const first = post(s.url, "/move", { session_id: json.session_id, move: "e2e4" });
    await sleep(20);
    const second = await post(s.url, "/move", { session_id: json.session_id, move: "d2d4" });
    expect(second.status).toBe(409);
    expect(second.json.code).toBe("SESSION_BUSY");

    gate.resolve();
    expect((await first).status).toBe(200);
  });

  it("reports a degraded pool with 503 until reset", async () => {
    let failing = true;
    const { s } = await start(() => (failing ? { initError: new Error("engine binary missing") } : {}), {
      maxSpawnFailures: 1,
    });
    const { json } = await post(s.url, "/new_game", {});

    const moved = await post(s.url, "/move", { session_id: json.session_id, move: "e2e4" });
    expect(moved.status).toBe(500);
    expect(moved.json.code).toBe("ENGINE_UNAVAILABLE");

    const refused = await post(s.url, "/new_game", {});
    expect(refused.status).toBe(503);
    expect(refused.json.code).toBe("ENGINE_POOL_DEGRADED");
    expect((await get(s.url, `/status?session_id=${json.session_id}`)).status).toBe(200);
    expect((await get(s.url, "/health")).json.ok).toBe(false);

    failing = false;
    const reset = await post(s.url, "/engine_pool/reset", {});
    expect(reset.status).toBe(200);
    expect(reset.json.pool).toMatchObject({ degraded: false, consecutiveSpawnFailures: 0 });

    expect((await post(s.url, "/move", { session_id: json.session_id, move: "e2e4" })).status).toBe(200);
  });

  it("forgets sessions idle past the TTL", async () => {
    const { s } = await start(undefined, { sessionTtlMs: 40 });
    const { json } = await post(s.url, "/new_game", {});
    expect((await get(s.url, `/status?session_id=${json.session_id}`)).status).toBe(200);

    await sleep(80);
    expect((await get(s.url, `/status?session_id=${json.session_id}`)).status).toBe(404);
  });

  it("releases the engine when the client disconnects", async () => {
    const never = deferred();
    const { s } = await start(() => ({ gate: never.promise }));
    const { json } = await post(s.url, "/new_game", {});

    const controller = new AbortController();
    const pending = fetch(`${s.url}/move`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ session_id: json.session_id, move: "e2e4" }),
      signal: controller.signal,
    });
    await sleep(20);
    controller.abort();
    await expect(pending).rejects.toThrow();
    await sleep(30);

    const health = await get(s.url, "/health");
    expect(health.json.pool).toMatchObject({ busy: 0, idle: 1 });
    expect((await get(s.url, `/status?session_id=${json.session_id}`)).json.history).toEqual([]);
  });

  it("serves undo, resign, difficulty and end_game", async () => {
    const { s } = await start(() => ({ pick: preferMoves("e7e5") }));
    const { json } = await post(s.url, "/new_game", { depth: 2 });
    const session_id: string = json.session_id;
    expect(json.depth).toBe(2);

    const nothing = await post(s.url, "/undo", { session_id });
    expect(nothing.status).toBe(409);
    expect(nothing.json.code).toBe("NOTHING_TO_UNDO");

    await post(s.url, "/move", { session_id, move: "e2e4" });
    const undone = await post(s.url, "/undo", { session_id });
    expect(undone.json).toMatchObject({ history: [], position: START });

    const difficulty = await post(s.url, "/difficulty", { session_id, depth: 42 });
    expect(difficulty.json).toEqual({ success: true, depth: 20 });
    const noDepth = await post(s.url, "/difficulty", { session_id });
    expect(noDepth.status).toBe(400);

    const resigned = await post(s.url, "/resign", { session_id });
    expect(resigned.json).toMatchObject({ status: "Resigned", game_over: true });
    const late = await post(s.url, "/move", { session_id, move: "e2e4" });
    expect(late.status).toBe(409);
    expect(late.json.code).toBe("GAME_OVER");

    const ended = await post(s.url, "/end_game", { session_id });
    expect(ended.json).toEqual({ success: true });
    expect((await get(s.url, `/status?session_id=${session_id}`)).status).toBe(404);
  });
});
