import { bestMove, type UciEngine } from "../../src/bot/uciEngine.ts";
import type { ChessRules, Side } from "../../src/game/chessRules.ts";
import {
  applyMove,
  createInitialGameState,
  isGameOver,
  resign as resignGame,
  undo as undoPly,
  type GameState,
} from "../../src/game/gameState.ts";
import { exportPgn } from "../../src/game/pgn.ts";
import {
  BadRequestError,
  EngineProtocolError,
  GameOverError,
  InvalidMoveError,
  SessionNotFoundError,
} from "../../src/shared/chessErrors.ts";
import type {
  HistoryEntry,
  MoveResponse,
  SessionId,
  SessionPhase,
  SideName,
  StatusView,
} from "../../src/shared/chessProtocol.ts";
import { clampDepth } from "./config.ts";
import type { EnginePool } from "./enginePool.ts";
import type { GameSession, SessionStore } from "./sessionStore.ts";

/** The human always plays White; the engine answers as Black. */
export const HUMAN_SIDE: Side = "w";

export type SessionOrchestratorOpts = {
  rules: ChessRules;
  store: SessionStore;
  pool: EnginePool;
  defaultDepth: number;
  engineTimeoutMs: number;
  /** Shown in PGN headers. */
  siteName?: string;
  /** Stamps each ply; defaults to the wall clock. */
  clock?: () => Date;
};

function sideName(side: Side): SideName {
  return side === "w" ? "white" : "black";
}

function phaseFor(state: GameState): SessionPhase {
  if (isGameOver(state)) return "game_over";
  return state.sideToMove === HUMAN_SIDE ? "awaiting_human" : "engine_turn";
}

export class SessionOrchestrator {
  private readonly rules: ChessRules;
  private readonly store: SessionStore;
  private readonly pool: EnginePool;
  private readonly defaultDepth: number;
  private readonly engineTimeoutMs: number;
  private readonly siteName: string;
  private readonly clock: () => Date;

  constructor(opts: SessionOrchestratorOpts) {
    this.rules = opts.rules;
    this.store = opts.store;
    this.pool = opts.pool;
    this.defaultDepth = clampDepth(opts.defaultDepth);
    this.engineTimeoutMs = opts.engineTimeoutMs;
    this.siteName = opts.siteName ?? "chess-session-server";
    this.clock = opts.clock ?? (() => new Date());
  }

  async newGame(req: { sessionId?: SessionId; depth?: number } = {}): Promise<StatusView> {
    this.pool.assertAccepting();

    // An unknown or expired id gets a fresh session with a new id.
    const existing = req.sessionId === undefined ? null : this.store.get(req.sessionId);
    if (existing) {
      return existing.lock.run(async () => {
        existing.state = createInitialGameState(this.rules);
        existing.phase = phaseFor(existing.state);
        if (req.depth !== undefined) existing.depth = clampDepth(req.depth, existing.depth);
        this.touch(existing);
        return this.view(existing);
      });
    }

    const depth = req.depth === undefined ? this.defaultDepth : clampDepth(req.depth, this.defaultDepth);
    const session = this.store.create(createInitialGameState(this.rules), depth);
    return this.view(session);
  }

  /**
   * Applies the human move and, unless that ends the game, the engine's reply.
   * Both are built on a candidate state that is committed only when every step
   * succeeds, so a failed engine call leaves the session exactly as it was.
   */
  async submitMove(sessionId: SessionId, move: string, opts: { signal?: AbortSignal } = {}): Promise<MoveResponse> {
    const session = this.require(sessionId);
    return session.lock.run<MoveResponse>(async () => {
      this.touch(session);
      const current = session.state;
      if (isGameOver(current)) throw new GameOverError();
      if (current.sideToMove !== HUMAN_SIDE) throw new BadRequestError("Not the human side's turn");

      let candidate: GameState;
      try {
        candidate = applyMove(this.rules, current, move, this.clock());
      } catch (err) {
        if (err instanceof InvalidMoveError) return { success: false, error: "Invalid move" };
        throw err;
      }

      let engineMove: string | null = null;
      if (!isGameOver(candidate)) {
        session.phase = "engine_turn";
        try {
          engineMove = await this.computeEngineMove(session, candidate, opts.signal);
          candidate = this.applyEngineMove(candidate, engineMove);
        } finally {
          session.phase = phaseFor(session.state);
        }
      }

      session.state = candidate;
      session.phase = phaseFor(candidate);
      this.touch(session);
      return {
        success: true,
        position: candidate.position,
        status: candidate.status,
        ...(candidate.drawReason ? { draw_reason: candidate.drawReason } : {}),
        engine_move: engineMove,
        history: [...candidate.history],
        side_to_move: sideName(candidate.sideToMove),
        in_check: candidate.inCheck,
        game_over: isGameOver(candidate),
      };
    });
  }

  /** Read-only; served even while the engine pool is degraded. */
  status(sessionId: SessionId): StatusView {
    const session = this.require(sessionId);
    this.touch(session);
    return this.view(session);
  }

  history(sessionId: SessionId): HistoryEntry[] {
    const session = this.require(sessionId);
    this.touch(session);
    const whiteFirst = session.state.initialPosition.split(/\s+/)[1] !== "b";
    return session.state.history.map((move, i) => {
      const side: Side = (i % 2 === 0) === whiteFirst ? "w" : "b";
      return {
        ply: i + 1,
        move,
        player: side === HUMAN_SIDE ? "human" : "engine",
        timestamp: session.state.playedAt[i] ?? "",
      };
    });
  }

  /** Takes back the engine's reply and the human move before it, so the human is to move again. */
  async undo(sessionId: SessionId): Promise<StatusView> {
    const session = this.require(sessionId);
    return session.lock.run(async () => {
      this.touch(session);
      if (session.state.status === "Resigned") throw new GameOverError("Cannot undo after resignation");

      let next = undoPly(this.rules, session.state);
      if (next.sideToMove !== HUMAN_SIDE && next.history.length > 0) next = undoPly(this.rules, next);

      session.state = next;
      session.phase = phaseFor(next);
      return this.view(session);
    });
  }

  async resign(sessionId: SessionId): Promise<StatusView> {
    const session = this.require(sessionId);
    return session.lock.run(async () => {
      this.touch(session);
      session.state = resignGame(session.state, HUMAN_SIDE);
      session.phase = "game_over";
      return this.view(session);
    });
  }

  async setDifficulty(sessionId: SessionId, depth: unknown): Promise<number> {
    const session = this.require(sessionId);
    return session.lock.run(async () => {
      this.touch(session);
      session.depth = clampDepth(depth, session.depth);
      return session.depth;
    });
  }

  pgn(sessionId: SessionId): string {
    const session = this.require(sessionId);
    this.touch(session);
    return exportPgn(this.rules, session.state, {
      event: "Casual game",
      site: this.siteName,
      date: new Date(session.createdAtMs),
      white: "Human",
      black: `Engine (depth ${session.depth})`,
    });
  }

  endGame(sessionId: SessionId): void {
    if (!this.store.delete(sessionId)) throw new SessionNotFoundError(sessionId);
  }

  private require(sessionId: SessionId): GameSession {
    const session = this.store.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private touch(session: GameSession): void {
    this.store.touch(session.sessionId);
  }

  private async computeEngineMove(session: GameSession, state: GameState, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal?.aborted) controller.abort();
    else signal?.addEventListener("abort", onAbort, { once: true });
    session.inflight = controller;

    let engine: UciEngine | null = null;
    try {
      engine = await this.pool.acquire({ signal: controller.signal });
      return await bestMove(engine, {
        fen: state.position,
        depth: session.depth,
        timeoutMs: this.engineTimeoutMs,
        signal: controller.signal,
      });
    } finally {
      if (engine) this.pool.release(engine);
      signal?.removeEventListener("abort", onAbort);
      if (session.inflight === controller) session.inflight = null;
    }
  }

  private applyEngineMove(state: GameState, move: string): GameState {
    try {
      return applyMove(this.rules, state, move, this.clock());
    } catch (err) {
      if (err instanceof InvalidMoveError) {
        throw new EngineProtocolError(`Engine proposed an illegal move: ${move}`);
      }
      throw err;
    }
  }

  private view(session: GameSession): StatusView {
    const s = session.state;
    return {
      success: true,
      session_id: session.sessionId,
      position: s.position,
      history: [...s.history],
      status: s.status,
      ...(s.drawReason ? { draw_reason: s.drawReason } : {}),
      side_to_move: sideName(s.sideToMove),
      in_check: s.inCheck,
      game_over: isGameOver(s),
      phase: session.phase,
      depth: session.depth,
      legal_moves: isGameOver(s) ? [] : this.rules.legalMoves(s.position),
      move_count: s.history.length,
      created_at: new Date(session.createdAtMs).toISOString(),
      last_active_at: new Date(session.lastActiveAtMs).toISOString(),
    };
  }
}
