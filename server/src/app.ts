import express from "express";
import cors from "cors";
import { createServer, type Server } from "node:http";

import { UciProcessEngine } from "../../src/bot/uciProcessEngine.ts";
import { ChessJsRules, type ChessRules } from "../../src/game/chessRules.ts";
import {
  BadRequestError,
  ChessServiceError,
  errorMessage,
  type ErrorCode,
} from "../../src/shared/chessErrors.ts";
import type {
  DifficultyRequest,
  DifficultyResponse,
  ErrorResponse,
  HistoryResponse,
  MoveRequest,
  NewGameRequest,
  NewGameResponse,
  SessionRequest,
} from "../../src/shared/chessProtocol.ts";
import { loadConfig, type ServerConfig } from "./config.ts";
import { EnginePool, type EngineFactory } from "./enginePool.ts";
import { SessionOrchestrator } from "./sessionOrchestrator.ts";
import { SessionStore } from "./sessionStore.ts";

export type ChessAppOpts = Partial<ServerConfig> & {
  /** Replaces the subprocess engine, e.g. with an in-process fake. */
  engineFactory?: EngineFactory;
  rules?: ChessRules;
};

export type ChessApp = {
  app: express.Express;
  orchestrator: SessionOrchestrator;
  pool: EnginePool;
  store: SessionStore;
  config: ServerConfig;
  shutdown: () => void;
};

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  INVALID_MOVE: 200,
  BAD_REQUEST: 400,
  SESSION_NOT_FOUND: 404,
  SESSION_BUSY: 409,
  GAME_OVER: 409,
  NOTHING_TO_UNDO: 409,
  REQUEST_ABORTED: 499,
  ENGINE_TIMEOUT: 500,
  ENGINE_UNAVAILABLE: 500,
  ENGINE_PROTOCOL: 500,
  POOL_TIMEOUT: 500,
  ENGINE_POOL_DEGRADED: 503,
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function bodyOf(req: express.Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

function requireSessionId(req: express.Request): string {
  const fromBody = bodyOf(req).session_id;
  const fromQuery = req.query.session_id;
  const id = typeof fromBody === "string" ? fromBody : typeof fromQuery === "string" ? fromQuery : "";
  if (!id.trim()) throw new BadRequestError("Missing session_id");
  return id.trim();
}

function optionalDepth(raw: unknown): number | undefined {
  if (raw === undefined || raw === null) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new BadRequestError("depth must be a number");
  return n;
}

function sessionRequest(req: express.Request): SessionRequest {
  return { session_id: requireSessionId(req) };
}

function newGameRequest(req: express.Request): NewGameRequest {
  const body = bodyOf(req);
  const rawId = body.session_id;
  const depth = optionalDepth(body.depth);
  return {
    ...(typeof rawId === "string" && rawId.trim() ? { session_id: rawId.trim() } : {}),
    ...(depth !== undefined ? { depth } : {}),
  };
}

function moveRequest(req: express.Request): MoveRequest {
  const session_id = requireSessionId(req);
  const move = bodyOf(req).move;
  if (typeof move !== "string" || !move.trim()) throw new BadRequestError("Move required");
  return { session_id, move };
}

function difficultyRequest(req: express.Request): DifficultyRequest {
  const session_id = requireSessionId(req);
  const depth = optionalDepth(bodyOf(req).depth);
  if (depth === undefined) throw new BadRequestError("depth required");
  return { session_id, depth };
}

function sendError(res: express.Response, err: unknown, label: string): void {
  if (res.headersSent) return;
  if (err instanceof ChessServiceError) {
    if (err.category === "infrastructure" || err.category === "fatal") {
      // eslint-disable-next-line no-console
      console.error(`[chess-server] ${label} error`, err.code, err.message);
    }
    const response: ErrorResponse = { success: false, error: err.message, code: err.code };
    res.status(STATUS_BY_CODE[err.code]).json(response);
    return;
  }
  // eslint-disable-next-line no-console
  console.error(`[chess-server] ${label} error`, err);
  const response = { success: false, error: errorMessage(err, `${label} failed`) };
  res.status(500).json(response);
}

/** Aborted when the client goes away before the response is written. */
function disconnectSignal(res: express.Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

export function createChessApp(opts: ChessAppOpts = {}): ChessApp {
  const { engineFactory, rules: rulesOverride, ...overrides } = opts;
  const config: ServerConfig = { ...loadConfig(), ...overrides };
  const rules = rulesOverride ?? new ChessJsRules();

  const factory: EngineFactory =
    engineFactory ??
    (() =>
      new UciProcessEngine({
        path: config.enginePath,
        args: config.engineArgs,
        options: config.engineOptions,
        initTimeoutMs: config.engineInitTimeoutMs,
        searchTimeoutMs: config.engineTimeoutMs,
      }));

  const pool = new EnginePool({
    size: config.poolSize,
    factory,
    acquireTimeoutMs: config.poolAcquireTimeoutMs,
    initTimeoutMs: config.engineInitTimeoutMs,
    maxSpawnFailures: config.maxSpawnFailures,
  });
  const store = new SessionStore({ ttlMs: config.sessionTtlMs, busyPolicy: config.sessionBusyPolicy });
  const orchestrator = new SessionOrchestrator({
    rules,
    store,
    pool,
    defaultDepth: config.defaultDepth,
    engineTimeoutMs: config.engineTimeoutMs,
  });
  store.startSweeper(config.sessionSweepMs);

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "64kb" }));

  if (config.requestLog) {
    app.use((req, _res, next) => {
      // eslint-disable-next-line no-console
      console.log(`[chess-server] ${req.method} ${req.path}`);
      next();
    });
  }

  app.get("/health", (_req, res) => {
    res.json({ ok: !pool.isDegraded, pool: pool.stats(), sessions: store.size });
  });

  app.post("/new_game", async (req, res) => {
    try {
      const body = newGameRequest(req);
      const view: NewGameResponse = await orchestrator.newGame({ sessionId: body.session_id, depth: body.depth });
      res.json(view);
    } catch (err) {
      sendError(res, err, "new_game");
    }
  });

  app.post("/move", async (req, res) => {
    try {
      const { session_id, move } = moveRequest(req);
      const result = await orchestrator.submitMove(session_id, move, { signal: disconnectSignal(res) });
      res.json(result);
    } catch (err) {
      sendError(res, err, "move");
    }
  });

  app.get("/status", (req, res) => {
    try {
      res.json(orchestrator.status(sessionRequest(req).session_id));
    } catch (err) {
      sendError(res, err, "status");
    }
  });

  app.get("/history", (req, res) => {
    try {
      const { session_id } = sessionRequest(req);
      const response: HistoryResponse = {
        success: true,
        session_id,
        history: orchestrator.history(session_id),
      };
      res.json(response);
    } catch (err) {
      sendError(res, err, "history");
    }
  });

  app.get("/pgn", (req, res) => {
    try {
      const pgn = orchestrator.pgn(sessionRequest(req).session_id);
      res.type("text/plain").send(pgn);
    } catch (err) {
      sendError(res, err, "pgn");
    }
  });

  app.post("/undo", async (req, res) => {
    try {
      res.json(await orchestrator.undo(sessionRequest(req).session_id));
    } catch (err) {
      sendError(res, err, "undo");
    }
  });

  app.post("/resign", async (req, res) => {
    try {
      res.json(await orchestrator.resign(sessionRequest(req).session_id));
    } catch (err) {
      sendError(res, err, "resign");
    }
  });

  app.post("/difficulty", async (req, res) => {
    try {
      const { session_id, depth } = difficultyRequest(req);
      const response: DifficultyResponse = { success: true, depth: await orchestrator.setDifficulty(session_id, depth) };
      res.json(response);
    } catch (err) {
      sendError(res, err, "difficulty");
    }
  });

  app.post("/end_game", (req, res) => {
    try {
      orchestrator.endGame(sessionRequest(req).session_id);
      res.json({ success: true });
    } catch (err) {
      sendError(res, err, "end_game");
    }
  });

  app.post("/engine_pool/reset", (_req, res) => {
    pool.reset();
    res.json({ success: true, pool: pool.stats() });
  });

  // Malformed JSON bodies land here from express.json().
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (isRecord(err) && err.type === "entity.parse.failed") {
      sendError(res, new BadRequestError("Malformed JSON body"), "request");
      return;
    }
    sendError(res, err, "request");
  });

  function shutdown(): void {
    store.stopSweeper();
    store.clear();
    pool.shutdown();
  }

  return { app, orchestrator, pool, store, config, shutdown };
}

export async function startChessServer(args: ChessAppOpts = {}): Promise<
  ChessApp & {
    server: Server;
    url: string;
    close: () => Promise<void>;
  }
> {
  const chess = createChessApp(args);
  const server = createServer(chess.app);
  server.listen(chess.config.port);

  await new Promise<void>((resolve, reject) => {
    server.once("listening", () => resolve());
    server.once("error", reject);
  });

  const address = server.address();
  const actualPort = address && typeof address === "object" ? address.port : chess.config.port;

  const close = (): Promise<void> => {
    chess.shutdown();
    return new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  };

  return { ...chess, server, url: `http://localhost:${actualPort}`, close };
}
