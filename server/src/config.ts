import { existsSync } from "node:fs";
import os from "node:os";

export type SessionBusyPolicy = "reject" | "queue";

export type ServerConfig = {
  port: number;
  /** Engine binary; see resolveEnginePath for discovery when unset. */
  enginePath: string;
  engineArgs: string[];
  /** UCI options applied to every engine process after `uciok`. */
  engineOptions: Record<string, number>;
  /** Default search depth for new games (1..20). */
  defaultDepth: number;
  poolSize: number;
  engineTimeoutMs: number;
  engineInitTimeoutMs: number;
  poolAcquireTimeoutMs: number;
  maxSpawnFailures: number;
  sessionTtlMs: number;
  sessionSweepMs: number;
  sessionBusyPolicy: SessionBusyPolicy;
  requestLog: boolean;
};

export const MIN_DEPTH = 1;
export const MAX_DEPTH = 20;

/** Places a Stockfish binary is commonly found, checked in order. */
export const ENGINE_CANDIDATES: readonly string[] = [
  "./stockfish",
  "./stockfish/stockfish",
  "./stockfish.exe",
  "./stockfish/stockfish.exe",
  "/usr/games/stockfish",
  "/usr/bin/stockfish",
  "/usr/local/bin/stockfish",
  "/opt/homebrew/bin/stockfish",
  "C:\\Program Files\\stockfish\\stockfish.exe",
  "C:\\stockfish\\stockfish.exe",
];

type Env = Record<string, string | undefined>;

export function clampDepth(raw: unknown, fallback = MIN_DEPTH): number {
  const n = Number(raw);
  if (raw == null || raw === "" || !Number.isFinite(n)) return fallback;
  return Math.max(MIN_DEPTH, Math.min(MAX_DEPTH, Math.trunc(n)));
}

function intFromEnv(raw: string | undefined, fallback: number, min: number): number {
  if (raw == null || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.trunc(n));
}

function splitArgs(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(/\s+/)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function resolveEnginePath(
  env: Env = process.env,
  exists: (p: string) => boolean = existsSync
): string {
  const explicit = env.CHESS_ENGINE_PATH?.trim();
  if (explicit) return explicit;
  for (const candidate of ENGINE_CANDIDATES) {
    if (exists(candidate)) return candidate;
  }
  // Let the OS resolve it from PATH; a miss surfaces as ENGINE_UNAVAILABLE on first use.
  return "stockfish";
}

function defaultPoolSize(): number {
  return Math.max(1, os.availableParallelism());
}

export function loadConfig(env: Env = process.env, exists?: (p: string) => boolean): ServerConfig {
  const engineOptions: Record<string, number> = {};
  const threads = intFromEnv(env.CHESS_ENGINE_THREADS, 0, 0);
  if (threads > 0) engineOptions.Threads = threads;
  const hashMb = intFromEnv(env.CHESS_ENGINE_HASH_MB, 0, 0);
  if (hashMb > 0) engineOptions.Hash = hashMb;

  return {
    port: intFromEnv(env.PORT, 8788, 0),
    enginePath: resolveEnginePath(env, exists),
    engineArgs: splitArgs(env.CHESS_ENGINE_ARGS),
    engineOptions,
    defaultDepth: clampDepth(env.CHESS_ENGINE_DEPTH, MIN_DEPTH),
    poolSize: intFromEnv(env.CHESS_ENGINE_POOL_SIZE, defaultPoolSize(), 1),
    engineTimeoutMs: intFromEnv(env.CHESS_ENGINE_TIMEOUT_MS, 5_000, 1),
    engineInitTimeoutMs: intFromEnv(env.CHESS_ENGINE_INIT_TIMEOUT_MS, 10_000, 1),
    poolAcquireTimeoutMs: intFromEnv(env.CHESS_POOL_ACQUIRE_TIMEOUT_MS, 10_000, 0),
    maxSpawnFailures: intFromEnv(env.CHESS_POOL_MAX_SPAWN_FAILURES, 3, 1),
    sessionTtlMs: intFromEnv(env.CHESS_SESSION_TTL_MS, 30 * 60_000, 1),
    sessionSweepMs: intFromEnv(env.CHESS_SESSION_SWEEP_MS, 60_000, 0),
    sessionBusyPolicy: env.CHESS_SESSION_BUSY_POLICY === "queue" ? "queue" : "reject",
    requestLog: env.CHESS_REQUEST_LOG !== "0",
  };
}
