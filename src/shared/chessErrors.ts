export type ErrorCode =
  | "INVALID_MOVE"
  | "BAD_REQUEST"
  | "SESSION_NOT_FOUND"
  | "SESSION_BUSY"
  | "GAME_OVER"
  | "NOTHING_TO_UNDO"
  | "ENGINE_TIMEOUT"
  | "ENGINE_UNAVAILABLE"
  | "ENGINE_PROTOCOL"
  | "POOL_TIMEOUT"
  | "ENGINE_POOL_DEGRADED"
  | "REQUEST_ABORTED";

/**
 * user: a rejected move, reported as a normal game outcome.
 * client: the request itself cannot be served as sent.
 * infrastructure: engine or pool trouble; retrying may succeed.
 * fatal: needs an operator (pool reset) before new games are accepted.
 */
export type ErrorCategory = "user" | "client" | "infrastructure" | "fatal";

export class ChessServiceError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;

  constructor(code: ErrorCode, category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.category = category;
  }
}

export class InvalidMoveError extends ChessServiceError {
  constructor(readonly move: string) {
    super("INVALID_MOVE", "user", "Invalid move");
  }
}

export class BadRequestError extends ChessServiceError {
  constructor(message: string) {
    super("BAD_REQUEST", "client", message);
  }
}

export class SessionNotFoundError extends ChessServiceError {
  constructor(sessionId: string) {
    super("SESSION_NOT_FOUND", "client", `Session not found: ${sessionId}`);
  }
}

export class SessionBusyError extends ChessServiceError {
  constructor() {
    super("SESSION_BUSY", "client", "Session is busy with another request");
  }
}

export class GameOverError extends ChessServiceError {
  constructor(message = "Game is over") {
    super("GAME_OVER", "client", message);
  }
}

export class NothingToUndoError extends ChessServiceError {
  constructor() {
    super("NOTHING_TO_UNDO", "client", "Nothing to undo");
  }
}

export class EngineTimeoutError extends ChessServiceError {
  constructor(label: string, ms: number) {
    super("ENGINE_TIMEOUT", "infrastructure", `Engine timeout: ${label} (${ms}ms)`);
  }
}

export class EngineUnavailableError extends ChessServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ENGINE_UNAVAILABLE", "infrastructure", message, options);
  }
}

export class EngineProtocolError extends ChessServiceError {
  constructor(message: string) {
    super("ENGINE_PROTOCOL", "infrastructure", message);
  }
}

export class PoolTimeoutError extends ChessServiceError {
  constructor(ms: number) {
    super("POOL_TIMEOUT", "infrastructure", `No engine available within ${ms}ms`);
  }
}

export class EnginePoolDegradedError extends ChessServiceError {
  constructor(failures: number) {
    super(
      "ENGINE_POOL_DEGRADED",
      "fatal",
      `Engine pool degraded after ${failures} consecutive spawn failures; reset required`
    );
  }
}

export class RequestAbortedError extends ChessServiceError {
  constructor(label = "request") {
    super("REQUEST_ABORTED", "client", `Aborted: ${label}`);
  }
}

export function errorMessage(err: unknown, fallback: string): string {
  return err instanceof Error ? err.message : fallback;
}
