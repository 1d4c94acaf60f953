import { GameOverError, InvalidMoveError, NothingToUndoError } from "../shared/chessErrors.ts";
import { parseUciMove, type ChessRules, type DrawReason, type GameStatus, type Side } from "./chessRules.ts";

/**
 * Immutable snapshot of one game. Every transition returns a new object, so a
 * caller can build a candidate state and simply drop it when a later step fails.
 */
export type GameState = {
  readonly initialPosition: string;
  readonly position: string;
  /** UCI moves, oldest first. */
  readonly history: readonly string[];
  /** Position after each ply; positions[0] is the initial position. */
  readonly positions: readonly string[];
  /** ISO time each ply of `history` was played. */
  readonly playedAt: readonly string[];
  readonly status: GameStatus;
  readonly drawReason?: DrawReason;
  readonly sideToMove: Side;
  readonly inCheck: boolean;
  /** Side that resigned, when status is "Resigned". */
  readonly resignedBy?: Side;
};

export function createInitialGameState(rules: ChessRules, initialPosition = rules.initialPosition): GameState {
  const report = rules.gameStatus(initialPosition, [], initialPosition);
  return {
    initialPosition,
    position: initialPosition,
    history: [],
    positions: [initialPosition],
    playedAt: [],
    status: report.status,
    ...(report.drawReason ? { drawReason: report.drawReason } : {}),
    sideToMove: report.sideToMove,
    inCheck: report.inCheck,
  };
}

export function isGameOver(state: GameState): boolean {
  return state.status !== "Ongoing";
}

export function applyMove(rules: ChessRules, state: GameState, move: string, at: Date = new Date()): GameState {
  if (isGameOver(state)) throw new GameOverError();

  const parts = parseUciMove(move);
  if (!parts) throw new InvalidMoveError(move);
  const uci = `${parts.from}${parts.to}${parts.promotion ?? ""}`;

  const next = rules.apply(state.position, uci);
  if (next === null) throw new InvalidMoveError(move);

  const history = [...state.history, uci];
  const report = rules.gameStatus(next, history, state.initialPosition);
  return {
    initialPosition: state.initialPosition,
    position: next,
    history,
    positions: [...state.positions, next],
    playedAt: [...state.playedAt, at.toISOString()],
    status: report.status,
    ...(report.drawReason ? { drawReason: report.drawReason } : {}),
    sideToMove: report.sideToMove,
    inCheck: report.inCheck,
  };
}

export function undo(rules: ChessRules, state: GameState): GameState {
  if (state.history.length === 0) throw new NothingToUndoError();

  const history = state.history.slice(0, -1);
  const positions = state.positions.slice(0, -1);
  const position = positions[positions.length - 1] ?? state.initialPosition;
  const report = rules.gameStatus(position, history, state.initialPosition);
  return {
    initialPosition: state.initialPosition,
    position,
    history,
    positions,
    playedAt: state.playedAt.slice(0, -1),
    status: report.status,
    ...(report.drawReason ? { drawReason: report.drawReason } : {}),
    sideToMove: report.sideToMove,
    inCheck: report.inCheck,
  };
}

export function resign(state: GameState, side: Side): GameState {
  if (isGameOver(state)) throw new GameOverError();
  return { ...state, status: "Resigned", resignedBy: side };
}

/** Plays `history` from `initialPosition` and returns the resulting position. */
export function replayHistory(rules: ChessRules, initialPosition: string, history: readonly string[]): string {
  let position = initialPosition;
  for (const [i, move] of history.entries()) {
    const next = rules.apply(position, move);
    if (next === null) throw new Error(`History does not replay: ply ${i + 1} (${move}) is illegal`);
    position = next;
  }
  return position;
}
