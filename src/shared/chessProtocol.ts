import type { DrawReason, GameStatus } from "../game/chessRules.ts";
import type { ErrorCode } from "./chessErrors.ts";

export type SessionId = string;

export type SessionPhase = "awaiting_human" | "engine_turn" | "game_over";

export type Mover = "human" | "engine";

export type SideName = "white" | "black";

export type ErrorResponse = {
  success: false;
  error: string;
  code: ErrorCode;
};

export type NewGameRequest = {
  /** Resets this session in place when present; otherwise a new session is created. */
  session_id?: SessionId;
  /** Engine search depth, clamped to 1..20. */
  depth?: number;
};

export type MoveRequest = {
  session_id: SessionId;
  /** UCI long algebraic, e.g. "e2e4" or "e7e8q". */
  move: string;
};

export type SessionRequest = {
  session_id: SessionId;
};

export type DifficultyRequest = {
  session_id: SessionId;
  depth: number;
};

export type StatusView = {
  success: true;
  session_id: SessionId;
  position: string;
  history: string[];
  status: GameStatus;
  draw_reason?: DrawReason;
  side_to_move: SideName;
  in_check: boolean;
  game_over: boolean;
  phase: SessionPhase;
  depth: number;
  legal_moves: string[];
  move_count: number;
  created_at: string;
  last_active_at: string;
};

export type NewGameResponse = StatusView;

export type MoveAccepted = {
  success: true;
  position: string;
  status: GameStatus;
  draw_reason?: DrawReason;
  /** The engine's reply, or null when the human move ended the game. */
  engine_move: string | null;
  history: string[];
  side_to_move: SideName;
  in_check: boolean;
  game_over: boolean;
};

export type MoveRejected = {
  success: false;
  error: "Invalid move";
};

export type MoveResponse = MoveAccepted | MoveRejected;

export type HistoryEntry = {
  ply: number;
  move: string;
  player: Mover;
  /** ISO time the ply was played. */
  timestamp: string;
};

export type HistoryResponse = {
  success: true;
  session_id: SessionId;
  history: HistoryEntry[];
};

export type DifficultyResponse = {
  success: true;
  depth: number;
};
