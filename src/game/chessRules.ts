import { Chess, DEFAULT_POSITION } from "chess.js";

export type Side = "w" | "b";

export type GameStatus = "Ongoing" | "Checkmate" | "Stalemate" | "Draw" | "Resigned";

export type DrawReason = "insufficient_material" | "threefold_repetition" | "fifty_move_rule";

export type PositionReport = {
  status: Exclude<GameStatus, "Resigned">;
  drawReason?: DrawReason;
  sideToMove: Side;
  inCheck: boolean;
};

/**
 * Everything the service needs from a chess rules implementation.
 * Positions are FEN strings; moves are UCI long algebraic ("e2e4", "e7e8q").
 */
export interface ChessRules {
  readonly initialPosition: string;
  legalMoves(position: string): string[];
  /** Returns the next position, or null when the move is not legal in `position`. */
  apply(position: string, move: string): string | null;
  /**
   * `history`, played from `initialPosition` (the standard start when omitted),
   * lets repetition-based draws be detected; it is ignored when it does not
   * lead to `position`.
   */
  gameStatus(position: string, history: readonly string[], initialPosition?: string): PositionReport;
  /** SAN for each move of `history`, played from `initialPosition`. */
  sanMoves(initialPosition: string, history: readonly string[]): string[];
}

const UCI_MOVE_RE = /^([a-h][1-8])([a-h][1-8])([qrbn])?$/;

type UciParts = { from: string; to: string; promotion?: string };

export function parseUciMove(raw: string): UciParts | null {
  const m = UCI_MOVE_RE.exec(raw.trim().toLowerCase());
  if (!m) return null;
  const [, from, to, promotion] = m;
  if (!from || !to) return null;
  return promotion ? { from, to, promotion } : { from, to };
}

function verboseToUci(m: { from: string; to: string; promotion?: string }): string {
  return `${m.from}${m.to}${m.promotion ?? ""}`;
}

function playUci(chess: Chess, move: string): { san: string } | null {
  const parts = parseUciMove(move);
  if (!parts) return null;
  const wanted = verboseToUci(parts);
  const legal = chess.moves({ verbose: true }).find((m) => verboseToUci(m) === wanted);
  if (!legal) return null;
  return chess.move({ from: legal.from, to: legal.to, promotion: legal.promotion });
}

function loadPosition(position: string): Chess | null {
  try {
    return new Chess(position);
  } catch {
    return null;
  }
}

function report(chess: Chess): PositionReport {
  const sideToMove: Side = chess.turn();
  const inCheck = chess.inCheck();
  if (chess.isCheckmate()) return { status: "Checkmate", sideToMove, inCheck };
  if (chess.isStalemate()) return { status: "Stalemate", sideToMove, inCheck };
  if (chess.isInsufficientMaterial()) {
    return { status: "Draw", drawReason: "insufficient_material", sideToMove, inCheck };
  }
  if (chess.isThreefoldRepetition()) {
    return { status: "Draw", drawReason: "threefold_repetition", sideToMove, inCheck };
  }
  if (chess.isDraw()) return { status: "Draw", drawReason: "fifty_move_rule", sideToMove, inCheck };
  return { status: "Ongoing", sideToMove, inCheck };
}

export class ChessJsRules implements ChessRules {
  readonly initialPosition: string;

  constructor(initialPosition: string = DEFAULT_POSITION) {
    this.initialPosition = initialPosition;
  }

  legalMoves(position: string): string[] {
    const chess = loadPosition(position);
    if (!chess) return [];
    return chess.moves({ verbose: true }).map(verboseToUci);
  }

  apply(position: string, move: string): string | null {
    const chess = loadPosition(position);
    if (!chess) return null;
    return playUci(chess, move) ? chess.fen() : null;
  }

  gameStatus(position: string, history: readonly string[], initialPosition = this.initialPosition): PositionReport {
    const replayed = this.replay(initialPosition, history);
    if (replayed && replayed.fen() === position) return report(replayed);

    const chess = loadPosition(position);
    if (!chess) throw new Error(`Invalid position: ${position}`);
    return report(chess);
  }

  sanMoves(initialPosition: string, history: readonly string[]): string[] {
    const chess = loadPosition(initialPosition);
    if (!chess) throw new Error(`Invalid position: ${initialPosition}`);
    const out: string[] = [];
    for (const move of history) {
      const played = playUci(chess, move);
      if (!played) throw new Error(`Illegal move in history at ply ${out.length + 1}: ${move}`);
      out.push(played.san);
    }
    return out;
  }

  private replay(initialPosition: string, history: readonly string[]): Chess | null {
    const chess = loadPosition(initialPosition);
    if (!chess) return null;
    for (const move of history) {
      if (!playUci(chess, move)) return null;
    }
    return chess;
  }
}
