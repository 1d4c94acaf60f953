import { EngineProtocolError } from "../shared/chessErrors.ts";

export type BestMoveLine = {
  move: string;
  ponder?: string;
};

const UCI_MOVE_TOKEN = /^[a-h][1-8][a-h][1-8][qrbn]?$/;

export function isBestMoveLine(line: string): boolean {
  return line.trim().split(/\s+/)[0] === "bestmove";
}

/**
 * Parses `bestmove <move> [ponder <move>]`.
 * `bestmove (none)` and `bestmove 0000` mean the engine found no move and are
 * treated as protocol errors: the service never searches finished positions.
 */
export function parseBestMove(line: string): BestMoveLine {
  const tokens = line.trim().split(/\s+/);
  if (tokens[0] !== "bestmove") {
    throw new EngineProtocolError(`Expected bestmove, got: ${line}`);
  }
  const move = tokens[1];
  if (!move || !UCI_MOVE_TOKEN.test(move)) {
    throw new EngineProtocolError(`Malformed bestmove reply: ${line}`);
  }
  const ponder = tokens[2] === "ponder" ? tokens[3] : undefined;
  return ponder && UCI_MOVE_TOKEN.test(ponder) ? { move, ponder } : { move };
}

export function positionCommand(fen: string): string {
  const trimmed = fen.trim();
  if (!trimmed || /[\r\n]/.test(trimmed)) {
    throw new EngineProtocolError("Position must be a single-line FEN");
  }
  return `position fen ${trimmed}`;
}

export function goDepthCommand(depth: number): string {
  const d = Math.max(1, Math.round(depth));
  if (!Number.isFinite(d)) throw new EngineProtocolError(`Invalid search depth: ${depth}`);
  return `go depth ${d}`;
}

export function setOptionCommand(name: string, value: string | number): string {
  return `setoption name ${name} value ${value}`;
}

/** Splits a chunk of engine output into trimmed, non-empty lines. */
export function splitLines(chunk: string): string[] {
  return chunk
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}
