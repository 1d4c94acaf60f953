import type { ChessRules } from "./chessRules.ts";
import type { GameState } from "./gameState.ts";

export type PgnMeta = {
  event?: string;
  site?: string;
  date?: Date;
  round?: string;
  white?: string;
  black?: string;
};

const MAX_LINE = 80;

export function pgnResult(state: GameState): "1-0" | "0-1" | "1/2-1/2" | "*" {
  switch (state.status) {
    case "Checkmate":
      return state.sideToMove === "w" ? "0-1" : "1-0";
    case "Resigned":
      return state.resignedBy === "w" ? "0-1" : "1-0";
    case "Stalemate":
    case "Draw":
      return "1/2-1/2";
    case "Ongoing":
      return "*";
  }
}

function pgnDate(d: Date): string {
  const yyyy = String(d.getUTCFullYear()).padStart(4, "0");
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  return `${yyyy}.${mm}.${dd}`;
}

function tagValue(v: string): string {
  return v.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/** Full-move number and side to move, read from a FEN's last fields. */
function fenMoveInfo(fen: string): { fullmove: number; blackToMove: boolean } {
  const fields = fen.trim().split(/\s+/);
  const fullmove = Number(fields[5] ?? "1");
  return {
    fullmove: Number.isInteger(fullmove) && fullmove > 0 ? fullmove : 1,
    blackToMove: fields[1] === "b",
  };
}

function wrap(tokens: string[]): string {
  const lines: string[] = [];
  let line = "";
  for (const t of tokens) {
    if (!line) {
      line = t;
    } else if (line.length + 1 + t.length > MAX_LINE) {
      lines.push(line);
      line = t;
    } else {
      line += ` ${t}`;
    }
  }
  if (line) lines.push(line);
  return lines.join("\n");
}

export function exportPgn(rules: ChessRules, state: GameState, meta: PgnMeta = {}): string {
  const result = pgnResult(state);
  const tags: Array<[string, string]> = [
    ["Event", meta.event ?? "Casual game"],
    ["Site", meta.site ?? "?"],
    ["Date", meta.date ? pgnDate(meta.date) : "????.??.??"],
    ["Round", meta.round ?? "-"],
    ["White", meta.white ?? "?"],
    ["Black", meta.black ?? "?"],
    ["Result", result],
  ];
  if (state.initialPosition !== rules.initialPosition) {
    tags.push(["SetUp", "1"], ["FEN", state.initialPosition]);
  }
  if (state.status === "Resigned") {
    tags.push(["Termination", `${state.resignedBy === "w" ? "White" : "Black"} resigned`]);
  }

  const header = tags.map(([k, v]) => `[${k} "${tagValue(v)}"]`).join("\n");

  const sans = rules.sanMoves(state.initialPosition, state.history);
  const start = fenMoveInfo(state.initialPosition);
  const tokens: string[] = [];
  let moveNo = start.fullmove;
  let black = start.blackToMove;
  for (const [i, san] of sans.entries()) {
    if (!black) {
      tokens.push(`${moveNo}.`);
    } else if (i === 0) {
      tokens.push(`${moveNo}...`);
    }
    tokens.push(san);
    if (black) moveNo++;
    black = !black;
  }
  tokens.push(result);

  return `${header}\n\n${wrap(tokens)}\n`;
}
