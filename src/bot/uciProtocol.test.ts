import { describe, it, expect } from "vitest";

import { EngineProtocolError } from "../shared/chessErrors.ts";
import {
  goDepthCommand,
  isBestMoveLine,
  parseBestMove,
  positionCommand,
  setOptionCommand,
  splitLines,
} from "./uciProtocol.ts";

describe("parseBestMove", () => {
  it("reads the move and the ponder move", () => {
    expect(parseBestMove("bestmove e7e5 ponder g1f3")).toEqual({ move: "e7e5", ponder: "g1f3" });
    expect(parseBestMove("  bestmove a7a8q  ")).toEqual({ move: "a7a8q" });
  });

  it("ignores a malformed ponder move", () => {
    expect(parseBestMove("bestmove e2e4 ponder (none)")).toEqual({ move: "e2e4" });
  });

  it("rejects lines without a usable move", () => {
    for (const line of ["bestmove", "bestmove (none)", "bestmove 0000", "bestmove e2e9", "info depth 3"]) {
      expect(() => parseBestMove(line)).toThrow(EngineProtocolError);
    }
  });
});

describe("isBestMoveLine", () => {
  it("matches only bestmove lines", () => {
    expect(isBestMoveLine("bestmove e2e4")).toBe(true);
    expect(isBestMoveLine("info depth 10 pv e2e4")).toBe(false);
    expect(isBestMoveLine("bestmovex")).toBe(false);
  });
});

describe("command builders", () => {
  it("builds position and go commands", () => {
    expect(positionCommand(" 8/8/8/8/8/8/8/k6K w - - 0 1 ")).toBe("position fen 8/8/8/8/8/8/8/k6K w - - 0 1");
    expect(goDepthCommand(7)).toBe("go depth 7");
    expect(goDepthCommand(0)).toBe("go depth 1");
    expect(goDepthCommand(2.6)).toBe("go depth 3");
    expect(setOptionCommand("Threads", 4)).toBe("setoption name Threads value 4");
  });

  it("refuses input that would break the line protocol", () => {
    expect(() => positionCommand("")).toThrow(EngineProtocolError);
    expect(() => positionCommand("8/8/8/8/8/8/8/k6K w - - 0 1\nquit")).toThrow(EngineProtocolError);
    expect(() => goDepthCommand(Number.NaN)).toThrow(EngineProtocolError);
  });
});

describe("splitLines", () => {
  it("drops blank lines and carriage returns", () => {
    expect(splitLines("uciok\r\n\n  readyok \n")).toEqual(["uciok", "readyok"]);
  });
});
