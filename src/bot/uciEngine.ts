export type EngineHealth = "alive" | "crashed";

export type UciSearchArgs = {
  depth: number;
  /** Overall guard for the search round-trip. */
  timeoutMs?: number;
  /** Aborting sends `stop` and discards the engine's answer. */
  signal?: AbortSignal;
};

export type UciBestMoveArgs = UciSearchArgs & {
  fen: string;
};

/**
 * Capability set the service needs from a chess engine. The subprocess
 * implementation lives in uciProcessEngine.ts; tests plug in scripted fakes.
 */
export interface UciEngine {
  readonly id: string;
  readonly health: EngineHealth;
  init(opts?: { timeoutMs?: number }): Promise<void>;
  setPosition(fen: string): void;
  search(args: UciSearchArgs): Promise<string>; // returns UCI move like "e2e4" or "e7e8q"
  terminate(): void;
}

export async function bestMove(engine: UciEngine, args: UciBestMoveArgs): Promise<string> {
  engine.setPosition(args.fen);
  return engine.search({ depth: args.depth, timeoutMs: args.timeoutMs, signal: args.signal });
}
