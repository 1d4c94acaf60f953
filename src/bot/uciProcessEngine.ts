import { spawn } from "node:child_process";
import { createInterface } from "node:readline";

import {
  EngineProtocolError,
  EngineTimeoutError,
  EngineUnavailableError,
  RequestAbortedError,
  errorMessage,
} from "../shared/chessErrors.ts";
import type { EngineHealth, UciEngine, UciSearchArgs } from "./uciEngine.ts";
import {
  goDepthCommand,
  isBestMoveLine,
  parseBestMove,
  positionCommand,
  setOptionCommand,
  splitLines,
} from "./uciProtocol.ts";

/** The slice of a child process the engine handle talks to. */
export type EngineProcess = {
  readonly stdin: NodeJS.WritableStream;
  readonly stdout: NodeJS.ReadableStream;
  readonly stderr: NodeJS.ReadableStream;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
};

export type SpawnEngineProcess = (path: string, args: readonly string[]) => EngineProcess;

export const spawnEngineProcess: SpawnEngineProcess = (path, args) =>
  spawn(path, [...args], { windowsHide: true });

export type UciProcessEngineOpts = {
  path: string;
  args?: readonly string[];
  /** Sent as `setoption` between `uciok` and `isready` (e.g. Threads, Hash). */
  options?: Readonly<Record<string, string | number>>;
  initTimeoutMs?: number;
  /** Default round-trip guard for searches that do not pass their own. */
  searchTimeoutMs?: number;
  /** How long to wait for the `bestmove` that answers `stop`. */
  stopGraceMs?: number;
  spawnProcess?: SpawnEngineProcess;
};

type LineWaiter = {
  pred: (line: string) => boolean;
  resolve: (line: string) => void;
  reject: (err: Error) => void;
};

const OUTPUT_TAIL = 50;
const ABORTED = Symbol("aborted");

let nextEngineId = 1;

export class UciProcessEngine implements UciEngine {
  readonly id: string;
  private readonly opts: UciProcessEngineOpts;
  private proc: EngineProcess | null = null;
  private state: EngineHealth = "alive";
  private crashReason: string | null = null;
  private ready = false;
  private initPromise: Promise<void> | null = null;
  private waiters: LineWaiter[] = [];
  private pendingFen: string | null = null;
  private searching = false;
  private readonly lastOutput: string[] = [];

  constructor(opts: UciProcessEngineOpts) {
    this.opts = opts;
    this.id = `engine-${nextEngineId++}`;
  }

  get health(): EngineHealth {
    return this.state;
  }

  /** Last lines seen on stdout/stderr, for diagnostics. */
  outputTail(n = 10): string[] {
    return this.lastOutput.slice(-n);
  }

  async init(opts?: { timeoutMs?: number }): Promise<void> {
    if (this.ready) return;
    if (this.state === "crashed") throw this.unavailable();

    const timeoutMs = opts?.timeoutMs ?? this.opts.initTimeoutMs ?? 10_000;
    this.initPromise ??= this.initInternal(timeoutMs).catch((err: unknown) => {
      this.initPromise = null;
      this.markCrashed(`init failed: ${errorMessage(err, "unknown error")}`);
      throw err;
    });
    return this.initPromise;
  }

  setPosition(fen: string): void {
    // Validated now, sent with the next search so position and go always travel together.
    positionCommand(fen);
    this.pendingFen = fen;
  }

  async search(args: UciSearchArgs): Promise<string> {
    if (this.searching) throw new EngineProtocolError(`${this.id} is already searching`);
    if (args.signal?.aborted) throw new RequestAbortedError("engine search");
    const fen = this.pendingFen;
    if (fen === null) throw new EngineProtocolError("search requested before setPosition");

    this.searching = true;
    try {
      await this.init();
      const timeoutMs = args.timeoutMs ?? this.opts.searchTimeoutMs ?? 5_000;
      const commands = [positionCommand(fen), goDepthCommand(args.depth)];
      if (this.state === "crashed") throw this.unavailable();
      const reply = this.waitForLine(isBestMoveLine, "bestmove", timeoutMs);
      for (const cmd of commands) this.send(cmd);
      const line = await this.awaitReply(reply, args.signal);
      return parseBestMove(line).move;
    } catch (err) {
      if (err instanceof EngineTimeoutError) this.markCrashed("search timed out");
      throw err;
    } finally {
      this.searching = false;
    }
  }

  terminate(): void {
    if (this.proc && this.state === "alive") {
      try {
        this.proc.stdin.write("quit\n");
      } catch (err) {
        this.remember(`[quit] ${errorMessage(err, "write failed")}`);
      }
    }
    this.markCrashed("terminated");
  }

  private async initInternal(timeoutMs: number): Promise<void> {
    this.start();

    const uciok = this.waitForLine((l) => l === "uciok", "uciok", timeoutMs);
    this.send("uci");
    await uciok;

    // Engines do not acknowledge setoption; the isready round-trip below syncs them.
    for (const [name, value] of Object.entries(this.opts.options ?? {})) {
      this.send(setOptionCommand(name, value));
    }

    const readyok = this.waitForLine((l) => l === "readyok", "readyok", timeoutMs);
    this.send("isready");
    await readyok;

    this.ready = true;
  }

  private start(): void {
    const spawnProcess = this.opts.spawnProcess ?? spawnEngineProcess;
    let proc: EngineProcess;
    try {
      proc = spawnProcess(this.opts.path, this.opts.args ?? []);
    } catch (err) {
      this.markCrashed(`spawn failed: ${errorMessage(err, "unknown error")}`);
      throw this.unavailable();
    }
    this.proc = proc;

    proc.once("error", (err) => this.markCrashed(`process error: ${err.message}`));
    proc.once("exit", (code, signal) => this.markCrashed(`process exited (code=${code}, signal=${signal})`));
    proc.stdin.on("error", (err: Error) => this.markCrashed(`stdin error: ${err.message}`));
    proc.stderr.on("data", (chunk: Buffer | string) => {
      for (const line of splitLines(String(chunk))) this.remember(`[stderr] ${line}`);
    });
    createInterface({ input: proc.stdout }).on("line", (line) => this.onLine(line));
  }

  private onLine(raw: string): void {
    const line = raw.trim();
    if (!line) return;
    this.remember(line);

    const idx = this.waiters.findIndex((w) => w.pred(line));
    if (idx < 0) return;
    const [w] = this.waiters.splice(idx, 1);
    w?.resolve(line);
  }

  private remember(line: string): void {
    this.lastOutput.push(line);
    if (this.lastOutput.length > OUTPUT_TAIL) this.lastOutput.splice(0, this.lastOutput.length - OUTPUT_TAIL);
  }

  private send(cmd: string): void {
    const proc = this.proc;
    if (!proc || this.state === "crashed") throw this.unavailable();
    proc.stdin.write(`${cmd}\n`);
  }

  private waitForLine(pred: (line: string) => boolean, label: string, timeoutMs: number): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      if (this.state === "crashed") {
        reject(this.unavailable());
        return;
      }
      let timer: NodeJS.Timeout | null = null;
      const waiter: LineWaiter = {
        pred,
        resolve: (line) => {
          if (timer) clearTimeout(timer);
          resolve(line);
        },
        reject: (err) => {
          if (timer) clearTimeout(timer);
          reject(err);
        },
      };
      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          reject(new EngineTimeoutError(`${this.id} ${label}`, timeoutMs));
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Resolves with the engine's reply unless `signal` fires first. On abort the
   * search is stopped and its `bestmove` drained so the next search starts clean.
   */
  private async awaitReply(reply: Promise<string>, signal?: AbortSignal): Promise<string> {
    if (!signal) return reply;

    let resolveAborted: (v: typeof ABORTED) => void = () => undefined;
    const aborted = new Promise<typeof ABORTED>((resolve) => {
      resolveAborted = resolve;
    });
    const onAbort = () => resolveAborted(ABORTED);
    if (signal.aborted) onAbort();
    else signal.addEventListener("abort", onAbort, { once: true });

    let first: string | typeof ABORTED;
    try {
      first = await Promise.race([reply, aborted]);
    } finally {
      signal.removeEventListener("abort", onAbort);
    }
    if (first !== ABORTED) return first;

    const graceMs = this.opts.stopGraceMs ?? 1_000;
    const drainTimer = setTimeout(() => this.markCrashed("no bestmove after stop"), graceMs);
    if (this.state === "alive") this.send("stop");
    const drained = await reply.then(
      () => null,
      (err: unknown) => err
    );
    clearTimeout(drainTimer);
    if (drained !== null) this.remember(`[stop] ${errorMessage(drained, "search failed after stop")}`);
    throw new RequestAbortedError("engine search");
  }

  private markCrashed(reason: string): void {
    if (this.state === "crashed") return;
    this.state = "crashed";
    this.crashReason = reason;
    this.ready = false;

    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(this.unavailable());

    this.proc?.kill();
  }

  private unavailable(): EngineUnavailableError {
    const tail = this.outputTail(5).join(" | ");
    const reason = this.crashReason ?? "not running";
    return new EngineUnavailableError(`${this.id} unavailable: ${reason}${tail ? ` (tail: ${tail})` : ""}`);
  }
}
