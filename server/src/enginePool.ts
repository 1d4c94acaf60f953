import type { UciEngine } from "../../src/bot/uciEngine.ts";
import {
  EnginePoolDegradedError,
  EngineUnavailableError,
  PoolTimeoutError,
  RequestAbortedError,
  errorMessage,
} from "../../src/shared/chessErrors.ts";

export type EngineFactory = () => UciEngine;

export type EnginePoolOpts = {
  /** Upper bound on live engine processes. */
  size: number;
  factory: EngineFactory;
  /** How long acquire() waits for a free handle; 0 fails at once when none is free. */
  acquireTimeoutMs?: number;
  initTimeoutMs?: number;
  /** Consecutive spawn failures before the pool stops accepting work. */
  maxSpawnFailures?: number;
};

export type AcquireOpts = {
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type EnginePoolStats = {
  size: number;
  total: number;
  idle: number;
  busy: number;
  waiting: number;
  degraded: boolean;
  consecutiveSpawnFailures: number;
};

type Waiter = {
  resolve: (engine: UciEngine) => void;
  reject: (err: Error) => void;
  cleanup: () => void;
};

export class EnginePool {
  private readonly size: number;
  private readonly factory: EngineFactory;
  private readonly acquireTimeoutMs: number;
  private readonly initTimeoutMs: number;
  private readonly maxSpawnFailures: number;

  private readonly idle: UciEngine[] = [];
  private readonly busy = new Set<UciEngine>();
  private waiters: Waiter[] = [];
  /** Live handles plus spawns in progress. */
  private total = 0;
  private consecutiveSpawnFailures = 0;
  private degraded = false;
  private closed = false;

  constructor(opts: EnginePoolOpts) {
    this.size = Math.max(1, Math.trunc(opts.size));
    this.factory = opts.factory;
    this.acquireTimeoutMs = Math.max(0, opts.acquireTimeoutMs ?? 10_000);
    this.initTimeoutMs = Math.max(1, opts.initTimeoutMs ?? 10_000);
    this.maxSpawnFailures = Math.max(1, opts.maxSpawnFailures ?? 3);
  }

  get isDegraded(): boolean {
    return this.degraded;
  }

  stats(): EnginePoolStats {
    return {
      size: this.size,
      total: this.total,
      idle: this.idle.length,
      busy: this.busy.size,
      waiting: this.waiters.length,
      degraded: this.degraded,
      consecutiveSpawnFailures: this.consecutiveSpawnFailures,
    };
  }

  assertAccepting(): void {
    if (this.closed) throw new EngineUnavailableError("Engine pool is shut down");
    if (this.degraded) throw new EnginePoolDegradedError(this.consecutiveSpawnFailures);
  }

  async acquire(opts: AcquireOpts = {}): Promise<UciEngine> {
    this.assertAccepting();
    if (opts.signal?.aborted) throw new RequestAbortedError("engine acquire");

    const idle = this.takeIdle();
    if (idle) {
      this.busy.add(idle);
      return idle;
    }

    if (this.total < this.size) {
      let engine: UciEngine;
      try {
        engine = await this.spawn();
      } catch (err) {
        // The failed slot is free again; callers queued behind this spawn must not starve.
        this.serveWaiters();
        throw err;
      }
      if (opts.signal?.aborted) {
        this.handOff(engine);
        throw new RequestAbortedError("engine acquire");
      }
      this.busy.add(engine);
      return engine;
    }

    return this.enqueue(opts);
  }

  release(engine: UciEngine): void {
    if (!this.busy.delete(engine)) {
      throw new Error(`Engine ${engine.id} is not checked out from this pool`);
    }

    if (this.closed) {
      this.discard(engine);
      return;
    }

    if (engine.health === "crashed") {
      // eslint-disable-next-line no-console
      console.warn(`[chess-server] [pool] ${engine.id} crashed; spawning a replacement`);
      this.discard(engine);
      this.replenish();
      return;
    }

    this.handOff(engine);
  }

  /** Operator action: leave degraded mode and recycle idle handles. */
  reset(): void {
    this.degraded = false;
    this.consecutiveSpawnFailures = 0;
    for (const engine of this.idle.splice(0)) this.discard(engine);
    // eslint-disable-next-line no-console
    console.log(`[chess-server] [pool] reset (busy=${this.busy.size})`);
  }

  shutdown(): void {
    this.closed = true;
    this.rejectWaiters(new EngineUnavailableError("Engine pool is shut down"));
    for (const engine of this.idle.splice(0)) this.discard(engine);
    // Busy handles are stopped now and leave the pool when their borrowers release them.
    for (const engine of this.busy) engine.terminate();
  }

  private takeIdle(): UciEngine | null {
    for (let engine = this.idle.pop(); engine; engine = this.idle.pop()) {
      if (engine.health === "alive") return engine;
      this.discard(engine);
      this.serveWaiters();
    }
    return null;
  }

  private serveWaiters(): void {
    if (this.waiters.length > 0) this.replenish();
  }

  private discard(engine: UciEngine): void {
    engine.terminate();
    this.total--;
  }

  private handOff(engine: UciEngine): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      this.busy.add(engine);
      waiter.resolve(engine);
      return;
    }
    this.idle.push(engine);
  }

  private async spawn(): Promise<UciEngine> {
    this.total++;
    let engine: UciEngine | null = null;
    try {
      engine = this.factory();
      await engine.init({ timeoutMs: this.initTimeoutMs });
    } catch (err) {
      this.total--;
      engine?.terminate();
      this.noteSpawnFailure(err);
      throw new EngineUnavailableError(`Engine spawn failed: ${errorMessage(err, "unknown error")}`, { cause: err });
    }

    if (this.closed || this.degraded) {
      this.discard(engine);
      throw this.closed
        ? new EngineUnavailableError("Engine pool is shut down")
        : new EnginePoolDegradedError(this.consecutiveSpawnFailures);
    }

    this.consecutiveSpawnFailures = 0;
    return engine;
  }

  private replenish(): void {
    if (this.degraded || this.closed || this.total >= this.size) return;
    // Each failed attempt counts toward maxSpawnFailures, so retries stop once degraded.
    void this.spawn().then(
      (engine) => this.handOff(engine),
      () => this.replenish()
    );
  }

  private noteSpawnFailure(err: unknown): void {
    this.consecutiveSpawnFailures++;
    // eslint-disable-next-line no-console
    console.error(
      `[chess-server] [pool] spawn failed (${this.consecutiveSpawnFailures}/${this.maxSpawnFailures})`,
      errorMessage(err, "unknown error")
    );
    if (this.consecutiveSpawnFailures >= this.maxSpawnFailures && !this.degraded) {
      this.degraded = true;
      // eslint-disable-next-line no-console
      console.error("[chess-server] [pool] degraded; new games are rejected until reset");
      this.rejectWaiters(new EnginePoolDegradedError(this.consecutiveSpawnFailures));
    }
  }

  private rejectWaiters(err: Error): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) {
      w.cleanup();
      w.reject(err);
    }
  }

  private enqueue(opts: AcquireOpts): Promise<UciEngine> {
    const timeoutMs = Math.max(0, opts.timeoutMs ?? this.acquireTimeoutMs);
    if (timeoutMs === 0) return Promise.reject(new PoolTimeoutError(0));

    return new Promise<UciEngine>((resolve, reject) => {
      const signal = opts.signal;
      const drop = (err: Error) => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        waiter.cleanup();
        reject(err);
      };
      const onAbort = () => drop(new RequestAbortedError("engine acquire"));
      const timer = setTimeout(() => drop(new PoolTimeoutError(timeoutMs)), timeoutMs);
      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener("abort", onAbort);
        },
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}
