import { SessionBusyError } from "../../src/shared/chessErrors.ts";
import type { SessionBusyPolicy } from "./config.ts";

/**
 * Single-writer guard for one session. With "queue" callers run one after
 * another in arrival order; with "reject" a caller arriving while another is
 * running or waiting fails with SessionBusyError.
 */
export class SessionLock {
  private chain: Promise<void> = Promise.resolve();
  private held = false;
  private pending = 0;

  constructor(private readonly policy: SessionBusyPolicy) {}

  get busy(): boolean {
    return this.held || this.pending > 0;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    if (this.policy === "reject" && this.busy) return Promise.reject(new SessionBusyError());

    // Chain actions so at most one runs at a time per session.
    const prev = this.chain;
    let releaseNext: () => void = () => undefined;
    this.chain = new Promise<void>((resolve) => {
      releaseNext = resolve;
    });
    this.pending++;

    return prev.then(async () => {
      this.pending--;
      this.held = true;
      try {
        return await fn();
      } finally {
        this.held = false;
        releaseNext();
      }
    });
  }
}
