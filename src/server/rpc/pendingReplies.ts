// src/server/rpc/pendingReplies.ts
import type { CommandResult } from "../../core/commands.js";
import { ViewerError } from "../../core/errors.js";

/** The viewer did not report back in time. */
export class ReplyTimeoutError extends ViewerError {}

interface Waiter {
  resolve: (result: CommandResult) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Correlates commands that carry a `requestId` with the result the render
 * worker reports for them.
 */
export class PendingReplies {
  private nextId = 1;
  private waiting = new Map<number, Waiter>();
  private timeoutMs: number;

  constructor(timeoutMs: number) {
    this.timeoutMs = timeoutMs;
  }

  public get size(): number {
    return this.waiting.size;
  }

  /**
   * Reserves a request id. The promise settles when `settle` is called with
   * the same id, or rejects with a `ReplyTimeoutError`.
   */
  public create(): { requestId: number; result: Promise<CommandResult> } {
    const requestId = this.nextId++;
    const result = new Promise<CommandResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiting.delete(requestId);
        reject(
          new ReplyTimeoutError(
            `No reply from viewer after ${this.timeoutMs} ms`,
          ),
        );
      }, this.timeoutMs);
      this.waiting.set(requestId, { resolve, reject, timer });
    });
    return { requestId, result };
  }

  /** @returns `false` when nobody waits for `requestId` anymore. */
  public settle(requestId: number, result: CommandResult): boolean {
    const waiter = this.waiting.get(requestId);
    if (!waiter) return false;
    clearTimeout(waiter.timer);
    this.waiting.delete(requestId);
    waiter.resolve(result);
    return true;
  }

  /** Forgets `requestId` without settling it, e.g. when its command was never sent. */
  public discard(requestId: number): void {
    const waiter = this.waiting.get(requestId);
    if (!waiter) return;
    clearTimeout(waiter.timer);
    this.waiting.delete(requestId);
  }

  /** Rejects every waiter; the viewer is gone. */
  public cancelAll(error: Error): void {
    const waiters = [...this.waiting.values()];
    this.waiting.clear();
    for (const waiter of waiters) {
      clearTimeout(waiter.timer);
      waiter.reject(error);
    }
  }
}
