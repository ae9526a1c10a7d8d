import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ChannelError } from "../../../core/errors.js";
import { PendingReplies, ReplyTimeoutError } from "../pendingReplies.js";

describe("PendingReplies", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the settled result", async () => {
    const pending = new PendingReplies(500);
    const { requestId, result } = pending.create();
    expect(pending.settle(requestId, { ok: true, message: "/tmp/a.png" })).toBe(true);
    await expect(result).resolves.toEqual({ ok: true, message: "/tmp/a.png" });
    expect(pending.size).toBe(0);
  });

  it("hands out distinct ids", () => {
    const pending = new PendingReplies(500);
    const first = pending.create();
    const second = pending.create();
    expect(second.requestId).not.toBe(first.requestId);
    pending.discard(first.requestId);
    pending.discard(second.requestId);
  });

  it("times out", async () => {
    const pending = new PendingReplies(500);
    const { requestId, result } = pending.create();
    const outcome = expect(result).rejects.toThrow(
      new ReplyTimeoutError("No reply from viewer after 500 ms"),
    );
    vi.advanceTimersByTime(500);
    await outcome;
    expect(pending.settle(requestId, { ok: true, message: "late" })).toBe(false);
  });

  it("forgets discarded requests without rejecting them", () => {
    const pending = new PendingReplies(500);
    const { requestId } = pending.create();
    pending.discard(requestId);
    expect(pending.size).toBe(0);
    vi.advanceTimersByTime(1000);
    expect(pending.settle(requestId, { ok: true, message: "x" })).toBe(false);
  });

  it("rejects every waiter on cancelAll", async () => {
    const pending = new PendingReplies(500);
    const a = pending.create();
    const b = pending.create();
    const error = new ChannelError("Viewer has exited");
    pending.cancelAll(error);
    await expect(a.result).rejects.toBe(error);
    await expect(b.result).rejects.toBe(error);
    expect(pending.size).toBe(0);
  });
});
