import { MessageChannel } from "node:worker_threads";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  createCommandChannel,
  LocalCommandQueue,
  PortCommandReceiver,
} from "../commandQueue.js";
import type { ViewerCommand } from "../commands.js";
import { ChannelError } from "../errors.js";

const a: ViewerCommand = { type: "set_rotation", rotation: [1, 0, 0] };
const b: ViewerCommand = { type: "flip_display_flag", flag: "ui" };
const c: ViewerCommand = { type: "set_camera_target", target: [0, 1, 2] };

describe("port command queue", () => {
  const cleanups: Array<() => void> = [];
  afterEach(() => {
    for (const cleanup of cleanups.splice(0)) cleanup();
    vi.restoreAllMocks();
  });

  it("delivers commands in send order", () => {
    const { sender, receiverPort } = createCommandChannel();
    const receiver = new PortCommandReceiver(receiverPort);
    cleanups.push(() => sender.close(), () => receiver.close());

    sender.send(a);
    sender.send(b);
    sender.send(c);

    expect([receiver.tryRecv(), receiver.tryRecv(), receiver.tryRecv()]).toEqual([a, b, c]);
    expect(receiver.tryRecv()).toBeUndefined();
  });

  it("fails to send once closed", () => {
    const { sender, receiverPort } = createCommandChannel();
    cleanups.push(() => receiverPort.close());
    sender.close();
    expect(sender.closed).toBe(true);
    expect(() => sender.send(a)).toThrow(ChannelError);
    expect(() => sender.send(a)).toThrow("Failed to send command to viewer");
  });

  it("drops malformed messages and keeps going", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const { port1, port2 } = new MessageChannel();
    const receiver = new PortCommandReceiver(port2);
    cleanups.push(() => port1.close(), () => receiver.close());

    port1.postMessage({ type: "spin_forever" });
    port1.postMessage({ type: "set_rotation", rotation: [1, 2] });
    port1.postMessage(a);

    expect(receiver.tryRecv()).toEqual(a);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it("drops commands carrying non-finite numbers", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const { port1, port2 } = new MessageChannel();
    const receiver = new PortCommandReceiver(port2);
    cleanups.push(() => port1.close(), () => receiver.close());

    port1.postMessage({ type: "set_camera_position", position: [Infinity, 0, 0] });
    port1.postMessage({ type: "rotate_around_axis", axis: [0, 1, 0], angle: NaN });
    port1.postMessage(c);

    expect(receiver.tryRecv()).toEqual(c);
    expect(receiver.tryRecv()).toBeUndefined();
  });
});

describe("LocalCommandQueue", () => {
  it("is FIFO", () => {
    const queue = new LocalCommandQueue();
    queue.send(c);
    queue.send(a);
    expect(queue.tryRecv()).toEqual(c);
    expect(queue.tryRecv()).toEqual(a);
    expect(queue.tryRecv()).toBeUndefined();
  });

  it("drops queued commands and refuses new ones after close", () => {
    const queue = new LocalCommandQueue();
    queue.send(a);
    queue.close();
    expect(queue.tryRecv()).toBeUndefined();
    expect(() => queue.send(b)).toThrow(ChannelError);
  });
});
