// src/core/commandQueue.ts
import { MessageChannel, receiveMessageOnPort } from "node:worker_threads";
import type { MessagePort } from "node:worker_threads";
import { decodeViewerCommand, type ViewerCommand } from "./commands.js";
import { ChannelError } from "./errors.js";

/**
 * Producer side of the command queue. `send` never blocks and never waits
 * for the command to be applied.
 */
export interface CommandSender {
  /** @throws {ChannelError} once the receiving side has closed. */
  send(command: ViewerCommand): void;
  readonly closed: boolean;
}

/**
 * Consumer side. `tryRecv` returns immediately whether or not a command is
 * available.
 */
export interface CommandReceiver {
  tryRecv(): ViewerCommand | undefined;
  close(): void;
}

/**
 * Sender over a `MessagePort`. Several producers on the same thread share
 * one instance; the port itself preserves arrival order.
 */
export class PortCommandSender implements CommandSender {
  private port: MessagePort;
  private isClosed = false;

  constructor(port: MessagePort) {
    this.port = port;
    this.port.on("close", () => {
      this.isClosed = true;
    });
    // The sender never receives, so it must not keep the process alive.
    this.port.unref();
  }

  public get closed(): boolean {
    return this.isClosed;
  }

  public send(command: ViewerCommand): void {
    if (this.isClosed) {
      throw new ChannelError("Failed to send command to viewer");
    }
    try {
      this.port.postMessage(command);
    } catch (e) {
      throw new ChannelError("Failed to send command to viewer", { cause: e });
    }
  }

  /** Marks the queue closed from this side, e.g. after the worker exited. */
  public close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.port.close();
  }
}

/**
 * Receiver over a `MessagePort`, drained synchronously with
 * `receiveMessageOnPort` so no 'message' listener is ever attached.
 */
export class PortCommandReceiver implements CommandReceiver {
  private port: MessagePort;

  constructor(port: MessagePort) {
    this.port = port;
  }

  public tryRecv(): ViewerCommand | undefined {
    for (;;) {
      const received = receiveMessageOnPort(this.port);
      if (!received) return undefined;
      const command = decodeViewerCommand(received.message);
      if (command) return command;
    }
  }

  public close(): void {
    this.port.close();
  }
}

/**
 * Creates a connected sender/receiver pair. The receiver's port is returned
 * as well so it can be transferred to the render worker.
 */
export function createCommandChannel(): {
  sender: PortCommandSender;
  receiverPort: MessagePort;
} {
  const { port1, port2 } = new MessageChannel();
  return { sender: new PortCommandSender(port1), receiverPort: port2 };
}

/**
 * Same-thread queue for when producer and consumer share a thread.
 */
export class LocalCommandQueue implements CommandSender, CommandReceiver {
  private items: ViewerCommand[] = [];
  private isClosed = false;

  public get closed(): boolean {
    return this.isClosed;
  }

  public send(command: ViewerCommand): void {
    if (this.isClosed) {
      throw new ChannelError("Failed to send command to viewer");
    }
    this.items.push(command);
  }

  public tryRecv(): ViewerCommand | undefined {
    return this.items.shift();
  }

  public close(): void {
    this.isClosed = true;
    this.items = [];
  }
}
