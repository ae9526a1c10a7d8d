// src/core/types/worker.ts
import type { MessagePort } from "node:worker_threads";
import type { CommandResult, ViewerCommand } from "../commands.js";
import type { MeshStats } from "./viewer.js";
import type { WindowEvent } from "./window.js";

// Main → render worker
export const MSG_INIT = "INIT";
export const MSG_WINDOW_EVENT = "WINDOW_EVENT";

// Render worker → main
export const MSG_READY = "READY";
export const MSG_SUBMIT_COMMAND = "SUBMIT_COMMAND";
export const MSG_COMMAND_RESULT = "COMMAND_RESULT";
export const MSG_EXIT = "EXIT";
export const MSG_FATAL = "FATAL";

/** Mesh data handed to the worker at startup; buffers are transferred. */
export interface InitialMeshPayload {
  name?: string;
  positions: Float32Array;
  indices: Uint32Array;
  stats: MeshStats;
}

/** Settings the render worker needs; a subset of the viewer config. */
export interface RenderSettings {
  width: number;
  height: number;
  targetFps: number;
  /** "host:port" shown in the overlay. */
  rpcAddress: string;
  captureEnabled: boolean;
  captureDir: string;
  /** Log every applied command with console.debug. */
  debug: boolean;
}

export interface InitMsg {
  type: typeof MSG_INIT;
  sharedStateBuffer: SharedArrayBuffer;
  commandPort: MessagePort;
  initialMesh: InitialMeshPayload | null;
  settings: RenderSettings;
}

export interface WindowEventMsg {
  type: typeof MSG_WINDOW_EVENT;
  event: WindowEvent;
}

export type MainToWorkerMsg = InitMsg | WindowEventMsg;

export interface ReadyMsg {
  type: typeof MSG_READY;
  adapter: string;
}

/** A command produced inside the worker (keyboard shortcut) for the shared queue. */
export interface SubmitCommandMsg {
  type: typeof MSG_SUBMIT_COMMAND;
  command: ViewerCommand;
}

/** Reply to a command that carried a `requestId`. */
export interface CommandResultMsg {
  type: typeof MSG_COMMAND_RESULT;
  requestId: number;
  result: CommandResult;
}

export interface ExitMsg {
  type: typeof MSG_EXIT;
  code: number;
}

export interface FatalMsg {
  type: typeof MSG_FATAL;
  message: string;
}

export type WorkerToMainMsg =
  | ReadyMsg
  | SubmitCommandMsg
  | CommandResultMsg
  | ExitMsg
  | FatalMsg;

export const RENDER_THREAD_ONLY: unique symbol = Symbol("renderThreadOnly");

/**
 * Marker carried by objects that hold GPU handles. They live and die on the
 * render thread and must never appear in a message.
 */
export interface RenderThreadOnly {
  readonly [RENDER_THREAD_ONLY]: true;
}

/**
 * Maps `T` to itself when it survives structured cloning, and poisons every
 * property that would not (functions, GPU handles) with `never`.
 */
export type CloneChecked<T> = T extends (...args: never[]) => unknown
  ? never
  : T extends RenderThreadOnly
    ? never
    : T extends ArrayBufferView | ArrayBuffer | SharedArrayBuffer | MessagePort
      ? T
      : T extends object
        ? { [K in keyof T]: CloneChecked<T[K]> }
        : T;
