// src/app/viewer.ts
import type { Server } from "node:http";
import { Worker, type TransferListItem } from "node:worker_threads";
import { createCommandChannel } from "../core/commandQueue.js";
import { rpcAddress, type ViewerConfig } from "../core/config.js";
import { ChannelError, toErrorMessage } from "../core/errors.js";
import { defaultViewerState } from "../core/types/viewer.js";
import type { WindowEvent } from "../core/types/window.js";
import {
  MSG_COMMAND_RESULT,
  MSG_EXIT,
  MSG_FATAL,
  MSG_INIT,
  MSG_READY,
  MSG_SUBMIT_COMMAND,
  MSG_WINDOW_EVENT,
  type InitialMeshPayload,
  type InitMsg,
  type MainToWorkerMsg,
  type WorkerToMainMsg,
} from "../core/types/worker.js";
import {
  allocateViewerState,
  initializeViewerState,
  readViewerState,
} from "../core/viewerState.js";
import { loadMesh } from "../loaders/mesh/loadMesh.js";
import { createViewerMethods } from "../server/rpc/methods.js";
import { PendingReplies } from "../server/rpc/pendingReplies.js";
import { startRpcServer } from "../server/rpc/server.js";
import {
  DISABLE_MOUSE_REPORTING,
  ENABLE_MOUSE_REPORTING,
  TerminalInputParser,
} from "./terminalInput.js";

/**
 * Runs the viewer until it quits.
 *
 * @remarks
 * The main thread loads the initial mesh, allocates the shared state and
 * the command queue, then hands the GPU side to the render worker. It
 * keeps the RPC server and the terminal; everything it learns from them
 * reaches the worker as a command or a window event.
 *
 * @returns The process exit code.
 * @throws {InputError | FormatError} If the initial mesh cannot be loaded.
 */
export async function runViewer(config: ViewerConfig): Promise<number> {
  let initialMesh: InitialMeshPayload | null = null;
  if (config.meshPath) {
    console.log(`[Viewer] Loading mesh from ${config.meshPath}...`);
    const mesh = await loadMesh(config.meshPath, config.meshName);
    initialMesh = {
      name: mesh.name,
      positions: mesh.positions,
      indices: mesh.indices,
      stats: mesh.stats,
    };
    console.log(
      `[Viewer] ${mesh.stats.vertexCount} vertices, ${mesh.stats.faceCount} faces`,
    );
  }

  const { buffer: sharedStateBuffer, ctx: stateCtx } = allocateViewerState();
  initializeViewerState(stateCtx, defaultViewerState());

  const { sender, receiverPort } = createCommandChannel();
  const pending = new PendingReplies(config.captureTimeoutMs);

  const worker = new Worker(new URL("./worker.js", import.meta.url));
  const postToWorker = (msg: MainToWorkerMsg, transfer: TransferListItem[] = []) =>
    worker.postMessage(msg, transfer);
  const sendWindowEvent = (event: WindowEvent) =>
    postToWorker({ type: MSG_WINDOW_EVENT, event });

  let server: Server | null = null;
  const stopTerminal = attachTerminal(config, sendWindowEvent);
  const onSigint = () => sendWindowEvent({ type: "CloseRequested" });
  process.on("SIGINT", onSigint);

  const exitCode = await new Promise<number>((resolve) => {
    worker.on("message", (msg: WorkerToMainMsg) => {
      switch (msg.type) {
        case MSG_READY:
          console.log(
            `[Viewer] Ready. RPC server at http://${rpcAddress(config)} (adapter: ${msg.adapter})`,
          );
          console.log("  W: Toggle wireframe");
          console.log("  B: Toggle backfaces");
          console.log("  U: Toggle UI");
          console.log("  Q/ESC: Exit");
          break;
        case MSG_SUBMIT_COMMAND:
          try {
            sender.send(msg.command);
          } catch (e) {
            console.error(`[Viewer] Dropping ${msg.command.type}: ${toErrorMessage(e)}`);
          }
          break;
        case MSG_COMMAND_RESULT:
          if (!pending.settle(msg.requestId, msg.result)) {
            console.warn(`[Viewer] Late reply for request ${msg.requestId}`);
          }
          break;
        case MSG_EXIT:
          resolve(msg.code);
          break;
        case MSG_FATAL:
          console.error(`[Viewer] Render worker failed: ${msg.message}`);
          resolve(1);
          break;
      }
    });
    worker.on("error", (e) => {
      console.error("[Worker] Uncaught error:", e);
      resolve(1);
    });
    worker.on("exit", (code) => resolve(code === 0 ? 0 : 1));

    const init: InitMsg = {
      type: MSG_INIT,
      sharedStateBuffer,
      commandPort: receiverPort,
      initialMesh,
      settings: {
        width: config.width,
        height: config.height,
        targetFps: config.targetFps,
        rpcAddress: rpcAddress(config),
        captureEnabled: config.captureEnabled,
        captureDir: config.captureDir,
        debug: config.debug,
      },
    };
    const transfer: TransferListItem[] = [receiverPort];
    if (initialMesh) {
      for (const { buffer } of [initialMesh.positions, initialMesh.indices]) {
        if (buffer instanceof ArrayBuffer) transfer.push(buffer);
      }
    }
    postToWorker(init, transfer);

    const methods = createViewerMethods({
      commands: sender,
      readState: () => readViewerState(stateCtx),
      pending,
      captureEnabled: config.captureEnabled,
    });
    startRpcServer(methods, config.rpcHost, config.rpcPort).then((s) => {
      server = s;
    }, (e: unknown) => {
      console.error(`[RPC] ${toErrorMessage(e)}`);
    });
  });

  process.off("SIGINT", onSigint);
  stopTerminal();
  sender.close();
  pending.cancelAll(new ChannelError("Viewer has exited"));
  await closeServer(server);
  await worker.terminate();
  return exitCode;
}

function closeServer(server: Server | null): Promise<void> {
  if (!server) return Promise.resolve();
  return new Promise((resolve) => {
    server.close((err) => {
      if (err) console.warn(`[RPC] ${err.message}`);
      resolve();
    });
    server.closeAllConnections();
  });
}

/**
 * Puts an interactive terminal in raw mode with mouse reporting and feeds
 * its input to the worker.
 *
 * @returns A function that restores the terminal.
 */
function attachTerminal(
  config: ViewerConfig,
  sendWindowEvent: (event: WindowEvent) => void,
): () => void {
  const { stdin, stdout } = process;
  if (!stdin.isTTY || !stdout.isTTY) return () => {};

  const parser = new TerminalInputParser(() => ({
    columns: stdout.columns,
    rows: stdout.rows,
    width: config.width,
    height: config.height,
  }));
  const onData = (chunk: Buffer) => {
    for (const event of parser.feed(chunk.toString("utf8"))) {
      sendWindowEvent(event);
    }
  };

  stdin.setRawMode(true);
  stdin.on("data", onData);
  stdin.resume();
  stdout.write(ENABLE_MOUSE_REPORTING);

  return () => {
    stdout.write(DISABLE_MOUSE_REPORTING);
    stdin.off("data", onData);
    stdin.setRawMode(false);
    stdin.pause();
  };
}
