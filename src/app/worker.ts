// src/app/worker.ts
import { parentPort } from "node:worker_threads";
import { toErrorMessage } from "../core/errors.js";
import {
  MSG_FATAL,
  MSG_INIT,
  MSG_WINDOW_EVENT,
  type MainToWorkerMsg,
} from "../core/types/worker.js";
import { initWorker, postToMain } from "./worker/init.js";
import { state } from "./worker/state.js";

/**
 * Render worker entry point.
 *
 * @remarks
 * The worker owns the GPU. It receives the shared state buffer, the
 * receiving end of the command queue and the initial mesh in INIT, then
 * runs the render loop on timers. Window events from the main thread are
 * forwarded to the loop as they arrive.
 *
 * Messages:
 * - INIT: complete worker setup
 * - WINDOW_EVENT: input, resize and close requests
 */
parentPort?.on("message", (msg: MainToWorkerMsg) => {
  switch (msg.type) {
    case MSG_INIT: {
      initWorker(msg).catch((e: unknown) => {
        console.error("[Worker] Initialization failed:", e);
        postToMain({ type: MSG_FATAL, message: toErrorMessage(e) });
      });
      break;
    }
    case MSG_WINDOW_EVENT: {
      state.context?.loop.handleEvent(msg.event);
      break;
    }
  }
});
