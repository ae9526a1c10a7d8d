// src/server/rpc/server.ts
import type { Server } from "node:http";
import express, { type ErrorRequestHandler, type Express } from "express";
import { toErrorMessage } from "../../core/errors.js";
import {
  handleRpcPayload,
  parseErrorResponse,
  type RpcMethodTable,
} from "./jsonRpc.js";

/**
 * Express app answering JSON-RPC 2.0 on `POST /`.
 */
export function createRpcApp(methods: RpcMethodTable): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(express.json({ limit: "1mb" }));

  app.post("/", (req, res, next) => {
    handleRpcPayload(methods, req.body).then((response) => {
      if (response === null) {
        res.status(204).end();
        return;
      }
      res.json(response);
    }, next);
  });

  const onParseError: ErrorRequestHandler = (err, _req, res, next) => {
    if (err instanceof SyntaxError) {
      res.status(200).json(parseErrorResponse(err.message));
      return;
    }
    next(err);
  };
  app.use(onParseError);

  return app;
}

/**
 * Starts listening. A failure to bind is logged and resolves to `null` so
 * the viewer keeps running without remote control.
 */
export function startRpcServer(
  methods: RpcMethodTable,
  host: string,
  port: number,
): Promise<Server | null> {
  const app = createRpcApp(methods);
  return new Promise((resolve) => {
    const server = app.listen(port, host);
    server.once("listening", () => {
      console.log(`[RPC] Server listening on http://${host}:${port}`);
      console.log("[RPC] Available methods:");
      for (const [name, method] of methods) {
        console.log(`[RPC]   - ${name}(${method.paramNames.join(", ")})`);
      }
      resolve(server);
    });
    server.once("error", (err) => {
      console.error(`[RPC] Failed to start server on ${host}:${port}: ${toErrorMessage(err)}`);
      resolve(null);
    });
  });
}
