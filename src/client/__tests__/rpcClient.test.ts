import { createServer, type Server } from "node:http";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { LocalCommandQueue } from "../../core/commandQueue.js";
import { defaultViewerState } from "../../core/types/viewer.js";
import { createViewerMethods } from "../../server/rpc/methods.js";
import { PendingReplies } from "../../server/rpc/pendingReplies.js";
import { createRpcApp } from "../../server/rpc/server.js";
import { describeRpcError, RpcClient, RpcClientError } from "../rpcClient.js";

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Expected a TCP address"));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

describe("RpcClient", () => {
  const queue = new LocalCommandQueue();
  let server: Server;
  let client: RpcClient;

  beforeAll(async () => {
    const app = createRpcApp(
      createViewerMethods({
        commands: queue,
        readState: defaultViewerState,
        pending: new PendingReplies(1000),
        captureEnabled: false,
      }),
    );
    server = createServer(app);
    const port = await listen(server);
    client = new RpcClient(`http://127.0.0.1:${port}`);
  });

  afterAll(async () => {
    server.closeAllConnections();
    await close(server);
  });

  it("returns a confirmation string", async () => {
    expect(await client.callText("set_rotation", [1, 2, 3])).toBe("Set rotation to (1, 2, 3)");
    expect(queue.tryRecv()).toEqual({ type: "set_rotation", rotation: [1, 2, 3] });
  });

  it("validates stats", async () => {
    expect(await client.getStats()).toEqual({
      vertices: 0,
      edges: 0,
      faces: 0,
      is_manifold: false,
      holes: 0,
    });
  });

  it("raises error replies with their code and data", async () => {
    const error = await client
      .callText("rotate_around_axis", [[0, 1], "90d"])
      .then(() => null, (e: unknown) => e);
    expect(error).toBeInstanceOf(RpcClientError);
    if (!(error instanceof RpcClientError)) return;
    expect(error.code).toBe(-32602);
    expect(describeRpcError(error)).toBe("Invalid axis: Axis must be [x, y, z]");
  });

  it("rejects non-string results from callText", async () => {
    await expect(client.callText("get_stats")).rejects.toThrow(
      "Unexpected result from get_stats",
    );
  });
});

describe("describeRpcError", () => {
  it("prints the bare message without data", () => {
    expect(describeRpcError(new RpcClientError("Viewer answered HTTP 500"))).toBe(
      "Viewer answered HTTP 500",
    );
  });

  it("serialises structured data", () => {
    expect(describeRpcError(new RpcClientError("Invalid params", -32602, [{ path: "x" }]))).toBe(
      'Invalid params: [{"path":"x"}]',
    );
  });
});
