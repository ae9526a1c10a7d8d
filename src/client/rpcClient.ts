// src/client/rpcClient.ts
import { z } from "zod";
import { ViewerError } from "../core/errors.js";

/** An error reply from the viewer, or a transport failure. */
export class RpcClientError extends ViewerError {
  readonly code?: number;
  readonly data?: unknown;

  constructor(message: string, code?: number, data?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.data = data;
  }
}

// Error first: `result: z.unknown()` would also accept an error reply.
const responseSchema = z.union([
  z.object({
    jsonrpc: z.literal("2.0"),
    id: z.union([z.string(), z.number(), z.null()]),
    error: z.object({
      code: z.number(),
      message: z.string(),
      data: z.unknown().optional(),
    }),
  }),
  z.object({
    jsonrpc: z.literal("2.0"),
    id: z.union([z.string(), z.number(), z.null()]),
    result: z.unknown(),
  }),
]);

export const statsResponseSchema = z.object({
  vertices: z.number(),
  edges: z.number(),
  faces: z.number(),
  is_manifold: z.boolean(),
  holes: z.number(),
});

export type StatsResponse = z.infer<typeof statsResponseSchema>;

/**
 * Minimal JSON-RPC 2.0 client for a running viewer.
 */
export class RpcClient {
  private url: string;
  private nextId = 1;

  constructor(url: string) {
    this.url = url;
  }

  public async call(method: string, params: unknown[] = []): Promise<unknown> {
    const id = this.nextId++;
    let res: Response;
    try {
      res = await fetch(this.url, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ jsonrpc: "2.0", method, params, id }),
      });
    } catch (e) {
      throw new RpcClientError(
        `Could not reach viewer at ${this.url}. Is it running?`,
        undefined,
        undefined,
        { cause: e },
      );
    }
    if (!res.ok) {
      throw new RpcClientError(`Viewer answered HTTP ${res.status}`);
    }

    const parsed = responseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new RpcClientError("Malformed JSON-RPC response");
    }
    const body = parsed.data;
    if ("error" in body) {
      throw new RpcClientError(body.error.message, body.error.code, body.error.data);
    }
    return body.result;
  }

  /** Calls a method whose result is a confirmation string. */
  public async callText(method: string, params: unknown[] = []): Promise<string> {
    const result = await this.call(method, params);
    if (typeof result !== "string") {
      throw new RpcClientError(`Unexpected result from ${method}`);
    }
    return result;
  }

  public async getStats(): Promise<StatsResponse> {
    const parsed = statsResponseSchema.safeParse(await this.call("get_stats"));
    if (!parsed.success) {
      throw new RpcClientError("Unexpected result from get_stats");
    }
    return parsed.data;
  }
}

/**
 * Formats a client error for the terminal, including the server's detail.
 */
export function describeRpcError(e: RpcClientError): string {
  if (e.data === undefined) return e.message;
  if (typeof e.data === "string") return `${e.message}: ${e.data}`;
  if (
    typeof e.data === "object" &&
    e.data !== null &&
    "availableNames" in e.data &&
    Array.isArray(e.data.availableNames)
  ) {
    return e.message;
  }
  return `${e.message}: ${JSON.stringify(e.data)}`;
}
