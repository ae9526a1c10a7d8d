// src/server/rpc/jsonRpc.ts
import { z } from "zod";
import { toErrorMessage } from "../../core/errors.js";

export const PARSE_ERROR = -32700;
export const INVALID_REQUEST = -32600;
export const METHOD_NOT_FOUND = -32601;
export const INVALID_PARAMS = -32602;
export const INTERNAL_ERROR = -32603;
/** The command could not be handed to the viewer. */
export const SEND_FAILED = -32000;
export const CAPTURE_FAILED = -32001;
export const REPLY_TIMED_OUT = -32002;

export type JsonRpcId = string | number | null;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcResponse =
  | { jsonrpc: "2.0"; id: JsonRpcId; result: unknown }
  | { jsonrpc: "2.0"; id: JsonRpcId; error: JsonRpcErrorObject };

/** An error a method handler raises to produce a structured reply. */
export class RpcError extends Error {
  readonly code: number;
  readonly data?: unknown;

  constructor(code: number, message: string, data?: unknown) {
    super(message);
    this.name = "RpcError";
    this.code = code;
    this.data = data;
  }

  public toJSON(): JsonRpcErrorObject {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

const requestSchema = z.object({
  jsonrpc: z.literal("2.0"),
  method: z.string(),
  params: z.union([z.array(z.unknown()), z.record(z.unknown())]).optional(),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
});

/**
 * One callable method. `paramNames` maps positional arguments onto the
 * named form, which is what `invoke` receives.
 */
export interface RpcMethod {
  readonly paramNames: readonly string[];
  invoke(params: Record<string, unknown>): Promise<unknown>;
}

export type RpcMethodTable = ReadonlyMap<string, RpcMethod>;

/**
 * Builds a method whose named params are validated by `schema` before
 * `handler` sees them.
 */
export function defineMethod<S extends z.ZodTypeAny>(
  paramNames: readonly string[],
  schema: S,
  handler: (params: z.output<S>) => unknown,
): RpcMethod {
  return {
    paramNames,
    async invoke(params) {
      const parsed = schema.safeParse(params);
      if (!parsed.success) {
        throw new RpcError(
          INVALID_PARAMS,
          "Invalid params",
          parsed.error.issues.map((i) => ({
            path: i.path.join("."),
            message: i.message,
          })),
        );
      }
      return handler(parsed.data);
    },
  };
}

function namedParams(
  method: RpcMethod,
  params: unknown[] | Record<string, unknown> | undefined,
): Record<string, unknown> {
  if (params === undefined) return {};
  if (!Array.isArray(params)) return params;
  if (params.length > method.paramNames.length) {
    throw new RpcError(
      INVALID_PARAMS,
      "Invalid params",
      `Expected at most ${method.paramNames.length} positional params, got ${params.length}`,
    );
  }
  const out: Record<string, unknown> = {};
  params.forEach((value, i) => {
    // JSON has no undefined; a null positional arg means "not given".
    if (value !== null) out[method.paramNames[i]] = value;
  });
  return out;
}

const failure = (id: JsonRpcId, error: JsonRpcErrorObject): JsonRpcResponse => ({
  jsonrpc: "2.0",
  id,
  error,
});

async function handleSingle(
  methods: RpcMethodTable,
  message: unknown,
): Promise<JsonRpcResponse | null> {
  const parsed = requestSchema.safeParse(message);
  if (!parsed.success) {
    return failure(null, { code: INVALID_REQUEST, message: "Invalid Request" });
  }
  const request = parsed.data;
  const isNotification = request.id === undefined;
  const id = request.id ?? null;

  const method = methods.get(request.method);
  if (!method) {
    if (isNotification) return null;
    return failure(id, { code: METHOD_NOT_FOUND, message: "Method not found" });
  }

  try {
    const result = await method.invoke(namedParams(method, request.params));
    if (isNotification) return null;
    return { jsonrpc: "2.0", id, result: result ?? null };
  } catch (e) {
    if (isNotification) {
      console.warn(`[RPC] Notification ${request.method} failed: ${toErrorMessage(e)}`);
      return null;
    }
    if (e instanceof RpcError) return failure(id, e.toJSON());
    console.error(`[RPC] ${request.method} failed:`, e);
    return failure(id, {
      code: INTERNAL_ERROR,
      message: "Internal error",
      data: toErrorMessage(e),
    });
  }
}

/**
 * Handles a decoded JSON-RPC payload: a single request or a batch.
 *
 * @returns The response to send, or `null` when only notifications were
 *     received.
 */
export async function handleRpcPayload(
  methods: RpcMethodTable,
  payload: unknown,
): Promise<JsonRpcResponse | JsonRpcResponse[] | null> {
  if (!Array.isArray(payload)) {
    return handleSingle(methods, payload);
  }
  if (payload.length === 0) {
    return failure(null, { code: INVALID_REQUEST, message: "Invalid Request" });
  }
  const responses: JsonRpcResponse[] = [];
  for (const message of payload) {
    const response = await handleSingle(methods, message);
    if (response) responses.push(response);
  }
  return responses.length > 0 ? responses : null;
}

export function parseErrorResponse(detail: string): JsonRpcResponse {
  return failure(null, { code: PARSE_ERROR, message: "Parse error", data: detail });
}
