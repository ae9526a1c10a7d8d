// src/server/rpc/methods.ts
import path from "node:path";
import { z } from "zod";
import type { CommandSender } from "../../core/commandQueue.js";
import type { CommandResult, ViewerCommand } from "../../core/commands.js";
import { ChannelError, toErrorMessage } from "../../core/errors.js";
import {
  displayFlagValue,
  type DisplayFlag,
  type ViewerStateSnapshot,
} from "../../core/types/viewer.js";
import { parseAngle } from "./angle.js";
import {
  CAPTURE_FAILED,
  defineMethod,
  INVALID_PARAMS,
  METHOD_NOT_FOUND,
  REPLY_TIMED_OUT,
  RpcError,
  SEND_FAILED,
  type RpcMethod,
  type RpcMethodTable,
} from "./jsonRpc.js";
import { PendingReplies, ReplyTimeoutError } from "./pendingReplies.js";

/** What the handlers need from the rest of the process. */
export interface RpcMethodContext {
  commands: CommandSender;
  readState: () => ViewerStateSnapshot;
  pending: PendingReplies;
  captureEnabled: boolean;
  /** Turns a caller-supplied path into an absolute one. */
  resolvePath?: (p: string) => string;
}

/** `get_stats` reply. */
export interface MeshStatsResponse {
  vertices: number;
  edges: number;
  faces: number;
  is_manifold: boolean;
  holes: number;
}

const finite = z.number().finite();
const xyzSchema = z.object({ x: finite, y: finite, z: finite });
const noParams = z.object({});

const FLAG_LABELS: Record<DisplayFlag, string> = {
  wireframe: "Wireframe",
  backfaces: "Backfaces",
  ui: "UI",
};

const onOff = (enabled: boolean) => (enabled ? "enabled" : "disabled");

function send(ctx: RpcMethodContext, command: ViewerCommand): void {
  try {
    ctx.commands.send(command);
  } catch (e) {
    if (e instanceof ChannelError) {
      throw new RpcError(
        SEND_FAILED,
        "Failed to send command to viewer",
        toErrorMessage(e.cause ?? e),
      );
    }
    throw e;
  }
}

/**
 * Sends a command that reports back and waits for its result.
 */
async function sendAndWait(
  ctx: RpcMethodContext,
  build: (requestId: number) => ViewerCommand,
): Promise<CommandResult> {
  const { requestId, result } = ctx.pending.create();
  try {
    send(ctx, build(requestId));
  } catch (e) {
    ctx.pending.discard(requestId);
    throw e;
  }
  try {
    return await result;
  } catch (e) {
    if (e instanceof ReplyTimeoutError) {
      throw new RpcError(REPLY_TIMED_OUT, "Viewer did not reply in time", e.message);
    }
    throw new RpcError(SEND_FAILED, "Viewer stopped", toErrorMessage(e));
  }
}

function flagMethods(
  ctx: RpcMethodContext,
  flag: DisplayFlag,
): [string, RpcMethod][] {
  const label = FLAG_LABELS[flag];
  const set = (enabled: boolean) =>
    defineMethod([], noParams, () => {
      send(ctx, { type: "set_display_flag", flag, enabled });
      return `${label} ${onOff(enabled)}`;
    });
  return [
    [`enable_${flag}`, set(true)],
    [`disable_${flag}`, set(false)],
    [
      `toggle_${flag}`,
      defineMethod([], noParams, () => {
        // The loop flips whatever the value is when the command lands; the
        // reply is a prediction from the latest snapshot.
        const predicted = !displayFlagValue(ctx.readState(), flag);
        send(ctx, { type: "flip_display_flag", flag });
        return `${label} ${onOff(predicted)}`;
      }),
    ],
  ];
}

/**
 * Builds the method table served on the RPC endpoint.
 */
export function createViewerMethods(ctx: RpcMethodContext): RpcMethodTable {
  const resolvePath = ctx.resolvePath ?? ((p: string) => path.resolve(p));

  const methods = new Map<string, RpcMethod>([
    [
      "load_model",
      defineMethod(
        ["path", "mesh_name"],
        z.object({
          path: z.string().min(1),
          mesh_name: z.string().min(1).optional(),
        }),
        async (params) => {
          const result = await sendAndWait(ctx, (requestId) => ({
            type: "load_model",
            path: resolvePath(params.path),
            meshName: params.mesh_name,
            requestId,
          }));
          if (!result.ok) {
            throw new RpcError(INVALID_PARAMS, result.message, {
              availableNames: result.availableNames ?? [],
            });
          }
          return `Loading model: ${params.path}`;
        },
      ),
    ],
    [
      "set_rotation",
      defineMethod(["x", "y", "z"], xyzSchema, ({ x, y, z }) => {
        send(ctx, { type: "set_rotation", rotation: [x, y, z] });
        return `Set rotation to (${x}, ${y}, ${z})`;
      }),
    ],
    [
      "rotate_around_axis",
      defineMethod(
        ["axis", "angle"],
        z.object({ axis: z.array(finite), angle: z.string() }),
        ({ axis, angle }) => {
          if (axis.length !== 3) {
            throw new RpcError(INVALID_PARAMS, "Invalid axis", "Axis must be [x, y, z]");
          }
          let radians: number;
          try {
            radians = parseAngle(angle);
          } catch (e) {
            throw new RpcError(INVALID_PARAMS, "Invalid angle format", toErrorMessage(e));
          }
          const [x, y, z] = axis;
          send(ctx, { type: "rotate_around_axis", axis: [x, y, z], angle: radians });
          return `Rotated around axis [${x}, ${y}, ${z}] by ${angle}`;
        },
      ),
    ],
    [
      "set_camera_position",
      defineMethod(["x", "y", "z"], xyzSchema, ({ x, y, z }) => {
        send(ctx, { type: "set_camera_position", position: [x, y, z] });
        return `Set camera position to (${x}, ${y}, ${z})`;
      }),
    ],
    [
      "set_camera_target",
      defineMethod(["x", "y", "z"], xyzSchema, ({ x, y, z }) => {
        send(ctx, { type: "set_camera_target", target: [x, y, z] });
        return `Set camera target to (${x}, ${y}, ${z})`;
      }),
    ],
    ...flagMethods(ctx, "wireframe"),
    ...flagMethods(ctx, "backfaces"),
    ...flagMethods(ctx, "ui"),
    [
      "get_stats",
      defineMethod([], noParams, (): MeshStatsResponse => {
        const { stats } = ctx.readState();
        return {
          vertices: stats.vertexCount,
          edges: stats.edgeCount,
          faces: stats.faceCount,
          is_manifold: stats.isManifold,
          holes: stats.holeCount,
        };
      }),
    ],
    [
      "capture_frame",
      defineMethod(
        ["path"],
        z.object({ path: z.string().min(1).optional() }),
        async (params) => {
          if (!ctx.captureEnabled) {
            throw new RpcError(METHOD_NOT_FOUND, "Frame capture not enabled");
          }
          const target = params.path === undefined ? undefined : resolvePath(params.path);
          const result = await sendAndWait(ctx, (requestId) => ({
            type: "capture_frame",
            path: target,
            requestId,
          }));
          if (!result.ok) {
            throw new RpcError(CAPTURE_FAILED, "Capture failed", result.message);
          }
          return `Frame captured to: ${result.message}`;
        },
      ),
    ],
    [
      "screenshot",
      defineMethod(
        ["path"],
        z.object({ path: z.string().min(1) }),
        async (params) => {
          const result = await sendAndWait(ctx, (requestId) => ({
            type: "screenshot",
            path: resolvePath(params.path),
            requestId,
          }));
          if (!result.ok) {
            throw new RpcError(CAPTURE_FAILED, "Capture failed", result.message);
          }
          return `Screenshot saved to: ${result.message}`;
        },
      ),
    ],
    [
      "quit",
      defineMethod([], noParams, () => {
        send(ctx, { type: "quit" });
        return "Viewer will quit";
      }),
    ],
  ]);
  return methods;
}
