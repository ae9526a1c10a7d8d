// src/core/commands.ts
import { z } from "zod";

/**
 * Closed set of mutations the render loop accepts. Every producer (RPC
 * handlers, keyboard shortcuts) goes through these; values are plain data
 * so they survive structured cloning across the worker boundary.
 */

const finite = z.number().finite();
const point3Schema = z.tuple([finite, finite, finite]);

export const displayFlagSchema = z.enum(["wireframe", "backfaces", "ui"]);

export const viewerCommandSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("load_model"),
    path: z.string().min(1),
    meshName: z.string().optional(),
    requestId: z.number().int().optional(),
  }),
  z.object({ type: z.literal("set_rotation"), rotation: point3Schema }),
  z.object({
    type: z.literal("rotate_around_axis"),
    axis: point3Schema,
    /** Radians. */
    angle: finite,
  }),
  z.object({ type: z.literal("set_camera_position"), position: point3Schema }),
  z.object({ type: z.literal("set_camera_target"), target: point3Schema }),
  z.object({
    type: z.literal("set_display_flag"),
    flag: displayFlagSchema,
    enabled: z.boolean(),
  }),
  z.object({ type: z.literal("flip_display_flag"), flag: displayFlagSchema }),
  z.object({
    type: z.literal("screenshot"),
    path: z.string().min(1),
    requestId: z.number().int().optional(),
  }),
  z.object({
    type: z.literal("capture_frame"),
    path: z.string().min(1).optional(),
    requestId: z.number().int().optional(),
  }),
  z.object({ type: z.literal("quit") }),
]);

export type ViewerCommand = z.infer<typeof viewerCommandSchema>;

export type ViewerCommandType = ViewerCommand["type"];

/** Commands that produce an image on disk and may report back to a caller. */
export type CaptureCommand = Extract<
  ViewerCommand,
  { type: "screenshot" } | { type: "capture_frame" }
>;

/**
 * Outcome of a command whose sender asked to hear back (it carried a
 * `requestId`).
 */
export interface CommandResult {
  ok: boolean;
  /** Output path or confirmation on success, error text on failure. */
  message: string;
  /** Valid mesh names, for a failed mesh selection. */
  availableNames?: string[];
}

/**
 * Validates a value received from another thread.
 *
 * @returns The command, or `null` with the validation issue logged.
 */
export function decodeViewerCommand(value: unknown): ViewerCommand | null {
  const parsed = viewerCommandSchema.safeParse(value);
  if (!parsed.success) {
    console.warn(
      "[Commands] Dropping malformed command:",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
    return null;
  }
  return parsed.data;
}
