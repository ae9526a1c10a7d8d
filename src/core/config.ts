// src/core/config.ts
import { z } from "zod";
import { InputError } from "./errors.js";

export const DEFAULT_RPC_PORT = 9001;

const booleanFlag = z
  .union([z.boolean(), z.enum(["1", "0", "true", "false", "yes", "no", ""])])
  .transform((v) => v === true || v === "1" || v === "true" || v === "yes");

const configSchema = z.object({
  rpcHost: z.string().min(1).default("127.0.0.1"),
  rpcPort: z.coerce.number().int().min(1).max(65535).default(DEFAULT_RPC_PORT),
  width: z.coerce.number().int().positive().default(1280),
  height: z.coerce.number().int().positive().default(720),
  targetFps: z.coerce.number().positive().max(1000).default(60),
  captureEnabled: booleanFlag.default(false),
  captureDir: z.string().min(1).default("captures"),
  captureTimeoutMs: z.coerce.number().int().positive().default(10_000),
  debug: booleanFlag.default(false),
  meshPath: z.string().min(1).optional(),
  meshName: z.string().min(1).optional(),
});

export type ViewerConfig = Readonly<z.infer<typeof configSchema>>;

/** Raw values before validation; strings from the environment or argv. */
export type ConfigInput = {
  [K in keyof ViewerConfig]?: string | number | boolean;
};

const ENV_KEYS: Record<string, keyof ViewerConfig> = {
  MESHVIEW_RPC_PORT: "rpcPort",
  MESHVIEW_WIDTH: "width",
  MESHVIEW_HEIGHT: "height",
  MESHVIEW_FPS: "targetFps",
  MESHVIEW_ENABLE_CAPTURE: "captureEnabled",
  MESHVIEW_CAPTURE_DIR: "captureDir",
  MESHVIEW_DEBUG: "debug",
};

/**
 * Builds the viewer configuration from environment variables, then
 * `overrides` (command-line flags) on top.
 *
 * @throws {InputError} Listing every invalid value.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigInput = {},
): ViewerConfig {
  const raw: Record<string, unknown> = {};
  for (const [envKey, configKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value !== "") raw[configKey] = value;
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) raw[key] = value;
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new InputError(`Invalid configuration: ${issues}`);
  }
  return Object.freeze(parsed.data);
}

/** "host:port" as shown in the overlay and logs. */
export function rpcAddress(config: ViewerConfig): string {
  return `${config.rpcHost}:${config.rpcPort}`;
}
