// src/app/cli.ts
import path from "node:path";
import {
  describeRpcError,
  RpcClient,
  RpcClientError,
  type StatsResponse,
} from "../client/rpcClient.js";
import { loadConfig, type ConfigInput } from "../core/config.js";
import { InputError, toErrorMessage } from "../core/errors.js";
import { formatInspectTree, inspectGltf } from "../loaders/gltfInspect.js";
import { loadGLTF } from "../loaders/gltfLoader.js";
import { loadMesh } from "../loaders/mesh/loadMesh.js";
import { formatMeshReport } from "./report.js";
import { runViewer } from "./viewer.js";

/** The calls the CLI makes on a running viewer. */
export interface ViewerRpc {
  callText(method: string, params?: unknown[]): Promise<string>;
  getStats(): Promise<StatsResponse>;
}

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  createClient: (url: string) => ViewerRpc;
  env: NodeJS.ProcessEnv;
}

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  createClient: (url) => new RpcClient(url),
  env: process.env,
};

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

const VALUE_FLAGS = new Set(["port", "width", "height", "fps", "mesh"]);

/**
 * Splits argv into positionals and `--flag [value]` / `--flag=value`
 * options. Single-dash tokens such as negative numbers are positionals.
 *
 * @throws {InputError} When a value flag has no value.
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith("--")) {
      positionals.push(token);
      continue;
    }
    const eq = token.indexOf("=");
    const name = token.slice(2, eq < 0 ? undefined : eq);
    if (eq >= 0) {
      flags.set(name, token.slice(eq + 1));
    } else if (VALUE_FLAGS.has(name)) {
      const value = argv[i + 1];
      if (value === undefined) throw new InputError(`--${name} needs a value`);
      flags.set(name, value);
      i += 1;
    } else {
      flags.set(name, true);
    }
  }
  return { positionals, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

function parseNumberArg(value: string | undefined, label: string): number {
  if (value === undefined) throw new InputError(`Missing ${label}`);
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new InputError(`Invalid ${label}: ${value}`);
  }
  return n;
}

function xyzArgs(args: ParsedArgs): [number, number, number] {
  const [, x, y, z] = args.positionals;
  return [parseNumberArg(x, "x"), parseNumberArg(y, "y"), parseNumberArg(z, "z")];
}

function requiredArg(args: ParsedArgs, index: number, label: string): string {
  const value = args.positionals[index];
  if (value === undefined) throw new InputError(`Missing ${label}`);
  return value;
}

function configOverrides(args: ParsedArgs): ConfigInput {
  return {
    rpcPort: stringFlag(args, "port"),
    width: stringFlag(args, "width"),
    height: stringFlag(args, "height"),
    targetFps: stringFlag(args, "fps"),
    captureEnabled: args.flags.has("enable-capture") ? true : undefined,
    meshName: stringFlag(args, "mesh"),
  };
}

type RemoteHandler = (rpc: ViewerRpc, args: ParsedArgs) => Promise<string>;

const noArgs =
  (method: string): RemoteHandler =>
  (rpc) =>
    rpc.callText(method);

const xyzCall =
  (method: string): RemoteHandler =>
  (rpc, args) =>
    rpc.callText(method, xyzArgs(args));

const REMOTE_COMMANDS = new Map<string, RemoteHandler>([
  [
    "load-model",
    (rpc, args) => {
      const file = path.resolve(requiredArg(args, 1, "model path"));
      const mesh = stringFlag(args, "mesh");
      return rpc.callText("load_model", mesh === undefined ? [file] : [file, mesh]);
    },
  ],
  ["set-rotation", xyzCall("set_rotation")],
  [
    "rotate-around-axis",
    (rpc, args) => {
      const axis = xyzArgs(args);
      return rpc.callText("rotate_around_axis", [axis, requiredArg(args, 4, "angle")]);
    },
  ],
  ["set-camera-position", xyzCall("set_camera_position")],
  ["set-camera-target", xyzCall("set_camera_target")],
  ["enable-wireframe", noArgs("enable_wireframe")],
  ["disable-wireframe", noArgs("disable_wireframe")],
  ["toggle-wireframe", noArgs("toggle_wireframe")],
  ["enable-backfaces", noArgs("enable_backfaces")],
  ["disable-backfaces", noArgs("disable_backfaces")],
  ["toggle-backfaces", noArgs("toggle_backfaces")],
  ["enable-ui", noArgs("enable_ui")],
  ["disable-ui", noArgs("disable_ui")],
  ["toggle-ui", noArgs("toggle_ui")],
  [
    "capture-frame",
    (rpc, args) => {
      const target = args.positionals[1];
      return rpc.callText(
        "capture_frame",
        target === undefined ? [] : [path.resolve(target)],
      );
    },
  ],
  [
    "screenshot",
    (rpc, args) =>
      rpc.callText("screenshot", [path.resolve(requiredArg(args, 1, "screenshot path"))]),
  ],
  ["quit", noArgs("quit")],
]);

export const USAGE = [
  "Usage: meshview <command> [options]",
  "",
  "Local commands:",
  "  view [file] [--mesh <name>] [--port <n>] [--width <n>] [--height <n>]",
  "       [--fps <n>] [--enable-capture]",
  "  stats <file> [--mesh <name>]",
  "  inspect <file> [--json]",
  "",
  "Commands for a running viewer (--port <n>, default 9001):",
  "  load-model <path> [--mesh <name>]",
  "  set-rotation <x> <y> <z>",
  "  rotate-around-axis <x> <y> <z> <angle>   (angle: 90d or 1.57r)",
  "  set-camera-position <x> <y> <z>",
  "  set-camera-target <x> <y> <z>",
  "  enable-|disable-|toggle-wireframe",
  "  enable-|disable-|toggle-backfaces",
  "  enable-|disable-|toggle-ui",
  "  stats",
  "  capture-frame [path]",
  "  screenshot <path>",
  "  quit",
].join("\n");

async function showStats(file: string, args: ParsedArgs, io: CliIo): Promise<void> {
  io.out(`Loading mesh from ${file}...`);
  const mesh = await loadMesh(file, stringFlag(args, "mesh"));
  for (const line of formatMeshReport(mesh.positions, mesh.stats)) io.out(line);
}

async function inspect(file: string, args: ParsedArgs, io: CliIo): Promise<void> {
  const gltf = await loadGLTF(file);
  const doc = inspectGltf(gltf.json);
  if (args.flags.has("json")) {
    io.out(JSON.stringify(doc, null, 2));
    return;
  }
  for (const line of formatInspectTree(doc)) io.out(line);
}

async function remoteStats(rpc: ViewerRpc, io: CliIo): Promise<void> {
  const stats = await rpc.getStats();
  io.out(`Vertices: ${stats.vertices}`);
  io.out(`Edges:    ${stats.edges}`);
  io.out(`Faces:    ${stats.faces}`);
  io.out(`Manifold: ${stats.is_manifold ? "Yes" : "No"}`);
  io.out(`Holes:    ${stats.holes}`);
}

/**
 * Runs one CLI invocation.
 *
 * @returns The process exit code.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIo = defaultIo,
): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    const command = args.positionals[0];
    if (command === undefined || command === "help" || args.flags.has("help")) {
      io.out(USAGE);
      return command === undefined ? 1 : 0;
    }

    if (command === "view") {
      const config = loadConfig(io.env, {
        ...configOverrides(args),
        meshPath: args.positionals[1],
      });
      return await runViewer(config);
    }
    if (command === "inspect") {
      await inspect(requiredArg(args, 1, "file"), args, io);
      return 0;
    }
    const statsFile = command === "stats" ? args.positionals[1] : undefined;
    if (statsFile !== undefined) {
      await showStats(statsFile, args, io);
      return 0;
    }

    const handler = REMOTE_COMMANDS.get(command);
    if (!handler && command !== "stats") {
      throw new InputError(`Unknown command: ${command}\n\n${USAGE}`);
    }
    const config = loadConfig(io.env, { rpcPort: stringFlag(args, "port") });
    const rpc = io.createClient(`http://${config.rpcHost}:${config.rpcPort}`);
    if (handler) {
      io.out(await handler(rpc, args));
    } else {
      await remoteStats(rpc, io);
    }
    return 0;
  } catch (e) {
    io.err(`Error: ${e instanceof RpcClientError ? describeRpcError(e) : toErrorMessage(e)}`);
    return 1;
  }
}
