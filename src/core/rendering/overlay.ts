// src/core/rendering/overlay.ts
import type { Color4, OverlayLine } from "../types/rendering.js";
import type { MeshStats } from "../types/viewer.js";

const X_OFFSET = 11;
const Y_OFFSET = 15;
const LINE_HEIGHT = 18;
const HEADER_SIZE = 26;
const TEXT_SIZE = 18;
const HEADER_PADDING = 8;

const HEADER_COLOR: Color4 = [0.8, 0.8, 0.8, 1];
const TEXT_COLOR: Color4 = [0.9, 0.9, 0.9, 1];
const GOOD_COLOR: Color4 = [0.4, 1, 0.4, 1];
const BAD_COLOR: Color4 = [1, 0.4, 0.4, 1];

export const CONTROL_LINES: readonly string[] = [
  "Left Click+Drag: Rotate",
  "Right Click+Drag: Pan",
  "Scroll: Zoom",
  "W: Toggle Wireframe",
  "B: Toggle Backfaces",
  "U: Toggle UI",
  "Q/ESC: Exit",
];

/**
 * Lays out the help/info panel drawn in the top-left corner.
 *
 * @param rpcAddress - "host:port" of the control server.
 */
export function layoutOverlay(
  stats: MeshStats,
  rpcAddress: string,
): OverlayLine[] {
  const lines: OverlayLine[] = [];
  let y = Y_OFFSET;

  const header = (text: string) => {
    lines.push({ text, x: X_OFFSET, y, size: HEADER_SIZE, color: HEADER_COLOR });
    y += LINE_HEIGHT + HEADER_PADDING;
  };
  const item = (text: string, color: Color4 = TEXT_COLOR) => {
    lines.push({ text, x: X_OFFSET, y, size: TEXT_SIZE, color });
    y += LINE_HEIGHT;
  };

  header("Controls");
  for (const control of CONTROL_LINES) item(control);

  y += LINE_HEIGHT;
  header("Mesh Info");
  item(`Vertices: ${stats.vertexCount}`);
  item(`Edges: ${stats.edgeCount}`);
  item(`Faces: ${stats.faceCount}`);
  if (stats.isManifold) {
    item("Manifold: Yes", GOOD_COLOR);
  } else {
    item(`Manifold: No (${stats.holeCount} holes)`, BAD_COLOR);
  }

  y += LINE_HEIGHT * 2;
  header("RPC Server");
  item(`Active: ${rpcAddress}`, GOOD_COLOR);

  return lines;
}
