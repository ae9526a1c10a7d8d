import { describe, expect, it } from "vitest";
import { CONTROL_LINES, layoutOverlay } from "../overlay.js";

const stats = { vertexCount: 8, edgeCount: 13, faceCount: 6, isManifold: false, holeCount: 2 };

describe("layoutOverlay", () => {
  const lines = layoutOverlay(stats, "127.0.0.1:9001");

  it("lists controls, mesh info and the server address", () => {
    expect(lines.map((l) => l.text)).toEqual([
      "Controls",
      ...CONTROL_LINES,
      "Mesh Info",
      "Vertices: 8",
      "Edges: 13",
      "Faces: 6",
      "Manifold: No (2 holes)",
      "RPC Server",
      "Active: 127.0.0.1:9001",
    ]);
  });

  it("stacks lines downwards from the top-left corner", () => {
    const y = (text: string) => lines.find((l) => l.text === text)?.y;
    expect(y("Controls")).toBe(15);
    expect(y("Left Click+Drag: Rotate")).toBe(41);
    expect(y("Q/ESC: Exit")).toBe(149);
    expect(y("Mesh Info")).toBe(185);
    expect(y("Manifold: No (2 holes)")).toBe(265);
    expect(y("RPC Server")).toBe(319);
    expect(y("Active: 127.0.0.1:9001")).toBe(345);
    expect(new Set(lines.map((l) => l.x))).toEqual(new Set([11]));
  });

  it("colours the manifold line by its value", () => {
    const bad = lines.find((l) => l.text.startsWith("Manifold"));
    expect(bad?.color).toEqual([1, 0.4, 0.4, 1]);
    const good = layoutOverlay({ ...stats, isManifold: true, holeCount: 0 }, "h:1").find((l) =>
      l.text.startsWith("Manifold"),
    );
    expect(good?.text).toBe("Manifold: Yes");
    expect(good?.color).toEqual([0.4, 1, 0.4, 1]);
  });
});
