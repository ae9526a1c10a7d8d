import { describe, expect, it } from "vitest";
import { TerminalInputParser } from "../terminalInput.js";

const parser = () =>
  new TerminalInputParser(() => ({ columns: 80, rows: 24, width: 800, height: 480 }));

describe("TerminalInputParser", () => {
  it("turns characters into key taps", () => {
    expect(parser().feed("w")).toEqual([
      { type: "KeyboardInput", key: "w", pressed: true },
      { type: "KeyboardInput", key: "w", pressed: false },
    ]);
  });

  it("treats Ctrl-C as a close request", () => {
    expect(parser().feed("\x03")).toEqual([{ type: "CloseRequested" }]);
  });

  it("scales mouse cells to render pixels", () => {
    expect(parser().feed("\x1b[<0;11;5M")).toEqual([
      { type: "CursorMoved", x: 100, y: 80 },
      { type: "MouseInput", button: "left", pressed: true },
    ]);
  });

  it("reports releases and other buttons", () => {
    expect(parser().feed("\x1b[<2;1;1m")).toEqual([
      { type: "CursorMoved", x: 0, y: 0 },
      { type: "MouseInput", button: "right", pressed: false },
    ]);
  });

  it("reports drags as cursor motion only", () => {
    expect(parser().feed("\x1b[<32;21;5M")).toEqual([{ type: "CursorMoved", x: 200, y: 80 }]);
  });

  it("maps the wheel to zoom steps", () => {
    expect(parser().feed("\x1b[<64;1;1M\x1b[<65;1;1M")).toEqual([
      { type: "MouseWheel", delta: 1 },
      { type: "MouseWheel", delta: -1 },
    ]);
  });

  it("keeps a split sequence until the rest arrives", () => {
    const p = parser();
    expect(p.feed("\x1b[<0;1")).toEqual([]);
    expect(p.feed(";1M")).toEqual([
      { type: "CursorMoved", x: 0, y: 0 },
      { type: "MouseInput", button: "left", pressed: true },
    ]);
  });

  it("ignores other escape sequences", () => {
    expect(parser().feed("\x1b[Aq")).toEqual([
      { type: "KeyboardInput", key: "q", pressed: true },
      { type: "KeyboardInput", key: "q", pressed: false },
    ]);
  });

  it("reads a lone ESC as the Escape key", () => {
    expect(parser().feed("\x1b")).toEqual([
      { type: "KeyboardInput", key: "escape", pressed: true },
      { type: "KeyboardInput", key: "escape", pressed: false },
    ]);
  });

  it("reads ESC before plain text as Escape then the text", () => {
    const events = parser().feed("\x1bx");
    expect(events.map((e) => (e.type === "KeyboardInput" ? e.key : e.type))).toEqual([
      "escape",
      "escape",
      "x",
      "x",
    ]);
  });
});
