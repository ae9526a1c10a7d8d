// src/app/terminalInput.ts
import type { MouseButton, WindowEvent } from "../core/types/window.js";

const ESC = "\x1b";
const CTRL_C = "\x03";

/** Enables button, drag and SGR extended mouse reporting. */
export const ENABLE_MOUSE_REPORTING = "\x1b[?1000h\x1b[?1002h\x1b[?1006h";
export const DISABLE_MOUSE_REPORTING = "\x1b[?1006l\x1b[?1002l\x1b[?1000l";

// ESC [ < button ; column ; row (M = press/motion, m = release)
const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)([Mm])/;
// Any other CSI sequence (arrows, function keys); consumed and ignored.
const CSI = /^\x1b\[[0-9;?]*[ -/]*[@-~]/;
const INCOMPLETE_CSI = /^\x1b(\[[0-9;<?]*)?$/;

const WHEEL_UP = 64;
const WHEEL_DOWN = 65;
const MOTION_BIT = 32;

const BUTTONS: readonly MouseButton[] = ["left", "middle", "right"];

/** Size of the terminal in cells and of the render target in pixels. */
export interface TerminalGeometry {
  columns: number;
  rows: number;
  width: number;
  height: number;
}

/**
 * Turns raw terminal input into window events. Mouse cells are scaled to
 * render-target pixels so drags move the camera at the same rate whatever
 * the terminal size.
 */
export class TerminalInputParser {
  private pending = "";
  private geometry: () => TerminalGeometry;

  constructor(geometry: () => TerminalGeometry) {
    this.geometry = geometry;
  }

  /**
   * Parses a chunk. A sequence cut off at the end of a chunk is kept until
   * the next call; a lone trailing ESC is taken as the Escape key.
   */
  public feed(chunk: string): WindowEvent[] {
    let input = this.pending + chunk;
    this.pending = "";
    const events: WindowEvent[] = [];

    while (input.length > 0) {
      if (input[0] !== ESC) {
        const ch = input[0];
        input = input.slice(1);
        if (ch === CTRL_C) {
          events.push({ type: "CloseRequested" });
        } else {
          events.push(...keyTap(ch));
        }
        continue;
      }

      const mouse = SGR_MOUSE.exec(input);
      if (mouse) {
        events.push(
          ...this.mouseEvents(
            Number(mouse[1]),
            Number(mouse[2]),
            Number(mouse[3]),
            mouse[4] === "M",
          ),
        );
        input = input.slice(mouse[0].length);
        continue;
      }

      const csi = CSI.exec(input);
      if (csi) {
        input = input.slice(csi[0].length);
        continue;
      }

      if (input === ESC) {
        events.push(...keyTap("escape"));
        input = "";
        continue;
      }

      if (INCOMPLETE_CSI.test(input)) {
        this.pending = input;
        break;
      }

      // ESC followed by something that starts no sequence: Escape, then
      // the rest as ordinary input.
      events.push(...keyTap("escape"));
      input = input.slice(1);
    }
    return events;
  }

  private mouseEvents(
    code: number,
    column: number,
    row: number,
    pressed: boolean,
  ): WindowEvent[] {
    if (code === WHEEL_UP) return [{ type: "MouseWheel", delta: 1 }];
    if (code === WHEEL_DOWN) return [{ type: "MouseWheel", delta: -1 }];

    const { columns, rows, width, height } = this.geometry();
    const moved: WindowEvent = {
      type: "CursorMoved",
      x: ((column - 1) * width) / Math.max(1, columns),
      y: ((row - 1) * height) / Math.max(1, rows),
    };
    if ((code & MOTION_BIT) !== 0) return [moved];

    const button = BUTTONS[code & 3];
    if (button === undefined) return [moved];
    return [moved, { type: "MouseInput", button, pressed }];
  }
}

function keyTap(key: string): WindowEvent[] {
  return [
    { type: "KeyboardInput", key, pressed: true },
    { type: "KeyboardInput", key, pressed: false },
  ];
}
