// src/core/types/window.ts

export type MouseButton = "left" | "right" | "middle";

/**
 * Window-system events consumed by the render loop. The host that owns the
 * terminal (or any other input source) produces them.
 */
export type WindowEvent =
  | { type: "CloseRequested" }
  | { type: "Resized"; width: number; height: number }
  | { type: "KeyboardInput"; key: string; pressed: boolean }
  | { type: "MouseInput"; button: MouseButton; pressed: boolean }
  | { type: "CursorMoved"; x: number; y: number }
  /** Positive delta zooms in. */
  | { type: "MouseWheel"; delta: number }
  | { type: "RedrawRequested" };
