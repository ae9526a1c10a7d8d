// src/core/errors.ts

/** Base class for every error the viewer raises on purpose. */
export class ViewerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad input from a user or caller: unsupported file, ambiguous or unknown
 * mesh name, invalid configuration.
 */
export class InputError extends ViewerError {
  /** Valid mesh names, when the error is about mesh selection. */
  readonly availableNames: readonly string[];

  constructor(
    message: string,
    availableNames: readonly string[] = [],
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.availableNames = availableNames;
  }
}

/** Mesh data that cannot be turned into triangles. */
export class FormatError extends ViewerError {}

/** The command queue's receiving end is gone. */
export class ChannelError extends ViewerError {}

/** The next presentable frame could not be acquired; retry next frame. */
export class SurfaceError extends ViewerError {}

/** Screenshot or frame capture failed to read back, encode or write. */
export class CaptureError extends ViewerError {}

/**
 * Narrows an unknown rejection to a printable message.
 */
export function toErrorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
