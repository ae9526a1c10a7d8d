// src/core/rendering/surface.ts
import { SurfaceError } from "../errors.js";

export interface SurfaceFrame {
  texture: GPUTexture;
  view: GPUTextureView;
  slot: number;
}

interface SurfaceSlot {
  texture: GPUTexture;
  inFlight: boolean;
}

/**
 * Headless stand-in for a window swapchain: a small ring of colour targets
 * that are handed out in turn and become available again once the GPU has
 * finished the frame that used them.
 */
export class OffscreenSurface {
  public readonly format: GPUTextureFormat;
  private device: GPUDevice;
  private slotCount: number;
  private slots: SurfaceSlot[] = [];
  private next = 0;
  private _width = 0;
  private _height = 0;

  constructor(
    device: GPUDevice,
    format: GPUTextureFormat,
    width: number,
    height: number,
    slotCount = 2,
  ) {
    this.device = device;
    this.format = format;
    this.slotCount = slotCount;
    this.configure(width, height);
  }

  public get width(): number {
    return this._width;
  }

  public get height(): number {
    return this._height;
  }

  /** (Re)creates the ring at the given size. */
  public configure(width: number, height: number): void {
    for (const slot of this.slots) slot.texture.destroy();
    this._width = Math.max(1, Math.floor(width));
    this._height = Math.max(1, Math.floor(height));
    this.slots = [];
    for (let i = 0; i < this.slotCount; i++) {
      this.slots.push({
        texture: this.device.createTexture({
          label: `SURFACE_TEXTURE_${i}`,
          size: [this._width, this._height],
          format: this.format,
          usage:
            GPUTextureUsage.RENDER_ATTACHMENT | GPUTextureUsage.COPY_SRC,
        }),
        inFlight: false,
      });
    }
    this.next = 0;
  }

  /**
   * @throws {SurfaceError} If the next target is still in use by the GPU.
   */
  public acquire(): SurfaceFrame {
    const slotIndex = this.next;
    const slot = this.slots[slotIndex];
    if (slot.inFlight) {
      throw new SurfaceError("Timeout acquiring next frame");
    }
    this.next = (this.next + 1) % this.slots.length;
    return { texture: slot.texture, view: slot.texture.createView(), slot: slotIndex };
  }

  /** Resolves once the GPU has finished with the frame. */
  public async present(frame: SurfaceFrame): Promise<void> {
    const slot = this.slots[frame.slot];
    if (slot.texture !== frame.texture) return; // reconfigured meanwhile
    slot.inFlight = true;
    try {
      await this.device.queue.onSubmittedWorkDone();
    } finally {
      slot.inFlight = false;
    }
  }

  public destroy(): void {
    for (const slot of this.slots) slot.texture.destroy();
    this.slots = [];
  }
}
