// src/core/capture/imageEncoder.ts
import sharp from "sharp";
import type { RenderedImage } from "../types/rendering.js";

/** Turns raw RGBA pixels into a file format. */
export interface ImageEncoder {
  /** File extension the encoder produces, without the dot. */
  readonly extension: string;
  encode(image: RenderedImage): Promise<Uint8Array>;
}

export class PngEncoder implements ImageEncoder {
  public readonly extension = "png";

  public async encode(image: RenderedImage): Promise<Uint8Array> {
    const buffer = await sharp(image.rgba, {
      raw: { width: image.width, height: image.height, channels: 4 },
    })
      .png()
      .toBuffer();
    return new Uint8Array(buffer);
  }
}
