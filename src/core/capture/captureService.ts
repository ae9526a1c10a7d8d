// src/core/capture/captureService.ts
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { CaptureError, toErrorMessage } from "../errors.js";
import type {
  FrameCaptureDocument,
  FrameRecord,
  RenderedImage,
} from "../types/rendering.js";
import type { ViewerStateSnapshot } from "../types/viewer.js";
import type { ImageEncoder } from "./imageEncoder.js";

/**
 * Writes read-back frames to disk. Screenshots are a single image; frame
 * captures add a JSON record of what the frame contained.
 */
export class CaptureService {
  private encoder: ImageEncoder;
  private captureDir: string;
  private now: () => Date;

  constructor(
    encoder: ImageEncoder,
    captureDir: string,
    now: () => Date = () => new Date(),
  ) {
    this.encoder = encoder;
    this.captureDir = captureDir;
    this.now = now;
  }

  /**
   * Encodes `image` to `filePath`, creating missing parent directories.
   *
   * @returns The absolute path written.
   * @throws {CaptureError}
   */
  public async saveScreenshot(
    image: RenderedImage,
    filePath: string,
  ): Promise<string> {
    const target = path.resolve(filePath);
    await this.writeImage(image, target);
    console.log(`[Capture] Screenshot saved to: ${target}`);
    return target;
  }

  /**
   * Writes the image plus `<name>.json` beside it. Without `filePath` the
   * files go to `<captureDir>/frame-<timestamp>.png`.
   *
   * @returns The absolute image path.
   * @throws {CaptureError}
   */
  public async saveFrame(
    image: RenderedImage,
    frame: FrameRecord,
    state: ViewerStateSnapshot,
    filePath?: string,
  ): Promise<string> {
    const capturedAt = this.now();
    const target = path.resolve(
      filePath ?? this.defaultFramePath(capturedAt),
    );
    await this.writeImage(image, target);

    const doc: FrameCaptureDocument = {
      capturedAt: capturedAt.toISOString(),
      image: path.basename(target),
      frame,
      state,
    };
    const recordPath = replaceExtension(target, ".json");
    try {
      await writeFile(recordPath, JSON.stringify(doc, null, 2) + "\n");
    } catch (e) {
      throw new CaptureError(
        `Failed to write frame record ${recordPath}: ${toErrorMessage(e)}`,
        { cause: e },
      );
    }
    console.log(`[Capture] Frame captured to: ${target}`);
    return target;
  }

  public defaultFramePath(at: Date): string {
    const stamp = at.toISOString().replace(/[:.]/g, "-");
    return path.join(this.captureDir, `frame-${stamp}.${this.encoder.extension}`);
  }

  private async writeImage(image: RenderedImage, target: string): Promise<void> {
    let encoded: Uint8Array;
    try {
      encoded = await this.encoder.encode(image);
    } catch (e) {
      throw new CaptureError(`Failed to encode image: ${toErrorMessage(e)}`, {
        cause: e,
      });
    }
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, encoded);
    } catch (e) {
      throw new CaptureError(
        `Failed to write ${target}: ${toErrorMessage(e)}`,
        { cause: e },
      );
    }
  }
}

function replaceExtension(filePath: string, ext: string): string {
  const current = path.extname(filePath);
  return (current ? filePath.slice(0, -current.length) : filePath) + ext;
}
