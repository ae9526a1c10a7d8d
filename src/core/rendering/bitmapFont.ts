// src/core/rendering/bitmapFont.ts
import { readFile } from "node:fs/promises";
import { z } from "zod";
import { FormatError } from "../errors.js";
import type { Color4, OverlayLine } from "../types/rendering.js";
import { projectFile } from "../utils/assets.js";

const fontFileSchema = z.object({
  glyphWidth: z.number().int().positive(),
  glyphHeight: z.number().int().positive(),
  fallback: z.string().length(1),
  glyphs: z.record(z.string().length(1), z.array(z.string())),
});

export type BitmapFontFile = z.infer<typeof fontFileSchema>;

/** Single-channel coverage image, one byte per texel. */
export interface GlyphAtlas {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Fixed-width bitmap font packed into a one-row atlas.
 */
export class BitmapFont {
  public readonly glyphWidth: number;
  public readonly glyphHeight: number;
  public readonly atlas: GlyphAtlas;
  private slots = new Map<string, number>();
  private fallbackSlot: number;

  constructor(file: BitmapFontFile) {
    this.glyphWidth = file.glyphWidth;
    this.glyphHeight = file.glyphHeight;

    const chars = Object.keys(file.glyphs);
    const width = chars.length * file.glyphWidth;
    const data = new Uint8Array(width * file.glyphHeight);
    chars.forEach((ch, slot) => {
      const rows = file.glyphs[ch];
      if (rows.length !== file.glyphHeight) {
        throw new FormatError(`Glyph '${ch}' has ${rows.length} rows`);
      }
      rows.forEach((row, y) => {
        if (row.length !== file.glyphWidth) {
          throw new FormatError(`Glyph '${ch}' row ${y} has ${row.length} columns`);
        }
        for (let x = 0; x < row.length; x++) {
          if (row[x] === "1") {
            data[y * width + slot * file.glyphWidth + x] = 255;
          }
        }
      });
      this.slots.set(ch, slot);
    });
    this.atlas = { width, height: file.glyphHeight, data };

    const fallback = this.slots.get(file.fallback);
    if (fallback === undefined) {
      throw new FormatError(`Fallback glyph '${file.fallback}' is missing`);
    }
    this.fallbackSlot = fallback;
  }

  /** Atlas slot for `ch`; lower case maps to upper case. */
  public slotOf(ch: string): number {
    return (
      this.slots.get(ch) ?? this.slots.get(ch.toUpperCase()) ?? this.fallbackSlot
    );
  }

  /** Integer pixel scale for a nominal text size. */
  public scaleFor(size: number): number {
    return Math.max(1, Math.floor(size / (this.glyphHeight + 1)));
  }
}

export async function loadBitmapFont(
  filePath = projectFile("assets", "font5x7.json"),
): Promise<BitmapFont> {
  const text = await readFile(filePath, "utf8");
  const parsed = fontFileSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new FormatError(`Invalid font file ${filePath}: ${parsed.error.message}`);
  }
  return new BitmapFont(parsed.data);
}

/** Floats per glyph instance: rect(4) + color(4) + uvRect(4). */
export const GLYPH_INSTANCE_FLOATS = 12;

/**
 * Expands overlay lines into one quad instance per visible glyph.
 *
 * @returns Packed instance data and the instance count.
 */
export function buildGlyphInstances(
  font: BitmapFont,
  lines: readonly OverlayLine[],
): { data: Float32Array; count: number } {
  const glyphs: { x: number; y: number; scale: number; slot: number; color: Color4 }[] = [];
  for (const line of lines) {
    const scale = font.scaleFor(line.size);
    const advance = (font.glyphWidth + 1) * scale;
    let x = line.x;
    for (const ch of line.text) {
      if (ch !== " ") {
        glyphs.push({ x, y: line.y, scale, slot: font.slotOf(ch), color: line.color });
      }
      x += advance;
    }
  }

  const data = new Float32Array(glyphs.length * GLYPH_INSTANCE_FLOATS);
  const { width, height } = font.atlas;
  glyphs.forEach((g, i) => {
    const base = i * GLYPH_INSTANCE_FLOATS;
    data[base + 0] = g.x;
    data[base + 1] = g.y;
    data[base + 2] = font.glyphWidth * g.scale;
    data[base + 3] = font.glyphHeight * g.scale;
    data.set(g.color, base + 4);
    data[base + 8] = (g.slot * font.glyphWidth) / width;
    data[base + 9] = 0;
    data[base + 10] = ((g.slot + 1) * font.glyphWidth) / width;
    data[base + 11] = font.glyphHeight / height;
  });
  return { data, count: glyphs.length };
}
