/**
 * Sixel encoding: the shared encoder contract, the body writer both
 * strategies use, and the single-pass uniform-cube encoder.
 */

import { blue, green, red, type RgbImage } from './image.js';
import { UniformPalette } from './sixel-color.js';

export interface CellSize {
  width: number;
  height: number;
}

export interface SixelEncodeOptions {
  /** Maximum number of color registers to define (2..1024). */
  paletteSize?: number;
  /** Text-cell pixel size; the HQ encoder dithers in cell-aligned bands. */
  cellSize?: CellSize;
}

export interface SixelEncoder {
  /** Encode to a sixel body: raster header, registers and bands, no DCS wrapper. */
  encode(image: RgbImage, options?: SixelEncodeOptions): string;
}

export const DEFAULT_PALETTE_SIZE = 256;
export const MAX_PALETTE_SIZE = 1024;
export const DEFAULT_CELL_SIZE: Readonly<CellSize> = Object.freeze({ width: 10, height: 20 });

/** Pixel index value marking a transparent pixel. */
export const TRANSPARENT_INDEX = -1;

export function resolvePaletteSize(size: number | undefined): number {
  if (size === undefined || !Number.isFinite(size)) return DEFAULT_PALETTE_SIZE;
  return Math.max(2, Math.min(MAX_PALETTE_SIZE, Math.floor(size)));
}

/** Wrap a body in `ESC P 0;1;0 q ... ESC \` (P2=1: unset pixels stay transparent). */
export function wrapSixel(body: string): string {
  return `\x1bP0;1;0q${body}\x1b\\`;
}

function percent(channel: number): number {
  return Math.round((channel * 100) / 255);
}

function runLength(sixels: string): string {
  let out = '';
  let i = 0;
  while (i < sixels.length) {
    const ch = sixels[i];
    let run = 1;
    while (i + run < sixels.length && sixels[i + run] === ch) run += 1;
    out += run > 3 ? `!${run}${ch}` : ch.repeat(run);
    i += run;
  }
  return out;
}

/**
 * Serialize an indexed bitmap. `indices` holds one palette index per pixel
 * (TRANSPARENT_INDEX for none). Only registers that are used are defined,
 * in palette order.
 */
export function writeSixelBody(
  width: number,
  height: number,
  palette: readonly number[],
  indices: Int32Array,
): string {
  const used = new Array<boolean>(palette.length).fill(false);
  for (const index of indices) {
    if (index >= 0) used[index] = true;
  }

  let out = `"1;1;${width};${height}`;
  palette.forEach((rgb, index) => {
    if (used[index]) out += `#${index};2;${percent(red(rgb))};${percent(green(rgb))};${percent(blue(rgb))}`;
  });

  const bands: string[] = [];
  for (let top = 0; top < height; top += 6) {
    const bandRows = Math.min(6, height - top);
    const columns = new Map<number, Uint8Array>();
    for (let dy = 0; dy < bandRows; dy += 1) {
      const rowStart = (top + dy) * width;
      for (let x = 0; x < width; x += 1) {
        const index = indices[rowStart + x];
        if (index < 0) continue;
        let bits = columns.get(index);
        if (!bits) {
          bits = new Uint8Array(width);
          columns.set(index, bits);
        }
        bits[x] |= 1 << dy;
      }
    }

    const rows: string[] = [];
    for (const index of [...columns.keys()].sort((a, b) => a - b)) {
      const bits = columns.get(index);
      if (!bits) continue;
      let end = width;
      while (end > 0 && bits[end - 1] === 0) end -= 1;
      let sixels = '';
      for (let x = 0; x < end; x += 1) sixels += String.fromCharCode(0x3f + bits[x]);
      rows.push(`#${index}${runLength(sixels)}`);
    }
    bands.push(rows.join('$'));
  }
  return out + bands.join('-');
}

/**
 * Single-pass encoder: every pixel maps to the nearest entry of a fixed
 * uniform palette sized to the requested register count. No dithering.
 */
export class SimpleSixelEncoder implements SixelEncoder {
  encode(image: RgbImage, options: SixelEncodeOptions = {}): string {
    const palette = new UniformPalette(resolvePaletteSize(options.paletteSize));
    const indices = new Int32Array(image.width * image.height);
    for (let y = 0; y < image.height; y += 1) {
      for (let x = 0; x < image.width; x += 1) {
        const i = y * image.width + x;
        indices[i] = image.isOpaque(x, y) ? palette.indexOf(image.pixels[i]) : TRANSPARENT_INDEX;
      }
    }
    return writeSixelBody(image.width, image.height, palette.colors, indices);
  }
}
