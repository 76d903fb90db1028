/**
 * Sixel image decoder.
 *
 * Interprets the body of a sixel DCS string: color register commands,
 * raster attributes, run-length repeats and six-pixel column bytes.
 * Malformed or oversized input never throws; whatever was drawn before
 * the problem is returned with `truncated` set.
 */

import { incRuntimeMetric } from '../infra/diagnostics.js';
import { RgbImage } from './image.js';

export const SIXEL_MAX_WIDTH = 3840;
export const SIXEL_MAX_HEIGHT = 6480;
export const SIXEL_MAX_REPEAT = 32767;
export const SIXEL_COLOR_REGISTERS = 1024;
const GROW_STEP = 400;

/** VT340 power-on color registers 0-15. */
export const VT340_PALETTE: readonly number[] = [
  0x000000, 0x3333cc, 0xcc2323, 0x33cc33, 0xcc33cc, 0x33cccc, 0xcccc33, 0x777777,
  0x444444, 0x565699, 0x994444, 0x569956, 0x995699, 0x569999, 0x999956, 0xcccccc,
];

export interface SixelPayload {
  /** DCS parameter string (`P1;P2;P3`), verbatim. */
  params: string;
  /** Everything after the `q` command byte up to ST. */
  data: string;
}

export interface SixelDecodeOptions {
  maxWidth?: number;
  maxHeight?: number;
}

export interface SixelDecodeResult {
  image: RgbImage;
  /** True when unset pixels are transparent (P2 = 1). */
  transparent: boolean;
  /** True when input was cut short, exceeded limits or was malformed. */
  truncated: boolean;
}

type ScanState = 'ground' | 'raster' | 'color' | 'repeat';

const DCS_INTRODUCER = /^(?:\x1bP|\x90)([0-9;]*)q/;
const ST_SUFFIX = /(?:\x1b\\|\x9c)$/;

/** Accept a bare body, a `{ params, data }` payload, or a full DCS string. */
export function toSixelPayload(input: string | SixelPayload): SixelPayload {
  if (typeof input !== 'string') return input;
  const match = DCS_INTRODUCER.exec(input);
  if (!match) return { params: '', data: input };
  return { params: match[1], data: input.slice(match[0].length).replace(ST_SUFFIX, '') };
}

function parseNumbers(text: string): number[] {
  if (text.length === 0) return [];
  return text.split(';').map((part) => {
    const value = parseInt(part, 10);
    return Number.isFinite(value) ? value : 0;
  });
}

/** DEC HLS (hue 0 = blue, 120 = red, 240 = green) to packed RGB. */
export function hlsToRgb(hue: number, lightness: number, saturation: number): number {
  const h = (((hue + 240) % 360) + 360) % 360 / 360;
  const l = Math.max(0, Math.min(100, lightness)) / 100;
  const s = Math.max(0, Math.min(100, saturation)) / 100;
  if (s === 0) {
    const v = Math.round(l * 255);
    return (v << 16) | (v << 8) | v;
  }
  const q = l < 0.5 ? l * (1 + s) : l + s - l * s;
  const p = 2 * l - q;
  const channel = (t0: number) => {
    let t = t0;
    if (t < 0) t += 1;
    if (t > 1) t -= 1;
    if (t < 1 / 6) return p + (q - p) * 6 * t;
    if (t < 1 / 2) return q;
    if (t < 2 / 3) return p + (q - p) * (2 / 3 - t) * 6;
    return p;
  };
  const r = Math.round(channel(h + 1 / 3) * 255);
  const g = Math.round(channel(h) * 255);
  const b = Math.round(channel(h - 1 / 3) * 255);
  return (r << 16) | (g << 8) | b;
}

function percentToByte(value: number): number {
  return Math.floor((Math.max(0, Math.min(100, value)) / 100) * 255);
}

class SixelCanvas {
  capacityWidth = 0;
  capacityHeight = 0;
  pixels = new Uint32Array(0);
  drawn = new Uint8Array(0);

  constructor(private readonly maxWidth: number, private readonly maxHeight: number) {}

  /** Make room for (x, y); false when it lies beyond the limits. */
  ensure(x: number, y: number): boolean {
    if (x >= this.maxWidth || y >= this.maxHeight) return false;
    if (x < this.capacityWidth && y < this.capacityHeight) return true;
    const width = Math.min(this.maxWidth, Math.max(this.capacityWidth, (Math.floor(x / GROW_STEP) + 1) * GROW_STEP));
    const height = Math.min(this.maxHeight, Math.max(this.capacityHeight, (Math.floor(y / GROW_STEP) + 1) * GROW_STEP));
    const pixels = new Uint32Array(width * height);
    const drawn = new Uint8Array(width * height);
    for (let row = 0; row < this.capacityHeight; row += 1) {
      const from = row * this.capacityWidth;
      pixels.set(this.pixels.subarray(from, from + this.capacityWidth), row * width);
      drawn.set(this.drawn.subarray(from, from + this.capacityWidth), row * width);
    }
    this.pixels = pixels;
    this.drawn = drawn;
    this.capacityWidth = width;
    this.capacityHeight = height;
    return true;
  }

  set(x: number, y: number, rgb: number): void {
    const i = y * this.capacityWidth + x;
    this.pixels[i] = rgb;
    this.drawn[i] = 1;
  }
}

class SixelDecodeRun {
  private readonly registers = new Map<number, number>();
  private readonly canvas: SixelCanvas;
  private state: ScanState = 'ground';
  private args = '';
  private color = 0;
  private repeat = 1;
  private x = 0;
  private bandTop = 0;
  private width = 0;
  private maxY = -1;
  private rasterWidth = 0;
  private rasterHeight = 0;
  truncated = false;

  constructor(private readonly maxWidth: number, private readonly maxHeight: number) {
    VT340_PALETTE.forEach((rgb, index) => this.registers.set(index, rgb));
    this.canvas = new SixelCanvas(maxWidth, maxHeight);
  }

  run(data: string): void {
    for (let i = 0; i < data.length; i += 1) {
      this.consume(data.charCodeAt(i));
    }
    this.finishCommand();
  }

  private consume(code: number): void {
    const isArg = (code >= 0x30 && code <= 0x39) || code === 0x3b;
    if (this.state !== 'ground' && isArg) {
      this.args += String.fromCharCode(code);
      return;
    }

    this.finishCommand();

    if (code >= 0x3f && code <= 0x7e) {
      this.drawSixel(code - 0x3f);
      return;
    }

    switch (code) {
      case 0x23: // '#'
        this.state = 'color';
        break;
      case 0x21: // '!'
        this.state = 'repeat';
        break;
      case 0x22: // '"'
        this.state = 'raster';
        break;
      case 0x24: // '$'
        this.x = 0;
        break;
      case 0x2d: // '-'
        this.x = 0;
        this.bandTop += 6;
        break;
      default:
        // Line breaks and other filler are ignored.
        break;
    }
  }

  private finishCommand(): void {
    const state = this.state;
    if (state === 'ground') return;
    const values = parseNumbers(this.args);
    this.state = 'ground';
    this.args = '';

    if (state === 'repeat') {
      const count = values[0] ?? 1;
      this.repeat = Math.max(1, Math.min(SIXEL_MAX_REPEAT, count));
      return;
    }

    if (state === 'raster') {
      const [, , ph = 0, pv = 0] = values;
      if (ph > 0 && pv > 0) {
        this.rasterWidth = Math.min(ph, this.maxWidth);
        this.rasterHeight = Math.min(pv, this.maxHeight);
        if (ph > this.maxWidth || pv > this.maxHeight) this.truncated = true;
      }
      return;
    }

    this.applyColor(values);
  }

  private applyColor(values: number[]): void {
    const index = (values[0] ?? 0) % SIXEL_COLOR_REGISTERS;
    if (values.length < 5) {
      this.color = index;
      return;
    }
    const [, system, a, b, c] = values;
    if (system === 2) {
      this.registers.set(index, (percentToByte(a) << 16) | (percentToByte(b) << 8) | percentToByte(c));
    } else if (system === 1) {
      this.registers.set(index, hlsToRgb(a, b, c));
    } else {
      this.truncated = true;
    }
    this.color = index;
  }

  private drawSixel(bits: number): void {
    const count = this.repeat;
    this.repeat = 1;
    const rgb = this.registers.get(this.color) ?? 0;

    let span = count;
    if (this.x + span > this.maxWidth) {
      span = Math.max(0, this.maxWidth - this.x);
      this.truncated = true;
    }

    if (span > 0 && bits !== 0) {
      for (let j = 0; j < 6; j += 1) {
        if ((bits & (1 << j)) === 0) continue;
        const y = this.bandTop + j;
        if (!this.canvas.ensure(this.x + span - 1, y)) {
          this.truncated = true;
          continue;
        }
        for (let dx = 0; dx < span; dx += 1) {
          this.canvas.set(this.x + dx, y, rgb);
        }
        if (y > this.maxY) this.maxY = y;
      }
    }

    this.x += span;
    if (this.x > this.width) this.width = this.x;
  }

  result(transparent: boolean): SixelDecodeResult {
    // Raster attributes set a minimum size only once something is drawn.
    const drawn = this.maxY >= 0;
    const width = Math.max(1, this.width, drawn ? this.rasterWidth : 0);
    const height = Math.max(1, this.maxY + 1, drawn ? this.rasterHeight : 0);
    const background = transparent ? 0 : this.registers.get(0) ?? 0;
    const pixels = new Uint32Array(width * height);
    const opacity = transparent ? new Uint8Array(width * height) : undefined;
    const canvas = this.canvas;

    for (let y = 0; y < height; y += 1) {
      for (let x = 0; x < width; x += 1) {
        const i = y * width + x;
        const inside = x < canvas.capacityWidth && y < canvas.capacityHeight;
        const src = y * canvas.capacityWidth + x;
        if (inside && canvas.drawn[src] === 1) {
          pixels[i] = canvas.pixels[src];
          if (opacity) opacity[i] = 1;
        } else {
          pixels[i] = background;
        }
      }
    }

    return { image: new RgbImage(width, height, pixels, opacity), transparent, truncated: this.truncated };
  }
}

/**
 * Decode a sixel payload to a bitmap. With nothing drawn the result is a
 * 1x1 image of the background, whatever the raster attributes say.
 */
export function decodeSixel(input: string | SixelPayload, options: SixelDecodeOptions = {}): SixelDecodeResult {
  const payload = toSixelPayload(input);
  const maxWidth = Math.max(1, Math.min(SIXEL_MAX_WIDTH, options.maxWidth ?? SIXEL_MAX_WIDTH));
  const maxHeight = Math.max(1, Math.min(SIXEL_MAX_HEIGHT, options.maxHeight ?? SIXEL_MAX_HEIGHT));
  const [, p2 = 0] = parseNumbers(payload.params);

  const run = new SixelDecodeRun(maxWidth, maxHeight);
  run.run(payload.data);
  const result = run.result(p2 === 1);
  if (result.truncated) {
    incRuntimeMetric('sixel_partial_decode', {});
  }
  return result;
}
