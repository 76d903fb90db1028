/**
 * Instance-owned 256-entry color palette and X11 color-spec parsing.
 *
 * Indexed cell colors resolve through a Palette at read time, so an OSC 4
 * redefinition recolors text that is already on screen. Truecolor cells
 * never consult it.
 */

import type { CellStyle, ColorRef, ResolvedAttributes } from './vt-types.js';

export const ANSI_16_COLORS: readonly number[] = [
  0x000000, 0xcd3131, 0x0dbc79, 0xe5e510, 0x2472c8, 0xbc3fbc, 0x11a8cd, 0xe5e5e5,
  0x666666, 0xf14c4c, 0x23d18b, 0xf5f543, 0x3b8eea, 0xd670d6, 0x29b8db, 0xffffff,
];

export const DEFAULT_FOREGROUND = 0xe5e5e5;
export const DEFAULT_BACKGROUND = 0x000000;

const CUBE_LEVELS = [0, 95, 135, 175, 215, 255];

export function xterm256Color(index: number): number | undefined {
  if (!Number.isInteger(index) || index < 0 || index > 255) return undefined;
  if (index < 16) return ANSI_16_COLORS[index];
  if (index >= 232) {
    const v = 8 + (index - 232) * 10;
    return (v << 16) | (v << 8) | v;
  }

  const i = index - 16;
  const r = CUBE_LEVELS[Math.floor(i / 36)];
  const g = CUBE_LEVELS[Math.floor((i % 36) / 6)];
  const b = CUBE_LEVELS[i % 6];
  return (r << 16) | (g << 8) | b;
}

export function rgbComponents(rgb: number): [number, number, number] {
  return [(rgb >>> 16) & 0xff, (rgb >>> 8) & 0xff, rgb & 0xff];
}

export function packRgb(r: number, g: number, b: number): number {
  return ((r & 0xff) << 16) | ((g & 0xff) << 8) | (b & 0xff);
}

export function toHex(v: number): string {
  const clamped = Math.max(0, Math.min(255, v));
  return clamped.toString(16).padStart(2, '0');
}

const HEX_GROUP = /^[0-9a-fA-F]{1,4}$/;

/**
 * Scale an `rgb:` channel of 1-4 hex digits to 16 bits by replicating its
 * bits, then keep the top 8. `f`, `ff`, `fff`, `ffff` all give 0xff and
 * `5`, `55`, `555`, `5555` all give 0x55.
 */
export function scaleRgbChannel(group: string): number | undefined {
  if (!HEX_GROUP.test(group)) return undefined;
  const value = parseInt(group, 16);
  let wide: number;
  switch (group.length) {
    case 1: wide = value * 0x1111; break;
    case 2: wide = value * 0x0101; break;
    case 3: wide = (value << 4) | (value >> 8); break;
    default: wide = value; break;
  }
  return (wide >> 8) & 0xff;
}

/**
 * Parse an X11 color specification: `rgb:R/G/B` (1-4 hex digits per
 * channel) or `#RGB`, `#RRGGBB`, `#RRRGGGBBB`, `#RRRRGGGGBBBB`.
 * Returns the packed 24-bit color, or undefined when malformed.
 */
export function parseXColorSpec(spec: string): number | undefined {
  const text = spec.trim();
  if (text.toLowerCase().startsWith('rgb:')) {
    const groups = text.slice(4).split('/');
    if (groups.length !== 3) return undefined;
    const channels = groups.map(scaleRgbChannel);
    const [r, g, b] = channels;
    if (r === undefined || g === undefined || b === undefined) return undefined;
    return packRgb(r, g, b);
  }

  if (text.startsWith('#')) {
    const digits = text.slice(1);
    if (!/^[0-9a-fA-F]+$/.test(digits) || digits.length % 3 !== 0) return undefined;
    const n = digits.length / 3;
    if (n < 1 || n > 4) return undefined;
    // '#' forms are left-justified: #fff is f0f0f0, not ffffff.
    const channel = (i: number) => {
      const value = parseInt(digits.slice(i * n, (i + 1) * n), 16);
      return ((value << (16 - 4 * n)) >> 8) & 0xff;
    };
    return packRgb(channel(0), channel(1), channel(2));
  }

  return undefined;
}

/** Format a color as an xterm `rgb:rrrr/gggg/bbbb` report. */
export function formatXColorSpec(rgb: number): string {
  const [r, g, b] = rgbComponents(rgb);
  const hex4 = (v: number) => toHex(v).repeat(2);
  return `rgb:${hex4(r)}/${hex4(g)}/${hex4(b)}`;
}

export class Palette {
  private readonly entries = new Uint32Array(256);
  /** Default text colors, changed by OSC 10/11. */
  foreground = DEFAULT_FOREGROUND;
  background = DEFAULT_BACKGROUND;

  constructor(source?: Palette) {
    if (source) {
      this.entries.set(source.entries);
      this.foreground = source.foreground;
      this.background = source.background;
    } else {
      this.reset();
    }
  }

  get(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index > 255) return DEFAULT_FOREGROUND;
    return this.entries[index];
  }

  set(index: number, rgb: number): boolean {
    if (!Number.isInteger(index) || index < 0 || index > 255) return false;
    this.entries[index] = rgb & 0xffffff;
    return true;
  }

  /** Restore one entry, or the whole table, to the static defaults. */
  reset(index?: number): void {
    if (index === undefined) {
      for (let i = 0; i < 256; i += 1) this.entries[i] = xterm256Color(i) ?? 0;
      return;
    }
    const rgb = xterm256Color(index);
    if (rgb !== undefined) this.entries[index] = rgb;
  }

  resolve(ref: ColorRef | undefined, fallback: number): number {
    if (!ref) return fallback;
    if (ref.kind === 'rgb') return ref.rgb & 0xffffff;
    return this.get(ref.index);
  }

  clone(): Palette {
    return new Palette(this);
  }

  toArray(): number[] {
    return Array.from(this.entries);
  }
}

/**
 * Apply an OSC 4 payload (without the leading `4;`): pairs of
 * `index;spec`. A `?` spec produces a report. Malformed pairs are skipped
 * and leave the entry untouched.
 *
 * @returns report strings to send back, already framed.
 */
export function applyOsc4(palette: Palette, body: string): string[] {
  const parts = body.split(';');
  const replies: string[] = [];
  for (let i = 0; i + 1 < parts.length; i += 2) {
    const indexText = parts[i];
    const spec = parts[i + 1];
    if (!/^\d+$/.test(indexText)) continue;
    const index = parseInt(indexText, 10);
    if (index > 255) continue;
    if (spec === '?') {
      replies.push(`\x1b]4;${index};${formatXColorSpec(palette.get(index))}\x1b\\`);
      continue;
    }
    const rgb = parseXColorSpec(spec);
    if (rgb === undefined) continue;
    palette.set(index, rgb);
  }
  return replies;
}

/** Apply an OSC 104 payload: reset listed entries, or all when empty. */
export function applyOsc104(palette: Palette, body: string): void {
  if (body.trim().length === 0) {
    palette.reset();
    return;
  }
  for (const part of body.split(';')) {
    if (!/^\d+$/.test(part)) continue;
    palette.reset(parseInt(part, 10));
  }
}

export function resolveAttributes(
  palette: Palette,
  style: CellStyle,
  hyperlink?: string,
): ResolvedAttributes {
  let fg = palette.resolve(style.fg, palette.foreground);
  // Bold text in one of the 8 base colors is shown in its bright variant.
  if (style.bold && style.fg?.kind === 'indexed' && style.fg.index < 8) {
    fg = palette.get(style.fg.index + 8);
  }
  let bg = palette.resolve(style.bg, palette.background);
  if (style.inverse) {
    [fg, bg] = [bg, fg];
  }
  const attrs: ResolvedAttributes = {
    fg,
    bg,
    bold: style.bold === true,
    dim: style.dim === true,
    italic: style.italic === true,
    underline: style.underline === true,
    blink: style.blink === true,
    inverse: style.inverse === true,
    invisible: style.invisible === true,
    strike: style.strike === true,
    protected: style.protected === true,
  };
  if (hyperlink !== undefined) attrs.hyperlink = hyperlink;
  return attrs;
}
