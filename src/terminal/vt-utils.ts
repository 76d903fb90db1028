/**
 * Pure utility functions for VT terminal emulation.
 */

import type { Cell, CellStyle, Line } from './vt-types.js';

export function clamp(value: number, min: number, max: number): number {
  if (!Number.isFinite(value)) return min;
  return Math.max(min, Math.min(max, Math.floor(value)));
}

export function charDisplayWidth(ch: string): number {
  if (!ch) return 0;
  const cp = ch.codePointAt(0);
  if (cp === undefined || cp === 0) return 0;

  if (cp < 32 || (cp >= 0x7f && cp < 0xa0)) return 0;

  // Combining marks and format controls should not advance cursor columns.
  if (
    (cp >= 0x0300 && cp <= 0x036f) ||
    (cp >= 0x0483 && cp <= 0x0489) ||
    (cp >= 0x0591 && cp <= 0x05bd) ||
    (cp >= 0x0610 && cp <= 0x061a) ||
    (cp >= 0x064b && cp <= 0x065f) ||
    (cp >= 0x1ab0 && cp <= 0x1aff) ||
    (cp >= 0x1dc0 && cp <= 0x1dff) ||
    (cp >= 0x20d0 && cp <= 0x20ff) ||
    (cp >= 0xfe20 && cp <= 0xfe2f) ||
    cp === 0x200b ||
    cp === 0x200c ||
    cp === 0x200d || // zero-width joiner
    (cp >= 0xfe00 && cp <= 0xfe0f) || // variation selectors
    (cp >= 0xe0100 && cp <= 0xe01ef)
  ) {
    return 0;
  }

  if (
    (cp >= 0x1100 && cp <= 0x115f) ||
    (cp >= 0x2329 && cp <= 0x232a) ||
    (cp >= 0x2e80 && cp <= 0x303e) ||
    (cp >= 0x3041 && cp <= 0xa4cf) ||
    (cp >= 0xac00 && cp <= 0xd7a3) ||
    (cp >= 0xf900 && cp <= 0xfaff) ||
    (cp >= 0xfe10 && cp <= 0xfe19) ||
    (cp >= 0xfe30 && cp <= 0xfe6f) ||
    (cp >= 0xff00 && cp <= 0xff60) ||
    (cp >= 0xffe0 && cp <= 0xffe6) ||
    (cp >= 0x1f300 && cp <= 0x1f64f) ||
    (cp >= 0x1f900 && cp <= 0x1f9ff) ||
    (cp >= 0x1fa70 && cp <= 0x1faff) ||
    (cp >= 0x20000 && cp <= 0x3fffd)
  ) {
    return 2;
  }

  return 1;
}

export function cloneStyle(style: CellStyle): CellStyle {
  const copy: CellStyle = { ...style };
  if (style.fg) copy.fg = { ...style.fg };
  if (style.bg) copy.bg = { ...style.bg };
  return copy;
}

export function cloneCell(cell: Cell): Cell {
  const copy: Cell = { ch: cell.ch, width: cell.width, style: cloneStyle(cell.style) };
  if (cell.hyperlink !== undefined) copy.hyperlink = cell.hyperlink;
  if (cell.image) copy.image = { ...cell.image };
  return copy;
}

export function cloneLine(line: Line): Line {
  return line.map(cloneCell);
}

export function cloneLines(lines: Line[]): Line[] {
  return lines.map(cloneLine);
}

/** Plain text of a line; continuation halves contribute nothing. */
export function lineText(line: readonly Readonly<Cell>[]): string {
  return line.map((cell) => cell.ch).join('');
}

export function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
