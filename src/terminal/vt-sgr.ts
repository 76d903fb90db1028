/**
 * SGR (Select Graphic Rendition) parser for VT terminal emulation.
 *
 * Pure function: takes SGR parameter groups and current style,
 * returns the updated style without mutating the input.
 */

import type { CsiParams } from './vt-escape-parser.js';
import type { CellStyle, ColorRef } from './vt-types.js';
import { cloneStyle } from './vt-utils.js';

function channel(value: number | undefined): number | undefined {
  if (value === undefined || !Number.isFinite(value)) return undefined;
  return Math.max(0, Math.min(255, value));
}

function rgbRef(r: number | undefined, g: number | undefined, b: number | undefined): ColorRef | undefined {
  const rr = channel(r);
  const gg = channel(g);
  const bb = channel(b);
  if (rr === undefined || gg === undefined || bb === undefined) return undefined;
  return { kind: 'rgb', rgb: (rr << 16) | (gg << 8) | bb };
}

function indexedRef(index: number | undefined): ColorRef | undefined {
  if (index === undefined || index < 0 || index > 255) return undefined;
  return { kind: 'indexed', index };
}

/**
 * Read an extended color (38/48/58). Handles both the colon form, where
 * everything sits in one group (`38:2::r:g:b`, `38:5:n`), and the legacy
 * semicolon form spread over following groups.
 *
 * @returns the color (if valid) and how many extra groups were consumed.
 */
function readExtendedColor(params: CsiParams, i: number): { color?: ColorRef; consumed: number } {
  const group = params[i];
  if (group.length > 1) {
    const mode = group[1];
    if (mode === 5) return { color: indexedRef(group[2]), consumed: 0 };
    if (mode === 2) {
      // With a color-space id: 38:2:id:r:g:b
      const offset = group.length >= 6 ? 3 : 2;
      return { color: rgbRef(group[offset], group[offset + 1], group[offset + 2]), consumed: 0 };
    }
    return { consumed: 0 };
  }

  const mode = params[i + 1]?.[0];
  if (mode === 5) {
    return { color: indexedRef(params[i + 2]?.[0]), consumed: 2 };
  }
  if (mode === 2) {
    return {
      color: rgbRef(params[i + 2]?.[0], params[i + 3]?.[0], params[i + 4]?.[0]),
      consumed: 4,
    };
  }
  return { consumed: mode === undefined ? 0 : 1 };
}

/**
 * Apply an SGR sequence to a cell style.
 *
 * Returns a new CellStyle reflecting the SGR codes. The DECSCA
 * `protected` flag is not an SGR attribute and survives a reset.
 */
export function applySgr(params: CsiParams, currentStyle: CellStyle): CellStyle {
  const reset = (): CellStyle => (currentStyle.protected ? { protected: true } : {});
  if (params.length === 0) {
    return reset();
  }

  let style = cloneStyle(currentStyle);

  for (let i = 0; i < params.length; i += 1) {
    const group = params[i];
    const code = group[0] ?? 0;

    switch (code) {
      case 0: style = reset(); break;
      case 1: style.bold = true; break;
      case 2: style.dim = true; break;
      case 3: style.italic = true; break;
      case 4: style.underline = group[1] !== 0; break;
      case 5:
      case 6: style.blink = true; break;
      case 7: style.inverse = true; break;
      case 8: style.invisible = true; break;
      case 9: style.strike = true; break;
      case 21: style.underline = true; break;
      case 22: style.bold = false; style.dim = false; break;
      case 23: style.italic = false; break;
      case 24: style.underline = false; break;
      case 25: style.blink = false; break;
      case 27: style.inverse = false; break;
      case 28: style.invisible = false; break;
      case 29: style.strike = false; break;
      case 39: delete style.fg; break;
      case 49: delete style.bg; break;
      case 38:
      case 48:
      case 58: {
        const { color, consumed } = readExtendedColor(params, i);
        if (color && code === 38) style.fg = color;
        if (color && code === 48) style.bg = color;
        i += consumed;
        break;
      }
      default:
        if (code >= 30 && code <= 37) style.fg = { kind: 'indexed', index: code - 30 };
        else if (code >= 90 && code <= 97) style.fg = { kind: 'indexed', index: 8 + (code - 90) };
        else if (code >= 40 && code <= 47) style.bg = { kind: 'indexed', index: code - 40 };
        else if (code >= 100 && code <= 107) style.bg = { kind: 'indexed', index: 8 + (code - 100) };
        break;
    }
  }

  return style;
}
