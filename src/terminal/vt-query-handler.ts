/**
 * Terminal query response builder.
 *
 * Turns device, mode and geometry queries into the reply strings the
 * application expects to read back (cursor position reports, device
 * attributes, mode reports, window and sixel geometry, color reports).
 */

import { incRuntimeMetric } from '../infra/diagnostics.js';
import { formatXColorSpec } from './vt-palette.js';
import type { VtScreenState } from './vt-types.js';

export interface QueryGeometry {
  cellWidthPx: number;
  cellHeightPx: number;
  /** Number of sixel color registers advertised. */
  sixelColorRegisters: number;
}

/** Primary DA: VT220-class with sixel graphics (4) and ANSI color (22). */
export const PRIMARY_DEVICE_ATTRIBUTES = '\x1b[?62;4;22c';
export const SECONDARY_DEVICE_ATTRIBUTES = '\x1b[>1;10;0c';

const noteQueryResponse = (kind: string) => incRuntimeMetric('vt_query_response', { kind });

/**
 * DECRQM state for a private mode: 1 set, 2 reset, 0 not recognized.
 */
export function privateModeState(s: VtScreenState, mode: number): number {
  const flag = (value: boolean) => (value ? 1 : 2);
  switch (mode) {
    case 1: return flag(s.applicationCursorKeys);
    case 6: return flag(s.originMode);
    case 7: return flag(s.autoWrap);
    case 25: return flag(s.cursorVisible);
    case 9: return flag(s.mouseProtocol === 'x10');
    case 1000: return flag(s.mouseProtocol === 'normal');
    case 1002: return flag(s.mouseProtocol === 'button');
    case 1003: return flag(s.mouseProtocol === 'any');
    case 1004: return flag(s.focusReporting);
    case 1006: return flag(s.mouseEncoding === 'sgr');
    case 47:
    case 1047:
    case 1049: return flag(s.usingAltScreen);
    case 2004: return flag(s.bracketedPaste);
    case 2026: return flag(s.synchronizedUpdate);
    default: return 0;
  }
}

export function ansiModeState(s: VtScreenState, mode: number): number {
  if (mode === 4) return s.insertMode ? 1 : 2;
  if (mode === 20) return s.newLineMode ? 1 : 2;
  return 0;
}

export function modeReport(s: VtScreenState, mode: number, isPrivate: boolean): string {
  noteQueryResponse(isPrivate ? 'decrqm_private' : 'decrqm_ansi');
  if (isPrivate) return `\x1b[?${mode};${privateModeState(s, mode)}$y`;
  return `\x1b[${mode};${ansiModeState(s, mode)}$y`;
}

export function deviceAttributes(): string {
  noteQueryResponse('da1');
  return PRIMARY_DEVICE_ATTRIBUTES;
}

export function secondaryDeviceAttributes(): string {
  noteQueryResponse('da2');
  return SECONDARY_DEVICE_ATTRIBUTES;
}

/**
 * DSR. 5 reports status OK, 6 the cursor position (1-based, relative to
 * the top margin under origin mode). Anything else has no reply.
 */
export function deviceStatusReport(s: VtScreenState, kind: number, isPrivate: boolean): string | undefined {
  if (kind === 5) {
    noteQueryResponse('dsr_5');
    return '\x1b[0n';
  }
  if (kind === 6) {
    noteQueryResponse('dsr_6');
    const row = s.originMode ? s.cursorRow - s.scrollTop : s.cursorRow;
    return `\x1b[${isPrivate ? '?' : ''}${row + 1};${s.cursorCol + 1}R`;
  }
  return undefined;
}

/** XTWINOPS 14 (text area in pixels) and 18 (text area in cells). */
export function windowReport(s: VtScreenState, kind: number, geometry: QueryGeometry): string | undefined {
  if (kind === 14) {
    noteQueryResponse('xtwinops_14');
    return `\x1b[4;${s.rows * geometry.cellHeightPx};${s.cols * geometry.cellWidthPx}t`;
  }
  if (kind === 18) {
    noteQueryResponse('xtwinops_18');
    return `\x1b[8;${s.rows};${s.cols}t`;
  }
  return undefined;
}

/**
 * XTSMGRAPHICS (`CSI ? Pi ; Pa ; Pv S`). Item 1 is the number of color
 * registers, item 2 the sixel geometry; only reads (Pa 1 or 4) succeed.
 */
export function graphicsAttributeReport(
  s: VtScreenState,
  item: number,
  action: number,
  geometry: QueryGeometry,
): string {
  noteQueryResponse('xtsmgraphics');
  const readable = action === 1 || action === 4;
  if (item === 1 && readable) {
    return `\x1b[?1;0;${geometry.sixelColorRegisters}S`;
  }
  if (item === 2 && readable) {
    return `\x1b[?2;0;${s.cols * geometry.cellWidthPx};${s.rows * geometry.cellHeightPx}S`;
  }
  // 1: invalid item, 3: invalid action
  const status = item === 1 || item === 2 ? 3 : 1;
  return `\x1b[?${item};${status};0S`;
}

/** OSC 10/11 dynamic color report. */
export function dynamicColorReport(code: number, rgb: number): string {
  noteQueryResponse(`osc_${code}`);
  return `\x1b]${code};${formatXColorSpec(rgb)}\x1b\\`;
}
