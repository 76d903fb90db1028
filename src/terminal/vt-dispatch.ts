/**
 * Control function dispatch tables.
 *
 * CSI handlers are keyed by private marker + intermediates + final byte
 * (`'H'`, `'?h'`, `'!p'`, `'?$p'`), ESC handlers by intermediates + final.
 * Sequences without an entry are counted and ignored.
 */

import { incRuntimeMetric } from '../infra/diagnostics.js';
import type { CsiParams, VtAction } from './vt-escape-parser.js';
import {
  deviceAttributes,
  deviceStatusReport,
  graphicsAttributeReport,
  modeReport,
  secondaryDeviceAttributes,
  windowReport,
  type QueryGeometry,
} from './vt-query-handler.js';
import * as bufOps from './vt-screen-buffer-ops.js';
import { applySgr } from './vt-sgr.js';
import type { MouseProtocol, VtScreenState } from './vt-types.js';
import { cloneStyle } from './vt-utils.js';

/** What a handler may touch besides the state bag. */
export interface VtDispatchHost {
  readonly state: VtScreenState;
  readonly geometry: QueryGeometry;
  writeChar(ch: string): void;
  reply(data: string): void;
  bell(): void;
  fullReset(): void;
  /** DECSET 2026 turned on or off. */
  synchronizedUpdate(active: boolean): void;
}

export type CsiHandler = (host: VtDispatchHost, params: CsiParams) => void;
export type EscHandler = (host: VtDispatchHost) => void;

type CsiAction = Extract<VtAction, { type: 'csi' }>;
type EscAction = Extract<VtAction, { type: 'esc' }>;

/** Numeric parameter; omitted or zero takes the default. */
export function param(params: CsiParams, index: number, fallback: number): number {
  const value = params[index]?.[0];
  return value === undefined || value === 0 ? fallback : value;
}

/** Numeric parameter where zero is meaningful. */
function rawParam(params: CsiParams, index: number, fallback: number): number {
  return params[index]?.[0] ?? fallback;
}

function eachParam(params: CsiParams, fallback: number): number[] {
  if (params.length === 0) return [fallback];
  return params.map((group) => group[0] ?? fallback);
}

const MOUSE_MODES: ReadonlyMap<number, MouseProtocol> = new Map([
  [9, 'x10'],
  [1000, 'normal'],
  [1002, 'button'],
  [1003, 'any'],
]);

export function setPrivateMode(s: VtScreenState, mode: number, enable: boolean): void {
  const mouse = MOUSE_MODES.get(mode);
  if (mouse) {
    if (enable) s.mouseProtocol = mouse;
    else if (s.mouseProtocol === mouse) s.mouseProtocol = 'off';
    return;
  }

  switch (mode) {
    case 1: s.applicationCursorKeys = enable; break;
    case 6:
      s.originMode = enable;
      bufOps.setCursorPosition(s, 0, 0);
      break;
    case 7:
      s.autoWrap = enable;
      if (!enable) s.wrapPending = false;
      break;
    case 25: s.cursorVisible = enable; break;
    case 1004: s.focusReporting = enable; break;
    case 1006: s.mouseEncoding = enable ? 'sgr' : 'default'; break;
    case 47:
    case 1047:
      if (enable) bufOps.enterAltScreen(s, mode === 1047);
      else bufOps.leaveAltScreen(s);
      break;
    case 1049:
      if (enable) {
        bufOps.saveCursor(s);
        bufOps.enterAltScreen(s, true);
      } else if (s.usingAltScreen) {
        bufOps.leaveAltScreen(s);
        bufOps.restoreCursor(s);
      }
      break;
    case 2004: s.bracketedPaste = enable; break;
    case 2026: s.synchronizedUpdate = enable; break;
    default:
      incRuntimeMetric('vt_unknown_mode', { mode: String(mode), private: '1' });
  }
}

function setHostPrivateMode(host: VtDispatchHost, mode: number, enable: boolean): void {
  const wasSynchronized = host.state.synchronizedUpdate;
  setPrivateMode(host.state, mode, enable);
  if (host.state.synchronizedUpdate !== wasSynchronized) host.synchronizedUpdate(enable);
}

export function setAnsiMode(s: VtScreenState, mode: number, enable: boolean): void {
  if (mode === 4) s.insertMode = enable;
  else if (mode === 20) s.newLineMode = enable;
  else incRuntimeMetric('vt_unknown_mode', { mode: String(mode), private: '0' });
}

const noop: CsiHandler = () => undefined;

export const CSI_HANDLERS: ReadonlyMap<string, CsiHandler> = new Map<string, CsiHandler>([
  ['@', ({ state }, p) => bufOps.insertChars(state, param(p, 0, 1))],
  ['A', ({ state }, p) => bufOps.moveCursorVertical(state, -param(p, 0, 1))],
  ['B', ({ state }, p) => bufOps.moveCursorVertical(state, param(p, 0, 1))],
  ['C', ({ state }, p) => bufOps.moveCursorHorizontal(state, param(p, 0, 1))],
  ['D', ({ state }, p) => bufOps.moveCursorHorizontal(state, -param(p, 0, 1))],
  ['E', ({ state }, p) => {
    bufOps.moveCursorVertical(state, param(p, 0, 1));
    state.cursorCol = 0;
  }],
  ['F', ({ state }, p) => {
    bufOps.moveCursorVertical(state, -param(p, 0, 1));
    state.cursorCol = 0;
  }],
  ['G', ({ state }, p) => bufOps.moveCursorHorizontal(state, param(p, 0, 1) - 1 - state.cursorCol)],
  ['`', ({ state }, p) => bufOps.moveCursorHorizontal(state, param(p, 0, 1) - 1 - state.cursorCol)],
  ['a', ({ state }, p) => bufOps.moveCursorHorizontal(state, param(p, 0, 1))],
  ['H', ({ state }, p) => bufOps.setCursorPosition(state, param(p, 0, 1) - 1, param(p, 1, 1) - 1)],
  ['f', ({ state }, p) => bufOps.setCursorPosition(state, param(p, 0, 1) - 1, param(p, 1, 1) - 1)],
  ['d', ({ state }, p) => bufOps.setCursorRow(state, param(p, 0, 1) - 1)],
  ['e', ({ state }, p) => bufOps.moveCursorVertical(state, param(p, 0, 1))],
  ['I', ({ state }, p) => bufOps.forwardTab(state, param(p, 0, 1))],
  ['Z', ({ state }, p) => bufOps.backwardTab(state, param(p, 0, 1))],
  ['J', ({ state }, p) => bufOps.eraseInDisplay(state, rawParam(p, 0, 0))],
  ['?J', ({ state }, p) => bufOps.eraseInDisplay(state, rawParam(p, 0, 0), true)],
  ['K', ({ state }, p) => bufOps.eraseInLine(state, rawParam(p, 0, 0))],
  ['?K', ({ state }, p) => bufOps.eraseInLine(state, rawParam(p, 0, 0), true)],
  ['L', ({ state }, p) => bufOps.insertLines(state, param(p, 0, 1))],
  ['M', ({ state }, p) => bufOps.deleteLines(state, param(p, 0, 1))],
  ['P', ({ state }, p) => bufOps.deleteChars(state, param(p, 0, 1))],
  ['S', ({ state }, p) => bufOps.scrollUp(state, param(p, 0, 1))],
  ['T', ({ state }, p) => bufOps.scrollDown(state, param(p, 0, 1))],
  ['X', ({ state }, p) => bufOps.eraseChars(state, param(p, 0, 1))],
  ['b', (host, p) => {
    const ch = host.state.lastPrinted;
    if (ch === undefined) return;
    const n = Math.min(param(p, 0, 1), host.state.cols * host.state.rows);
    for (let i = 0; i < n; i += 1) host.writeChar(ch);
  }],
  ['g', ({ state }, p) => bufOps.clearTabStop(state, rawParam(p, 0, 0))],
  ['h', ({ state }, p) => eachParam(p, 0).forEach((mode) => setAnsiMode(state, mode, true))],
  ['l', ({ state }, p) => eachParam(p, 0).forEach((mode) => setAnsiMode(state, mode, false))],
  ['?h', (host, p) => eachParam(p, 0).forEach((mode) => setHostPrivateMode(host, mode, true))],
  ['?l', (host, p) => eachParam(p, 0).forEach((mode) => setHostPrivateMode(host, mode, false))],
  ['m', (host, p) => {
    host.state.currentStyle = applySgr(p, host.state.currentStyle);
  }],
  ['r', ({ state }, p) => {
    bufOps.setScrollRegion(state, param(p, 0, 1) - 1, param(p, 1, state.rows) - 1);
  }],
  ['s', ({ state }) => bufOps.saveCursor(state)],
  ['u', ({ state }) => bufOps.restoreCursor(state)],
  ['"q', ({ state }, p) => {
    // DECSCA: 1 marks following text protected, 0 and 2 clear it.
    const mode = rawParam(p, 0, 0);
    if (mode === 1) state.currentStyle = { ...state.currentStyle, protected: true };
    else if (mode === 0 || mode === 2) {
      const next = cloneStyle(state.currentStyle);
      delete next.protected;
      state.currentStyle = next;
    }
  }],
  ['!p', ({ state }) => bufOps.softReset(state)],
  [' q', noop],
  ['c', (host, p) => {
    if (rawParam(p, 0, 0) === 0) host.reply(deviceAttributes());
  }],
  ['>c', (host, p) => {
    if (rawParam(p, 0, 0) === 0) host.reply(secondaryDeviceAttributes());
  }],
  ['n', (host, p) => {
    const out = deviceStatusReport(host.state, rawParam(p, 0, 0), false);
    if (out) host.reply(out);
  }],
  ['?n', (host, p) => {
    const out = deviceStatusReport(host.state, rawParam(p, 0, 0), true);
    if (out) host.reply(out);
  }],
  ['$p', (host, p) => host.reply(modeReport(host.state, rawParam(p, 0, 0), false))],
  ['?$p', (host, p) => host.reply(modeReport(host.state, rawParam(p, 0, 0), true))],
  ['t', (host, p) => {
    const out = windowReport(host.state, rawParam(p, 0, 0), host.geometry);
    if (out) host.reply(out);
  }],
  ['?S', (host, p) => {
    host.reply(graphicsAttributeReport(host.state, rawParam(p, 0, 0), rawParam(p, 1, 0), host.geometry));
  }],
]);

export const ESC_HANDLERS: ReadonlyMap<string, EscHandler> = new Map<string, EscHandler>([
  ['7', ({ state }) => bufOps.saveCursor(state)],
  ['8', ({ state }) => bufOps.restoreCursor(state)],
  ['D', ({ state }) => bufOps.lineFeed(state)],
  ['E', ({ state }) => {
    state.cursorCol = 0;
    bufOps.lineFeed(state);
  }],
  ['H', ({ state }) => bufOps.setTabStop(state)],
  ['M', ({ state }) => bufOps.reverseIndex(state)],
  ['c', (host) => host.fullReset()],
  ['#8', ({ state }) => bufOps.screenAlignmentTest(state)],
  // Keypad application/numeric mode; keypad input is always numeric.
  ['=', () => undefined],
  ['>', () => undefined],
]);

// Character set designations are accepted and not tracked.
const CHARSET_INTERMEDIATES = '()*+-./';

export function dispatchCsi(host: VtDispatchHost, action: CsiAction): boolean {
  const key = `${action.prefix}${action.intermediates}${action.final}`;
  const handler = CSI_HANDLERS.get(key);
  if (!handler) {
    incRuntimeMetric('vt_unknown_csi', { final: key });
    return false;
  }
  handler(host, action.params);
  return true;
}

export function dispatchEsc(host: VtDispatchHost, action: EscAction): boolean {
  if (action.intermediates.length === 1 && CHARSET_INTERMEDIATES.includes(action.intermediates)) {
    return true;
  }
  const handler = ESC_HANDLERS.get(`${action.intermediates}${action.final}`);
  if (!handler) {
    incRuntimeMetric('vt_unknown_escape', { final: `${action.intermediates}${action.final}` });
    return false;
  }
  handler(host);
  return true;
}

/** C0 controls; anything not listed is ignored. */
export function executeControl(host: VtDispatchHost, code: number): void {
  const s = host.state;
  switch (code) {
    case 0x07: host.bell(); break;
    case 0x08:
      s.wrapPending = false;
      s.cursorCol = Math.max(0, s.cursorCol - 1);
      break;
    case 0x09: bufOps.forwardTab(s, 1); break;
    case 0x0a:
    case 0x0b:
    case 0x0c:
      bufOps.lineFeed(s);
      if (s.newLineMode) s.cursorCol = 0;
      break;
    case 0x0d:
      s.wrapPending = false;
      s.cursorCol = 0;
      break;
    default:
      break;
  }
}
