/**
 * Keyboard, mouse and paste encoding: the input direction of the
 * terminal, turning user events into the bytes an application reads.
 */

import type { MouseEncoding, MouseProtocol } from './vt-types.js';

export interface KeyModifiers {
  shift?: boolean;
  alt?: boolean;
  ctrl?: boolean;
}

export interface KeyboardModes {
  applicationCursorKeys: boolean;
  newLineMode: boolean;
}

const DEFAULT_MODES: KeyboardModes = { applicationCursorKeys: false, newLineMode: false };

/** Keys reported as `CSI [1;m] X` or `SS3 X`. */
const LETTER_KEYS: Record<string, string> = {
  Up: 'A',
  Down: 'B',
  Right: 'C',
  Left: 'D',
  Home: 'H',
  End: 'F',
};

/** F1-F4 are SS3 P..S when unmodified. */
const SS3_FUNCTION_KEYS: Record<string, string> = {
  F1: 'P',
  F2: 'Q',
  F3: 'R',
  F4: 'S',
};

/** Keys reported as `CSI n [;m] ~`. */
const TILDE_KEYS: Record<string, number> = {
  Insert: 2,
  Delete: 3,
  PageUp: 5,
  PageDown: 6,
  F5: 15,
  F6: 17,
  F7: 18,
  F8: 19,
  F9: 20,
  F10: 21,
  F11: 23,
  F12: 24,
};

/** xterm modifier parameter: 1 + shift + 2·alt + 4·ctrl. */
export function modifierParam(mods: KeyModifiers): number {
  return 1 + (mods.shift ? 1 : 0) + (mods.alt ? 2 : 0) + (mods.ctrl ? 4 : 0);
}

function ctrlChar(ch: string): string | undefined {
  const code = ch.charCodeAt(0);
  if (ch.length !== 1) return undefined;
  if (code >= 0x61 && code <= 0x7a) return String.fromCharCode(code - 0x60);
  if (code >= 0x40 && code <= 0x5f) return String.fromCharCode(code - 0x40);
  if (ch === ' ' || ch === '2') return '\x00';
  if (ch === '?') return '\x7f';
  return undefined;
}

/**
 * Encode a key press. `key` is a named key (`Enter`, `Up`, `F5`, ...) or
 * the text the key produces.
 */
export function encodeKey(key: string, modifiers: KeyModifiers = {}, modes: KeyboardModes = DEFAULT_MODES): string {
  const mod = modifierParam(modifiers);
  const altPrefix = modifiers.alt ? '\x1b' : '';

  const letter = LETTER_KEYS[key];
  if (letter !== undefined) {
    if (mod > 1) return `\x1b[1;${mod}${letter}`;
    return modes.applicationCursorKeys ? `\x1bO${letter}` : `\x1b[${letter}`;
  }

  const ss3 = SS3_FUNCTION_KEYS[key];
  if (ss3 !== undefined) {
    return mod > 1 ? `\x1b[1;${mod}${ss3}` : `\x1bO${ss3}`;
  }

  const tilde = TILDE_KEYS[key];
  if (tilde !== undefined) {
    return mod > 1 ? `\x1b[${tilde};${mod}~` : `\x1b[${tilde}~`;
  }

  switch (key) {
    case 'Enter':
      return altPrefix + (modes.newLineMode ? '\r\n' : '\r');
    case 'Tab':
      return modifiers.shift ? '\x1b[Z' : `${altPrefix}\t`;
    case 'Backspace':
      return altPrefix + (modifiers.ctrl ? '\x08' : '\x7f');
    case 'Escape':
      return `${altPrefix}\x1b`;
    default:
      break;
  }

  if (modifiers.ctrl) {
    const control = ctrlChar(key);
    if (control !== undefined) return altPrefix + control;
  }
  return altPrefix + key;
}

export type MouseButton = 'left' | 'middle' | 'right' | 'wheelUp' | 'wheelDown' | 'none';

export type MouseEventKind = 'press' | 'release' | 'move';

export interface TerminalMouseEvent extends KeyModifiers {
  kind: MouseEventKind;
  button: MouseButton;
  /** Zero-based cell coordinates. */
  col: number;
  row: number;
}

const BUTTON_CODES: Record<MouseButton, number> = {
  left: 0,
  middle: 1,
  right: 2,
  none: 3,
  wheelUp: 64,
  wheelDown: 65,
};

function isWheel(button: MouseButton): boolean {
  return button === 'wheelUp' || button === 'wheelDown';
}

function isReported(event: TerminalMouseEvent, protocol: MouseProtocol): boolean {
  switch (protocol) {
    case 'off':
      return false;
    case 'x10':
      return event.kind === 'press' && !isWheel(event.button) && event.button !== 'none';
    case 'normal':
      return event.kind === 'press' || (event.kind === 'release' && !isWheel(event.button));
    case 'button':
      if (event.kind === 'move') return event.button !== 'none';
      return event.kind === 'press' || !isWheel(event.button);
    case 'any':
      return event.kind !== 'release' || !isWheel(event.button);
  }
}

/**
 * Encode a mouse event for the active protocol, or undefined when the
 * protocol does not report it (or, in legacy encoding, when a coordinate
 * does not fit in a byte).
 */
export function encodeMouse(
  event: TerminalMouseEvent,
  protocol: MouseProtocol,
  encoding: MouseEncoding,
): string | undefined {
  if (!isReported(event, protocol)) return undefined;

  let code = BUTTON_CODES[event.button];
  if (protocol !== 'x10') {
    if (event.shift) code += 4;
    if (event.alt) code += 8;
    if (event.ctrl) code += 16;
  }
  if (event.kind === 'move') code += 32;

  const x = Math.max(0, Math.floor(event.col)) + 1;
  const y = Math.max(0, Math.floor(event.row)) + 1;

  if (encoding === 'sgr') {
    const final = event.kind === 'release' ? 'm' : 'M';
    return `\x1b[<${code};${x};${y}${final}`;
  }

  if (event.kind === 'release') {
    // Legacy releases do not say which button went up.
    code = 3 + (code & ~3 & ~64);
  }
  if (x + 32 > 255 || y + 32 > 255) return undefined;
  return `\x1b[M${String.fromCharCode(32 + code)}${String.fromCharCode(32 + x)}${String.fromCharCode(32 + y)}`;
}

const PASTE_START = '\x1b[200~';
const PASTE_END = '\x1b[201~';

/**
 * Prepare pasted text. Line breaks become CR; with bracketed paste on the
 * text is wrapped in start/end markers and any embedded end marker is
 * removed so the paste cannot terminate itself early.
 */
export function encodePaste(text: string, bracketed: boolean): string {
  const normalized = text.replace(/\r?\n/g, '\r');
  if (!bracketed) return normalized;
  return `${PASTE_START}${normalized.split(PASTE_END).join('')}${PASTE_END}`;
}
