/**
 * Terminal emulator types shared across VT modules.
 */

import type { ScrollbackRing } from './vt-scrollback.js';

export type ColorRef =
  | { kind: 'indexed'; index: number }
  | { kind: 'rgb'; rgb: number };

/** Style of a cell; an absent `fg`/`bg` means the terminal default. */
export type CellStyle = {
  fg?: ColorRef;
  bg?: ColorRef;
  bold?: boolean;
  dim?: boolean;
  italic?: boolean;
  underline?: boolean;
  blink?: boolean;
  inverse?: boolean;
  invisible?: boolean;
  strike?: boolean;
  protected?: boolean;
};

/** Reference from a text cell to the tile of a decoded image it shows. */
export type CellImageRef = {
  imageId: number;
  /** Pixel origin of this cell's tile within the image. */
  x: number;
  y: number;
};

/**
 * One grid position. A double-width glyph is stored as a primary cell of
 * width 2 followed by a continuation cell of width 0 with empty `ch`.
 */
export type Cell = {
  ch: string;
  width: 0 | 1 | 2;
  style: CellStyle;
  hyperlink?: string;
  image?: CellImageRef;
};

export type Line = Cell[];

export type MouseProtocol = 'off' | 'x10' | 'normal' | 'button' | 'any';

export type MouseEncoding = 'default' | 'sgr';

export type SavedCursor = {
  row: number;
  col: number;
  style: CellStyle;
  originMode: boolean;
  autoWrap: boolean;
  wrapPending: boolean;
};

export type SavedScreenState = {
  display: Line[];
  cursorRow: number;
  cursorCol: number;
  saved: SavedCursor;
  scrollTop: number;
  scrollBottom: number;
};

/**
 * Mutable state bag for VtScreen buffer operations.
 * All fields are directly read/written by buffer-ops functions.
 */
export interface VtScreenState {
  cols: number;
  rows: number;
  display: Line[];
  scrollback: ScrollbackRing;
  cursorRow: number;
  cursorCol: number;
  saved: SavedCursor;
  currentStyle: CellStyle;
  currentHyperlink?: string;
  usingAltScreen: boolean;
  savedPrimaryScreen?: SavedScreenState;
  scrollTop: number;
  scrollBottom: number;
  wrapPending: boolean;
  originMode: boolean;
  autoWrap: boolean;
  insertMode: boolean;
  newLineMode: boolean;
  applicationCursorKeys: boolean;
  bracketedPaste: boolean;
  focusReporting: boolean;
  synchronizedUpdate: boolean;
  cursorVisible: boolean;
  tabStops: boolean[];
  mouseProtocol: MouseProtocol;
  mouseEncoding: MouseEncoding;
  title: string;
  lastPrinted?: string;
}

export type CursorState = {
  row: number;
  col: number;
  visible: boolean;
};

export type Dimensions = {
  cols: number;
  rows: number;
};

/** Immutable point-in-time copy of the engine's screen model. */
export type TerminalSnapshot = Readonly<{
  cols: number;
  rows: number;
  display: readonly (readonly Readonly<Cell>[])[];
  scrollback: readonly (readonly Readonly<Cell>[])[];
  cursor: Readonly<CursorState>;
  title: string;
  altScreen: boolean;
  mouseProtocol: MouseProtocol;
  mouseEncoding: MouseEncoding;
  version: number;
}>;

/** Cell attributes with colors resolved through the palette. */
export type ResolvedAttributes = {
  fg: number;
  bg: number;
  bold: boolean;
  dim: boolean;
  italic: boolean;
  underline: boolean;
  blink: boolean;
  inverse: boolean;
  invisible: boolean;
  strike: boolean;
  protected: boolean;
  hyperlink?: string;
};
