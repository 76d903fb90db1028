/**
 * VtScreen buffer operations using state-bag pattern.
 *
 * All functions take a mutable VtScreenState as the first argument
 * and modify it in place. This keeps the VtScreen class thin while
 * allowing the buffer logic to be tested and maintained independently.
 *
 * The display is always exactly `rows` lines of exactly `cols` cells.
 * After any column-range edit the affected line goes through
 * repairWideSpan, so a wide glyph never survives with only one half.
 */

import type { Cell, Line, SavedCursor, VtScreenState } from './vt-types.js';
import { ScrollbackRing } from './vt-scrollback.js';
import { clamp, cloneCell, cloneStyle } from './vt-utils.js';

export function defaultCell(): Cell {
  return { ch: ' ', width: 1, style: {} };
}

export function defaultLine(cols: number): Line {
  return Array.from({ length: cols }, defaultCell);
}

/** Erased cell: blank, carrying only the current background color. */
export function blankCell(s: VtScreenState): Cell {
  const cell = defaultCell();
  if (s.currentStyle.bg) cell.style.bg = { ...s.currentStyle.bg };
  return cell;
}

export function makeLine(s: VtScreenState, cols: number): Line {
  return Array.from({ length: cols }, () => blankCell(s));
}

export function makeCell(s: VtScreenState, ch: string, width: 1 | 2): Cell {
  const cell: Cell = { ch, width, style: cloneStyle(s.currentStyle) };
  if (s.currentHyperlink !== undefined) cell.hyperlink = s.currentHyperlink;
  return cell;
}

export function makeContinuationCell(s: VtScreenState): Cell {
  const cell: Cell = { ch: '', width: 0, style: cloneStyle(s.currentStyle) };
  if (s.currentHyperlink !== undefined) cell.hyperlink = s.currentHyperlink;
  return cell;
}

function orphanBlank(cell: Cell): Cell {
  const blank = defaultCell();
  if (cell.style.bg) blank.style.bg = { ...cell.style.bg };
  return blank;
}

/** Blank any wide-glyph half whose partner is gone. */
export function repairWideSpan(line: Line): void {
  for (let c = 0; c < line.length; c += 1) {
    const cell = line[c];
    if (cell.width === 2) {
      const next = line[c + 1];
      if (next === undefined || next.width !== 0) {
        line[c] = orphanBlank(cell);
      } else {
        c += 1;
      }
    } else if (cell.width === 0) {
      line[c] = orphanBlank(cell);
    }
  }
}

/** Clip or pad a line to `cols`; a wide glyph cut by the edge is blanked. */
export function fitLine(line: readonly Cell[], cols: number): Line {
  const out = line.slice(0, cols).map(cloneCell);
  while (out.length < cols) out.push(defaultCell());
  repairWideSpan(out);
  return out;
}

export function defaultSavedCursor(): SavedCursor {
  return { row: 0, col: 0, style: {}, originMode: false, autoWrap: true, wrapPending: false };
}

export function defaultTabStops(cols: number): boolean[] {
  return Array.from({ length: cols }, (_, c) => c > 0 && c % 8 === 0);
}

export function createScreenState(cols: number, rows: number, scrollbackLimit: number): VtScreenState {
  return {
    cols,
    rows,
    display: Array.from({ length: rows }, () => defaultLine(cols)),
    scrollback: new ScrollbackRing(scrollbackLimit),
    cursorRow: 0,
    cursorCol: 0,
    saved: defaultSavedCursor(),
    currentStyle: {},
    usingAltScreen: false,
    scrollTop: 0,
    scrollBottom: rows - 1,
    wrapPending: false,
    originMode: false,
    autoWrap: true,
    insertMode: false,
    newLineMode: false,
    applicationCursorKeys: false,
    bracketedPaste: false,
    focusReporting: false,
    synchronizedUpdate: false,
    cursorVisible: true,
    tabStops: defaultTabStops(cols),
    mouseProtocol: 'off',
    mouseEncoding: 'default',
    title: '',
  };
}

export function clampCursor(s: VtScreenState): void {
  s.cursorRow = clamp(s.cursorRow, 0, s.rows - 1);
  s.cursorCol = clamp(s.cursorCol, 0, s.cols - 1);
}

export function cursorWithinScrollRegion(s: VtScreenState): boolean {
  return s.cursorRow >= s.scrollTop && s.cursorRow <= s.scrollBottom;
}

/**
 * Absolute positioning (CUP/HVP). Row is relative to the top margin and
 * confined to the margins when origin mode is on.
 */
export function setCursorPosition(s: VtScreenState, row: number, col: number): void {
  const top = s.originMode ? s.scrollTop : 0;
  const bottom = s.originMode ? s.scrollBottom : s.rows - 1;
  s.cursorRow = clamp(top + Math.max(0, row), top, bottom);
  s.cursorCol = clamp(col, 0, s.cols - 1);
  s.wrapPending = false;
}

export function setCursorRow(s: VtScreenState, row: number): void {
  setCursorPosition(s, row, s.cursorCol);
}

/** Relative vertical move; stops at a margin the cursor starts inside of. */
export function moveCursorVertical(s: VtScreenState, delta: number): void {
  let min = 0;
  let max = s.rows - 1;
  if (delta < 0 && s.cursorRow >= s.scrollTop) min = s.scrollTop;
  if (delta > 0 && s.cursorRow <= s.scrollBottom) max = s.scrollBottom;
  s.cursorRow = clamp(s.cursorRow + delta, min, max);
  s.wrapPending = false;
}

export function moveCursorHorizontal(s: VtScreenState, delta: number): void {
  s.cursorCol = clamp(s.cursorCol + delta, 0, s.cols - 1);
  s.wrapPending = false;
}

/**
 * Shift rows top..bottom up by `count`. Rows leaving the top go to
 * scrollback only when the region is the whole primary screen.
 */
export function scrollRegionUp(
  s: VtScreenState,
  top: number,
  bottom: number,
  count: number,
  keepInScrollback = true,
): void {
  if (top < 0 || bottom >= s.rows || top > bottom) return;
  const n = Math.max(1, Math.min(bottom - top + 1, count));
  const removed = s.display.splice(top, n);
  if (keepInScrollback && top === 0 && bottom === s.rows - 1 && !s.usingAltScreen) {
    for (const line of removed) s.scrollback.push(line);
  }
  const fresh = Array.from({ length: n }, () => makeLine(s, s.cols));
  s.display.splice(bottom - n + 1, 0, ...fresh);
}

export function scrollRegionDown(s: VtScreenState, top: number, bottom: number, count: number): void {
  if (top < 0 || bottom >= s.rows || top > bottom) return;
  const n = Math.max(1, Math.min(bottom - top + 1, count));
  s.display.splice(bottom - n + 1, n);
  const fresh = Array.from({ length: n }, () => makeLine(s, s.cols));
  s.display.splice(top, 0, ...fresh);
}

export function scrollUp(s: VtScreenState, count: number): void {
  scrollRegionUp(s, s.scrollTop, s.scrollBottom, count);
}

export function scrollDown(s: VtScreenState, count: number): void {
  scrollRegionDown(s, s.scrollTop, s.scrollBottom, count);
}

export function lineFeed(s: VtScreenState): void {
  s.wrapPending = false;
  if (s.cursorRow === s.scrollBottom) {
    scrollRegionUp(s, s.scrollTop, s.scrollBottom, 1);
  } else if (s.cursorRow < s.rows - 1) {
    s.cursorRow += 1;
  }
}

export function reverseIndex(s: VtScreenState): void {
  s.wrapPending = false;
  if (s.cursorRow === s.scrollTop) {
    scrollRegionDown(s, s.scrollTop, s.scrollBottom, 1);
  } else if (s.cursorRow > 0) {
    s.cursorRow -= 1;
  }
}

function eraseRange(s: VtScreenState, line: Line, from: number, to: number, selective: boolean): void {
  for (let c = Math.max(0, from); c <= Math.min(s.cols - 1, to); c += 1) {
    if (selective && line[c].style.protected) continue;
    line[c] = blankCell(s);
  }
  repairWideSpan(line);
}

/** EL / DECSEL. Mode 0: to end, 1: from start, 2: whole line. */
export function eraseInLine(s: VtScreenState, mode: number, selective = false): void {
  const line = s.display[s.cursorRow];
  s.wrapPending = false;
  if (mode === 0) eraseRange(s, line, s.cursorCol, s.cols - 1, selective);
  else if (mode === 1) eraseRange(s, line, 0, s.cursorCol, selective);
  else if (mode === 2) eraseRange(s, line, 0, s.cols - 1, selective);
}

/** ED / DECSED. Mode 3 clears scrollback only. */
export function eraseInDisplay(s: VtScreenState, mode: number, selective = false): void {
  s.wrapPending = false;
  if (mode === 0) {
    eraseInLine(s, 0, selective);
    for (let r = s.cursorRow + 1; r < s.rows; r += 1) eraseRange(s, s.display[r], 0, s.cols - 1, selective);
  } else if (mode === 1) {
    for (let r = 0; r < s.cursorRow; r += 1) eraseRange(s, s.display[r], 0, s.cols - 1, selective);
    eraseInLine(s, 1, selective);
  } else if (mode === 2) {
    for (let r = 0; r < s.rows; r += 1) eraseRange(s, s.display[r], 0, s.cols - 1, selective);
  } else if (mode === 3 && !selective) {
    s.scrollback.clear();
  }
}

export function insertChars(s: VtScreenState, count: number): void {
  const line = s.display[s.cursorRow];
  const n = clamp(count, 1, s.cols - s.cursorCol);
  const blanks = Array.from({ length: n }, () => blankCell(s));
  line.splice(s.cursorCol, 0, ...blanks);
  line.length = s.cols;
  repairWideSpan(line);
  s.wrapPending = false;
}

export function deleteChars(s: VtScreenState, count: number): void {
  const line = s.display[s.cursorRow];
  const n = clamp(count, 1, s.cols - s.cursorCol);
  line.splice(s.cursorCol, n);
  while (line.length < s.cols) line.push(blankCell(s));
  repairWideSpan(line);
  s.wrapPending = false;
}

export function eraseChars(s: VtScreenState, count: number): void {
  const n = clamp(count, 1, s.cols - s.cursorCol);
  eraseRange(s, s.display[s.cursorRow], s.cursorCol, s.cursorCol + n - 1, false);
  s.wrapPending = false;
}

export function insertLines(s: VtScreenState, count: number): void {
  if (!cursorWithinScrollRegion(s)) return;
  const n = clamp(count, 1, s.scrollBottom - s.cursorRow + 1);
  scrollRegionDown(s, s.cursorRow, s.scrollBottom, n);
  s.cursorCol = 0;
  s.wrapPending = false;
}

export function deleteLines(s: VtScreenState, count: number): void {
  if (!cursorWithinScrollRegion(s)) return;
  const n = clamp(count, 1, s.scrollBottom - s.cursorRow + 1);
  scrollRegionUp(s, s.cursorRow, s.scrollBottom, n, false);
  s.cursorCol = 0;
  s.wrapPending = false;
}

export function setScrollRegion(s: VtScreenState, top: number, bottom: number): boolean {
  if (top < 0 || bottom >= s.rows || top >= bottom) return false;
  s.scrollTop = top;
  s.scrollBottom = bottom;
  setCursorPosition(s, 0, 0);
  return true;
}

export function setTabStop(s: VtScreenState): void {
  s.tabStops[s.cursorCol] = true;
}

/** TBC. Mode 0 clears the stop at the cursor, 3 clears all. */
export function clearTabStop(s: VtScreenState, mode: number): void {
  if (mode === 0) s.tabStops[s.cursorCol] = false;
  else if (mode === 3) s.tabStops.fill(false);
}

export function forwardTab(s: VtScreenState, count: number): void {
  for (let i = 0; i < count; i += 1) {
    let c = s.cursorCol + 1;
    while (c < s.cols - 1 && !s.tabStops[c]) c += 1;
    s.cursorCol = Math.min(c, s.cols - 1);
  }
  s.wrapPending = false;
}

export function backwardTab(s: VtScreenState, count: number): void {
  for (let i = 0; i < count; i += 1) {
    let c = s.cursorCol - 1;
    while (c > 0 && !s.tabStops[c]) c -= 1;
    s.cursorCol = Math.max(c, 0);
  }
  s.wrapPending = false;
}

export function saveCursor(s: VtScreenState): void {
  s.saved = {
    row: s.cursorRow,
    col: s.cursorCol,
    style: cloneStyle(s.currentStyle),
    originMode: s.originMode,
    autoWrap: s.autoWrap,
    wrapPending: s.wrapPending,
  };
}

export function restoreCursor(s: VtScreenState): void {
  s.cursorRow = s.saved.row;
  s.cursorCol = s.saved.col;
  s.currentStyle = cloneStyle(s.saved.style);
  s.originMode = s.saved.originMode;
  s.autoWrap = s.saved.autoWrap;
  s.wrapPending = s.saved.wrapPending;
  clampCursor(s);
}

export function enterAltScreen(s: VtScreenState, clearScreen: boolean): void {
  if (s.usingAltScreen) {
    if (clearScreen) s.display = Array.from({ length: s.rows }, () => defaultLine(s.cols));
    return;
  }
  s.savedPrimaryScreen = {
    display: s.display,
    cursorRow: s.cursorRow,
    cursorCol: s.cursorCol,
    saved: { ...s.saved, style: cloneStyle(s.saved.style) },
    scrollTop: s.scrollTop,
    scrollBottom: s.scrollBottom,
  };
  s.usingAltScreen = true;
  s.display = Array.from({ length: s.rows }, () => defaultLine(s.cols));
  s.scrollTop = 0;
  s.scrollBottom = s.rows - 1;
  s.wrapPending = false;
}

export function leaveAltScreen(s: VtScreenState): void {
  if (!s.usingAltScreen) return;
  s.usingAltScreen = false;
  s.wrapPending = false;
  const primary = s.savedPrimaryScreen;
  s.savedPrimaryScreen = undefined;
  if (!primary) {
    s.display = Array.from({ length: s.rows }, () => defaultLine(s.cols));
    s.scrollTop = 0;
    s.scrollBottom = s.rows - 1;
    return;
  }
  s.display = primary.display;
  s.cursorRow = primary.cursorRow;
  s.cursorCol = primary.cursorCol;
  s.saved = primary.saved;
  s.scrollTop = primary.scrollTop;
  s.scrollBottom = primary.scrollBottom;
  clampCursor(s);
}

function fitDisplay(s: VtScreenState, display: Line[], cursorRow: number, cols: number, rows: number, primary: boolean): { display: Line[]; shift: number } {
  // Keep the cursor row on screen: rows above it leave first.
  const shift = Math.max(0, cursorRow - rows + 1);
  if (primary) {
    for (let r = 0; r < shift; r += 1) s.scrollback.push(display[r]);
  }
  const kept = display.slice(shift, shift + rows).map((line) => fitLine(line, cols));
  while (kept.length < rows) kept.push(defaultLine(cols));
  return { display: kept, shift };
}

/** Reallocate without reflow; margins reset and tab stops regenerate. */
export function resizeBuffer(s: VtScreenState, cols: number, rows: number): void {
  const fitted = fitDisplay(s, s.display, s.cursorRow, cols, rows, !s.usingAltScreen);
  s.display = fitted.display;
  s.cursorRow -= fitted.shift;
  s.saved.row = Math.max(0, s.saved.row - fitted.shift);

  const primary = s.savedPrimaryScreen;
  if (primary) {
    const result = fitDisplay(s, primary.display, primary.cursorRow, cols, rows, true);
    primary.display = result.display;
    primary.cursorRow = clamp(primary.cursorRow - result.shift, 0, rows - 1);
    primary.cursorCol = clamp(primary.cursorCol, 0, cols - 1);
    primary.saved.row = clamp(primary.saved.row - result.shift, 0, rows - 1);
    primary.saved.col = clamp(primary.saved.col, 0, cols - 1);
    primary.scrollTop = 0;
    primary.scrollBottom = rows - 1;
  }

  s.cols = cols;
  s.rows = rows;
  s.scrollTop = 0;
  s.scrollBottom = rows - 1;
  s.tabStops = defaultTabStops(cols);
  s.wrapPending = false;
  s.saved.row = clamp(s.saved.row, 0, rows - 1);
  s.saved.col = clamp(s.saved.col, 0, cols - 1);
  clampCursor(s);
}

/** DECSTR: modes and cursor attributes back to defaults, content kept. */
export function softReset(s: VtScreenState): void {
  s.cursorVisible = true;
  s.insertMode = false;
  s.originMode = false;
  s.autoWrap = true;
  s.applicationCursorKeys = false;
  s.scrollTop = 0;
  s.scrollBottom = s.rows - 1;
  s.currentStyle = {};
  s.currentHyperlink = undefined;
  s.saved = defaultSavedCursor();
  s.wrapPending = false;
}

/** RIS: everything but the scrollback and the palette. */
export function resetToInitialState(s: VtScreenState): void {
  s.usingAltScreen = false;
  s.savedPrimaryScreen = undefined;
  s.display = Array.from({ length: s.rows }, () => defaultLine(s.cols));
  s.cursorRow = 0;
  s.cursorCol = 0;
  softReset(s);
  s.newLineMode = false;
  s.bracketedPaste = false;
  s.focusReporting = false;
  s.synchronizedUpdate = false;
  s.mouseProtocol = 'off';
  s.mouseEncoding = 'default';
  s.tabStops = defaultTabStops(s.cols);
  s.title = '';
  s.lastPrinted = undefined;
}

/** DECALN: fill the screen with `E`. */
export function screenAlignmentTest(s: VtScreenState): void {
  s.display = Array.from({ length: s.rows }, () =>
    Array.from({ length: s.cols }, (): Cell => ({ ch: 'E', width: 1, style: {} })));
  s.scrollTop = 0;
  s.scrollBottom = s.rows - 1;
  setCursorPosition(s, 0, 0);
}

/**
 * Window of `height` rows ending `offsetFromBottom` rows above the live
 * display, drawn from scrollback followed by the display. Rows are copied
 * and fitted to the current width; missing rows are blank.
 */
export function getVisibleLines(s: VtScreenState, height: number, offsetFromBottom = 0): Line[] {
  const h = Math.max(0, Math.floor(height));
  const back = s.scrollback.length;
  const offset = clamp(offsetFromBottom, 0, back);
  const total = back + s.rows;
  const end = total - offset;
  const start = Math.max(0, end - h);
  const out: Line[] = [];
  for (let i = start; i < end; i += 1) {
    const row = i < back ? s.scrollback.get(i) : s.display[i - back];
    out.push(fitLine(row ?? [], s.cols));
  }
  while (out.length < h) out.push(defaultLine(s.cols));
  return out;
}

/**
 * Attach a decoded image to the cells it covers, starting at the cursor.
 * The grid scrolls as needed; the cursor ends on the row below the image.
 */
export function attachImage(
  s: VtScreenState,
  imageId: number,
  widthPx: number,
  heightPx: number,
  cellWidthPx: number,
  cellHeightPx: number,
): void {
  const tileCols = Math.ceil(widthPx / cellWidthPx);
  const tileRows = Math.ceil(heightPx / cellHeightPx);
  const startCol = s.cursorCol;
  s.wrapPending = false;
  for (let ty = 0; ty < tileRows; ty += 1) {
    const line = s.display[s.cursorRow];
    for (let tx = 0; tx < tileCols && startCol + tx < s.cols; tx += 1) {
      const cell = blankCell(s);
      cell.image = { imageId, x: tx * cellWidthPx, y: ty * cellHeightPx };
      line[startCol + tx] = cell;
    }
    repairWideSpan(line);
    lineFeed(s);
  }
  s.cursorCol = startCol;
}
