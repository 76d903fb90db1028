import { incRuntimeMetric } from '../infra/diagnostics.js';
import { dispatchCsi, dispatchEsc, executeControl, type VtDispatchHost } from './vt-dispatch.js';
import { VtParser, type VtAction } from './vt-escape-parser.js';
import {
  applyOsc104,
  applyOsc4,
  DEFAULT_BACKGROUND,
  DEFAULT_FOREGROUND,
  Palette,
  parseXColorSpec,
  resolveAttributes,
} from './vt-palette.js';
import { dynamicColorReport, type QueryGeometry } from './vt-query-handler.js';
import * as bufOps from './vt-screen-buffer-ops.js';
import type {
  Cell,
  CursorState,
  Dimensions,
  Line,
  ResolvedAttributes,
  TerminalSnapshot,
  VtScreenState,
} from './vt-types.js';
import { charDisplayWidth, clamp, cloneLines, deepFreeze } from './vt-utils.js';

export type { Cell, CellStyle, ColorRef, Line, TerminalSnapshot } from './vt-types.js';

export const MIN_COLS = 2;
export const MAX_COLS = 1000;
export const MIN_ROWS = 1;
export const MAX_ROWS = 500;

/** A DCS string exactly as it appeared between the introducer and ST. */
export type DcsPayload = {
  params: string;
  intermediates: string;
  command: string;
  data: string;
};

export interface VtScreenHandlers {
  /** Bytes the application expects back (query replies). */
  reply?(data: string): void;
  title?(title: string): void;
  bell?(): void;
  clipboard?(selection: string, text: string): void;
  dcs?(payload: DcsPayload): void;
  synchronizedUpdate?(active: boolean): void;
}

export interface VtScreenOptions {
  cols?: number;
  rows?: number;
  scrollback?: number;
  palette?: Palette;
  cellWidthPx?: number;
  cellHeightPx?: number;
  sixelColorRegisters?: number;
  handlers?: VtScreenHandlers;
}

export class VtScreen implements VtDispatchHost {
  private readonly s: VtScreenState;
  private readonly parser = new VtParser();
  private readonly handlers: VtScreenHandlers;
  readonly palette: Palette;
  readonly geometry: QueryGeometry;

  constructor(options: VtScreenOptions = {}) {
    const cols = clamp(options.cols ?? 80, MIN_COLS, MAX_COLS);
    const rows = clamp(options.rows ?? 24, MIN_ROWS, MAX_ROWS);
    this.s = bufOps.createScreenState(cols, rows, Math.max(0, options.scrollback ?? 2000));
    this.palette = options.palette ?? new Palette();
    this.handlers = options.handlers ?? {};
    this.geometry = {
      cellWidthPx: options.cellWidthPx ?? 10,
      cellHeightPx: options.cellHeightPx ?? 20,
      sixelColorRegisters: options.sixelColorRegisters ?? 256,
    };
  }

  get state(): VtScreenState {
    return this.s;
  }

  /** Feed raw output bytes; partial sequences carry over to the next call. */
  write(chunk: Uint8Array | string): void {
    this.parser.feed(chunk, (action) => this.apply(action));
  }

  /** End of stream: commit a dangling UTF-8 sequence as U+FFFD. */
  flush(): void {
    this.parser.flush((action) => this.apply(action));
  }

  resize(cols: number, rows: number): void {
    const nextCols = clamp(cols, MIN_COLS, MAX_COLS);
    const nextRows = clamp(rows, MIN_ROWS, MAX_ROWS);
    if (nextCols === this.s.cols && nextRows === this.s.rows) return;
    bufOps.resizeBuffer(this.s, nextCols, nextRows);
  }

  setScrollbackLimit(limit: number): void {
    this.s.scrollback.setLimit(limit);
  }

  getScrollbackLimit(): number {
    return this.s.scrollback.capacity;
  }

  getScrollbackLength(): number {
    return this.s.scrollback.length;
  }

  getCell(row: number, col: number): Readonly<Cell> | undefined {
    return this.s.display[row]?.[col];
  }

  getAttributes(row: number, col: number): ResolvedAttributes | undefined {
    const cell = this.getCell(row, col);
    if (!cell) return undefined;
    return resolveAttributes(this.palette, cell.style, cell.hyperlink);
  }

  getCursor(): CursorState {
    return { row: this.s.cursorRow, col: this.s.cursorCol, visible: this.s.cursorVisible };
  }

  getDimensions(): Dimensions {
    return { cols: this.s.cols, rows: this.s.rows };
  }

  getTitle(): string {
    return this.s.title;
  }

  getLineText(row: number): string {
    const line = this.s.display[row];
    return line ? line.map((cell) => cell.ch).join('') : '';
  }

  getVisibleLines(height: number, offsetFromBottom = 0): Line[] {
    return bufOps.getVisibleLines(this.s, height, offsetFromBottom);
  }

  /**
   * Frozen copy of the model. Display rows are deep-copied; scrollback
   * rows are already immutable and are shared.
   */
  snapshot(version = 0): TerminalSnapshot {
    const s = this.s;
    return deepFreeze({
      cols: s.cols,
      rows: s.rows,
      display: cloneLines(s.display),
      scrollback: s.scrollback.toArray(),
      cursor: { row: s.cursorRow, col: s.cursorCol, visible: s.cursorVisible },
      title: s.title,
      altScreen: s.usingAltScreen,
      mouseProtocol: s.mouseProtocol,
      mouseEncoding: s.mouseEncoding,
      version,
    });
  }

  attachImage(imageId: number, widthPx: number, heightPx: number): void {
    bufOps.attachImage(this.s, imageId, widthPx, heightPx, this.geometry.cellWidthPx, this.geometry.cellHeightPx);
  }

  reply(data: string): void {
    this.handlers.reply?.(data);
  }

  bell(): void {
    this.handlers.bell?.();
  }

  fullReset(): void {
    const wasSynchronized = this.s.synchronizedUpdate;
    bufOps.resetToInitialState(this.s);
    this.parser.reset();
    if (wasSynchronized) this.synchronizedUpdate(false);
  }

  synchronizedUpdate(active: boolean): void {
    this.handlers.synchronizedUpdate?.(active);
  }

  writeChar(ch: string): void {
    const s = this.s;
    const width = charDisplayWidth(ch);
    if (width === 0 || this.shouldJoinWithPrevious()) {
      this.appendCombiningChar(ch);
      return;
    }

    if (s.wrapPending && s.autoWrap) {
      s.cursorCol = 0;
      bufOps.lineFeed(s);
    }
    s.wrapPending = false;

    if (width === 2 && s.cursorCol >= s.cols - 1) {
      if (s.autoWrap) {
        s.cursorCol = 0;
        bufOps.lineFeed(s);
      } else {
        s.cursorCol = s.cols - 2;
      }
    }

    if (s.insertMode) bufOps.insertChars(s, width);

    const line = s.display[s.cursorRow];
    if (width === 2) {
      line[s.cursorCol] = bufOps.makeCell(s, ch, 2);
      line[s.cursorCol + 1] = bufOps.makeContinuationCell(s);
    } else {
      line[s.cursorCol] = bufOps.makeCell(s, ch, 1);
    }
    bufOps.repairWideSpan(line);
    s.lastPrinted = ch;

    if (s.cursorCol + width >= s.cols) {
      s.cursorCol = s.cols - 1;
      s.wrapPending = s.autoWrap;
    } else {
      s.cursorCol += width;
    }
  }

  /** Cell holding the most recently printed glyph, if any. */
  private previousGlyphColumn(): number {
    const s = this.s;
    let col = s.wrapPending ? s.cursorCol : s.cursorCol - 1;
    if (col > 0 && s.display[s.cursorRow][col].width === 0) col -= 1;
    return col;
  }

  private appendCombiningChar(ch: string): void {
    const col = this.previousGlyphColumn();
    if (col < 0) return;
    const target = this.s.display[this.s.cursorRow][col];
    target.ch += ch;
  }

  private shouldJoinWithPrevious(): boolean {
    const col = this.previousGlyphColumn();
    if (col < 0) return false;
    const target = this.s.display[this.s.cursorRow][col];
    return target.ch.endsWith('\u200d');
  }

  private apply(action: VtAction): void {
    switch (action.type) {
      case 'print': this.writeChar(action.ch); break;
      case 'execute': executeControl(this, action.code); break;
      case 'esc': dispatchEsc(this, action); break;
      case 'csi':
        dispatchCsi(this, action);
        break;
      case 'osc': this.handleOsc(action.data); break;
      case 'dcs':
        this.handlers.dcs?.({
          params: action.params,
          intermediates: action.intermediates,
          command: action.command,
          data: action.data,
        });
        break;
      case 'sos':
      case 'pm':
      case 'apc':
        break;
    }
  }

  private handleOsc(data: string): void {
    const sep = data.indexOf(';');
    const codeText = sep < 0 ? data : data.slice(0, sep);
    const body = sep < 0 ? '' : data.slice(sep + 1);
    const code = /^\d+$/.test(codeText) ? parseInt(codeText, 10) : -1;

    switch (code) {
      case 0:
      case 2:
        this.s.title = body;
        this.handlers.title?.(body);
        break;
      case 1:
        break;
      case 4:
        for (const out of applyOsc4(this.palette, body)) this.reply(out);
        break;
      case 8: {
        // OSC 8 ; params ; uri
        const uriSep = body.indexOf(';');
        const uri = uriSep < 0 ? '' : body.slice(uriSep + 1);
        this.s.currentHyperlink = uri.length > 0 ? uri : undefined;
        break;
      }
      case 10:
      case 11:
        this.handleDynamicColor(code, body);
        break;
      case 52:
        this.handleClipboard(body);
        break;
      case 104:
        applyOsc104(this.palette, body);
        break;
      case 110:
        this.palette.foreground = DEFAULT_FOREGROUND;
        break;
      case 111:
        this.palette.background = DEFAULT_BACKGROUND;
        break;
      default:
        incRuntimeMetric('vt_unknown_osc', { code: codeText.slice(0, 8) });
    }
  }

  private handleDynamicColor(code: number, body: string): void {
    if (body === '?') {
      this.reply(dynamicColorReport(code, code === 10 ? this.palette.foreground : this.palette.background));
      return;
    }
    const rgb = parseXColorSpec(body);
    if (rgb === undefined) return;
    if (code === 10) this.palette.foreground = rgb;
    else this.palette.background = rgb;
  }

  private handleClipboard(body: string): void {
    const sep = body.indexOf(';');
    if (sep < 0) return;
    const selection = body.slice(0, sep) || 'c';
    const encoded = body.slice(sep + 1);
    // Reading the clipboard back is not offered.
    if (encoded === '?') return;
    const text = Buffer.from(encoded, 'base64').toString('utf8');
    this.handlers.clipboard?.(selection, text);
  }
}
