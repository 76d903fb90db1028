/**
 * Terminal engine: owns the screen model, runs the reader task and
 * publishes snapshots.
 *
 * Every mutation (`feed`, `resize`, `setScrollbackLimit`, `close`) goes
 * through `mutate()`, which refuses re-entry and bumps the version.
 * `captureState()` materializes a frozen snapshot at most once per version;
 * called from inside a mutation it returns the last published one.
 */

import { EventEmitter } from 'events';
import { setTimeout as sleep } from 'timers/promises';
import { loadEngineConfig, type EngineConfig } from '../config/engine-config.js';
import { sanitizeForLog } from '../infra/log-sanitizer.js';
import { createSixelEncoder } from '../sixel/encoder-factory.js';
import { GlyphDownsampler, type GlyphGrid } from '../sixel/glyph-downsampler.js';
import type { RgbImage } from '../sixel/image.js';
import { decodeSixel, SIXEL_MAX_HEIGHT, SIXEL_MAX_WIDTH } from '../sixel/sixel-decoder.js';
import { wrapSixel } from '../sixel/sixel-encoder.js';
import type { TelnetConnection } from '../telnet/telnet-connection.js';
import { encodeKey, encodeMouse, encodePaste, type KeyModifiers, type TerminalMouseEvent } from './vt-input-encoder.js';
import type { Palette } from './vt-palette.js';
import { MAX_COLS, MAX_ROWS, MIN_COLS, MIN_ROWS, VtScreen, type DcsPayload } from './vt-screen.js';
import type { Cell, CursorState, Dimensions, ResolvedAttributes, TerminalSnapshot } from './vt-types.js';

/** How long a synchronized update may hold back snapshots. */
export const SYNCHRONIZED_UPDATE_TIMEOUT_MS = 125;
const OUTPUT_POLL_MS = 10;
const MAX_RETAINED_IMAGES = 64;
/** Pixels retained across stored images: one image of the largest decodable size. */
export const DEFAULT_IMAGE_PIXEL_BUDGET = SIXEL_MAX_WIDTH * SIXEL_MAX_HEIGHT;

export type EngineCloseReason = 'eof' | 'error' | 'closed';

export interface EngineCloseInfo {
  reason: EngineCloseReason;
  error?: Error;
}

/** Where output bytes come from: a Readable or any async byte iterable. */
export interface ByteSource extends AsyncIterable<Uint8Array | string> {
  destroy?(error?: Error): unknown;
}

/** Where replies and input go. */
export interface ByteSink {
  write(data: Uint8Array | string): unknown;
  destroy?(error?: Error): unknown;
}

export interface TerminalImageEvent {
  id: number;
  image: RgbImage;
  transparent: boolean;
  truncated: boolean;
  /** Cursor position the image was placed at. */
  row: number;
  col: number;
  payload: DcsPayload;
}

export interface TerminalEngineOptions {
  cols?: number;
  rows?: number;
  scrollback?: number;
  palette?: Palette;
  source?: ByteSource;
  sink?: ByteSink;
  config?: EngineConfig;
  /** Clock used for the synchronized-update timeout. */
  now?: () => number;
  /** Total pixels of decoded images kept for `getImage`; oldest images go first. */
  imagePixelBudget?: number;
}

/** What a rendering backend reads. */
export interface TerminalView {
  getCell(row: number, col: number): Readonly<Cell> | undefined;
  getAttributes(row: number, col: number): ResolvedAttributes | undefined;
  getCursor(): CursorState;
  getDimensions(): Dimensions;
  captureState(): TerminalSnapshot;
  isClosed(): boolean;
}

type PendingEvent = { name: string; args: unknown[] };

export class TerminalEngine extends EventEmitter implements TerminalView {
  readonly config: EngineConfig;
  readonly closed: Promise<EngineCloseInfo>;
  private readonly screen: VtScreen;
  private readonly now: () => number;
  private readonly images = new Map<number, RgbImage>();
  private readonly imagePixelBudget: number;
  private retainedPixels = 0;
  private resolveClosed: (info: EngineCloseInfo) => void = () => undefined;
  private source?: ByteSource;
  private sink?: ByteSink;
  private readerTask?: Promise<void>;
  private mutating = false;
  private version = 0;
  private outputVersion = 0;
  private published: TerminalSnapshot;
  private held?: { snapshot: TerminalSnapshot; since: number };
  private pending: PendingEvent[] = [];
  private closeInfo?: EngineCloseInfo;
  private deferredClose?: EngineCloseInfo;
  private nextImageId = 1;

  constructor(options: TerminalEngineOptions = {}) {
    super();
    this.config = options.config ?? loadEngineConfig();
    this.now = options.now ?? Date.now;
    this.imagePixelBudget = Math.max(0, options.imagePixelBudget ?? DEFAULT_IMAGE_PIXEL_BUDGET);
    this.closed = new Promise<EngineCloseInfo>((resolve) => {
      this.resolveClosed = resolve;
    });
    this.screen = new VtScreen({
      cols: options.cols ?? this.config.cols,
      rows: options.rows ?? this.config.rows,
      scrollback: options.scrollback ?? this.config.scrollback,
      palette: options.palette,
      cellWidthPx: this.config.cellWidthPx,
      cellHeightPx: this.config.cellHeightPx,
      sixelColorRegisters: this.config.sixelPaletteSize,
      handlers: {
        reply: (data) => this.writeSink(data),
        title: (title) => this.queue('title', title),
        bell: () => this.queue('bell'),
        clipboard: (selection, text) => this.queue('clipboard', selection, text),
        dcs: (payload) => this.handleDcs(payload),
        synchronizedUpdate: (active) => this.handleSynchronizedUpdate(active),
      },
    });
    this.published = this.screen.snapshot(this.version);

    if (options.source) this.attach(options.source, options.sink);
    else if (options.sink) this.sink = options.sink;
  }

  get palette(): Palette {
    return this.screen.palette;
  }

  /** Start the reader task over `source`; replies go to `sink`. */
  attach(source: ByteSource, sink?: ByteSink): void {
    if (this.closeInfo) return;
    if (this.readerTask) throw new Error('terminal engine already has a source attached');
    this.source = source;
    if (sink) this.sink = sink;
    this.readerTask = this.runReader(source);
  }

  /** Feed output bytes directly (the reader task calls this for each chunk). */
  feed(chunk: Uint8Array | string): void {
    const done = this.mutate(() => this.screen.write(chunk));
    if (!done) return;
    this.outputVersion += 1;
    this.flushEvents();
    this.emit('output', this.outputVersion);
  }

  resize(cols: number, rows: number): void {
    const done = this.mutate(() => {
      this.held = undefined;
      this.screen.resize(cols, rows);
    });
    if (done) this.flushEvents();
  }

  setScrollbackLimit(limit: number): void {
    this.mutate(() => {
      // A held snapshot may carry more rows than the new cap allows.
      this.held = undefined;
      this.screen.setScrollbackLimit(Math.max(0, Math.floor(limit)));
    });
  }

  getScrollbackLimit(): number {
    return this.screen.getScrollbackLimit();
  }

  sendInput(data: Uint8Array | string): void {
    if (this.closeInfo) return;
    this.writeSink(data);
  }

  sendKey(key: string, modifiers: KeyModifiers = {}): void {
    const s = this.screen.state;
    this.sendInput(encodeKey(key, modifiers, { applicationCursorKeys: s.applicationCursorKeys, newLineMode: s.newLineMode }));
  }

  /** Returns false when the active mouse mode does not report the event. */
  sendMouse(event: TerminalMouseEvent): boolean {
    const s = this.screen.state;
    const encoded = encodeMouse(event, s.mouseProtocol, s.mouseEncoding);
    if (encoded === undefined) return false;
    this.sendInput(encoded);
    return true;
  }

  sendPaste(text: string): void {
    this.sendInput(encodePaste(text, this.screen.state.bracketedPaste));
  }

  getCell(row: number, col: number): Readonly<Cell> | undefined {
    return this.screen.getCell(row, col);
  }

  getAttributes(row: number, col: number): ResolvedAttributes | undefined {
    return this.screen.getAttributes(row, col);
  }

  getCursor(): CursorState {
    return this.screen.getCursor();
  }

  getDimensions(): Dimensions {
    return this.screen.getDimensions();
  }

  getTitle(): string {
    return this.screen.getTitle();
  }

  getImage(id: number): RgbImage | undefined {
    return this.images.get(id);
  }

  isClosed(): boolean {
    return this.closeInfo !== undefined;
  }

  getVersion(): number {
    return this.version;
  }

  captureState(): TerminalSnapshot {
    if (this.mutating) return this.published;
    if (this.held) {
      if (this.now() - this.held.since < SYNCHRONIZED_UPDATE_TIMEOUT_MS) return this.held.snapshot;
      this.held = undefined;
    }
    if (this.published.version !== this.version) {
      this.published = this.screen.snapshot(this.version);
    }
    return this.published;
  }

  /** Block-glyph rendering of a decoded image with the configured glyph set. */
  renderImageGlyphs(id: number): GlyphGrid | undefined {
    const image = this.images.get(id);
    if (!image) return undefined;
    return new GlyphDownsampler(this.config.glyphSet, this.config.cellWidthPx, this.config.cellHeightPx).downsample(image);
  }

  /** DCS-wrapped sixel for `image` using the configured encoder and palette size. */
  encodeImage(image: RgbImage): string {
    const encoder = createSixelEncoder(this.config.sixelEncoder);
    return wrapSixel(
      encoder.encode(image, {
        paletteSize: this.config.sixelPaletteSize,
        cellSize: { width: this.config.cellWidthPx, height: this.config.cellHeightPx },
      }),
    );
  }

  /**
   * Resolve true once `predicate` holds (by default: once any output has
   * been processed after the call), false when `timeoutMs` elapses first
   * or the engine is closed. Closure itself is reported by `closed`.
   */
  async waitForOutput(predicate?: (view: TerminalView) => boolean, timeoutMs = 1000): Promise<boolean> {
    const startVersion = this.outputVersion;
    const satisfied = () => (predicate ? predicate(this) : this.outputVersion > startVersion);
    const deadline = this.now() + Math.max(0, timeoutMs);

    for (;;) {
      if (satisfied()) return true;
      if (this.closeInfo) return false;
      if (this.now() >= deadline) return false;
      await sleep(OUTPUT_POLL_MS);
    }
  }

  /** Idempotent; every call returns the same promise. */
  close(): Promise<EngineCloseInfo> {
    this.shutdown({ reason: 'closed' });
    return this.closed;
  }

  private mutate(fn: () => void): boolean {
    if (this.closeInfo) return false;
    if (this.mutating) throw new Error('terminal engine mutation re-entered');
    this.mutating = true;
    try {
      fn();
      this.version += 1;
    } finally {
      this.mutating = false;
    }
    const deferred = this.deferredClose;
    if (deferred) {
      this.deferredClose = undefined;
      this.shutdown(deferred);
    }
    return true;
  }

  private shutdown(info: EngineCloseInfo): void {
    if (this.closeInfo) return;
    if (this.mutating) {
      this.deferredClose ??= info;
      return;
    }
    this.closeInfo = info;
    this.version += 1;
    this.held = undefined;
    this.pending = [];

    const { source, sink } = this;
    const sourceStream: object | undefined = source;
    this.source = undefined;
    this.sink = undefined;
    try {
      source?.destroy?.();
      // A duplex stream may serve as both ends.
      if (sink && sink !== sourceStream) sink.destroy?.();
    } catch (err) {
      console.warn(`[engine] error while releasing streams: ${sanitizeForLog(errorMessage(err))}`);
    }

    this.images.clear();
    this.retainedPixels = 0;
    if (this.config.debug) console.log(`[engine] closed (${info.reason})`);
    this.resolveClosed(info);
    this.emit('close', info);
  }

  private async runReader(source: ByteSource): Promise<void> {
    try {
      for await (const chunk of source) {
        if (this.closeInfo) return;
        this.feed(chunk);
      }
      if (this.mutate(() => this.screen.flush())) this.flushEvents();
      this.shutdown({ reason: 'eof' });
    } catch (err) {
      // Destroying the source on close() ends the iteration with an error.
      if (this.closeInfo) return;
      const error = err instanceof Error ? err : new Error(String(err));
      console.warn(`[engine] reader stopped: ${sanitizeForLog(error.message)}`);
      this.shutdown({ reason: 'error', error });
    }
  }

  private writeSink(data: Uint8Array | string): void {
    const sink = this.sink;
    if (!sink) return;
    try {
      sink.write(data);
    } catch (err) {
      console.warn(`[engine] sink write failed: ${sanitizeForLog(errorMessage(err))}`);
    }
  }

  private queue(name: string, ...args: unknown[]): void {
    this.pending.push({ name, args });
  }

  private flushEvents(): void {
    const events = this.pending;
    this.pending = [];
    for (const event of events) this.emit(event.name, ...event.args);
  }

  private handleSynchronizedUpdate(active: boolean): void {
    if (active) {
      // Freeze what readers see at the point the update began.
      this.held = { snapshot: this.screen.snapshot(this.version), since: this.now() };
    } else {
      this.held = undefined;
    }
  }

  private retainImage(id: number, image: RgbImage): void {
    const size = image.width * image.height;
    if (size > this.imagePixelBudget) return;
    this.images.set(id, image);
    this.retainedPixels += size;
    for (const [oldId, old] of this.images) {
      if (this.images.size <= MAX_RETAINED_IMAGES && this.retainedPixels <= this.imagePixelBudget) break;
      this.images.delete(oldId);
      this.retainedPixels -= old.width * old.height;
    }
  }

  private handleDcs(payload: DcsPayload): void {
    this.queue('dcs', payload);
    if (payload.command !== 'q' || payload.intermediates !== '') return;

    const decoded = decodeSixel(payload);
    if (decoded.truncated && this.config.debug) {
      console.log(`[engine] partial sixel image ${decoded.image.width}x${decoded.image.height}`);
    }
    const id = this.nextImageId;
    this.nextImageId += 1;
    this.retainImage(id, decoded.image);

    const { row, col } = this.screen.getCursor();
    this.screen.attachImage(id, decoded.image.width, decoded.image.height);
    const event: TerminalImageEvent = {
      id,
      image: decoded.image,
      transparent: decoded.transparent,
      truncated: decoded.truncated,
      row,
      col,
      payload,
    };
    this.queue('image', event);
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Resize `engine` whenever the telnet peer reports a window size. Sizes
 * outside the supported range are clamped with a warning. Returns an
 * unsubscribe function.
 */
export function bindTelnetResize(engine: TerminalEngine, connection: TelnetConnection): () => void {
  const onResize = (cols: number, rows: number) => {
    const clampedCols = Math.max(MIN_COLS, Math.min(MAX_COLS, cols));
    const clampedRows = Math.max(MIN_ROWS, Math.min(MAX_ROWS, rows));
    if (clampedCols !== cols || clampedRows !== rows) {
      console.warn(`[telnet] window size ${cols}x${rows} out of range, using ${clampedCols}x${clampedRows}`);
    }
    engine.resize(clampedCols, clampedRows);
  };
  connection.on('resize', onResize);
  return () => {
    connection.off('resize', onResize);
  };
}

/**
 * Run an engine over a telnet session: bytes, replies and window size.
 * Closing the engine closes the connection.
 */
export function attachTelnet(engine: TerminalEngine, connection: TelnetConnection): () => void {
  engine.attach(connection.input, connection.output);
  const closeConnection = () => connection.close();
  engine.once('close', closeConnection);
  const unbind = bindTelnetResize(engine, connection);
  return () => {
    unbind();
    engine.off('close', closeConnection);
  };
}
