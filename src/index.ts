/**
 * Public entry point for vtscope.
 */

export {
  DEFAULT_ENGINE_CONFIG,
  GLYPH_SET_NAMES,
  loadEngineConfig,
  type EngineConfig,
  type GlyphSetName,
  type SixelEncoderKind,
} from './config/engine-config.js';
export {
  getRuntimeMetric,
  getRuntimeMetricSnapshot,
  incRuntimeMetric,
  resetRuntimeMetrics,
} from './infra/diagnostics.js';
export { sanitizeForLog } from './infra/log-sanitizer.js';

export {
  attachTelnet,
  bindTelnetResize,
  DEFAULT_IMAGE_PIXEL_BUDGET,
  SYNCHRONIZED_UPDATE_TIMEOUT_MS,
  TerminalEngine,
  type ByteSink,
  type ByteSource,
  type EngineCloseInfo,
  type EngineCloseReason,
  type TerminalEngineOptions,
  type TerminalImageEvent,
  type TerminalView,
} from './terminal/vt-engine.js';
export { parseVtStream, VtParser, type VtAction } from './terminal/vt-escape-parser.js';
export {
  encodeKey,
  encodeMouse,
  encodePaste,
  modifierParam,
  type KeyboardModes,
  type KeyModifiers,
  type MouseButton,
  type TerminalMouseEvent,
} from './terminal/vt-input-encoder.js';
export {
  ANSI_16_COLORS,
  formatXColorSpec,
  Palette,
  parseXColorSpec,
  resolveAttributes,
  scaleRgbChannel,
  xterm256Color,
} from './terminal/vt-palette.js';
export { ScrollbackRing } from './terminal/vt-scrollback.js';
export { MAX_COLS, MAX_ROWS, MIN_COLS, MIN_ROWS, VtScreen, type DcsPayload, type VtScreenOptions } from './terminal/vt-screen.js';
export type {
  Cell,
  CellStyle,
  ColorRef,
  CursorState,
  Dimensions,
  Line,
  MouseEncoding,
  MouseProtocol,
  ResolvedAttributes,
  TerminalSnapshot,
} from './terminal/vt-types.js';

export { createSixelEncoder } from './sixel/encoder-factory.js';
export { GlyphDownsampler, renderGlyphGridAnsi, type GlyphCell, type GlyphGrid } from './sixel/glyph-downsampler.js';
export { RgbImage } from './sixel/image.js';
export { decodeSixel, type SixelDecodeOptions, type SixelDecodeResult, type SixelPayload } from './sixel/sixel-decoder.js';
export {
  SimpleSixelEncoder,
  wrapSixel,
  type CellSize,
  type SixelEncodeOptions,
  type SixelEncoder,
} from './sixel/sixel-encoder.js';
export { HqSixelEncoder, type HqSixelEncoderSettings } from './sixel/sixel-hq-encoder.js';

export { TelnetConnection, type TelnetConnectionOptions } from './telnet/telnet-connection.js';
export { TelnetNegotiator, type TelnetEvent, type TelnetReceiveResult } from './telnet/telnet-negotiator.js';
export { TelnetCommand, TelnetOption } from './telnet/telnet-protocol.js';
export { TelnetServer } from './telnet/telnet-server.js';
