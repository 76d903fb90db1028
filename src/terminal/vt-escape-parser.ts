/**
 * Byte-level VT escape sequence state machine.
 *
 * Consumes raw bytes (7-bit or 8-bit controls, UTF-8 text) and emits
 * discrete actions via a callback. All state, including a partially
 * assembled UTF-8 code point or an unterminated string, lives on the
 * parser instance, so chunk boundaries may fall anywhere.
 *
 * DCS payloads are not tokenized: the parameter bytes, the command byte
 * and everything up to ST are handed over verbatim.
 */

import { incRuntimeMetric } from '../infra/diagnostics.js';

export type VtParserState =
  | 'GROUND'
  | 'ESCAPE'
  | 'ESCAPE_INTERMEDIATE'
  | 'CSI_ENTRY'
  | 'CSI_PARAM'
  | 'CSI_INTERMEDIATE'
  | 'CSI_IGNORE'
  | 'OSC_STRING'
  | 'DCS_ENTRY'
  | 'DCS_PASSTHROUGH'
  | 'SOS_PM_APC_STRING';

/**
 * CSI parameters: one array per `;`-separated group, holding the main
 * value followed by any `:` sub-parameters. An omitted group is `[]`.
 */
export type CsiParams = number[][];

export type VtAction =
  | { type: 'print'; ch: string }
  | { type: 'execute'; code: number }
  | { type: 'esc'; intermediates: string; final: string }
  | { type: 'csi'; prefix: string; params: CsiParams; intermediates: string; final: string; raw: string }
  | { type: 'osc'; data: string }
  | { type: 'dcs'; params: string; intermediates: string; command: string; data: string }
  | { type: 'sos' | 'pm' | 'apc'; data: string };

export type VtEmit = (action: VtAction) => void;

export const MAX_CSI_PARAMS = 32;
export const MAX_OSC_BYTES = 1024 * 1024;
export const MAX_DCS_BYTES = 16 * 1024 * 1024;
const MAX_PARAM_VALUE = 65535;
const MAX_DCS_PARAM_CHARS = 256;
const REPLACEMENT = '\ufffd';

type StringKind = 'osc' | 'dcs' | 'sos' | 'pm' | 'apc';

class ByteAccumulator {
  private buf = new Uint8Array(256);
  length = 0;

  push(byte: number): void {
    if (this.length === this.buf.length) {
      const next = new Uint8Array(this.buf.length * 2);
      next.set(this.buf);
      this.buf = next;
    }
    this.buf[this.length] = byte;
    this.length += 1;
  }

  reset(): void {
    this.length = 0;
    if (this.buf.length > 64 * 1024) this.buf = new Uint8Array(256);
  }

  decode(encoding: 'utf8' | 'latin1'): string {
    return Buffer.from(this.buf.buffer, this.buf.byteOffset, this.length).toString(encoding);
  }
}

function isFinal(b: number): boolean {
  return b >= 0x40 && b <= 0x7e;
}

function isIntermediate(b: number): boolean {
  return b >= 0x20 && b <= 0x2f;
}

export function parseCsiParams(text: string): CsiParams {
  if (text.length === 0) return [];
  return text.split(';').map((group) => {
    if (group.length === 0) return [];
    return group.split(':').map((part) => {
      if (part.length === 0) return 0;
      const value = parseInt(part, 10);
      return Number.isFinite(value) ? Math.min(MAX_PARAM_VALUE, value) : 0;
    });
  });
}

export class VtParser {
  private state: VtParserState = 'GROUND';

  private utf8Need = 0;
  private utf8Cp = 0;
  private utf8Lower = 0x80;
  private utf8Upper = 0xbf;

  private prefix = '';
  private paramText = '';
  private paramSeparators = 0;
  private intermediates = '';

  private stringKind: StringKind = 'osc';
  private readonly payload = new ByteAccumulator();
  private payloadOverflow = false;
  private payloadUtf8Remaining = 0;
  private dcsParams = '';
  private dcsIntermediates = '';
  private dcsCommand = '';

  getState(): VtParserState {
    return this.state;
  }

  feed(data: Uint8Array | string, emit: VtEmit): void {
    const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
    for (let i = 0; i < bytes.length; i += 1) {
      this.advance(bytes[i], emit);
    }
  }

  /** Emit U+FFFD for a UTF-8 sequence left incomplete at end of input. */
  flush(emit: VtEmit): void {
    if (this.utf8Need > 0) {
      this.utf8Need = 0;
      emit({ type: 'print', ch: REPLACEMENT });
    }
  }

  reset(): void {
    this.state = 'GROUND';
    this.utf8Need = 0;
    this.clearSequence();
    this.payload.reset();
  }

  private advance(b: number, emit: VtEmit): void {
    const state = this.state;
    if (state === 'OSC_STRING' || state === 'DCS_PASSTHROUGH' || state === 'SOS_PM_APC_STRING') {
      this.advanceString(b, emit);
      return;
    }

    if (state === 'GROUND' && (this.utf8Need > 0 || b >= 0x80)) {
      this.advanceUtf8(b, emit);
      return;
    }

    if (b === 0x1b) {
      if (state !== 'GROUND' && state !== 'ESCAPE') this.discard('restarted');
      this.enterEscape();
      return;
    }

    if (b === 0x18 || b === 0x1a) {
      if (state !== 'GROUND') this.discard('aborted');
      this.state = 'GROUND';
      return;
    }

    if (b >= 0x80) {
      if (b <= 0x9f) {
        this.handleC1(b, emit);
      } else if (state === 'CSI_ENTRY' || state === 'CSI_PARAM' || state === 'CSI_INTERMEDIATE') {
        this.state = 'CSI_IGNORE';
      } else if (state === 'ESCAPE' || state === 'ESCAPE_INTERMEDIATE') {
        // Text after a stray ESC: drop the escape, keep the character.
        this.discard('interrupted');
        this.state = 'GROUND';
        this.advanceUtf8(b, emit);
      }
      return;
    }

    if (b < 0x20) {
      if (state !== 'DCS_ENTRY') emit({ type: 'execute', code: b });
      return;
    }

    if (b === 0x7f) return;

    const ch = String.fromCharCode(b);
    switch (state) {
      case 'GROUND':
        emit({ type: 'print', ch });
        return;
      case 'ESCAPE':
        this.advanceEscape(b, ch, emit);
        return;
      case 'ESCAPE_INTERMEDIATE':
        if (isIntermediate(b)) {
          this.intermediates += ch;
        } else {
          emit({ type: 'esc', intermediates: this.intermediates, final: ch });
          this.state = 'GROUND';
        }
        return;
      case 'CSI_ENTRY':
      case 'CSI_PARAM':
        this.advanceCsiParam(b, ch, emit);
        return;
      case 'CSI_INTERMEDIATE':
        if (isIntermediate(b)) {
          this.intermediates += ch;
        } else if (isFinal(b)) {
          this.dispatchCsi(ch, emit);
        } else {
          this.state = 'CSI_IGNORE';
        }
        return;
      case 'CSI_IGNORE':
        if (isFinal(b)) this.state = 'GROUND';
        return;
      case 'DCS_ENTRY':
        this.advanceDcsEntry(b, ch);
        return;
    }
  }

  private advanceEscape(b: number, ch: string, emit: VtEmit): void {
    if (isIntermediate(b)) {
      this.intermediates += ch;
      this.state = 'ESCAPE_INTERMEDIATE';
      return;
    }
    switch (ch) {
      case '[': this.enterCsi(); return;
      case ']': this.enterString('osc'); return;
      case 'P': this.enterDcs(); return;
      case 'X': this.enterString('sos'); return;
      case '^': this.enterString('pm'); return;
      case '_': this.enterString('apc'); return;
      case '\\':
        // ST with no open string.
        this.state = 'GROUND';
        return;
      default:
        emit({ type: 'esc', intermediates: '', final: ch });
        this.state = 'GROUND';
    }
  }

  private advanceCsiParam(b: number, ch: string, emit: VtEmit): void {
    if (this.state === 'CSI_ENTRY' && b >= 0x3c && b <= 0x3f) {
      this.prefix = ch;
      this.state = 'CSI_PARAM';
      return;
    }
    if ((b >= 0x30 && b <= 0x39) || b === 0x3a || b === 0x3b) {
      if (b === 0x3b) {
        this.paramSeparators += 1;
        if (this.paramSeparators >= MAX_CSI_PARAMS) {
          this.discard('overflow');
          this.state = 'CSI_IGNORE';
          return;
        }
      }
      this.paramText += ch;
      this.state = 'CSI_PARAM';
      return;
    }
    if (b >= 0x3c && b <= 0x3f) {
      this.state = 'CSI_IGNORE';
      return;
    }
    if (isIntermediate(b)) {
      this.intermediates += ch;
      this.state = 'CSI_INTERMEDIATE';
      return;
    }
    if (isFinal(b)) this.dispatchCsi(ch, emit);
  }

  private advanceDcsEntry(b: number, ch: string): void {
    if (b >= 0x30 && b <= 0x3f) {
      if (this.dcsParams.length >= MAX_DCS_PARAM_CHARS) {
        this.payloadOverflow = true;
        return;
      }
      this.dcsParams += ch;
      return;
    }
    if (isIntermediate(b)) {
      this.dcsIntermediates += ch;
      return;
    }
    if (isFinal(b)) {
      this.dcsCommand = ch;
      this.stringKind = 'dcs';
      this.payload.reset();
      this.payloadUtf8Remaining = 0;
      this.state = 'DCS_PASSTHROUGH';
    }
  }

  private advanceUtf8(b: number, emit: VtEmit): void {
    if (this.utf8Need > 0) {
      if (b >= this.utf8Lower && b <= this.utf8Upper) {
        this.utf8Cp = (this.utf8Cp << 6) | (b & 0x3f);
        this.utf8Lower = 0x80;
        this.utf8Upper = 0xbf;
        this.utf8Need -= 1;
        if (this.utf8Need === 0) this.emitCodePoint(this.utf8Cp, emit);
        return;
      }
      this.utf8Need = 0;
      emit({ type: 'print', ch: REPLACEMENT });
      this.advance(b, emit);
      return;
    }

    if (b <= 0x9f) {
      this.handleC1(b, emit);
      return;
    }

    this.utf8Lower = 0x80;
    this.utf8Upper = 0xbf;
    if (b >= 0xc2 && b <= 0xdf) {
      this.utf8Need = 1;
      this.utf8Cp = b & 0x1f;
    } else if (b >= 0xe0 && b <= 0xef) {
      this.utf8Need = 2;
      this.utf8Cp = b & 0x0f;
      if (b === 0xe0) this.utf8Lower = 0xa0;
      if (b === 0xed) this.utf8Upper = 0x9f;
    } else if (b >= 0xf0 && b <= 0xf4) {
      this.utf8Need = 3;
      this.utf8Cp = b & 0x07;
      if (b === 0xf0) this.utf8Lower = 0x90;
      if (b === 0xf4) this.utf8Upper = 0x8f;
    } else {
      emit({ type: 'print', ch: REPLACEMENT });
    }
  }

  private emitCodePoint(cp: number, emit: VtEmit): void {
    if (cp >= 0x80 && cp <= 0x9f) {
      this.handleC1(cp, emit);
      return;
    }
    emit({ type: 'print', ch: String.fromCodePoint(cp) });
  }

  private handleC1(code: number, emit: VtEmit): void {
    switch (code) {
      case 0x84: this.emitC1Escape('D', emit); return;
      case 0x85: this.emitC1Escape('E', emit); return;
      case 0x88: this.emitC1Escape('H', emit); return;
      case 0x8d: this.emitC1Escape('M', emit); return;
      case 0x90: this.enterDcs(); return;
      case 0x98: this.enterString('sos'); return;
      case 0x9b: this.enterCsi(); return;
      case 0x9d: this.enterString('osc'); return;
      case 0x9e: this.enterString('pm'); return;
      case 0x9f: this.enterString('apc'); return;
      default:
        // ST and unassigned C1 controls
        this.state = 'GROUND';
    }
  }

  private emitC1Escape(final: string, emit: VtEmit): void {
    this.state = 'GROUND';
    emit({ type: 'esc', intermediates: '', final });
  }

  private advanceString(b: number, emit: VtEmit): void {
    if (b === 0x1b) {
      // ESC ends the string; a following `\` completes ST in ESCAPE.
      this.finishString(emit);
      this.enterEscape();
      return;
    }
    if (b === 0x18 || b === 0x1a) {
      this.discard('aborted');
      this.state = 'GROUND';
      return;
    }
    if (b === 0x07 && this.stringKind === 'osc') {
      this.finishString(emit);
      this.state = 'GROUND';
      return;
    }
    if (b === 0x9c && this.payloadUtf8Remaining === 0) {
      this.finishString(emit);
      this.state = 'GROUND';
      return;
    }

    if (this.payloadUtf8Remaining > 0 && b >= 0x80 && b <= 0xbf) {
      this.payloadUtf8Remaining -= 1;
    } else if (b >= 0xc2 && b <= 0xdf) {
      this.payloadUtf8Remaining = 1;
    } else if (b >= 0xe0 && b <= 0xef) {
      this.payloadUtf8Remaining = 2;
    } else if (b >= 0xf0 && b <= 0xf4) {
      this.payloadUtf8Remaining = 3;
    } else {
      this.payloadUtf8Remaining = 0;
    }

    if (this.stringKind === 'osc' && b < 0x20) return;

    const limit = this.stringKind === 'dcs' ? MAX_DCS_BYTES : MAX_OSC_BYTES;
    if (this.payload.length >= limit) {
      if (!this.payloadOverflow) {
        this.payloadOverflow = true;
        incRuntimeMetric('vt_discarded_sequence', { kind: this.stringKind, reason: 'overflow' });
      }
      return;
    }
    this.payload.push(b);
  }

  private finishString(emit: VtEmit): void {
    if (this.payloadOverflow) {
      this.payloadOverflow = false;
      this.payload.reset();
      return;
    }
    const kind = this.stringKind;
    if (kind === 'dcs') {
      emit({
        type: 'dcs',
        params: this.dcsParams,
        intermediates: this.dcsIntermediates,
        command: this.dcsCommand,
        data: this.payload.decode('latin1'),
      });
    } else {
      emit({ type: kind, data: this.payload.decode('utf8') });
    }
    this.payload.reset();
  }

  private enterEscape(): void {
    this.clearSequence();
    this.state = 'ESCAPE';
  }

  private enterCsi(): void {
    this.clearSequence();
    this.state = 'CSI_ENTRY';
  }

  private enterDcs(): void {
    this.clearSequence();
    this.dcsParams = '';
    this.dcsIntermediates = '';
    this.dcsCommand = '';
    this.payloadOverflow = false;
    this.state = 'DCS_ENTRY';
  }

  private enterString(kind: StringKind): void {
    this.clearSequence();
    this.stringKind = kind;
    this.payload.reset();
    this.payloadOverflow = false;
    this.payloadUtf8Remaining = 0;
    this.state = kind === 'osc' ? 'OSC_STRING' : 'SOS_PM_APC_STRING';
  }

  private clearSequence(): void {
    this.prefix = '';
    this.paramText = '';
    this.paramSeparators = 0;
    this.intermediates = '';
  }

  private dispatchCsi(final: string, emit: VtEmit): void {
    const prefix = this.prefix;
    emit({
      type: 'csi',
      prefix,
      params: parseCsiParams(this.paramText),
      intermediates: this.intermediates,
      final,
      raw: prefix + this.paramText + this.intermediates,
    });
    this.state = 'GROUND';
  }

  private discard(reason: string): void {
    const kind = this.state.startsWith('CSI') ? 'csi'
      : this.state.startsWith('ESCAPE') ? 'esc'
        : this.state === 'DCS_ENTRY' || this.state === 'DCS_PASSTHROUGH' ? 'dcs'
          : this.state === 'OSC_STRING' ? 'osc' : 'string';
    incRuntimeMetric('vt_discarded_sequence', { kind, reason });
    if (this.state === 'OSC_STRING' || this.state === 'DCS_PASSTHROUGH' || this.state === 'SOS_PM_APC_STRING') {
      this.payload.reset();
      this.payloadOverflow = false;
    }
  }
}

/**
 * Parse a complete chunk with a fresh parser. Incomplete trailing
 * sequences are dropped; use a VtParser instance for streaming input.
 */
export function parseVtStream(data: Uint8Array | string, emit: VtEmit): void {
  const parser = new VtParser();
  parser.feed(data, emit);
  parser.flush(emit);
}
