/**
 * Telnet option negotiation as a pure byte state machine.
 *
 * Feed raw socket bytes to `receive()`; it returns the application bytes
 * with telnet framing removed, the bytes to send back, and any events the
 * peer reported (window size, terminal type). Option state follows the
 * RFC 1143 Q method so acknowledgements never trigger another reply.
 */

import { incRuntimeMetric } from '../infra/diagnostics.js';
import {
  CR,
  EnvironMarker,
  IGNORED_COMMANDS,
  isNegotiationVerb,
  LF,
  MAX_SUBNEGOTIATION_BYTES,
  negotiation,
  NUL,
  subnegotiation,
  TelnetCommand,
  TelnetOption,
  TelnetSubcommand,
  type NegotiationVerb,
} from './telnet-protocol.js';

type OptionState = 'no' | 'yes' | 'wantYes' | 'wantNo';

export type TelnetEvent =
  | { type: 'resize'; cols: number; rows: number }
  | { type: 'terminalType'; value: string }
  | { type: 'terminalSpeed'; value: string }
  | { type: 'environment'; values: Record<string, string> };

export interface TelnetReceiveResult {
  data: Buffer;
  reply: Buffer;
  events: TelnetEvent[];
}

export interface TelnetNegotiatorOptions {
  /** Options we agree to perform ourselves. */
  localOptions?: readonly number[];
  /** Options we agree to let the peer perform. */
  remoteOptions?: readonly number[];
}

const DEFAULT_LOCAL: readonly number[] = [TelnetOption.BINARY, TelnetOption.ECHO, TelnetOption.SGA];
const DEFAULT_REMOTE: readonly number[] = [
  TelnetOption.BINARY,
  TelnetOption.SGA,
  TelnetOption.TTYPE,
  TelnetOption.TSPEED,
  TelnetOption.NAWS,
  TelnetOption.NEW_ENVIRON,
];

type ScanState = 'data' | 'cr' | 'iac' | 'verb' | 'sb' | 'sbIac' | 'sbSkip' | 'sbSkipIac';

function latin1(bytes: readonly number[]): string {
  return Buffer.from(bytes).toString('latin1');
}

/** NEW-ENVIRON `IS`/`INFO` payload: VAR/USERVAR name, VALUE value, ESC quoting. */
export function parseEnvironment(payload: readonly number[]): Record<string, string> {
  const values: Record<string, string> = {};
  let name: number[] | undefined;
  let value: number[] | undefined;
  const commit = () => {
    if (name && name.length > 0) values[latin1(name)] = value ? latin1(value) : '';
  };

  for (let i = 0; i < payload.length; i += 1) {
    const byte = payload[i];
    if (byte === EnvironMarker.VAR || byte === EnvironMarker.USERVAR) {
      commit();
      name = [];
      value = undefined;
    } else if (byte === EnvironMarker.VALUE) {
      value = [];
    } else {
      const literal = byte === EnvironMarker.ESC && i + 1 < payload.length ? payload[++i] : byte;
      if (value) value.push(literal);
      else if (name) name.push(literal);
    }
  }
  commit();
  return values;
}

export class TelnetNegotiator {
  private readonly local = new Map<number, OptionState>();
  private readonly remote = new Map<number, OptionState>();
  private readonly localSupported: ReadonlySet<number>;
  private readonly remoteSupported: ReadonlySet<number>;
  private state: ScanState = 'data';
  private verb: NegotiationVerb = TelnetCommand.WILL;
  private sb: number[] = [];
  private pendingCr = false;

  terminalType = '';
  terminalSpeed = '';
  readonly environment: Record<string, string> = {};

  constructor(options: TelnetNegotiatorOptions = {}) {
    this.localSupported = new Set(options.localOptions ?? DEFAULT_LOCAL);
    this.remoteSupported = new Set(options.remoteOptions ?? DEFAULT_REMOTE);
  }

  isLocalEnabled(option: number): boolean {
    return this.local.get(option) === 'yes';
  }

  isRemoteEnabled(option: number): boolean {
    return this.remote.get(option) === 'yes';
  }

  /** True when the peer sends binary: CR NUL is then ordinary data. */
  get binaryInput(): boolean {
    return this.isRemoteEnabled(TelnetOption.BINARY);
  }

  get binaryOutput(): boolean {
    return this.isLocalEnabled(TelnetOption.BINARY);
  }

  /** The server's opening offers. */
  initialRequests(): Buffer {
    const out: number[] = [];
    const ask = (verb: NegotiationVerb, option: number) => {
      const table = verb === TelnetCommand.DO ? this.remote : this.local;
      if ((table.get(option) ?? 'no') !== 'no') return;
      table.set(option, 'wantYes');
      out.push(...negotiation(verb, option));
    };
    ask(TelnetCommand.DO, TelnetOption.TTYPE);
    ask(TelnetCommand.DO, TelnetOption.TSPEED);
    ask(TelnetCommand.DO, TelnetOption.NAWS);
    ask(TelnetCommand.DO, TelnetOption.NEW_ENVIRON);
    ask(TelnetCommand.WILL, TelnetOption.SGA);
    ask(TelnetCommand.DO, TelnetOption.SGA);
    ask(TelnetCommand.WILL, TelnetOption.BINARY);
    ask(TelnetCommand.DO, TelnetOption.BINARY);
    ask(TelnetCommand.WILL, TelnetOption.ECHO);
    return Buffer.from(out);
  }

  receive(bytes: Uint8Array): TelnetReceiveResult {
    const data: number[] = [];
    const reply: number[] = [];
    const events: TelnetEvent[] = [];

    for (let i = 0; i < bytes.length; i += 1) {
      this.step(bytes[i], data, reply, events);
    }
    return { data: Buffer.from(data), reply: Buffer.from(reply), events };
  }

  /**
   * Frame application bytes for the wire. A CR ending one call is padded
   * with NUL at the start of the next unless that begins with LF.
   */
  encode(bytes: Uint8Array | string): Buffer {
    const input = typeof bytes === 'string' ? Buffer.from(bytes, 'utf8') : bytes;
    const out: number[] = [];
    const binary = this.binaryOutput;
    for (let i = 0; i < input.length; i += 1) {
      const byte = input[i];
      if (this.pendingCr) {
        this.pendingCr = false;
        if (byte !== LF && !binary) out.push(NUL);
      }
      out.push(byte);
      if (byte === TelnetCommand.IAC) {
        out.push(TelnetCommand.IAC);
      } else if (byte === CR && !binary) {
        this.pendingCr = true;
      }
    }
    return Buffer.from(out);
  }

  private step(byte: number, data: number[], reply: number[], events: TelnetEvent[]): void {
    switch (this.state) {
      case 'cr':
        this.state = 'data';
        if (byte === NUL) return;
        this.step(byte, data, reply, events);
        return;
      case 'data':
        if (byte === TelnetCommand.IAC) {
          this.state = 'iac';
        } else {
          data.push(byte);
          if (byte === CR && !this.binaryInput) this.state = 'cr';
        }
        return;
      case 'iac':
        this.command(byte, data);
        return;
      case 'verb':
        this.state = 'data';
        this.negotiate(this.verb, byte, reply);
        return;
      case 'sb':
        if (byte === TelnetCommand.IAC) {
          this.state = 'sbIac';
        } else if (this.sb.length >= MAX_SUBNEGOTIATION_BYTES) {
          incRuntimeMetric('telnet_malformed', { reason: 'sb_overflow' });
          this.sb = [];
          this.state = 'sbSkip';
        } else {
          this.sb.push(byte);
        }
        return;
      case 'sbIac':
        if (byte === TelnetCommand.IAC) {
          this.sb.push(byte);
          this.state = 'sb';
        } else if (byte === TelnetCommand.SE) {
          this.state = 'data';
          const payload = this.sb;
          this.sb = [];
          this.subnegotiate(payload, events);
        } else {
          // IAC <cmd> inside SB ends the sub-negotiation without acting on it.
          incRuntimeMetric('telnet_malformed', { reason: 'sb_unterminated' });
          this.sb = [];
          this.command(byte, data);
        }
        return;
      case 'sbSkip':
        if (byte === TelnetCommand.IAC) this.state = 'sbSkipIac';
        return;
      case 'sbSkipIac':
        this.state = byte === TelnetCommand.SE ? 'data' : 'sbSkip';
        return;
    }
  }

  /** Byte following IAC. */
  private command(byte: number, data: number[]): void {
    this.state = 'data';
    if (byte === TelnetCommand.IAC) {
      data.push(byte);
    } else if (isNegotiationVerb(byte)) {
      this.verb = byte;
      this.state = 'verb';
    } else if (byte === TelnetCommand.SB) {
      this.sb = [];
      this.state = 'sb';
    } else if (byte === TelnetCommand.SE) {
      incRuntimeMetric('telnet_malformed', { reason: 'se_without_sb' });
    } else if (!IGNORED_COMMANDS.has(byte)) {
      incRuntimeMetric('telnet_malformed', { reason: 'unknown_command' });
    }
  }

  private negotiate(verb: NegotiationVerb, option: number, reply: number[]): void {
    const peerSide = verb === TelnetCommand.WILL || verb === TelnetCommand.WONT;
    const table = peerSide ? this.remote : this.local;
    const supported = peerSide ? this.remoteSupported : this.localSupported;
    const accept = peerSide ? TelnetCommand.DO : TelnetCommand.WILL;
    const refuse = peerSide ? TelnetCommand.DONT : TelnetCommand.WONT;
    const enable = verb === TelnetCommand.WILL || verb === TelnetCommand.DO;
    const current = table.get(option) ?? 'no';

    if (enable) {
      switch (current) {
        case 'no':
          if (supported.has(option)) {
            table.set(option, 'yes');
            reply.push(...negotiation(accept, option));
            if (peerSide) this.remoteEnabled(option, reply);
          } else {
            reply.push(...negotiation(refuse, option));
          }
          return;
        case 'wantYes':
          table.set(option, 'yes');
          if (peerSide) this.remoteEnabled(option, reply);
          return;
        case 'wantNo':
          table.set(option, 'no');
          return;
        case 'yes':
          return;
      }
    }

    switch (current) {
      case 'yes':
        table.set(option, 'no');
        reply.push(...negotiation(refuse, option));
        return;
      case 'wantYes':
      case 'wantNo':
        table.set(option, 'no');
        return;
      case 'no':
        return;
    }
  }

  /** Ask for the value behind an option the peer just agreed to. */
  private remoteEnabled(option: number, reply: number[]): void {
    if (option === TelnetOption.TTYPE || option === TelnetOption.TSPEED || option === TelnetOption.NEW_ENVIRON) {
      reply.push(...subnegotiation(option, [TelnetSubcommand.SEND]));
    }
  }

  private subnegotiate(payload: number[], events: TelnetEvent[]): void {
    const [option, verb] = payload;
    const body = payload.slice(2);

    switch (option) {
      case TelnetOption.NAWS: {
        if (payload.length !== 5) {
          incRuntimeMetric('telnet_malformed', { reason: 'naws_length' });
          return;
        }
        const cols = (payload[1] << 8) | payload[2];
        const rows = (payload[3] << 8) | payload[4];
        if (cols === 0 || rows === 0) return;
        events.push({ type: 'resize', cols, rows });
        return;
      }
      case TelnetOption.TTYPE:
        if (verb !== TelnetSubcommand.IS) return;
        this.terminalType = latin1(body);
        events.push({ type: 'terminalType', value: this.terminalType });
        return;
      case TelnetOption.TSPEED:
        if (verb !== TelnetSubcommand.IS) return;
        this.terminalSpeed = latin1(body);
        events.push({ type: 'terminalSpeed', value: this.terminalSpeed });
        return;
      case TelnetOption.NEW_ENVIRON: {
        if (verb !== TelnetSubcommand.IS && verb !== TelnetSubcommand.INFO) return;
        const values = parseEnvironment(body);
        Object.assign(this.environment, values);
        events.push({ type: 'environment', values });
        return;
      }
      default:
        break;
    }
  }
}
