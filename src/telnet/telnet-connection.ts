import { EventEmitter } from 'events';
import { PassThrough, Writable, type Duplex } from 'stream';
import { sanitizeForLog } from '../infra/log-sanitizer.js';
import { TelnetNegotiator, type TelnetEvent, type TelnetNegotiatorOptions } from './telnet-negotiator.js';

export interface TelnetConnectionOptions extends TelnetNegotiatorOptions {
  /** Send the server's option offers as soon as the connection is wrapped. */
  sendInitialRequests?: boolean;
  debug?: boolean;
}

/**
 * A telnet session over any duplex byte stream (normally a `net.Socket`).
 *
 * `input` carries the application bytes with telnet framing removed;
 * `output` (or `write`) frames bytes for the wire. Emits `'resize'`
 * `(cols, rows)`, `'terminalType'`, `'terminalSpeed'`, `'environment'`
 * and `'close'`.
 */
export class TelnetConnection extends EventEmitter {
  readonly negotiator: TelnetNegotiator;
  readonly input = new PassThrough();
  readonly output: Writable;
  private closed = false;
  private readonly debug: boolean;

  constructor(
    private readonly socket: Duplex,
    options: TelnetConnectionOptions = {},
  ) {
    super();
    this.negotiator = new TelnetNegotiator(options);
    this.debug = options.debug ?? false;
    this.output = new Writable({
      write: (chunk: Buffer, _encoding, callback) => {
        this.write(chunk);
        callback();
      },
    });

    socket.on('data', (chunk: Buffer | string) => this.handleData(typeof chunk === 'string' ? Buffer.from(chunk, 'latin1') : chunk));
    socket.on('end', () => this.input.end());
    socket.on('error', (err: Error) => {
      console.warn(`[telnet] socket error: ${sanitizeForLog(err.message)}`);
      this.input.destroy(err);
    });
    socket.on('close', () => this.finish());

    if (options.sendInitialRequests ?? true) {
      socket.write(this.negotiator.initialRequests());
    }
  }

  get terminalType(): string {
    return this.negotiator.terminalType;
  }

  get terminalSpeed(): string {
    return this.negotiator.terminalSpeed;
  }

  get environment(): Readonly<Record<string, string>> {
    return this.negotiator.environment;
  }

  isClosed(): boolean {
    return this.closed;
  }

  write(data: Uint8Array | string): void {
    if (this.closed) return;
    this.socket.write(this.negotiator.encode(data));
  }

  /** Idempotent; destroys the underlying stream once. */
  close(): void {
    if (this.closed) return;
    this.socket.destroy();
    this.finish();
  }

  private finish(): void {
    if (this.closed) return;
    this.closed = true;
    if (!this.input.writableEnded) this.input.end();
    this.emit('close');
  }

  private handleData(chunk: Buffer): void {
    const { data, reply, events } = this.negotiator.receive(chunk);
    if (reply.length > 0 && !this.closed) this.socket.write(reply);
    for (const event of events) this.dispatch(event);
    if (data.length > 0 && !this.input.writableEnded) this.input.write(data);
  }

  private dispatch(event: TelnetEvent): void {
    if (this.debug) {
      console.log(`[telnet] ${sanitizeForLog(JSON.stringify(event))}`);
    }
    switch (event.type) {
      case 'resize':
        this.emit('resize', event.cols, event.rows);
        break;
      case 'terminalType':
        this.emit('terminalType', event.value);
        break;
      case 'terminalSpeed':
        this.emit('terminalSpeed', event.value);
        break;
      case 'environment':
        this.emit('environment', event.values);
        break;
    }
  }
}
