import { EventEmitter } from 'events';
import { createServer, type AddressInfo, type Server, type Socket } from 'net';
import { sanitizeForLog } from '../infra/log-sanitizer.js';
import { TelnetConnection, type TelnetConnectionOptions } from './telnet-connection.js';

/**
 * Accepts TCP clients and wraps each in a TelnetConnection, emitted as
 * `'connection'`.
 */
export class TelnetServer extends EventEmitter {
  private server?: Server;
  private readonly connections = new Set<TelnetConnection>();

  constructor(private readonly options: TelnetConnectionOptions = {}) {
    super();
  }

  listen(port: number, host = '127.0.0.1'): Promise<AddressInfo> {
    if (this.server) return Promise.reject(new Error('telnet server already listening'));

    const server = createServer((socket: Socket) => this.accept(socket));
    this.server = server;

    return new Promise<AddressInfo>((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = undefined;
        reject(err);
      };
      server.once('error', onError);
      server.listen(port, host, () => {
        server.off('error', onError);
        server.on('error', (err: Error) => {
          console.error(`[telnet] server error: ${sanitizeForLog(err.message)}`);
        });
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('telnet server has no TCP address'));
          return;
        }
        console.log(`[telnet] listening on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  /** Stop accepting and drop every open connection. */
  close(): Promise<void> {
    for (const connection of this.connections) connection.close();
    this.connections.clear();

    const server = this.server;
    this.server = undefined;
    if (!server) return Promise.resolve();
    return new Promise<void>((resolve) => {
      server.close(() => resolve());
    });
  }

  private accept(socket: Socket): void {
    socket.setNoDelay(true);
    const connection = new TelnetConnection(socket, this.options);
    this.connections.add(connection);
    connection.on('close', () => this.connections.delete(connection));
    if (this.options.debug) {
      console.log(`[telnet] client connected from ${socket.remoteAddress ?? 'unknown'}`);
    }
    this.emit('connection', connection);
  }
}
