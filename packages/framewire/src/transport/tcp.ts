/**
 * TCP transport: one socket per peer, either accepted by a listener or dialed.
 */

import * as net from 'node:net';
import { EventEmitter } from 'node:events';
import { ErrorCode, FramewireError } from '../types/errors.js';
import { Locator, createLocator, formatLocator, parseLocator } from '../types/locator.js';
import { PeerId, PeerState } from '../types/units.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { Transport, TransportEvents } from './types.js';

export interface TcpTransportOptions {
  /** Connection timeout in milliseconds */
  connectTimeoutMs?: number;
  /** TCP keep-alive initial delay in milliseconds */
  keepAliveMs?: number;
  /** How long close() waits for a socket to flush before destroying it */
  closeTimeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_CONNECT_TIMEOUT = 10000; // 10 seconds
const DEFAULT_KEEPALIVE = 30000;
const DEFAULT_CLOSE_TIMEOUT = 5000;

/**
 * Dial a TCP connection to a peer
 */
export function dial(locator: Locator, timeout: number = DEFAULT_CONNECT_TIMEOUT): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = new net.Socket();
    let connected = false;

    const timeoutId = setTimeout(() => {
      if (!connected) {
        socket.destroy();
        reject(new FramewireError(ErrorCode.ERR_TIMEOUT, `Connection timeout after ${timeout}ms`));
      }
    }, timeout);

    socket.once('connect', () => {
      connected = true;
      clearTimeout(timeoutId);
      resolve(socket);
    });

    socket.once('error', (err) => {
      clearTimeout(timeoutId);
      if (!connected) {
        reject(new FramewireError(ErrorCode.ERR_CONNECTION_CLOSED, `Connection failed: ${err.message}`, { cause: err }));
      }
    });

    socket.connect(locator.port, locator.host);
  });
}

/**
 * Apply the socket options used for every peer connection
 */
export function configureSocket(socket: net.Socket, keepAliveMs: number = DEFAULT_KEEPALIVE): void {
  socket.setKeepAlive(true, keepAliveMs);
  // Disable Nagle's algorithm for lower latency
  socket.setNoDelay(true);
}

/**
 * Transport over plain TCP sockets. Peer ids are the remote `host:port`.
 *
 * `send` hands the whole chunk to the socket unless the socket is above its
 * high-water mark, in which case it accepts nothing and the caller retries.
 */
export class TcpTransport extends EventEmitter<TransportEvents> implements Transport {
  private server: net.Server | null = null;
  private localLocator: Locator | null = null;
  private sockets: Map<PeerId, net.Socket> = new Map();
  private closed: boolean = false;
  private config: Required<Omit<TcpTransportOptions, 'logger'>>;
  private logger: Logger;

  constructor(options: TcpTransportOptions = {}) {
    super();

    this.config = {
      connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT,
      keepAliveMs: options.keepAliveMs ?? DEFAULT_KEEPALIVE,
      closeTimeoutMs: options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT,
    };
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Start accepting connections
   */
  listen(port: number, host: string = '0.0.0.0'): Promise<Locator> {
    if (this.closed) {
      return Promise.reject(new FramewireError(ErrorCode.ERR_CLOSED, 'Transport is closed'));
    }
    if (this.server) {
      return Promise.reject(new FramewireError(ErrorCode.ERR_INVALID_ARGUMENT, 'Already listening'));
    }

    return new Promise((resolve, reject) => {
      const server = net.createServer((socket) => {
        const remote = `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
        this.attach(socket, remote);
      });
      this.server = server;

      server.once('error', reject);

      server.on('listening', () => {
        server.off('error', reject);
        server.on('error', (err) => this.reportError(err));

        const addr = server.address();
        if (addr && typeof addr === 'object') {
          this.localLocator = createLocator(addr.address === '::' ? '0.0.0.0' : addr.address, addr.port);
          this.logger.info('listening', { address: formatLocator(this.localLocator) });
          resolve(this.localLocator);
        } else {
          reject(new FramewireError(ErrorCode.ERR_UNKNOWN, 'Listener has no TCP address'));
        }
      });

      server.listen({ host, port });
    });
  }

  /**
   * Connect to a peer; resolves with its peer id
   */
  async dial(target: string | Locator): Promise<PeerId> {
    if (this.closed) {
      throw new FramewireError(ErrorCode.ERR_CLOSED, 'Transport is closed');
    }
    const locator = typeof target === 'string' ? parseLocator(target) : target;
    const peer = formatLocator(locator);

    this.emit('peerState', peer, PeerState.CONNECTING);
    let socket: net.Socket;
    try {
      socket = await dial(locator, this.config.connectTimeoutMs);
    } catch (err) {
      this.emit('peerState', peer, PeerState.DISCONNECTED);
      throw err;
    }

    this.attach(socket, peer);
    return peer;
  }

  send(peer: PeerId, data: Uint8Array): number {
    const socket = this.sockets.get(peer);
    if (!socket || socket.destroyed || !socket.writable) {
      throw new FramewireError(ErrorCode.ERR_CONNECTION_CLOSED, `No open connection to ${peer}`);
    }

    if (socket.writableNeedDrain) {
      return 0;
    }

    socket.write(data);
    return data.length;
  }

  disconnect(peer: PeerId): void {
    this.sockets.get(peer)?.destroy();
  }

  /**
   * End every connection once its accepted bytes are flushed, then stop
   * listening. A socket still open after `closeTimeoutMs` is destroyed.
   */
  async close(): Promise<void> {
    this.closed = true;

    const server = this.server;
    this.server = null;
    this.localLocator = null;

    const stopped = server
      ? new Promise<void>((resolve, reject) => {
          // Stops accepting now; the callback waits for open connections
          server.close((err) => {
            if (err) {
              reject(err);
            } else {
              resolve();
            }
          });
        })
      : Promise.resolve();

    await Promise.all([stopped, ...Array.from(this.sockets.values(), (socket) => this.endSocket(socket))]);
  }

  /**
   * Get the local address the listener is bound to
   */
  get address(): Locator | null {
    return this.localLocator;
  }

  get connectionCount(): number {
    return this.sockets.size;
  }

  private attach(socket: net.Socket, peer: PeerId): void {
    configureSocket(socket, this.config.keepAliveMs);
    this.sockets.set(peer, socket);

    socket.on('data', (chunk: Buffer) => {
      this.emit('data', peer, chunk);
    });

    socket.on('error', (err) => {
      this.logger.warn('socket error', { peer, reason: err.message });
    });

    socket.on('close', () => {
      if (this.sockets.get(peer) === socket) {
        this.sockets.delete(peer);
        this.emit('peerState', peer, PeerState.DISCONNECTED);
      }
    });

    this.emit('peerState', peer, PeerState.CONNECTED);
  }

  private endSocket(socket: net.Socket): Promise<void> {
    if (socket.destroyed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn('socket did not close in time, destroying', { remote: socket.remoteAddress });
        socket.destroy();
      }, this.config.closeTimeoutMs);

      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.end();
    });
  }

  private reportError(err: Error): void {
    this.logger.error('listener error', { reason: err.message });
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  }
}
