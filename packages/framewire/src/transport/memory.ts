/**
 * In-process transport pair for tests and loopback runs.
 */

import { EventEmitter } from 'node:events';
import { ErrorCode, FramewireError } from '../types/errors.js';
import { PeerId, PeerState } from '../types/units.js';
import { Transport, TransportEvents } from './types.js';

export interface MemoryTransportOptions {
  /** Re-chunk every delivery into pieces of at most this many bytes */
  chunkSize?: number;
  /** Accept at most this many bytes per send call */
  acceptLimit?: number;
}

/**
 * One end of a linked pair. Bytes are delivered to the other end in order,
 * asynchronously (one `setImmediate` per chunk).
 */
export class MemoryTransport extends EventEmitter<TransportEvents> implements Transport {
  readonly id: PeerId;

  private remote: MemoryTransport | null = null;
  private connected: boolean = false;
  private saturated: boolean = false;
  private writeError: Error | null = null;
  private options: MemoryTransportOptions;

  constructor(id: PeerId, options: MemoryTransportOptions = {}) {
    super();
    this.id = id;
    this.options = options;
  }

  /**
   * Create two linked, not yet connected endpoints
   */
  static pair(
    ids: [PeerId, PeerId] = ['local', 'remote'],
    options: MemoryTransportOptions = {}
  ): [MemoryTransport, MemoryTransport] {
    const a = new MemoryTransport(ids[0], options);
    const b = new MemoryTransport(ids[1], options);
    a.remote = b;
    b.remote = a;
    return [a, b];
  }

  /**
   * Connect both ends; each side sees the other as CONNECTED
   */
  connect(): void {
    const remote = this.requireRemote();
    if (this.connected) {
      return;
    }
    this.connected = true;
    remote.connected = true;
    this.emit('peerState', remote.id, PeerState.CONNECTED);
    remote.emit('peerState', this.id, PeerState.CONNECTED);
  }

  send(peer: PeerId, data: Uint8Array): number {
    const remote = this.requireRemote();
    if (this.writeError) {
      throw this.writeError;
    }
    if (!this.connected || peer !== remote.id) {
      throw new FramewireError(ErrorCode.ERR_CONNECTION_CLOSED, `No open connection to ${peer}`);
    }
    if (this.saturated) {
      return 0;
    }

    const accepted = Math.min(data.length, this.options.acceptLimit ?? data.length);
    const bytes = data.slice(0, accepted);
    const chunkSize = this.options.chunkSize ?? bytes.length;

    for (let offset = 0; offset < bytes.length; offset += chunkSize) {
      const chunk = bytes.subarray(offset, offset + chunkSize);
      setImmediate(() => {
        if (this.connected) {
          remote.emit('data', this.id, chunk);
        }
      });
    }
    return accepted;
  }

  disconnect(peer: PeerId): void {
    const remote = this.requireRemote();
    if (!this.connected || peer !== remote.id) {
      return;
    }
    this.connected = false;
    remote.connected = false;
    this.emit('peerState', remote.id, PeerState.DISCONNECTED);
    remote.emit('peerState', this.id, PeerState.DISCONNECTED);
  }

  close(): Promise<void> {
    if (this.remote) {
      this.disconnect(this.remote.id);
    }
    return Promise.resolve();
  }

  /**
   * While saturated, `send` accepts nothing
   */
  setSaturated(saturated: boolean): void {
    this.saturated = saturated;
  }

  /**
   * Make every later `send` throw `error` (null restores normal writes)
   */
  failWrites(error: Error | null): void {
    this.writeError = error;
  }

  get isConnected(): boolean {
    return this.connected;
  }

  private requireRemote(): MemoryTransport {
    if (!this.remote) {
      throw new FramewireError(ErrorCode.ERR_NOT_BOUND, `Transport ${this.id} is not paired`);
    }
    return this.remote;
  }
}
