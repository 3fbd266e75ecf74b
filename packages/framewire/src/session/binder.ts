/**
 * Session binder: ties one remote peer to one outbound packetizer or one
 * inbound receive pipeline, following the transport's connect/disconnect
 * events.
 */

import { EventEmitter } from 'node:events';
import { FramewireConfig } from '../config.js';
import { ConfigurationSet } from '../bootstrap/configuration-set.js';
import { ErrorCode, FramewireError, toError } from '../types/errors.js';
import { EncodedUnit, PeerId, PeerState, UnitKind } from '../types/units.js';
import { Transport } from '../transport/types.js';
import { Packetizer } from '../wire/packetizer.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { FrameDecoder, ReceivePipeline } from './receive-pipeline.js';

export type BinderRole = 'sender' | 'receiver';

export interface SessionBinderConfig extends Partial<FramewireConfig> {
  role: BinderRole;
  logger?: Logger;
}

export interface SenderBinderConfig extends SessionBinderConfig {
  role: 'sender';
}

export interface ReceiverBinderConfig<TSession, TFrame> extends SessionBinderConfig {
  role: 'receiver';
  decoder: FrameDecoder<TSession, TFrame>;
}

/**
 * The one active peer and the streams bound to it.
 */
export interface PeerBinding<TSession, TFrame> {
  readonly peer: PeerId;
  /** Date.now() when the peer was bound */
  readonly boundAt: number;
  readonly packetizer: Packetizer | null;
  readonly pipeline: ReceivePipeline<TSession, TFrame> | null;
}

export interface SessionBinderEvents<TFrame> {
  bound: [peer: PeerId];
  unbound: [peer: PeerId, reason?: FramewireError];
  /** A peer connected while another was bound */
  rejected: [peer: PeerId, error: FramewireError];
  /** Write failure on the bound peer; the binding has been torn down */
  fault: [peer: PeerId, error: FramewireError];
  frame: [frame: TFrame, unit: EncodedUnit];
  sessionCreated: [config: ConfigurationSet];
  sessionInvalidated: [config: ConfigurationSet];
  violation: [error: FramewireError];
  decodeError: [error: FramewireError];
  error: [error: Error];
}

/**
 * Owns the PeerBinding lifecycle. Only one peer is served at a time: the
 * first to connect wins and later ones are rejected and disconnected.
 */
export class SessionBinder<TSession = unknown, TFrame = unknown> extends EventEmitter<SessionBinderEvents<TFrame>> {
  readonly role: BinderRole;

  private transport: Transport;
  private config: Partial<FramewireConfig>;
  private decoder: FrameDecoder<TSession, TFrame> | null;
  private logger: Logger;
  private binding: PeerBinding<TSession, TFrame> | null = null;
  private rejectedPeers: Set<PeerId> = new Set();
  private teardowns: Set<Promise<void>> = new Set();
  private primary: Uint8Array | undefined;
  private secondary: Uint8Array | undefined;
  private closed: boolean = false;

  private readonly onPeerState = (peer: PeerId, state: PeerState): void => this.handlePeerState(peer, state);
  private readonly onData = (peer: PeerId, data: Uint8Array): void => this.handleData(peer, data);
  private readonly onTransportError = (err: Error): void => {
    this.logger.error('transport error', { reason: err.message });
    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    }
  };

  constructor(transport: Transport, config: SenderBinderConfig | ReceiverBinderConfig<TSession, TFrame>) {
    super();

    this.transport = transport;
    this.role = config.role;
    this.logger = config.logger ?? silentLogger;
    this.decoder = config.role === 'receiver' ? config.decoder : null;
    this.config = {
      maxUnitSize: config.maxUnitSize,
      maxQueuedFrames: config.maxQueuedFrames,
      maxFrameWriteAttempts: config.maxFrameWriteAttempts,
      maxConfigWriteAttempts: config.maxConfigWriteAttempts,
      writeRetryDelayMs: config.writeRetryDelayMs,
      refreshConfigOnKeyframe: config.refreshConfigOnKeyframe,
    };

    this.transport.on('peerState', this.onPeerState);
    this.transport.on('data', this.onData);
    this.transport.on('error', this.onTransportError);
  }

  /**
   * Encoder callback: hand over one unit as it is produced. Configuration
   * units are remembered across bindings; frames with no bound peer are
   * discarded. Returns whether the unit was queued for a peer.
   */
  onUnitProduced(unit: EncodedUnit): boolean {
    if (this.role !== 'sender') {
      this.logger.warn('unit produced on a receiving binder ignored', { kind: unit.kind });
      return false;
    }

    if (unit.kind === UnitKind.CONFIG_PRIMARY) {
      this.primary = unit.data.slice();
    } else if (unit.kind === UnitKind.CONFIG_SECONDARY) {
      this.secondary = unit.data.slice();
    }

    const packetizer = this.binding?.packetizer;
    if (!packetizer) {
      return false;
    }
    return packetizer.push(unit);
  }

  /**
   * The active binding, if any
   */
  getBinding(): PeerBinding<TSession, TFrame> | null {
    return this.binding;
  }

  get activePeer(): PeerId | null {
    return this.binding?.peer ?? null;
  }

  /**
   * Tear down the binding and stop listening to the transport. The transport
   * itself stays open.
   */
  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.transport.off('peerState', this.onPeerState);
      this.transport.off('data', this.onData);
      this.transport.off('error', this.onTransportError);
      this.unbind();
    }
    await Promise.all(this.teardowns);
  }

  private handlePeerState(peer: PeerId, state: PeerState): void {
    switch (state) {
      case PeerState.CONNECTING:
        this.logger.debug('peer connecting', { peer });
        break;

      case PeerState.CONNECTED:
        this.handleConnected(peer);
        break;

      case PeerState.DISCONNECTED:
        if (this.rejectedPeers.delete(peer)) {
          break;
        }
        if (this.binding?.peer === peer) {
          this.logger.info('peer disconnected', { peer });
          this.unbind();
        }
        break;
    }
  }

  private handleConnected(peer: PeerId): void {
    if (this.binding?.peer === peer) {
      return;
    }

    if (this.binding !== null) {
      const error = new FramewireError(
        ErrorCode.ERR_PEER_REJECTED,
        `Peer ${peer} rejected: ${this.binding.peer} is already bound`
      );
      this.rejectedPeers.add(peer);
      this.logger.warn('second peer rejected', { peer, active: this.binding.peer });
      this.emit('rejected', peer, error);
      this.transport.disconnect(peer);
      return;
    }

    this.bind(peer);
  }

  private bind(peer: PeerId): void {
    const packetizer = this.role === 'sender' ? this.createPacketizer(peer) : null;
    const pipeline = this.decoder !== null ? this.createPipeline(peer, this.decoder) : null;

    this.binding = { peer, boundAt: Date.now(), packetizer, pipeline };
    this.logger.info('peer bound', { peer, role: this.role });
    this.emit('bound', peer);
  }

  private createPacketizer(peer: PeerId): Packetizer {
    const packetizer = new Packetizer(this.transport, peer, {
      ...this.config,
      primary: this.primary,
      secondary: this.secondary,
      logger: this.logger.child('Packetizer'),
    });

    packetizer.on('fault', (error) => {
      if (this.binding?.packetizer !== packetizer) {
        return;
      }
      this.unbind(error);
      this.emit('fault', peer, error);
      this.transport.disconnect(peer);
    });

    return packetizer;
  }

  private createPipeline(peer: PeerId, decoder: FrameDecoder<TSession, TFrame>): ReceivePipeline<TSession, TFrame> {
    const pipeline = new ReceivePipeline<TSession, TFrame>(peer, decoder, {
      maxUnitSize: this.config.maxUnitSize,
      logger: this.logger.child('Receiver'),
    });

    pipeline.on('frame', (frame, unit) => this.emit('frame', frame, unit));
    pipeline.on('sessionCreated', (config) => this.emit('sessionCreated', config));
    pipeline.on('sessionInvalidated', (config) => this.emit('sessionInvalidated', config));
    pipeline.on('violation', (error) => this.emit('violation', error));
    pipeline.on('decodeError', (error) => this.emit('decodeError', error));

    return pipeline;
  }

  private handleData(peer: PeerId, data: Uint8Array): void {
    const binding = this.binding;
    if (binding === null || binding.peer !== peer || binding.pipeline === null) {
      return;
    }
    binding.pipeline.feed(data);
  }

  private unbind(reason?: FramewireError): void {
    const binding = this.binding;
    if (binding === null) {
      return;
    }
    this.binding = null;

    binding.packetizer?.close();

    if (binding.pipeline !== null) {
      const teardown = binding.pipeline.close()
        .catch((err: unknown) => {
          this.logger.error('receive pipeline teardown failed', { peer: binding.peer, reason: toError(err).message });
        })
        .finally(() => {
          this.teardowns.delete(teardown);
        });
      this.teardowns.add(teardown);
    }

    this.logger.info('peer unbound', { peer: binding.peer, reason: reason?.message });
    this.emit('unbound', binding.peer, reason);
  }
}
