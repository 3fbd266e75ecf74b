/**
 * Inbound side of one peer binding: reassembles units, runs bootstrap and
 * drives the decoder session.
 */

import { EventEmitter } from 'node:events';
import { DEFAULT_CONFIG } from '../config.js';
import { BootstrapAction, BootstrapState, BootstrapStateMachine } from '../bootstrap/state-machine.js';
import { ConfigurationSet } from '../bootstrap/configuration-set.js';
import { ErrorCode, FramewireError, toError } from '../types/errors.js';
import { EncodedUnit, PeerId } from '../types/units.js';
import { createUnit } from '../units/classifier.js';
import { Reassembler } from '../wire/reassembler.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { SerialQueue } from '../utils/serial-queue.js';

/**
 * External decoder. Handles are opaque to framewire; frames come back in
 * submission order for one session, on whatever context the decoder uses.
 */
export interface FrameDecoder<TSession, TFrame> {
  createSession(config: ConfigurationSet): Promise<TSession>;
  decode(session: TSession, unit: EncodedUnit): Promise<TFrame>;
  invalidate(session: TSession): Promise<void> | void;
}

export interface ReceivePipelineOptions {
  /** Largest unit accepted from the wire */
  maxUnitSize?: number;
  logger?: Logger;
}

export interface ReceivePipelineEvents<TFrame> {
  /** A unit was reassembled */
  unit: [unit: EncodedUnit];
  /** The decoder produced a frame */
  frame: [frame: TFrame, unit: EncodedUnit];
  sessionCreated: [config: ConfigurationSet];
  sessionInvalidated: [config: ConfigurationSet];
  /** Malformed packet; the stream continues */
  violation: [error: FramewireError];
  /** Unit discarded because no usable configuration exists */
  drop: [unit: EncodedUnit];
  /** Decoder rejected a configuration set or a frame */
  decodeError: [error: FramewireError];
}

export interface ReceivePipelineStats {
  unitsReceived: number;
  framesDecoded: number;
  framesDroppedBeforeBootstrap: number;
  configDropped: number;
  protocolViolations: number;
  decodeErrors: number;
  sessionsCreated: number;
  sessionsInvalidated: number;
}

interface ActiveSession<TSession> {
  handle: TSession;
  config: ConfigurationSet;
}

/**
 * Receive pipeline for one peer.
 *
 * `feed` runs synchronously on the read path. Every decoder call (create,
 * decode, invalidate) goes through one serial queue, so a renegotiation never
 * invalidates a session that a decode is still using. `close` refuses further
 * submissions before the session is invalidated.
 */
export class ReceivePipeline<TSession, TFrame> extends EventEmitter<ReceivePipelineEvents<TFrame>> {
  readonly peer: PeerId;

  private decoder: FrameDecoder<TSession, TFrame>;
  private logger: Logger;
  private reassembler: Reassembler;
  private bootstrap: BootstrapStateMachine = new BootstrapStateMachine();
  private queue: SerialQueue;
  private session: ActiveSession<TSession> | null = null;
  private closing: Promise<void> | null = null;
  private stats: ReceivePipelineStats = {
    unitsReceived: 0,
    framesDecoded: 0,
    framesDroppedBeforeBootstrap: 0,
    configDropped: 0,
    protocolViolations: 0,
    decodeErrors: 0,
    sessionsCreated: 0,
    sessionsInvalidated: 0,
  };

  constructor(peer: PeerId, decoder: FrameDecoder<TSession, TFrame>, options: ReceivePipelineOptions = {}) {
    super();

    this.peer = peer;
    this.decoder = decoder;
    this.logger = options.logger ?? silentLogger;
    this.reassembler = new Reassembler({
      maxUnitSize: options.maxUnitSize ?? DEFAULT_CONFIG.maxUnitSize,
      onViolation: (violation) => this.handleViolation(violation),
    });
    this.queue = new SerialQueue({
      onError: (err) => {
        this.logger.error('decoder task failed', { peer: this.peer, reason: toError(err).message });
      },
    });
  }

  /**
   * Feed bytes read from the peer's inbound stream
   */
  feed(bytes: Uint8Array): void {
    if (this.closing !== null) {
      return;
    }

    for (const data of this.reassembler.feed(bytes)) {
      const unit = createUnit(data);
      this.stats.unitsReceived++;
      this.emit('unit', unit);
      this.dispatch(unit);
    }
  }

  /**
   * Stop decode submissions, discard buffered bytes, reset bootstrap, then
   * invalidate the session once the decoder call in flight has settled.
   */
  close(): Promise<void> {
    if (this.closing !== null) {
      return this.closing;
    }

    this.closing = this.queue.close(() => this.invalidateSession());
    this.reassembler.reset();
    this.bootstrap.reset();
    return this.closing;
  }

  /**
   * Resolves when every decoder call queued so far has settled
   */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  getStats(): ReceivePipelineStats {
    return { ...this.stats };
  }

  get state(): BootstrapState {
    return this.bootstrap.state;
  }

  /**
   * Bytes buffered toward an incomplete packet
   */
  get buffered(): number {
    return this.reassembler.buffered;
  }

  get isClosed(): boolean {
    return this.closing !== null;
  }

  private dispatch(unit: EncodedUnit): void {
    const action: BootstrapAction = this.bootstrap.accept(unit);

    switch (action.type) {
      case 'stored':
      case 'duplicate':
        this.logger.debug(`config ${action.type}`, { peer: this.peer, kind: action.kind });
        break;

      case 'dropConfig':
        this.stats.configDropped++;
        this.logger.debug('secondary config without primary dropped', { peer: this.peer });
        this.emit('drop', unit);
        break;

      case 'dropFrame':
        this.stats.framesDroppedBeforeBootstrap++;
        this.emit('drop', unit);
        break;

      case 'create':
        this.queue.push(() => this.createSession(action.config));
        break;

      case 'invalidate':
        this.logger.info('configuration changed, renegotiating', {
          peer: this.peer,
          previous: action.previous.fingerprint,
        });
        this.queue.push(() => this.invalidateSession());
        break;

      case 'renegotiate':
        this.logger.info('configuration changed, renegotiating', {
          peer: this.peer,
          previous: action.previous.fingerprint,
          next: action.config.fingerprint,
        });
        this.queue.push(() => this.invalidateSession());
        this.queue.push(() => this.createSession(action.config));
        break;

      case 'decode':
        this.queue.push(() => this.decodeUnit(unit));
        break;
    }
  }

  private async createSession(config: ConfigurationSet): Promise<void> {
    let handle: TSession;
    try {
      handle = await this.decoder.createSession(config);
    } catch (err) {
      this.stats.decodeErrors++;
      this.bootstrap.fail(config.generation);
      this.logger.warn('decoder session creation failed', {
        peer: this.peer,
        fingerprint: config.fingerprint,
        reason: toError(err).message,
      });
      this.emit('decodeError', new FramewireError(
        ErrorCode.ERR_SESSION_CREATE_FAILED,
        `Decoder rejected configuration ${config.fingerprint}: ${toError(err).message}`,
        { cause: err }
      ));
      return;
    }

    this.session = { handle, config };
    this.stats.sessionsCreated++;
    this.logger.info('decoder session created', { peer: this.peer, fingerprint: config.fingerprint });
    this.emit('sessionCreated', config);
  }

  private async decodeUnit(unit: EncodedUnit): Promise<void> {
    const session = this.session;
    if (session === null) {
      // Construction failed or a renegotiation is under way
      this.stats.framesDroppedBeforeBootstrap++;
      this.emit('drop', unit);
      return;
    }

    let frame: TFrame;
    try {
      frame = await this.decoder.decode(session.handle, unit);
    } catch (err) {
      this.stats.decodeErrors++;
      this.logger.debug('frame decode failed', { peer: this.peer, bytes: unit.data.length });
      this.emit('decodeError', new FramewireError(
        ErrorCode.ERR_DECODE_FAILED,
        `Decoder rejected a ${unit.data.length}-byte frame: ${toError(err).message}`,
        { cause: err }
      ));
      return;
    }

    this.stats.framesDecoded++;
    this.emit('frame', frame, unit);
  }

  private async invalidateSession(): Promise<void> {
    const session = this.session;
    if (session === null) {
      return;
    }
    this.session = null;

    try {
      await this.decoder.invalidate(session.handle);
    } catch (err) {
      this.logger.warn('decoder invalidate failed', { peer: this.peer, reason: toError(err).message });
    }

    this.stats.sessionsInvalidated++;
    this.logger.info('decoder session invalidated', { peer: this.peer, fingerprint: session.config.fingerprint });
    this.emit('sessionInvalidated', session.config);
  }

  private handleViolation(violation: FramewireError): void {
    this.stats.protocolViolations++;
    this.logger.warn('protocol violation', { peer: this.peer, reason: violation.message });
    this.emit('violation', violation);
  }
}
