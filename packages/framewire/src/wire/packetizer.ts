/**
 * Sender side: turns encoded units into packets on one peer's outbound stream.
 */

import { EventEmitter } from 'node:events';
import { setTimeout as sleep } from 'node:timers/promises';
import { DEFAULT_CONFIG, FramewireConfig } from '../config.js';
import { ErrorCode, FramewireError, toError } from '../types/errors.js';
import { EncodedUnit, PeerId, UnitKind } from '../types/units.js';
import { Transport } from '../transport/types.js';
import { Logger, silentLogger } from '../utils/logger.js';
import { bytesEqual } from '../utils/bytes.js';
import { encodePacket } from './framing.js';

export type PacketizerConfig = Pick<
  FramewireConfig,
  | 'maxUnitSize'
  | 'maxQueuedFrames'
  | 'maxFrameWriteAttempts'
  | 'maxConfigWriteAttempts'
  | 'writeRetryDelayMs'
  | 'refreshConfigOnKeyframe'
>;

export interface PacketizerOptions extends Partial<PacketizerConfig> {
  /** Configuration carried over from an earlier binding; sent before the first frame */
  primary?: Uint8Array;
  secondary?: Uint8Array;
  logger?: Logger;
}

export interface PacketizerEvents {
  /** Unrecoverable write failure; the packetizer has stopped */
  fault: [error: FramewireError];
  /** A unit was not sent */
  drop: [unit: EncodedUnit, reason: ErrorCode];
}

export interface PacketizerStats {
  packetsSent: number;
  bytesSent: number;
  configPacketsSent: number;
  framesDropped: number;
  writeRetries: number;
}

interface OutboundPacket {
  unit: EncodedUnit;
  packet: Uint8Array;
}

type WriteOutcome = 'sent' | 'dropped' | 'failed' | 'aborted';

/**
 * Per-peer packetizer.
 *
 * Configuration units are held as the current configuration and go out as two
 * packets, primary then secondary, ahead of the next frame whenever they
 * change (and after every rebind). Frames wait in a bounded queue; when it is
 * full new frames are dropped. `push` never waits on the transport.
 */
export class Packetizer extends EventEmitter<PacketizerEvents> {
  readonly peer: PeerId;

  private transport: Transport;
  private config: PacketizerConfig;
  private logger: Logger;
  private queue: OutboundPacket[] = [];
  private queuedFrames: number = 0;
  private primary: Uint8Array | null;
  private secondary: Uint8Array | null;
  private configDirty: boolean;
  private draining: boolean = false;
  private closed: boolean = false;
  private idleWaiters: Array<() => void> = [];
  private stats: PacketizerStats = {
    packetsSent: 0,
    bytesSent: 0,
    configPacketsSent: 0,
    framesDropped: 0,
    writeRetries: 0,
  };

  constructor(transport: Transport, peer: PeerId, options: PacketizerOptions = {}) {
    super();

    this.transport = transport;
    this.peer = peer;
    this.logger = options.logger ?? silentLogger;
    this.config = {
      maxUnitSize: options.maxUnitSize ?? DEFAULT_CONFIG.maxUnitSize,
      maxQueuedFrames: options.maxQueuedFrames ?? DEFAULT_CONFIG.maxQueuedFrames,
      maxFrameWriteAttempts: options.maxFrameWriteAttempts ?? DEFAULT_CONFIG.maxFrameWriteAttempts,
      maxConfigWriteAttempts: options.maxConfigWriteAttempts ?? DEFAULT_CONFIG.maxConfigWriteAttempts,
      writeRetryDelayMs: options.writeRetryDelayMs ?? DEFAULT_CONFIG.writeRetryDelayMs,
      refreshConfigOnKeyframe: options.refreshConfigOnKeyframe ?? DEFAULT_CONFIG.refreshConfigOnKeyframe,
    };

    this.primary = options.primary?.slice() ?? null;
    this.secondary = options.secondary?.slice() ?? null;
    this.configDirty = this.primary !== null && this.secondary !== null;
  }

  /**
   * Queue a unit for the peer. Returns false if the unit will not be sent
   * (packetizer closed, unit unusable, or frame queue full).
   */
  push(unit: EncodedUnit): boolean {
    if (this.closed) {
      return false;
    }

    switch (unit.kind) {
      case UnitKind.CONFIG_PRIMARY:
        if (this.primary === null || !bytesEqual(this.primary, unit.data)) {
          // Encoders may reuse their output buffers
          this.primary = unit.data.slice();
          this.configDirty = true;
        }
        return true;

      case UnitKind.CONFIG_SECONDARY:
        if (this.secondary === null || !bytesEqual(this.secondary, unit.data)) {
          this.secondary = unit.data.slice();
          this.configDirty = true;
        }
        return true;

      case UnitKind.FRAME:
        return this.pushFrame(unit);
    }
  }

  /**
   * Resolves once every queued packet has been written or dropped
   */
  flush(): Promise<void> {
    if (!this.draining && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop writing and discard queued packets
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.discardQueue();
  }

  getStats(): PacketizerStats {
    return { ...this.stats };
  }

  /**
   * Packets waiting to be written
   */
  get queued(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private pushFrame(unit: EncodedUnit): boolean {
    const refresh = this.config.refreshConfigOnKeyframe && unit.keyframe === true;
    if ((this.configDirty || refresh) && this.primary !== null && this.secondary !== null) {
      this.enqueue({ data: this.primary, kind: UnitKind.CONFIG_PRIMARY });
      this.enqueue({ data: this.secondary, kind: UnitKind.CONFIG_SECONDARY });
      this.configDirty = false;
    }

    if (this.queuedFrames >= this.config.maxQueuedFrames) {
      this.dropFrame(unit, ErrorCode.ERR_RESOURCE_EXHAUSTED);
      return false;
    }

    return this.enqueue(unit);
  }

  private enqueue(unit: EncodedUnit): boolean {
    if (this.closed) {
      return false;
    }

    let packet: Uint8Array;
    try {
      packet = encodePacket(unit.data, this.config.maxUnitSize);
    } catch (err) {
      const code = err instanceof FramewireError ? err.code : ErrorCode.ERR_INVALID_UNIT;
      this.logger.warn('unit not packetized', { peer: this.peer, kind: unit.kind, reason: toError(err).message });
      if (unit.kind === UnitKind.FRAME) {
        this.dropFrame(unit, code);
      } else {
        this.emit('drop', unit, code);
      }
      return false;
    }

    this.queue.push({ unit, packet });
    if (unit.kind === UnitKind.FRAME) {
      this.queuedFrames++;
    }

    this.drain().catch((err: unknown) => {
      this.fail(new FramewireError(ErrorCode.ERR_WRITE_FAILED, toError(err).message, { cause: err }));
    });
    return true;
  }

  private async drain(): Promise<void> {
    if (this.draining) {
      return;
    }
    this.draining = true;

    try {
      while (!this.closed && this.queue.length > 0) {
        const item = this.queue[0];
        const outcome = await this.writePacket(item);
        if (outcome === 'failed' || outcome === 'aborted') {
          break;
        }

        this.queue.shift();
        if (item.unit.kind === UnitKind.FRAME) {
          this.queuedFrames--;
        }
        if (outcome === 'dropped') {
          this.dropFrame(item.unit, ErrorCode.ERR_RESOURCE_EXHAUSTED);
        }
      }
    } finally {
      this.draining = false;
      if (this.closed || this.queue.length === 0) {
        this.notifyIdle();
      }
    }
  }

  private async writePacket(item: OutboundPacket): Promise<WriteOutcome> {
    const { packet, unit } = item;
    const isFrame = unit.kind === UnitKind.FRAME;
    let offset = 0;
    let attempts = 0;

    while (offset < packet.length) {
      if (this.closed) {
        return 'aborted';
      }

      let accepted: number;
      try {
        accepted = this.transport.send(this.peer, offset === 0 ? packet : packet.subarray(offset));
      } catch (err) {
        this.fail(new FramewireError(
          ErrorCode.ERR_WRITE_FAILED,
          `Write to ${this.peer} failed: ${toError(err).message}`,
          { cause: err }
        ));
        return 'failed';
      }

      if (accepted > 0) {
        offset += Math.min(accepted, packet.length - offset);
        attempts = 0;
        continue;
      }

      attempts++;
      // A frame nobody has seen a byte of can be dropped; anything already on
      // the wire has to be finished or the receiver loses packet alignment.
      const droppable = isFrame && offset === 0;
      const limit = droppable ? this.config.maxFrameWriteAttempts : this.config.maxConfigWriteAttempts;
      if (attempts >= limit) {
        if (droppable) {
          return 'dropped';
        }
        this.fail(new FramewireError(
          ErrorCode.ERR_WRITE_FAILED,
          `Write to ${this.peer} stalled after ${attempts} attempts (${offset}/${packet.length} bytes)`
        ));
        return 'failed';
      }

      this.stats.writeRetries++;
      await sleep(this.config.writeRetryDelayMs);
    }

    this.stats.packetsSent++;
    this.stats.bytesSent += packet.length;
    if (!isFrame) {
      this.stats.configPacketsSent++;
    }
    return 'sent';
  }

  private dropFrame(unit: EncodedUnit, reason: ErrorCode): void {
    this.stats.framesDropped++;
    this.logger.debug('frame dropped', { peer: this.peer, bytes: unit.data.length, reason: ErrorCode[reason] });
    this.emit('drop', unit, reason);
  }

  private fail(error: FramewireError): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.discardQueue();
    this.logger.error('write failure', { peer: this.peer, reason: error.message });
    this.emit('fault', error);
  }

  private discardQueue(): void {
    this.queue = [];
    this.queuedFrames = 0;
    if (!this.draining) {
      this.notifyIdle();
    }
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
