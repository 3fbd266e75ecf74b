/**
 * Rebuilds discrete units from an ordered, arbitrarily chunked byte stream.
 */

import { ErrorCode, FramewireError } from '../types/errors.js';
import { LENGTH_PREFIX_SIZE, MAX_UNIT_SIZE, ReceiveBuffer } from './framing.js';

export interface ReassemblerOptions {
  /** Length prefixes above this are protocol violations */
  maxUnitSize?: number;
  /** Called for each protocol violation; the stream keeps going */
  onViolation?: (violation: FramewireError) => void;
}

/**
 * Receive-side packet reassembly for one inbound stream.
 *
 * A zero-length packet consumes only its four length bytes. An oversized
 * packet is skipped as its payload arrives, so the next length prefix is
 * read from the right place.
 */
export class Reassembler {
  private buffer: ReceiveBuffer = new ReceiveBuffer();
  private skipRemaining: number = 0;
  private maxUnitSize: number;
  private onViolation: (violation: FramewireError) => void;

  constructor(options: ReassemblerOptions = {}) {
    this.maxUnitSize = options.maxUnitSize ?? MAX_UNIT_SIZE;
    this.onViolation = options.onViolation ?? (() => {});
  }

  /**
   * Append `bytes` and return the units that are now complete, in the order
   * their packets were written. The bytes are buffered immediately; units are
   * extracted as the result is iterated, and anything not extracted stays
   * buffered for the next call.
   */
  feed(bytes: Uint8Array): Generator<Uint8Array, void, undefined> {
    this.buffer.append(bytes);
    return this.drain();
  }

  /**
   * Number of bytes waiting for the rest of their packet
   */
  get buffered(): number {
    return this.buffer.size;
  }

  /**
   * Discard buffered bytes and any pending skip
   */
  reset(): void {
    this.buffer.clear();
    this.skipRemaining = 0;
  }

  private *drain(): Generator<Uint8Array, void, undefined> {
    for (;;) {
      if (this.skipRemaining > 0) {
        this.skipRemaining -= this.buffer.skip(this.skipRemaining);
        if (this.skipRemaining > 0) {
          return;
        }
      }

      const length = this.buffer.peekLength();
      if (length === null) {
        return;
      }

      if (length === 0) {
        this.buffer.skip(LENGTH_PREFIX_SIZE);
        this.onViolation(new FramewireError(ErrorCode.ERR_EMPTY_PAYLOAD, 'Packet with zero-length payload'));
        continue;
      }

      if (length > this.maxUnitSize) {
        this.buffer.skip(LENGTH_PREFIX_SIZE);
        this.skipRemaining = length;
        this.onViolation(new FramewireError(
          ErrorCode.ERR_UNIT_TOO_LARGE,
          `Packet too large: ${length} bytes (max: ${this.maxUnitSize})`
        ));
        continue;
      }

      if (this.buffer.size < LENGTH_PREFIX_SIZE + length) {
        // Partial packet, wait for more data
        return;
      }

      this.buffer.skip(LENGTH_PREFIX_SIZE);
      yield this.buffer.take(length);
    }
  }
}
