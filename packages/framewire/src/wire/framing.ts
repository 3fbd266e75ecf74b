/**
 * Length-prefixed packet framing.
 *
 *   Packet := LEN (4 bytes, big-endian, unsigned) || PAYLOAD (LEN bytes)
 */

import { ErrorCode, FramewireError } from '../types/errors.js';

/** Size of the length prefix */
export const LENGTH_PREFIX_SIZE = 4;

/** Default maximum unit size (16 MB) */
export const MAX_UNIT_SIZE = 16 * 1024 * 1024;

/**
 * Frame a payload with its 4-byte length prefix
 */
export function encodePacket(payload: Uint8Array, maxUnitSize: number = MAX_UNIT_SIZE): Uint8Array {
  if (payload.length === 0) {
    throw new FramewireError(ErrorCode.ERR_INVALID_UNIT, 'Cannot packetize an empty unit');
  }
  if (payload.length > maxUnitSize) {
    throw new FramewireError(
      ErrorCode.ERR_UNIT_TOO_LARGE,
      `Unit too large: ${payload.length} bytes (max: ${maxUnitSize})`
    );
  }

  const packet = new Uint8Array(LENGTH_PREFIX_SIZE + payload.length);
  new DataView(packet.buffer).setUint32(0, payload.length, false);
  packet.set(payload, LENGTH_PREFIX_SIZE);
  return packet;
}

/**
 * Read the big-endian length prefix at `offset`, or null when fewer than
 * four bytes are available.
 */
export function readPacketLength(data: Uint8Array, offset: number = 0): number | null {
  if (data.length - offset < LENGTH_PREFIX_SIZE) {
    return null;
  }
  return new DataView(data.buffer, data.byteOffset + offset, LENGTH_PREFIX_SIZE).getUint32(0, false);
}

/**
 * Result of parsing one packet
 */
export interface ParseResult {
  /** The payload (without length prefix) */
  data: Uint8Array;
  /** Total bytes consumed (including length prefix) */
  bytesConsumed: number;
}

/**
 * Parse one complete packet from `buffer` at `offset`.
 * Returns null if the buffer doesn't hold a complete packet yet.
 */
export function parsePacket(buffer: Uint8Array, offset: number = 0): ParseResult | null {
  const length = readPacketLength(buffer, offset);
  if (length === null) {
    return null;
  }

  const totalLength = LENGTH_PREFIX_SIZE + length;
  if (buffer.length - offset < totalLength) {
    // Not enough data yet
    return null;
  }

  const start = offset + LENGTH_PREFIX_SIZE;
  return { data: buffer.slice(start, start + length), bytesConsumed: totalLength };
}

/**
 * Append-only byte buffer; bytes leave only as a contiguous prefix.
 */
export class ReceiveBuffer {
  private buffer: Uint8Array = new Uint8Array(0);
  private offset: number = 0;

  /**
   * Append data to the tail
   */
  append(data: Uint8Array): void {
    if (data.length === 0) {
      return;
    }
    const remaining = this.buffer.subarray(this.offset);
    const newBuffer = new Uint8Array(remaining.length + data.length);
    newBuffer.set(remaining, 0);
    newBuffer.set(data, remaining.length);
    this.buffer = newBuffer;
    this.offset = 0;
  }

  /**
   * Length prefix at the head, or null if fewer than four bytes are buffered
   */
  peekLength(): number | null {
    return readPacketLength(this.buffer, this.offset);
  }

  /**
   * Remove and return the first `count` bytes as a standalone copy
   */
  take(count: number): Uint8Array {
    const end = Math.min(this.offset + count, this.buffer.length);
    const out = this.buffer.slice(this.offset, end);
    this.offset = end;
    this.compactIfEmpty();
    return out;
  }

  /**
   * Drop up to `count` bytes from the head, returning how many were dropped
   */
  skip(count: number): number {
    const dropped = Math.min(count, this.size);
    this.offset += dropped;
    this.compactIfEmpty();
    return dropped;
  }

  /**
   * Number of buffered bytes
   */
  get size(): number {
    return this.buffer.length - this.offset;
  }

  /**
   * Clear the buffer
   */
  clear(): void {
    this.buffer = new Uint8Array(0);
    this.offset = 0;
  }

  private compactIfEmpty(): void {
    if (this.offset >= this.buffer.length) {
      this.clear();
    }
  }
}
