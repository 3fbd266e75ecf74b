/**
 * Fixtures and fakes shared by the test suites
 */

import { EventEmitter } from 'node:events';
import { ConfigurationSet } from '../bootstrap/configuration-set.js';
import { FrameDecoder } from '../session/receive-pipeline.js';
import { Transport, TransportEvents } from '../transport/types.js';
import { EncodedUnit, PeerId } from '../types/units.js';
import { bytesToHex, concatBytes } from '../utils/bytes.js';
import { encodePacket } from '../wire/framing.js';
import { Reassembler } from '../wire/reassembler.js';

export const SPS_1 = new Uint8Array([0x67, 0x42, 0x00, 0x1e]);
export const SPS_2 = new Uint8Array([0x67, 0x64, 0x00, 0x28]);
export const PPS_1 = new Uint8Array([0x68, 0xce, 0x3c, 0x80]);
export const PPS_2 = new Uint8Array([0x68, 0xee, 0x06, 0xf2]);
/** IDR slice */
export const FRAME_1 = new Uint8Array([0x65, 0x88, 0x84, 0x00, 0x21]);
/** Non-IDR slice */
export const FRAME_2 = new Uint8Array([0x41, 0x9a, 0x02, 0x03]);

/**
 * Concatenated packets for the given payloads
 */
export function packetize(...payloads: Uint8Array[]): Uint8Array {
  return concatBytes(...payloads.map((payload) => encodePacket(payload)));
}

/**
 * Reassemble a captured byte stream back into payloads
 */
export function unpacketize(bytes: Uint8Array): Uint8Array[] {
  return Array.from(new Reassembler().feed(bytes));
}

export function hexList(units: Uint8Array[]): string[] {
  return units.map((unit) => bytesToHex(unit));
}

/**
 * Let pending setImmediate callbacks and microtasks run
 */
export function nextTick(): Promise<void> {
  return new Promise((resolve) => {
    setImmediate(resolve);
  });
}

/**
 * Decoder that records every call. Session handles are 1, 2, ... in order of
 * successful creation.
 */
export class RecordingDecoder implements FrameDecoder<number, string> {
  readonly calls: string[] = [];
  readonly configs: ConfigurationSet[] = [];
  readonly decoded: string[] = [];
  failCreate: boolean = false;
  failDecode: (unit: EncodedUnit) => boolean = () => false;
  /** When set, decode waits for this promise before finishing */
  gate: Promise<void> | null = null;

  private nextSession: number = 1;

  async createSession(config: ConfigurationSet): Promise<number> {
    if (this.failCreate) {
      this.calls.push('create-failed');
      throw new Error('unsupported profile');
    }
    const session = this.nextSession++;
    this.configs.push(config);
    this.calls.push(`create:${session}`);
    return session;
  }

  async decode(session: number, unit: EncodedUnit): Promise<string> {
    this.calls.push(`decode:${session}`);
    if (this.gate) {
      await this.gate;
      this.calls.push(`decoded:${session}`);
    }
    if (this.failDecode(unit)) {
      throw new Error('corrupt slice');
    }
    const frame = `${session}:${bytesToHex(unit.data)}`;
    this.decoded.push(frame);
    return frame;
  }

  invalidate(session: number): void {
    this.calls.push(`invalidate:${session}`);
  }
}

/**
 * Transport whose `send` result is scripted per call. Accepted bytes are
 * captured in order.
 */
export class ScriptedTransport extends EventEmitter<TransportEvents> implements Transport {
  readonly chunks: Uint8Array[] = [];
  readonly disconnected: PeerId[] = [];
  sendCalls: number = 0;
  accept: (data: Uint8Array, call: number) => number = (data) => data.length;

  send(_peer: PeerId, data: Uint8Array): number {
    this.sendCalls++;
    const accepted = this.accept(data, this.sendCalls);
    if (accepted > 0) {
      this.chunks.push(data.slice(0, accepted));
    }
    return accepted;
  }

  disconnect(peer: PeerId): void {
    this.disconnected.push(peer);
  }

  close(): Promise<void> {
    return Promise.resolve();
  }

  get bytes(): Uint8Array {
    return concatBytes(...this.chunks);
  }
}
