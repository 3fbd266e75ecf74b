/**
 * Wire protocol: packet framing, packetizer and reassembler
 */

export {
  LENGTH_PREFIX_SIZE,
  MAX_UNIT_SIZE,
  encodePacket,
  readPacketLength,
  parsePacket,
  ReceiveBuffer,
} from './framing.js';
export type { ParseResult } from './framing.js';

export type { ReassemblerOptions } from './reassembler.js';
export { Reassembler } from './reassembler.js';

export type {
  PacketizerConfig,
  PacketizerOptions,
  PacketizerEvents,
  PacketizerStats,
} from './packetizer.js';
export { Packetizer } from './packetizer.js';
