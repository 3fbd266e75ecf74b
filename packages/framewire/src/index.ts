/**
 * framewire - length-prefixed video unit streaming between two peers.
 *
 * Packetizes encoded H.264 units onto an ordered byte stream, reassembles
 * them on the far side and bootstraps the decoder from the parameter sets.
 */

// Core types
export * from './types/index.js';

// Tuning defaults
export type { FramewireConfig } from './config.js';
export { DEFAULT_CONFIG } from './config.js';

// Unit classification
export * from './units/index.js';

// Wire protocol
export * from './wire/index.js';

// Decoder bootstrap
export * from './bootstrap/index.js';

// Peer binding and receive pipeline (main entry point)
export * from './session/index.js';

// Transports
export * from './transport/index.js';

// Utilities
export * from './utils/index.js';
