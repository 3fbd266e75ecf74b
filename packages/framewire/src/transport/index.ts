/**
 * Transport contract and implementations
 */

export type { Transport, TransportEvents } from './types.js';

export type { TcpTransportOptions } from './tcp.js';
export { TcpTransport, dial, configureSocket } from './tcp.js';

export type { MemoryTransportOptions } from './memory.js';
export { MemoryTransport } from './memory.js';
