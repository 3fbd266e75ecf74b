/**
 * Contract between framewire and the byte-stream transport that carries it.
 */

import { EventEmitter } from 'node:events';
import { PeerId, PeerState } from '../types/units.js';

export interface TransportEvents {
  /** Peer connection state changed */
  peerState: [peer: PeerId, state: PeerState];
  /** Bytes arrived from a peer, in order */
  data: [peer: PeerId, data: Uint8Array];
  error: [error: Error];
}

/**
 * An ordered, reliable byte stream per peer.
 */
export interface Transport extends EventEmitter<TransportEvents> {
  /**
   * Offer bytes to the peer's outbound stream. Returns how many bytes from the
   * front of `data` were accepted; 0 means the stream is saturated right now.
   * Throws when the stream is gone for good.
   */
  send(peer: PeerId, data: Uint8Array): number;

  /** Drop the connection to a peer */
  disconnect(peer: PeerId): void;

  /** Release every connection */
  close(): Promise<void>;
}
