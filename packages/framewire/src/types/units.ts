/**
 * Encoded unit and peer types shared by every layer.
 */

/**
 * What an encoded unit carries, derived from its marker byte.
 */
export enum UnitKind {
  /** First parameter set (H.264 SPS) */
  CONFIG_PRIMARY = 'config-primary',
  /** Second parameter set (H.264 PPS) */
  CONFIG_SECONDARY = 'config-secondary',
  /** Coded picture data */
  FRAME = 'frame',
}

/**
 * One self-contained chunk of encoder output.
 */
export interface EncodedUnit {
  readonly data: Uint8Array;
  readonly kind: UnitKind;
  /** Hint from the encoder that this frame starts a new GOP */
  readonly keyframe?: boolean;
}

/**
 * Opaque identity of a remote peer, as reported by the transport.
 */
export type PeerId = string;

export enum PeerState {
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  DISCONNECTED = 'disconnected',
}

export function isConfigKind(kind: UnitKind): boolean {
  return kind === UnitKind.CONFIG_PRIMARY || kind === UnitKind.CONFIG_SECONDARY;
}
