/**
 * A complete pair of configuration units, as handed to the decoder.
 */

import { fingerprint } from '../utils/bytes.js';

export interface ConfigurationSet {
  /** Primary parameter set (SPS) */
  readonly primary: Uint8Array;
  /** Secondary parameter set (PPS) */
  readonly secondary: Uint8Array;
  /** Short SHA-256 over both units, for logs */
  readonly fingerprint: string;
  /** Increases with every set a state machine completes */
  readonly generation: number;
}

/**
 * Build a frozen ConfigurationSet. The unit bytes are copied so later
 * mutation of the caller's buffers cannot change the set.
 */
export function createConfigurationSet(
  primary: Uint8Array,
  secondary: Uint8Array,
  generation: number
): ConfigurationSet {
  const primaryCopy = primary.slice();
  const secondaryCopy = secondary.slice();
  return Object.freeze({
    primary: primaryCopy,
    secondary: secondaryCopy,
    fingerprint: fingerprint([primaryCopy, secondaryCopy]),
    generation,
  });
}
