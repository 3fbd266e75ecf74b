/**
 * Byte helpers shared by the wire and bootstrap layers.
 */

import { sha256 } from '@noble/hashes/sha256';

/**
 * Convert a byte array to a hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map(b => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Compare two byte arrays by content
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) {
    return true;
  }
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Concatenate byte arrays into a new array
 */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) {
    total += part.length;
  }
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Short content fingerprint: the first `length` hex chars of SHA-256 over
 * the length-prefixed parts, so ([ab], [c]) and ([a], [bc]) differ.
 */
export function fingerprint(parts: Uint8Array[], length: number = 16): string {
  const hash = sha256.create();
  const prefix = new Uint8Array(4);
  const view = new DataView(prefix.buffer);
  for (const part of parts) {
    view.setUint32(0, part.length);
    hash.update(prefix);
    hash.update(part);
  }
  return bytesToHex(hash.digest()).slice(0, length);
}
