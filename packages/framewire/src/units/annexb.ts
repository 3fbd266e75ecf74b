/**
 * Annex-B byte stream helpers: split a raw .h264 stream on start codes and
 * write units back with 4-byte start codes.
 */

import { concatBytes } from '../utils/bytes.js';

const START_CODE = new Uint8Array([0x00, 0x00, 0x00, 0x01]);

/**
 * Find the next 3-byte start code (00 00 01) at or after `from`.
 * Returns -1 when there is none.
 */
function findStartCode(data: Uint8Array, from: number): number {
  for (let i = from; i + 2 < data.length; i++) {
    if (data[i] === 0 && data[i + 1] === 0 && data[i + 2] === 1) {
      return i;
    }
  }
  return -1;
}

/**
 * Split an Annex-B stream into NAL units (start codes removed).
 * Bytes before the first start code are ignored, as are trailing zero bytes
 * of each unit (the leading zero of a 4-byte start code, trailing_zero_8bits).
 */
export function splitAnnexB(data: Uint8Array): Uint8Array[] {
  const units: Uint8Array[] = [];

  let start = findStartCode(data, 0);
  if (start < 0) {
    return units;
  }
  start += 3;

  while (start < data.length) {
    const next = findStartCode(data, start);
    let end = next < 0 ? data.length : next;

    while (end > start && data[end - 1] === 0) {
      end--;
    }
    if (end > start) {
      units.push(data.subarray(start, end));
    }

    if (next < 0) {
      break;
    }
    start = next + 3;
  }

  return units;
}

/**
 * Serialize units as an Annex-B stream with 4-byte start codes
 */
export function joinAnnexB(units: Uint8Array[]): Uint8Array {
  const parts: Uint8Array[] = [];
  for (const unit of units) {
    parts.push(START_CODE, unit);
  }
  return concatBytes(...parts);
}
