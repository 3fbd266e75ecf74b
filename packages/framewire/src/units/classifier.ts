/**
 * Unit classifier: labels an encoded unit from its leading marker byte.
 *
 * Only the first byte is ever inspected. Markers outside the configuration
 * set fall through to FRAME; the decoder, not this layer, decides validity.
 */

import { EncodedUnit, UnitKind, isConfigKind } from '../types/units.js';

/** SPS header with nal_ref_idc 3 */
export const PRIMARY_MARKER = 0x67;
/** SPS header with nal_ref_idc 1 */
export const PRIMARY_MARKER_LOW_REF = 0x27;
/** PPS header with nal_ref_idc 3 */
export const SECONDARY_MARKER = 0x68;
/** PPS header with nal_ref_idc 1 */
export const SECONDARY_MARKER_LOW_REF = 0x28;

const NAL_TYPE_MASK = 0x1f;
const NAL_TYPE_IDR = 5;

/**
 * Classify a unit from its first byte
 */
export function classifyUnit(firstByte: number): UnitKind {
  switch (firstByte) {
    case PRIMARY_MARKER:
    case PRIMARY_MARKER_LOW_REF:
      return UnitKind.CONFIG_PRIMARY;
    case SECONDARY_MARKER:
    case SECONDARY_MARKER_LOW_REF:
      return UnitKind.CONFIG_SECONDARY;
    default:
      return UnitKind.FRAME;
  }
}

/**
 * Classify a payload; an empty payload is a FRAME.
 */
export function classifyPayload(data: Uint8Array): UnitKind {
  if (data.length === 0) {
    return UnitKind.FRAME;
  }
  return classifyUnit(data[0]);
}

/**
 * Whether the unit is an IDR slice (NAL type 5)
 */
export function isKeyframeUnit(data: Uint8Array): boolean {
  return data.length > 0 && (data[0] & NAL_TYPE_MASK) === NAL_TYPE_IDR;
}

/**
 * Build an EncodedUnit with its classified kind. The keyframe flag defaults to
 * what the marker byte says.
 */
export function createUnit(data: Uint8Array, keyframe?: boolean): EncodedUnit {
  const kind = classifyPayload(data);
  if (isConfigKind(kind)) {
    return { data, kind };
  }
  return { data, kind, keyframe: keyframe ?? isKeyframeUnit(data) };
}
