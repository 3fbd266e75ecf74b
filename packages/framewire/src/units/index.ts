/**
 * Unit classification and Annex-B helpers
 */

export {
  PRIMARY_MARKER,
  PRIMARY_MARKER_LOW_REF,
  SECONDARY_MARKER,
  SECONDARY_MARKER_LOW_REF,
  classifyUnit,
  classifyPayload,
  isKeyframeUnit,
  createUnit,
} from './classifier.js';

export { splitAnnexB, joinAnnexB } from './annexb.js';
