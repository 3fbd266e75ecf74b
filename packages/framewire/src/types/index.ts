/**
 * Type definitions for framewire
 */

export type { EncodedUnit, PeerId } from './units.js';
export { UnitKind, PeerState, isConfigKind } from './units.js';

export type { Locator } from './locator.js';
export {
  parseLocator,
  formatLocator,
  createLocator,
} from './locator.js';

export {
  ErrorCode,
  getErrorMessage,
  FramewireError,
  toError,
} from './errors.js';
