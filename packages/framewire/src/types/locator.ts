/**
 * Locator identifies how to reach a peer over TCP.
 */

import { ErrorCode, FramewireError } from './errors.js';

export interface Locator {
  /** Host address (IP or hostname) */
  readonly host: string;
  /** Port number */
  readonly port: number;
}

/**
 * Parse a locator string (host:port or tcp://host:port)
 */
export function parseLocator(locator: string): Locator {
  const addressPart = locator.startsWith('tcp://') ? locator.slice('tcp://'.length) : locator;

  const match = addressPart.match(/^([^:]+):(\d+)$/);
  if (!match) {
    throw new FramewireError(ErrorCode.ERR_INVALID_ARGUMENT, `Invalid locator format: ${locator}`);
  }

  return createLocator(match[1], parseInt(match[2], 10));
}

/**
 * Format a Locator to string. Also used as the peer id of TCP peers.
 */
export function formatLocator(locator: Locator): string {
  return `${locator.host}:${locator.port}`;
}

export function createLocator(host: string, port: number): Locator {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new FramewireError(ErrorCode.ERR_INVALID_ARGUMENT, `Invalid port number: ${port}`);
  }
  return { host, port };
}
