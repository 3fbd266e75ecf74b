/**
 * Error codes for the framewire protocol.
 */

export enum ErrorCode {
  /** No error */
  OK = 0,

  /** Generic/unspecified error */
  ERR_UNKNOWN = 1,

  /** Packet declared a zero-length payload */
  ERR_EMPTY_PAYLOAD = 2,

  /** Unit exceeds the configured maximum size */
  ERR_UNIT_TOO_LARGE = 3,

  /** Unit cannot be packetized */
  ERR_INVALID_UNIT = 4,

  /** Outbound transport rejected or reset a write */
  ERR_WRITE_FAILED = 5,

  /** Connection closed */
  ERR_CONNECTION_CLOSED = 6,

  /** Timeout */
  ERR_TIMEOUT = 7,

  /** Decoder rejected the configuration set */
  ERR_SESSION_CREATE_FAILED = 8,

  /** Decoder rejected a frame */
  ERR_DECODE_FAILED = 9,

  /** A peer is already bound */
  ERR_PEER_REJECTED = 10,

  /** No peer is bound */
  ERR_NOT_BOUND = 11,

  /** Component was closed */
  ERR_CLOSED = 12,

  /** Invalid address or argument */
  ERR_INVALID_ARGUMENT = 13,

  /** Outbound queue or stream saturated */
  ERR_RESOURCE_EXHAUSTED = 14,
}

/**
 * Get human-readable description for error code
 */
export function getErrorMessage(code: ErrorCode): string {
  const messages: Record<ErrorCode, string> = {
    [ErrorCode.OK]: 'OK',
    [ErrorCode.ERR_UNKNOWN]: 'Unknown error',
    [ErrorCode.ERR_EMPTY_PAYLOAD]: 'Zero-length payload',
    [ErrorCode.ERR_UNIT_TOO_LARGE]: 'Unit too large',
    [ErrorCode.ERR_INVALID_UNIT]: 'Invalid unit',
    [ErrorCode.ERR_WRITE_FAILED]: 'Write failed',
    [ErrorCode.ERR_CONNECTION_CLOSED]: 'Connection closed',
    [ErrorCode.ERR_TIMEOUT]: 'Operation timed out',
    [ErrorCode.ERR_SESSION_CREATE_FAILED]: 'Decoder session creation failed',
    [ErrorCode.ERR_DECODE_FAILED]: 'Frame decode failed',
    [ErrorCode.ERR_PEER_REJECTED]: 'Peer rejected: another peer is bound',
    [ErrorCode.ERR_NOT_BOUND]: 'No peer bound',
    [ErrorCode.ERR_CLOSED]: 'Closed',
    [ErrorCode.ERR_INVALID_ARGUMENT]: 'Invalid argument',
    [ErrorCode.ERR_RESOURCE_EXHAUSTED]: 'Resource exhausted',
  };
  return messages[code] ?? 'Unknown error';
}

/**
 * Custom error class for framewire errors
 */
export class FramewireError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message?: string,
    options?: { cause?: unknown }
  ) {
    super(message ?? getErrorMessage(code), options);
    this.name = 'FramewireError';
  }
}

/**
 * Normalize a thrown value into an Error
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
