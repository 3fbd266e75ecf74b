import { describe, it, expect } from 'vitest';
import { createLocator, formatLocator, parseLocator } from '../types/locator.js';
import { ErrorCode, FramewireError, getErrorMessage } from '../types/errors.js';

describe('Locator', () => {
  it('should parse host:port', () => {
    expect(parseLocator('127.0.0.1:9000')).toEqual({ host: '127.0.0.1', port: 9000 });
  });

  it('should accept a tcp:// prefix', () => {
    expect(parseLocator('tcp://camera.local:5000')).toEqual({ host: 'camera.local', port: 5000 });
  });

  it('should reject a missing port', () => {
    expect(() => parseLocator('camera.local')).toThrow('Invalid locator format: camera.local');
  });

  it('should reject a port out of range', () => {
    expect(() => createLocator('localhost', 70000)).toThrow(FramewireError);
  });

  it('should format back to the peer id form', () => {
    expect(formatLocator(createLocator('10.0.0.2', 0))).toBe('10.0.0.2:0');
  });
});

describe('FramewireError', () => {
  it('should fall back to the message for its code', () => {
    const error = new FramewireError(ErrorCode.ERR_PEER_REJECTED);

    expect(error.message).toBe(getErrorMessage(ErrorCode.ERR_PEER_REJECTED));
    expect(error.name).toBe('FramewireError');
    expect(error.code).toBe(ErrorCode.ERR_PEER_REJECTED);
  });
});
