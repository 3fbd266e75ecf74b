/**
 * Shared utilities for framewire
 */

export * from './bytes.js';
export * from './logger.js';
export * from './serial-queue.js';
