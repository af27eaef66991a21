/**
 * Protocol layer exports for legacy DFU communication.
 */

export * from './constants';
export * from './commands';
export * from './responses';
