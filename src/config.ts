/**
 * Default DFU options and their validation.
 */

import type { DfuOptions, ResolvedDfuOptions } from './models/session';
import { DEFAULT_PACKET_SIZE, MAX_PRN_INTERVAL } from './protocol/constants';

export const DEFAULT_BOOTLOADER_ALIASES: readonly string[] = [
  '{name}DfuTarg',
  '{name}_DFU',
  'DfuTarg',
];

export const DEFAULT_OPTIONS = {
  prn: 8,
  startDelayMs: 400, // bootloaders still setting up drop an early size packet
  packetDelayMs: 0,
  packetSize: DEFAULT_PACKET_SIZE,
  responseTimeoutMs: 30000,
  startTimeoutMs: 60000, // flash erase happens before the START_DFU response
  receiptTimeoutMs: 5000,
  jumpTimeoutMs: 10000,
  rebootDelayMs: 1000,
  scanTimeoutMs: 30000,
  scanWindowMs: 5000,
  matchIncrementedAddress: true,
  forceScan: false,
  wait: false,
} as const;

function nonNegative(name: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative number, got ${value}`);
  }
  return value;
}

function positiveInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

/**
 * Fill in defaults and validate.
 *
 * @throws {RangeError} If a numeric option is out of range
 */
export function resolveOptions(options: DfuOptions = {}): ResolvedDfuOptions {
  const prn = options.prn ?? DEFAULT_OPTIONS.prn;
  if (!Number.isInteger(prn) || prn < 0 || prn > MAX_PRN_INTERVAL) {
    throw new RangeError(`prn must be an integer in 0..${MAX_PRN_INTERVAL}, got ${prn}`);
  }

  return {
    prn,
    startDelayMs: nonNegative('startDelayMs', options.startDelayMs ?? DEFAULT_OPTIONS.startDelayMs),
    packetDelayMs: nonNegative('packetDelayMs', options.packetDelayMs ?? DEFAULT_OPTIONS.packetDelayMs),
    packetSize: positiveInteger('packetSize', options.packetSize ?? DEFAULT_OPTIONS.packetSize),
    responseTimeoutMs: positiveInteger(
      'responseTimeoutMs',
      options.responseTimeoutMs ?? DEFAULT_OPTIONS.responseTimeoutMs
    ),
    startTimeoutMs: positiveInteger(
      'startTimeoutMs',
      options.startTimeoutMs ?? DEFAULT_OPTIONS.startTimeoutMs
    ),
    receiptTimeoutMs: positiveInteger(
      'receiptTimeoutMs',
      options.receiptTimeoutMs ?? DEFAULT_OPTIONS.receiptTimeoutMs
    ),
    jumpTimeoutMs: positiveInteger('jumpTimeoutMs', options.jumpTimeoutMs ?? DEFAULT_OPTIONS.jumpTimeoutMs),
    rebootDelayMs: nonNegative('rebootDelayMs', options.rebootDelayMs ?? DEFAULT_OPTIONS.rebootDelayMs),
    scanTimeoutMs: positiveInteger('scanTimeoutMs', options.scanTimeoutMs ?? DEFAULT_OPTIONS.scanTimeoutMs),
    scanWindowMs: positiveInteger('scanWindowMs', options.scanWindowMs ?? DEFAULT_OPTIONS.scanWindowMs),
    bootloaderAliases: options.bootloaderAliases ?? [...DEFAULT_BOOTLOADER_ALIASES],
    matchIncrementedAddress: options.matchIncrementedAddress ?? DEFAULT_OPTIONS.matchIncrementedAddress,
    forceScan: options.forceScan ?? DEFAULT_OPTIONS.forceScan,
    wait: options.wait ?? DEFAULT_OPTIONS.wait,
    logger: options.logger ?? console,
    onProgress: options.onProgress,
    onStateChange: options.onStateChange,
    signal: options.signal,
  };
}
