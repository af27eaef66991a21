/**
 * Device discovery before and after the jump to the bootloader.
 *
 * A device's identity is not stable across the mode switch: bootloaders
 * advertise under another name, sometimes under another address. Matching is
 * therefore heuristic and driven by configuration.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { DeviceNotFoundError } from './exceptions';
import type { DfuLogger } from './models/session';
import { DFU_SERVICE_UUID } from './protocol/constants';
import type { Advertisement, DfuTransport, ScanFilter } from './transport/types';

const ADDRESS_PATTERN = /^([0-9a-f]{2}:){5}[0-9a-f]{2}$/i;

export function isAddress(identifier: string): boolean {
  return ADDRESS_PATTERN.test(identifier);
}

function sameAddress(a: string, b: string): boolean {
  return a.toUpperCase() === b.toUpperCase();
}

/**
 * Address with its last octet incremented, wrapping at 0xFF.
 *
 * @returns The address, or null for anything that is not a MAC address
 */
export function incrementAddress(address: string): string | null {
  if (!isAddress(address)) {
    return null;
  }
  const prefix = address.slice(0, -2);
  const last = (parseInt(address.slice(-2), 16) + 1) & 0xff;
  return `${prefix}${last.toString(16).padStart(2, '0')}`.toUpperCase();
}

/**
 * Expand alias templates for a given application name.
 *
 * Templates using `{name}` are skipped when the name is unknown.
 */
export function expandAliases(templates: readonly string[], name: string | undefined): string[] {
  const aliases: string[] = [];
  for (const template of templates) {
    if (template.includes('{name}')) {
      if (name) {
        aliases.push(template.split('{name}').join(name));
      }
    } else {
      aliases.push(template);
    }
  }
  return aliases;
}

/**
 * Filter accepting a device by exact name or address.
 */
export function identifierFilter(identifiers: readonly string[]): ScanFilter {
  return (adv) =>
    identifiers.some(
      (id) => sameAddress(adv.address, id) || (adv.name !== undefined && adv.name === id)
    );
}

export interface BootloaderMatchOptions {
  /** Alias templates, `{name}` standing for the application name */
  aliases: readonly string[];
  matchIncrementedAddress: boolean;
  serviceUuid?: string;
}

/**
 * Filter accepting the bootloader of a device seen in application mode.
 *
 * Accepts the original name or address, a configured alias of the name,
 * the legacy DFU service UUID, or the address plus one.
 */
export function bootloaderFilter(
  original: Advertisement | string,
  options: BootloaderMatchOptions
): ScanFilter {
  const originalName = typeof original === 'string' ? original : original.name;
  const originalAddress = typeof original === 'string' ? original : original.address;
  const names = new Set(expandAliases(options.aliases, originalName));
  if (originalName) {
    names.add(originalName);
  }
  const serviceUuid = (options.serviceUuid ?? DFU_SERVICE_UUID).toLowerCase();
  const incremented = options.matchIncrementedAddress ? incrementAddress(originalAddress) : null;

  return (adv) => {
    if (sameAddress(adv.address, originalAddress)) {
      return true;
    }
    if (adv.name !== undefined && names.has(adv.name)) {
      return true;
    }
    if (adv.serviceUuids.some((uuid) => uuid.toLowerCase() === serviceUuid)) {
      return true;
    }
    return incremented !== null && sameAddress(adv.address, incremented);
  };
}

function describe(adv: Advertisement): string {
  return `${adv.name ?? 'unnamed'} (${adv.address})`;
}

/**
 * Scan in windows of `scanWindowMs` until a device passes `filter` or
 * `timeoutMs` is spent.
 */
async function scanWithRetries(
  transport: DfuTransport,
  filter: ScanFilter,
  options: { timeoutMs: number; scanWindowMs: number; logger: DfuLogger; signal?: AbortSignal }
): Promise<Advertisement | null> {
  const deadline = Date.now() + options.timeoutMs;
  let attempt = 0;

  for (;;) {
    const remaining = deadline - Date.now();
    if (remaining <= 0 || options.signal?.aborted) {
      return null;
    }
    attempt++;
    const found = await transport.scan(filter, Math.min(options.scanWindowMs, remaining));
    if (found) {
      return found;
    }
    options.logger.debug(`Scan ${attempt} found nothing, ${Math.max(0, deadline - Date.now())}ms left`);
  }
}

/**
 * Locate a device running its application by name or address.
 *
 * Unless `forceScan` is set, addresses are first resolved directly. With
 * `wait`, scanning repeats until a device shows up.
 *
 * @throws {DeviceNotFoundError} If no identifier matches
 */
export async function findDevice(
  transport: DfuTransport,
  identifiers: readonly string[],
  options: {
    timeoutMs: number;
    scanWindowMs: number;
    forceScan: boolean;
    wait: boolean;
    logger: DfuLogger;
    signal?: AbortSignal;
  }
): Promise<Advertisement> {
  const { logger } = options;
  logger.info(`Scanning for ${identifiers.join(', ')}...`);

  if (!options.forceScan) {
    for (const id of identifiers.filter(isAddress)) {
      const device = await transport.lookup(id, options.scanWindowMs);
      if (device) {
        logger.info(`Found target: ${describe(device)}`);
        return device;
      }
    }
  }

  const filter = identifierFilter(identifiers);
  for (;;) {
    const device = await scanWithRetries(transport, filter, options);
    if (device) {
      logger.info(`Found target: ${describe(device)}`);
      return device;
    }
    if (!options.wait || options.signal?.aborted) {
      throw new DeviceNotFoundError(`Could not find any of: ${identifiers.join(', ')}`);
    }
    logger.info('No devices found. Retrying scan...');
    await sleep(2000, undefined, { signal: options.signal });
  }
}

/**
 * Rediscover a device once it re-advertises in bootloader mode.
 *
 * @param original - The device as seen in application mode, or its identifier
 * @throws {DeviceNotFoundError} If the timeout is spent without a match
 */
export async function awaitBootloader(
  transport: DfuTransport,
  original: Advertisement | string,
  options: BootloaderMatchOptions & {
    timeoutMs: number;
    scanWindowMs: number;
    logger: DfuLogger;
    signal?: AbortSignal;
  }
): Promise<Advertisement> {
  options.logger.info('Scanning for bootloader...');
  const device = await scanWithRetries(transport, bootloaderFilter(original, options), options);
  if (!device) {
    const label = typeof original === 'string' ? original : describe(original);
    throw new DeviceNotFoundError(`Could not locate the bootloader of ${label}`);
  }
  options.logger.info(`Found bootloader: ${describe(device)}`);
  return device;
}
