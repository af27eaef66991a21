/**
 * Command line parsing and failure reporting for `legacy-dfu`.
 */

import { parseArgs } from 'node:util';
import { DEFAULT_OPTIONS } from '../config';
import { DfuError, FirmwarePackageError } from '../exceptions';
import { MAX_PRN_INTERVAL } from '../protocol/constants';

export const USAGE = `Usage: legacy-dfu [options] <file> <device...>

Update a device running a legacy (unsigned) DFU bootloader over BLE.

Arguments:
  file                    Firmware package (.zip)
  device                  Device names or BLE addresses; the first found is updated

Options:
  --scan                  Always scan, even for addresses
  --prn <N>               Packet receipt interval, 0 disables (default ${DEFAULT_OPTIONS.prn})
  --delay <seconds>       Pause after START_DFU (default ${DEFAULT_OPTIONS.startDelayMs / 1000})
  --packet-delay <seconds>
                          Pause between image packets (default 0)
  --adapter <name>        Bluetooth adapter, e.g. hci0
  --wait                  Keep scanning until a device appears
  --verbose               Debug logging with millisecond timestamps
  -h, --help              Show this help`;

export interface CliOptions {
  file: string;
  devices: string[];
  forceScan: boolean;
  prn: number;
  startDelayMs: number;
  packetDelayMs: number;
  adapter?: string;
  wait: boolean;
  verbose: boolean;
}

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

/**
 * Invalid command line; the process exits with code 2.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function parsePrn(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_OPTIONS.prn;
  }
  const prn = Number(value);
  if (value.trim() === '' || !Number.isInteger(prn) || prn < 0 || prn > MAX_PRN_INTERVAL) {
    throw new UsageError(`--prn must be an integer in 0..${MAX_PRN_INTERVAL}, got "${value}"`);
  }
  return prn;
}

function parseSeconds(flag: string, value: string | undefined, fallbackMs: number): number {
  if (value === undefined) {
    return fallbackMs;
  }
  const seconds = Number(value);
  if (value.trim() === '' || !Number.isFinite(seconds) || seconds < 0) {
    throw new UsageError(`${flag} must be a non-negative number of seconds, got "${value}"`);
  }
  return Math.round(seconds * 1000);
}

function parseRaw(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: {
      scan: { type: 'boolean' },
      prn: { type: 'string' },
      delay: { type: 'string' },
      'packet-delay': { type: 'string' },
      adapter: { type: 'string' },
      wait: { type: 'boolean' },
      verbose: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/**
 * Parse arguments following the executable name.
 *
 * @throws {UsageError} For unknown options, bad values or missing arguments
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  let parsed: ReturnType<typeof parseRaw>;
  try {
    parsed = parseRaw(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  const { values, positionals } = parsed;
  if (values.help === true) {
    return { kind: 'help' };
  }

  const [file, ...devices] = positionals;
  if (file === undefined || devices.length === 0) {
    throw new UsageError('Expected a firmware file and at least one device');
  }

  return {
    kind: 'run',
    options: {
      file,
      devices,
      forceScan: values.scan === true,
      prn: parsePrn(values.prn),
      startDelayMs: parseSeconds('--delay', values.delay, DEFAULT_OPTIONS.startDelayMs),
      packetDelayMs: parseSeconds(
        '--packet-delay',
        values['packet-delay'],
        DEFAULT_OPTIONS.packetDelayMs
      ),
      adapter: values.adapter,
      wait: values.wait === true,
      verbose: values.verbose === true,
    },
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Lines printed when an update fails.
 */
export function formatFailure(
  error: unknown,
  options: Pick<CliOptions, 'prn' | 'startDelayMs'>
): string[] {
  if (!(error instanceof DfuError)) {
    return [`DFU failed: ${describeError(error)}`];
  }

  const lines = [
    error.stage ? `DFU failed at ${error.stage}: ${error.message}` : `DFU failed: ${error.message}`,
  ];
  if (!(error instanceof FirmwarePackageError)) {
    lines.push(
      `If this keeps happening, try a longer --delay (now ${options.startDelayMs / 1000}s) ` +
        `or a smaller --prn (now ${options.prn}).`
    );
  }
  return lines;
}
