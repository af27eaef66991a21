/**
 * `legacy-dfu` command.
 */

import type { DfuOptions } from '../models/session';
import { loadFirmwarePackage } from '../package/firmware-package';
import { performDfu } from '../session';
import { NodeBleTransport, type NodeBleTransportOptions } from '../transport/node-ble';
import type { DfuTransport } from '../transport/types';
import { formatFailure, parseCliArgs, UsageError, USAGE, type CliCommand } from './args';
import { createCliLogger, type LogSink } from './logger';
import { createProgressReporter } from './progress';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * A transport the command owns and closes when done.
 */
export interface CliTransport extends DfuTransport {
  close(): void;
}

export interface CliDependencies {
  createTransport?: (options: NodeBleTransportOptions) => CliTransport;
  /** Receives progress output */
  stdout?: (text: string) => void;
  sink?: LogSink;
  now?: () => Date;
  /** Applied over the options built from the command line */
  sessionOptions?: DfuOptions;
}

/**
 * Run the command.
 *
 * @returns Process exit code
 */
export async function main(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const sink = deps.sink ?? console;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    if (!(error instanceof UsageError)) {
      throw error;
    }
    sink.error(`Error: ${error.message}`);
    sink.error(USAGE);
    return EXIT_USAGE;
  }

  if (command.kind === 'help') {
    sink.log(USAGE);
    return EXIT_OK;
  }

  const { options } = command;
  const logger = createCliLogger({ verbose: options.verbose, now: deps.now, sink });
  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  let transport: CliTransport | null = null;
  try {
    const firmware = await loadFirmwarePackage(options.file);
    logger.info(
      `Loaded ${options.file}: ${firmware.image.length} byte image, ` +
        `${firmware.initData.length} byte init packet`
    );

    const createTransport = deps.createTransport ?? ((o: NodeBleTransportOptions) => new NodeBleTransport(o));
    transport = createTransport({ adapter: options.adapter, logger });

    await performDfu(transport, options.devices, firmware, {
      prn: options.prn,
      startDelayMs: options.startDelayMs,
      packetDelayMs: options.packetDelayMs,
      forceScan: options.forceScan,
      wait: options.wait,
      logger,
      onProgress: createProgressReporter(stdout),
      signal: controller.signal,
      ...deps.sessionOptions,
    });
    return EXIT_OK;
  } catch (error) {
    for (const line of formatFailure(error, options)) {
      logger.error(line);
    }
    return EXIT_FAILURE;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    transport?.close();
  }
}
