/**
 * Buttonless jump: switch an application-mode device into its bootloader.
 */

import { DfuTimeoutError, TransportError } from './exceptions';
import type { DfuLogger } from './models/session';
import { buildEnterBootloaderCommand } from './protocol/commands';
import { ButtonlessOpCode, DFU_CONTROL_POINT_UUID } from './protocol/constants';
import { ResponseWaiter } from './transport/response-waiter';
import type { DfuLink } from './transport/types';

/**
 * How the device acknowledged the jump. Both count as success.
 */
export type JumpOutcome = 'response' | 'disconnected';

const JUMP_LABEL = 'ENTER_BOOTLOADER';

/**
 * Resolve once the link drops, or reject after `timeoutMs`.
 */
function waitForDisconnect(link: DfuLink, timeoutMs: number): Promise<JumpOutcome> {
  return new Promise<JumpOutcome>((resolve, reject) => {
    if (!link.isConnected) {
      resolve('disconnected');
      return;
    }
    const timer = setTimeout(() => {
      removeListener();
      reject(new DfuTimeoutError(ButtonlessOpCode.ENTER_BOOTLOADER, timeoutMs, JUMP_LABEL));
    }, timeoutMs);
    const removeListener = link.onDisconnect(() => {
      clearTimeout(timer);
      removeListener();
      resolve('disconnected');
    });
  });
}

/**
 * Command the device to reboot into its bootloader.
 *
 * Firmware variants either answer the jump opcode or reset without a word;
 * both outcomes resolve. The link is left for the caller to release.
 *
 * @param link - Connection to the device's DFU service in application mode
 * @param options.timeoutMs - Bound for the response or the disconnect
 * @throws {DeviceRejectedError} If the device answers with a failure
 * @throws {DfuTimeoutError} If the device neither answers nor disconnects
 */
export async function jumpToBootloader(
  link: DfuLink,
  options: { timeoutMs: number; logger: DfuLogger }
): Promise<JumpOutcome> {
  const { timeoutMs, logger } = options;
  const waiter = new ResponseWaiter(link, logger);
  await waiter.start();

  try {
    try {
      await waiter.send(
        {
          characteristic: DFU_CONTROL_POINT_UUID,
          data: buildEnterBootloaderCommand(),
          label: 'Jump',
        },
        ButtonlessOpCode.ENTER_BOOTLOADER,
        JUMP_LABEL
      );
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      // Devices that reset while handling the write fail it
      logger.debug(`Jump write did not complete: ${error.message}`);
      return await waitForDisconnect(link, timeoutMs);
    }

    logger.info('Jump command sent.');

    return await waiter.awaitResponse(timeoutMs).then(
      (): JumpOutcome => 'response',
      (error: unknown): JumpOutcome => {
        if (error instanceof TransportError && !link.isConnected) {
          return 'disconnected';
        }
        throw error;
      }
    );
  } finally {
    waiter.stop();
  }
}
