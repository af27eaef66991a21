/**
 * Bootloader-mode steps of a legacy DFU transfer.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import {
  CrcOrCountMismatchError,
  DeviceRejectedError,
  DfuError,
  TransportError,
} from './exceptions';
import { chunkCount, chunks } from './encoding/chunker';
import type { FirmwarePackage } from './models/firmware';
import type { DfuLogger, ResolvedDfuOptions } from './models/session';
import {
  buildActivateAndResetCommand,
  buildImageSizePacket,
  buildInitParamsCommand,
  buildPacketReceiptRequest,
  buildReceiveFirmwareImageCommand,
  buildResetCommand,
  buildStartDfuCommand,
  buildValidateCommand,
} from './protocol/commands';
import {
  DFU_CONTROL_POINT_UUID,
  DFU_PACKET_UUID,
  InitPacketStep,
  OpCode,
} from './protocol/constants';
import { ResponseWaiter } from './transport/response-waiter';
import type { DfuLink } from './transport/types';

export type TransferOptions = Pick<
  ResolvedDfuOptions,
  | 'prn'
  | 'startDelayMs'
  | 'packetDelayMs'
  | 'packetSize'
  | 'responseTimeoutMs'
  | 'startTimeoutMs'
  | 'receiptTimeoutMs'
  | 'logger'
  | 'onProgress'
  | 'signal'
>;

/**
 * Drives the bootloader through one application update.
 *
 * Each method is one step and must be called in order:
 * start, sendSize, sendInitPacket, streamImage, awaitImageComplete,
 * validate, activate. Any rejection leaves the engine unusable.
 */
export class TransferEngine {
  private readonly waiter: ResponseWaiter;
  private readonly logger: DfuLogger;
  private readonly frameSize: number;
  private started = false;
  private _bytesSent = 0;
  private _receiptsChecked = 0;

  constructor(
    link: DfuLink,
    private readonly firmware: FirmwarePackage,
    private readonly options: TransferOptions
  ) {
    this.logger = options.logger;
    this.waiter = new ResponseWaiter(link, options.logger);
    this.frameSize = Math.min(options.packetSize, link.maxWriteSize);
  }

  /**
   * Image bytes written so far.
   */
  get bytesSent(): number {
    return this._bytesSent;
  }

  /**
   * Packet receipts awaited and verified so far.
   */
  get receiptsChecked(): number {
    return this._receiptsChecked;
  }

  /**
   * Subscribe to the control point and send START_DFU, then hold off for
   * `startDelayMs` so the bootloader can finish its setup.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new DfuError('Transfer already started');
    }
    this.started = true;
    await this.waiter.start();

    await this.waiter.write({
      characteristic: DFU_CONTROL_POINT_UUID,
      data: buildStartDfuCommand(),
      label: 'Start DFU',
    });

    if (this.options.startDelayMs > 0) {
      this.logger.debug(`Pausing ${this.options.startDelayMs}ms for device state switch...`);
      await sleep(this.options.startDelayMs, undefined, { signal: this.options.signal });
    }
  }

  /**
   * Send the image sizes and wait for START_DFU to be accepted.
   *
   * A rejected START_DFU is followed by a RESET so the bootloader does not
   * stay in its erase state. A timeout writes nothing further.
   */
  async sendSize(): Promise<void> {
    const size = this.firmware.image.length;
    this.logger.info(`Sending Size: ${size} bytes`);

    try {
      await this.waiter.sendAndAwait(
        {
          characteristic: DFU_PACKET_UUID,
          data: buildImageSizePacket(size),
          withResponse: false,
          label: 'Size',
        },
        OpCode.START_DFU,
        this.options.startTimeoutMs
      );
    } catch (error) {
      if (error instanceof DeviceRejectedError) {
        await this.resetAfterRejection(error);
      }
      throw error;
    }
  }

  private async resetAfterRejection(cause: DeviceRejectedError): Promise<void> {
    this.logger.warn(`Start DFU failed (${cause.message}). Resetting...`);
    try {
      await this.waiter.write({
        characteristic: DFU_CONTROL_POINT_UUID,
        data: buildResetCommand(),
        label: 'Reset',
      });
    } catch (error) {
      this.logger.debug(`Reset write failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Stream the init packet and wait for it to be accepted.
   */
  async sendInitPacket(): Promise<void> {
    this.logger.info('Sending Init Packet...');

    await this.waiter.write({
      characteristic: DFU_CONTROL_POINT_UUID,
      data: buildInitParamsCommand(InitPacketStep.RECEIVE),
      label: 'Init Start',
    });

    this.logger.debug(`>> TX Init Data: ${this.firmware.initData.length} bytes`);
    for (const chunk of chunks(this.firmware.initData, this.frameSize)) {
      await this.waiter.write({ characteristic: DFU_PACKET_UUID, data: chunk, withResponse: false });
    }

    await this.waiter.sendAndAwait(
      {
        characteristic: DFU_CONTROL_POINT_UUID,
        data: buildInitParamsCommand(InitPacketStep.COMPLETE),
        label: 'Init End',
      },
      OpCode.INIT_DFU_PARAMS,
      this.options.responseTimeoutMs
    );
  }

  /**
   * Configure packet receipts, open RECEIVE_FIRMWARE_IMAGE and stream the
   * image, checking the device's byte count every `prn` chunks.
   *
   * @throws {CrcOrCountMismatchError} If a receipt disagrees with bytesSent
   */
  async streamImage(): Promise<void> {
    const { prn, packetDelayMs, receiptTimeoutMs, onProgress, signal } = this.options;
    const image = this.firmware.image;

    if (prn > 0) {
      this.logger.info(`Configuring PRN: ${prn}`);
      await this.waiter.write({
        characteristic: DFU_CONTROL_POINT_UUID,
        data: buildPacketReceiptRequest(prn),
        label: 'PRN',
      });
    }

    this.logger.info('Requesting Upload...');
    await this.waiter.send(
      {
        characteristic: DFU_CONTROL_POINT_UUID,
        data: buildReceiveFirmwareImageCommand(),
        label: 'Receive FW',
      },
      OpCode.RECEIVE_FIRMWARE_IMAGE
    );

    const total = chunkCount(image.length, this.frameSize);
    this.logger.info(`Uploading ${image.length} bytes in ${total} packets...`);

    let packetsSinceReceipt = 0;
    let written = 0;
    for (const chunk of chunks(image, this.frameSize)) {
      if (written > 0 && packetDelayMs > 0) {
        await sleep(packetDelayMs, undefined, { signal });
      }

      await this.waiter.write({ characteristic: DFU_PACKET_UUID, data: chunk, withResponse: false });
      this._bytesSent += chunk.length;
      written++;
      packetsSinceReceipt++;
      onProgress?.(this._bytesSent, image.length);

      if (prn > 0 && packetsSinceReceipt >= prn) {
        const receipt = await this.waiter.awaitReceipt(receiptTimeoutMs);
        this._receiptsChecked++;
        if (receipt.bytesReceived !== this._bytesSent) {
          throw new CrcOrCountMismatchError(this._bytesSent, receipt.bytesReceived);
        }
        this.logger.debug(`Receipt OK: ${receipt.bytesReceived} bytes`);
        packetsSinceReceipt = 0;
      }
    }

    this.logger.debug(`All image packets sent (${written} packets total)`);
  }

  /**
   * Wait for the device to confirm the whole image arrived.
   */
  async awaitImageComplete(): Promise<void> {
    this.logger.info('Verifying Upload...');
    await this.waiter.awaitResponse(this.options.responseTimeoutMs);
  }

  /**
   * Ask the device to check the image CRC.
   */
  async validate(): Promise<void> {
    this.logger.info('Validating...');
    await this.waiter.sendAndAwait(
      {
        characteristic: DFU_CONTROL_POINT_UUID,
        data: buildValidateCommand(),
        label: 'Validate',
      },
      OpCode.VALIDATE,
      this.options.responseTimeoutMs
    );
  }

  /**
   * Activate the new image. The device resets, so a failed write or a
   * disconnect afterwards is the expected confirmation.
   */
  async activate(): Promise<void> {
    this.logger.info('Activating & Resetting...');
    try {
      await this.waiter.write({
        characteristic: DFU_CONTROL_POINT_UUID,
        data: buildActivateAndResetCommand(),
        label: 'Activate',
      });
    } catch (error) {
      if (!(error instanceof TransportError)) {
        throw error;
      }
      this.logger.debug(`Activate write ended with the device resetting: ${error.message}`);
    }
  }

  /**
   * Release listeners. Pending waits reject.
   */
  close(): void {
    this.waiter.stop();
  }
}
