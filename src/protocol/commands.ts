/**
 * Legacy DFU command builders.
 */

import {
  ButtonlessOpCode,
  InitPacketStep,
  MAX_PRN_INTERVAL,
  OpCode,
  SIZE_PACKET_LENGTH,
  UploadMode,
} from './constants';

/**
 * Build the command asking an application-mode device to reboot into its bootloader.
 *
 * @returns Command bytes: [0x01, 0x04]
 */
export function buildEnterBootloaderCommand(): Uint8Array {
  return Uint8Array.of(ButtonlessOpCode.ENTER_BOOTLOADER, UploadMode.APPLICATION);
}

/**
 * Build START_DFU for an application-only update.
 *
 * The device answers only after the size packet that follows it.
 *
 * @returns Command bytes: [0x01, 0x04]
 */
export function buildStartDfuCommand(): Uint8Array {
  return Uint8Array.of(OpCode.START_DFU, UploadMode.APPLICATION);
}

/**
 * Build the image size packet written to the packet characteristic after START_DFU.
 *
 * Format:
 *   [softdevice:4][bootloader:4][application:4], all little-endian uint32
 */
export function buildImageSizePacket(
  applicationSize: number,
  softdeviceSize: number = 0,
  bootloaderSize: number = 0
): Uint8Array {
  const buffer = new ArrayBuffer(SIZE_PACKET_LENGTH);
  const view = new DataView(buffer);
  view.setUint32(0, softdeviceSize, true);
  view.setUint32(4, bootloaderSize, true);
  view.setUint32(8, applicationSize, true);
  return new Uint8Array(buffer);
}

/**
 * Build INIT_DFU_PARAMS.
 *
 * @param step - RECEIVE before the init packet is streamed, COMPLETE after it
 * @returns Command bytes: [0x02, step]
 */
export function buildInitParamsCommand(step: InitPacketStep): Uint8Array {
  return Uint8Array.of(OpCode.INIT_DFU_PARAMS, step);
}

/**
 * Build the packet receipt notification request.
 *
 * Format:
 *   [0x08][interval:2LE]
 *
 * @throws {RangeError} If interval is not a uint16
 */
export function buildPacketReceiptRequest(interval: number): Uint8Array {
  if (!Number.isInteger(interval) || interval < 0 || interval > MAX_PRN_INTERVAL) {
    throw new RangeError(`PRN interval ${interval} outside 0..${MAX_PRN_INTERVAL}`);
  }

  const buffer = new ArrayBuffer(3);
  const view = new DataView(buffer);
  view.setUint8(0, OpCode.PACKET_RECEIPT_NOTIF_REQ);
  view.setUint16(1, interval, true);
  return new Uint8Array(buffer);
}

export function buildReceiveFirmwareImageCommand(): Uint8Array {
  return Uint8Array.of(OpCode.RECEIVE_FIRMWARE_IMAGE);
}

export function buildValidateCommand(): Uint8Array {
  return Uint8Array.of(OpCode.VALIDATE);
}

export function buildActivateAndResetCommand(): Uint8Array {
  return Uint8Array.of(OpCode.ACTIVATE_AND_RESET);
}

export function buildResetCommand(): Uint8Array {
  return Uint8Array.of(OpCode.RESET);
}
