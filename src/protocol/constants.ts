/**
 * BLE protocol constants for the legacy (unsigned) DFU bootloader.
 */

export const DFU_SERVICE_UUID = '00001530-1212-efde-1523-785feabcd123';
export const DFU_CONTROL_POINT_UUID = '00001531-1212-efde-1523-785feabcd123';
export const DFU_PACKET_UUID = '00001532-1212-efde-1523-785feabcd123';
export const DFU_VERSION_UUID = '00001534-1212-efde-1523-785feabcd123';

// Chunking constants
export const DEFAULT_PACKET_SIZE = 20; // ATT MTU 23 minus 3 bytes of header
export const SIZE_PACKET_LENGTH = 12; // softdevice, bootloader, application (u32 LE each)
export const MAX_PRN_INTERVAL = 0xffff;

/**
 * Control point op codes, as written by the client or echoed by the device.
 */
export enum OpCode {
  START_DFU = 0x01,
  INIT_DFU_PARAMS = 0x02,
  RECEIVE_FIRMWARE_IMAGE = 0x03,
  VALIDATE = 0x04,
  ACTIVATE_AND_RESET = 0x05,
  RESET = 0x06,
  PACKET_RECEIPT_NOTIF_REQ = 0x08,

  // Device -> client
  RESPONSE = 0x10,
  PACKET_RECEIPT_NOTIF = 0x11,
}

/**
 * Op codes understood by the DFU service of a device running its application.
 */
export enum ButtonlessOpCode {
  ENTER_BOOTLOADER = 0x01,
}

/**
 * Image types carried by START_DFU. Only application updates are sent.
 */
export enum UploadMode {
  SOFTDEVICE = 0x01,
  BOOTLOADER = 0x02,
  APPLICATION = 0x04,
}

/**
 * Parameter of INIT_DFU_PARAMS.
 */
export enum InitPacketStep {
  RECEIVE = 0x00,
  COMPLETE = 0x01,
}

/**
 * Result codes in a control point response.
 */
export enum ResultCode {
  SUCCESS = 0x01,
  INVALID_STATE = 0x02,
  NOT_SUPPORTED = 0x03,
  DATA_SIZE_EXCEEDS_LIMIT = 0x04,
  CRC_ERROR = 0x05,
  OPERATION_FAILED = 0x06,
}
