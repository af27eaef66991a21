/**
 * Control point notification parsing.
 */

import { ProtocolError } from '../exceptions';
import { OpCode, ResultCode } from './constants';

/**
 * Response to a control point command.
 *
 * Format: [0x10][requestOpcode:1][result:1]
 */
export interface DfuResponse {
  kind: 'response';
  requestOpcode: number;
  result: ResultCode | number;
}

/**
 * Packet receipt notification carrying the cumulative image byte count.
 *
 * Format: [0x11][bytesReceived:4LE]
 */
export interface PacketReceipt {
  kind: 'receipt';
  bytesReceived: number;
}

export type DfuNotification = DfuResponse | PacketReceipt;

/**
 * Parse a control point notification.
 *
 * @throws {ProtocolError} If the notification is short or of an unknown kind
 */
export function parseNotification(data: Uint8Array): DfuNotification {
  if (data.length === 0) {
    throw new ProtocolError(OpCode.RESPONSE, -1, 'Empty notification');
  }

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const opcode = view.getUint8(0);

  switch (opcode) {
    case OpCode.RESPONSE:
      if (data.length < 3) {
        throw new ProtocolError(
          OpCode.RESPONSE,
          opcode,
          `Response too short: ${data.length} bytes (need 3)`
        );
      }
      return {
        kind: 'response',
        requestOpcode: view.getUint8(1),
        result: view.getUint8(2),
      };

    case OpCode.PACKET_RECEIPT_NOTIF:
      if (data.length < 5) {
        throw new ProtocolError(
          OpCode.PACKET_RECEIPT_NOTIF,
          opcode,
          `Packet receipt too short: ${data.length} bytes (need 5)`
        );
      }
      return {
        kind: 'receipt',
        bytesReceived: view.getUint32(1, true),
      };

    default:
      throw new ProtocolError(
        OpCode.RESPONSE,
        opcode,
        `Unknown notification 0x${opcode.toString(16).padStart(2, '0')}`
      );
  }
}

/**
 * Op code a notification is keyed by when matched against the outstanding command.
 */
export function notificationOpcode(notification: DfuNotification): number {
  return notification.kind === 'response'
    ? notification.requestOpcode
    : OpCode.PACKET_RECEIPT_NOTIF;
}

export function isSuccess(response: DfuResponse): boolean {
  return response.result === ResultCode.SUCCESS;
}

export function describeNotification(notification: DfuNotification): string {
  if (notification.kind === 'receipt') {
    return `PRN ${notification.bytesReceived}`;
  }
  const op = OpCode[notification.requestOpcode] ?? notification.requestOpcode;
  const result = ResultCode[notification.result] ?? notification.result;
  return `Resp op=${op} status=${result}`;
}
