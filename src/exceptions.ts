/**
 * Exception classes for the legacy DFU library.
 */

import type { DfuState } from './models/session';
import { OpCode, ResultCode } from './protocol/constants';

function hex(value: number): string {
  return `0x${value.toString(16).padStart(2, '0')}`;
}

export class DfuError extends Error {
  /**
   * Session state in which the error escaped, filled in by the session.
   */
  stage?: DfuState;

  constructor(message: string) {
    super(message);
    this.name = 'DfuError';
  }
}

export class DeviceNotFoundError extends DfuError {
  constructor(message: string) {
    super(message);
    this.name = 'DeviceNotFoundError';
  }
}

export class DfuTimeoutError extends DfuError {
  constructor(
    readonly opcode: number,
    readonly timeoutMs: number,
    command: string = OpCode[opcode] ?? hex(opcode)
  ) {
    super(`No response to ${command} within ${timeoutMs}ms`);
    this.name = 'DfuTimeoutError';
  }
}

export class ProtocolError extends DfuError {
  constructor(
    readonly expected: number,
    readonly got: number,
    message?: string
  ) {
    super(message ?? `Unexpected response: expected ${hex(expected)}, got ${hex(got)}`);
    this.name = 'ProtocolError';
  }
}

export class CrcOrCountMismatchError extends DfuError {
  constructor(
    readonly expected: number,
    readonly received: number
  ) {
    super(`Device reported ${received} bytes received, ${expected} were sent`);
    this.name = 'CrcOrCountMismatchError';
  }
}

export class DeviceRejectedError extends DfuError {
  constructor(
    readonly opcode: number,
    readonly resultCode: number,
    command: string = OpCode[opcode] ?? hex(opcode)
  ) {
    super(
      `Device rejected ${command}: ` +
        `${ResultCode[resultCode] ?? 'UNKNOWN'} (${resultCode})`
    );
    this.name = 'DeviceRejectedError';
  }
}

export class TransportError extends DfuError {
  constructor(message: string) {
    super(message);
    this.name = 'TransportError';
  }
}

export class FirmwarePackageError extends DfuError {
  constructor(message: string) {
    super(message);
    this.name = 'FirmwarePackageError';
  }
}
