/**
 * Correlates control point commands with their notification responses.
 *
 * The legacy protocol is strictly request/response: one command is
 * outstanding at a time and the next notification must answer it. Packet
 * receipts are the only interim notifications, and only while
 * RECEIVE_FIRMWARE_IMAGE is outstanding.
 */

import {
  DeviceRejectedError,
  DfuError,
  DfuTimeoutError,
  ProtocolError,
  TransportError,
} from '../exceptions';
import type { DfuLogger } from '../models/session';
import { DFU_CONTROL_POINT_UUID, OpCode } from '../protocol/constants';
import {
  describeNotification,
  isSuccess,
  notificationOpcode,
  parseNotification,
  type DfuNotification,
  type DfuResponse,
  type PacketReceipt,
} from '../protocol/responses';
import { NotificationQueue } from './notification-queue';
import type { DfuLink } from './types';

/**
 * A single write to the connected service.
 */
export interface DfuRequest {
  characteristic: string;
  data: Uint8Array;
  /** Write request rather than write command (default: true) */
  withResponse?: boolean;
  /** Name used when logging the write; unlabelled writes are not logged */
  label?: string;
}

function toHex(data: Uint8Array): string {
  return Buffer.from(data).toString('hex');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class ResponseWaiter {
  private readonly queue = new NotificationQueue<DfuNotification>();
  private outstanding: { opcode: number; label: string } | null = null;
  private cleanups: Array<() => void> = [];

  constructor(
    private readonly link: DfuLink,
    private readonly logger: DfuLogger
  ) {}

  /**
   * Op code of the command awaiting its response, if any.
   */
  get outstandingOpcode(): number | null {
    return this.outstanding?.opcode ?? null;
  }

  /**
   * Subscribe to control point notifications and watch for disconnection.
   */
  async start(): Promise<void> {
    this.cleanups.push(
      this.link.onDisconnect(() => {
        this.queue.clear('Device disconnected');
      })
    );
    this.cleanups.push(
      await this.link.subscribe(DFU_CONTROL_POINT_UUID, (data) => this.handleNotification(data))
    );
  }

  /**
   * Remove listeners and reject any pending wait.
   */
  stop(): void {
    for (const cleanup of this.cleanups) {
      cleanup();
    }
    this.cleanups = [];
    this.outstanding = null;
    this.queue.clear('Response waiter stopped');
  }

  /**
   * Write a request that expects no response of its own.
   *
   * Packets may be written while a command is outstanding; control point
   * commands may not.
   *
   * @throws {TransportError} If the write fails
   */
  async write(request: DfuRequest): Promise<void> {
    if (request.characteristic === DFU_CONTROL_POINT_UUID && this.outstanding) {
      throw new DfuError(
        `Cannot write ${request.label ?? toHex(request.data)} while ` +
          `${this.outstanding.label} is outstanding`
      );
    }
    await this.writeToLink(request);
  }

  /**
   * Write a command and mark it outstanding until its response is awaited.
   *
   * @param command - Name of the command in errors (default: op code name)
   * @throws {TransportError} If the write fails
   */
  async send(
    request: DfuRequest,
    expectedOpcode: number,
    command: string = OpCode[expectedOpcode] ?? `0x${expectedOpcode.toString(16)}`
  ): Promise<void> {
    if (this.outstanding) {
      throw new DfuError(`Cannot send ${command} while ${this.outstanding.label} is outstanding`);
    }

    this.queue.drain();
    this.outstanding = { opcode: expectedOpcode, label: command };

    try {
      await this.writeToLink(request);
    } catch (error) {
      this.outstanding = null;
      throw error;
    }
  }

  /**
   * Write a command and wait for the response echoing `expectedOpcode`.
   *
   * @throws {DfuTimeoutError} If no notification arrives in time
   * @throws {ProtocolError} If the notification answers another op code
   * @throws {DeviceRejectedError} If the device reports a failure
   * @throws {TransportError} If the write fails or the link drops
   */
  async sendAndAwait(
    request: DfuRequest,
    expectedOpcode: number,
    timeoutMs: number
  ): Promise<DfuResponse> {
    await this.send(request, expectedOpcode);
    return this.awaitResponse(timeoutMs);
  }

  /**
   * Wait for the response to the outstanding command, which is then resolved
   * whatever the outcome.
   */
  async awaitResponse(timeoutMs: number): Promise<DfuResponse> {
    const outstanding = this.requireOutstanding();

    try {
      const notification = await this.next(timeoutMs, () =>
        new DfuTimeoutError(outstanding.opcode, timeoutMs, outstanding.label)
      );

      if (notification.kind !== 'response' || notification.requestOpcode !== outstanding.opcode) {
        throw new ProtocolError(outstanding.opcode, notificationOpcode(notification));
      }
      if (!isSuccess(notification)) {
        throw new DeviceRejectedError(outstanding.opcode, notification.result, outstanding.label);
      }
      return notification;
    } finally {
      this.resolveOutstanding();
    }
  }

  /**
   * Wait for a packet receipt while the outstanding command stays open.
   *
   * Any other notification resolves the outstanding command as failed.
   */
  async awaitReceipt(timeoutMs: number): Promise<PacketReceipt> {
    const outstanding = this.requireOutstanding();

    let notification: DfuNotification;
    try {
      notification = await this.next(timeoutMs, () =>
        new DfuTimeoutError(OpCode.PACKET_RECEIPT_NOTIF, timeoutMs)
      );
    } catch (error) {
      this.resolveOutstanding();
      throw error;
    }

    if (notification.kind === 'receipt') {
      return notification;
    }

    this.resolveOutstanding();
    if (notification.requestOpcode === outstanding.opcode && !isSuccess(notification)) {
      throw new DeviceRejectedError(outstanding.opcode, notification.result, outstanding.label);
    }
    throw new ProtocolError(OpCode.PACKET_RECEIPT_NOTIF, notification.requestOpcode);
  }

  private requireOutstanding(): { opcode: number; label: string } {
    if (!this.outstanding) {
      throw new DfuError('No command is outstanding');
    }
    return this.outstanding;
  }

  private async next(timeoutMs: number, onTimeout: () => Error): Promise<DfuNotification> {
    if (!this.link.isConnected) {
      throw new TransportError('Device disconnected');
    }
    return this.queue.dequeue(timeoutMs, onTimeout);
  }

  private resolveOutstanding(): void {
    this.outstanding = null;
    const dropped = this.queue.drain();
    if (dropped > 0) {
      this.logger.warn(`Discarded ${dropped} notification(s) left after the response`);
    }
  }

  private async writeToLink(request: DfuRequest): Promise<void> {
    const withResponse = request.withResponse ?? true;
    if (request.label) {
      this.logger.debug(`>> TX ${request.label}: ${toHex(request.data)}`);
    }

    try {
      await this.link.write(request.characteristic, request.data, withResponse);
    } catch (error) {
      throw new TransportError(
        `Write to ${request.characteristic} failed: ${describeError(error)}`
      );
    }
  }

  private handleNotification(data: Uint8Array): void {
    let notification: DfuNotification;
    try {
      notification = parseNotification(data);
    } catch (error) {
      this.logger.warn(`Discarding malformed notification ${toHex(data)}: ${describeError(error)}`);
      return;
    }

    this.logger.debug(`<< RX ${describeNotification(notification)}`);

    if (!this.outstanding) {
      this.logger.warn(
        `Discarding ${describeNotification(notification)}: no command outstanding`
      );
      return;
    }
    this.queue.enqueue(notification);
  }
}
