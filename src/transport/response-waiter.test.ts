import { beforeEach, describe, expect, it } from 'vitest';
import {
  DeviceRejectedError,
  DfuError,
  DfuTimeoutError,
  ProtocolError,
  TransportError,
} from '../exceptions';
import { DFU_CONTROL_POINT_UUID, DFU_PACKET_UUID, OpCode } from '../protocol/constants';
import { FakeLink } from '../testing/fake-link';
import { RecordingLogger } from '../testing/logger';
import { ResponseWaiter } from './response-waiter';

const validate = { characteristic: DFU_CONTROL_POINT_UUID, data: Uint8Array.of(0x04), label: 'Validate' };

describe('ResponseWaiter', () => {
  let link: FakeLink;
  let logger: RecordingLogger;
  let waiter: ResponseWaiter;

  beforeEach(async () => {
    link = new FakeLink();
    logger = new RecordingLogger();
    waiter = new ResponseWaiter(link, logger);
    await waiter.start();
  });

  it('resolves with the matching success response', async () => {
    link.setHandler(() => link.notify(DFU_CONTROL_POINT_UUID, [0x10, 0x04, 0x01]));
    const response = await waiter.sendAndAwait(validate, OpCode.VALIDATE, 100);
    expect(response).toEqual({ kind: 'response', requestOpcode: 0x04, result: 0x01 });
    expect(waiter.outstandingOpcode).toBeNull();
    expect(link.writes).toEqual([
      { characteristic: DFU_CONTROL_POINT_UUID, data: Uint8Array.of(0x04), withResponse: true },
    ]);
    expect(logger.messages('debug')).toEqual([
      '>> TX Validate: 04',
      '<< RX Resp op=VALIDATE status=SUCCESS',
    ]);
  });

  it('raises DeviceRejectedError for a failure status', async () => {
    link.setHandler(() => link.notify(DFU_CONTROL_POINT_UUID, [0x10, 0x04, 0x05]));
    const error = await waiter.sendAndAwait(validate, OpCode.VALIDATE, 100).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DeviceRejectedError);
    expect(error).toMatchObject({ opcode: 0x04, resultCode: 0x05 });
    expect(String(error)).toBe('DeviceRejectedError: Device rejected VALIDATE: CRC_ERROR (5)');
  });

  it('raises ProtocolError for a response to another command', async () => {
    link.setHandler(() => link.notify(DFU_CONTROL_POINT_UUID, [0x10, 0x03, 0x01]));
    const error = await waiter.sendAndAwait(validate, OpCode.VALIDATE, 100).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ expected: 0x04, got: 0x03 });
  });

  it('times out naming the command', async () => {
    const error = await waiter.sendAndAwait(validate, OpCode.VALIDATE, 20).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DfuTimeoutError);
    expect(String(error)).toBe('DfuTimeoutError: No response to VALIDATE within 20ms');
    expect(waiter.outstandingOpcode).toBeNull();
  });

  it('discards notifications arriving with nothing outstanding', async () => {
    link.notify(DFU_CONTROL_POINT_UUID, [0x10, 0x04, 0x01]);
    expect(logger.messages('warn')).toEqual([
      'Discarding Resp op=VALIDATE status=SUCCESS: no command outstanding',
    ]);
    await expect(waiter.sendAndAwait(validate, OpCode.VALIDATE, 20)).rejects.toThrow(DfuTimeoutError);
  });

  it('discards malformed notifications', async () => {
    link.setHandler(() => {
      link.notify(DFU_CONTROL_POINT_UUID, [0x10]);
      link.notify(DFU_CONTROL_POINT_UUID, [0x10, 0x04, 0x01]);
    });
    await expect(waiter.sendAndAwait(validate, OpCode.VALIDATE, 100)).resolves.toMatchObject({
      result: 0x01,
    });
    expect(logger.messages('warn')).toEqual([
      'Discarding malformed notification 10: Response too short: 1 bytes (need 3)',
    ]);
  });

  it('rejects the pending wait when the link drops', async () => {
    await waiter.send(validate, OpCode.VALIDATE);
    const pending = waiter.awaitResponse(1000);
    link.drop();
    await expect(pending).rejects.toThrow(new TransportError('Device disconnected'));
  });

  it('fails fast once the link is down', async () => {
    await waiter.send(validate, OpCode.VALIDATE);
    link.drop();
    await expect(waiter.awaitResponse(1000)).rejects.toThrow('Device disconnected');
  });

  it('wraps write failures in TransportError and clears the command', async () => {
    link.setHandler(() => {
      throw new Error('GATT busy');
    });
    await expect(waiter.send(validate, OpCode.VALIDATE)).rejects.toThrow(
      `Write to ${DFU_CONTROL_POINT_UUID} failed: GATT busy`
    );
    expect(waiter.outstandingOpcode).toBeNull();
  });

  it('refuses a second control point command while one is outstanding', async () => {
    await waiter.send(validate, OpCode.VALIDATE);
    expect(waiter.outstandingOpcode).toBe(OpCode.VALIDATE);
    await expect(
      waiter.write({ characteristic: DFU_CONTROL_POINT_UUID, data: Uint8Array.of(0x05), label: 'Activate' })
    ).rejects.toThrow('Cannot write Activate while VALIDATE is outstanding');
    await expect(waiter.send(validate, OpCode.VALIDATE)).rejects.toThrow(DfuError);
  });

  it('allows packet writes while a command is outstanding', async () => {
    await waiter.send(
      { characteristic: DFU_CONTROL_POINT_UUID, data: Uint8Array.of(0x03) },
      OpCode.RECEIVE_FIRMWARE_IMAGE
    );
    await waiter.write({ characteristic: DFU_PACKET_UUID, data: Uint8Array.of(1, 2), withResponse: false });
    expect(link.writes[1]).toEqual({
      characteristic: DFU_PACKET_UUID,
      data: Uint8Array.of(1, 2),
      withResponse: false,
    });
  });

  describe('receipts', () => {
    beforeEach(async () => {
      await waiter.send(
        { characteristic: DFU_CONTROL_POINT_UUID, data: Uint8Array.of(0x03) },
        OpCode.RECEIVE_FIRMWARE_IMAGE
      );
    });

    it('returns receipts and keeps the command outstanding', async () => {
      link.notify(DFU_CONTROL_POINT_UUID, [0x11, 0x28, 0x00, 0x00, 0x00]);
      await expect(waiter.awaitReceipt(100)).resolves.toEqual({ kind: 'receipt', bytesReceived: 40 });
      expect(waiter.outstandingOpcode).toBe(OpCode.RECEIVE_FIRMWARE_IMAGE);
    });

    it('raises DeviceRejectedError when the command fails instead', async () => {
      link.notify(DFU_CONTROL_POINT_UUID, [0x10, 0x03, 0x06]);
      await expect(waiter.awaitReceipt(100)).rejects.toThrow(
        'Device rejected RECEIVE_FIRMWARE_IMAGE: OPERATION_FAILED (6)'
      );
      expect(waiter.outstandingOpcode).toBeNull();
    });

    it('raises ProtocolError for a premature success', async () => {
      link.notify(DFU_CONTROL_POINT_UUID, [0x10, 0x03, 0x01]);
      await expect(waiter.awaitReceipt(100)).rejects.toBeInstanceOf(ProtocolError);
    });

    it('times out as a missing receipt', async () => {
      await expect(waiter.awaitReceipt(20)).rejects.toThrow(
        'No response to PACKET_RECEIPT_NOTIF within 20ms'
      );
      expect(waiter.outstandingOpcode).toBeNull();
    });

    it('rejects a response wait answered by a receipt', async () => {
      link.notify(DFU_CONTROL_POINT_UUID, [0x11, 0x14, 0x00, 0x00, 0x00]);
      const error = await waiter.awaitResponse(100).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({ expected: 0x03, got: 0x11 });
    });
  });

  it('stops listening after stop', async () => {
    expect(link.subscriberCount(DFU_CONTROL_POINT_UUID)).toBe(1);
    waiter.stop();
    expect(link.subscriberCount(DFU_CONTROL_POINT_UUID)).toBe(0);
  });
});
