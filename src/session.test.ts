import { describe, expect, it, vi } from 'vitest';
import {
  DeviceNotFoundError,
  DeviceRejectedError,
  DfuError,
  DfuTimeoutError,
  TransportError,
} from './exceptions';
import type { FirmwarePackage } from './models/firmware';
import { DfuState, type DfuOptions } from './models/session';
import { DFU_CONTROL_POINT_UUID, OpCode, ResultCode } from './protocol/constants';
import { DfuSession, performDfu } from './session';
import { RecordingLogger } from './testing/logger';
import { SimulatedDevice, SimulatedTransport, type SimulatedDeviceOptions } from './testing/simulated-device';

const FIRMWARE: FirmwarePackage = {
  image: Uint8Array.from({ length: 100 }, (_, i) => (i * 7) & 0xff),
  initData: Uint8Array.from({ length: 14 }, (_, i) => i),
};

function fastOptions(overrides: DfuOptions = {}): DfuOptions {
  return {
    prn: 2,
    startDelayMs: 0,
    rebootDelayMs: 0,
    responseTimeoutMs: 200,
    startTimeoutMs: 200,
    receiptTimeoutMs: 200,
    jumpTimeoutMs: 200,
    scanTimeoutMs: 100,
    scanWindowMs: 20,
    logger: new RecordingLogger(),
    ...overrides,
  };
}

function createDevice(overrides: Partial<SimulatedDeviceOptions> = {}): SimulatedDevice {
  return new SimulatedDevice({
    name: 'MyDevice',
    address: 'AA:BB:CC:DD:EE:01',
    bootloaderName: 'MyDeviceDfuTarg',
    bootloaderAddress: 'AA:BB:CC:DD:EE:02',
    ...overrides,
  });
}

describe('DfuSession', () => {
  it('updates a device end to end', async () => {
    const device = createDevice();
    const transport = new SimulatedTransport([device]);
    const onStateChange = vi.fn();
    const onProgress = vi.fn();
    const session = new DfuSession(
      transport,
      ['MyDevice'],
      FIRMWARE,
      fastOptions({ onStateChange, onProgress })
    );

    await session.run();

    expect(session.state).toBe(DfuState.Activated);
    expect(session.bytesSent).toBe(100);
    expect(onStateChange.mock.calls.map(([state]) => state)).toEqual([
      DfuState.AppConnected,
      DfuState.BootloaderJumpSent,
      DfuState.WaitingReboot,
      DfuState.BootloaderConnected,
      DfuState.DfuStarted,
      DfuState.SizeSent,
      DfuState.InitSent,
      DfuState.ImageStreaming,
      DfuState.ImageComplete,
      DfuState.Validated,
      DfuState.Activated,
    ]);
    expect(onStateChange.mock.calls[0]).toEqual([DfuState.AppConnected, DfuState.Idle]);
    expect(onProgress).toHaveBeenLastCalledWith(100, 100);

    expect(transport.connections.map((adv) => adv.address)).toEqual([
      'AA:BB:CC:DD:EE:01',
      'AA:BB:CC:DD:EE:02',
    ]);
    const [appLink, bootloaderLink] = device.links;
    expect(appLink.writesTo(DFU_CONTROL_POINT_UUID)).toEqual([[0x01, 0x04]]);
    expect(appLink.isConnected).toBe(false);
    expect(bootloaderLink.isConnected).toBe(false);
    expect(device.bootloader?.image).toEqual([...FIRMWARE.image]);
    expect(device.bootloader?.initData).toEqual([...FIRMWARE.initData]);
    expect(device.bootloader?.activated).toBe(true);
  });

  it('finds a silent bootloader at the incremented address', async () => {
    const device = createDevice({ jump: 'disconnect', bootloaderName: undefined });
    const transport = new SimulatedTransport([device]);

    await performDfu(transport, ['AA:BB:CC:DD:EE:01'], FIRMWARE, fastOptions());

    expect(device.bootloader?.activated).toBe(true);
    expect(transport.lookups).toEqual(['AA:BB:CC:DD:EE:01']);
  });

  it('stamps the failing stage and moves to Failed', async () => {
    const device = createDevice({
      bootloader: { results: { [OpCode.VALIDATE]: ResultCode.CRC_ERROR } },
    });
    const logger = new RecordingLogger();
    const onStateChange = vi.fn();
    const session = new DfuSession(
      new SimulatedTransport([device]),
      ['MyDevice'],
      FIRMWARE,
      fastOptions({ logger, onStateChange })
    );

    const error = await session.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeviceRejectedError);
    expect(error).toMatchObject({ stage: DfuState.Validated });
    expect(session.state).toBe(DfuState.Failed);
    expect(onStateChange).toHaveBeenLastCalledWith(DfuState.Failed, DfuState.ImageComplete);
    expect(logger.messages('error')).toEqual([
      'Failed reaching Validated: Device rejected VALIDATE: CRC_ERROR (5)',
    ]);
    expect(device.bootloader?.activated).toBe(false);
    expect(device.lastLink?.isConnected).toBe(false);
  });

  it('writes no further command after an unanswered VALIDATE', async () => {
    const device = createDevice({ bootloader: { silentOn: [OpCode.VALIDATE] } });
    const session = new DfuSession(
      new SimulatedTransport([device]),
      ['MyDevice'],
      FIRMWARE,
      fastOptions({ responseTimeoutMs: 30 })
    );

    const error = await session.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DfuTimeoutError);
    expect(error).toMatchObject({ stage: DfuState.Validated });
    expect(device.lastLink?.writesTo(DFU_CONTROL_POINT_UUID).at(-1)).toEqual([0x04]);
    expect(device.bootloader?.activated).toBe(false);
  });

  it('fails at AppConnected when the device is absent', async () => {
    const session = new DfuSession(new SimulatedTransport([]), ['MyDevice'], FIRMWARE, fastOptions());

    const error = await session.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeviceNotFoundError);
    expect(error).toMatchObject({ stage: DfuState.AppConnected });
    expect(session.state).toBe(DfuState.Failed);
  });

  it('fails at BootloaderConnected when no bootloader appears', async () => {
    const device = createDevice({
      bootloaderName: 'Unrelated',
      bootloaderAddress: '11:22:33:44:55:66',
      jump: 'disconnect',
    });
    const session = new DfuSession(new SimulatedTransport([device]), ['MyDevice'], FIRMWARE, fastOptions());

    const error = await session.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DeviceNotFoundError);
    expect(error).toMatchObject({ stage: DfuState.BootloaderConnected });
  });

  it('aborts between steps and releases the link', async () => {
    const device = createDevice();
    const controller = new AbortController();
    const onStateChange = (state: DfuState): void => {
      if (state === DfuState.BootloaderConnected) {
        controller.abort();
      }
    };
    const session = new DfuSession(
      new SimulatedTransport([device]),
      ['MyDevice'],
      FIRMWARE,
      fastOptions({ onStateChange, signal: controller.signal })
    );

    const error = await session.run().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(String(error)).toBe('TransportError: DFU aborted while reaching DfuStarted');
    expect(error).toMatchObject({ stage: DfuState.DfuStarted });
    expect(device.lastLink?.isConnected).toBe(false);
    expect(device.lastLink?.writes).toEqual([]);
  });

  it('cuts the reboot delay short when aborted', async () => {
    const device = createDevice();
    const controller = new AbortController();
    const onStateChange = (state: DfuState): void => {
      if (state === DfuState.BootloaderJumpSent) {
        setTimeout(() => controller.abort(), 20);
      }
    };
    const session = new DfuSession(
      new SimulatedTransport([device]),
      ['MyDevice'],
      FIRMWARE,
      fastOptions({ rebootDelayMs: 60_000, onStateChange, signal: controller.signal })
    );

    const error = await session.run().catch((e: unknown) => e);

    expect(String(error)).toBe('TransportError: DFU aborted while reaching WaitingReboot');
    expect(session.state).toBe(DfuState.Failed);
    expect(device.links).toHaveLength(1);
  });

  it('runs only once', async () => {
    const session = new DfuSession(
      new SimulatedTransport([createDevice()]),
      ['MyDevice'],
      FIRMWARE,
      fastOptions()
    );
    await session.run();
    await expect(session.run()).rejects.toThrow(new DfuError('A DFU session can only run once'));
  });

  it('validates its arguments', () => {
    const transport = new SimulatedTransport([]);
    expect(() => new DfuSession(transport, [], FIRMWARE)).toThrow(
      'At least one device identifier is required'
    );
    expect(() => new DfuSession(transport, ['MyDevice'], FIRMWARE, { prn: -1 })).toThrow(RangeError);
  });
});
