/**
 * BlueZ transport built on node-ble.
 *
 * Provides the DFU core with:
 * - Device discovery through the adapter's device list
 * - GATT connection to one service
 * - Characteristic writes and notifications
 * - Disconnect reporting
 */

import {
  createBluetooth,
  type Adapter,
  type Bluetooth,
  type Device,
  type GattCharacteristic,
  type GattService,
} from 'node-ble';
import { TransportError } from '../exceptions';
import type { DfuLogger } from '../models/session';
import { DEFAULT_PACKET_SIZE } from '../protocol/constants';
import type { Advertisement, DfuLink, DfuTransport, ScanFilter } from './types';

const POLL_INTERVAL_MS = 500;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Options for the BlueZ transport.
 */
export interface NodeBleTransportOptions {
  /**
   * Adapter name (e.g. "hci0"); the default adapter when omitted
   */
  adapter?: string;

  logger?: DfuLogger;
}

/**
 * GATT connection to one device's service.
 */
class NodeBleLink implements DfuLink {
  readonly maxWriteSize = DEFAULT_PACKET_SIZE;
  private connected = true;
  private readonly characteristics = new Map<string, GattCharacteristic>();
  private readonly disconnectListeners = new Set<() => void>();
  private readonly handleDisconnect = (): void => {
    if (!this.connected) {
      return;
    }
    this.connected = false;
    this.logger.debug('Device disconnected');
    for (const listener of [...this.disconnectListeners]) {
      listener();
    }
  };

  constructor(
    private readonly device: Device,
    private readonly service: GattService,
    private readonly logger: DfuLogger
  ) {
    device.on('disconnect', this.handleDisconnect);
  }

  get isConnected(): boolean {
    return this.connected;
  }

  async write(characteristic: string, data: Uint8Array, withResponse: boolean): Promise<void> {
    if (!this.connected) {
      throw new TransportError('Not connected to device');
    }
    const char = await this.characteristic(characteristic);
    await char.writeValue(Buffer.from(data), { type: withResponse ? 'request' : 'command' });
  }

  async subscribe(
    characteristic: string,
    onNotify: (data: Uint8Array) => void
  ): Promise<() => void> {
    const char = await this.characteristic(characteristic);
    const listener = (buffer: Buffer): void => {
      onNotify(new Uint8Array(buffer));
    };
    char.on('valuechanged', listener);
    await char.startNotifications();

    return () => {
      char.removeListener('valuechanged', listener);
    };
  }

  onDisconnect(listener: () => void): () => void {
    this.disconnectListeners.add(listener);
    return () => {
      this.disconnectListeners.delete(listener);
    };
  }

  async disconnect(): Promise<void> {
    try {
      for (const char of this.characteristics.values()) {
        char.removeAllListeners('valuechanged');
      }
      if (this.connected) {
        await this.device.disconnect();
      }
    } finally {
      this.handleDisconnect();
      this.device.removeListener('disconnect', this.handleDisconnect);
      this.characteristics.clear();
    }
  }

  private async characteristic(uuid: string): Promise<GattCharacteristic> {
    const cached = this.characteristics.get(uuid);
    if (cached) {
      return cached;
    }
    try {
      const char = await this.service.getCharacteristic(uuid);
      this.characteristics.set(uuid, char);
      return char;
    } catch (error) {
      throw new TransportError(`Characteristic ${uuid} not found: ${describeError(error)}`);
    }
  }
}

/**
 * DFU transport for Linux hosts running BlueZ.
 *
 * Holds a D-Bus connection; call `close()` when done so the process can exit.
 */
export class NodeBleTransport implements DfuTransport {
  private readonly bluetooth: Bluetooth;
  private readonly destroy: () => void;
  private adapter: Adapter | null = null;
  private readonly logger: DfuLogger;

  constructor(private readonly options: NodeBleTransportOptions = {}) {
    const { bluetooth, destroy } = createBluetooth();
    this.bluetooth = bluetooth;
    this.destroy = destroy;
    this.logger = options.logger ?? console;
  }

  /**
   * Poll the adapter's device list until a device heard during this
   * discovery passes `filter`.
   */
  async scan(filter: ScanFilter, timeoutMs: number): Promise<Advertisement | null> {
    return this.whileDiscovering(async (adapter) => {
      const deadline = Date.now() + timeoutMs;
      for (;;) {
        for (const address of await adapter.devices()) {
          const device = await adapter.getDevice(address);
          if (!(await this.isAdvertising(device))) {
            continue;
          }
          const advertisement = await this.describe(device, address);
          if (filter(advertisement)) {
            return advertisement;
          }
        }
        if (Date.now() + POLL_INTERVAL_MS > deadline) {
          return null;
        }
        await sleep(POLL_INTERVAL_MS);
      }
    });
  }

  async lookup(address: string, timeoutMs: number): Promise<Advertisement | null> {
    const target = address.toUpperCase();
    return this.whileDiscovering(async (adapter) => {
      const deadline = Date.now() + timeoutMs;
      let device: Device;
      try {
        device = await adapter.waitDevice(target, timeoutMs);
      } catch (error) {
        this.logger.debug(`Direct lookup of ${target} failed: ${describeError(error)}`);
        return null;
      }
      while (!(await this.isAdvertising(device))) {
        if (Date.now() + POLL_INTERVAL_MS > deadline) {
          this.logger.debug(`Direct lookup of ${target} failed: not advertising`);
          return null;
        }
        await sleep(POLL_INTERVAL_MS);
      }
      return this.describe(device, target);
    });
  }

  async connect(device: Advertisement, serviceUuid: string): Promise<DfuLink> {
    const adapter = await this.getAdapter();
    let target: Device | null = null;
    try {
      target = await adapter.getDevice(device.address);
      await target.connect();
      const gatt = await target.gatt();
      const service = await gatt.getPrimaryService(serviceUuid);
      this.logger.debug(`Connected to ${device.name ?? device.address}`);
      return new NodeBleLink(target, service, this.logger);
    } catch (error) {
      if (target) {
        await target.disconnect().catch((cleanupError: unknown) => {
          this.logger.debug(`Cleanup disconnect failed: ${describeError(cleanupError)}`);
        });
      }
      throw new TransportError(`Failed to connect: ${describeError(error)}`);
    }
  }

  /**
   * Release the D-Bus connection.
   */
  close(): void {
    this.destroy();
  }

  private async getAdapter(): Promise<Adapter> {
    if (!this.adapter) {
      try {
        this.adapter = this.options.adapter
          ? await this.bluetooth.getAdapter(this.options.adapter)
          : await this.bluetooth.defaultAdapter();
      } catch (error) {
        throw new TransportError(`Bluetooth adapter unavailable: ${describeError(error)}`);
      }
    }
    return this.adapter;
  }

  private async whileDiscovering<T>(run: (adapter: Adapter) => Promise<T>): Promise<T> {
    const adapter = await this.getAdapter();
    if (!(await adapter.isDiscovering())) {
      await adapter.startDiscovery();
    }
    try {
      return await run(adapter);
    } finally {
      if (await adapter.isDiscovering()) {
        await adapter.stopDiscovery();
      }
    }
  }

  /**
   * BlueZ keeps devices it has seen before in its list, but only holds an
   * RSSI for those heard since discovery started.
   */
  private async isAdvertising(device: Device): Promise<boolean> {
    return device.getRSSI().then(
      () => true,
      () => false
    );
  }

  /**
   * Service UUIDs are taken from the advertised service data only; a device
   * listing the DFU service solely among its advertised UUIDs is not matched
   * by UUID, only by name or address.
   */
  private async describe(device: Device, address: string): Promise<Advertisement> {
    // BlueZ omits Name and ServiceData for devices that did not advertise them
    const name = await device.getName().catch(() => undefined);
    const serviceData = await device.getServiceData().catch(() => ({}));
    return {
      address: address.toUpperCase(),
      name,
      serviceUuids: Object.keys(serviceData).map((uuid) => uuid.toLowerCase()),
    };
  }
}
