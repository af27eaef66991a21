/**
 * Simulated device switching from its application to a legacy bootloader,
 * and a transport serving such devices without a radio.
 */

import { TransportError } from '../exceptions';
import {
  ButtonlessOpCode,
  DFU_CONTROL_POINT_UUID,
  OpCode,
  ResultCode,
} from '../protocol/constants';
import type { Advertisement, DfuLink, DfuTransport, ScanFilter } from '../transport/types';
import { FakeLink } from './fake-link';
import { LegacyBootloaderSimulator, type BootloaderBehaviour } from './legacy-bootloader';

/**
 * How the application reacts to the jump command.
 *
 * - respond: answers success and keeps the link up
 * - disconnect: drops the link after accepting the write
 * - fail-write: drops the link while the write is in flight
 * - reject: answers OPERATION_FAILED and stays in its application
 * - silent: ignores the command
 */
export type JumpBehaviour = 'respond' | 'disconnect' | 'fail-write' | 'reject' | 'silent';

export interface SimulatedDeviceOptions {
  name?: string;
  address: string;
  /** Name advertised by the bootloader; omitted means no name */
  bootloaderName?: string;
  /** Default: the application address */
  bootloaderAddress?: string;
  bootloaderServiceUuids?: string[];
  jump?: JumpBehaviour;
  bootloader?: BootloaderBehaviour;
  maxWriteSize?: number;
}

export class SimulatedDevice {
  mode: 'application' | 'bootloader' = 'application';
  readonly links: FakeLink[] = [];
  bootloader: LegacyBootloaderSimulator | null = null;

  constructor(private readonly options: SimulatedDeviceOptions) {}

  get advertisement(): Advertisement {
    if (this.mode === 'application') {
      return { address: this.options.address, name: this.options.name, serviceUuids: [] };
    }
    return {
      address: this.options.bootloaderAddress ?? this.options.address,
      name: this.options.bootloaderName,
      serviceUuids: this.options.bootloaderServiceUuids ?? [],
    };
  }

  /**
   * The link most recently opened to this device.
   */
  get lastLink(): FakeLink | null {
    return this.links.length > 0 ? this.links[this.links.length - 1] : null;
  }

  connect(): FakeLink {
    const link = new FakeLink(this.options.maxWriteSize);
    this.links.push(link);
    if (this.mode === 'application') {
      link.setHandler((write) => {
        if (write.characteristic === DFU_CONTROL_POINT_UUID) {
          this.handleJump(link);
        }
      });
    } else {
      this.bootloader = new LegacyBootloaderSimulator(link, this.options.bootloader);
    }
    return link;
  }

  private handleJump(link: FakeLink): void {
    switch (this.options.jump ?? 'respond') {
      case 'respond':
        this.mode = 'bootloader';
        link.notify(DFU_CONTROL_POINT_UUID, [
          OpCode.RESPONSE,
          ButtonlessOpCode.ENTER_BOOTLOADER,
          ResultCode.SUCCESS,
        ]);
        break;
      case 'disconnect':
        this.mode = 'bootloader';
        link.drop();
        break;
      case 'fail-write':
        this.mode = 'bootloader';
        link.drop();
        throw new Error('Connection reset by peer');
      case 'reject':
        link.notify(DFU_CONTROL_POINT_UUID, [
          OpCode.RESPONSE,
          ButtonlessOpCode.ENTER_BOOTLOADER,
          ResultCode.OPERATION_FAILED,
        ]);
        break;
      case 'silent':
        break;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Transport over simulated devices. A scan that finds nothing takes its
 * whole window, as a radio scan would.
 */
export class SimulatedTransport implements DfuTransport {
  readonly scans: number[] = [];
  readonly lookups: string[] = [];
  readonly connections: Advertisement[] = [];

  constructor(readonly devices: SimulatedDevice[]) {}

  async scan(filter: ScanFilter, timeoutMs: number): Promise<Advertisement | null> {
    this.scans.push(timeoutMs);
    const match = this.devices.map((device) => device.advertisement).find(filter);
    if (match) {
      return match;
    }
    await sleep(timeoutMs);
    return null;
  }

  async lookup(address: string): Promise<Advertisement | null> {
    this.lookups.push(address);
    const device = this.find(address);
    return device ? device.advertisement : null;
  }

  async connect(device: Advertisement): Promise<DfuLink> {
    this.connections.push(device);
    const target = this.find(device.address);
    if (!target) {
      throw new TransportError(`Failed to connect: ${device.address} is not advertising`);
    }
    return target.connect();
  }

  private find(address: string): SimulatedDevice | undefined {
    return this.devices.find(
      (device) => device.advertisement.address.toUpperCase() === address.toUpperCase()
    );
  }
}
