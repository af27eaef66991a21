/**
 * Transport interfaces consumed by the DFU core.
 *
 * The radio side (scanning, connecting, GATT access) lives behind these so the
 * protocol can run against BlueZ, another stack, or an in-process simulator.
 */

/**
 * A device seen while scanning.
 */
export interface Advertisement {
  /** BLE address, upper case with colons where the stack provides one */
  address: string;
  /** Advertised local name, if any */
  name?: string;
  /** Service UUIDs seen in the advertisement, lower case */
  serviceUuids: string[];
}

export type ScanFilter = (advertisement: Advertisement) => boolean;

/**
 * An open GATT connection to one device.
 */
export interface DfuLink {
  /** Largest payload a single write may carry */
  readonly maxWriteSize: number;

  readonly isConnected: boolean;

  /**
   * Write to a characteristic of the connected service.
   *
   * @param withResponse - Use a write request instead of a write command
   */
  write(characteristic: string, data: Uint8Array, withResponse: boolean): Promise<void>;

  /**
   * Enable notifications on a characteristic.
   *
   * @returns Function removing the listener
   */
  subscribe(characteristic: string, onNotify: (data: Uint8Array) => void): Promise<() => void>;

  /**
   * Listen for the link going down, whoever initiated it.
   *
   * @returns Function removing the listener
   */
  onDisconnect(listener: () => void): () => void;

  disconnect(): Promise<void>;
}

export interface DfuTransport {
  /**
   * Scan until a device passes `filter` or the timeout expires.
   *
   * @returns The first matching device, or null
   */
  scan(filter: ScanFilter, timeoutMs: number): Promise<Advertisement | null>;

  /**
   * Resolve a known address without a full scan.
   *
   * @returns The device, or null when the stack does not know it
   */
  lookup(address: string, timeoutMs: number): Promise<Advertisement | null>;

  /**
   * Connect and resolve the given service.
   */
  connect(device: Advertisement, serviceUuid: string): Promise<DfuLink>;
}
