/**
 * ble-legacy-dfu - TypeScript library for updating Nordic legacy DFU bootloaders over BLE
 *
 * Main entry point exporting the public API.
 */

// Core session API
export { DfuSession, performDfu } from './session';
export { jumpToBootloader, type JumpOutcome } from './buttonless';
export { TransferEngine, type TransferOptions } from './transfer';
export {
  awaitBootloader,
  bootloaderFilter,
  expandAliases,
  findDevice,
  identifierFilter,
  incrementAddress,
  isAddress,
  type BootloaderMatchOptions,
} from './discovery';
export { DEFAULT_BOOTLOADER_ALIASES, DEFAULT_OPTIONS, resolveOptions } from './config';

// Firmware packages
export { loadFirmwarePackage, parseFirmwarePackage } from './package/firmware-package';

// Transport
export { NodeBleTransport, type NodeBleTransportOptions } from './transport/node-ble';
export { ResponseWaiter, type DfuRequest } from './transport/response-waiter';
export type { Advertisement, DfuLink, DfuTransport, ScanFilter } from './transport/types';

// Models, wire format and exceptions
export * from './models';
export * from './protocol';
export * from './exceptions';
