/**
 * Firmware package data structures.
 */

/**
 * Application entry of a package's manifest.json.
 */
export interface FirmwareManifestEntry {
  bin_file: string;
  dat_file: string;
}

export interface FirmwareManifest {
  manifest: {
    application?: FirmwareManifestEntry;
    softdevice?: FirmwareManifestEntry;
    bootloader?: FirmwareManifestEntry;
    softdevice_bootloader?: FirmwareManifestEntry;
  };
}

/**
 * Firmware to transfer. Treated as immutable once loaded.
 */
export interface FirmwarePackage {
  /**
   * Application image (.bin)
   */
  image: Uint8Array;

  /**
   * Init packet (.dat) describing the image
   */
  initData: Uint8Array;

  /**
   * Parsed manifest, absent for archives read in compatibility mode
   */
  manifest?: FirmwareManifest;
}
