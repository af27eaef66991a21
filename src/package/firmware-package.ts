/**
 * Firmware package loading.
 *
 * A package is a ZIP archive holding the application image (.bin), its init
 * packet (.dat) and usually a manifest.json naming both.
 */

import { readFile } from 'node:fs/promises';
import JSZip from 'jszip';
import { FirmwarePackageError } from '../exceptions';
import type { FirmwareManifest, FirmwareManifestEntry, FirmwarePackage } from '../models/firmware';

const MANIFEST_NAME = 'manifest.json';

function isManifestEntry(value: unknown): value is FirmwareManifestEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'bin_file' in value &&
    'dat_file' in value &&
    typeof value.bin_file === 'string' &&
    typeof value.dat_file === 'string'
  );
}

function parseManifest(text: string): FirmwareManifest {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new FirmwarePackageError(`Invalid ${MANIFEST_NAME}: ${String(error)}`);
  }

  if (
    typeof json !== 'object' ||
    json === null ||
    !('manifest' in json) ||
    typeof json.manifest !== 'object' ||
    json.manifest === null
  ) {
    throw new FirmwarePackageError(`${MANIFEST_NAME} has no "manifest" object`);
  }

  const body = json.manifest;
  const application = 'application' in body ? body.application : undefined;
  if (!isManifestEntry(application)) {
    throw new FirmwarePackageError('Package must contain an application firmware manifest');
  }

  return { manifest: { application } };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pick the application image and init packet by file name, for archives
 * without a manifest.
 */
function findByConvention(archive: JSZip): FirmwareManifestEntry {
  const candidates = archive.file(/application/i).map((entry) => entry.name);
  const binFile = candidates.find((name) => name.endsWith('.bin'));
  const datFile = candidates.find((name) => name.endsWith('.dat'));

  if (!binFile || !datFile) {
    throw new FirmwarePackageError('Could not auto-detect firmware files in package');
  }
  return { bin_file: binFile, dat_file: datFile };
}

async function openArchive(data: Uint8Array): Promise<JSZip> {
  try {
    return await JSZip.loadAsync(data, { checkCRC32: true });
  } catch (error) {
    throw new FirmwarePackageError(`Invalid firmware archive: ${describeError(error)}`);
  }
}

async function readEntry(archive: JSZip, name: string): Promise<Uint8Array> {
  const entry = archive.file(name);
  if (!entry) {
    throw new FirmwarePackageError(`Archive has no entry named ${name}`);
  }
  return entry.async('uint8array');
}

async function readApplication(
  archive: JSZip,
  files: FirmwareManifestEntry
): Promise<Pick<FirmwarePackage, 'image' | 'initData'>> {
  return {
    image: await readEntry(archive, files.bin_file),
    initData: await readEntry(archive, files.dat_file),
  };
}

/**
 * Parse a firmware package from the bytes of its archive. Entry CRCs are
 * checked while the archive loads.
 *
 * @throws {FirmwarePackageError} If the archive is invalid or holds no application
 */
export async function parseFirmwarePackage(data: Uint8Array): Promise<FirmwarePackage> {
  const archive = await openArchive(data);

  const manifestEntry = archive.file(MANIFEST_NAME);
  if (manifestEntry) {
    const manifest = parseManifest(await manifestEntry.async('string'));
    const application = manifest.manifest.application;
    if (!application) {
      throw new FirmwarePackageError('Package must contain an application firmware manifest');
    }
    return { ...(await readApplication(archive, application)), manifest };
  }

  return readApplication(archive, findByConvention(archive));
}

/**
 * Read and parse a firmware package from disk.
 *
 * @throws {FirmwarePackageError} If the file cannot be read or parsed
 */
export async function loadFirmwarePackage(path: string): Promise<FirmwarePackage> {
  let data: Uint8Array;
  try {
    const buffer = await readFile(path);
    data = new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  } catch (error) {
    throw new FirmwarePackageError(`Cannot read ${path}: ${describeError(error)}`);
  }
  return parseFirmwarePackage(data);
}
