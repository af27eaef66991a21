/**
 * Splits a buffer into link-sized frames.
 */

/**
 * Lazily split `data` into frames of `maxFrameSize` bytes.
 *
 * The returned iterable can be walked any number of times. Frames are
 * `subarray` views; the last one may be shorter.
 *
 * @throws {RangeError} If maxFrameSize is not a positive integer
 */
export function chunks(data: Uint8Array, maxFrameSize: number): Iterable<Uint8Array> {
  if (!Number.isInteger(maxFrameSize) || maxFrameSize <= 0) {
    throw new RangeError(`Frame size must be a positive integer, got ${maxFrameSize}`);
  }

  return {
    *[Symbol.iterator]() {
      for (let offset = 0; offset < data.length; offset += maxFrameSize) {
        yield data.subarray(offset, Math.min(offset + maxFrameSize, data.length));
      }
    },
  };
}

export function chunkCount(length: number, maxFrameSize: number): number {
  return Math.ceil(length / maxFrameSize);
}
