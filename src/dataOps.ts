import { CoffError } from "./coff/errors";

/**
 * Byte level operations applied to memory images after assembly
 */
export interface ByteOperations {
  /**
   * Swap the bytes of every 16 bit word in place
   * @returns the same buffer
   */
  reverseWords(data: Uint8Array): Uint8Array;
  /**
   * CRC-32 of the buffer contents, as an unsigned 32 bit value
   */
  checksum(data: Uint8Array): number;
}

const CRC32_TABLE = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i += 1) {
    let c = i;
    for (let j = 0; j < 8; j += 1) {
      c = (c & 1) !== 0 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[i] = c >>> 0;
  }
  return table;
})();

/**
 * Reference implementation of `ByteOperations`
 */
export class SoftwareByteOperations implements ByteOperations {
  public reverseWords(data: Uint8Array): Uint8Array {
    if ((data.length & 1) !== 0) {
      throw new CoffError("UNALIGNED_LENGTH", `${data.length} bytes`);
    }
    for (let i = 0; i < data.length; i += 2) {
      const lo = data[i];
      data[i] = data[i + 1];
      data[i + 1] = lo;
    }
    return data;
  }

  public checksum(data: Uint8Array): number {
    let crc = 0xffffffff;
    for (let i = 0; i < data.length; i += 1) {
      crc = (crc >>> 8) ^ CRC32_TABLE[(crc ^ data[i]) & 0xff];
    }
    return (crc ^ 0xffffffff) >>> 0;
  }
}

/**
 * Round a value up to a multiple of an alignment
 * @param alignment 0 leaves the value unchanged
 */
export function align(value: number, alignment: number): number {
  if (alignment === 0) {
    return value;
  }
  const rem = value % alignment;
  return rem === 0 ? value : value + alignment - rem;
}

/**
 * Extend a buffer to at least `length` bytes, padding the new bytes
 *
 * @returns the input buffer if already long enough, otherwise a new buffer
 */
export function extendTo(data: Buffer, length: number, pad = 0xff): Buffer {
  const extra = length - data.length;
  if (extra <= 0) {
    return data;
  }
  return Buffer.concat([data, Buffer.alloc(extra, pad & 0xff)]);
}
