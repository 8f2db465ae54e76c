import { CoffError } from "./errors";

/**
 * Check that `[offset, offset + length)` lies within a buffer of `baseLength` bytes
 */
export function isValidExtent(
  baseLength: number,
  offset: number,
  length: number
): boolean {
  return (
    Number.isInteger(offset) &&
    Number.isInteger(length) &&
    offset >= 0 &&
    length >= 0 &&
    offset + length <= baseLength
  );
}

/**
 * Throw unless `[offset, offset + length)` lies within a buffer of `baseLength` bytes
 *
 * @param what Description of the region, included in the error message
 */
export function assertExtent(
  baseLength: number,
  offset: number,
  length: number,
  what: string
): void {
  if (!isValidExtent(baseLength, offset, length)) {
    throw new CoffError(
      "OUT_OF_BOUNDS",
      `${what} at ${offset} (${length} bytes) in ${baseLength} bytes`
    );
  }
}
