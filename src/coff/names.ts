import { CoffError } from "./errors";

/** Size of an inline name field within a section entry */
export const INLINE_NAME_SIZE = 8;

const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Resolve the name of a section entry
 *
 * Short names are stored inline in the first 8 bytes of the entry. Longer names are stored in the string table, with
 * the entry holding the offset of the name from the start of the table.
 *
 * @param entryOffset Byte offset of the section entry in the image
 * @param hasInlineName Whether the name is stored in the entry itself
 * @param stringOffset Offset of the name within the string table
 * @param stringTableAddress Byte offset of the string table in the image
 * @returns Decoded name, or undefined if no bytes of the name lie within the buffer
 */
export function resolveName(
  buffer: Uint8Array,
  entryOffset: number,
  hasInlineName: boolean,
  stringOffset: number,
  stringTableAddress: number
): string | undefined {
  let start = entryOffset;
  let max = INLINE_NAME_SIZE;
  if (!hasInlineName) {
    start = stringTableAddress + stringOffset;
    max = buffer.length - start;
  }
  if (max <= 0) {
    return undefined;
  }
  return readString(buffer.subarray(start, start + max));
}

/**
 * Decode bytes up to the first NUL, or the whole region if there is none
 */
export function readString(data: Uint8Array): string {
  let length = data.indexOf(0);
  if (length < 0) {
    length = data.length;
  }
  try {
    return decoder.decode(data.subarray(0, length));
  } catch (err) {
    throw new CoffError(
      "INVALID_NAME_ENCODING",
      err instanceof Error ? err.message : String(err)
    );
  }
}
