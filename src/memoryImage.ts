import { Logger } from "@vscode/debugadapter";
import { NullLogger } from "./logger";
import { CoffImage, SectionPlacement } from "./coff/image";
import { ByteOperations, SoftwareByteOperations } from "./dataOps";
import { formatAddress, formatHexadecimal } from "./utils/strings";

export interface MemoryImageOptions {
  /** Target address of the first byte of the image */
  address: number;
  /** Size of the image in bytes */
  length: number;
  /** Value of bytes not covered by a section (default: 0xff) */
  fill?: number;
  /** Swap the bytes of each 16 bit word after copying (default: false) */
  reverseWords?: boolean;
  logger?: Logger.ILogger;
}

export const defaultMemoryImageOptions = {
  fill: 0xff,
  reverseWords: false,
  logger: new NullLogger(),
};

export interface MemoryImage {
  data: Buffer;
  /** CRC-32 of `data` after any word reversal */
  checksum: number;
  placements: SectionPlacement[];
}

/**
 * Flatten the allocated sections of an image into a window of target memory
 */
export function buildMemoryImage(
  image: CoffImage,
  options: MemoryImageOptions,
  operations: ByteOperations = new SoftwareByteOperations()
): MemoryImage {
  const { address, length, fill, reverseWords, logger } = {
    ...defaultMemoryImageOptions,
    ...options,
  };

  const data = Buffer.alloc(length, fill & 0xff);
  const placements = image.copySectionsInto(address, data);
  for (const { section, offset, addressKind } of placements) {
    logger.log(
      `Placed ${section.name} at ${formatAddress(
        address + offset
      )} (${addressKind}, ${section.dataLength} bytes)`
    );
  }

  if (reverseWords) {
    operations.reverseWords(data);
  }
  const checksum = operations.checksum(data);
  logger.log(`Memory image checksum ${formatHexadecimal(checksum)}`);

  return { data, checksum, placements };
}
