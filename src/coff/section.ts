import { formatHexadecimal } from "../utils/strings";
import { CoffError } from "./errors";
import { isValidExtent } from "./extent";

/**
 * Section attribute bits
 */
export enum SectionFlags {
  /** Section contains code */
  TEXT = 0x20,
  /** Section contains initialized data */
  DATA = 0x40,
  /** Section contains uninitialized data */
  BSS = 0x80,
}

const ALLOC_MASK = SectionFlags.TEXT | SectionFlags.DATA | SectionFlags.BSS;

/**
 * Does a section with these flags occupy target memory?
 */
export function isAllocated(flags: number): boolean {
  return (flags & ALLOC_MASK) !== 0;
}

/**
 * Raw words of a section table entry
 */
export interface SectionEntry {
  /** Zero when the name is held in the string table */
  nameWord: number;
  /** Offset of the name in the string table */
  stringOffset: number;
  physicalAddress: number;
  virtualAddress: number;
  /** Data size in target units for allocated sections, bytes otherwise */
  rawLength: number;
  /** Byte offset of the section data in the image */
  dataAddress: number;
  relocationAddress: number;
  lineNumberAddress: number;
  relocationCount: number;
  lineCount: number;
  flags: number;
  /** Reserved halfword (low) and memory page (high) */
  pageWord: number;
}

/** Size of a section table entry in bytes */
export const SECTION_ENTRY_SIZE = 48;

/**
 * Map the 12 little-endian longwords of an entry to named fields
 */
export function toSectionEntry(words: number[]): SectionEntry {
  if (words.length !== SECTION_ENTRY_SIZE / 4) {
    throw new CoffError(
      "OUT_OF_BOUNDS",
      `expected 12 entry words, got ${words.length}`
    );
  }
  const [
    nameWord,
    stringOffset,
    physicalAddress,
    virtualAddress,
    rawLength,
    dataAddress,
    relocationAddress,
    lineNumberAddress,
    relocationCount,
    lineCount,
    flags,
    pageWord,
  ] = words;
  return {
    nameWord,
    stringOffset,
    physicalAddress,
    virtualAddress,
    rawLength,
    dataAddress,
    relocationAddress,
    lineNumberAddress,
    relocationCount,
    lineCount,
    flags,
    pageWord,
  };
}

/**
 * A section of a TI COFF image
 *
 * Holds the location of its data rather than a copy: `data` is a fresh view of the image buffer on every access, so
 * writes through it land in the image.
 */
export class CoffSection {
  private constructor(
    public readonly index: number,
    public readonly name: string,
    private readonly entry: SectionEntry,
    public readonly dataLength: number,
    private readonly buffer: Buffer
  ) {}

  /**
   * Create a section from a decoded table entry
   *
   * @param name Resolved name, or undefined when it could not be resolved
   * @param buffer Image buffer the section data lives in
   * @param byteLength Bytes per target addressable unit
   */
  public static decode(
    index: number,
    entry: SectionEntry,
    name: string | undefined,
    buffer: Buffer,
    byteLength: number
  ): CoffSection {
    if (name === undefined) {
      throw new CoffError("SECTION_NAME", `index ${index}`);
    }
    const dataLength = isAllocated(entry.flags)
      ? entry.rawLength * byteLength
      : entry.rawLength;
    if (!isValidExtent(buffer.length, entry.dataAddress, dataLength)) {
      throw new CoffError("SECTION_DATA", `${name} (index ${index})`);
    }
    return new CoffSection(index, name, entry, dataLength, buffer);
  }

  get physicalAddress(): number {
    return this.entry.physicalAddress;
  }

  get virtualAddress(): number {
    return this.entry.virtualAddress;
  }

  /** Byte offset of the section data in the image */
  get dataAddress(): number {
    return this.entry.dataAddress;
  }

  /** Length as stored in the entry, before scaling to bytes */
  get rawLength(): number {
    return this.entry.rawLength;
  }

  get flags(): number {
    return this.entry.flags;
  }

  get relocationCount(): number {
    return this.entry.relocationCount;
  }

  get lineCount(): number {
    return this.entry.lineCount;
  }

  get memoryPage(): number {
    return this.entry.pageWord >>> 16;
  }

  get allocated(): boolean {
    return isAllocated(this.entry.flags);
  }

  get data(): Buffer {
    const start = this.entry.dataAddress;
    return this.buffer.subarray(start, start + this.dataLength);
  }

  public hasFlag(flag: SectionFlags): boolean {
    return (this.entry.flags & flag) !== 0;
  }

  toString(): string {
    return [
      `Section #${this.index} ${this.name}`,
      `    > flags      : ${formatHexadecimal(this.flags, 4)}${
        this.allocated ? " (allocated)" : ""
      }`,
      `    > paddr      : ${formatHexadecimal(this.physicalAddress)}`,
      `    > vaddr      : ${formatHexadecimal(this.virtualAddress)}`,
      `    > dataOffset : ${formatHexadecimal(this.dataAddress)}`,
      `    > dataLength : ${this.dataLength}`,
    ].join("\n");
  }
}
