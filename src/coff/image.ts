/**
 * Reads TI COFF images, as produced by the TI code generation tools for C2000 and similar targets
 *
 * Layout:
 *   file header + optional header   50 bytes
 *   section table                   48 bytes per section
 *   section data, relocations, line numbers
 *   symbol table                    18 bytes per symbol
 *   string table                    to the end of the file
 */

import { Logger } from "@vscode/debugadapter";
import { NullLogger } from "../logger";
import { formatHexadecimal } from "../utils/strings";
import { BufferReader } from "./bufferReader";
import { CoffError, CoffMagicError } from "./errors";
import { isValidExtent } from "./extent";
import { resolveName } from "./names";
import {
  CoffSection,
  SECTION_ENTRY_SIZE,
  toSectionEntry,
} from "./section";
import { CoffSectionTable } from "./sectionTable";

/** Size of the file header and optional header in bytes */
export const HEADER_SIZE = 50;

/** Size of a symbol table entry in bytes */
export const SYMBOL_ENTRY_SIZE = 18;

/** Expected value of the optional header magic */
export const COFF_MAGIC = 0x0108;

/**
 * Decoded header record
 */
export interface CoffHeader {
  versionId: number;
  sectionCount: number;
  timestamp: number;
  symbolTableAddress: number;
  symbolCount: number;
  optionalHeaderSize: number;
  fileFlags: number;
  targetId: number;
  magic: number;
  optionalVersion: number;
  textSize: number;
  dataSize: number;
  bssSize: number;
  entry: number;
  textAddress: number;
  dataAddress: number;
}

export interface ParseOptions {
  logger?: Logger.ILogger;
}

export const defaultParseOptions: Required<ParseOptions> = {
  logger: new NullLogger(),
};

/**
 * Where `copySectionsInto` wrote a section
 */
export interface SectionPlacement {
  section: CoffSection;
  /** Byte offset in the destination buffer */
  offset: number;
  /** Which of the section's addresses fell inside the window */
  addressKind: "physical" | "virtual";
}

/**
 * A parsed TI COFF image
 *
 * The header is validated on construction. The section table is decoded on first access to `sections` and cached.
 */
export class CoffImage {
  /** Bytes per addressable unit, for targets with units wider than a byte */
  public static readonly TARGET_BYTE_LENGTHS: ReadonlyMap<number, number> =
    new Map([
      [0x9d, 2],
      [0x98, 2],
    ]);

  private sectionTable?: CoffSectionTable;
  private building = false;

  private constructor(
    public readonly buffer: Buffer,
    public readonly header: CoffHeader,
    public readonly stringTableAddress: number,
    private logger: Logger.ILogger
  ) {}

  /**
   * Validate the header of an image and wrap its buffer
   *
   * The buffer is not copied: section data views and `copySectionsInto` read from it directly.
   */
  public static parse(buffer: Buffer, options: ParseOptions = {}): CoffImage {
    const { logger } = { ...defaultParseOptions, ...options };
    const length = buffer.length;

    if (length < HEADER_SIZE) {
      throw new CoffError("NOT_AN_IMAGE", `${length} bytes`);
    }
    const header = readHeader(buffer);

    const sectionTableEnd = HEADER_SIZE + header.sectionCount * SECTION_ENTRY_SIZE;
    const stringTableAddress =
      header.symbolTableAddress + header.symbolCount * SYMBOL_ENTRY_SIZE;
    const stringTableLength = length - stringTableAddress;

    if (header.magic !== COFF_MAGIC) {
      throw new CoffMagicError(COFF_MAGIC, header.magic);
    }
    if (header.targetId === 0) {
      throw new CoffError("INVALID_TARGET");
    }
    if (!isValidExtent(length, HEADER_SIZE, sectionTableEnd - HEADER_SIZE)) {
      throw new CoffError("INVALID_SECTION_TABLE");
    }
    if (
      sectionTableEnd > header.symbolTableAddress ||
      stringTableAddress > length
    ) {
      throw new CoffError("INVALID_SYMBOL_TABLE");
    }
    if (
      stringTableLength <= 0 ||
      !isValidExtent(length, stringTableAddress, stringTableLength)
    ) {
      throw new CoffError("INVALID_STRING_TABLE");
    }

    logger.log(
      `Image target ${formatHexadecimal(header.targetId, 4)}, ` +
        `${header.sectionCount} sections, entry ${formatHexadecimal(
          header.entry
        )}`
    );
    return new CoffImage(buffer, header, stringTableAddress, logger);
  }

  get targetId(): number {
    return this.header.targetId;
  }

  get entry(): number {
    return this.header.entry;
  }

  get sectionCount(): number {
    return this.header.sectionCount;
  }

  /** Bytes per addressable unit of the target */
  get byteLength(): number {
    return CoffImage.TARGET_BYTE_LENGTHS.get(this.header.targetId) ?? 1;
  }

  /**
   * Section table, decoded on first access
   */
  get sections(): CoffSectionTable {
    if (!this.sectionTable) {
      if (this.building) {
        throw new CoffError("REENTRANT_BUILD");
      }
      this.building = true;
      try {
        this.sectionTable = this.readSectionTable();
      } finally {
        this.building = false;
      }
    }
    return this.sectionTable;
  }

  /**
   * Copy every allocated section that fits within `[address, address + destination.length)` into `destination`
   *
   * A section is placed by its physical address if that range fits, otherwise by its virtual address. Sections that
   * fit neither are skipped.
   *
   * @param address Target address of the first byte of `destination`
   */
  public copySectionsInto(
    address: number,
    destination: Uint8Array
  ): SectionPlacement[] {
    const endAddress = address + destination.length;
    const placements: SectionPlacement[] = [];

    for (const section of this.sections.allocated()) {
      const { physicalAddress, virtualAddress, dataLength } = section;
      let placement: SectionPlacement | undefined;

      if (
        physicalAddress >= address &&
        physicalAddress + dataLength <= endAddress
      ) {
        placement = {
          section,
          offset: physicalAddress - address,
          addressKind: "physical",
        };
      } else if (
        virtualAddress >= address &&
        virtualAddress + dataLength <= endAddress
      ) {
        placement = {
          section,
          offset: virtualAddress - address,
          addressKind: "virtual",
        };
      }

      if (placement) {
        destination.set(section.data, placement.offset);
        placements.push(placement);
      } else {
        this.logger.log(`Section ${section.name} outside window, skipped`);
      }
    }
    return placements;
  }

  private readSectionTable(): CoffSectionTable {
    const reader = new BufferReader(this.buffer, HEADER_SIZE);
    const sections: CoffSection[] = [];

    for (let index = 0; index < this.header.sectionCount; index++) {
      const entryOffset = reader.offset();
      const entry = toSectionEntry(reader.readLongs(SECTION_ENTRY_SIZE / 4));
      const name = resolveName(
        this.buffer,
        entryOffset,
        entry.nameWord !== 0,
        entry.stringOffset,
        this.stringTableAddress
      );
      const section = CoffSection.decode(
        index,
        entry,
        name,
        this.buffer,
        this.byteLength
      );
      this.logger.log(section.toString());
      sections.push(section);
    }
    return new CoffSectionTable(sections);
  }
}

function readHeader(buffer: Buffer): CoffHeader {
  // uint16 x2, uint32 x3, uint16 x5, uint32 x6
  const reader = new BufferReader(buffer);
  const versionId = reader.readWord();
  const sectionCount = reader.readWord();
  const [timestamp, symbolTableAddress, symbolCount] = reader.readLongs(3);
  const optionalHeaderSize = reader.readWord();
  const fileFlags = reader.readWord();
  const targetId = reader.readWord();
  const magic = reader.readWord();
  const optionalVersion = reader.readWord();
  const [textSize, dataSize, bssSize, entry, textAddress, dataAddress] =
    reader.readLongs(6);
  return {
    versionId,
    sectionCount,
    timestamp,
    symbolTableAddress,
    symbolCount,
    optionalHeaderSize,
    fileFlags,
    targetId,
    magic,
    optionalVersion,
    textSize,
    dataSize,
    bssSize,
    entry,
    textAddress,
    dataAddress,
  };
}
