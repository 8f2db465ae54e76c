export const HEADER_SIZE = 50;
export const ENTRY_SIZE = 48;
export const SYMBOL_SIZE = 18;

export interface SectionSpec {
  name: string;
  paddr: number;
  /** Defaults to paddr */
  vaddr?: number;
  rawLength: number;
  flags: number;
  /** Byte offset of data in the image. Defaults to the next free byte after the section table and earlier data */
  dataAddress?: number;
  data?: Uint8Array;
  /** Store the name in the string table even if it would fit inline */
  longName?: boolean;
  memoryPage?: number;
  relocationCount?: number;
}

export interface ImageSpec {
  targetId?: number;
  magic?: number;
  entry?: number;
  symbolCount?: number;
  sections?: SectionSpec[];
  /** Header section count, if different from sections.length */
  sectionCount?: number;
  /** Defaults to the first byte after all section data */
  symbolTableAddress?: number;
  /** Replaces the generated string table */
  stringTable?: Uint8Array;
}

/**
 * Build a synthetic TI COFF image
 *
 * Layout: header, section table, section data in order, symbol table (zeroed), string table.
 */
export function buildImage(spec: ImageSpec = {}): Buffer {
  const sections = spec.sections ?? [];
  let cursor = HEADER_SIZE + sections.length * ENTRY_SIZE;

  const dataAddresses = sections.map((s) => {
    if (s.dataAddress !== undefined) {
      return s.dataAddress;
    }
    const address = cursor;
    cursor += s.data?.length ?? 0;
    return address;
  });

  const strings: Buffer[] = [];
  let stringsLength = 0;
  const nameOffsets = sections.map((s) => {
    if (!s.longName && Buffer.byteLength(s.name) <= 8) {
      return undefined;
    }
    const bytes = Buffer.from(s.name + "\0");
    const offset = stringsLength;
    strings.push(bytes);
    stringsLength += bytes.length;
    return offset;
  });
  const stringTable =
    spec.stringTable ??
    (strings.length > 0 ? Buffer.concat(strings) : Buffer.from([0]));

  const symbolTableAddress = spec.symbolTableAddress ?? cursor;
  const symbolCount = spec.symbolCount ?? 0;
  const stringTableAddress = symbolTableAddress + symbolCount * SYMBOL_SIZE;
  const buffer = Buffer.alloc(stringTableAddress + stringTable.length);

  buffer.writeUInt16LE(0x00c2, 0);
  buffer.writeUInt16LE(spec.sectionCount ?? sections.length, 2);
  buffer.writeUInt32LE(symbolTableAddress, 8);
  buffer.writeUInt32LE(symbolCount, 12);
  buffer.writeUInt16LE(28, 16);
  buffer.writeUInt16LE(spec.targetId ?? 0x9d, 20);
  buffer.writeUInt16LE(spec.magic ?? 0x0108, 22);
  buffer.writeUInt32LE(spec.entry ?? 0, 38);

  sections.forEach((s, i) => {
    const at = HEADER_SIZE + i * ENTRY_SIZE;
    const nameOffset = nameOffsets[i];
    if (nameOffset === undefined) {
      buffer.write(s.name, at, 8, "utf8");
    } else {
      buffer.writeUInt32LE(0, at);
      buffer.writeUInt32LE(nameOffset, at + 4);
    }
    buffer.writeUInt32LE(s.paddr, at + 8);
    buffer.writeUInt32LE(s.vaddr ?? s.paddr, at + 12);
    buffer.writeUInt32LE(s.rawLength, at + 16);
    buffer.writeUInt32LE(dataAddresses[i], at + 20);
    buffer.writeUInt32LE(s.relocationCount ?? 0, at + 32);
    buffer.writeUInt32LE(s.flags, at + 40);
    buffer.writeUInt32LE(((s.memoryPage ?? 0) << 16) >>> 0, at + 44);
    if (s.data) {
      buffer.set(s.data, dataAddresses[i]);
    }
  });

  buffer.set(stringTable, stringTableAddress);
  return buffer;
}

/** `length` bytes counting up from `start` */
export function bytes(length: number, start = 0): Buffer {
  const out = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    out[i] = (start + i) & 0xff;
  }
  return out;
}
