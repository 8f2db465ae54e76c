import { formatHexadecimal } from "../utils/strings";

const errorMessages = {
  NOT_AN_IMAGE: "The data does not represent a valid coff image",
  BAD_MAGIC: "Unexpected magic value",
  INVALID_TARGET: "The target chipset for the image is not valid",
  INVALID_SECTION_TABLE: "The image does not contain a valid section table",
  INVALID_SYMBOL_TABLE: "The image does not contain a valid symbol table",
  INVALID_STRING_TABLE: "The image does not contain a valid string table",
  SECTION_NAME: "The section does not have a valid name",
  SECTION_DATA: "The section does not contain valid data",
  INVALID_NAME_ENCODING: "The section name is not valid UTF-8",
  DUPLICATE_SECTION: "The image contains a duplicate section",
  SECTION_NOT_FOUND: "Section not found",
  REENTRANT_BUILD: "The section table is already being built",
  OUT_OF_BOUNDS: "Extent lies outside the buffer",
  UNALIGNED_LENGTH: "The buffer length must be 2 byte aligned",
};

export type CoffErrorType = keyof typeof errorMessages;

export class CoffError extends Error {
  constructor(public readonly errorType: CoffErrorType, detail?: string) {
    super();
    this.name = "CoffError";
    const msg = errorMessages[errorType];
    this.message = detail ? `${msg}: ${detail}` : msg;
  }
}

export class CoffMagicError extends CoffError {
  constructor(public readonly expected: number, public readonly actual: number) {
    super(
      "BAD_MAGIC",
      `expected ${formatHexadecimal(expected, 4)}, got ${formatHexadecimal(
        actual,
        4
      )}`
    );
    this.name = "CoffMagicError";
  }
}
