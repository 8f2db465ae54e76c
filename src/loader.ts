import { readFile } from "fs/promises";
import { URI as Uri } from "vscode-uri";
import { CoffImage, defaultParseOptions, ParseOptions } from "./coff/image";

/**
 * Read and parse a TI COFF image file
 */
export async function readCoffImage(
  source: Uri | string,
  options: ParseOptions = {}
): Promise<CoffImage> {
  const { logger } = { ...defaultParseOptions, ...options };
  const filename = typeof source === "string" ? source : source.fsPath;
  logger.log(`Parsing file "${filename}"`);
  const buffer = await readFile(filename);
  return CoffImage.parse(buffer, { logger });
}
