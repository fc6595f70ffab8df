import { readFileSync, writeFileSync } from "fs";
import { Logger } from "./logger.js";

const logger = new Logger("encoding");

const strictDecoder = new TextDecoder("utf-8", { fatal: true });
const lossyDecoder = new TextDecoder("utf-8");

export interface DecodedText {
  text: string;
  /** True when invalid byte sequences were replaced */
  lossy: boolean;
}

/**
 * Decode UTF-8 bytes, falling back to replacement characters
 * when the input is not valid UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): DecodedText {
  try {
    return { text: strictDecoder.decode(bytes), lossy: false };
  } catch (error) {
    if (!(error instanceof TypeError)) {
      throw error;
    }
    return { text: lossyDecoder.decode(bytes), lossy: true };
  }
}

const UTF8_BOM = "\uFEFF";

/**
 * Document text with the byte order mark stripped, and whether it had one.
 */
export interface DocumentText {
  text: string;
  bom: boolean;
}

function startsWithBom(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 3 &&
    bytes[0] === 0xef &&
    bytes[1] === 0xbb &&
    bytes[2] === 0xbf
  );
}

/**
 * Read a text document, remembering a leading byte order mark so it can
 * be written back. Invalid UTF-8 never fails the read.
 *
 * @throws NodeJS.ErrnoException when the file itself cannot be read
 */
export function readDocumentText(path: string): DocumentText {
  const bytes = readFileSync(path);
  const decoded = decodeUtf8(bytes);
  if (decoded.lossy) {
    logger.warn("Document is not valid UTF-8, decoded lossily", { path });
  }
  return { text: decoded.text, bom: startsWithBom(bytes) };
}

/**
 * Read a text document without its byte order mark.
 */
export function readDocument(path: string): string {
  return readDocumentText(path).text;
}

/**
 * Write a document as UTF-8, restoring the byte order mark it was read with.
 */
export function writeDocument(path: string, document: DocumentText): void {
  writeFileSync(path, (document.bom ? UTF8_BOM : "") + document.text, "utf-8");
}
