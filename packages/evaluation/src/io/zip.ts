/**
 * Minimal zip archive reader: the central directory is read from the end of
 * the buffer and entries are stored or deflated.
 */

import { inflateRawSync } from "node:zlib";
import { PanelShapeError } from "../errors.js";

interface ZipEntry {
  name: string;
  compression: number;
  compressedSize: number;
  localOffset: number;
}

const LOCAL_FILE_HEADER = 0x04034b50;
const CENTRAL_DIRECTORY_HEADER = 0x02014b50;
const END_OF_CENTRAL_DIRECTORY = 0x06054b50;
const END_RECORD_SIZE = 22;
const MAX_COMMENT = 0xffff;

export function isZip(content: Buffer): boolean {
  return content.length >= 4 && content.readUInt32LE(0) === LOCAL_FILE_HEADER;
}

function listEntries(buffer: Buffer, label: string): ZipEntry[] {
  let endOffset = -1;
  const stop = Math.max(0, buffer.length - END_RECORD_SIZE - MAX_COMMENT);
  for (let i = buffer.length - END_RECORD_SIZE; i >= stop; i -= 1) {
    if (buffer.readUInt32LE(i) === END_OF_CENTRAL_DIRECTORY) {
      endOffset = i;
      break;
    }
  }
  if (endOffset === -1) {
    throw new PanelShapeError(`${label}: invalid zip archive (end of central directory missing)`);
  }

  const directorySize = buffer.readUInt32LE(endOffset + 12);
  const directoryOffset = buffer.readUInt32LE(endOffset + 16);
  const directoryEnd = Math.min(directoryOffset + directorySize, endOffset);
  const entries: ZipEntry[] = [];
  let offset = directoryOffset;

  while (offset + 46 <= directoryEnd) {
    if (buffer.readUInt32LE(offset) !== CENTRAL_DIRECTORY_HEADER) {
      break;
    }
    const nameLength = buffer.readUInt16LE(offset + 28);
    const extraLength = buffer.readUInt16LE(offset + 30);
    const commentLength = buffer.readUInt16LE(offset + 32);
    entries.push({
      name: buffer.toString("utf8", offset + 46, offset + 46 + nameLength),
      compression: buffer.readUInt16LE(offset + 10),
      compressedSize: buffer.readUInt32LE(offset + 20),
      localOffset: buffer.readUInt32LE(offset + 42),
    });
    offset += 46 + nameLength + extraLength + commentLength;
  }
  return entries;
}

function readEntry(buffer: Buffer, entry: ZipEntry, label: string): Buffer {
  if (
    entry.localOffset + 30 > buffer.length ||
    buffer.readUInt32LE(entry.localOffset) !== LOCAL_FILE_HEADER
  ) {
    throw new PanelShapeError(`${label}: invalid zip entry header for ${entry.name}`);
  }
  const nameLength = buffer.readUInt16LE(entry.localOffset + 26);
  const extraLength = buffer.readUInt16LE(entry.localOffset + 28);
  const dataStart = entry.localOffset + 30 + nameLength + extraLength;
  const compressed = buffer.subarray(dataStart, dataStart + entry.compressedSize);

  switch (entry.compression) {
    case 0:
      return Buffer.from(compressed);
    case 8:
      return inflateRawSync(compressed);
    default:
      throw new PanelShapeError(
        `${label}: unsupported zip compression method ${entry.compression} for ${entry.name}`
      );
  }
}

/**
 * Contents of the first `.csv` entry of an archive.
 *
 * @throws PanelShapeError if the archive is malformed or holds no `.csv` entry
 */
export function extractFirstCsv(buffer: Buffer, label: string): { name: string; content: Buffer } {
  const entry = listEntries(buffer, label).find((candidate) =>
    candidate.name.toLowerCase().endsWith(".csv")
  );
  if (!entry) {
    throw new PanelShapeError(`${label}: no .csv entry in zip archive`);
  }
  return { name: entry.name, content: readEntry(buffer, entry, label) };
}
