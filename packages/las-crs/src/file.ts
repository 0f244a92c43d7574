import type { FileHandle } from "node:fs/promises";
import { open } from "node:fs/promises";
import { Getter, Las } from "copc";
import type { EpsgCrs } from "./epsg.js";
import { RecordAccessError } from "./errors.js";
import type { ExtractOptions } from "./extract.js";
import { extractEpsg } from "./extract.js";
import type { VariableLengthRecord } from "./records.js";
import { isProjectionRecord, LasCrsRecords } from "./records.js";

/** A local path, an http(s) URL, or a range reader. */
export type LasSource = string | Getter;

/** Size of a LAS 1.4 header; copc parses no less. */
const HEADER_LENGTH = 375;

/** Byte offset of the global encoding field in the LAS header. */
const GLOBAL_ENCODING_OFFSET = 6;

const MINOR_VERSION_OFFSET = 25;

/** Where the LAS 1.3 and 1.4 additions to the 1.0 header start. */
const LEGACY_HEADER_END = 227;

/**
 * Read the projection records of a LAS, LAZ or COPC file.
 *
 * Walks the header, VLRs and EVLRs, and fetches only the payloads of
 * projection records.
 *
 * @throws {RecordAccessError} if the file cannot be read or is not LAS.
 */
export async function readLasCrsRecords(
  source: LasSource,
): Promise<LasCrsRecords> {
  if (typeof source !== "string" || isUrl(source)) {
    return readRecords(Getter.create(source));
  }

  let handle: FileHandle;
  try {
    handle = await open(source, "r");
  } catch (err) {
    throw new RecordAccessError(err);
  }

  try {
    return await readRecords(fileGetter(handle));
  } finally {
    await handle.close();
  }
}

/** {@link readLasCrsRecords} followed by {@link extractEpsg}. */
export async function readLasCrs(
  source: LasSource,
  options: ExtractOptions = {},
): Promise<EpsgCrs | null> {
  return extractEpsg(await readLasCrsRecords(source), options);
}

async function readRecords(get: Getter): Promise<LasCrsRecords> {
  try {
    const headerBytes = await get(0, HEADER_LENGTH);
    const header = Las.Header.parse(normalizeHeader(headerBytes));

    const records: VariableLengthRecord[] = [];
    for (const vlr of await Las.Vlr.walk(get, header)) {
      if (isProjectionRecord(vlr.userId, vlr.recordId)) {
        records.push({
          userId: vlr.userId,
          recordId: vlr.recordId,
          data: await Las.Vlr.fetch(get, vlr),
        });
      }
    }

    return LasCrsRecords.fromRecords(records, readGlobalEncoding(headerBytes));
  } catch (err) {
    throw new RecordAccessError(err);
  }
}

/**
 * Make a header copc can parse. copc reads only LAS 1.2 and 1.4, but the
 * fields needed to find the VLRs are laid out the same from 1.0 to 1.3, so
 * older headers are presented as 1.2 and short files are padded. The 1.3
 * waveform offset and whatever follows a short header are cleared.
 */
function normalizeHeader(headerBytes: Uint8Array): Uint8Array {
  if (headerBytes.byteLength < LEGACY_HEADER_END) {
    throw new Error(
      `File is ${headerBytes.byteLength} bytes, too short for a LAS header`,
    );
  }

  const bytes = new Uint8Array(HEADER_LENGTH);
  bytes.set(headerBytes.subarray(0, HEADER_LENGTH));

  const minor = bytes[MINOR_VERSION_OFFSET] ?? 0;
  if (minor < 4) {
    bytes[MINOR_VERSION_OFFSET] = 2;
    bytes.fill(0, LEGACY_HEADER_END);
  }
  return bytes;
}

function readGlobalEncoding(headerBytes: Uint8Array): number {
  const view = new DataView(
    headerBytes.buffer,
    headerBytes.byteOffset,
    headerBytes.byteLength,
  );
  return view.getUint16(GLOBAL_ENCODING_OFFSET, true);
}

/** A range reader over an open file. Reads past the end come back short. */
function fileGetter(handle: FileHandle): Getter {
  return async (begin, end) => {
    const buffer = new Uint8Array(end - begin);
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, begin);
    return buffer.subarray(0, bytesRead);
  };
}

function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}
