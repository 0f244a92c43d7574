import type { Getter } from "copc";

/** [key id, TIFF tag location, count, value or offset] */
export type KeyEntry = [number, number, number, number];

/** Encode a GeoKeyDirectoryTag payload. */
export function geoKeyDirectory(
  entries: KeyEntry[],
  header: [number, number, number] = [1, 1, 0],
): Uint8Array {
  const shorts = [...header, entries.length, ...entries.flat()];
  const view = new DataView(new ArrayBuffer(shorts.length * 2));
  shorts.forEach((value, i) => view.setUint16(i * 2, value, true));
  return new Uint8Array(view.buffer);
}

/** Encode a GeoDoubleParamsTag payload. */
export function geoDoubles(values: number[]): Uint8Array {
  const view = new DataView(new ArrayBuffer(values.length * 8));
  values.forEach((value, i) => view.setFloat64(i * 8, value, true));
  return new Uint8Array(view.buffer);
}

/** Encode a GeoAsciiParamsTag payload, one byte per character. */
export function geoAscii(text: string): Uint8Array {
  return Uint8Array.from(text, (char) => char.charCodeAt(0));
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

// ── WKT fixtures ──────────────────────────────────────────────────────────

const OREGON_LAMBERT_WKT1 =
  'PROJCS["NAD83(HARN) / Oregon GIC Lambert (ft)",' +
  'GEOGCS["NAD83(HARN)",DATUM["NAD83_High_Accuracy_Reference_Network",' +
  'SPHEROID["GRS 1980",6378137,298.257222101,AUTHORITY["EPSG","7019"]],' +
  'AUTHORITY["EPSG","6152"]],PRIMEM["Greenwich",0,AUTHORITY["EPSG","8901"]],' +
  'UNIT["degree",0.0174532925199433,AUTHORITY["EPSG","9122"]],' +
  'AUTHORITY["EPSG","4152"]],PROJECTION["Lambert_Conformal_Conic_2SP"],' +
  'UNIT["foot",0.3048,AUTHORITY["EPSG","9002"]],AUTHORITY["EPSG","2992"]]';

/** WKT 1 projected CRS, EPSG:2992. */
export const PROJCS_WKT1 = OREGON_LAMBERT_WKT1;

/** WKT 1 compound CRS, EPSG:2992 + EPSG:6360. */
export const COMPD_CS_WKT1 =
  'COMPD_CS["NAD83(HARN) / Oregon GIC Lambert (ft) + NAVD88 height (ft)",' +
  `${OREGON_LAMBERT_WKT1},` +
  'VERT_CS["NAVD88 height (ft)",' +
  'VERT_DATUM["North American Vertical Datum 1988",2005,AUTHORITY["EPSG","5103"]],' +
  'UNIT["foot",0.3048,AUTHORITY["EPSG","9002"]],' +
  'AXIS["Gravity-related height",UP],AUTHORITY["EPSG","6360"]]]';

/** WKT 2 compound CRS, EPSG:2992 + EPSG:6360. */
export const COMPOUNDCRS_WKT2 =
  'COMPOUNDCRS["NAD83(HARN) / Oregon GIC Lambert (ft) + NAVD88 height (ft)",' +
  'PROJCRS["NAD83(HARN) / Oregon GIC Lambert (ft)",' +
  'BASEGEOGCRS["NAD83(HARN)",ID["EPSG",4152]],' +
  'CONVERSION["Oregon GIC Lambert (ft)",METHOD["Lambert Conic Conformal (2SP)",ID["EPSG",9802]]],' +
  'CS[Cartesian,2],ID["EPSG",2992]],' +
  'VERTCRS["NAVD88 height (ft)",VDATUM["North American Vertical Datum 1988"],' +
  'CS[vertical,1],ID["EPSG",6360]]]';

// ── LAS fixtures ──────────────────────────────────────────────────────────

export type LasRecord = {
  userId: string;
  recordId: number;
  data: Uint8Array;
};

const HEADER_SIZES: Record<number, number> = { 0: 227, 1: 227, 2: 227, 3: 235, 4: 375 };
const VLR_HEADER_SIZE = 54;
const EVLR_HEADER_SIZE = 60;

/**
 * Build a minimal LAS 1.x file without points: header, VLRs, then EVLRs
 * where the point data would start. EVLRs need `minorVersion` 4.
 */
export function lasFile({
  minorVersion = 4,
  globalEncoding = 0,
  vlrs = [],
  evlrs = [],
}: {
  minorVersion?: number;
  globalEncoding?: number;
  vlrs?: LasRecord[];
  evlrs?: LasRecord[];
}): Uint8Array {
  const headerSize = HEADER_SIZES[minorVersion] ?? 375;
  const vlrSize = vlrs.reduce((n, r) => n + VLR_HEADER_SIZE + r.data.length, 0);
  const evlrSize = evlrs.reduce(
    (n, r) => n + EVLR_HEADER_SIZE + r.data.length,
    0,
  );
  const pointDataOffset = headerSize + vlrSize;

  const bytes = new Uint8Array(pointDataOffset + evlrSize);
  const view = new DataView(bytes.buffer);

  writeAscii(bytes, 0, "LASF", 4);
  view.setUint16(6, globalEncoding, true);
  view.setUint8(24, 1);
  view.setUint8(25, minorVersion);
  writeAscii(bytes, 26, "test", 32);
  writeAscii(bytes, 58, "las-crs tests", 32);
  view.setUint16(94, headerSize, true);
  view.setUint32(96, pointDataOffset, true);
  view.setUint32(100, vlrs.length, true);
  // Point format 6 needs LAS 1.4; older versions get format 1.
  view.setUint8(104, minorVersion === 4 ? 6 : 1);
  view.setUint16(105, minorVersion === 4 ? 30 : 28, true);
  for (let i = 0; i < 3; i++) {
    view.setFloat64(131 + i * 8, 0.01, true);
  }
  if (minorVersion === 4) {
    view.setBigUint64(235, BigInt(evlrs.length > 0 ? pointDataOffset : 0), true);
    view.setUint32(243, evlrs.length, true);
  }

  let pos = headerSize;
  for (const record of vlrs) {
    writeAscii(bytes, pos + 2, record.userId, 16);
    view.setUint16(pos + 18, record.recordId, true);
    view.setUint16(pos + 20, record.data.length, true);
    bytes.set(record.data, pos + VLR_HEADER_SIZE);
    pos += VLR_HEADER_SIZE + record.data.length;
  }
  for (const record of evlrs) {
    writeAscii(bytes, pos + 2, record.userId, 16);
    view.setUint16(pos + 18, record.recordId, true);
    view.setBigUint64(pos + 20, BigInt(record.data.length), true);
    bytes.set(record.data, pos + EVLR_HEADER_SIZE);
    pos += EVLR_HEADER_SIZE + record.data.length;
  }

  return bytes;
}

/** A copc range reader over an in-memory file. */
export function bufferGetter(bytes: Uint8Array): Getter {
  return async (begin, end) => bytes.slice(begin, end);
}

function writeAscii(
  bytes: Uint8Array,
  offset: number,
  text: string,
  width: number,
): void {
  for (let i = 0; i < Math.min(text.length, width); i++) {
    bytes[offset + i] = text.charCodeAt(i);
  }
}
