import { ModelTypeCode, TiffTag, TiffTagGeo } from "@cogeotiff/core";
import type { EpsgCrs } from "./epsg.js";
import { validateParsedCrs } from "./epsg.js";
import {
  UndefinedDataForKeyError,
  UnimplementedForGeoTiffDataError,
  UnreadableGeoTiffCrsError,
  UserDefinedCrsError,
} from "./errors.js";

/**
 * The payload of a GeoKey once its location has been resolved.
 *
 * Keyed by payload kind rather than by the TIFF tag the value was stored
 * under.
 */
export type GeoKeyData =
  | { type: "short"; value: number }
  | { type: "ascii"; value: string }
  | { type: "double"; values: number[] };

/** One entry of a GeoKey directory. */
export type GeoTiffKeyEntry = {
  id: number;
  data: GeoKeyData;
};

/** A decoded GeoKey directory, entries in directory order. */
export type GeoTiffCrs = {
  /** KeyDirectoryVersion, conventionally 1. */
  version: number;
  /** KeyRevision and MinorRevision, conventionally [1, 0] or [1, 1]. */
  revision: [number, number];
  entries: GeoTiffKeyEntry[];
};

/** TIFFTagLocation 0: the value is stored in the entry itself. */
const LOCATION_INLINE = 0;

const SHORT_SIZE = 2;
const DOUBLE_SIZE = 8;
const HEADER_SIZE = 4 * SHORT_SIZE;
const ENTRY_SIZE = 4 * SHORT_SIZE;

/**
 * Decode a GeoKeyDirectoryTag payload.
 *
 * @param directory    The GeoKeyDirectoryTag (34735) bytes.
 * @param doubleParams The GeoDoubleParamsTag (34736) bytes, if any.
 * @param asciiParams  The GeoAsciiParamsTag (34737) bytes, if any.
 *
 * @throws {UnreadableGeoTiffCrsError} if a buffer is shorter than the
 * directory says, or a key refers to a params buffer that was not given.
 * @throws {UndefinedDataForKeyError} if a key uses an unknown location.
 */
export function decodeGeoKeyDirectory(
  directory: Uint8Array,
  doubleParams: Uint8Array | null = null,
  asciiParams: Uint8Array | null = null,
): GeoTiffCrs {
  const view = toDataView(directory);

  const [version, major, minor, keyCount] = readEntry(view, 0);

  const entries: GeoTiffKeyEntry[] = [];
  for (let i = 0; i < keyCount; i++) {
    const [id, location, count, valueOffset] = readEntry(
      view,
      HEADER_SIZE + i * ENTRY_SIZE,
    );

    entries.push({
      id,
      data: resolveData(id, location, count, valueOffset, {
        doubleParams,
        asciiParams,
      }),
    });
  }

  return { version, revision: [major, minor], entries };
}

/**
 * Reduce a decoded GeoKey directory to its EPSG code(s).
 *
 * Only inline (SHORT) codes are understood. GeodeticCRSGeoKey and
 * ProjectedCRSGeoKey both set the horizontal code; if a directory carries
 * both, the later entry wins.
 *
 * @throws {UnreadableGeoTiffCrsError} if the model type is undefined or no
 * horizontal code is present.
 * @throws {UserDefinedCrsError} if the model type is user-defined.
 * @throws {UnimplementedForGeoTiffDataError} for any other model type.
 * @throws {BadHorizontalCodeParsedError} if the horizontal code is outside the
 * EPSG range. An implausible vertical code is dropped instead.
 */
export function parseGeoTiffEpsg(crs: GeoTiffCrs): EpsgCrs {
  let horizontal: number | null = null;
  let vertical: number | null = null;

  for (const { id, data } of crs.entries) {
    switch (id) {
      case TiffTagGeo.GTModelTypeGeoKey:
        checkModelType(data);
        break;

      case TiffTagGeo.GeodeticCRSGeoKey:
      case TiffTagGeo.ProjectedCRSGeoKey:
        if (data.type === "short") {
          horizontal = data.value;
        }
        break;

      case TiffTagGeo.VerticalGeoKey:
        if (data.type === "short") {
          vertical = data.value;
        }
        break;

      // Citations, units and the rest do not identify the CRS.
      default:
        break;
    }
  }

  if (horizontal === null || horizontal === 0) {
    throw new UnreadableGeoTiffCrsError("no horizontal CRS code");
  }

  return validateParsedCrs(horizontal, vertical);
}

/** {@link decodeGeoKeyDirectory} followed by {@link parseGeoTiffEpsg}. */
export function parseGeoTiffRecords(
  directory: Uint8Array,
  doubleParams: Uint8Array | null = null,
  asciiParams: Uint8Array | null = null,
): EpsgCrs {
  return parseGeoTiffEpsg(
    decodeGeoKeyDirectory(directory, doubleParams, asciiParams),
  );
}

function checkModelType(data: GeoKeyData): void {
  if (data.type !== "short") {
    throw new UnimplementedForGeoTiffDataError(data);
  }

  switch (data.value) {
    case ModelTypeCode.Unknown:
      throw new UnreadableGeoTiffCrsError("undefined model type");
    case ModelTypeCode.Projected:
    case ModelTypeCode.Geographic:
    case ModelTypeCode.Geocentric:
      return;
    case ModelTypeCode.UserDefined:
      throw new UserDefinedCrsError();
    default:
      throw new UnimplementedForGeoTiffDataError(data);
  }
}

function resolveData(
  id: number,
  location: number,
  count: number,
  valueOffset: number,
  params: { doubleParams: Uint8Array | null; asciiParams: Uint8Array | null },
): GeoKeyData {
  switch (location) {
    case LOCATION_INLINE:
      return { type: "short", value: valueOffset };

    case TiffTag.GeoDoubleParams: {
      if (params.doubleParams === null) {
        throw new UnreadableGeoTiffCrsError(
          `key ${id} refers to GeoDoubleParams, which are missing`,
        );
      }
      // The offset of a double is an index into the array, not a byte offset.
      const view = toDataView(params.doubleParams);
      const start = valueOffset * DOUBLE_SIZE;
      if (start + count * DOUBLE_SIZE > view.byteLength) {
        throw new UnreadableGeoTiffCrsError(
          `key ${id} reads past the end of GeoDoubleParams`,
        );
      }
      const values: number[] = [];
      for (let i = 0; i < count; i++) {
        values.push(view.getFloat64(start + i * DOUBLE_SIZE, true));
      }
      return { type: "double", values };
    }

    case TiffTag.GeoAsciiParams: {
      if (params.asciiParams === null) {
        throw new UnreadableGeoTiffCrsError(
          `key ${id} refers to GeoAsciiParams, which are missing`,
        );
      }
      const bytes = params.asciiParams;
      if (valueOffset + count > bytes.byteLength) {
        throw new UnreadableGeoTiffCrsError(
          `key ${id} reads past the end of GeoAsciiParams`,
        );
      }
      let value = "";
      for (const byte of bytes.subarray(valueOffset, valueOffset + count)) {
        value += String.fromCharCode(byte);
      }
      return { type: "ascii", value };
    }

    default:
      throw new UndefinedDataForKeyError(id, location);
  }
}

function toDataView(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/** Read the four SHORTs of the directory header or of one key entry. */
function readEntry(
  view: DataView,
  offset: number,
): [number, number, number, number] {
  if (offset + ENTRY_SIZE > view.byteLength) {
    throw new UnreadableGeoTiffCrsError(
      `the key directory is truncated at byte ${view.byteLength}`,
    );
  }
  return [
    view.getUint16(offset, true),
    view.getUint16(offset + SHORT_SIZE, true),
    view.getUint16(offset + 2 * SHORT_SIZE, true),
    view.getUint16(offset + 3 * SHORT_SIZE, true),
  ];
}
