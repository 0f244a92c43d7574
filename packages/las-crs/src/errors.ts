import type { EpsgCrs } from "./epsg.js";
import type { GeoKeyData } from "./geokeys.js";

/** Discriminant shared by every error this package throws. */
export type CrsErrorKind =
  | "user-defined-crs"
  | "unreadable-wkt-crs"
  | "unreadable-geotiff-crs"
  | "bad-horizontal-code-parsed"
  | "unimplemented-for-geotiff-data"
  | "undefined-data-for-key"
  | "set-bad-code"
  | "bad-epsg-crs"
  | "record-access";

/**
 * Base class for CRS extraction failures.
 *
 * Narrow with `instanceof` on a subclass, or switch on `kind`.
 */
export abstract class CrsError extends Error {
  abstract readonly kind: CrsErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The GeoTIFF model type declares a user-defined (non-EPSG) CRS. */
export class UserDefinedCrsError extends CrsError {
  readonly kind = "user-defined-crs";

  constructor() {
    super("Parsing of user-defined CRS is not supported");
  }
}

export class UnreadableWktCrsError extends CrsError {
  readonly kind = "unreadable-wkt-crs";

  constructor(reason: string) {
    super(`Unable to read the WKT CRS record: ${reason}`);
  }
}

export class UnreadableGeoTiffCrsError extends CrsError {
  readonly kind = "unreadable-geotiff-crs";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Unable to read the GeoTIFF CRS records: ${reason}`, options);
  }
}

/**
 * A horizontal code was found but lies outside the EPSG range.
 *
 * The parsed value is kept on `crs` so it can still be reported.
 */
export class BadHorizontalCodeParsedError extends CrsError {
  readonly kind = "bad-horizontal-code-parsed";
  readonly crs: EpsgCrs;

  constructor(crs: EpsgCrs) {
    super(`Parsed horizontal code ${crs.horizontal} is not a valid EPSG code`);
    this.crs = crs;
  }
}

/** The CRS is defined through ASCII or double GeoTIFF data, which is not resolved. */
export class UnimplementedForGeoTiffDataError extends CrsError {
  readonly kind = "unimplemented-for-geotiff-data";
  readonly data: GeoKeyData;

  constructor(data: GeoKeyData) {
    super(
      `CRS definitions stored as GeoTIFF ${describeGeoKeyData(data)} are not supported`,
    );
    this.data = data;
  }
}

/** A key directory entry points at a location this package does not know. */
export class UndefinedDataForKeyError extends CrsError {
  readonly kind = "undefined-data-for-key";
  readonly keyId: number;

  constructor(keyId: number, location: number) {
    super(`GeoTIFF key ${keyId} references undefined data location ${location}`);
    this.keyId = keyId;
  }
}

export class SetBadCodeError extends CrsError {
  readonly kind = "set-bad-code";
  readonly code: number;

  constructor(code: number) {
    super(`Cannot set ${code}: not a valid EPSG code`);
    this.code = code;
  }
}

export class BadEpsgCrsError extends CrsError {
  readonly kind = "bad-epsg-crs";
  readonly horizontal: number;
  readonly vertical: number | null;

  constructor(horizontal: number, vertical: number | null) {
    const codes =
      vertical === null ? `${horizontal}` : `${horizontal}+${vertical}`;
    super(`Invalid EPSG CRS ${codes}`);
    this.horizontal = horizontal;
    this.vertical = vertical;
  }
}

/** Wraps a failure raised while reading the file or its records. */
export class RecordAccessError extends CrsError {
  readonly kind = "record-access";

  constructor(cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Unable to read the CRS records: ${reason}`, { cause });
  }
}

function describeGeoKeyData(data: GeoKeyData): string {
  switch (data.type) {
    case "short":
      return `model type ${data.value}`;
    case "ascii":
      return "ASCII data";
    case "double":
      return "double data";
  }
}
