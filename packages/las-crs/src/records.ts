import { TiffTag } from "@cogeotiff/core";
import type { CrsSource } from "./extract.js";
import type { GeoTiffCrs } from "./geokeys.js";
import { decodeGeoKeyDirectory } from "./geokeys.js";

/** User ID shared by all LAS projection records. */
export const PROJECTION_USER_ID = "LASF_Projection";

/**
 * Record IDs of the LAS projection records. The GeoTIFF records reuse the
 * TIFF tag numbers.
 */
export const ProjectionRecordId = {
  WktCrs: 2112,
  GeoKeyDirectory: TiffTag.GeoKeyDirectory,
  GeoDoubleParams: TiffTag.GeoDoubleParams,
  GeoAsciiParams: TiffTag.GeoAsciiParams,
} as const;

/** Global encoding bit set when the CRS is stored as WKT (LAS 1.4). */
export const WKT_GLOBAL_ENCODING_BIT = 1 << 4;

/** A (extended) variable-length record whose payload has been read. */
export type VariableLengthRecord = {
  userId: string;
  recordId: number;
  data: Uint8Array;
};

export function isWktGlobalEncoding(globalEncoding: number): boolean {
  return (globalEncoding & WKT_GLOBAL_ENCODING_BIT) !== 0;
}

/** Whether a record with this user/record ID holds CRS information. */
export function isProjectionRecord(userId: string, recordId: number): boolean {
  return (
    userId.toLowerCase() === PROJECTION_USER_ID.toLowerCase() &&
    Object.values<number>(ProjectionRecordId).includes(recordId)
  );
}

/** The projection records of a LAS file, as a {@link CrsSource}. */
export class LasCrsRecords implements CrsSource {
  readonly globalEncoding: number;
  readonly wkt: Uint8Array | null;
  readonly geoKeyDirectory: Uint8Array | null;
  readonly geoDoubleParams: Uint8Array | null;
  readonly geoAsciiParams: Uint8Array | null;

  private constructor(
    globalEncoding: number,
    records: Map<number, Uint8Array>,
  ) {
    this.globalEncoding = globalEncoding;
    this.wkt = records.get(ProjectionRecordId.WktCrs) ?? null;
    this.geoKeyDirectory =
      records.get(ProjectionRecordId.GeoKeyDirectory) ?? null;
    this.geoDoubleParams =
      records.get(ProjectionRecordId.GeoDoubleParams) ?? null;
    this.geoAsciiParams = records.get(ProjectionRecordId.GeoAsciiParams) ?? null;
  }

  /**
   * Pick the projection records out of a file's VLRs and EVLRs.
   *
   * Other records are ignored. If a projection record appears more than
   * once, the last one wins.
   */
  static fromRecords(
    records: Iterable<VariableLengthRecord>,
    globalEncoding: number,
  ): LasCrsRecords {
    const byId = new Map<number, Uint8Array>();
    for (const { userId, recordId, data } of records) {
      if (isProjectionRecord(userId, recordId)) {
        byId.set(recordId, data);
      }
    }
    return new LasCrsRecords(globalEncoding, byId);
  }

  hasDeclaredWktCrs(): boolean {
    return isWktGlobalEncoding(this.globalEncoding);
  }

  rawWktCrs(): Uint8Array | null {
    return this.wkt;
  }

  hasGeoTiffCrs(): boolean {
    return this.geoKeyDirectory !== null;
  }

  geoTiffCrs(): GeoTiffCrs | null {
    if (this.geoKeyDirectory === null) {
      return null;
    }
    return decodeGeoKeyDirectory(
      this.geoKeyDirectory,
      this.geoDoubleParams,
      this.geoAsciiParams,
    );
  }
}
