import type { EpsgCrs } from "./epsg.js";
import { CrsError, RecordAccessError } from "./errors.js";
import type { GeoTiffCrs } from "./geokeys.js";
import { parseGeoTiffEpsg } from "./geokeys.js";
import { parseWktEpsg } from "./wkt.js";

/**
 * Where the CRS records of a point cloud come from.
 *
 * Implemented by `LasCrsRecords` in `records.ts` for LAS files; any other
 * container can implement it to reuse {@link extractEpsg}.
 */
export interface CrsSource {
  /** Whether the file header claims a WKT CRS record is present. */
  hasDeclaredWktCrs(): boolean;

  /** Bytes of the WKT CRS record, if there is one. */
  rawWktCrs(): Uint8Array | null;

  /** The decoded GeoKey directory, if there is one. May throw. */
  geoTiffCrs(): GeoTiffCrs | null;

  /**
   * Whether a GeoKey directory record exists, without decoding it. Only used
   * to warn when WKT shadows GeoTIFF records.
   */
  hasGeoTiffCrs?(): boolean;
}

/** Receives diagnostics about inconsistent CRS metadata. */
export type CrsLogger = Pick<Console, "warn">;

export type ExtractOptions = {
  /** Where warnings go. Defaults to `console`. */
  logger?: CrsLogger;
};

/**
 * Extract the EPSG code(s) of a point cloud.
 *
 * A WKT record takes precedence over GeoTIFF records; when there is one the
 * GeoTIFF records are not decoded at all. Disagreement between the header's
 * WKT flag and the records that were found, and a WKT record shadowing
 * GeoTIFF records, are logged as warnings and do not change the result.
 *
 * @returns The CRS, or `null` when the source has no CRS record at all.
 * @throws {CrsError} when a record exists but no valid code can be read from
 * it. Failures of the source itself are wrapped in {@link RecordAccessError}.
 */
export function extractEpsg(
  source: CrsSource,
  options: ExtractOptions = {},
): EpsgCrs | null {
  const logger = options.logger ?? console;

  const declaredWkt = access(() => source.hasDeclaredWktCrs());
  const wkt = access(() => source.rawWktCrs());

  if (wkt !== null) {
    if (!declaredWkt) {
      logger.warn("WKT CRS record found, but the header says it does not exist");
    }
    if (access(() => source.hasGeoTiffCrs?.() ?? false)) {
      logger.warn("Both WKT and GeoTIFF CRS records found, WKT is parsed");
    }
    return parseWktEpsg(wkt);
  }

  const geoTiff = access(() => source.geoTiffCrs());
  if (geoTiff !== null) {
    if (declaredWkt) {
      logger.warn(
        "Header declares a WKT CRS record, but only GeoTIFF CRS records were found",
      );
    }
    return parseGeoTiffEpsg(geoTiff);
  }

  if (declaredWkt) {
    logger.warn("Header declares a WKT CRS record, but no CRS record was found");
  }
  return null;
}

/** Run a source accessor, passing CRS errors through and wrapping the rest. */
function access<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (err instanceof CrsError) {
      throw err;
    }
    throw new RecordAccessError(err);
  }
}
