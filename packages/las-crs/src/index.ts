export { EPSG_RANGE, EpsgCrs, isEpsgCode } from "./epsg.js";
export type { CrsErrorKind } from "./errors.js";
export {
  BadEpsgCrsError,
  BadHorizontalCodeParsedError,
  CrsError,
  RecordAccessError,
  SetBadCodeError,
  UndefinedDataForKeyError,
  UnimplementedForGeoTiffDataError,
  UnreadableGeoTiffCrsError,
  UnreadableWktCrsError,
  UserDefinedCrsError,
} from "./errors.js";
export type { CrsLogger, CrsSource, ExtractOptions } from "./extract.js";
export { extractEpsg } from "./extract.js";
export type { LasSource } from "./file.js";
export { readLasCrs, readLasCrsRecords } from "./file.js";
export type { GeoKeyData, GeoTiffCrs, GeoTiffKeyEntry } from "./geokeys.js";
export {
  decodeGeoKeyDirectory,
  parseGeoTiffEpsg,
  parseGeoTiffRecords,
} from "./geokeys.js";
export type { VariableLengthRecord } from "./records.js";
export {
  isProjectionRecord,
  isWktGlobalEncoding,
  LasCrsRecords,
  PROJECTION_USER_ID,
  ProjectionRecordId,
} from "./records.js";
export { parseWktEpsg } from "./wkt.js";
