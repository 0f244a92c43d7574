import {
  BadEpsgCrsError,
  BadHorizontalCodeParsedError,
  SetBadCodeError,
} from "./errors.js";

/** Inclusive bounds of a plausible EPSG code. */
export const EPSG_RANGE = [1024, 32767] as const;

/** Whether `code` is an integer inside {@link EPSG_RANGE}. */
export function isEpsgCode(code: number): boolean {
  return (
    Number.isInteger(code) && code >= EPSG_RANGE[0] && code <= EPSG_RANGE[1]
  );
}

/**
 * A horizontal EPSG code and an optional vertical EPSG code.
 *
 * Use {@link EpsgCrs.create} to get a validated value. {@link EpsgCrs.unchecked}
 * keeps whatever it is given, so that an implausible parse can still be
 * reported.
 */
export class EpsgCrs {
  private _horizontal: number;
  private _vertical: number | null;

  private constructor(horizontal: number, vertical: number | null) {
    this._horizontal = horizontal;
    this._vertical = vertical;
  }

  /**
   * Construct a CRS, throwing {@link BadEpsgCrsError} when either present
   * code is outside {@link EPSG_RANGE}.
   */
  static create(horizontal: number, vertical: number | null = null): EpsgCrs {
    if (!isEpsgCode(horizontal) || (vertical !== null && !isEpsgCode(vertical))) {
      throw new BadEpsgCrsError(horizontal, vertical);
    }
    return new EpsgCrs(horizontal, vertical);
  }

  static unchecked(horizontal: number, vertical: number | null = null): EpsgCrs {
    return new EpsgCrs(horizontal, vertical);
  }

  get horizontal(): number {
    return this._horizontal;
  }

  get vertical(): number | null {
    return this._vertical;
  }

  /** @throws {SetBadCodeError} if `code` is outside {@link EPSG_RANGE}; nothing is written. */
  setHorizontal(code: number): void {
    if (!isEpsgCode(code)) {
      throw new SetBadCodeError(code);
    }
    this._horizontal = code;
  }

  /** @throws {SetBadCodeError} if `code` is outside {@link EPSG_RANGE}; nothing is written. */
  setVertical(code: number): void {
    if (!isEpsgCode(code)) {
      throw new SetBadCodeError(code);
    }
    this._vertical = code;
  }

  setHorizontalUnchecked(code: number): void {
    this._horizontal = code;
  }

  setVerticalUnchecked(code: number): void {
    this._vertical = code;
  }

  clone(): EpsgCrs {
    return new EpsgCrs(this._horizontal, this._vertical);
  }

  equals(other: EpsgCrs): boolean {
    return (
      this._horizontal === other._horizontal &&
      this._vertical === other._vertical
    );
  }

  /** Compound notation, e.g. `EPSG:2992` or `EPSG:2992+6360`. */
  toString(): string {
    return this._vertical === null
      ? `EPSG:${this._horizontal}`
      : `EPSG:${this._horizontal}+${this._vertical}`;
  }

  toJSON(): { horizontal: number; vertical: number | null } {
    return { horizontal: this._horizontal, vertical: this._vertical };
  }
}

/**
 * Apply the extraction policy to a freshly parsed value: an implausible
 * horizontal code is an error, an implausible vertical code is dropped.
 */
export function validateParsedCrs(
  horizontal: number,
  vertical: number | null,
): EpsgCrs {
  const crs = EpsgCrs.unchecked(horizontal, vertical);
  if (!isEpsgCode(crs.horizontal)) {
    throw new BadHorizontalCodeParsedError(crs);
  }
  if (crs.vertical !== null && !isEpsgCode(crs.vertical)) {
    return EpsgCrs.unchecked(crs.horizontal, null);
  }
  return crs;
}
