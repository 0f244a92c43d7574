import type { EpsgCrs } from "./epsg.js";
import { validateParsedCrs } from "./epsg.js";

/**
 * Keywords that open the vertical part of a compound WKT CRS, in the order
 * they are searched for. `VERTCRS` and `VERTICALCRS` are WKT 2, `VERT_CS` is
 * WKT 1.
 */
const VERTICAL_MARKERS = ["VERTCRS", "VERTICALCRS", "VERT_CS"] as const;

/** How many bytes from the end of a substring are examined for digits. */
const MAX_SCAN_BYTES = 10;

const ASCII_ZERO = 0x30;
const ASCII_NINE = 0x39;

const decoder = new TextDecoder("utf-8");
const encoder = new TextEncoder();

/**
 * Extract the EPSG code(s) from a WKT CRS record.
 *
 * This does not parse WKT. EPSG identifiers are reliably the last number of
 * an `AUTHORITY[...]`/`ID[...]` clause, so the text is split at the vertical
 * CRS keyword and the trailing integer of each half is taken.
 *
 * @throws {BadHorizontalCodeParsedError} if the horizontal code is outside the
 * EPSG range, including when there is no number at all. An implausible vertical code is dropped instead.
 */
export function parseWktEpsg(bytes: Uint8Array): EpsgCrs {
  const wkt = decoder.decode(bytes);
  const [horizontalPart, verticalPart] = splitAtVerticalCrs(wkt);

  const horizontal = trailingCode(horizontalPart);
  const vertical = verticalPart === null ? 0 : trailingCode(verticalPart);

  return validateParsedCrs(horizontal, vertical);
}

/**
 * Split `wkt` before the first occurrence of the highest-priority vertical
 * marker it contains. Priority wins over position.
 */
export function splitAtVerticalCrs(wkt: string): [string, string | null] {
  for (const marker of VERTICAL_MARKERS) {
    const at = wkt.indexOf(marker);
    if (at !== -1) {
      return [wkt.slice(0, at), wkt.slice(at)];
    }
  }
  return [wkt, null];
}

/**
 * The integer formed by the last run of ASCII digits within the final
 * {@link MAX_SCAN_BYTES} bytes of `text` (trailing whitespace ignored), or 0.
 * Wraps like an unsigned 16-bit integer.
 */
export function trailingCode(text: string): number {
  const bytes = encoder.encode(text.trimEnd());

  let code = 0;
  let place = 1;
  let started = false;
  const stop = Math.max(bytes.length - MAX_SCAN_BYTES, 0);

  for (let i = bytes.length - 1; i >= stop; i--) {
    const byte = bytes[i] ?? 0;
    if (byte >= ASCII_ZERO && byte <= ASCII_NINE) {
      started = true;
      code = (code + (byte - ASCII_ZERO) * place) % 0x10000;
      place = (place * 10) % 0x10000;
    } else if (started) {
      break;
    }
  }

  return code;
}
