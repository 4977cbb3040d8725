import { advance, COLUMN_LETTERS, ROW_LETTERS, stepsBetween } from './alphabet.js';
import { fail, GridErrorKind, ok, type Result } from './errors.js';
import type { DecodedMGRS, LatLng, MGRS, MGRSPosition, UTM } from './types.js';
import { latLngToUtm, utmToLatLng } from './utm.js';
import { validateZone } from './validation.js';
import { isBandLetter, MIN_NORTHING, SET_ORIGIN_COLUMNS, SET_ORIGIN_ROWS, zoneSet } from './zone.js';

const SQUARE_SIZE = 100000;
const ROW_CYCLE = 2000000;
const MAX_DIGITS = 5;

// Precision in meters -> digits per group; anything else falls back to 1 m
const DIGITS_FOR_PRECISION: ReadonlyMap<number, number> = new Map([
  [1, 5], [10, 4], [100, 3], [1000, 2], [10000, 1]
]);

/** Two-letter 100 km square id for a UTM position. */
export function get100kId(easting: number, northing: number, zone: number): string {
  const set = zoneSet(zone);
  const column = Math.floor(easting / SQUARE_SIZE);
  const row = Math.floor(northing / SQUARE_SIZE) % ROW_LETTERS.length;

  return advance(COLUMN_LETTERS, SET_ORIGIN_COLUMNS[set - 1], column - 1)
    + advance(ROW_LETTERS, SET_ORIGIN_ROWS[set - 1], row);
}

function digitGroup(meters: number, digits: number): string {
  return String(Math.trunc(meters)).padStart(MAX_DIGITS, '0').slice(-MAX_DIGITS).slice(0, digits);
}

/**
 * Encodes a UTM position. `precision` is the side of the square in meters
 * (1, 10, 100, 1000 or 10000); digits are truncated, never rounded, and a
 * fractional easting or northing is truncated to whole meters first.
 */
export function utmToMgrs(utm: UTM, precision = 1): MGRS {
  const digits = DIGITS_FOR_PRECISION.get(precision) ?? MAX_DIGITS;

  return `${utm.zone}${utm.band}${get100kId(utm.easting, utm.northing, utm.zone)}`
    + digitGroup(utm.easting, digits)
    + digitGroup(utm.northing, digits);
}

export function latLngToMgrs(point: LatLng, precision = 1): Result<MGRS> {
  const utm = latLngToUtm(point);
  if (!utm.success) return utm;
  return ok(utmToMgrs(utm.data, precision));
}

function malformed<T>(reference: string, reason: string): Result<T> {
  return fail(GridErrorKind.MALFORMED_GRID_REFERENCE, `${reason}, mgrs = ${reference}`);
}

/**
 * Decodes a grid reference to the south-west corner of its square. The
 * returned precision is the square's side in meters.
 */
export function mgrsToUtm(reference: MGRS): Result<DecodedMGRS> {
  if (reference === '') return malformed(reference, 'invalid empty grid reference');
  // ASCII only: Unicode upper-casing can turn one character into other letters (ß -> SS)
  if (!/^[0-9A-Za-z]+$/.test(reference)) return malformed(reference, 'bad characters');

  const text = reference.toUpperCase();

  let i = 0;
  while (i < text.length && !/[A-Z]/.test(text.charAt(i))) {
    if (i >= 2) return malformed(reference, 'bad zone number');
    i++;
  }

  const zoneDigits = text.slice(0, i);
  if (!/^\d{1,2}$/.test(zoneDigits) || i + 3 > text.length) {
    return malformed(reference, 'bad zone number');
  }

  const zone = validateZone(Number(zoneDigits));
  if (!zone.success) return zone;

  const band = text.charAt(i);
  if (!isBandLetter(band)) {
    return fail(GridErrorKind.INVALID_ZONE_LETTER, `zone letter ${band} not handled, mgrs = ${reference}`);
  }

  const square = text.slice(i + 1, i + 3);
  if (!/^[A-Z]{2}$/.test(square)) return malformed(reference, 'bad 100 km square id');

  const remainder = text.slice(i + 3);
  if (remainder.length % 2 !== 0) return malformed(reference, 'uneven number of digits');
  if (!/^\d*$/.test(remainder)) return malformed(reference, 'non-numeric digits');

  const sep = remainder.length / 2;
  if (sep > MAX_DIGITS) return malformed(reference, 'more than 5 digits per group');

  const set = zoneSet(zone.data);
  const columnLetter = square.charAt(0);
  const rowLetter = square.charAt(1);

  const columnSteps = stepsBetween(COLUMN_LETTERS, SET_ORIGIN_COLUMNS[set - 1], columnLetter);
  if (columnSteps === undefined) {
    return fail(GridErrorKind.UNRESOLVABLE_GRID_LETTER, `bad column letter ${columnLetter} for zone ${zone.data}, mgrs = ${reference}`);
  }

  const rowSteps = stepsBetween(ROW_LETTERS, SET_ORIGIN_ROWS[set - 1], rowLetter);
  if (rowSteps === undefined) {
    return fail(GridErrorKind.UNRESOLVABLE_GRID_LETTER, `bad row letter ${rowLetter} for zone ${zone.data}, mgrs = ${reference}`);
  }

  const east100k = (columnSteps + 1) * SQUARE_SIZE;
  let north100k = rowSteps * SQUARE_SIZE;
  while (north100k < MIN_NORTHING[band]) north100k += ROW_CYCLE;

  const precision = SQUARE_SIZE / 10 ** sep;
  const easting = sep > 0 ? Number(remainder.slice(0, sep)) * precision : 0;
  const northing = sep > 0 ? Number(remainder.slice(sep)) * precision : 0;

  return ok({
    utm: { zone: zone.data, band, easting: east100k + easting, northing: north100k + northing },
    precision
  });
}

export function mgrsToLatLng(reference: MGRS): Result<MGRSPosition> {
  const decoded = mgrsToUtm(reference);
  if (!decoded.success) return decoded;

  const position = utmToLatLng(decoded.data.utm);
  if (!position.success) {
    return fail(position.error.kind, `${position.error.message}, mgrs = ${reference}`);
  }

  return ok({ position: position.data, precision: decoded.data.precision });
}
