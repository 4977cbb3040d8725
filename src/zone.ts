import { BAND_LETTERS, type BandLetter } from './types.js';

// Column and row letters at the south-west origin of each 100 km set, indexed by set - 1
export const SET_ORIGIN_COLUMNS = ['A', 'J', 'S', 'A', 'J', 'S'] as const;
export const SET_ORIGIN_ROWS = ['A', 'F', 'A', 'F', 'A', 'F'] as const;

const SET_COUNT = 6;

const BANDS: ReadonlySet<string> = new Set(BAND_LETTERS);

/**
 * Lowest northing reachable in each band. The 100 km row letters repeat every
 * 2,000,000 m, so a decoded row offset is raised in 2,000,000 m steps until it
 * reaches this value.
 */
export const MIN_NORTHING: Readonly<Record<BandLetter, number>> = {
  C: 1100000, D: 2000000, E: 2800000, F: 3700000, G: 4600000,
  H: 5500000, J: 6400000, K: 7300000, L: 8200000, M: 9100000,
  N: 0, P: 800000, Q: 1700000, R: 2600000, S: 3500000,
  T: 4400000, U: 5300000, V: 6200000, W: 7000000, X: 7900000
};

export function isBandLetter(letter: string): letter is BandLetter {
  return BANDS.has(letter);
}

/** UTM zone for a point, with the Norway and Svalbard exceptions. */
export function zoneNumber(lat: number, lng: number): number {
  if (lng === 180) return 60;

  if (lat >= 56 && lat < 64 && lng >= 3 && lng < 12) return 32;

  if (lat >= 72 && lat < 84) {
    if (lng >= 0 && lng < 9) return 31;
    if (lng >= 9 && lng < 21) return 33;
    if (lng >= 21 && lng < 33) return 35;
    if (lng >= 33 && lng < 42) return 37;
  }

  return Math.floor((lng + 180) / 6) + 1;
}

/** Band letter for a latitude, or undefined outside 80°S..84°N. */
export function latitudeBand(lat: number): BandLetter | undefined {
  if (!(lat >= -80 && lat <= 84)) return undefined;
  if (lat >= 72) return 'X';
  return BAND_LETTERS[Math.floor((lat + 80) / 8)];
}

export function centralMeridian(zone: number): number {
  return zone * 6 - 183;
}

/** 100 km set (1..6) the zone belongs to; sets repeat every 36° of longitude. */
export function zoneSet(zone: number): number {
  return ((zone - 1) % SET_COUNT + SET_COUNT) % SET_COUNT + 1;
}

export function isSouthernBand(band: BandLetter): boolean {
  return band < 'N';
}
