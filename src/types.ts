export const BAND_LETTERS = ['C', 'D', 'E', 'F', 'G', 'H', 'J', 'K', 'L', 'M', 'N', 'P', 'Q', 'R', 'S', 'T', 'U', 'V', 'W', 'X'] as const;

/** Latitude band letter, 8° each from 80°S ('C') up to 84°N ('X', 12° wide). */
export type BandLetter = typeof BAND_LETTERS[number];

export interface LatLng { readonly lat: number; readonly lng: number; }

/**
 * Easting and northing are whole meters. Southern bands (below 'N') carry the
 * 10,000,000 m false northing, and `band` is the only thing the inverse
 * projection reads to pick the hemisphere: a band inconsistent with the real
 * latitude yields a point in the wrong hemisphere, not an error.
 */
export interface UTM {
  readonly zone: number;
  readonly band: BandLetter;
  readonly easting: number;
  readonly northing: number;
}

/** MGRS/UTMREF grid reference such as `32ULC9897356497`. */
export type MGRS = string;

/** Decoded grid reference: the south-west corner of its square, and the square's side in meters. */
export interface DecodedMGRS { readonly utm: UTM; readonly precision: number; }

export interface MGRSPosition { readonly position: LatLng; readonly precision: number; }
