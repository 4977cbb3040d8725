// Conversions
export { latLngToUtm, utmToLatLng, latLngToUtmBatch, utmToLatLngBatch } from './utm.js';
export { latLngToMgrs, utmToMgrs, mgrsToUtm, mgrsToLatLng, get100kId } from './mgrs.js';

// Zones and bands
export { zoneNumber, latitudeBand, centralMeridian, isBandLetter } from './zone.js';

// Display strings
export { formatUtm, formatLatLng } from './format.js';

// Results and errors
export { GridError, GridErrorKind, isOk, isErr, unwrap } from './errors.js';
export type { Result } from './errors.js';

export { BAND_LETTERS } from './types.js';
export type { LatLng, UTM, MGRS, BandLetter, DecodedMGRS, MGRSPosition } from './types.js';
