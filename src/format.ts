import type { LatLng, UTM } from './types.js';

/** `32U 398973 5756497` */
export function formatUtm(utm: UTM): string {
  return `${utm.zone}${utm.band} ${Math.round(utm.easting)} ${Math.round(utm.northing)}`;
}

/** Latitude first (ISO 6709), 6 decimals - about 0.11 m. */
export function formatLatLng(point: LatLng): string {
  return `${point.lat.toFixed(6)} ${point.lng.toFixed(6)}`;
}
