// Snyder's Transverse Mercator series (USGS PP 1395), 4th order in e² - sub-meter accuracy

import { fail, GridErrorKind, ok, type Result } from './errors.js';
import type { LatLng, UTM } from './types.js';
import { validateLatLng, validateZone } from './validation.js';
import { centralMeridian, isSouthernBand, latitudeBand, zoneNumber } from './zone.js';

const A = 6378137;
const E2 = 0.00669438;
const EP2 = E2 / (1 - E2);
const K0 = 0.9996;

const FALSE_EASTING = 500000;
const FALSE_NORTHING = 10000000;

// Meridional arc coefficients
const E4 = E2 * E2, E6 = E4 * E2;
const M0 = 1 - E2 / 4 - 3 * E4 / 64 - 5 * E6 / 256;
const M2 = 3 * E2 / 8 + 3 * E4 / 32 + 45 * E6 / 1024;
const M4 = 15 * E4 / 256 + 45 * E6 / 1024;
const M6 = 35 * E6 / 3072;

// Footpoint latitude coefficients
const SQRT_1_E2 = Math.sqrt(1 - E2);
const E1 = (1 - SQRT_1_E2) / (1 + SQRT_1_E2);
const P2 = 3 * E1 / 2 - 27 * E1 ** 3 / 32;
const P4 = 21 * E1 ** 2 / 16 - 55 * E1 ** 4 / 32;
const P6 = 151 * E1 ** 3 / 96;

const DEG2RAD = Math.PI / 180;
const RAD2DEG = 180 / Math.PI;

export function latLngToUtm(point: LatLng): Result<UTM> {
  const checked = validateLatLng(point);
  if (!checked.success) return checked;

  const { lat, lng } = checked.data;
  const band = latitudeBand(lat);
  if (band === undefined) {
    return fail(GridErrorKind.UNSUPPORTED_POLAR_LATITUDE, `polar regions below 80°S and above 84°N not supported, lat = ${lat}`);
  }

  const zone = zoneNumber(lat, lng);
  const phi = lat * DEG2RAD;
  const lam = (lng - centralMeridian(zone)) * DEG2RAD;

  const sinPhi = Math.sin(phi), cosPhi = Math.cos(phi), tanPhi = Math.tan(phi);
  const n = A / Math.sqrt(1 - E2 * sinPhi * sinPhi);
  const t = tanPhi * tanPhi;
  const c = EP2 * cosPhi * cosPhi;
  const a = cosPhi * lam;
  const m = A * (M0 * phi - M2 * Math.sin(2 * phi) + M4 * Math.sin(4 * phi) - M6 * Math.sin(6 * phi));

  const a2 = a * a, a3 = a2 * a, a4 = a3 * a, a5 = a4 * a, a6 = a5 * a;

  const easting = K0 * n * (a + (1 - t + c) * a3 / 6 + (5 - 18 * t + t * t + 72 * c - 58 * EP2) * a5 / 120) + FALSE_EASTING;
  const northing = K0 * (m + n * tanPhi * (a2 / 2 + (5 - t + 9 * c + 4 * c * c) * a4 / 24 + (61 - 58 * t + t * t + 600 * c - 330 * EP2) * a6 / 720));

  return ok({
    zone,
    band,
    easting: Math.trunc(easting),
    northing: Math.trunc(lat < 0 ? northing + FALSE_NORTHING : northing)
  });
}

/**
 * Inverse projection. The hemisphere comes from `utm.band` alone (below 'N' is
 * south); the band is not checked against the resulting latitude.
 */
export function utmToLatLng(utm: UTM): Result<LatLng> {
  const zone = validateZone(utm.zone);
  if (!zone.success) return zone;

  const x = utm.easting - FALSE_EASTING;
  const y = isSouthernBand(utm.band) ? utm.northing - FALSE_NORTHING : utm.northing;

  const mu = y / K0 / (A * M0);
  const phi1 = mu + P2 * Math.sin(2 * mu) + P4 * Math.sin(4 * mu) + P6 * Math.sin(6 * mu);

  const sinPhi1 = Math.sin(phi1), cosPhi1 = Math.cos(phi1), tanPhi1 = Math.tan(phi1);
  const w = 1 - E2 * sinPhi1 * sinPhi1;
  const n1 = A / Math.sqrt(w);
  const t1 = tanPhi1 * tanPhi1;
  const c1 = EP2 * cosPhi1 * cosPhi1;
  const r1 = A * (1 - E2) / Math.pow(w, 1.5);
  const d = x / (n1 * K0);

  const d2 = d * d, d3 = d2 * d, d4 = d3 * d, d5 = d4 * d, d6 = d5 * d;

  const lat = phi1 - (n1 * tanPhi1 / r1) * (d2 / 2 - (5 + 3 * t1 + 10 * c1 - 4 * c1 * c1 - 9 * EP2) * d4 / 24 + (61 + 90 * t1 + 298 * c1 + 45 * t1 * t1 - 252 * EP2 - 3 * c1 * c1) * d6 / 720);
  const lng = (d - (1 + 2 * t1 + c1) * d3 / 6 + (5 - 2 * c1 + 28 * t1 - 3 * c1 * c1 + 8 * EP2 + 24 * t1 * t1) * d5 / 120) / cosPhi1;

  return ok({
    lat: lat * RAD2DEG,
    lng: centralMeridian(zone.data) + lng * RAD2DEG
  });
}

export function latLngToUtmBatch(coords: [number, number][]): Result<UTM>[] {
  return coords.map(([lat, lng]) => latLngToUtm({ lat, lng }));
}

export function utmToLatLngBatch(utms: UTM[]): Result<LatLng>[] {
  return utms.map(u => utmToLatLng(u));
}
