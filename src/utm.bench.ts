import { bench, describe } from 'vitest';
import proj4 from 'proj4';
import { latLngToUtm, utmToLatLng } from './utm.js';
import { mgrsToUtm, utmToMgrs } from './mgrs.js';
import { unwrap } from './errors.js';
import type { UTM } from './types.js';

const size = 1000;

// Fixed lattice so runs are comparable
const testData = Array.from({ length: size }, (_, i) => ({
  lat: ((i * 37) % 1600) / 10 - 80,
  lng: ((i * 53) % 3600) / 10 - 180
}));
const utmData: UTM[] = testData.map(p => unwrap(latLngToUtm(p)));
const mgrsData = utmData.map(u => utmToMgrs(u, 1));

const utmDef = (zone: number, south: boolean) => `+proj=utm +zone=${zone}${south ? ' +south' : ''} +datum=WGS84 +units=m +no_defs`;
const proj4Utm = Array.from({ length: 60 }, (_, i) => ({ north: proj4(utmDef(i + 1, false)), south: proj4(utmDef(i + 1, true)) }));

function converter(zone: number, south: boolean) {
  const c = proj4Utm[zone - 1];
  return south ? c.south : c.north;
}

const opts = { iterations: 10, warmupIterations: 2 };

describe(`latLngToUtm n=${size}`, () => {
  bench('utm-mgrs-grid', () => { for (const p of testData) latLngToUtm(p); }, opts);
  bench('proj4', () => { for (const { lat, lng } of testData) converter(Math.floor((lng + 180) / 6) + 1, lat < 0).forward([lng, lat]); }, opts);
});

describe(`utmToLatLng n=${size}`, () => {
  bench('utm-mgrs-grid', () => { for (const u of utmData) utmToLatLng(u); }, opts);
  bench('proj4', () => { for (const u of utmData) converter(u.zone, u.band < 'N').inverse([u.easting, u.northing]); }, opts);
});

describe(`mgrs n=${size}`, () => {
  bench('utmToMgrs', () => { for (const u of utmData) utmToMgrs(u, 1); }, opts);
  bench('mgrsToUtm', () => { for (const m of mgrsData) mgrsToUtm(m); }, opts);
});
