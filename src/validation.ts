import { z } from 'zod';
import { fail, GridErrorKind, ok, type Result } from './errors.js';
import type { LatLng } from './types.js';

export const LatLngSchema = z.object({
  lat: z.number().min(-90, 'latitude below -90').max(90, 'latitude above 90'),
  lng: z.number().min(-180, 'longitude below -180').max(180, 'longitude above 180')
});

export const ZoneNumberSchema = z.number().int('zone number must be an integer').min(1).max(60);

/** Checks latitude and longitude ranges; polar coverage is decided by the band lookup. */
export function validateLatLng(point: LatLng): Result<LatLng> {
  const parsed = LatLngSchema.safeParse(point);
  if (parsed.success) return ok(parsed.data);

  // Longitude is reported first when both are out of range
  if (parsed.error.issues.some(issue => issue.path[0] === 'lng')) {
    return fail(GridErrorKind.OUT_OF_RANGE_LONGITUDE, `invalid longitude, lng = ${point.lng}`);
  }
  return fail(GridErrorKind.OUT_OF_RANGE_LATITUDE, `invalid latitude, lat = ${point.lat}`);
}

export function validateZone(zone: number): Result<number> {
  const parsed = ZoneNumberSchema.safeParse(zone);
  if (!parsed.success) return fail(GridErrorKind.INVALID_ZONE_NUMBER, `invalid zone number, zone = ${zone}`);
  return ok(parsed.data);
}
