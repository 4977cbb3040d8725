import { describe, it, expect } from 'vitest';
import { BAND_LETTERS } from './types.js';
import { centralMeridian, isBandLetter, isSouthernBand, latitudeBand, MIN_NORTHING, zoneNumber, zoneSet } from './zone.js';

describe('zoneNumber', () => {
  it('uses 6° zones from 180°W', () => {
    expect(zoneNumber(51.95, 7.53)).toBe(32);
    expect(zoneNumber(0, -180)).toBe(1);
    expect(zoneNumber(0, -74.006)).toBe(18);
  });

  it('puts 180° in zone 60', () => {
    expect(zoneNumber(0, 180)).toBe(60);
  });

  it('widens zone 32 over Norway', () => {
    expect(zoneNumber(60, 4)).toBe(32);
    expect(zoneNumber(55.9, 4)).toBe(31);
    expect(zoneNumber(64, 4)).toBe(31);
  });

  it('uses the Svalbard zones', () => {
    expect(zoneNumber(75, 8)).toBe(31);
    expect(zoneNumber(75, 15)).toBe(33);
    expect(zoneNumber(75, 25)).toBe(35);
    expect(zoneNumber(75, 34)).toBe(37);
  });

  it('keeps the default zone elsewhere in the Svalbard band', () => {
    expect(zoneNumber(75, 45)).toBe(38);
    expect(zoneNumber(75, -5)).toBe(30);
    expect(zoneNumber(84, 8)).toBe(32);
  });
});

describe('latitudeBand', () => {
  it('maps 8° bands', () => {
    expect(latitudeBand(-80)).toBe('C');
    expect(latitudeBand(-72)).toBe('D');
    expect(latitudeBand(-0.0001)).toBe('M');
    expect(latitudeBand(0)).toBe('N');
    expect(latitudeBand(51.95)).toBe('U');
    expect(latitudeBand(71.9)).toBe('W');
  });

  it('widens X to 84°N', () => {
    expect(latitudeBand(72)).toBe('X');
    expect(latitudeBand(84)).toBe('X');
  });

  it('has no band for polar latitudes', () => {
    expect(latitudeBand(84.1)).toBeUndefined();
    expect(latitudeBand(-80.1)).toBeUndefined();
    expect(latitudeBand(Number.NaN)).toBeUndefined();
  });
});

describe('zone helpers', () => {
  it('computes central meridians', () => {
    expect(centralMeridian(1)).toBe(-177);
    expect(centralMeridian(32)).toBe(9);
    expect(centralMeridian(60)).toBe(177);
  });

  it('cycles 100 km sets every six zones', () => {
    expect(zoneSet(1)).toBe(1);
    expect(zoneSet(6)).toBe(6);
    expect(zoneSet(7)).toBe(1);
    expect(zoneSet(32)).toBe(2);
    expect(zoneSet(60)).toBe(6);
  });

  it('detects southern bands', () => {
    expect(isSouthernBand('M')).toBe(true);
    expect(isSouthernBand('C')).toBe(true);
    expect(isSouthernBand('N')).toBe(false);
    expect(isSouthernBand('X')).toBe(false);
  });

  it('recognises band letters', () => {
    expect(isBandLetter('C')).toBe(true);
    expect(isBandLetter('X')).toBe(true);
    expect(isBandLetter('I')).toBe(false);
    expect(isBandLetter('O')).toBe(false);
    expect(isBandLetter('Y')).toBe(false);
    expect(isBandLetter('c')).toBe(false);
  });

  it('has a minimum northing for every band', () => {
    expect(BAND_LETTERS.every(band => MIN_NORTHING[band] >= 0)).toBe(true);
    expect(MIN_NORTHING.N).toBe(0);
    expect(MIN_NORTHING.U).toBe(5300000);
  });
});
