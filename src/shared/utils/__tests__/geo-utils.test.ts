import { describe, it, expect } from 'vitest';
import { getCoordinates, haversineDistanceKm } from '../geo-utils';

describe('haversineDistanceKm', () => {
  it('returns zero for the same point', () => {
    const point = { latitude: -26.2041, longitude: 28.0473 };
    expect(haversineDistanceKm(point, point)).toBe(0);
  });

  it('measures one degree of longitude on the equator', () => {
    const distance = haversineDistanceKm(
      { latitude: 0, longitude: 0 },
      { latitude: 0, longitude: 1 }
    );
    expect(distance).toBeCloseTo(111.195, 3);
  });

  it('measures a short hop inside a city', () => {
    const distance = haversineDistanceKm(
      { latitude: -26.2, longitude: 28.04 },
      { latitude: -26.21, longitude: 28.05 }
    );
    expect(distance).toBeCloseTo(1.4939, 4);
  });

  it('is symmetric', () => {
    const johannesburg = { latitude: -26.2041, longitude: 28.0473 };
    const capeTown = { latitude: -33.9249, longitude: 18.4241 };
    expect(haversineDistanceKm(johannesburg, capeTown)).toBeCloseTo(
      haversineDistanceKm(capeTown, johannesburg),
      9
    );
    expect(haversineDistanceKm(johannesburg, capeTown)).toBeCloseTo(1261.58, 1);
  });
});

describe('getCoordinates', () => {
  it('returns the pair when both values are present', () => {
    expect(getCoordinates({ latitude: 1.5, longitude: -2.5, city: 'Somewhere' })).toEqual({
      latitude: 1.5,
      longitude: -2.5,
    });
  });

  it('returns null for a missing location or a partial pair', () => {
    expect(getCoordinates(undefined)).toBeNull();
    expect(getCoordinates({ latitude: 1.5 })).toBeNull();
    expect(getCoordinates({ longitude: 1.5 })).toBeNull();
  });

  it('accepts zero coordinates', () => {
    expect(getCoordinates({ latitude: 0, longitude: 0 })).toEqual({ latitude: 0, longitude: 0 });
  });

  it('rejects non-finite values', () => {
    expect(getCoordinates({ latitude: Number.NaN, longitude: 0 })).toBeNull();
    expect(getCoordinates({ latitude: 0, longitude: Number.POSITIVE_INFINITY })).toBeNull();
  });
});
