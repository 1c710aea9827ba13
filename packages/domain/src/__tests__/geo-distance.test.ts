import { describe, it, expect } from '@jest/globals';

import { EARTH_RADIUS_KM, createLocation, distanceKm } from '../index.js';

const KM_PER_DEGREE = (EARTH_RADIUS_KM * Math.PI) / 180;

describe('distanceKm', () => {
  it('is zero for identical coordinates', () => {
    const p = createLocation(43.4643, -80.5204);
    expect(distanceKm(p, p)).toBe(0);
  });

  it('is symmetric', () => {
    const a = createLocation(51.5074, -0.1278);
    const b = createLocation(48.8566, 2.3522);
    expect(distanceKm(a, b)).toBe(distanceKm(b, a));
  });

  it('measures one degree along the equator', () => {
    expect(distanceKm(createLocation(0, 0), createLocation(0, 1))).toBeCloseTo(KM_PER_DEGREE, 9);
  });

  it('measures one degree along a meridian', () => {
    expect(distanceKm(createLocation(10, 30), createLocation(11, 30))).toBeCloseTo(KM_PER_DEGREE, 9);
  });

  it('gives half the circumference for antipodal points', () => {
    expect(distanceKm(createLocation(0, 0), createLocation(0, 180))).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 6);
  });

  it('stays finite when rounding pushes antipodal points past half the circumference', () => {
    const lats = [3.06, 3.0600000000000005, ...Array.from({ length: 1000 }, (_, i) => i / 100)];
    for (const lat of lats) {
      const d = distanceKm(createLocation(lat, 0.3), createLocation(-lat, -179.7));
      expect(Number.isFinite(d)).toBe(true);
      expect(d).toBeCloseTo(Math.PI * EARTH_RADIUS_KM, 2);
    }
  });

  it('puts Waterloo and Toronto roughly 95 km apart', () => {
    const waterloo = createLocation(43.4643, -80.5204);
    const toronto = createLocation(43.6532, -79.3832);
    const d = distanceKm(waterloo, toronto);
    expect(d).toBeGreaterThan(90);
    expect(d).toBeLessThan(110);
  });

  it('never returns NaN for near-identical points', () => {
    const a = createLocation(89.9999999, 179.9999999);
    const b = createLocation(89.9999999, -179.9999999);
    const d = distanceKm(a, b);
    expect(Number.isNaN(d)).toBe(false);
    expect(d).toBeGreaterThanOrEqual(0);
  });
});
