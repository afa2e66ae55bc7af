/**
 * Gamma exposure profile
 */

import { describe, it, expect } from 'vitest';
import {
  chainVolume,
  computeGexProfile,
  isolateZeroDte,
  rowGex,
} from '../engine/gex.metrics.js';
import { row, spxChain } from './fixtures.js';

describe('computeGexProfile', () => {
  it('should reproduce the three-strike reference chain', () => {
    const rows = [
      row(100, 'call', 0.02, 500),
      row(100, 'put', 0.03, 400),
      row(105, 'call', 0.01, 200),
    ];
    const profile = computeGexProfile(rows, 102);

    expect(profile.strikes.map(s => [s.strike, s.callGex, s.putGex])).toEqual([
      [100, 102000, -122400],
      [105, 20400, 0],
    ]);
    // 102000 − 122400 + 20400
    expect(profile.totalGex).toBe(0);
    expect(profile.callWall).toBe(100);
    expect(profile.putWall).toBe(100);
    expect(profile.flipPoint).toBeNull();
  });

  it('should report the crossing strike for a two-strike chain', () => {
    const profile = computeGexProfile([
      row(100, 'call', 0.01, 100),
      row(110, 'put', 0.02, 100),
    ], 100);

    expect(profile.strikes.map(s => s.cumulativeGex)).toEqual([10000, -10000]);
    expect(profile.flipPoint).toBe(110);
  });

  it('should leave the flip point absent when the sign never changes', () => {
    const profile = computeGexProfile([
      row(95, 'call', 0.01, 100),
      row(100, 'call', 0.02, 100),
      row(105, 'put', 0.001, 100),
    ], 100);
    expect(profile.strikes.every(s => s.cumulativeGex > 0)).toBe(true);
    expect(profile.flipPoint).toBeNull();
  });

  it('should not count touching zero as a crossing', () => {
    const profile = computeGexProfile([
      row(100, 'call', 0.01, 100),
      row(105, 'put', 0.01, 100),
      row(110, 'call', 0.01, 100),
    ], 100);
    expect(profile.strikes.map(s => s.cumulativeGex)).toEqual([10000, 0, 10000]);
    expect(profile.flipPoint).toBeNull();
  });

  it('should not depend on row order', () => {
    const rows = [...spxChain().rows].filter(r => r.daysToExpiration <= 14);
    const forward = computeGexProfile(rows, 5000);
    const reversed = computeGexProfile([...rows].reverse(), 5000);

    expect(reversed).toEqual(forward);
    expect(forward.totalGex).toBe(750000);
    expect(forward.flipPoint).toBe(5050);
    expect(forward.callWall).toBe(5050);
    expect(forward.putWall).toBe(4950);
  });

  it('should break wall ties toward the lowest strike', () => {
    const profile = computeGexProfile([
      row(110, 'call', 0.01, 100),
      row(90, 'call', 0.01, 100),
      row(120, 'put', 0.01, 100),
      row(80, 'put', 0.01, 100),
    ], 100);
    expect(profile.callWall).toBe(90);
    expect(profile.putWall).toBe(80);
  });

  it('should treat a missing side or missing gamma as zero exposure', () => {
    expect(rowGex(row(100, 'call', null, 500), 100)).toBe(0);
    expect(Math.abs(rowGex(row(100, 'put', 0.01, null), 100))).toBe(0);

    const profile = computeGexProfile([row(100, 'call', 0.01, 100)], 100);
    expect(profile.strikes[0]).toMatchObject({ callGex: 10000, putGex: 0, hasPut: false });
    expect(profile.putWall).toBeNull();
  });

  it('should return an empty profile for no rows', () => {
    const profile = computeGexProfile([], 100);
    expect(profile.totalGex).toBe(0);
    expect(profile.callWall).toBeNull();
    expect(profile.flipPoint).toBeNull();
  });
});

describe('0DTE isolation', () => {
  it('should keep only same-day expiries', () => {
    const zero = isolateZeroDte(spxChain().rows);
    expect(zero.map(r => r.strike)).toEqual([5000, 4950]);
  });

  it('should accept a chain with no 0DTE listings', () => {
    const zero = isolateZeroDte([row(100, 'call', 0.01, 100)]);
    expect(zero).toEqual([]);
    expect(computeGexProfile(zero, 100).totalGex).toBe(0);
  });

  it('should split volume by side and expiry', () => {
    const rows = spxChain().rows.filter(r => r.daysToExpiration <= 14);
    expect(chainVolume(rows)).toEqual({
      callVolume: 10000,
      putVolume: 5000,
      zeroDteCallVolume: 6000,
      zeroDtePutVolume: 3000,
    });
  });
});
