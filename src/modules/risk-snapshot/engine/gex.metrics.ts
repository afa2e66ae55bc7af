/**
 * GAMMA EXPOSURE (GEX)
 *
 * Dealer-hedging proxy from option gamma and open interest:
 *
 *   call_gex =      gamma × OI × 100 × spot
 *   put_gex  = −1 × gamma × OI × 100 × spot
 *
 * Rows are summed per strike across expirations. A strike with only one
 * option type contributes zero on the other side, and a row with no
 * gamma or open interest contributes zero.
 */

import type { OptionChainRow } from '../contracts/market.types.js';

export const CONTRACT_MULTIPLIER = 100;

export interface StrikeExposure {
  strike: number;
  callGex: number;
  putGex: number;
  netGex: number;
  cumulativeGex: number;
  hasCall: boolean;
  hasPut: boolean;
}

export interface GexProfile {
  strikes: StrikeExposure[];
  callGexTotal: number;
  putGexTotal: number;
  totalGex: number;
  callWall: number | null;
  putWall: number | null;
  /** null when the cumulative exposure never changes sign */
  flipPoint: number | null;
}

export function rowGex(row: OptionChainRow, spot: number): number {
  const exposure = (row.gamma ?? 0) * (row.openInterest ?? 0) * CONTRACT_MULTIPLIER * spot;
  return row.optionType === 'call' ? exposure : -exposure;
}

/** Canonical row order so sums do not depend on delivery order */
function compareRows(a: OptionChainRow, b: OptionChainRow): number {
  if (a.strike !== b.strike) return a.strike - b.strike;
  if (a.optionType !== b.optionType) return a.optionType === 'call' ? -1 : 1;
  if (a.expiration !== b.expiration) return a.expiration < b.expiration ? -1 : 1;
  return (a.gamma ?? 0) - (b.gamma ?? 0) || (a.openInterest ?? 0) - (b.openInterest ?? 0);
}

export function computeGexProfile(rows: readonly OptionChainRow[], spot: number): GexProfile {
  const byStrike = new Map<number, StrikeExposure>();

  for (const row of [...rows].sort(compareRows)) {
    let s = byStrike.get(row.strike);
    if (!s) {
      s = { strike: row.strike, callGex: 0, putGex: 0, netGex: 0, cumulativeGex: 0, hasCall: false, hasPut: false };
      byStrike.set(row.strike, s);
    }
    if (row.optionType === 'call') {
      s.callGex += rowGex(row, spot);
      s.hasCall = true;
    } else {
      s.putGex += rowGex(row, spot);
      s.hasPut = true;
    }
  }

  const strikes = Array.from(byStrike.values()).sort((a, b) => a.strike - b.strike);

  let callGexTotal = 0;
  let putGexTotal = 0;
  let cumulative = 0;
  for (const s of strikes) {
    s.netGex = s.callGex + s.putGex;
    cumulative += s.netGex;
    s.cumulativeGex = cumulative;
    callGexTotal += s.callGex;
    putGexTotal += s.putGex;
  }

  return {
    strikes,
    callGexTotal,
    putGexTotal,
    totalGex: cumulative,
    callWall: findCallWall(strikes),
    putWall: findPutWall(strikes),
    flipPoint: findFlipPoint(strikes),
  };
}

// ═══════════════════════════════════════════════════════════════
// WALLS & FLIP
// ═══════════════════════════════════════════════════════════════

/** Strike with the largest call_gex; ties go to the lowest strike */
export function findCallWall(strikes: readonly StrikeExposure[]): number | null {
  let best: StrikeExposure | null = null;
  for (const s of strikes) {
    if (!s.hasCall) continue;
    if (!best || s.callGex > best.callGex || (s.callGex === best.callGex && s.strike < best.strike)) best = s;
  }
  return best ? best.strike : null;
}

/** Strike with the largest |put_gex|; ties go to the lowest strike */
export function findPutWall(strikes: readonly StrikeExposure[]): number | null {
  let best: StrikeExposure | null = null;
  for (const s of strikes) {
    if (!s.hasPut) continue;
    const size = Math.abs(s.putGex);
    const bestSize = best ? Math.abs(best.putGex) : -1;
    if (!best || size > bestSize || (size === bestSize && s.strike < best.strike)) best = s;
  }
  return best ? best.strike : null;
}

/**
 * First strike (ascending) at which the running cumulative GEX takes the
 * sign opposite to the last non-zero cumulative value. Touching zero is
 * not a crossing.
 */
export function findFlipPoint(strikes: readonly StrikeExposure[]): number | null {
  const ordered = [...strikes].sort((a, b) => a.strike - b.strike);
  let prevSign = 0;
  for (const s of ordered) {
    const sign = Math.sign(s.cumulativeGex);
    if (sign === 0) continue;
    if (prevSign !== 0 && sign !== prevSign) return s.strike;
    prevSign = sign;
  }
  return null;
}

// ═══════════════════════════════════════════════════════════════
// 0DTE
// ═══════════════════════════════════════════════════════════════

/** Same-day expiries. An empty result is valid (no 0DTE listed today). */
export function isolateZeroDte(rows: readonly OptionChainRow[]): OptionChainRow[] {
  return rows.filter(r => r.daysToExpiration === 0);
}

export interface ChainVolume {
  callVolume: number;
  putVolume: number;
  zeroDteCallVolume: number;
  zeroDtePutVolume: number;
}

export function chainVolume(rows: readonly OptionChainRow[]): ChainVolume {
  const v: ChainVolume = { callVolume: 0, putVolume: 0, zeroDteCallVolume: 0, zeroDtePutVolume: 0 };
  for (const r of rows) {
    const volume = r.volume ?? 0;
    const zeroDte = r.daysToExpiration === 0;
    if (r.optionType === 'call') {
      v.callVolume += volume;
      if (zeroDte) v.zeroDteCallVolume += volume;
    } else {
      v.putVolume += volume;
      if (zeroDte) v.zeroDtePutVolume += volume;
    }
  }
  return v;
}
