/**
 * Instrument reference sheet for the options and leverage monitors.
 */

import type { Instrument } from '../contracts/market.types.js';

export const INSTRUMENTS: readonly Instrument[] = [
  // Put/Call ratios
  { id: 'PCUSEQTR Index', assetClass: 'index', description: 'CBOE equity put/call ratio' },
  { id: 'PCUSIDXT Index', assetClass: 'index', description: 'CBOE index put/call ratio' },
  { id: 'PCUSTOTT Index', assetClass: 'index', description: 'CBOE total put/call ratio' },

  // Volatility
  { id: 'VIX Index', assetClass: 'index', description: 'CBOE volatility index' },
  { id: 'SKEW Index', assetClass: 'index', description: 'CBOE SKEW index' },
  { id: 'UX1 Index', assetClass: 'future', description: 'VIX future, 1st month' },
  { id: 'UX2 Index', assetClass: 'future', description: 'VIX future, 2nd month' },
  { id: 'UX3 Index', assetClass: 'future', description: 'VIX future, 3rd month' },
  { id: 'UX4 Index', assetClass: 'future', description: 'VIX future, 4th month' },

  // Leverage
  { id: 'FINRMRGD Index', assetClass: 'index', description: 'FINRA margin debt' },
  { id: 'GDP CUR$ Index', assetClass: 'index', description: 'US nominal GDP' },

  // Positioning
  { id: 'GSTHHFML Index', assetClass: 'equity', description: 'GS hedge fund crowded longs basket' },

  // Financing
  { id: 'GSUSFCI Index', assetClass: 'index', description: 'GS US financial conditions index' },
  { id: 'BAMLHYSP Index', assetClass: 'index', description: 'ICE BofA US high yield OAS' },

  // Cross-asset
  { id: 'SPX Index', assetClass: 'index', description: 'S&P 500' },
];

export function findInstrument(id: string): Instrument | undefined {
  return INSTRUMENTS.find(i => i.id === id);
}
