/**
 * MARGIN DEBT RATIOS
 *
 * Margin debt is published monthly with a lag. "Current" is the latest
 * present value at or before as-of; the comparator applies the same rule
 * independently at as-of minus twelve months.
 */

import { missingInput, valueOf, type MetricOutcome } from '../contracts/metric.types.js';
import { safeRatio } from './numeric.js';

/** (current − 12 months ago) / 12 months ago */
export function marginDebtYoy(current: number | null, yearAgo: number | null): MetricOutcome<number> {
  const missing: string[] = [];
  if (current === null) missing.push('finra_margin_debt');
  if (yearAgo === null || yearAgo === 0) missing.push('finra_margin_debt_12m_ago');
  if (current === null || yearAgo === null || yearAgo === 0) return missingInput(...missing);
  return valueOf((current - yearAgo) / yearAgo);
}

export function marginDebtToMarketCap(debt: number | null, marketCap: number | null): MetricOutcome<number> {
  return safeRatio(debt, marketCap, { numerator: 'finra_margin_debt', denominator: 'spx_mktcap' });
}

export function marginDebtToGdp(debt: number | null, gdp: number | null): MetricOutcome<number> {
  return safeRatio(debt, gdp, { numerator: 'finra_margin_debt', denominator: 'us_gdp' });
}
