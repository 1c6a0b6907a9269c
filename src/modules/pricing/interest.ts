/**
 * Collateral Loan Quotes - Interest Model
 *
 * total rate = base rate + tier risk premium + volatility premium
 */

import { toRate } from '../../shared/rounding';
import { lookupTier } from './risk-tiers';
import { AssetMetrics, InterestComponents } from './types';

// Base/federal rate shared by every asset and tier (6.33%)
export const BASE_RATE = 0.0633;

// Volatility premium bands over |30d % change|
const VOLATILITY_BANDS = [
  { below: 10, premium: 0.01 },
  { below: 20, premium: 0.015 },
] as const;
const MAX_VOLATILITY_PREMIUM = 0.02;
const DEFAULT_VOLATILITY_PREMIUM = 0.01;

// Keys the metrics store has used for the 30-day change, preferred first
const PCT_CHANGE_30D_KEYS = ['pct_change_30d', 'pct_change_30', '30dChange(%)'] as const;

export function toFiniteNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * 30-day percent change from a metrics payload, or null when absent or
 * unparseable. The first key carrying a value wins.
 */
export function readPctChange30d(metrics: AssetMetrics): number | null {
  for (const key of PCT_CHANGE_30D_KEYS) {
    const raw = metrics[key];
    if (raw !== undefined && raw !== null && raw !== '') {
      return toFiniteNumber(raw);
    }
  }
  return null;
}

export function readVolatilityScore(metrics: AssetMetrics): number | null {
  return toFiniteNumber(metrics.volatility_score);
}

export function volatilityPremium(pctChange30d: number | null | undefined): number {
  if (pctChange30d === null || pctChange30d === undefined || !Number.isFinite(pctChange30d)) {
    return DEFAULT_VOLATILITY_PREMIUM;
  }
  const magnitude = Math.abs(pctChange30d);
  for (const band of VOLATILITY_BANDS) {
    if (magnitude < band.below) {
      return band.premium;
    }
  }
  return MAX_VOLATILITY_PREMIUM;
}

/**
 * Each interest piece separately plus the total, all fractions rounded to
 * 4 decimals. Downstream aggregation consumes these rounded values.
 */
export function interestComponents(tier: string, metrics: AssetMetrics): InterestComponents {
  const { risk_premium } = lookupTier(tier);
  const volatility = volatilityPremium(readPctChange30d(metrics));
  const total = BASE_RATE + risk_premium + volatility;

  return {
    base_rate: toRate(BASE_RATE),
    risk_premium: toRate(risk_premium),
    volatility_premium: toRate(volatility),
    interest_rate: toRate(total),
  };
}
