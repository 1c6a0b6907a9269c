/**
 * Collateral Loan Quotes - Risk Tier Policy
 *
 * One source of truth for LTV and risk premium per tier (fractions).
 */

import { UnknownTierError } from '../../shared/errors';

export const TIER_NAMES = ['Tier 1', 'Tier 1.5', 'Tier 2', 'Tier 3'] as const;

export type TierName = typeof TIER_NAMES[number];

export interface RiskTier {
  readonly name: TierName;
  readonly ltv: number;
  readonly risk_premium: number;
  readonly note: string;
}

export const RISK_TIERS: Readonly<Record<TierName, RiskTier>> = Object.freeze({
  'Tier 1': Object.freeze({ name: 'Tier 1', ltv: 0.72, risk_premium: 0.05, note: 'Blue-chip, high liquidity' }),
  'Tier 1.5': Object.freeze({ name: 'Tier 1.5', ltv: 0.65, risk_premium: 0.10, note: 'Large-cap, strong liquidity' }),
  'Tier 2': Object.freeze({ name: 'Tier 2', ltv: 0.60, risk_premium: 0.15, note: 'Mid-cap, moderate liquidity' }),
  'Tier 3': Object.freeze({ name: 'Tier 3', ltv: 0.55, risk_premium: 0.25, note: 'High volatility / risk' }),
});

export function isTierName(value: string): value is TierName {
  return TIER_NAMES.some(name => name === value);
}

/**
 * Resolve a tier by name. Throws UnknownTierError outside the table.
 */
export function lookupTier(name: string): RiskTier {
  if (!isTierName(name)) {
    throw new UnknownTierError(name);
  }
  return RISK_TIERS[name];
}

export function listTiers(): RiskTier[] {
  return TIER_NAMES.map(name => RISK_TIERS[name]);
}
