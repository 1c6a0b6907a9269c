/**
 * Collateral Loan Quotes - Per-Asset Pricer
 *
 * Prices whatever tier it is handed; tier selection (overrides, the USDT
 * rule, classification) happens upstream.
 */

import { toCents } from '../../shared/rounding';
import { interestComponents, readPctChange30d } from './interest';
import { lookupTier } from './risk-tiers';
import { AssetBreakdown, AssetMetrics } from './types';

export function priceAsset(
  allocationUsd: number,
  tier: string,
  metrics: AssetMetrics,
  symbol: string,
): AssetBreakdown {
  const { name, ltv } = lookupTier(tier);
  const components = interestComponents(name, metrics);

  return {
    symbol,
    tier: name,
    ltv,
    ...components,
    collateral_usd: toCents(allocationUsd),
    loan_usd: toCents(allocationUsd * ltv),
    pct_change_30d: readPctChange30d(metrics),
  };
}
