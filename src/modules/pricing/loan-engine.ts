/**
 * Collateral Loan Quotes - Loan Engine
 *
 * The only public entry sequence:
 *   price each asset -> aggregate -> attach amortization (final EMI)
 * Pure and synchronous; collaborators are resolved before this runs.
 */

import { aggregatePortfolio } from './aggregator';
import { attachAmortization } from './amortization';
import { priceAsset } from './pricer';
import { TierName } from './risk-tiers';
import { AssetMetrics, LoanProfile, PricedPortfolio } from './types';

export interface PricingInput {
  symbol: string;
  allocation_usd: number;
  tier: TierName;
  metrics: AssetMetrics;
}

export function pricePortfolio(inputs: PricingInput[], months: number): PricedPortfolio {
  const assets = inputs.map(input =>
    priceAsset(input.allocation_usd, input.tier, input.metrics, input.symbol),
  );
  return { assets, summary: aggregatePortfolio(assets, months) };
}

export function buildLoanProfile(inputs: PricingInput[], months: number): LoanProfile {
  return attachAmortization(pricePortfolio(inputs, months));
}
