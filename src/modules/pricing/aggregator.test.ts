import { describe, it, expect } from '@jest/globals';
import { aggregatePortfolio, blendedRateEmi } from './aggregator';
import { priceAsset } from './pricer';
import { AssetBreakdown } from './types';

function row(overrides: Partial<AssetBreakdown>): AssetBreakdown {
  return {
    symbol: 'BTC',
    tier: 'Tier 1',
    ltv: 0.72,
    base_rate: 0.0633,
    risk_premium: 0.05,
    volatility_premium: 0.01,
    interest_rate: 0.1233,
    collateral_usd: 1000,
    loan_usd: 720,
    pct_change_30d: null,
    ...overrides,
  };
}

describe('Portfolio aggregator', () => {
  const rows = [
    priceAsset(250000, 'Tier 1', {}, 'BTC'),
    priceAsset(250000, 'Tier 1.5', { pct_change_30d: -12.5 }, 'ETH'),
    priceAsset(250000, 'Tier 1', {}, 'USDT'),
    priceAsset(250000, 'Tier 1', { pct_change_30d: 25 }, 'SOL'),
  ];

  it('folds four equal allocations into portfolio totals', () => {
    expect(aggregatePortfolio(rows, 6)).toEqual({
      total_collateral: 1000000,
      total_loan: 702500,
      portfolio_ltv: 70.25,
      liquidation_ltv: 84.3,
      margin_call_ltv: 77.28,
      interest_rate: 13.86,
      monthly_emi: 121861.19,
      months: 6,
      emi_basis: 'blended_rate',
    });
  });

  it('keeps total_loan equal to the sum of asset loans', () => {
    const summary = aggregatePortfolio(rows, 6);
    const sum = rows.reduce((acc, r) => acc + r.loan_usd, 0);
    expect(summary.total_loan).toBeCloseTo(sum, 2);
  });

  it('caps liquidation LTV at 95%', () => {
    const summary = aggregatePortfolio([row({ collateral_usd: 1000, loan_usd: 900 })], 6);
    expect(summary.portfolio_ltv).toBe(90);
    expect(summary.liquidation_ltv).toBe(95);
    expect(summary.margin_call_ltv).toBe(92.5);
  });

  it('returns zeros for an empty portfolio', () => {
    expect(aggregatePortfolio([], 6)).toMatchObject({
      total_collateral: 0,
      total_loan: 0,
      portfolio_ltv: 0,
      liquidation_ltv: 0,
      margin_call_ltv: 0,
      interest_rate: 0,
      monthly_emi: 0,
    });
  });

  it('uses straight-line EMI at a zero rate and none for a non-positive term', () => {
    expect(aggregatePortfolio([row({ loan_usd: 1200, interest_rate: 0 })], 12).monthly_emi).toBe(100);
    expect(aggregatePortfolio([row({})], 0).monthly_emi).toBe(0);
    expect(blendedRateEmi(1000, 0.12, -3)).toBe(0);
  });
});
