/**
 * Collateral Loan Quotes - Portfolio Aggregator
 *
 * Folds per-asset rows into portfolio totals. LTV and interest figures come
 * out as PERCENT values; money as cents.
 */

import { toCents } from '../../shared/rounding';
import { AssetBreakdown, ProvisionalPortfolioSummary } from './types';

// Liquidation sits 20% above the current LTV, capped at 95%
const LIQUIDATION_MULTIPLIER = 1.2;
const LIQUIDATION_CAP = 0.95;

/**
 * Level payment for a blended-rate loan. Only an estimate: interest really
 * compounds per asset at each asset's own rate.
 */
export function blendedRateEmi(principal: number, annualRate: number, months: number): number {
  if (months <= 0) return 0;

  const monthlyRate = annualRate / 12;
  if (monthlyRate > 0) {
    return principal * monthlyRate / (1 - Math.pow(1 + monthlyRate, -months));
  }
  return principal / months;
}

export function aggregatePortfolio(rows: AssetBreakdown[], months: number): ProvisionalPortfolioSummary {
  const term = Math.trunc(months);
  const totalCollateral = rows.reduce((sum, row) => sum + row.collateral_usd, 0);
  const totalLoan = rows.reduce((sum, row) => sum + row.loan_usd, 0);

  const weightedLtv = totalCollateral ? totalLoan / totalCollateral : 0;

  // Loan-amount weighted average of each asset's total rate
  let weightedRate = 0;
  for (const row of rows) {
    const weight = totalLoan ? row.loan_usd / totalLoan : 0;
    weightedRate += row.interest_rate * weight;
  }

  const liquidationLtv = Math.min(weightedLtv * LIQUIDATION_MULTIPLIER, LIQUIDATION_CAP);
  const marginCallPct = (weightedLtv * 100 + liquidationLtv * 100) / 2;

  return {
    total_collateral: toCents(totalCollateral),
    total_loan: toCents(totalLoan),
    portfolio_ltv: toCents(weightedLtv * 100),
    liquidation_ltv: toCents(liquidationLtv * 100),
    margin_call_ltv: toCents(marginCallPct),
    interest_rate: toCents(weightedRate * 100),
    monthly_emi: toCents(blendedRateEmi(totalLoan, weightedRate, term)),
    months: term,
    emi_basis: 'blended_rate',
  };
}
