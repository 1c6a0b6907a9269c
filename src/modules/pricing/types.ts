/**
 * Collateral Loan Quotes - Pricing Types
 *
 * Field names follow the JSON the API returns, so rows flow to the caller
 * without a mapping layer.
 */

import { TierName } from './risk-tiers';

// ============================================================================
// INPUTS
// ============================================================================

/**
 * Raw metrics payload for one symbol as the metrics store returns it.
 * Every field is optional; see readPctChange30d / readVolatilityScore.
 */
export type AssetMetrics = Record<string, unknown>;

export interface AssetAllocation {
  symbol: string;
  allocation_usd: number;
  tier_override?: TierName;
}

// ============================================================================
// PER-ASSET
// ============================================================================

export interface InterestComponents {
  base_rate: number;
  risk_premium: number;
  volatility_premium: number;
  interest_rate: number;         // base + risk + volatility
}

export interface AssetBreakdown extends InterestComponents {
  symbol: string;
  tier: TierName;
  ltv: number;                   // fraction
  collateral_usd: number;
  loan_usd: number;              // collateral_usd × ltv
  pct_change_30d: number | null;
}

// ============================================================================
// PORTFOLIO
// ============================================================================

/**
 * How monthly_emi was produced. Only 'per_asset_schedules' is final.
 */
export type EmiBasis = 'blended_rate' | 'per_asset_schedules';

interface PortfolioFigures {
  total_collateral: number;
  total_loan: number;
  portfolio_ltv: number;         // percent
  liquidation_ltv: number;       // percent
  margin_call_ltv: number;       // percent
  interest_rate: number;         // percent, loan-weighted
  monthly_emi: number;
  months: number;
}

/** Aggregator output: EMI estimated from the blended rate. */
export interface ProvisionalPortfolioSummary extends PortfolioFigures {
  emi_basis: 'blended_rate';
}

/** EMI recomputed as the sum of per-asset level payments. */
export interface PortfolioSummary extends PortfolioFigures {
  emi_basis: 'per_asset_schedules';
}

// ============================================================================
// AMORTIZATION
// ============================================================================

export interface AmortizationRow {
  month: number;                 // 1-indexed
  opening_balance: number;
  payment: number;
  interest: number;
  principal: number;
  ending_balance: number;
}

export interface AmortizationSchedule {
  payment: number;               // level payment, cents
  rows: AmortizationRow[];
}

export interface LoanSchedule {
  portfolio: AmortizationRow[];
  assets: Record<string, AmortizationRow[]>;
  payments: Record<string, number>;
}

// ============================================================================
// OUTPUT
// ============================================================================

export interface PricedPortfolio {
  assets: AssetBreakdown[];
  summary: ProvisionalPortfolioSummary;
}

export interface LoanProfile {
  assets: AssetBreakdown[];
  summary: PortfolioSummary;
  schedule: LoanSchedule;
}
