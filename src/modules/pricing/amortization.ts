/**
 * Collateral Loan Quotes - Amortization Engine
 *
 * Level-payment schedules per asset, the pointwise portfolio sum, and the
 * EMI callers are allowed to read as final.
 */

import { ScheduleLengthMismatchError } from '../../shared/errors';
import { toCents } from '../../shared/rounding';
import {
  AmortizationRow,
  AmortizationSchedule,
  LoanProfile,
  LoanSchedule,
  PricedPortfolio,
} from './types';

export function levelPayment(principal: number, monthlyRate: number, months: number): number {
  if (monthlyRate === 0) {
    return principal / months;
  }
  return principal * monthlyRate / (1 - Math.pow(1 + monthlyRate, -months));
}

/**
 * Build a level-payment schedule. The payment is rounded to cents once and
 * reused for every row; the last row pays off the exact opening balance so
 * the schedule always ends at 0.00.
 */
export function buildSchedule(principalUsd: number, annualRate: number, months: number): AmortizationSchedule {
  const term = Math.trunc(months);
  if (term <= 0 || principalUsd <= 0) {
    return { payment: 0, rows: [] };
  }

  const monthlyRate = annualRate / 12;
  const payment = toCents(levelPayment(principalUsd, monthlyRate, term));

  const rows: AmortizationRow[] = [];
  let balance = principalUsd;

  for (let month = 1; month <= term; month++) {
    const opening = balance;
    const interest = toCents(opening * monthlyRate);
    let principal = toCents(payment - interest);
    let paid = payment;

    if (month === term) {
      principal = toCents(opening);
      paid = toCents(principal + interest);
    }

    balance = toCents(opening - principal);
    rows.push({
      month,
      opening_balance: toCents(opening),
      payment: toCents(paid),
      interest,
      principal,
      ending_balance: balance,
    });
  }

  return { payment, rows };
}

/**
 * Pointwise sum of per-asset schedules. Every schedule must have the same
 * number of rows; a mismatch throws instead of truncating.
 */
export function sumSchedules(perAsset: Record<string, AmortizationRow[]>): AmortizationRow[] {
  const schedules = Object.entries(perAsset);
  if (schedules.length === 0) return [];

  const [, reference] = schedules[0];
  for (const [symbol, rows] of schedules) {
    if (rows.length !== reference.length) {
      throw new ScheduleLengthMismatchError(symbol, reference.length, rows.length);
    }
  }

  return reference.map((referenceRow, index) => {
    const total = { opening_balance: 0, payment: 0, interest: 0, principal: 0, ending_balance: 0 };
    for (const [, rows] of schedules) {
      const row = rows[index];
      total.opening_balance += row.opening_balance;
      total.payment += row.payment;
      total.interest += row.interest;
      total.principal += row.principal;
      total.ending_balance += row.ending_balance;
    }

    return {
      month: referenceRow.month,
      opening_balance: toCents(total.opening_balance),
      payment: toCents(total.payment),
      interest: toCents(total.interest),
      principal: toCents(total.principal),
      ending_balance: toCents(total.ending_balance),
    };
  });
}

/**
 * Attach per-asset and portfolio schedules and replace the blended-rate EMI
 * with the sum of per-asset level payments.
 */
export function attachAmortization(priced: PricedPortfolio): LoanProfile {
  const { assets, summary } = priced;
  const months = summary.months;

  if (months <= 0) {
    return {
      assets,
      summary: { ...summary, monthly_emi: 0, emi_basis: 'per_asset_schedules' },
      schedule: { portfolio: [], assets: {}, payments: {} },
    };
  }

  const schedule: LoanSchedule = { portfolio: [], assets: {}, payments: {} };
  for (const asset of assets) {
    if (Object.hasOwn(schedule.assets, asset.symbol)) {
      throw new Error(`Duplicate symbol in priced portfolio: ${asset.symbol}`);
    }
    const { payment, rows } = buildSchedule(asset.loan_usd, asset.interest_rate, months);
    schedule.assets[asset.symbol] = rows;
    schedule.payments[asset.symbol] = payment;
  }
  schedule.portfolio = sumSchedules(schedule.assets);

  const monthlyEmi = Object.values(schedule.payments).reduce((sum, payment) => sum + payment, 0);

  return {
    assets,
    summary: { ...summary, monthly_emi: toCents(monthlyEmi), emi_basis: 'per_asset_schedules' },
    schedule,
  };
}
