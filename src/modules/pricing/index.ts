/**
 * Collateral Loan Quotes - Pricing Module
 */

export * from './types';
export * from './risk-tiers';
export * from './interest';
export * from './pricer';
export * from './aggregator';
export * from './amortization';
export * from './loan-engine';
