/**
 * Collateral Loan Quotes - Quote Service
 *
 * Turns a validated loan request into a LoanProfile:
 *   1. resolve each asset's tier (override > USDT rule > classifier)
 *   2. fetch metrics (a failed fetch prices as "metrics absent")
 *   3. run the loan engine
 */

import { z } from 'zod';
import { BadRequestError, UnknownTierError } from '../../shared/errors';
import { MetricsSource } from '../metrics/metrics.client';
import {
  AssetAllocation,
  AssetMetrics,
  buildLoanProfile,
  isTierName,
  LoanProfile,
  PricingInput,
  TierName,
} from '../pricing';
import { TierClassifier } from '../risk/risk-classifier';

// ============================================================================
// REQUEST VALIDATION
// ============================================================================

export const DEFAULT_TERM_MONTHS = 6;
export const MAX_TERM_MONTHS = 360;

// Stablecoin priced at the top tier unless the caller overrides it
const STABLECOIN_SYMBOL = 'USDT';
const STABLECOIN_TIER: TierName = 'Tier 1';

const AssetRequestSchema = z.object({
  symbol: z.string({ required_error: 'symbol is required' }).trim().min(1, 'symbol must not be empty'),
  allocation_usd: z.coerce
    .number({ invalid_type_error: 'allocation_usd must be a number' })
    .finite()
    .min(0.01, 'allocation_usd too small to secure a loan (minimum 0.01)'),
  tier: z.string().optional(),
  tier_override: z.string().optional(),
});

const LoanRequestSchema = z.object({
  assets: z.array(AssetRequestSchema, { required_error: 'assets is required' }).min(1, 'assets is required'),
  months: z.coerce
    .number()
    .int('months must be an integer')
    .min(1, 'months must be at least 1')
    .max(MAX_TERM_MONTHS, `months must be at most ${MAX_TERM_MONTHS}`)
    .default(DEFAULT_TERM_MONTHS),
});

export interface LoanQuoteRequest {
  assets: AssetAllocation[];
  months: number;
}

/**
 * Validate the whole request before anything is priced. Symbols are
 * upper-cased; `tier_override` takes precedence over `tier`.
 */
export function parseLoanRequest(body: unknown): LoanQuoteRequest {
  const parsed = LoanRequestSchema.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
    );
    throw new BadRequestError(parsed.error.issues[0]?.message ?? 'Invalid request', details);
  }

  const seen = new Set<string>();
  const assets = parsed.data.assets.map((asset): AssetAllocation => {
    const symbol = asset.symbol.toUpperCase();
    if (seen.has(symbol)) {
      throw new BadRequestError(`Duplicate asset symbol: ${symbol}`);
    }
    seen.add(symbol);

    const override = asset.tier_override ?? asset.tier;
    if (override === undefined || override === '') {
      return { symbol, allocation_usd: asset.allocation_usd };
    }
    if (!isTierName(override)) {
      throw new UnknownTierError(override);
    }
    return { symbol, allocation_usd: asset.allocation_usd, tier_override: override };
  });

  return { assets, months: parsed.data.months };
}

// ============================================================================
// QUOTE SERVICE
// ============================================================================

export class LoanQuoteService {
  constructor(
    private readonly metrics: MetricsSource,
    private readonly classifier: TierClassifier,
  ) {}

  async calculate(request: LoanQuoteRequest): Promise<LoanProfile> {
    if (request.assets.length === 0) {
      throw new BadRequestError('assets is required');
    }

    const inputs = await Promise.all(request.assets.map(asset => this.resolveInput(asset)));
    const profile = buildLoanProfile(inputs, request.months);

    console.log(
      `[LoanQuote] Priced ${profile.assets.length} asset(s) | loan=${profile.summary.total_loan} | ` +
      `emi=${profile.summary.monthly_emi} | months=${profile.summary.months}`,
    );
    return profile;
  }

  async resolveTier(asset: AssetAllocation): Promise<TierName> {
    if (asset.tier_override) {
      return asset.tier_override;
    }
    if (asset.symbol === STABLECOIN_SYMBOL) {
      return STABLECOIN_TIER;
    }
    const { tier } = await this.classifier.classify(asset.symbol, { hint: 'loan_calculate' });
    return tier;
  }

  private async resolveInput(asset: AssetAllocation): Promise<PricingInput> {
    const tier = await this.resolveTier(asset);
    const metrics = await this.fetchMetrics(asset.symbol);
    return { symbol: asset.symbol, allocation_usd: asset.allocation_usd, tier, metrics };
  }

  private async fetchMetrics(symbol: string): Promise<AssetMetrics> {
    const result = await this.metrics.getMetrics(symbol);
    if (!result.success) {
      console.warn(`[LoanQuote] ${result.error}; pricing ${symbol} without metrics`);
      return {};
    }
    return result.data;
  }
}
