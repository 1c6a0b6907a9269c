import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { LoanQuoteService, parseLoanRequest } from './loan-quote.service';
import { MetricsSource } from '../metrics/metrics.client';
import { TierClassifier } from '../risk/risk-classifier';
import { BadRequestError, UnknownTierError } from '../../shared/errors';
import { fetched, fetchFailed, FetchResult } from '../../shared/types/result.types';
import { AssetMetrics } from '../pricing';

function fakeMetrics(bySymbol: Record<string, AssetMetrics>): MetricsSource {
  return {
    getMetrics: async (symbol: string): Promise<FetchResult<AssetMetrics>> =>
      symbol in bySymbol ? fetched(bySymbol[symbol]) : fetchFailed(`Metrics fetch failed for ${symbol}: 404`),
  };
}

describe('parseLoanRequest', () => {
  it('normalizes symbols and defaults the term to six months', () => {
    expect(parseLoanRequest({
      assets: [
        { symbol: ' btc ', allocation_usd: 250000, tier: 'Tier 1' },
        { symbol: 'eth', allocation_usd: '1000.50' },
      ],
    })).toEqual({
      assets: [
        { symbol: 'BTC', allocation_usd: 250000, tier_override: 'Tier 1' },
        { symbol: 'ETH', allocation_usd: 1000.5 },
      ],
      months: 6,
    });
  });

  it('prefers tier_override over tier', () => {
    const request = parseLoanRequest({
      assets: [{ symbol: 'SOL', allocation_usd: 10, tier: 'Tier 3', tier_override: 'Tier 2' }],
      months: 12,
    });
    expect(request.assets[0].tier_override).toBe('Tier 2');
    expect(request.months).toBe(12);
  });

  it.each([
    [{}, 'assets is required'],
    [{ assets: [] }, 'assets is required'],
    [{ assets: [{ symbol: '', allocation_usd: 100 }] }, 'symbol must not be empty'],
    [{ assets: [{ symbol: 'BTC', allocation_usd: 0 }] }, 'allocation_usd too small to secure a loan (minimum 0.01)'],
    [{ assets: [{ symbol: 'BTC', allocation_usd: -5 }] }, 'allocation_usd too small to secure a loan (minimum 0.01)'],
    [{ assets: [{ symbol: 'BTC', allocation_usd: 100 }], months: 2.5 }, 'months must be an integer'],
    [{ assets: [{ symbol: 'BTC', allocation_usd: 100 }], months: 0 }, 'months must be at least 1'],
  ])('rejects %j', (body, message) => {
    expect(() => parseLoanRequest(body)).toThrow(new BadRequestError(message));
  });

  it('rejects duplicate symbols', () => {
    expect(() => parseLoanRequest({
      assets: [{ symbol: 'BTC', allocation_usd: 1 }, { symbol: 'btc', allocation_usd: 2 }],
    })).toThrow('Duplicate asset symbol: BTC');
  });

  it('rejects an unknown tier override', () => {
    expect(() => parseLoanRequest({ assets: [{ symbol: 'BTC', allocation_usd: 1, tier: 'Tier 9' }] }))
      .toThrow(UnknownTierError);
  });
});

describe('LoanQuoteService', () => {
  let classify: jest.Mock<TierClassifier['classify']>;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    classify = jest.fn<TierClassifier['classify']>()
      .mockResolvedValue({ tier: 'Tier 2', confidence: 0.8, source: 'model' });
  });

  it('prices USDT at Tier 1 without consulting the classifier', async () => {
    const service = new LoanQuoteService(fakeMetrics({}), { classify });

    const profile = await service.calculate({ assets: [{ symbol: 'USDT', allocation_usd: 10000 }], months: 6 });

    expect(profile.assets[0].tier).toBe('Tier 1');
    expect(classify).not.toHaveBeenCalled();
  });

  it('honours an explicit override for USDT', async () => {
    const service = new LoanQuoteService(fakeMetrics({}), { classify });

    const tier = await service.resolveTier({ symbol: 'USDT', allocation_usd: 10000, tier_override: 'Tier 3' });

    expect(tier).toBe('Tier 3');
  });

  it('classifies assets without an override', async () => {
    const service = new LoanQuoteService(fakeMetrics({ ETH: { pct_change_30d: 11 } }), { classify });

    const profile = await service.calculate({ assets: [{ symbol: 'ETH', allocation_usd: 1000 }], months: 3 });

    expect(classify).toHaveBeenCalledWith('ETH', { hint: 'loan_calculate' });
    expect(profile.assets[0]).toMatchObject({
      tier: 'Tier 2',
      volatility_premium: 0.015,
      interest_rate: 0.2283,
      loan_usd: 600,
      pct_change_30d: 11,
    });
  });

  it('prices with the default premium when metrics are unavailable', async () => {
    const service = new LoanQuoteService(fakeMetrics({}), { classify });

    const profile = await service.calculate({
      assets: [{ symbol: 'BTC', allocation_usd: 250000, tier_override: 'Tier 1' }],
      months: 6,
    });

    expect(profile.assets[0].volatility_premium).toBe(0.01);
    expect(profile.assets[0].pct_change_30d).toBeNull();
    expect(profile.summary.monthly_emi).toBe(31088.07);
    expect(console.warn).toHaveBeenCalledWith('[LoanQuote] Metrics fetch failed for BTC: 404; pricing BTC without metrics');
  });

  it('keeps the request order of assets', async () => {
    const service = new LoanQuoteService(fakeMetrics({}), { classify });

    const profile = await service.calculate(parseLoanRequest({
      assets: [
        { symbol: 'sol', allocation_usd: 100 },
        { symbol: 'usdt', allocation_usd: 100 },
        { symbol: 'btc', allocation_usd: 100, tier: 'Tier 1.5' },
      ],
    }));

    expect(profile.assets.map(a => [a.symbol, a.tier])).toEqual([
      ['SOL', 'Tier 2'],
      ['USDT', 'Tier 1'],
      ['BTC', 'Tier 1.5'],
    ]);
    expect(Object.keys(profile.schedule.assets)).toEqual(['SOL', 'USDT', 'BTC']);
  });

  it('rejects an empty request', async () => {
    const service = new LoanQuoteService(fakeMetrics({}), { classify });

    await expect(service.calculate({ assets: [], months: 6 })).rejects.toThrow(BadRequestError);
  });
});
