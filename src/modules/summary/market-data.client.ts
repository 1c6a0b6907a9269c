/**
 * Collateral Loan Quotes - Market Data Client
 *
 * Daily USD closes from a CoinGecko-compatible market_chart endpoint and the
 * performance figures the analyst report shows.
 */

import axios from 'axios';
import { z } from 'zod';
import { getJson, HttpGetter } from '../../shared/http';
import { describeError, fetched, fetchFailed, FetchResult } from '../../shared/types/result.types';
import coinDirectory from './coins.json';

export interface PricePoint {
  timestamp: number;             // ms
  price: number;
}

export interface CoinInfo {
  id: string;
  name: string;
}

export interface MarketDataSource {
  getDailyPrices(coinId: string, days: number): Promise<FetchResult<PricePoint[]>>;
}

const COINS: Readonly<Record<string, CoinInfo>> = coinDirectory;

export function coinInfo(symbol: string): CoinInfo | null {
  return Object.hasOwn(COINS, symbol) ? COINS[symbol] : null;
}

const MarketChartSchema = z.object({
  prices: z.array(z.tuple([z.number(), z.number()])).default([]),
});

export class MarketDataClient implements MarketDataSource {
  private readonly baseUrl: string;

  constructor(
    baseUrl: string,
    private readonly timeoutMs: number,
    private readonly http: HttpGetter = axios,
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async getDailyPrices(coinId: string, days: number): Promise<FetchResult<PricePoint[]>> {
    const query = new URLSearchParams({ vs_currency: 'usd', days: String(days), interval: 'daily' });
    const url = `${this.baseUrl}/coins/${encodeURIComponent(coinId)}/market_chart?${query.toString()}`;

    try {
      const payload = await getJson(url, { timeoutMs: this.timeoutMs, retries: 0, backoffMs: 0 }, this.http);
      const parsed = MarketChartSchema.safeParse(payload);
      if (!parsed.success) {
        return fetchFailed(`Unexpected market chart payload for ${coinId}`);
      }
      return fetched(parsed.data.prices.map(([timestamp, price]) => ({ timestamp, price })));
    } catch (error) {
      return fetchFailed(`Market chart fetch failed for ${coinId}: ${describeError(error)}`);
    }
  }
}

// ============================================================================
// PERFORMANCE FIGURES
// ============================================================================

/**
 * (latest / price lookbackDays ago - 1) * 100, assuming one price per day.
 */
export function pctChangeOverWindow(prices: PricePoint[], lookbackDays: number): number | null {
  if (prices.length < lookbackDays + 1) return null;

  const last = prices[prices.length - 1].price;
  const past = prices[prices.length - (lookbackDays + 1)].price;
  if (past === 0) return null;

  return (last / past - 1) * 100;
}

/**
 * 30-day realized volatility: population stdev of daily simple returns over
 * the last 31 prices, in percent (not annualized).
 */
export function realizedVolatility30d(prices: PricePoint[]): number | null {
  if (prices.length < 2) return null;

  const window = prices.slice(-31);
  const returns: number[] = [];
  for (let i = 1; i < window.length; i++) {
    const previous = window[i - 1].price;
    if (previous > 0) {
      returns.push(window[i].price / previous - 1);
    }
  }
  if (returns.length < 2) return null;

  const mean = returns.reduce((sum, r) => sum + r, 0) / returns.length;
  const variance = returns.reduce((sum, r) => sum + (r - mean) ** 2, 0) / returns.length;
  return Math.sqrt(variance) * 100;
}
