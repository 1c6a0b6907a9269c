/**
 * Collateral Loan Quotes - Metrics Client
 *
 * Reads per-symbol metrics from the metrics store:
 *   GET {METRICS_API_BASE}/metrics/{SYMBOL}
 * Expected keys: volatility_score, pct_change_30d (both optional).
 */

import axios from 'axios';
import { LRUCache } from 'lru-cache';
import { getJson, HttpGetter, RetryPolicy, sleep, Sleeper } from '../../shared/http';
import { describeError, fetched, fetchFailed, FetchResult } from '../../shared/types/result.types';
import { AssetMetrics } from '../pricing/types';

export interface MetricsSource {
  getMetrics(symbol: string): Promise<FetchResult<AssetMetrics>>;
}

export interface MetricsClientConfig {
  baseUrl: string;
  timeoutMs: number;
  retries: number;
  cacheTtlSeconds: number;
}

const BACKOFF_MS = 500;
const CACHE_MAX_ENTRIES = 1024;

function isMetricsPayload(value: unknown): value is AssetMetrics {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class MetricsClient implements MetricsSource {
  private readonly baseUrl: string;
  private readonly policy: RetryPolicy;
  private readonly cache: LRUCache<string, AssetMetrics> | null;

  constructor(
    config: MetricsClientConfig,
    private readonly http: HttpGetter = axios,
    private readonly wait: Sleeper = sleep,
  ) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.policy = { timeoutMs: config.timeoutMs, retries: config.retries, backoffMs: BACKOFF_MS };
    this.cache = config.cacheTtlSeconds > 0
      ? new LRUCache<string, AssetMetrics>({ max: CACHE_MAX_ENTRIES, ttl: config.cacheTtlSeconds * 1000 })
      : null;
  }

  async getMetrics(symbol: string): Promise<FetchResult<AssetMetrics>> {
    const key = symbol.toUpperCase();
    const cached = this.cache?.get(key);
    if (cached) {
      return fetched(cached);
    }

    const url = `${this.baseUrl}/metrics/${encodeURIComponent(key)}`;
    try {
      const payload = await getJson(url, this.policy, this.http, this.wait);
      if (!isMetricsPayload(payload)) {
        return fetchFailed(`Metrics payload for ${key} is not an object`);
      }
      this.cache?.set(key, payload);
      return fetched(payload);
    } catch (error) {
      return fetchFailed(`Metrics fetch failed for ${key}: ${describeError(error)}`);
    }
  }
}
