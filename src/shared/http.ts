/**
 * GET-with-retry for upstream JSON sources.
 * Retries are a property of the fetching client; pricing code never retries.
 */

import axios from 'axios';
import { describeError } from './types/result.types';

export interface RetryPolicy {
  timeoutMs: number;
  retries: number;
  backoffMs: number; // linear: backoffMs * (attempt + 1)
}

/**
 * The slice of an axios instance the fetchers use.
 */
export interface HttpGetter {
  get(url: string, config: RequestConfig): Promise<{ data: unknown }>;
}

export interface RequestConfig {
  timeout: number;
  headers: { Accept: string };
  responseType?: 'text';
}

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise(resolve => setTimeout(resolve, ms));

async function getWithRetry(
  url: string,
  policy: RetryPolicy,
  config: RequestConfig,
  client: HttpGetter,
  wait: Sleeper,
): Promise<unknown> {
  for (let attempt = 0; ; attempt++) {
    try {
      const response = await client.get(url, config);
      return response.data;
    } catch (error) {
      console.warn(`[HTTP] GET failed attempt=${attempt} url=${url} err=${describeError(error)}`);
      if (attempt >= policy.retries) {
        throw error;
      }
      await wait(policy.backoffMs * (attempt + 1));
    }
  }
}

export async function getJson(
  url: string,
  policy: RetryPolicy,
  client: HttpGetter = axios,
  wait: Sleeper = sleep,
): Promise<unknown> {
  return getWithRetry(url, policy, {
    timeout: policy.timeoutMs,
    headers: { Accept: 'application/json' },
  }, client, wait);
}

/**
 * Raw body as a string, for XML feeds.
 */
export async function getText(
  url: string,
  policy: RetryPolicy,
  client: HttpGetter = axios,
  wait: Sleeper = sleep,
): Promise<string> {
  const data = await getWithRetry(url, policy, {
    timeout: policy.timeoutMs,
    headers: { Accept: 'application/rss+xml, application/xml, text/xml' },
    responseType: 'text',
  }, client, wait);
  if (typeof data !== 'string') {
    throw new Error(`Expected a text body from ${url}`);
  }
  return data;
}
