/**
 * Collateral Loan Quotes - News Client
 *
 * Recent headlines from RSS 2.0 feeds, used to annotate each collateral coin
 * in the analyst report.
 */

import axios from 'axios';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { getText, HttpGetter } from '../../shared/http';
import { describeError, fetched, fetchFailed, FetchResult } from '../../shared/types/result.types';

export interface Headline {
  title: string;
  link: string;
  published: string;
}

export interface NewsSource {
  getRecentHeadlines(): Promise<FetchResult<Headline[]>>;
}

const RssItemSchema = z.object({
  title: z.string().catch(''),
  link: z.string().catch(''),
  pubDate: z.string().catch(''),
});

const RssFeedSchema = z.object({
  rss: z.object({
    channel: z.object({
      item: z.array(RssItemSchema).default([]),
    }),
  }),
});

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  isArray: (_tagName: string, jPath: string) => jPath === 'rss.channel.item',
});

/**
 * Items of an RSS document, or null when the body is not RSS.
 */
export function parseRssFeed(xml: string): Headline[] | null {
  let document: unknown;
  try {
    document = parser.parse(xml);
  } catch (error) {
    console.warn(`[News] Unparseable feed body: ${describeError(error)}`);
    return null;
  }

  const parsed = RssFeedSchema.safeParse(document);
  if (!parsed.success) return null;

  return parsed.data.rss.channel.item.map(item => ({
    title: item.title.trim(),
    link: item.link.trim(),
    published: item.pubDate.trim(),
  }));
}

/**
 * Headlines whose title mentions the coin (case-insensitive), capped at `limit`.
 */
export function headlinesMentioning(headlines: Headline[], coinName: string, limit: number): Headline[] {
  const target = coinName.toLowerCase();
  return headlines.filter(headline => headline.title.toLowerCase().includes(target)).slice(0, limit);
}

export class RssNewsClient implements NewsSource {
  constructor(
    private readonly feeds: string[],
    private readonly timeoutMs: number,
    private readonly http: HttpGetter = axios,
  ) {}

  /**
   * Items of every feed in configured order. A single feed failing is logged
   * and skipped; the call fails only when every feed does.
   */
  async getRecentHeadlines(): Promise<FetchResult<Headline[]>> {
    const results = await Promise.all(this.feeds.map(feed => this.fetchFeed(feed)));

    const headlines: Headline[] = [];
    const errors: string[] = [];
    for (const result of results) {
      if (result.success) headlines.push(...result.data);
      else errors.push(result.error);
    }

    if (results.length > 0 && errors.length === results.length) {
      return fetchFailed(errors.join('; '));
    }
    for (const error of errors) {
      console.warn(`[News] ${error}`);
    }
    return fetched(headlines);
  }

  private async fetchFeed(url: string): Promise<FetchResult<Headline[]>> {
    try {
      const body = await getText(url, { timeoutMs: this.timeoutMs, retries: 0, backoffMs: 0 }, this.http);
      const items = parseRssFeed(body);
      return items ? fetched(items) : fetchFailed(`Unexpected RSS payload from ${url}`);
    } catch (error) {
      return fetchFailed(`News feed fetch failed for ${url}: ${describeError(error)}`);
    }
  }
}
