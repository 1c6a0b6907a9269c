/**
 * Collateral Loan Quotes - Analyst Summary
 *
 * Builds a markdown report from a calculation result:
 *   - Market snapshot
 *   - Collateral coins (5d/10d/30d performance, volatility, recent headlines)
 *   - LTV overview
 *   - Portfolio interest rate
 *   - Smart contract terms
 * Optionally an LLM rewrites the wording; numbers and headings stay as built.
 */

import { z } from 'zod';
import { BadRequestError } from '../../shared/errors';
import { ChatModel } from '../../shared/chat-model';
import { describeError } from '../../shared/types/result.types';
import { coinInfo, MarketDataSource, pctChangeOverWindow, realizedVolatility30d } from './market-data.client';
import { Headline, headlinesMentioning, NewsSource } from './news.client';

// ============================================================================
// TYPES
// ============================================================================

const OptionalNumber = z.coerce.number().finite().nullable().optional().catch(null);

const CalculationSchema = z.object({
  assets: z.array(z.object({ symbol: z.string().min(1) }).passthrough()).default([]),
  summary: z.object({
    portfolio_ltv: OptionalNumber,
    margin_call_ltv: OptionalNumber,
    liquidation_ltv: OptionalNumber,
    interest_rate: OptionalNumber,
    monthly_emi: OptionalNumber,
    months: OptionalNumber,
  }).passthrough(),
});

export type CalculationOutput = z.infer<typeof CalculationSchema>;

export interface CoinEnrichment {
  symbol: string;
  coin_name: string;
  pct_5d: number | null;
  pct_10d: number | null;
  pct_30d: number | null;
  realized_vol_30d: number | null;
  headlines: Headline[];
}

export interface AnalystSummary {
  markdown: string;
  provider: string;
  model: string;
  used_llm: boolean;
}

export interface ContractDetails {
  address: string;
  explorerBaseUrl: string;
  chainName: string;
}

export interface SummaryServiceOptions {
  useLlm: boolean;
  provider: string;
  maxTokens: number;
  newsPerCoin: number;
  contract: ContractDetails;
}

const CHART_DAYS = 35;

// ============================================================================
// FORMATTING
// ============================================================================

const usdFormat = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });

export function formatPct(value: number | null | undefined): string {
  return value === null || value === undefined || !Number.isFinite(value) ? 'n/a' : `${value.toFixed(2)}%`;
}

export function formatUsd(value: number | null | undefined): string {
  return value === null || value === undefined || !Number.isFinite(value) ? '$0.00' : `$${usdFormat.format(value)}`;
}

function riskLine(volatility: number | null): string {
  if (volatility === null) return '- Risk/volatility: data limited; keep conservative LTV discipline';
  if (volatility < 5) return '- Risk/volatility: **low** (30-day realized vol under 5%)';
  if (volatility < 15) return '- Risk/volatility: **moderate** (30-day realized vol 5-15%)';
  return '- Risk/volatility: **elevated** (30-day realized vol above 15%)';
}

function headlineLines(headlines: Headline[]): string[] {
  if (headlines.length === 0) return ['- Recent headlines: (none found in the last few days)'];
  return [
    '- Recent headlines:',
    ...headlines.map(headline => `  - [${headline.title}](${headline.link}) _${headline.published}_`),
  ];
}

/**
 * Deterministic report; no network access.
 */
export function buildReportMarkdown(
  calculation: CalculationOutput,
  enrichment: Map<string, CoinEnrichment>,
  contract: ContractDetails,
): string {
  const { summary, assets } = calculation;
  const months = Math.trunc(summary.months ?? 0);
  const coins = [...enrichment.values()];
  const upCount = (pick: (coin: CoinEnrichment) => number | null) =>
    coins.filter(coin => {
      const value = pick(coin);
      return value !== null && value >= 0;
    }).length;

  const lines: string[] = [
    '## Market snapshot',
    `- Coins up over **5d**: ${upCount(c => c.pct_5d)}/${coins.length}`,
    `- Coins up over **10d**: ${upCount(c => c.pct_10d)}/${coins.length}`,
    `- Coins up over **30d**: ${upCount(c => c.pct_30d)}/${coins.length}`,
    `- Portfolio term: **${months} months**`,
    '',
    '## Collateral coins - performance & risk',
  ];

  if (assets.length === 0) {
    lines.push('(no assets provided)');
  }
  for (const asset of assets) {
    const info = enrichment.get(asset.symbol);
    lines.push(
      `**${info?.coin_name ?? asset.symbol} (${asset.symbol})**`,
      `- 5d: ${formatPct(info?.pct_5d)} | 10d: ${formatPct(info?.pct_10d)} | 30d: ${formatPct(info?.pct_30d)}`,
      `- 30-day realized volatility: ${formatPct(info?.realized_vol_30d)}`,
      riskLine(info?.realized_vol_30d ?? null),
      ...headlineLines(info?.headlines ?? []),
      '',
    );
  }

  lines.push(
    '## LTV overview',
    `- **Portfolio LTV (current)**: ${formatPct(summary.portfolio_ltv)}: share of loan vs. collateral now.`,
    `- **Margin Call LTV**: ${formatPct(summary.margin_call_ltv)}: checkpoint to top up collateral or reduce exposure.`,
    `- **Liquidation LTV**: ${formatPct(summary.liquidation_ltv)}: threshold where positions may be closed to repay the loan.`,
    '',
    '## Portfolio interest rate',
    `- **Portfolio interest rate**: ${formatPct(summary.interest_rate)}.`,
    `- **Monthly EMI**: ${formatUsd(summary.monthly_emi)} for ${months} months.`,
    '',
    '## Smart contract terms',
    `- **Term**: ${months}-month loan.`,
    "- **Custody**: Selected collateral coins move from the borrower's wallet(s) to the lender's custody smart contract for the duration of the loan.",
    '- **Withdrawal/repayment**: Coins are released back after full repayment; early repayment allowed per contract terms.',
  );

  const explorer = contract.explorerBaseUrl.replace(/\/+$/, '');
  if (contract.address && explorer) {
    lines.push(`- **Contract** (${contract.chainName}): [\`${contract.address}\`](${explorer}/${contract.address})`);
  } else if (contract.address) {
    lines.push(`- **Contract** (${contract.chainName}): \`${contract.address}\` (paste into your preferred block explorer)`);
  }

  return lines.join('\n').trim();
}

// ============================================================================
// SUMMARY SERVICE
// ============================================================================

export function parseCalculation(body: unknown): CalculationOutput {
  const candidate = typeof body === 'object' && body !== null && 'calculation' in body
    ? body.calculation
    : body;

  const parsed = CalculationSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new BadRequestError("expected calculation output (must include 'summary')");
  }
  return parsed.data;
}

export class SummaryService {
  constructor(
    private readonly marketData: MarketDataSource,
    private readonly news: NewsSource,
    private readonly model: ChatModel | null,
    private readonly options: SummaryServiceOptions,
  ) {}

  async buildAnalystSummary(calculation: CalculationOutput): Promise<AnalystSummary> {
    const enrichment = await this.enrichPortfolio(calculation);
    const markdown = buildReportMarkdown(calculation, enrichment, this.options.contract);

    if (this.options.useLlm && this.model) {
      try {
        const rewritten = await this.model.complete([
          {
            role: 'system',
            content: 'You are a concise financial analyst. Keep the structure and numbers exactly as given. Improve clarity only.',
          },
          { role: 'user', content: 'Rewrite the following markdown for clarity and flow without changing any numbers or headings:' },
          { role: 'user', content: markdown },
        ], { maxTokens: this.options.maxTokens });
        return { markdown: rewritten, provider: this.options.provider, model: this.model.modelName, used_llm: true };
      } catch (error) {
        console.warn(`[Summary] LLM rewrite failed: ${describeError(error)}; returning deterministic report`);
      }
    }

    return { markdown, provider: 'deterministic', model: 'none', used_llm: false };
  }

  /**
   * Market figures for one symbol plus the headlines from `feed` that name
   * the coin. Unknown symbols stay empty.
   */
  async enrichCoin(symbol: string, feed: Headline[] = []): Promise<CoinEnrichment> {
    const info = coinInfo(symbol);
    const result: CoinEnrichment = {
      symbol,
      coin_name: info?.name ?? symbol,
      pct_5d: null,
      pct_10d: null,
      pct_30d: null,
      realized_vol_30d: null,
      headlines: [],
    };
    if (!info) return result;

    const headlines = headlinesMentioning(feed, info.name, this.options.newsPerCoin);
    const prices = await this.marketData.getDailyPrices(info.id, CHART_DAYS);
    if (!prices.success) {
      console.warn(`[Summary] ${prices.error}`);
      return { ...result, headlines };
    }

    return {
      ...result,
      pct_5d: pctChangeOverWindow(prices.data, 5),
      pct_10d: pctChangeOverWindow(prices.data, 10),
      pct_30d: pctChangeOverWindow(prices.data, 30),
      realized_vol_30d: realizedVolatility30d(prices.data),
      headlines,
    };
  }

  private async enrichPortfolio(calculation: CalculationOutput): Promise<Map<string, CoinEnrichment>> {
    const symbols = [...new Set(calculation.assets.map(asset => asset.symbol))];
    const feed = await this.recentHeadlines(symbols);
    const coins = await Promise.all(symbols.map(symbol => this.enrichCoin(symbol, feed)));
    return new Map(coins.map(coin => [coin.symbol, coin]));
  }

  // Feeds are fetched once per report and shared by every coin
  private async recentHeadlines(symbols: string[]): Promise<Headline[]> {
    if (this.options.newsPerCoin === 0 || !symbols.some(symbol => coinInfo(symbol) !== null)) {
      return [];
    }
    const result = await this.news.getRecentHeadlines();
    if (!result.success) {
      console.warn(`[Summary] ${result.error}; reporting without headlines`);
      return [];
    }
    return result.data;
  }
}
