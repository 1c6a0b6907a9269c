/**
 * Collateral Loan Quotes - Risk Tier Classifier
 *
 * Tier is decided ONLY from:
 *   1) volatility_score (metrics store, else caller context)
 *   2) the asset's market value, which the model judges itself
 * When the model or its inputs fail, a volatility-only heuristic decides.
 */

import { z } from 'zod';
import { ChatModel } from '../../shared/chat-model';
import { describeError } from '../../shared/types/result.types';
import { MetricsSource } from '../metrics/metrics.client';
import { isTierName, TierName, TIER_NAMES } from '../pricing/risk-tiers';
import { readVolatilityScore, toFiniteNumber } from '../pricing/interest';

export interface ClassificationContext {
  volatility_score?: number;
  hint?: string;
}

export interface TierClassification {
  tier: TierName;
  confidence: number;            // 0..1
  source: 'model' | 'heuristic';
}

export interface TierClassifier {
  classify(symbol: string, context?: ClassificationContext): Promise<TierClassification>;
}

const ModelReplySchema = z.object({
  tier: z.string(),
  score: z.coerce.number().min(0).max(1).default(0.7),
});

const SYSTEM_PROMPT = 'Reply with strict JSON only. Keys: tier, score.';

/**
 * Fallback from volatility_score alone (lower = safer).
 */
export function heuristicTier(volatilityScore: number | null): TierClassification {
  if (volatilityScore === null) {
    return { tier: 'Tier 2', confidence: 0.5, source: 'heuristic' };
  }
  if (volatilityScore <= 10) {
    return { tier: 'Tier 1.5', confidence: 0.6, source: 'heuristic' };
  }
  if (volatilityScore <= 25) {
    return { tier: 'Tier 2', confidence: 0.6, source: 'heuristic' };
  }
  return { tier: 'Tier 3', confidence: 0.6, source: 'heuristic' };
}

export function buildClassificationPrompt(symbol: string, volatilityScore: number): string {
  const tiers = TIER_NAMES.map(name => `'${name}'`).join(',');
  return [
    `You are a crypto risk officer. Classify the asset into one of exactly: [${tiers}].`,
    '',
    'You MUST ONLY consider:',
    '1) volatility_score (provided below; lower = safer)',
    "2) the asset's market value / market capitalization (use your own knowledge of this asset).",
    '',
    'Return STRICT JSON with keys: "tier" and "score" (0..1 confidence). No extra text.',
    '',
    'Input:',
    `symbol: ${symbol}`,
    `volatility_score: ${volatilityScore}`,
  ].join('\n');
}

/**
 * Parse the model's reply. Returns null when it is not usable JSON or names
 * a tier outside the table.
 */
export function parseModelReply(text: string): TierClassification | null {
  const body = text.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '').trim();

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return null;
  }

  const parsed = ModelReplySchema.safeParse(json);
  if (!parsed.success || !isTierName(parsed.data.tier)) {
    return null;
  }
  return { tier: parsed.data.tier, confidence: parsed.data.score, source: 'model' };
}

export class RiskClassifier implements TierClassifier {
  constructor(
    private readonly metrics: MetricsSource,
    private readonly model: ChatModel | null,
  ) {}

  async classify(symbol: string, context: ClassificationContext = {}): Promise<TierClassification> {
    const volatilityScore = await this.resolveVolatility(symbol, context);

    if (volatilityScore === null) {
      console.warn(`[RiskClassifier] Missing volatility_score for ${symbol}; using heuristic fallback`);
      return heuristicTier(null);
    }

    if (!this.model) {
      return heuristicTier(volatilityScore);
    }

    try {
      const reply = await this.model.complete([
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildClassificationPrompt(symbol, volatilityScore) },
      ]);
      const classification = parseModelReply(reply);
      if (!classification) {
        console.warn(`[RiskClassifier] Unusable model reply for ${symbol}; using heuristic fallback`);
        return heuristicTier(volatilityScore);
      }
      console.log(`[RiskClassifier] ${symbol} -> ${classification.tier} (confidence=${classification.confidence})`);
      return classification;
    } catch (error) {
      console.warn(`[RiskClassifier] Model error for ${symbol}: ${describeError(error)}; using heuristic fallback`);
      return heuristicTier(volatilityScore);
    }
  }

  private async resolveVolatility(symbol: string, context: ClassificationContext): Promise<number | null> {
    const result = await this.metrics.getMetrics(symbol);
    if (result.success) {
      const score = readVolatilityScore(result.data);
      if (score !== null) return score;
    } else {
      console.warn(`[RiskClassifier] ${result.error}`);
    }
    return toFiniteNumber(context.volatility_score);
  }
}
