/**
 * Collateral Loan Quotes - Main Entry Point
 *
 * Crypto-collateralized loan pricing: LTV, interest, amortization and an
 * analyst summary for a portfolio of asset allocations.
 */

import * as dotenv from 'dotenv';

// Load environment variables
dotenv.config();

import { loadSettings } from './config';
import { createApp } from './api';
import { OpenAIChatModel } from './shared/chat-model';
import { MetricsClient } from './modules/metrics';
import { RiskClassifier } from './modules/risk';
import { LoanQuoteService } from './modules/quotes';
import { MarketDataClient, RssNewsClient, SummaryService } from './modules/summary';

function bootstrap(): void {
  console.log('='.repeat(60));
  console.log('  COLLATERAL LOAN QUOTES');
  console.log('  Crypto-collateralized loan pricing');
  console.log('='.repeat(60));

  const settings = loadSettings();

  console.log('[Boot] Initializing collaborators...');
  const metrics = new MetricsClient({
    baseUrl: settings.METRICS_API_BASE,
    timeoutMs: settings.METRICS_TIMEOUT_MS,
    retries: settings.METRICS_RETRIES,
    cacheTtlSeconds: settings.METRICS_CACHE_TTL_SECONDS,
  });

  const model = settings.AI_PROVIDER !== 'none' && settings.GROQ_API_KEY
    ? new OpenAIChatModel({
      apiKey: settings.GROQ_API_KEY,
      baseUrl: settings.AI_BASE_URL,
      model: settings.AI_MODEL_NAME,
      temperature: settings.AI_MODEL_TEMPERATURE,
      timeoutMs: settings.HTTP_TIMEOUT_MS,
    })
    : null;
  if (!model) {
    console.warn('[Boot] No AI provider configured - tiers come from the volatility heuristic');
  }

  const classifier = new RiskClassifier(metrics, model);
  const quoteService = new LoanQuoteService(metrics, classifier);
  const summaryService = new SummaryService(
    new MarketDataClient(settings.MARKET_DATA_BASE_URL, settings.HTTP_TIMEOUT_MS),
    new RssNewsClient(settings.NEWS_FEED_URLS, settings.HTTP_TIMEOUT_MS),
    model,
    {
      useLlm: settings.USE_LLM_SUMMARY,
      provider: settings.AI_PROVIDER,
      maxTokens: settings.AI_MODEL_MAX_TOKENS,
      newsPerCoin: settings.NEWS_PER_COIN,
      contract: {
        address: settings.CONTRACT_ADDRESS.trim(),
        explorerBaseUrl: settings.EXPLORER_BASE_URL,
        chainName: settings.CHAIN_NAME,
      },
    },
  );

  console.log('[Boot] Configuring Express server...');
  const app = createApp({ quoteService, summaryService }, { rateLimitPerMinute: settings.RATE_LIMIT_PER_MINUTE });

  const server = app.listen(settings.PORT, () => {
    console.log(`\n[Boot] Server listening on port ${settings.PORT} (${settings.NODE_ENV})`);
    console.log('[Boot] Endpoints:');
    console.log('  - GET  /health');
    console.log('  - GET  /loan/tiers');
    console.log('  - POST /loan/calculate');
    console.log('  - POST /loan/summary');
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n[Shutdown] Received ${signal}, shutting down gracefully...`);
    server.close(() => {
      console.log('[Shutdown] HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  bootstrap();
} catch (error) {
  console.error('[Boot] Fatal error during startup:', error);
  process.exit(1);
}
