/**
 * Collateral Loan Quotes - Loan Routes
 *
 * POST /loan/calculate   price a portfolio and attach its schedule
 * POST /loan/summary     analyst report for a calculation result
 * GET  /loan/tiers       tier policy table
 */

import { NextFunction, Request, Response, Router } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { listTiers } from '../../modules/pricing';
import { LoanQuoteService, parseLoanRequest } from '../../modules/quotes';
import { parseCalculation, SummaryService } from '../../modules/summary';

export interface LoanRouteDependencies {
  quoteService: LoanQuoteService;
  summaryService: SummaryService;
}

export function createLoanRoutes(deps: LoanRouteDependencies): Router {
  const router = Router();

  router.get('/tiers', (_req: Request, res: Response) => {
    res.json({ tiers: listTiers() });
  });

  /**
   * Payload:
   * {
   *   "assets": [{ "symbol": "BTC", "allocation_usd": 250000, "tier": "Tier 1" }],
   *   "months": 6
   * }
   */
  router.post('/calculate', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const request = parseLoanRequest(req.body);
      const profile = await deps.quoteService.calculate(request);
      const quoteId = uuidv4();

      console.log(`[API] Quote issued | quote_id=${quoteId} | assets=${request.assets.map(a => a.symbol).join(',')}`);
      res.status(200).json({ quote_id: quoteId, ...profile });
    } catch (error) {
      next(error);
    }
  });

  /**
   * Body: the /loan/calculate output, or { "calculation": <that output> }.
   */
  router.post('/summary', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const calculation = parseCalculation(req.body);
      const summary = await deps.summaryService.buildAnalystSummary(calculation);
      res.status(200).json(summary);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
