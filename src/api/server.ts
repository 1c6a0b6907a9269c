/**
 * Collateral Loan Quotes - Express App
 */

import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { createLoanRoutes, LoanRouteDependencies } from './routes/loan.routes';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';

export interface AppOptions {
  rateLimitPerMinute?: number;
}

export function createApp(deps: LoanRouteDependencies, options: AppOptions = {}): Express {
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  if (options.rateLimitPerMinute) {
    app.use(rateLimit({
      windowMs: 60 * 1000,
      max: options.rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
    }));
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'OK', service: 'collateral-loan-quotes', timestamp: new Date().toISOString() });
  });

  app.use('/loan', createLoanRoutes(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
