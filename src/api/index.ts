/**
 * Collateral Loan Quotes - API Module Export
 */

export { createApp, AppOptions } from './server';
export { createLoanRoutes, LoanRouteDependencies } from './routes/loan.routes';
export { errorHandler, notFoundHandler } from './middleware/error.middleware';
