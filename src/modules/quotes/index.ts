export * from './loan-quote.service';
