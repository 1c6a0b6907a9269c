export * from './risk-classifier';
