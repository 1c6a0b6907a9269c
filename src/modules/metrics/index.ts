export * from './metrics.client';
