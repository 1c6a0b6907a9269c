export * from './market-data.client';
export * from './news.client';
export * from './summary.service';
