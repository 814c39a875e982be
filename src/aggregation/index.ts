// Aggregation module exports
export { CountAggregator } from './Aggregator';
export * from './counts';
export * from './types';
