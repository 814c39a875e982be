// Public API of the flow log tagger
export * from './aggregation';
export * from './config';
export * from './errors';
export * from './ingestion';
export * from './lookup';
export * from './parser';
export * from './pipeline';
export * from './report';
