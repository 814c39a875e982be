// Pipeline module exports
export { FlowLogPipeline } from './FlowLogPipeline';
export * from './types';
