// Configuration module exports
export {
  PipelineConfigBuilder,
  PipelineConfigValidator,
  PipelineDefaults,
  availableWorkers,
  createDefaultConfig,
  getPipelineConfig
} from './pipeline';
export * from './types';
