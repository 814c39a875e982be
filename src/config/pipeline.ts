/**
 * Pipeline configuration utilities and helpers
 */

import * as os from 'os';

import { ConfigurationError } from '../errors';
import { DEFAULT_CHUNK_SIZE } from '../ingestion/ChunkSource';
import { ExecutorMode } from '../ingestion/types';
import { EXECUTOR_MODES, PipelineConfig } from './types';

export class PipelineConfigBuilder {
  private config: Partial<PipelineConfig> = {};

  static create(): PipelineConfigBuilder {
    return new PipelineConfigBuilder();
  }

  chunkSize(chunkSize: number): PipelineConfigBuilder {
    this.config.chunkSize = chunkSize;
    return this;
  }

  workerCount(workerCount: number): PipelineConfigBuilder {
    this.config.workerCount = workerCount;
    return this;
  }

  executor(executor: ExecutorMode): PipelineConfigBuilder {
    this.config.executor = executor;
    return this;
  }

  maxQueuedChunks(maxQueuedChunks: number): PipelineConfigBuilder {
    this.config.maxQueuedChunks = maxQueuedChunks;
    return this;
  }

  progressInterval(progressInterval: number): PipelineConfigBuilder {
    this.config.progressInterval = progressInterval;
    return this;
  }

  build(): PipelineConfig {
    const config = createDefaultConfig(this.config);
    const errors = PipelineConfigValidator.validate(config);
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid pipeline configuration: ${errors.join('; ')}`, errors);
    }
    return config;
  }
}

export class PipelineConfigValidator {
  static validate(config: PipelineConfig): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.chunkSize) || config.chunkSize < 1) {
      errors.push('chunkSize must be a positive integer');
    }
    if (!Number.isInteger(config.workerCount) || config.workerCount < 1) {
      errors.push('workerCount must be a positive integer');
    }
    if (!EXECUTOR_MODES.includes(config.executor)) {
      errors.push(`executor must be one of ${EXECUTOR_MODES.join(', ')}`);
    }
    if (!Number.isInteger(config.maxQueuedChunks) || config.maxQueuedChunks < 1) {
      errors.push('maxQueuedChunks must be a positive integer');
    }
    if (!Number.isInteger(config.progressInterval) || config.progressInterval < 0) {
      errors.push('progressInterval must be zero or a positive integer');
    }

    return errors;
  }

  static isValid(config: PipelineConfig): boolean {
    return this.validate(config).length === 0;
  }
}

export function availableWorkers(): number {
  return Math.max(1, os.availableParallelism());
}

export const PipelineDefaults: Pick<PipelineConfig, 'chunkSize' | 'executor' | 'progressInterval'> = {
  chunkSize: DEFAULT_CHUNK_SIZE,
  executor: 'auto',
  progressInterval: 10
};

export function createDefaultConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const workerCount = overrides.workerCount ?? availableWorkers();

  return {
    chunkSize: overrides.chunkSize ?? PipelineDefaults.chunkSize,
    workerCount,
    executor: overrides.executor ?? PipelineDefaults.executor,
    maxQueuedChunks: overrides.maxQueuedChunks ?? workerCount * 2,
    progressInterval: overrides.progressInterval ?? PipelineDefaults.progressInterval
  };
}

/**
 * Read the pipeline configuration from the environment
 */
export function getPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const builder = PipelineConfigBuilder.create();

  const chunkSize = parseIntegerVariable(env, 'FLOW_CHUNK_SIZE');
  if (chunkSize !== undefined) {
    builder.chunkSize(chunkSize);
  }

  const workerCount = parseIntegerVariable(env, 'FLOW_WORKERS');
  if (workerCount !== undefined) {
    builder.workerCount(workerCount);
  }

  const maxQueuedChunks = parseIntegerVariable(env, 'FLOW_MAX_QUEUED_CHUNKS');
  if (maxQueuedChunks !== undefined) {
    builder.maxQueuedChunks(maxQueuedChunks);
  }

  const progressInterval = parseIntegerVariable(env, 'FLOW_PROGRESS_INTERVAL');
  if (progressInterval !== undefined) {
    builder.progressInterval(progressInterval);
  }

  const executor = env.FLOW_EXECUTOR?.trim().toLowerCase();
  if (executor) {
    if (!isExecutorMode(executor)) {
      throw new ConfigurationError(`FLOW_EXECUTOR must be one of ${EXECUTOR_MODES.join(', ')}, got '${executor}'`);
    }
    builder.executor(executor);
  }

  return builder.build();
}

function isExecutorMode(value: string): value is ExecutorMode {
  return EXECUTOR_MODES.some(mode => mode === value);
}

function parseIntegerVariable(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) {
    return undefined;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError(`${name} must be an integer, got '${raw}'`);
  }
  return parseInt(raw, 10);
}
