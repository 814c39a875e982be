// Types for pipeline configuration

import { ExecutorMode } from '../ingestion/types';

export interface PipelineConfig {
  /** Maximum lines per chunk */
  chunkSize: number;
  /** Chunks processed at once (worker threads in `thread` mode) */
  workerCount: number;
  executor: ExecutorMode;
  /** Chunks allowed to wait for a worker before reading pauses */
  maxQueuedChunks: number;
  /** Log a progress line every N merged chunks; 0 disables */
  progressInterval: number;
}

export const EXECUTOR_MODES: readonly ExecutorMode[] = ['thread', 'inline', 'auto'];
