// Types for the tagging pipeline

import { GlobalCounts } from '../aggregation/types';
import { PipelineConfig } from '../config/types';
import { ChunkExecutor } from '../ingestion/types';

export type PipelineState =
  | 'init'
  | 'loading_lookup'
  | 'streaming'
  | 'aggregating'
  | 'writing'
  | 'done'
  | 'failed';

export interface PipelineInput {
  flowLogPath: string;
  lookupPath: string;
  outputPath: string;
}

export interface PipelineOptions {
  config?: Partial<PipelineConfig>;
  /** Overrides the executor chosen from `config.executor` */
  executor?: ChunkExecutor;
}

export interface ChunkProgress {
  runId: string;
  chunkIndex: number;
  chunksDispatched: number;
  chunksMerged: number;
  linesRead: number;
  recordsCounted: number;
}

export interface PipelineStats {
  linesRead: number;
  recordsCounted: number;
  malformedLines: number;
  chunksProcessed: number;
  durationMs: number;
  /** Lines per second */
  throughput: number;
}

export interface PipelineResult {
  runId: string;
  outputPath: string;
  counts: GlobalCounts;
  stats: PipelineStats;
  startTime: Date;
  endTime: Date;
}

export interface PipelineEvents {
  state: (state: PipelineState, previous: PipelineState) => void;
  chunk: (progress: ChunkProgress) => void;
  complete: (result: PipelineResult) => void;
  failed: (error: Error, state: PipelineState) => void;
}
