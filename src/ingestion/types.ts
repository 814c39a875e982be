// Types for the chunked ingestion pipeline

import { PartialCounts } from '../aggregation/types';
import { LookupTable } from '../lookup/LookupTable';

/** A raw flow log line and its 1-based position in the file */
export type NumberedLine = [lineNumber: number, line: string];

export interface Chunk {
  /** 0-based position of the chunk in the file */
  index: number;
  lines: NumberedLine[];
}

export type ExecutorMode = 'thread' | 'inline' | 'auto';

/**
 * Runs the chunk processor somewhere: on the calling event loop or on a pool
 * of worker threads. `start` is called once before the first chunk and
 * `close` once after the last.
 */
export interface ChunkExecutor {
  readonly kind: 'thread' | 'inline';
  readonly concurrency: number;
  start(lookup: LookupTable): Promise<void>;
  execute(chunk: Chunk): Promise<PartialCounts>;
  close(): Promise<void>;
}

export interface ChunkSourceOptions {
  chunkSize?: number;
  encoding?: BufferEncoding;
}
