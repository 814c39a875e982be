import { existsSync } from 'fs';

import { ChunkExecutor, ExecutorMode } from '../types';
import { InlineChunkExecutor } from './InlineChunkExecutor';
import { WorkerThreadChunkExecutor, workerScriptPath } from './WorkerThreadChunkExecutor';

export { InlineChunkExecutor } from './InlineChunkExecutor';
export { WorkerThreadChunkExecutor, workerScriptPath } from './WorkerThreadChunkExecutor';
export { handleChunkRequest } from './chunkHandler';
export * from './messages';

/**
 * Pick the executor for a mode. `auto` uses worker threads when the compiled
 * worker script is available and falls back to the inline executor otherwise.
 */
export function createChunkExecutor(mode: ExecutorMode, concurrency: number): ChunkExecutor {
  const useThreads = mode === 'thread' || (mode === 'auto' && existsSync(workerScriptPath()));
  return useThreads ? new WorkerThreadChunkExecutor(concurrency) : new InlineChunkExecutor(concurrency);
}
