import { PartialCounts } from '../../aggregation/types';
import { LookupTable } from '../../lookup/LookupTable';
import { processChunk } from '../ChunkProcessor';
import { Chunk, ChunkExecutor } from '../types';

/**
 * Runs every chunk on the calling event loop. Each chunk is deferred to a
 * later macrotask so reading, dispatch and merging still interleave.
 */
export class InlineChunkExecutor implements ChunkExecutor {
  readonly kind = 'inline' as const;
  readonly concurrency: number;
  private lookup?: LookupTable;

  constructor(concurrency: number = 1) {
    this.concurrency = concurrency;
  }

  async start(lookup: LookupTable): Promise<void> {
    this.lookup = lookup;
  }

  execute(chunk: Chunk): Promise<PartialCounts> {
    const lookup = this.lookup;
    if (!lookup) {
      return Promise.reject(new Error('Executor has not been started'));
    }

    return new Promise((resolve, reject) => {
      setImmediate(() => {
        try {
          resolve(processChunk(chunk, lookup));
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  async close(): Promise<void> {
    this.lookup = undefined;
  }
}
