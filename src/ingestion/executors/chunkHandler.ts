import { TagLookup } from '../../lookup/types';
import { processChunk } from '../ChunkProcessor';
import { ChunkRequest, ChunkResponse } from './messages';

/**
 * Count the chunk in a request and wrap the outcome in a response. A failure
 * becomes an `error` response for the same chunk index.
 */
export function handleChunkRequest(request: ChunkRequest, lookup: TagLookup): ChunkResponse {
  try {
    return {
      type: 'result',
      chunkIndex: request.chunk.index,
      counts: processChunk(request.chunk, lookup)
    };
  } catch (error) {
    return {
      type: 'error',
      chunkIndex: request.chunk.index,
      message: error instanceof Error ? error.message : 'Unknown chunk processing error'
    };
  }
}
