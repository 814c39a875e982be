// Ingestion module exports
export { readChunks, DEFAULT_CHUNK_SIZE } from './ChunkSource';
export { processChunk } from './ChunkProcessor';
export { createChunkExecutor, InlineChunkExecutor, WorkerThreadChunkExecutor } from './executors';
export * from './types';
