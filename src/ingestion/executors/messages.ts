// Messages exchanged between the executor and its worker threads

import { PartialCounts } from '../../aggregation/types';
import { LookupEntry } from '../../lookup/types';
import { Chunk } from '../types';

export interface ChunkWorkerData {
  lookupEntries: LookupEntry[];
}

export interface ChunkRequest {
  type: 'chunk';
  chunk: Chunk;
}

export type ChunkResponse =
  | { type: 'result'; chunkIndex: number; counts: PartialCounts }
  | { type: 'error'; chunkIndex: number; message: string };
