import { parentPort, workerData } from 'worker_threads';

import { LookupTable } from '../../lookup/LookupTable';
import { handleChunkRequest } from './chunkHandler';
import { ChunkRequest, ChunkWorkerData } from './messages';

// Entry point of each pool thread: rebuild the lookup table once, then count
// chunks one message at a time.
if (parentPort) {
  const port = parentPort;
  const data: ChunkWorkerData = workerData;
  const lookup = LookupTable.fromEntries(data.lookupEntries);

  port.on('message', (request: ChunkRequest) => {
    port.postMessage(handleChunkRequest(request, lookup));
  });
}
