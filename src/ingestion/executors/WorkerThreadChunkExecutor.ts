import * as path from 'path';
import { Worker } from 'worker_threads';

import { PartialCounts } from '../../aggregation/types';
import { WorkerError } from '../../errors';
import { LookupTable } from '../../lookup/LookupTable';
import { Chunk, ChunkExecutor } from '../types';
import { ChunkRequest, ChunkResponse, ChunkWorkerData } from './messages';

interface PendingChunk {
  chunkIndex: number;
  resolve: (counts: PartialCounts) => void;
  reject: (error: Error) => void;
}

interface PoolWorker {
  worker: Worker;
  current?: PendingChunk;
}

/**
 * Compiled location of the worker entry point. Only exists after a build;
 * running from TypeScript sources there is no script to start.
 */
export function workerScriptPath(): string {
  return path.join(__dirname, 'chunkWorker.js');
}

/**
 * Fixed pool of worker threads, one chunk per thread at a time.
 *
 * The lookup table is copied into each thread once, at start-up. Callers must
 * not have more than `concurrency` chunks in flight; the pipeline's queue
 * enforces that.
 */
export class WorkerThreadChunkExecutor implements ChunkExecutor {
  readonly kind = 'thread' as const;
  readonly concurrency: number;
  private readonly scriptPath: string;
  private pool: PoolWorker[] = [];
  private idle: PoolWorker[] = [];
  private closing = false;

  constructor(concurrency: number, scriptPath: string = workerScriptPath()) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new WorkerError(`Worker count must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.scriptPath = scriptPath;
  }

  async start(lookup: LookupTable): Promise<void> {
    if (this.pool.length > 0) {
      throw new WorkerError('Worker pool is already running');
    }

    const data: ChunkWorkerData = { lookupEntries: lookup.toEntries() };
    this.closing = false;

    for (let i = 0; i < this.concurrency; i++) {
      const member: PoolWorker = { worker: new Worker(this.scriptPath, { workerData: data }) };
      this.attach(member);
      this.pool.push(member);
      this.idle.push(member);
    }
  }

  execute(chunk: Chunk): Promise<PartialCounts> {
    const member = this.idle.pop();
    if (!member) {
      return Promise.reject(new WorkerError(
        this.pool.length === 0 ? 'Worker pool is not running' : 'No idle worker available',
        chunk.index
      ));
    }

    return new Promise<PartialCounts>((resolve, reject) => {
      member.current = { chunkIndex: chunk.index, resolve, reject };
      const request: ChunkRequest = { type: 'chunk', chunk };
      member.worker.postMessage(request);
    });
  }

  async close(): Promise<void> {
    this.closing = true;
    const members = this.pool;
    this.pool = [];
    this.idle = [];

    for (const member of members) {
      this.fail(member, new WorkerError('Worker pool closed before the chunk finished', member.current?.chunkIndex));
    }
    await Promise.all(members.map(member => member.worker.terminate()));
  }

  private attach(member: PoolWorker): void {
    member.worker.on('message', (response: ChunkResponse) => {
      const pending = member.current;
      member.current = undefined;
      if (!this.closing && this.pool.includes(member)) {
        this.idle.push(member);
      }

      if (!pending) {
        return;
      }
      if (response.type === 'result') {
        pending.resolve(response.counts);
      } else {
        pending.reject(new WorkerError(`Chunk ${response.chunkIndex} failed: ${response.message}`, response.chunkIndex));
      }
    });

    member.worker.on('error', (error: Error) => {
      this.retire(member);
      this.fail(member, new WorkerError(`Worker thread crashed: ${error.message}`, member.current?.chunkIndex, error));
    });

    member.worker.on('exit', (code: number) => {
      if (this.closing) {
        return;
      }
      this.retire(member);
      this.fail(member, new WorkerError(`Worker thread exited with code ${code}`, member.current?.chunkIndex));
    });
  }

  private retire(member: PoolWorker): void {
    this.pool = this.pool.filter(candidate => candidate !== member);
    this.idle = this.idle.filter(candidate => candidate !== member);
  }

  private fail(member: PoolWorker, error: WorkerError): void {
    const pending = member.current;
    member.current = undefined;
    if (pending) {
      pending.reject(error);
    }
  }
}
