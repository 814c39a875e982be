import { EventEmitter } from 'events';
import * as fs from 'fs/promises';
import PQueue from 'p-queue';
import { v4 as uuidv4 } from 'uuid';

import { CountAggregator } from '../aggregation/Aggregator';
import { createDefaultConfig, PipelineConfigValidator } from '../config/pipeline';
import { PipelineConfig } from '../config/types';
import { ConfigurationError, FatalIOError, toError } from '../errors';
import { readChunks } from '../ingestion/ChunkSource';
import { createChunkExecutor } from '../ingestion/executors';
import { Chunk, ChunkExecutor } from '../ingestion/types';
import { LookupTable } from '../lookup/LookupTable';
import { writeReport } from '../report/ReportWriter';
import { PipelineEvents, PipelineInput, PipelineOptions, PipelineResult, PipelineState } from './types';

export declare interface FlowLogPipeline {
  on<E extends keyof PipelineEvents>(event: E, listener: PipelineEvents[E]): this;
  once<E extends keyof PipelineEvents>(event: E, listener: PipelineEvents[E]): this;
  emit<E extends keyof PipelineEvents>(event: E, ...args: Parameters<PipelineEvents[E]>): boolean;
}

/**
 * Flow Log Tagging Pipeline
 *
 * init -> loading_lookup -> streaming -> aggregating -> writing -> done,
 * with `failed` reachable from every state.
 *
 * Chunks are read lazily and handed to the executor through a queue whose
 * concurrency matches the executor. Reading pauses while `maxQueuedChunks`
 * chunks are already waiting. Results are merged on this event loop as each
 * chunk finishes, in completion order. The report is written only after every
 * dispatched chunk has been merged.
 */
export class FlowLogPipeline extends EventEmitter {
  readonly config: PipelineConfig;
  private readonly executorOverride?: ChunkExecutor;
  private currentState: PipelineState = 'init';
  private isRunning = false;

  constructor(options: PipelineOptions = {}) {
    super();
    this.config = createDefaultConfig(options.config);

    const errors = PipelineConfigValidator.validate(this.config);
    if (errors.length > 0) {
      throw new ConfigurationError(`Invalid pipeline configuration: ${errors.join('; ')}`, errors);
    }

    this.executorOverride = options.executor;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  async run(input: PipelineInput): Promise<PipelineResult> {
    if (this.isRunning) {
      throw new Error('Pipeline is already running');
    }
    this.isRunning = true;

    const runId = uuidv4();
    const startTime = new Date();
    this.currentState = 'init';

    try {
      await this.validateInputs(input);

      this.transition('loading_lookup');
      const lookup = await LookupTable.load(input.lookupPath);

      const executor = this.executorOverride ?? createChunkExecutor(this.config.executor, this.config.workerCount);
      const aggregator = new CountAggregator();

      try {
        await executor.start(lookup);
        this.transition('streaming');
        await this.streamChunks(runId, input.flowLogPath, executor, aggregator);
      } finally {
        await executor.close();
      }

      this.transition('writing');
      const counts = aggregator.snapshot();
      await writeReport(input.outputPath, counts);

      const endTime = new Date();
      const durationMs = endTime.getTime() - startTime.getTime();
      const result: PipelineResult = {
        runId,
        outputPath: input.outputPath,
        counts,
        stats: {
          linesRead: counts.stats.linesRead,
          recordsCounted: counts.stats.recordsCounted,
          malformedLines: counts.stats.malformedLines,
          chunksProcessed: counts.chunksMerged,
          durationMs,
          throughput: durationMs > 0 ? Math.round(counts.stats.linesRead / (durationMs / 1000)) : counts.stats.linesRead
        },
        startTime,
        endTime
      };

      this.transition('done');
      this.emit('complete', result);
      return result;

    } catch (error) {
      const failedIn = this.currentState;
      this.transition('failed');
      this.emit('failed', toError(error), failedIn);
      throw error;
    } finally {
      this.isRunning = false;
    }
  }

  private async validateInputs(input: PipelineInput): Promise<void> {
    await this.assertFile(input.flowLogPath, 'Flow log file');
    await this.assertFile(input.lookupPath, 'Lookup table file');
  }

  private async assertFile(filePath: string, description: string): Promise<void> {
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        throw new FatalIOError(`${description} '${filePath}' is not a regular file.`, filePath);
      }
    } catch (error) {
      if (error instanceof FatalIOError) {
        throw error;
      }
      throw new FatalIOError(`${description} '${filePath}' does not exist.`, filePath, toError(error));
    }
  }

  private async streamChunks(
    runId: string,
    flowLogPath: string,
    executor: ChunkExecutor,
    aggregator: CountAggregator
  ): Promise<void> {
    const queue = new PQueue({ concurrency: executor.concurrency });
    let failure: Error | undefined;
    let chunksDispatched = 0;

    const dispatch = (chunk: Chunk): void => {
      queue.add(() => executor.execute(chunk))
        .then(partial => {
          if (failure) {
            return;
          }
          aggregator.merge(chunk.index, partial);
          this.reportProgress(runId, chunk.index, chunksDispatched, aggregator);
        })
        .catch((error: unknown) => {
          failure = failure ?? toError(error);
          queue.clear();
        });
    };

    for await (const chunk of readChunks(flowLogPath, { chunkSize: this.config.chunkSize })) {
      if (failure) {
        break;
      }

      dispatch(chunk);
      chunksDispatched++;

      if (queue.size >= this.config.maxQueuedChunks) {
        await queue.onEmpty();
      }
    }

    this.transition('aggregating');
    await queue.onIdle();

    if (failure) {
      throw failure;
    }
  }

  private reportProgress(runId: string, chunkIndex: number, chunksDispatched: number, aggregator: CountAggregator): void {
    const { linesRead, recordsCounted } = aggregator.stats;
    this.emit('chunk', {
      runId,
      chunkIndex,
      chunksDispatched,
      chunksMerged: aggregator.chunksMerged,
      linesRead,
      recordsCounted
    });
  }

  private transition(next: PipelineState): void {
    const previous = this.currentState;
    this.currentState = next;
    this.emit('state', next, previous);
  }
}
