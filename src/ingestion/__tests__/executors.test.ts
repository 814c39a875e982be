import * as path from 'path';

import { WorkerError } from '../../errors';
import { LookupTable } from '../../lookup/LookupTable';
import { createChunkExecutor, InlineChunkExecutor, WorkerThreadChunkExecutor } from '../executors';
import { createTempDir, flowLogLine, removeTempDir, toChunk, writeTestFile } from './helpers';

// Stand-in worker scripts speaking the executor's message protocol
const echoWorker = `
const { parentPort, workerData } = require('worker_threads');
parentPort.on('message', request => {
  parentPort.postMessage({
    type: 'result',
    chunkIndex: request.chunk.index,
    counts: {
      tagCounts: new Map([['entries', workerData.lookupEntries.length]]),
      portProtocolCounts: new Map(),
      stats: { linesRead: request.chunk.lines.length, recordsCounted: 0, malformedLines: 0 }
    }
  });
});
`;

const failingWorker = `
const { parentPort } = require('worker_threads');
parentPort.on('message', request => {
  parentPort.postMessage({ type: 'error', chunkIndex: request.chunk.index, message: 'bad chunk' });
});
`;

const crashingWorker = `
const { parentPort } = require('worker_threads');
parentPort.on('message', () => {
  throw new Error('boom');
});
`;

describe('InlineChunkExecutor', () => {
  it('should process chunks with the lookup table it was started with', async () => {
    const executor = new InlineChunkExecutor(2);
    await executor.start(LookupTable.fromRows([{ dstport: '25', protocol: 'tcp', tag: 'sv_P1' }]));

    const counts = await executor.execute(toChunk([flowLogLine('25', '6'), flowLogLine('80', '6')]));

    expect(Object.fromEntries(counts.tagCounts)).toEqual({ sv_P1: 1, Untagged: 1 });
    expect(executor.kind).toBe('inline');
    expect(executor.concurrency).toBe(2);
    await executor.close();
  });

  it('should reject work before it is started', async () => {
    const executor = new InlineChunkExecutor();

    await expect(executor.execute(toChunk([]))).rejects.toThrow('Executor has not been started');
  });
});

describe('createChunkExecutor', () => {
  it('should create an inline executor for inline mode', () => {
    expect(createChunkExecutor('inline', 3)).toBeInstanceOf(InlineChunkExecutor);
  });

  it('should create a worker pool for thread mode', () => {
    const executor = createChunkExecutor('thread', 3);

    expect(executor).toBeInstanceOf(WorkerThreadChunkExecutor);
    expect(executor.concurrency).toBe(3);
  });

  it('should fall back to inline when no compiled worker script exists', () => {
    // Tests run from TypeScript sources, where chunkWorker.js is absent
    expect(createChunkExecutor('auto', 2)).toBeInstanceOf(InlineChunkExecutor);
  });
});

describe('WorkerThreadChunkExecutor', () => {
  let tempDir: string;
  let executor: WorkerThreadChunkExecutor | undefined;

  const lookup = LookupTable.fromRows([
    { dstport: '25', protocol: 'tcp', tag: 'sv_P1' },
    { dstport: '68', protocol: 'udp', tag: 'sv_P2' }
  ]);

  beforeEach(async () => {
    tempDir = await createTempDir();
    executor = undefined;
  });

  afterEach(async () => {
    if (executor) {
      await executor.close();
    }
    await removeTempDir(tempDir);
  });

  it('should reject a non-positive worker count', () => {
    expect(() => new WorkerThreadChunkExecutor(0)).toThrow(WorkerError);
  });

  it('should reject work before the pool is started', async () => {
    executor = new WorkerThreadChunkExecutor(1, path.join(tempDir, 'unused.js'));

    await expect(executor.execute(toChunk([]))).rejects.toThrow('Worker pool is not running');
  });

  it('should send chunks to workers that received the lookup entries', async () => {
    executor = new WorkerThreadChunkExecutor(2, await writeTestFile(tempDir, 'echo.js', echoWorker));
    await executor.start(lookup);

    const [first, second] = await Promise.all([
      executor.execute(toChunk(['a', 'b'], 0)),
      executor.execute(toChunk(['c'], 1, 3))
    ]);

    expect(first.tagCounts.get('entries')).toBe(2);
    expect(first.stats.linesRead).toBe(2);
    expect(second.stats.linesRead).toBe(1);
  });

  it('should reuse workers once they finish a chunk', async () => {
    executor = new WorkerThreadChunkExecutor(1, await writeTestFile(tempDir, 'echo.js', echoWorker));
    await executor.start(lookup);

    const first = await executor.execute(toChunk(['a'], 0));
    const second = await executor.execute(toChunk(['b', 'c'], 1, 2));

    expect(first.stats.linesRead).toBe(1);
    expect(second.stats.linesRead).toBe(2);
  });

  it('should reject more chunks than idle workers', async () => {
    executor = new WorkerThreadChunkExecutor(1, await writeTestFile(tempDir, 'echo.js', echoWorker));
    await executor.start(lookup);

    const running = executor.execute(toChunk(['a'], 0));
    await expect(executor.execute(toChunk(['b'], 1))).rejects.toThrow('No idle worker available');
    await running;
  });

  it('should surface a chunk failure reported by the worker', async () => {
    executor = new WorkerThreadChunkExecutor(1, await writeTestFile(tempDir, 'failing.js', failingWorker));
    await executor.start(lookup);

    await expect(executor.execute(toChunk(['a'], 5))).rejects.toThrow('Chunk 5 failed: bad chunk');
  });

  it('should reject the running chunk when its worker crashes', async () => {
    executor = new WorkerThreadChunkExecutor(1, await writeTestFile(tempDir, 'crashing.js', crashingWorker));
    await executor.start(lookup);

    const result = executor.execute(toChunk(['a'], 2));

    await expect(result).rejects.toBeInstanceOf(WorkerError);
    await expect(result).rejects.toThrow('Worker thread crashed: boom');
  });

  it('should refuse to start twice', async () => {
    executor = new WorkerThreadChunkExecutor(1, await writeTestFile(tempDir, 'echo.js', echoWorker));
    await executor.start(lookup);

    await expect(executor.start(lookup)).rejects.toThrow('Worker pool is already running');
  });
});
