import { open, FileHandle } from 'fs/promises';
import { createInterface } from 'readline';

import { ConfigurationError, FatalIOError, toError } from '../errors';
import { Chunk, ChunkSourceOptions, NumberedLine } from './types';

export const DEFAULT_CHUNK_SIZE = 100000;

/**
 * Read a flow log file and yield consecutive chunks of at most `chunkSize`
 * numbered lines, in file order. The last chunk may be shorter; an empty file
 * yields nothing. Each call opens the file again and starts from line 1.
 */
export async function* readChunks(filePath: string, options: ChunkSourceOptions = {}): AsyncGenerator<Chunk> {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new ConfigurationError(`Chunk size must be a positive integer, got ${chunkSize}`);
  }

  let handle: FileHandle;
  try {
    handle = await open(filePath, 'r');
  } catch (error) {
    throw new FatalIOError(
      `Cannot open flow log file '${filePath}': ${toError(error).message}`,
      filePath,
      toError(error)
    );
  }

  const stream = handle.createReadStream({ encoding: options.encoding ?? 'ascii' });
  const rl = createInterface({ input: stream, crlfDelay: Infinity });

  let index = 0;
  let lineNumber = 0;
  let lines: NumberedLine[] = [];

  try {
    for await (const line of rl) {
      lineNumber++;
      lines.push([lineNumber, line]);

      if (lines.length === chunkSize) {
        yield { index: index++, lines };
        lines = [];
      }
    }
  } catch (error) {
    throw new FatalIOError(
      `Error reading flow log file '${filePath}' after line ${lineNumber}: ${toError(error).message}`,
      filePath,
      toError(error)
    );
  } finally {
    rl.close();
    stream.destroy();
  }

  if (lines.length > 0) {
    yield { index, lines };
  }
}
