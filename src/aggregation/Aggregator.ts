import { AggregationError } from '../errors';
import { emptyStats, incrementCount } from './counts';
import { CountStats, GlobalCounts, PartialCounts } from './types';

/**
 * Run-wide accumulator for chunk results.
 *
 * Only the coordinating event loop calls {@link CountAggregator.merge}; chunk
 * results arrive in whatever order the executors finish them. Integer addition
 * makes the totals independent of that order. Each chunk index may be merged
 * once.
 */
export class CountAggregator {
  private readonly tagCounts = new Map<string, number>();
  private readonly portProtocolCounts = new Map<string, number>();
  private readonly totals = emptyStats();
  private readonly mergedChunks = new Set<number>();

  merge(chunkIndex: number, partial: PartialCounts): void {
    if (this.mergedChunks.has(chunkIndex)) {
      throw new AggregationError(`Chunk ${chunkIndex} has already been merged`, chunkIndex);
    }
    this.mergedChunks.add(chunkIndex);

    for (const [tag, count] of partial.tagCounts) {
      incrementCount(this.tagCounts, tag, count);
    }
    for (const [key, count] of partial.portProtocolCounts) {
      incrementCount(this.portProtocolCounts, key, count);
    }

    this.totals.linesRead += partial.stats.linesRead;
    this.totals.recordsCounted += partial.stats.recordsCounted;
    this.totals.malformedLines += partial.stats.malformedLines;
  }

  hasMerged(chunkIndex: number): boolean {
    return this.mergedChunks.has(chunkIndex);
  }

  get stats(): CountStats {
    return { ...this.totals };
  }

  get chunksMerged(): number {
    return this.mergedChunks.size;
  }

  snapshot(): GlobalCounts {
    return {
      tagCounts: new Map(this.tagCounts),
      portProtocolCounts: new Map(this.portProtocolCounts),
      stats: { ...this.totals },
      chunksMerged: this.mergedChunks.size
    };
  }
}
