import { emptyCounts, incrementCount, portProtocolKey } from '../aggregation/counts';
import { PartialCounts, UNTAGGED } from '../aggregation/types';
import { TagLookup } from '../lookup/types';
import { VpcFlowLogParser } from '../parser/FlowLogParser';
import { FlowLogParser } from '../parser/types';
import { Chunk } from './types';

const defaultParser = new VpcFlowLogParser();

/**
 * Count one chunk against the lookup table.
 *
 * Lines with too few fields are skipped and only tallied in
 * `stats.malformedLines`. Every other line adds one to exactly one
 * port/protocol bucket and one tag bucket (its tag, or `Untagged`).
 */
export function processChunk(chunk: Chunk, lookup: TagLookup, parser: FlowLogParser = defaultParser): PartialCounts {
  const counts = emptyCounts();

  for (const [lineNumber, line] of chunk.lines) {
    counts.stats.linesRead++;

    const result = parser.parseEntry(line, lineNumber);
    if (!result.success || !result.record) {
      counts.stats.malformedLines++;
      continue;
    }

    const { dstPort, protocol } = result.record;
    incrementCount(counts.portProtocolCounts, portProtocolKey(dstPort, protocol));
    incrementCount(counts.tagCounts, lookup.lookupNormalized(dstPort, protocol) ?? UNTAGGED);
    counts.stats.recordsCounted++;
  }

  return counts;
}
