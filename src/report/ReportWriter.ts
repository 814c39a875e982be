import * as fs from 'fs/promises';
import * as path from 'path';

import { splitPortProtocolKey } from '../aggregation/counts';
import { PortProtocolCounts, TagCounts } from '../aggregation/types';
import { FatalIOError, toError } from '../errors';

export interface ReportCounts {
  tagCounts: TagCounts;
  portProtocolCounts: PortProtocolCounts;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Render the two count tables as the text report.
 *
 * Rows are sorted by key (tags, then port and protocol as a pair) so the output
 * never depends on the order chunks were merged in.
 */
export function renderReport(counts: ReportCounts): string {
  const lines: string[] = ['Tag Counts:', 'Tag,Count'];

  const tags = [...counts.tagCounts.entries()].sort(([a], [b]) => compareStrings(a, b));
  for (const [tag, count] of tags) {
    lines.push(`${tag},${count}`);
  }

  lines.push('', 'Port/Protocol Combination Counts:', 'Port,Protocol,Count');

  const combinations = [...counts.portProtocolCounts.entries()]
    .map(([key, count]) => ({ key: splitPortProtocolKey(key), count }))
    .sort((a, b) => compareStrings(a.key[0], b.key[0]) || compareStrings(a.key[1], b.key[1]));
  for (const { key: [port, protocol], count } of combinations) {
    lines.push(`${port},${protocol},${count}`);
  }

  return lines.join('\n') + '\n';
}

/**
 * Write the report to `outputPath`. The content goes to a temporary file in the
 * same directory first and is renamed into place, so readers only ever see a
 * complete report.
 */
export async function writeReport(outputPath: string, counts: ReportCounts): Promise<void> {
  const content = renderReport(counts);
  const tempPath = path.join(
    path.dirname(outputPath),
    `.${path.basename(outputPath)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    await fs.writeFile(tempPath, content, 'ascii');
    await fs.rename(tempPath, outputPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      console.warn(`⚠️  Could not remove temporary report '${tempPath}': ${toError(cleanupError).message}`);
    });
    throw new FatalIOError(
      `Error writing to output file '${outputPath}': ${toError(error).message}`,
      outputPath,
      toError(error)
    );
  }
}
