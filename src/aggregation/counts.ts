import { CountStats, PartialCounts } from './types';

const KEY_SEPARATOR = '\u0000';

export function portProtocolKey(port: string, protocol: string): string {
  return `${port}${KEY_SEPARATOR}${protocol}`;
}

export function splitPortProtocolKey(key: string): [port: string, protocol: string] {
  const separatorIndex = key.indexOf(KEY_SEPARATOR);
  if (separatorIndex === -1) {
    return [key, ''];
  }
  return [key.substring(0, separatorIndex), key.substring(separatorIndex + 1)];
}

export function incrementCount(counts: Map<string, number>, key: string, amount: number = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + amount);
}

export function emptyStats(): CountStats {
  return { linesRead: 0, recordsCounted: 0, malformedLines: 0 };
}

export function emptyCounts(): PartialCounts {
  return {
    tagCounts: new Map(),
    portProtocolCounts: new Map(),
    stats: emptyStats()
  };
}

export function sumCounts(counts: Map<string, number>): number {
  let total = 0;
  for (const count of counts.values()) {
    total += count;
  }
  return total;
}
