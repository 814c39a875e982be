// Types for per-chunk and run-wide counts

/** Tag -> number of records classified under it */
export type TagCounts = Map<string, number>;

/** Encoded (port, protocol) key -> number of records; see `portProtocolKey` */
export type PortProtocolCounts = Map<string, number>;

export interface CountStats {
  linesRead: number;
  recordsCounted: number;
  malformedLines: number;
}

/**
 * Counts for one chunk. Plain Maps and numbers only, so the value survives the
 * structured clone between a worker thread and the main thread.
 */
export interface PartialCounts {
  tagCounts: TagCounts;
  portProtocolCounts: PortProtocolCounts;
  stats: CountStats;
}

export interface GlobalCounts extends PartialCounts {
  chunksMerged: number;
}

export const UNTAGGED = 'Untagged';
