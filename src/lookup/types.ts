// Types for the port/protocol lookup table

/** A single `[dstport, protocol, tag]` triple, already normalized */
export type LookupEntry = [port: string, protocol: string, tag: string];

export interface LookupRow {
  dstport: string;
  protocol: string;
  tag: string;
}

export interface TagLookup {
  lookup(port: string, protocol: string): string | undefined;
  /** Lookup that skips key normalization; callers pass trimmed, lowercased values */
  lookupNormalized(port: string, protocol: string): string | undefined;
  readonly size: number;
}

export const REQUIRED_LOOKUP_COLUMNS = ['dstport', 'protocol', 'tag'] as const;

export type LookupColumn = typeof REQUIRED_LOOKUP_COLUMNS[number];
