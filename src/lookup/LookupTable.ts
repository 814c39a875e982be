import { open, FileHandle } from 'fs/promises';
import { createInterface } from 'readline';

import { FatalIOError, toError } from '../errors';
import { splitCsvLine } from './csv';
import { LookupColumn, LookupEntry, LookupRow, REQUIRED_LOOKUP_COLUMNS, TagLookup } from './types';

const KEY_SEPARATOR = '\u0000';

function normalizeKeyPart(value: string): string {
  return value.trim().toLowerCase();
}

function makeKey(port: string, protocol: string): string {
  return `${normalizeKeyPart(port)}${KEY_SEPARATOR}${normalizeKeyPart(protocol)}`;
}

/**
 * Immutable (dstport, protocol) -> tag mapping.
 *
 * Built once before any chunk is processed and only read afterwards, so it can
 * be shared by every concurrent reader without coordination. Worker threads get
 * their own copy through {@link LookupTable.toEntries}.
 */
export class LookupTable implements TagLookup {
  private readonly tags: ReadonlyMap<string, string>;

  private constructor(tags: Map<string, string>) {
    this.tags = tags;
  }

  static fromRows(rows: Iterable<LookupRow>): LookupTable {
    const tags = new Map<string, string>();
    for (const row of rows) {
      // Later rows overwrite earlier ones
      tags.set(makeKey(row.dstport, row.protocol), row.tag.trim());
    }
    return new LookupTable(tags);
  }

  static fromEntries(entries: Iterable<LookupEntry>): LookupTable {
    const rows: LookupRow[] = [];
    for (const [dstport, protocol, tag] of entries) {
      rows.push({ dstport, protocol, tag });
    }
    return LookupTable.fromRows(rows);
  }

  static empty(): LookupTable {
    return new LookupTable(new Map());
  }

  /**
   * Load a lookup table from a CSV file with a `dstport,protocol,tag` header
   */
  static async load(filePath: string): Promise<LookupTable> {
    let handle: FileHandle;
    try {
      handle = await open(filePath, 'r');
    } catch (error) {
      throw new FatalIOError(
        `Cannot open lookup table '${filePath}': ${toError(error).message}`,
        filePath,
        toError(error)
      );
    }

    const stream = handle.createReadStream({ encoding: 'ascii' });
    const rl = createInterface({ input: stream, crlfDelay: Infinity });

    try {
      return LookupTable.fromRows(await parseLookupLines(rl, filePath));
    } catch (error) {
      if (error instanceof FatalIOError) {
        throw error;
      }
      throw new FatalIOError(
        `Error reading lookup table file '${filePath}': ${toError(error).message}`,
        filePath,
        toError(error)
      );
    } finally {
      rl.close();
      stream.destroy();
    }
  }

  /**
   * Tag for a destination port and protocol name, or undefined when the
   * combination is not in the table. An empty tag counts as no match.
   */
  lookup(port: string, protocol: string): string | undefined {
    return this.lookupNormalized(normalizeKeyPart(port), normalizeKeyPart(protocol));
  }

  /**
   * Same as `lookup` for values that are already trimmed and lowercased,
   * as the flow-log parser emits them. Used once per flow-log record.
   */
  lookupNormalized(port: string, protocol: string): string | undefined {
    const tag = this.tags.get(`${port}${KEY_SEPARATOR}${protocol}`);
    return tag ? tag : undefined;
  }

  get size(): number {
    return this.tags.size;
  }

  toEntries(): LookupEntry[] {
    const entries: LookupEntry[] = [];
    for (const [key, tag] of this.tags) {
      const separatorIndex = key.indexOf(KEY_SEPARATOR);
      entries.push([key.substring(0, separatorIndex), key.substring(separatorIndex + 1), tag]);
    }
    return entries;
  }
}

/**
 * Turn raw CSV lines into lookup rows. The first non-blank line is the header;
 * column names are matched after trimming and lowercasing.
 */
export async function parseLookupLines(lines: AsyncIterable<string> | Iterable<string>, source: string): Promise<LookupRow[]> {
  const rows: LookupRow[] = [];
  let columns: Record<LookupColumn, number> | undefined;
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    if (line.trim().length === 0) {
      continue;
    }

    const fields = splitCsvLine(line);

    if (!columns) {
      columns = resolveColumns(fields, source);
      continue;
    }

    const dstport = fields[columns.dstport];
    const protocol = fields[columns.protocol];
    const tag = fields[columns.tag];
    if (dstport === undefined || protocol === undefined || tag === undefined) {
      throw new FatalIOError(
        `Malformed lookup table row at line ${lineNumber} of '${source}': expected at least ${Math.max(columns.dstport, columns.protocol, columns.tag) + 1} fields, got ${fields.length}`,
        source
      );
    }

    rows.push({
      dstport: normalizeKeyPart(dstport),
      protocol: normalizeKeyPart(protocol),
      tag: tag.trim()
    });
  }

  if (!columns) {
    throw new FatalIOError(`Lookup table '${source}' is empty; expected a dstport,protocol,tag header`, source);
  }

  return rows;
}

function resolveColumns(header: string[], source: string): Record<LookupColumn, number> {
  const names = header.map(normalizeKeyPart);
  const missing = REQUIRED_LOOKUP_COLUMNS.filter(column => !names.includes(column));

  if (missing.length > 0) {
    throw new FatalIOError(
      `Lookup table '${source}' is missing required column(s): ${missing.join(', ')}`,
      source
    );
  }

  return {
    dstport: names.indexOf('dstport'),
    protocol: names.indexOf('protocol'),
    tag: names.indexOf('tag')
  };
}
