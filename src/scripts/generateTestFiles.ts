#!/usr/bin/env node

/**
 * Script to generate a sample lookup table and flow log for local runs
 *
 * Usage: generate-test-files [lookup_file] [flow_log_file] [mappings] [entries] [--no-malformed]
 */

import { createWriteStream } from 'fs';
import * as fs from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';

import { LookupTable } from '../lookup/LookupTable';
import { LookupRow } from '../lookup/types';

export interface GeneratorOptions {
  lookupPath: string;
  flowLogPath: string;
  mappings: number;
  entries: number;
  includeMalformed: boolean;
  /** Fraction of lines cut short when `includeMalformed` is set */
  malformedRate: number;
  random: () => number;
}

export const GENERATOR_DEFAULTS = {
  lookupPath: 'lookup_table.csv',
  flowLogPath: 'flow_log_file',
  mappings: 10000,
  entries: 1000000,
  includeMalformed: true,
  malformedRate: 0.05
};

const PROTOCOL_NUMBERS: Record<string, string> = {
  tcp: '6',
  udp: '17',
  icmp: '1'
};

const ACTIONS = ['ACCEPT', 'REJECT'];

function randomInt(random: () => number, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: () => number, values: readonly T[]): T {
  return values[Math.floor(random() * values.length)];
}

function randomIp(random: () => number): string {
  return [0, 0, 0, 0].map(() => randomInt(random, 0, 255)).join('.');
}

export function generateLookupRows(count: number, random: () => number = Math.random): LookupRow[] {
  const protocols = Object.keys(PROTOCOL_NUMBERS);
  const rows: LookupRow[] = [];

  for (let i = 0; i < count; i++) {
    rows.push({
      dstport: String(randomInt(random, 1, 65535)),
      protocol: pick(random, protocols),
      tag: `sv_p${randomInt(random, 1, 100)}`
    });
  }

  return rows;
}

/**
 * Flow log lines in the version 2 layout, using port/protocol pairs from the
 * lookup rows so most lines are tagged. Some lines are cut to 5-13 fields when
 * malformed lines are requested.
 */
export function* generateFlowLogLines(
  rows: LookupRow[],
  count: number,
  options: Pick<GeneratorOptions, 'includeMalformed' | 'malformedRate' | 'random'>
): Generator<string> {
  if (rows.length === 0) {
    throw new Error('Lookup table is empty. Cannot generate flow log.');
  }

  const { random } = options;
  const start = Math.floor(Date.now() / 1000);

  for (let i = 0; i < count; i++) {
    const mapping = pick(random, rows);
    const fields = [
      '2',
      '123456789012',
      `eni-${randomInt(random, 0x10000000, 0xffffffff).toString(16)}`,
      randomIp(random),
      randomIp(random),
      mapping.dstport,
      PROTOCOL_NUMBERS[mapping.protocol] ?? '999',
      String(randomInt(random, 1, 100)),
      String(randomInt(random, 40, 100000)),
      String(start + i),
      String(start + i + 60),
      pick(random, ACTIONS),
      'OK',
      `value${randomInt(random, 1, 6)}`
    ];

    if (options.includeMalformed && random() < options.malformedRate) {
      yield fields.slice(0, randomInt(random, 5, 13)).join(' ') + '\n';
    } else {
      yield fields.join(' ') + '\n';
    }
  }
}

function csvValue(value: string): string {
  return /[",\s]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export async function generateTestFiles(overrides: Partial<GeneratorOptions> = {}): Promise<void> {
  const options: GeneratorOptions = {
    ...GENERATOR_DEFAULTS,
    random: Math.random,
    ...overrides
  };

  const rows = generateLookupRows(options.mappings, options.random);
  const csv = ['dstport,protocol,tag', ...rows.map(row => [row.dstport, row.protocol, row.tag].map(csvValue).join(','))];
  await fs.writeFile(options.lookupPath, csv.join('\n') + '\n', 'ascii');
  console.log(`✅ Lookup table generated at '${options.lookupPath}' with ${options.mappings} mappings.`);

  // Read back through the tagger's own loader so the flow log matches what it will see
  const lookup = await LookupTable.load(options.lookupPath);
  const mappings = lookup.toEntries().map(([dstport, protocol, tag]) => ({ dstport, protocol, tag }));

  await pipeline(
    Readable.from(generateFlowLogLines(mappings, options.entries, options)),
    createWriteStream(options.flowLogPath, { encoding: 'ascii' })
  );
  console.log(`✅ Flow log file generated at '${options.flowLogPath}' with ${options.entries} entries.`);
}

export function parseGeneratorArgs(args: string[]): Partial<GeneratorOptions> {
  const positional = args.filter(arg => !arg.startsWith('--'));
  const options: Partial<GeneratorOptions> = {};

  if (args.includes('--no-malformed')) {
    options.includeMalformed = false;
  }
  if (positional[0]) {
    options.lookupPath = positional[0];
  }
  if (positional[1]) {
    options.flowLogPath = positional[1];
  }
  if (positional[2]) {
    options.mappings = parsePositive(positional[2], 'mappings');
  }
  if (positional[3]) {
    options.entries = parsePositive(positional[3], 'entries');
  }

  return options;
}

function parsePositive(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new Error(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

if (require.main === module) {
  Promise.resolve()
    .then(() => generateTestFiles(parseGeneratorArgs(process.argv.slice(2))))
    .catch((error: unknown) => {
      console.error('❌ Error generating test files:', error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
