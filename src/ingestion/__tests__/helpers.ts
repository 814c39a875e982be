// Test utilities for flow log ingestion tests

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { Chunk } from '../types';

/**
 * A well-formed 14-field flow log line with the given destination port and
 * protocol number in fields 5 and 6
 */
export const flowLogLine = (dstport: string, protocolCode: string): string =>
  `2 123456789012 eni-0a1b2c3d 10.0.1.201 198.51.100.2 ${dstport} ${protocolCode} 25 20000 1620140761 1620140821 ACCEPT OK value1`;

export const validFlowLogLines = [
  flowLogLine('443', '6'),
  flowLogLine('23', '6'),
  flowLogLine('25', '6'),
  flowLogLine('110', '6'),
  flowLogLine('993', '6'),
  flowLogLine('143', '6'),
  flowLogLine('49153', '6'),
  flowLogLine('68', '17'),
  flowLogLine('0', '1')
];

export const malformedFlowLogLines = [
  // Five fields
  '2 123456789012 eni-4d3c2b1a 192.168.1.100 203.0.113.101',
  // Thirteen fields
  '2 123456789012 eni-4d3c2b1a 192.168.1.100 203.0.113.101 443 6 25 20000 1620140761 1620140821 ACCEPT OK',
  // Empty line
  '',
  // Only whitespace
  '   \t   '
];

export const lookupCsv = [
  'dstport,protocol,tag',
  '25,tcp,sv_P1',
  '68,udp,sv_P2',
  '23,tcp,sv_P1',
  '31,udp,SV_P3',
  '443,tcp,sv_P2',
  '22,tcp,sv_P4',
  '3389,tcp,sv_P5',
  '0,icmp,sv_P5',
  '110,tcp,email',
  '993,tcp,email',
  '143,tcp,email'
].join('\n') + '\n';

export const toChunk = (lines: string[], index: number = 0, firstLineNumber: number = 1): Chunk => ({
  index,
  lines: lines.map((line, offset) => [firstLineNumber + offset, line])
});

export const createTempDir = (): Promise<string> =>
  fs.promises.mkdtemp(path.join(os.tmpdir(), 'flow-log-tagger-test-'));

export const writeTestFile = async (dir: string, name: string, content: string): Promise<string> => {
  const filePath = path.join(dir, name);
  await fs.promises.writeFile(filePath, content, 'ascii');
  return filePath;
};

export const writeFlowLog = (dir: string, name: string, lines: string[]): Promise<string> =>
  writeTestFile(dir, name, lines.length === 0 ? '' : lines.join('\n') + '\n');

export const removeTempDir = async (dir: string): Promise<void> => {
  await fs.promises.rm(dir, { recursive: true, force: true });
};
