// Types specific to flow log record parsing

export type ProtocolName = 'tcp' | 'udp' | 'icmp' | 'unknown';

export interface FlowRecord {
  dstPort: string;
  protocolCode: string;
  protocol: ProtocolName;
}

export interface ParseResult {
  success: boolean;
  record?: FlowRecord;
  error?: string;
  lineNumber?: number;
}

export interface FlowLogParser {
  parseEntry(logLine: string, lineNumber?: number): ParseResult;
}
