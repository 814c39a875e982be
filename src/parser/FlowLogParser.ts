import { FlowLogParser, FlowRecord, ParseResult } from './types';
import { protocolName } from './protocols';

/**
 * Flow Log Parser
 *
 * Reads the positional fields of a whitespace-delimited VPC flow log record:
 * version account-id interface-id srcaddr dstaddr dstport protocol ...
 *
 * Only the destination port (field 5) and protocol number (field 6) are used.
 * A record needs at least 14 fields; anything beyond that is ignored.
 */
export class VpcFlowLogParser implements FlowLogParser {
  static readonly MIN_FIELD_COUNT = 14;
  private static readonly DSTPORT_INDEX = 5;
  private static readonly PROTOCOL_INDEX = 6;

  parseEntry(logLine: string, lineNumber?: number): ParseResult {
    const fields = this.extractFields(logLine);

    if (fields.length < VpcFlowLogParser.MIN_FIELD_COUNT) {
      return {
        success: false,
        error: `Expected at least ${VpcFlowLogParser.MIN_FIELD_COUNT} fields, got ${fields.length}`,
        lineNumber
      };
    }

    const protocolCode = fields[VpcFlowLogParser.PROTOCOL_INDEX].trim();
    const record: FlowRecord = {
      dstPort: fields[VpcFlowLogParser.DSTPORT_INDEX].trim().toLowerCase(),
      protocolCode,
      protocol: protocolName(protocolCode)
    };

    return {
      success: true,
      record,
      lineNumber
    };
  }

  /**
   * Split on runs of whitespace, ignoring leading and trailing whitespace
   */
  extractFields(logLine: string): string[] {
    const trimmed = logLine.trim();
    return trimmed.length === 0 ? [] : trimmed.split(/\s+/);
  }
}
