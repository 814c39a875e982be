// Parser module exports
import { VpcFlowLogParser } from './FlowLogParser';
export { VpcFlowLogParser } from './FlowLogParser';
export { PROTOCOL_NAMES, UNKNOWN_PROTOCOL, protocolName } from './protocols';
export * from './types';

// Factory function for creating parser instances
export function createFlowLogParser(): VpcFlowLogParser {
  return new VpcFlowLogParser();
}
