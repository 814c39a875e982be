import { ProtocolName } from './types';

/**
 * IANA protocol numbers the tagger recognizes. Anything else is reported as
 * `unknown` and still counted.
 */
export const PROTOCOL_NAMES: Readonly<Record<string, ProtocolName>> = Object.freeze({
  '6': 'tcp',
  '17': 'udp',
  '1': 'icmp'
});

export const UNKNOWN_PROTOCOL: ProtocolName = 'unknown';

export function protocolName(protocolCode: string): ProtocolName {
  const code = protocolCode.trim();
  return Object.prototype.hasOwnProperty.call(PROTOCOL_NAMES, code) ? PROTOCOL_NAMES[code] : UNKNOWN_PROTOCOL;
}
