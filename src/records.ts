import { APEX_NAME, DDNS_TTL, WILDCARD_NAME } from './constants.js';
import type { DnsRecordInput } from './types.js';

/**
 * Build the records published for every domain: an apex and a wildcard A
 * record pointing at `ip`.
 *
 * The address is used as given; it is not validated.
 */
export function buildDdnsRecords(ip: string): DnsRecordInput[] {
  return [APEX_NAME, WILDCARD_NAME].map(
    (name): DnsRecordInput => ({
      name,
      type: 'A',
      content: ip,
      ttl: DDNS_TTL,
    })
  );
}
