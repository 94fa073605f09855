import type { DnsRecordInput } from './types.js';

/** Account-wide DNS provider adapter (one HTTP request per method call) */
export interface DnsProvider {
  /** List every domain on the account, in provider order */
  listDomains(): Promise<string[]>;
  /** List the IDs of all records on a domain, of every type */
  listRecordIds(domain: string): Promise<string[]>;
  /** Delete a record by provider ID */
  deleteRecord(domain: string, id: string): Promise<void>;
  /** Create a DNS record */
  createRecord(domain: string, record: DnsRecordInput): Promise<void>;
}
