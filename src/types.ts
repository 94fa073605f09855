/** Porkbun account credentials, sent as `apikey` / `secretkey` in every request body */
export interface PorkbunCredentials {
  apiKey: string;
  secretKey: string;
}

/** Record types accepted by the Porkbun DNS API */
export type DnsRecordType =
  | 'A'
  | 'AAAA'
  | 'MX'
  | 'CNAME'
  | 'ALIAS'
  | 'TXT'
  | 'NS'
  | 'SRV'
  | 'TLSA'
  | 'CAA'
  | 'HTTPS'
  | 'SVCB';

/** A DNS record to create */
export interface DnsRecordInput {
  /** Host relative to the domain (`@` for the apex, `*` for the wildcard) */
  name: string;
  type: DnsRecordType;
  content: string;
  ttl: number;
  /** Only sent when set (MX, SRV) */
  priority?: number;
}

/** What happened to one domain */
export interface DomainUpdateResult {
  domain: string;
  /** IDs of the records that were (or, in a dry run, would be) deleted */
  deleted: string[];
  /** Records that were (or would be) created */
  created: DnsRecordInput[];
  dryRun: boolean;
}

export type DomainOutcome =
  | ({ status: 'updated' } & DomainUpdateResult)
  | { status: 'failed'; domain: string; error: Error };

/** Result of one pass over every domain on the account */
export interface RunSummary {
  ip: string;
  domains: DomainOutcome[];
  updated: number;
  failed: number;
}
