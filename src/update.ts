import type { Logger } from 'pino';
import type { DnsProvider } from './provider.js';
import { buildDdnsRecords } from './records.js';
import type { DnsRecordInput, DomainUpdateResult } from './types.js';

export interface UpdateOptions {
  logger?: Logger;
  /** List records but send no delete or create request */
  dryRun?: boolean;
}

/**
 * Replace every record on a domain with apex and wildcard A records for `ip`.
 *
 * 1. Lists the IDs of all existing records (every type, including MX/TXT/CNAME)
 * 2. Deletes them one at a time, in listed order
 * 3. Creates `@` and `*` A records
 *
 * The first failing request rejects the returned promise. Records deleted
 * before the failure stay deleted and nothing is created.
 */
export async function updateDomainRecords(
  domain: string,
  ip: string,
  provider: DnsProvider,
  options: UpdateOptions = {}
): Promise<DomainUpdateResult> {
  const { logger, dryRun = false } = options;

  const ids = await provider.listRecordIds(domain);
  logger?.debug({ domain, records: ids.length }, 'Fetched existing records');

  const deleted: string[] = [];
  for (const id of ids) {
    if (!dryRun) {
      await provider.deleteRecord(domain, id);
    }
    deleted.push(id);
    logger?.debug(
      { domain, id, dryRun },
      `${dryRun ? 'Would delete' : 'Deleted'} record ${id}`
    );
  }

  const created: DnsRecordInput[] = [];
  for (const record of buildDdnsRecords(ip)) {
    if (!dryRun) {
      await provider.createRecord(domain, record);
    }
    created.push(record);
    logger?.debug(
      { domain, dryRun },
      `${dryRun ? 'Would create' : 'Created'} ${record.type} ${record.name} -> ${record.content}`
    );
  }

  return { domain, deleted, created, dryRun };
}
