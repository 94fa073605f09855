import type { Logger } from 'pino';
import { toError } from './errors.js';
import type { DnsProvider } from './provider.js';
import type { DomainOutcome, RunSummary } from './types.js';
import { updateDomainRecords } from './update.js';

export interface RunOptions {
  logger: Logger;
  dryRun?: boolean;
}

/**
 * Point every domain on the account at `ip`.
 *
 * A failure while listing domains rejects. A failure on one domain is
 * logged and recorded in the summary, and the next domain is processed.
 */
export async function updateAllDomains(
  ip: string,
  provider: DnsProvider,
  options: RunOptions
): Promise<RunSummary> {
  const { logger, dryRun = false } = options;

  const domains = await provider.listDomains();
  logger.info({ domains: domains.length }, `Found ${domains.length} domain(s)`);

  const outcomes: DomainOutcome[] = [];
  for (const domain of domains) {
    logger.info({ domain }, `Processing domain: ${domain}`);
    try {
      const result = await updateDomainRecords(domain, ip, provider, {
        logger,
        dryRun,
      });
      outcomes.push({ status: 'updated', ...result });
      logger.info(
        {
          domain,
          deleted: result.deleted.length,
          created: result.created.length,
          dryRun,
        },
        `Updated ${domain}`
      );
    } catch (err) {
      const error = toError(err);
      logger.error(
        { domain, err: error },
        `Error updating domain ${domain}: ${error.message}`
      );
      outcomes.push({ status: 'failed', domain, error });
    }
  }

  const failed = outcomes.filter((o) => o.status === 'failed').length;
  return {
    ip,
    domains: outcomes,
    updated: outcomes.length - failed,
    failed,
  };
}
