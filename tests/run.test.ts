import { describe, it, expect } from 'vitest';
import { updateAllDomains } from '../src/run.js';
import { ApiError, TransportError } from '../src/errors.js';
import { createLogger } from '../src/logger.js';
import { createFakeProvider } from './helpers/fake-provider.js';

const IP = '203.0.113.10';

function captureLogs() {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger({
    level: 'debug',
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg) as Record<string, unknown>);
      },
    },
  });
  return { logger, lines };
}

describe('updateAllDomains', () => {
  it('updates every domain in listed order', async () => {
    const provider = createFakeProvider({
      domains: ['a.com', 'b.com'],
      records: { 'a.com': ['id1'], 'b.com': ['id2'] },
    });
    const { logger } = captureLogs();

    const summary = await updateAllDomains(IP, provider, { logger });

    expect(summary.ip).toBe(IP);
    expect(summary.updated).toBe(2);
    expect(summary.failed).toBe(0);
    expect(summary.domains.map((d) => [d.domain, d.status])).toEqual([
      ['a.com', 'updated'],
      ['b.com', 'updated'],
    ]);
    expect(
      provider.calls
        .filter((c) => c.op === 'listRecordIds')
        .map((c) => ('domain' in c ? c.domain : undefined))
    ).toEqual(['a.com', 'b.com']);
  });

  it('continues with the next domain after a failed delete', async () => {
    const failure = new ApiError('Invalid record ID.', {
      status: 'ERROR',
      httpStatus: 400,
      path: '/dns/delete/a.com/id2',
    });
    const provider = createFakeProvider({
      domains: ['a.com', 'b.com'],
      records: { 'a.com': ['id1', 'id2'], 'b.com': [] },
      failOn: (call) =>
        call.op === 'deleteRecord' && call.id === 'id2' ? failure : undefined,
    });
    const { logger } = captureLogs();

    const summary = await updateAllDomains(IP, provider, { logger });

    const forDomain = (domain: string) =>
      provider.calls.filter((c) => 'domain' in c && c.domain === domain);

    const aCalls = forDomain('a.com');
    expect(aCalls.filter((c) => c.op === 'deleteRecord')).toHaveLength(2);
    expect(aCalls.filter((c) => c.op === 'createRecord')).toHaveLength(0);

    const bCalls = forDomain('b.com');
    expect(bCalls.filter((c) => c.op === 'createRecord')).toHaveLength(2);

    expect(summary.updated).toBe(1);
    expect(summary.failed).toBe(1);
    expect(summary.domains[0]).toEqual({
      status: 'failed',
      domain: 'a.com',
      error: failure,
    });
    expect(summary.domains[1]).toMatchObject({ status: 'updated', domain: 'b.com' });
  });

  it('logs per-domain failures with the domain name', async () => {
    const provider = createFakeProvider({
      domains: ['a.com'],
      failOn: (call) =>
        call.op === 'listRecordIds'
          ? new TransportError('Porkbun request to /dns/retrieve/a.com failed: fetch failed')
          : undefined,
    });
    const { logger, lines } = captureLogs();

    await updateAllDomains(IP, provider, { logger });

    const errors = lines.filter((l) => l.level === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({
      domain: 'a.com',
      msg: 'Error updating domain a.com: Porkbun request to /dns/retrieve/a.com failed: fetch failed',
      err: { type: 'TransportError' },
    });
  });

  it('returns an empty summary when the account has no domains', async () => {
    const provider = createFakeProvider({ domains: [] });
    const { logger, lines } = captureLogs();

    const summary = await updateAllDomains(IP, provider, { logger });

    expect(summary).toEqual({ ip: IP, domains: [], updated: 0, failed: 0 });
    expect(lines.map((l) => l.msg)).toEqual(['Found 0 domain(s)']);
  });

  it('rejects when listing domains fails', async () => {
    const provider = createFakeProvider({
      domains: ['a.com'],
      failOn: (call) =>
        call.op === 'listDomains'
          ? new ApiError('Invalid API key. (002)', {
              status: 'ERROR',
              httpStatus: 403,
              path: '/domains/retrieve',
            })
          : undefined,
    });
    const { logger } = captureLogs();

    await expect(updateAllDomains(IP, provider, { logger })).rejects.toThrow(
      'Porkbun API error: Invalid API key. (002)'
    );
    expect(provider.calls).toEqual([{ op: 'listDomains' }]);
  });

  it('passes dryRun through to each domain', async () => {
    const provider = createFakeProvider({
      domains: ['a.com'],
      records: { 'a.com': ['id1'] },
    });
    const { logger } = captureLogs();

    const summary = await updateAllDomains(IP, provider, { logger, dryRun: true });

    expect(provider.calls.map((c) => c.op)).toEqual(['listDomains', 'listRecordIds']);
    expect(summary.domains[0]).toMatchObject({
      status: 'updated',
      dryRun: true,
      deleted: ['id1'],
    });
  });
});
