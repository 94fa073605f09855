import { describe, it, expect } from 'vitest';
import { buildDdnsRecords } from '../src/records.js';
import { DDNS_TTL } from '../src/constants.js';

describe('buildDdnsRecords', () => {
  it('returns apex and wildcard A records for the address', () => {
    expect(buildDdnsRecords('203.0.113.10')).toEqual([
      { name: '@', type: 'A', content: '203.0.113.10', ttl: 300 },
      { name: '*', type: 'A', content: '203.0.113.10', ttl: 300 },
    ]);
  });

  it.each(['192.0.2.1', '198.51.100.254', '10.0.0.1'])(
    'uses type A, TTL 300 and the exact address for %s',
    (ip) => {
      const records = buildDdnsRecords(ip);

      expect(records.map((r) => r.name)).toEqual(['@', '*']);
      for (const r of records) {
        expect(r.type).toBe('A');
        expect(r.ttl).toBe(DDNS_TTL);
        expect(r.content).toBe(ip);
        expect(r.priority).toBeUndefined();
      }
    }
  );

  it('passes the address through unvalidated', () => {
    expect(buildDdnsRecords('not-an-ip')[0]!.content).toBe('not-an-ip');
  });
});
