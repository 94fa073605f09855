export { updateAllDomains } from './run.js';
export { updateDomainRecords } from './update.js';
export { buildDdnsRecords } from './records.js';
export { loadConfig } from './config.js';
export { createLogger } from './logger.js';
export {
  DdnsError,
  UsageError,
  ConfigError,
  TransportError,
  DecodeError,
  ApiError,
} from './errors.js';
export {
  PORKBUN_API,
  DDNS_TTL,
  APEX_NAME,
  WILDCARD_NAME,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
} from './constants.js';
export type { DnsProvider } from './provider.js';
export type { DdnsConfig } from './config.js';
export type { RunOptions } from './run.js';
export type { UpdateOptions } from './update.js';
export type {
  PorkbunCredentials,
  DnsRecordType,
  DnsRecordInput,
  DomainUpdateResult,
  DomainOutcome,
  RunSummary,
} from './types.js';
