import { z } from 'zod/v4';
import { DEFAULT_TIMEOUT_MS, MAX_TIMEOUT_MS, PORKBUN_API } from './constants.js';
import { ConfigError } from './errors.js';
import type { PorkbunCredentials } from './types.js';

export interface DdnsConfig {
  credentials: PorkbunCredentials;
  baseUrl: string;
  timeoutMs: number;
}

const MISSING_CREDENTIALS =
  'PORKBUN_API_KEY and PORKBUN_SECRET_KEY environment variables must be set';

const CREDENTIAL_VARS = new Set(['PORKBUN_API_KEY', 'PORKBUN_SECRET_KEY']);

// A `KEY=` line in .env arrives as an empty string
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const EnvSchema = z.object({
  PORKBUN_API_KEY: z.string().min(1),
  PORKBUN_SECRET_KEY: z.string().min(1),
  PORKBUN_API_URL: z.preprocess(blankAsUnset, z.url().optional()),
  PORKBUN_TIMEOUT_MS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().positive().max(MAX_TIMEOUT_MS).optional()
  ),
});

/**
 * Read configuration from environment variables.
 *
 * Credentials are kept verbatim (no trimming); a trailing slash on the
 * base URL is dropped.
 */
export function loadConfig(env: NodeJS.ProcessEnv): DdnsConfig {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const issue = result.error.issues[0];
    const variable = String(issue?.path[0] ?? '');
    if (CREDENTIAL_VARS.has(variable)) {
      throw new ConfigError(MISSING_CREDENTIALS);
    }
    throw new ConfigError(`Invalid ${variable}: ${issue?.message ?? 'invalid value'}`);
  }

  const { data } = result;
  return {
    credentials: {
      apiKey: data.PORKBUN_API_KEY,
      secretKey: data.PORKBUN_SECRET_KEY,
    },
    baseUrl: (data.PORKBUN_API_URL ?? PORKBUN_API).replace(/\/+$/, ''),
    timeoutMs: data.PORKBUN_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };
}
