import { z } from 'zod/v4';
import {
  DEFAULT_TIMEOUT_MS,
  PORKBUN_API,
  PORKBUN_SUCCESS,
} from '../constants.js';
import {
  ApiError,
  ConfigError,
  DecodeError,
  TransportError,
  toError,
} from '../errors.js';
import type { DnsProvider } from '../provider.js';
import type { DnsRecordInput, PorkbunCredentials } from '../types.js';

export interface PorkbunRequestOptions {
  /** Defaults to the public v3 JSON API */
  baseUrl?: string;
  /** Abort a request after this many milliseconds */
  timeoutMs?: number;
}

export interface PorkbunOptions extends PorkbunCredentials, PorkbunRequestOptions {}

// Every response carries this; the rest depends on the endpoint.
const EnvelopeSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
});

const DomainListSchema = z.object({
  domains: z.array(z.object({ domain: z.string() })).optional(),
});

const RecordListSchema = z.object({
  records: z
    .array(
      z.object({
        id: z.union([z.string(), z.number()]).transform(String),
      })
    )
    .optional(),
});

const StatusOnlySchema = z.object({});

type RequestFields = Record<string, string | number>;

function assertCredentials(credentials: PorkbunCredentials): void {
  if (!credentials.apiKey) {
    throw new ConfigError('Porkbun: apiKey is required');
  }
  if (!credentials.secretKey) {
    throw new ConfigError('Porkbun: secretKey is required');
  }
}

async function porkbunPost<S extends z.ZodType>(
  credentials: PorkbunCredentials,
  path: string,
  schema: S,
  options: PorkbunRequestOptions,
  fields: RequestFields = {}
): Promise<z.output<S>> {
  const headers = new Headers();
  headers.set('Content-Type', 'application/json');

  const body = JSON.stringify({
    apikey: credentials.apiKey,
    secretkey: credentials.secretKey,
    ...fields,
  });

  let res: Response;
  let text: string;
  try {
    res = await fetch(`${options.baseUrl ?? PORKBUN_API}${path}`, {
      method: 'POST',
      headers,
      body,
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    text = await res.text();
  } catch (err) {
    throw new TransportError(
      `Porkbun request to ${path} failed: ${toError(err).message}`,
      { cause: err }
    );
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    throw new DecodeError(
      `Porkbun returned non-JSON response for ${path} (HTTP ${res.status})`,
      { cause: err }
    );
  }

  const envelope = EnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    throw new DecodeError(
      `Porkbun response for ${path} has no status (HTTP ${res.status})`,
      { cause: envelope.error }
    );
  }

  // The HTTP status is not trusted: Porkbun reports failures in the envelope.
  if (envelope.data.status !== PORKBUN_SUCCESS) {
    throw new ApiError(envelope.data.message ?? 'unknown error', {
      status: envelope.data.status,
      httpStatus: res.status,
      path,
    });
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    throw new DecodeError(
      `Unexpected Porkbun response for ${path}: ${z.prettifyError(parsed.error)}`,
      { cause: parsed.error }
    );
  }

  return parsed.data;
}

/**
 * List every domain on the account, in the order Porkbun returns them.
 *
 * An account with no domains yields an empty list.
 */
export async function listPorkbunDomains(
  credentials: PorkbunCredentials,
  options: PorkbunRequestOptions = {}
): Promise<string[]> {
  assertCredentials(credentials);

  const data = await porkbunPost(
    credentials,
    '/domains/retrieve',
    DomainListSchema,
    options
  );

  return (data.domains ?? []).map((d) => d.domain);
}

/**
 * List the IDs of all DNS records on a domain (every type, not only A).
 */
export async function listPorkbunRecordIds(
  domain: string,
  credentials: PorkbunCredentials,
  options: PorkbunRequestOptions = {}
): Promise<string[]> {
  assertCredentials(credentials);

  const data = await porkbunPost(
    credentials,
    `/dns/retrieve/${encodeURIComponent(domain)}`,
    RecordListSchema,
    options
  );

  return (data.records ?? []).map((r) => r.id);
}

export async function deletePorkbunRecord(
  domain: string,
  id: string,
  credentials: PorkbunCredentials,
  options: PorkbunRequestOptions = {}
): Promise<void> {
  assertCredentials(credentials);

  await porkbunPost(
    credentials,
    `/dns/delete/${encodeURIComponent(domain)}/${encodeURIComponent(id)}`,
    StatusOnlySchema,
    options
  );
}

export async function createPorkbunRecord(
  domain: string,
  record: DnsRecordInput,
  credentials: PorkbunCredentials,
  options: PorkbunRequestOptions = {}
): Promise<void> {
  assertCredentials(credentials);

  const fields: RequestFields = {
    name: record.name,
    type: record.type,
    content: record.content,
    ttl: record.ttl,
  };
  if (record.priority !== undefined) {
    fields.prio = record.priority;
  }

  await porkbunPost(
    credentials,
    `/dns/create/${encodeURIComponent(domain)}`,
    StatusOnlySchema,
    options,
    fields
  );
}

/**
 * Create a Porkbun DNS provider adapter.
 *
 * Uses the Porkbun JSON API v3 with native `fetch` (Node 18+). The
 * credentials are validated up front so a bad configuration fails before
 * any request is sent.
 */
export function porkbun(options: PorkbunOptions): DnsProvider {
  const { apiKey, secretKey, ...requestOptions } = options;
  const credentials: PorkbunCredentials = { apiKey, secretKey };

  assertCredentials(credentials);

  return {
    listDomains() {
      return listPorkbunDomains(credentials, requestOptions);
    },

    listRecordIds(domain: string) {
      return listPorkbunRecordIds(domain, credentials, requestOptions);
    },

    deleteRecord(domain: string, id: string) {
      return deletePorkbunRecord(domain, id, credentials, requestOptions);
    },

    createRecord(domain: string, record: DnsRecordInput) {
      return createPorkbunRecord(domain, record, credentials, requestOptions);
    },
  };
}
