export class DdnsError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DdnsError';
    this.code = code;
  }
}

/** Bad command-line input */
export class UsageError extends DdnsError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR');
    this.name = 'UsageError';
  }
}

/** Missing or invalid configuration */
export class ConfigError extends DdnsError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** The request never produced a response body (network failure, timeout) */
export class TransportError extends DdnsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
  }
}

/** The response body is not the JSON we expect */
export class DecodeError extends DdnsError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'DECODE_ERROR', options);
    this.name = 'DecodeError';
  }
}

export interface ApiErrorDetails {
  status: string;
  httpStatus: number;
  path: string;
}

/** A well-formed response whose status is not SUCCESS */
export class ApiError extends DdnsError {
  /** The provider's `message`, verbatim */
  public readonly providerMessage: string;
  public readonly status: string;
  public readonly httpStatus: number;
  public readonly path: string;

  constructor(providerMessage: string, details: ApiErrorDetails) {
    super(`Porkbun API error: ${providerMessage}`, 'API_ERROR');
    this.name = 'ApiError';
    this.providerMessage = providerMessage;
    this.status = details.status;
    this.httpStatus = details.httpStatus;
    this.path = details.path;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
