import {
  pino,
  type DestinationStream,
  type Logger,
  type LoggerOptions,
} from 'pino';

export interface LoggerConfig {
  /** pino level name; unknown values fall back to `info` */
  level?: string;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

// Credential fields as they appear in request bodies and in our own types
const REDACTED_FIELDS = ['apikey', 'secretkey', 'apiKey', 'secretKey'];

const redactPaths = REDACTED_FIELDS.flatMap((field) => [field, `*.${field}`]);

const LEVELS: readonly string[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function resolveLevel(level: string | undefined): string {
  return level !== undefined && LEVELS.includes(level) ? level : 'info';
}

/**
 * Create the structured JSON logger used for a run.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: resolveLevel(config.level),
    base: { service: 'porkbun-ddns' },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
  };

  return config.destination
    ? pino(options, config.destination)
    : pino(options);
}
