import {
  Command,
  CommanderError,
  InvalidArgumentError,
  type OutputConfiguration,
} from 'commander';
import type { Logger } from 'pino';
import { loadConfig } from './config.js';
import { MAX_TIMEOUT_MS } from './constants.js';
import { UsageError, toError } from './errors.js';
import { createLogger } from './logger.js';
import { porkbun } from './providers/porkbun.js';
import { updateAllDomains } from './run.js';

export interface CliOptions {
  dryRun?: boolean;
  timeout?: number;
}

export interface MainDeps {
  /** Defaults to `process.env` */
  env?: NodeJS.ProcessEnv;
  /** Defaults to a logger at `LOG_LEVEL` writing to stdout */
  logger?: Logger;
  /** Where commander writes usage and help */
  output?: OutputConfiguration;
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0 || ms > MAX_TIMEOUT_MS) {
    throw new InvalidArgumentError(
      `Must be a positive integer of at most ${MAX_TIMEOUT_MS} (milliseconds).`
    );
  }
  return ms;
}

/**
 * Run the updater once and resolve with the process exit code.
 *
 * 0 once every domain has been visited, even if some failed; 1 on a usage
 * error, a configuration error or a failure to list domains.
 */
export async function main(argv: string[], deps: MainDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const logger = deps.logger ?? createLogger({ level: env.LOG_LEVEL });

  const program = new Command()
    .name('porkbun-ddns')
    .description(
      'Point the apex and wildcard A records of every domain on a Porkbun account at an IP address.\n' +
        'All existing records on each domain are deleted first, whatever their type.'
    )
    .version('1.0.0')
    .argument('<ip>', 'IPv4 address to publish')
    .option('-d, --dry-run', 'list what would change without deleting or creating records')
    .option('-t, --timeout <ms>', 'per-request timeout in milliseconds', parseTimeout)
    .allowExcessArguments(false)
    .showHelpAfterError()
    .exitOverride();

  if (deps.output) {
    program.configureOutput(deps.output);
  }

  program.action(async (ip: string, options: CliOptions) => {
    if (!ip) {
      throw new UsageError('IP address must not be empty');
    }

    const config = loadConfig(env);
    const provider = porkbun({
      ...config.credentials,
      baseUrl: config.baseUrl,
      timeoutMs: options.timeout ?? config.timeoutMs,
    });

    const summary = await updateAllDomains(ip, provider, {
      logger,
      dryRun: options.dryRun ?? false,
    });

    logger.info(
      { ip, updated: summary.updated, failed: summary.failed },
      'Run complete'
    );
  });

  try {
    await program.parseAsync(argv);
    return 0;
  } catch (err) {
    // commander has already printed the problem (or the help text)
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    const error = toError(err);
    logger.fatal({ err: error }, error.message);
    return 1;
  }
}
