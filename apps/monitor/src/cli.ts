/**
 * Zurg Monitor CLI
 * Parses flags, resolves configuration and runs the scheduler
 */

import { dirname } from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { APP_INFO, type MonitorConfig } from '@zurgmon/shared';
import { loadConfig, type CliOptions, type ConfigSources, type LoadedConfig } from './config/loader.js';
import { MonitorScheduler, MonitorStatsTracker, EXIT_CODES, type ExitCode } from './jobs/monitor/index.js';
import { ZurgClient } from './services/zurg/client.js';
import { RateLimiter } from './services/zurg/rateLimiter.js';
import type { IZurgClient } from './services/zurg/types.js';
import { AppError } from './utils/errors.js';
import { createLogger, type LoggerOptions, type MonitorLogger } from './utils/logger.js';
import { applyProcessIdentity } from './utils/permissions.js';

// =============================================================================
// Argument Parsing
// =============================================================================

export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return parsed;
}

export function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

export function createProgram(): Command {
  return new Command()
    .name('zurg-monitor')
    .description(`${APP_INFO.NAME} v${APP_INFO.VERSION}`)
    .version(`${APP_INFO.NAME} v${APP_INFO.VERSION}`, '--version')
    .option('-c, --config <path>', 'Path to configuration file (default: search standard locations)')
    .option('-u, --zurg-url <url>', 'Zurg URL (default: http://localhost:9999)')
    .option('--username <username>', 'Username for authentication')
    .option('--password <password>', 'Password for authentication')
    .option('-i, --check-interval <minutes>', 'Check interval in minutes (default: 30)', parseInteger)
    .option('-l, --log-file <path>', 'Log file path (default: ./logs/zurg-monitor.log)')
    .option('--run-once', 'Run a single check and exit')
    .option('-v, --verbose', 'Enable verbose logging (show INFO messages)')
    .option('-t, --trace', 'Enable trace logging (very verbose)')
    .option('-d, --debug', 'Enable debug logging')
    .option('--dry-run', 'Show what would be done without triggering repairs')
    .option('-r, --rate-limit <requests>', 'Number of requests before backing off (default: 10)', parseInteger)
    .option('--rate-limit-delay <seconds>', 'Delay between requests in seconds (default: 0.5)', parseDecimal)
    .option('--rate-limit-backoff <seconds>', 'Backoff after the rate limit is reached (default: 5)', parseDecimal)
    .addHelpText(
      'after',
      `
Examples:
  # Run once with default config
  $ zurg-monitor --run-once

  # Run continuously with custom interval
  $ zurg-monitor --check-interval 60

  # Dry run to see what would happen
  $ zurg-monitor --run-once --dry-run`
    )
    .configureOutput({
      writeErr: (str) => process.stderr.write(chalk.red(str)),
    });
}

// =============================================================================
// Run
// =============================================================================

export interface RunDependencies {
  env?: NodeJS.ProcessEnv;
  sources?: ConfigSources;
  /** Ends a continuous run; without it SIGINT/SIGTERM are wired up */
  signal?: AbortSignal;
  createLogger?: (options: LoggerOptions) => MonitorLogger;
  createClient?: (config: MonitorConfig, logger: MonitorLogger) => IZurgClient;
  writeError?: (text: string) => void;
}

function defaultClient(config: MonitorConfig, logger: MonitorLogger): IZurgClient {
  const limiter = new RateLimiter({
    maxRequests: config.rateLimitRequests,
    delaySeconds: config.rateLimitDelaySeconds,
    backoffSeconds: config.rateLimitBackoffSeconds,
    logger: logger.child({ component: 'rate-limiter' }),
  });
  return new ZurgClient(
    { url: config.zurgUrl, username: config.username, password: config.password },
    limiter,
    logger
  );
}

function shutdownSignal(): AbortSignal {
  const controller = new AbortController();
  const abort = (): void => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);
  return controller.signal;
}

/**
 * Run the monitor with parsed flags
 *
 * @returns process exit code: 1 for configuration errors or an unreachable Zurg
 */
export async function runMonitor(options: CliOptions, deps: RunDependencies = {}): Promise<ExitCode> {
  const writeError = deps.writeError ?? ((text: string) => process.stderr.write(text));

  let loaded: LoadedConfig;
  try {
    loaded = loadConfig(options, deps.sources);
  } catch (error) {
    if (error instanceof AppError) {
      writeError(chalk.red(`Error: ${error.message}\n`));
      return EXIT_CODES.FAILURE;
    }
    throw error;
  }
  const { config, source } = loaded;

  const logger = (deps.createLogger ?? createLogger)(config);
  logger.info(
    source ? `Loading configuration from: ${source}` : 'No configuration file found, using defaults'
  );

  applyProcessIdentity(deps.env ?? process.env, dirname(config.logFile), logger);

  const scheduler = new MonitorScheduler({
    client: (deps.createClient ?? defaultClient)(config, logger),
    tracker: new MonitorStatsTracker(),
    logger,
    settings: config,
  });

  if (options.runOnce) {
    return scheduler.runOnce();
  }
  return scheduler.runContinuous(deps.signal ?? shutdownSignal());
}

/**
 * Parse argv and run
 */
export async function main(argv: readonly string[]): Promise<ExitCode> {
  const program = createProgram();
  await program.parseAsync(argv);
  return runMonitor(program.opts<CliOptions>());
}
