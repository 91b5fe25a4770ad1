/**
 * Configuration loading
 *
 * Precedence: command-line flags > config file > built-in defaults.
 * The config file is INI (`zurg-monitor.conf`, `[zurg]` section) or YAML
 * (`zurg-monitor.yml`, top-level `zurg:` key); the first file found in the
 * search order is used.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { extname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseIni } from 'ini';
import { parse as parseYaml } from 'yaml';
import {
  CONFIG_DEFAULTS,
  configFileSchema,
  monitorConfigSchema,
  type ConfigFileSection,
  type MonitorConfig,
  type MonitorConfigInput,
} from '@zurgmon/shared';
import { ConfigurationError, describeError } from '../utils/errors.js';

/**
 * Options as parsed from the command line. Absent flags are undefined.
 */
export interface CliOptions {
  config?: string;
  zurgUrl?: string;
  username?: string;
  password?: string;
  checkInterval?: number;
  logFile?: string;
  runOnce?: boolean;
  verbose?: boolean;
  trace?: boolean;
  debug?: boolean;
  dryRun?: boolean;
  rateLimit?: number;
  rateLimitDelay?: number;
  rateLimitBackoff?: number;
}

export interface ConfigSources {
  cwd?: string;
  homeDir?: string;
  exists?: (path: string) => boolean;
  readFile?: (path: string) => string;
}

export interface LoadedConfig {
  config: MonitorConfig;
  /** Config file that was applied, or null when only defaults and flags were used */
  source: string | null;
}

/** `logs/zurg-monitor.log` inside the package directory */
export const DEFAULT_LOG_FILE = fileURLToPath(
  new URL(`../../logs/${CONFIG_DEFAULTS.LOG_FILE_NAME}`, import.meta.url)
);

export function defaultSearchPaths(cwd: string, homeDir: string): string[] {
  const directories = [
    resolve(cwd),
    join(homeDir, '.config', 'zurg-monitor'),
    join('/etc', 'zurg-monitor'),
  ];
  return directories.flatMap((directory) =>
    CONFIG_DEFAULTS.CONFIG_FILE_NAMES.map((name) => join(directory, name))
  );
}

export type ConfigFormat = 'ini' | 'yaml';

/**
 * `.yml` and `.yaml` files are YAML, anything else is INI
 */
export function configFormat(path: string): ConfigFormat {
  const extension = extname(path).toLowerCase();
  return extension === '.yml' || extension === '.yaml' ? 'yaml' : 'ini';
}

/**
 * Pick the config file to load. An explicitly requested file must exist.
 */
export function findConfigFile(
  explicit: string | undefined,
  searchPaths: readonly string[],
  exists: (path: string) => boolean
): string | null {
  if (explicit !== undefined) {
    if (!exists(explicit)) {
      throw ConfigurationError.unreadable(explicit, 'file not found');
    }
    return explicit;
  }
  return searchPaths.find((path) => exists(path)) ?? null;
}

/**
 * Parse and validate the `zurg:` section of a config file
 */
export function parseConfigFile(path: string, content: string): ConfigFileSection {
  let document: unknown;
  try {
    document = configFormat(path) === 'yaml' ? parseYaml(content) : parseIni(content);
  } catch (error) {
    throw ConfigurationError.unreadable(path, describeError(error));
  }

  const result = configFileSchema.safeParse(document ?? {});
  if (!result.success) {
    throw ConfigurationError.fromZodError(result.error, `configuration file ${path}`);
  }
  return result.data.zurg ?? {};
}

/**
 * Merge defaults, the config file and command-line flags into a validated config
 */
export function mergeConfig(file: ConfigFileSection, cli: CliOptions): MonitorConfig {
  const input: MonitorConfigInput = {
    zurgUrl: cli.zurgUrl ?? file.zurg_url ?? CONFIG_DEFAULTS.ZURG_URL,
    username: cli.username ?? file.username ?? '',
    password: cli.password ?? file.password ?? '',
    checkIntervalMinutes:
      cli.checkInterval ?? file.check_interval ?? CONFIG_DEFAULTS.CHECK_INTERVAL_MINUTES,
    logFile: cli.logFile ?? file.log_file ?? DEFAULT_LOG_FILE,
    rateLimitRequests: cli.rateLimit ?? file.rate_limit ?? CONFIG_DEFAULTS.RATE_LIMIT_REQUESTS,
    rateLimitDelaySeconds:
      cli.rateLimitDelay ?? file.rate_limit_delay ?? CONFIG_DEFAULTS.RATE_LIMIT_DELAY_SECONDS,
    rateLimitBackoffSeconds:
      cli.rateLimitBackoff ?? file.rate_limit_backoff ?? CONFIG_DEFAULTS.RATE_LIMIT_BACKOFF_SECONDS,
    verbose: cli.verbose === true || file.verbose === true,
    debug: cli.debug === true,
    trace: cli.trace === true,
    dryRun: cli.dryRun === true,
  };

  const result = monitorConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Resolve the runtime configuration
 *
 * @throws ConfigurationError when the config file is missing, unreadable or invalid,
 * or when the merged values fail validation
 */
export function loadConfig(cli: CliOptions, sources: ConfigSources = {}): LoadedConfig {
  const {
    cwd = process.cwd(),
    homeDir = homedir(),
    exists = existsSync,
    readFile = (path: string) => readFileSync(path, 'utf8'),
  } = sources;

  const source = findConfigFile(cli.config, defaultSearchPaths(cwd, homeDir), exists);

  let file: ConfigFileSection = {};
  if (source !== null) {
    let content: string;
    try {
      content = readFile(source);
    } catch (error) {
      throw ConfigurationError.unreadable(source, describeError(error));
    }
    file = parseConfigFile(source, content);
  }

  return { config: mergeConfig(file, cli), source };
}
