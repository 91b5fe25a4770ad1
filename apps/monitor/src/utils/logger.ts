/**
 * Logger Module
 *
 * Structured logging using pino with two sinks:
 * - the configured log file (rotating-file-stream) that always receives everything;
 *   it is rotated at 10 MB into numbered backups beside it (`.1` newest)
 * - a console view (pino-pretty) filtered by the configured verbosity
 *
 * Two custom levels sit between info and warn: `success` for positive outcomes
 * and `output` for report lines. Both pass the default console filter.
 */

import pino, { type DestinationStream, type Level, type Logger as PinoLogger } from 'pino';
import { createStream, type RotatingFileStream } from 'rotating-file-stream';
import { mkdirSync } from 'node:fs';
import { basename, dirname, sep } from 'node:path';
import { LOG_ROTATION } from '@zurgmon/shared';

export type MonitorLogLevel = 'success' | 'output';

export type MonitorLogger = PinoLogger<MonitorLogLevel>;

export const CUSTOM_LEVELS: Record<MonitorLogLevel, number> = {
  success: 35,
  output: 36,
};

export interface VerbosityFlags {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

export interface LoggerOptions extends VerbosityFlags {
  /** Path of the live log file; rotated backups are `<logFile>.1` to `<logFile>.10` */
  logFile: string;
  /** Console destination, pino-pretty on stdout when omitted */
  consoleStream?: DestinationStream;
}

/**
 * Resolve the console level from the verbosity flags.
 * Without flags only success, warn, output and error reach the console.
 */
export function resolveConsoleLevel(flags: VerbosityFlags): Level | MonitorLogLevel {
  if (flags.trace) return 'trace';
  if (flags.debug) return 'debug';
  if (flags.verbose) return 'info';
  return 'success';
}

/**
 * Name generator for the live log file and its numbered backups
 *
 * @example
 * const names = logFileNames('zurg-monitor.log');
 * names(0); // 'zurg-monitor.log'
 * names(2); // 'zurg-monitor.log.2'
 */
export function logFileNames(name: string): (time: number | Date, index?: number) => string {
  return (time, index) => {
    const backup = typeof time === 'number' ? time : (index ?? 0);
    return backup > 0 ? `${name}.${backup}` : name;
  };
}

/**
 * Open the log file for appending, rotating it by size
 */
export function createLogFileStream(logFile: string): RotatingFileStream {
  mkdirSync(dirname(logFile), { recursive: true });

  const stream = createStream(logFileNames(basename(logFile)), {
    path: `${dirname(logFile)}${sep}`,
    size: LOG_ROTATION.MAX_FILE_SIZE,
    rotate: LOG_ROTATION.MAX_FILES,
  });
  stream.on('error', (error: Error) => {
    process.stderr.write(`Cannot write log file ${logFile}: ${error.message}\n`);
  });
  return stream;
}

/**
 * pino-pretty options for the console view
 */
export function prettyOptions() {
  return {
    colorize: true,
    translateTime: 'SYS:yyyy-mm-dd HH:MM:ss',
    ignore: 'pid,hostname,name,component',
    customLevels: 'success:35,output:36',
    customColors: 'success:green,output:magenta',
    useOnlyCustomProps: false,
  };
}

/**
 * Create the process logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ logFile: './logs/zurg-monitor.log', verbose: true });
 * logger.success('Successfully connected to Zurg');
 * logger.child({ component: 'client' }).error({ url }, 'Request failed');
 * ```
 */
export function createLogger(options: LoggerOptions): MonitorLogger {
  const consoleStream =
    options.consoleStream ?? pino.transport({ target: 'pino-pretty', options: prettyOptions() });

  const streams = pino.multistream(
    [
      { level: 'trace', stream: createLogFileStream(options.logFile) },
      { level: resolveConsoleLevel(options), stream: consoleStream },
    ],
    { levels: { ...pino.levels.values, ...CUSTOM_LEVELS } }
  );

  return pino<MonitorLogLevel>(
    {
      name: 'zurg-monitor',
      level: 'trace',
      customLevels: CUSTOM_LEVELS,
    },
    streams
  );
}
