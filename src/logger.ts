/**
 * Logger - coloured console output plus a plain-text log file
 */

import chalk from 'chalk';
import { accessSync, appendFileSync, constants, mkdirSync } from 'fs';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { errorMessage } from './errors.js';

export const LOG_NAME = 'bsky-promo-tweeter';
export const LOG_FILE_NAME = `${LOG_NAME}.log`;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  /** Info-level, shown in green */
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Path of the file sink, if any */
  readonly logFile?: string;
}

export interface LoggerOptions {
  name?: string;
  /** Log file path, or false for console only */
  logFile?: string | false;
  verbose?: boolean;
  console?: Pick<Console, 'log' | 'warn' | 'error'>;
  now?: () => Date;
}

function isWritable(dir: string): boolean {
  try {
    accessSync(dir, constants.W_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Where logs go when no logFile is configured
 */
export function defaultLogDir(
  platform: NodeJS.Platform = process.platform,
  home: string = homedir(),
  canWrite: (dir: string) => boolean = isWritable
): string {
  if (platform === 'darwin') {
    return join(home, 'Library', 'Logs');
  }
  if (platform === 'linux') {
    return canWrite('/var/log') ? '/var/log' : join(home, '.local', 'share', 'logs');
  }
  return join(home, 'logs');
}

export function resolveLogFile(logFile: string | false | undefined): string | undefined {
  if (logFile === false) return undefined;
  return logFile ?? join(defaultLogDir(), LOG_FILE_NAME);
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

/** `YYYY-MM-DD HH:MM:SS,mmm - name - LEVEL - message`, local time */
export function formatLogLine(level: LogLevel, message: string, name: string, date: Date): string {
  const stamp =
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())},${pad(date.getMilliseconds(), 3)}`;
  return `${stamp} - ${name} - ${LEVEL_LABELS[level]} - ${message}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const name = options.name ?? LOG_NAME;
  const out = options.console ?? console;
  const now = options.now ?? (() => new Date());
  let logFile = options.logFile === false ? undefined : options.logFile;

  if (logFile) {
    try {
      mkdirSync(dirname(logFile), { recursive: true });
    } catch (err) {
      out.warn(chalk.yellow(`⚠ Cannot create log directory for ${logFile}: ${errorMessage(err)}`));
      logFile = undefined;
    }
  }

  const writeFile = (level: LogLevel, message: string) => {
    if (!logFile) return;
    try {
      appendFileSync(logFile, formatLogLine(level, message, name, now()) + '\n');
    } catch (err) {
      out.warn(chalk.yellow(`⚠ Cannot write log file ${logFile}: ${errorMessage(err)}`));
      logFile = undefined;
    }
  };

  return {
    get logFile() {
      return logFile;
    },
    debug(message) {
      if (!options.verbose) return;
      out.log(chalk.gray(message));
      writeFile('debug', message);
    },
    info(message) {
      out.log(message);
      writeFile('info', message);
    },
    success(message) {
      out.log(chalk.green(message));
      writeFile('info', message);
    },
    warn(message) {
      out.warn(chalk.yellow(message));
      writeFile('warn', message);
    },
    error(message) {
      out.error(chalk.red(message));
      writeFile('error', message);
    },
  };
}
