/**
 * Diagnostics logger for the devdeck runtime.
 *
 * Lines are appended to `<project>/.devdeck/logs/devdeck.log` as
 * `[YYYY-MM-DD HH:MM:SS] LEVEL [SCOPE] message`. Once the file fails to
 * accept a write, lines go to stderr instead.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';

import { TOOL_DIRECTORY } from '../constants.js';
import { errorMessage } from './errno.js';
import { formatTimestamp } from './time.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(scope: string, message: string): void;
  info(scope: string, message: string): void;
  warn(scope: string, message: string): void;
  error(scope: string, message: string): void;
}

export type FallbackWriter = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  /** Log file; null sends everything to the fallback writer. */
  filePath: string | null;
  level?: LogLevel;
  fallback?: FallbackWriter;
  now?: () => Date;
}

const LEVEL_COLORS: Record<LogLevel, (value: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

function writeToStderr(line: string, level: LogLevel): void {
  console.error(LEVEL_COLORS[level](line));
}

export function diagnosticsLogPath(projectDir: string): string {
  return path.join(projectDir, TOOL_DIRECTORY, 'logs', 'devdeck.log');
}

export function formatLogLine(level: LogLevel, scope: string, message: string, date: Date): string {
  return `[${formatTimestamp(date)}] ${level.toUpperCase()} [${scope}] ${message}`;
}

export function createLogger({
  filePath,
  level = 'info',
  fallback = writeToStderr,
  now = () => new Date(),
}: LoggerOptions): Logger {
  let fileUsable = filePath !== null;
  let directoryReady = false;

  const append = (line: string, lineLevel: LogLevel): void => {
    if (fileUsable && filePath !== null) {
      try {
        if (!directoryReady) {
          fs.mkdirSync(path.dirname(filePath), { recursive: true });
          directoryReady = true;
        }
        fs.appendFileSync(filePath, `${line}\n`, { encoding: 'utf8' });
        return;
      } catch (err) {
        fileUsable = false;
        const reason = errorMessage(err);
        fallback(`Warning: Failed to write ${filePath}: ${reason}`, 'warn');
      }
    }
    fallback(line, lineLevel);
  };

  const log = (lineLevel: LogLevel, scope: string, message: string): void => {
    if (LEVEL_ORDER[lineLevel] < LEVEL_ORDER[level]) {
      return;
    }
    append(formatLogLine(lineLevel, scope, message, now()), lineLevel);
  };

  return {
    debug: (scope, message) => log('debug', scope, message),
    info: (scope, message) => log('info', scope, message),
    warn: (scope, message) => log('warn', scope, message),
    error: (scope, message) => log('error', scope, message),
  };
}

export default {
  createLogger,
  diagnosticsLogPath,
  formatLogLine,
};
