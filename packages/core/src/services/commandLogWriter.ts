import * as path from 'node:path';
import type { Dirent } from 'node:fs';
import * as fsp from 'node:fs/promises';

import { DEFAULT_LOG_RETENTION, TOOL_DIRECTORY } from '../constants.js';
import type { CommandCategory, CommandResult } from '../contracts/command.js';
import { errorCode } from '../utils/errno.js';
import { formatFileStamp, formatTimestamp } from '../utils/time.js';
import { categoryLogDirectory } from './commandCategorizer.js';
import { stripCdPrefix } from './commandPolicy/shellCommand.js';

const LOG_EXTENSION = '.log';
const MAX_SLUG_LENGTH = 40;
const MAX_NAME_ATTEMPTS = 100;

export interface CommandLogOptions {
  /** Directory shown in the log header; defaults to the project directory. */
  workingDir?: string;
  /** Files kept per category after the write. */
  keep?: number;
  now?: () => Date;
}

export interface CommandLogFile {
  path: string;
  filename: string;
  category: string;
  modifiedAt: Date;
}

export function commandLogRoot(projectDir: string): string {
  return path.join(projectDir, TOOL_DIRECTORY, 'logs', 'commands');
}

/**
 * Short file-name fragment: the second word of the command (the first when
 * there is only one), limited to letters, digits and dashes.
 */
export function commandLogSlug(commandText: string): string {
  const parts = stripCdPrefix(commandText).trim().split(/\s+/).filter(Boolean);
  const source = parts.length >= 2 ? parts[1] : parts[0];
  const slug = (source ?? '').replace(/[^A-Za-z0-9-]/g, '').slice(0, MAX_SLUG_LENGTH);
  return slug || 'cmd';
}

export function formatCommandLog(result: CommandResult, workingDir: string, writtenAt: Date): string {
  const lines = [
    `Command: ${result.commandDisplay}`,
    `Timestamp: ${formatTimestamp(writtenAt)}`,
    `Exit Code: ${result.exitCode}`,
    `Working Directory: ${workingDir}`,
  ];
  if (result.spawnError) {
    lines.push(`Error: ${result.spawnError}`);
  }

  let content = `${lines.join('\n')}\n`;
  if (!result.success) {
    content += `\n--- STDOUT ---\n${result.stdout}\n--- STDERR ---\n${result.stderr}`;
  }
  return content;
}

async function writeExclusive(dir: string, baseName: string, content: string): Promise<string> {
  for (let attempt = 1; attempt <= MAX_NAME_ATTEMPTS; attempt += 1) {
    const suffix = attempt === 1 ? '' : `-${attempt}`;
    const target = path.join(dir, `${baseName}${suffix}${LOG_EXTENSION}`);
    try {
      await fsp.writeFile(target, content, { encoding: 'utf8', flag: 'wx' });
      return target;
    } catch (error) {
      if (errorCode(error) === 'EEXIST') {
        continue;
      }
      throw error;
    }
  }

  throw new Error(`Could not find a free log file name for ${baseName} in ${dir}`);
}

async function listCategoryLogs(dir: string, category: string): Promise<CommandLogFile[]> {
  let names: string[];
  try {
    names = await fsp.readdir(dir);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const logs: CommandLogFile[] = [];
  for (const filename of names) {
    if (!filename.endsWith(LOG_EXTENSION)) {
      continue;
    }
    const filePath = path.join(dir, filename);
    try {
      const stats = await fsp.stat(filePath);
      if (stats.isFile()) {
        logs.push({ path: filePath, filename, category, modifiedAt: stats.mtime });
      }
    } catch (error) {
      // Removed between readdir and stat.
      if (errorCode(error) !== 'ENOENT') {
        throw error;
      }
    }
  }

  return logs;
}

const COLLISION_SUFFIX = /^(.+)-(\d+)$/;

// `<stamp>-<slug>.log` is the first write of a second, `<stamp>-<slug>-N.log` the Nth.
function parseLogName(filename: string): { base: string; sequence: number } {
  const stem = filename.slice(0, -LOG_EXTENSION.length);
  const match = COLLISION_SUFFIX.exec(stem);
  if (match?.[1] !== undefined && match[2] !== undefined) {
    return { base: match[1], sequence: Number.parseInt(match[2], 10) };
  }
  return { base: stem, sequence: 1 };
}

// Newest first; file names carry the timestamp and write sequence, so they break mtime ties.
function compareNewestFirst(a: CommandLogFile, b: CommandLogFile): number {
  const delta = b.modifiedAt.getTime() - a.modifiedAt.getTime();
  if (delta !== 0) {
    return delta;
  }

  const left = parseLogName(a.filename);
  const right = parseLogName(b.filename);
  if (left.base === right.base) {
    return right.sequence - left.sequence;
  }
  return left.base < right.base ? 1 : -1;
}

/**
 * Deletes every `.log` file in the category beyond the newest `keep`.
 * @returns Paths that were removed.
 */
export async function pruneCategoryLogs(
  projectDir: string,
  category: CommandCategory | string,
  keep: number = DEFAULT_LOG_RETENTION,
): Promise<string[]> {
  const categoryName = categoryLogDirectory(category);
  const dir = path.join(commandLogRoot(projectDir), categoryName);
  const logs = await listCategoryLogs(dir, categoryName);
  logs.sort(compareNewestFirst);

  const removed: string[] = [];
  for (const log of logs.slice(Math.max(0, keep))) {
    await fsp.rm(log.path, { force: true });
    removed.push(log.path);
  }
  return removed;
}

/**
 * Writes one log file for `result` under its category directory and applies
 * retention to that directory.
 * @returns Path of the new log file.
 */
export async function writeCommandLog(
  projectDir: string,
  category: CommandCategory | string,
  result: CommandResult,
  options: CommandLogOptions = {},
): Promise<string> {
  const now = options.now ?? (() => new Date());
  const writtenAt = now();
  const categoryName = categoryLogDirectory(category);
  const dir = path.join(commandLogRoot(projectDir), categoryName);
  await fsp.mkdir(dir, { recursive: true });

  const baseName = `${formatFileStamp(writtenAt)}-${commandLogSlug(result.commandDisplay)}`;
  const content = formatCommandLog(result, options.workingDir ?? projectDir, writtenAt);
  const logPath = await writeExclusive(dir, baseName, content);

  await pruneCategoryLogs(projectDir, categoryName, options.keep ?? DEFAULT_LOG_RETENTION);
  return logPath;
}

/**
 * Most recent command logs across all categories, newest first.
 */
export async function listRecentLogs(projectDir: string, limit: number): Promise<CommandLogFile[]> {
  const root = commandLogRoot(projectDir);
  let entries: Dirent[];
  try {
    entries = await fsp.readdir(root, { withFileTypes: true });
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }

  const all: CommandLogFile[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      all.push(...(await listCategoryLogs(path.join(root, entry.name), entry.name)));
    }
  }

  all.sort(compareNewestFirst);
  return all.slice(0, Math.max(0, limit));
}

export default {
  writeCommandLog,
  pruneCategoryLogs,
  listRecentLogs,
  formatCommandLog,
  commandLogSlug,
};
