import * as path from 'node:path';
import { randomBytes } from 'node:crypto';
import * as fsp from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { z } from 'zod';

import { TOOL_DIRECTORY } from '../constants.js';
import {
  BuildStatus,
  type BuildStateRecord,
  type CommandResult,
  type CommandSpec,
} from '../contracts/command.js';
import { toUnixSeconds } from '../utils/time.js';

const BUILD_LABEL_PREFIX = /^build:\s*/i;

const BuildStateSchema = z.object({
  timestamp: z.number().int(),
  status: z.nativeEnum(BuildStatus),
  task: z.string(),
});

export function buildStatePath(projectDir: string): string {
  return path.join(projectDir, TOOL_DIRECTORY, 'state', 'build.json');
}

/**
 * Task name recorded for a build: `build: release` becomes `release`.
 */
export function resolveBuildTask(spec: Pick<CommandSpec, 'label' | 'display'>): string {
  const label = spec.label?.trim();
  if (label) {
    return label.replace(BUILD_LABEL_PREFIX, '') || label;
  }
  return spec.display;
}

/**
 * Replaces the state file through a temp file and rename, so readers see
 * either the previous record or the new one.
 */
export async function saveBuildState(projectDir: string, record: BuildStateRecord): Promise<string> {
  const targetPath = buildStatePath(projectDir);
  const dir = path.dirname(targetPath);
  await fsp.mkdir(dir, { recursive: true });

  const randomSuffix = randomBytes(6).toString('hex');
  const tempFile = path.join(dir, `.build_${Date.now()}_${randomSuffix}.tmp`);
  let handle: FileHandle | null = null;
  try {
    handle = await fsp.open(tempFile, 'w');
    await handle.writeFile(`${JSON.stringify(record, null, 2)}\n`, { encoding: 'utf8' });
    await handle.sync();
    await handle.close();
    handle = null;
    await fsp.rename(tempFile, targetPath);
    return targetPath;
  } finally {
    if (handle) {
      await handle.close().catch(() => undefined);
    }
    // Already renamed on success; only a failed write leaves the temp file behind.
    await fsp.rm(tempFile, { force: true });
  }
}

/**
 * Reads the last recorded build state. Missing or malformed files read as null.
 */
export async function loadBuildState(projectDir: string): Promise<BuildStateRecord | null> {
  let raw: string;
  try {
    raw = await fsp.readFile(buildStatePath(projectDir), { encoding: 'utf8' });
  } catch {
    return null;
  }

  try {
    const parsed = BuildStateSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function markBuildRunning(
  projectDir: string,
  task: string,
  now: number = Date.now(),
): Promise<string> {
  return saveBuildState(projectDir, {
    timestamp: toUnixSeconds(now),
    status: BuildStatus.Running,
    task,
  });
}

/**
 * A build dropped before its result arrived counts as failed.
 */
export function markBuildAbandoned(
  projectDir: string,
  task: string,
  now: number = Date.now(),
): Promise<string> {
  return saveBuildState(projectDir, {
    timestamp: toUnixSeconds(now),
    status: BuildStatus.Failed,
    task,
  });
}

/**
 * Records the outcome of a build-classified command.
 */
export function updateBuildState(
  projectDir: string,
  result: CommandResult,
  task: string,
  now: number = Date.now(),
): Promise<string> {
  return saveBuildState(projectDir, {
    timestamp: toUnixSeconds(now),
    status: result.success ? BuildStatus.Success : BuildStatus.Failed,
    task,
  });
}

export default {
  saveBuildState,
  loadBuildState,
  markBuildRunning,
  markBuildAbandoned,
  updateBuildState,
  resolveBuildTask,
};
