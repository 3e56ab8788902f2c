/**
 * Loads the commands a project declares in `devdeck.json`.
 *
 * ```json
 * {
 *   "name": "web",
 *   "build": { "release": "npm run build" },
 *   "commands": { "test": "npm test", "lint": "cd app && npx eslint ." }
 * }
 * ```
 *
 * Build tasks are listed as `build: <task>`. `git status` and `git diff`
 * are always appended.
 */

import * as path from 'node:path';
import * as fsp from 'node:fs/promises';
import { z } from 'zod';

import { CommandBuilder } from '../commands/commandBuilder.js';
import { PROJECT_CONFIG_FILE } from '../constants.js';
import { CommandCategory, type CommandSpec } from '../contracts/command.js';
import { ConfigError } from '../contracts/errors.js';
import { errorCode, errorMessage } from '../utils/errno.js';
import { categorizeCommand } from '../services/commandCategorizer.js';
import { shellSplit } from '../utils/text.js';
import { formatSchemaIssues } from './schemaIssues.js';

export const ProjectConfigSchema = z.object({
  name: z.string().optional(),
  build: z.record(z.string().min(1)).default({}),
  commands: z.record(z.string().min(1)).default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export type ProjectCommandSource = 'build' | 'custom' | 'builtin';

export interface ProjectCommand {
  readonly name: string;
  readonly command: string;
  readonly category: CommandCategory;
  readonly source: ProjectCommandSource;
}

export type CommandFilter = 'All' | CommandCategory;

export const COMMAND_FILTERS: readonly CommandFilter[] = [
  'All',
  CommandCategory.Build,
  CommandCategory.Test,
  CommandCategory.Lint,
  CommandCategory.Git,
  CommandCategory.Other,
];

const BUILTIN_GIT_COMMANDS: ReadonlyArray<readonly [string, string]> = [
  ['git status', 'git status'],
  ['git diff', 'git diff'],
];

export interface LoadedProject {
  readonly name: string;
  readonly configPath: string;
  readonly commands: ProjectCommand[];
}

export function projectConfigPath(projectDir: string): string {
  return path.join(projectDir, PROJECT_CONFIG_FILE);
}

function createCommand(name: string, command: string, source: ProjectCommandSource): ProjectCommand {
  return { name, command: command.trim(), category: categorizeCommand(command), source };
}

export function buildProjectCommands(config: ProjectConfig): ProjectCommand[] {
  const commands: ProjectCommand[] = [];
  for (const [task, command] of Object.entries(config.build)) {
    commands.push(createCommand(`build: ${task}`, command, 'build'));
  }
  for (const [name, command] of Object.entries(config.commands)) {
    commands.push(createCommand(name, command, 'custom'));
  }
  for (const [name, command] of BUILTIN_GIT_COMMANDS) {
    commands.push(createCommand(name, command, 'builtin'));
  }
  return commands;
}

async function readProjectConfig(configPath: string): Promise<ProjectConfig | null> {
  let raw: string;
  try {
    raw = await fsp.readFile(configPath, { encoding: 'utf8' });
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw new ConfigError(configPath, errorMessage(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(configPath, `invalid JSON (${errorMessage(error)})`);
  }

  const result = ProjectConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(configPath, formatSchemaIssues(result.error));
  }
  return result.data;
}

/**
 * Reads `devdeck.json` from `projectDir`. A missing file yields only the
 * built-in git commands; an unreadable or invalid one throws `ConfigError`.
 */
export async function loadProjectCommands(projectDir: string): Promise<LoadedProject> {
  const configPath = projectConfigPath(projectDir);
  const config = (await readProjectConfig(configPath)) ?? ProjectConfigSchema.parse({});
  return {
    name: config.name ?? path.basename(path.resolve(projectDir)),
    configPath,
    commands: buildProjectCommands(config),
  };
}

export function filterProjectCommands(
  commands: readonly ProjectCommand[],
  filter: CommandFilter,
): ProjectCommand[] {
  if (filter === 'All') {
    return [...commands];
  }
  return commands.filter((command) => command.category === filter);
}

export function nextCommandFilter(filter: CommandFilter): CommandFilter {
  const index = COMMAND_FILTERS.indexOf(filter);
  return COMMAND_FILTERS[(index + 1) % COMMAND_FILTERS.length] ?? 'All';
}

/**
 * Configured commands run through `sh -c`; built-in git commands run directly.
 */
export function toCommandSpec(command: ProjectCommand, projectDir: string): CommandSpec {
  if (command.source === 'builtin') {
    const [program = '', ...args] = shellSplit(command.command);
    return CommandBuilder.command(program).args(args).workingDir(projectDir).label(command.name).build();
  }

  return CommandBuilder.shell(command.command).workingDir(projectDir).label(command.name).build();
}

export default {
  loadProjectCommands,
  buildProjectCommands,
  filterProjectCommands,
  nextCommandFilter,
  toCommandSpec,
};
