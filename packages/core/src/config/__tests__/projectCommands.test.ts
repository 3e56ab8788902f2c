/* eslint-env jest */
import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { CommandCategory } from '../../contracts/command.js';
import {
  filterProjectCommands,
  loadProjectCommands,
  nextCommandFilter,
  projectConfigPath,
  toCommandSpec,
  type ProjectCommand,
} from '../projectCommands.js';

const GIT_STATUS: ProjectCommand = {
  name: 'git status',
  command: 'git status',
  category: CommandCategory.Git,
  source: 'builtin',
};

const BUILTINS: ProjectCommand[] = [
  GIT_STATUS,
  { name: 'git diff', command: 'git diff', category: CommandCategory.Git, source: 'builtin' },
];

describe('project commands', () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devdeck-project-'));
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  test('lists build tasks, custom commands and the git built-ins', async () => {
    fs.writeFileSync(
      projectConfigPath(projectDir),
      JSON.stringify({
        name: 'web',
        build: { release: 'npm run build' },
        commands: { test: 'npm test', lint: 'cd app && npx eslint .' },
      }),
    );

    const project = await loadProjectCommands(projectDir);

    expect(project.name).toBe('web');
    expect(project.configPath).toBe(path.join(projectDir, 'devdeck.json'));
    expect(project.commands).toEqual([
      { name: 'build: release', command: 'npm run build', category: CommandCategory.Build, source: 'build' },
      { name: 'test', command: 'npm test', category: CommandCategory.Test, source: 'custom' },
      { name: 'lint', command: 'cd app && npx eslint .', category: CommandCategory.Lint, source: 'custom' },
      ...BUILTINS,
    ]);
  });

  test('falls back to the directory name and the built-ins without a config file', async () => {
    const project = await loadProjectCommands(projectDir);

    expect(project.name).toBe(path.basename(projectDir));
    expect(project.commands).toEqual(BUILTINS);
  });

  test('rejects invalid command entries', async () => {
    const configPath = projectConfigPath(projectDir);
    fs.writeFileSync(configPath, JSON.stringify({ build: { release: '' } }));

    await expect(loadProjectCommands(projectDir)).rejects.toThrow(
      `${configPath}: build.release: String must contain at least 1 character(s)`,
    );
  });

  test('filters by category and cycles through the filters', () => {
    const commands: ProjectCommand[] = [
      { name: 'test', command: 'npm test', category: CommandCategory.Test, source: 'custom' },
      ...BUILTINS,
    ];

    expect(filterProjectCommands(commands, 'All')).toHaveLength(3);
    expect(filterProjectCommands(commands, CommandCategory.Git).map((command) => command.name)).toEqual([
      'git status',
      'git diff',
    ]);
    expect(filterProjectCommands(commands, CommandCategory.Build)).toEqual([]);

    expect(nextCommandFilter('All')).toBe(CommandCategory.Build);
    expect(nextCommandFilter(CommandCategory.Git)).toBe(CommandCategory.Other);
    expect(nextCommandFilter(CommandCategory.Other)).toBe('All');
  });

  test('runs built-ins directly and configured commands through the shell', () => {
    const direct = toCommandSpec(GIT_STATUS, projectDir);
    expect(direct).toMatchObject({ program: 'git', args: ['status'], workingDir: projectDir, label: 'git status' });

    const lint = toCommandSpec(
      { name: 'lint', command: 'cd app && npx eslint .', category: CommandCategory.Lint, source: 'custom' },
      projectDir,
    );
    expect(lint).toMatchObject({
      program: 'sh',
      args: ['-c', 'cd app && npx eslint .'],
      display: 'cd app && npx eslint .',
      label: 'lint',
    });
  });
});
