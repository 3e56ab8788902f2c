/* eslint-env jest */
import { describe, expect, test } from '@jest/globals';
import {
  BuildStatus,
  CommandCategory,
  createCommandResult,
  formatTimestamp,
  type CommandOutcome,
} from '@devdeck/core';

import {
  describeOutcome,
  formatBuildState,
  formatCommandRow,
  formatDuration,
  formatLogEntry,
  formatOutcomeDetails,
} from '../render.js';

function stripAnsi(value: string): string {
  return value.replace(/\u001b\[[0-9;]*m/g, '');
}

function outcome(overrides: Partial<CommandOutcome> & { exitCode?: number; stderr?: string; spawnError?: string }): CommandOutcome {
  const { exitCode = 0, stderr = '', spawnError, ...rest } = overrides;
  return {
    result: createCommandResult({
      commandDisplay: 'npm test',
      stdout: 'out\n',
      stderr,
      exitCode,
      startedAt: 0,
      durationMs: 120,
      ...(spawnError ? { spawnError } : {}),
    }),
    category: CommandCategory.Test,
    logPath: '/work/app/.devdeck/logs/commands/test/run.log',
    buildStatus: null,
    ...rest,
  };
}

describe('render helpers', () => {
  test('formats durations', () => {
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1500)).toBe('1.5s');
  });

  test('formats command rows with the category first', () => {
    expect(
      stripAnsi(
        formatCommandRow({
          name: 'build: release',
          command: 'npm run build',
          category: CommandCategory.Build,
          source: 'build',
        }),
      ),
    ).toBe('Build  build: release  npm run build');
    expect(
      stripAnsi(
        formatCommandRow({ name: 'git status', command: 'git status', category: CommandCategory.Git, source: 'builtin' }),
      ),
    ).toBe('Git    git status');
  });

  test('describes finished and unstartable commands', () => {
    expect(describeOutcome(outcome({}))).toBe('✔ npm test exited with 0 in 120ms');
    expect(describeOutcome(outcome({ exitCode: 1 }))).toBe('✖ npm test exited with 1 in 120ms');
    expect(describeOutcome(outcome({ exitCode: -1, spawnError: 'Failed to start npm: spawn npm ENOENT' }))).toBe(
      '✖ Failed to start npm: spawn npm ENOENT',
    );
  });

  test('shows the output tail only for failures', () => {
    expect(formatOutcomeDetails(outcome({}))).toBe('Log: /work/app/.devdeck/logs/commands/test/run.log');

    expect(
      formatOutcomeDetails(
        outcome({ exitCode: 2, stderr: 'line1\nline2\nline3\n', logPath: null, buildStatus: BuildStatus.Failed }),
        2,
      ),
    ).toBe('line2\nline3\nLog could not be written\nBuild state: Failed');
  });

  test('falls back to stdout when stderr is empty', () => {
    expect(formatOutcomeDetails(outcome({ exitCode: 1 }))).toBe(
      'out\nLog: /work/app/.devdeck/logs/commands/test/run.log',
    );
  });

  test('formats build state and log entries', () => {
    expect(formatBuildState(null)).toBe('No build recorded');
    expect(formatBuildState({ timestamp: 1_700_000_000, status: BuildStatus.Success, task: 'release' })).toBe(
      `Last build: Success (release) at ${formatTimestamp(new Date(1_700_000_000_000))}`,
    );

    const modifiedAt = new Date(2024, 4, 6, 7, 8, 9);
    expect(
      formatLogEntry({ path: '/logs/build/a.log', filename: 'a.log', category: 'build', modifiedAt }),
    ).toBe('2024-05-06 07:08:09  build   /logs/build/a.log');
  });
});
