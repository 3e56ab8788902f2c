/* eslint-env jest */
import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { CommandBuilder } from '../../commands/commandBuilder.js';
import { runCaptured } from '../../commands/run.js';
import { BuildStatus, CommandCategory } from '../../contracts/command.js';
import { buildStatePath, loadBuildState } from '../../services/buildStateService.js';
import type { Logger } from '../../utils/logger.js';
import { CommandSession, type CommandOutcome } from '../commandSession.js';

jest.setTimeout(15_000);

function silentLogger(): Logger {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

async function pollUntilDone(session: CommandSession): Promise<CommandOutcome> {
  for (let attempt = 0; attempt < 1_000; attempt += 1) {
    const outcome = await session.poll();
    if (outcome) {
      return outcome;
    }
    await new Promise<void>((resolve) => setTimeout(resolve, 10));
  }
  throw new Error('command did not finish');
}

describe('CommandSession with real processes', () => {
  let projectDir: string;
  let session: CommandSession;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devdeck-process-'));
    session = new CommandSession({ projectDir, logger: silentLogger(), minVisibleMs: 0 });
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  test('sh -c reports a non-zero exit as a failed result', async () => {
    const result = await runCaptured(CommandBuilder.shell('exit 1').build());

    expect(result).toMatchObject({ commandDisplay: 'exit 1', exitCode: 1, success: false, stdout: '', stderr: '' });
  });

  test('a failing build writes both output sections and a failed build state', async () => {
    const build = CommandBuilder.shell(
      `node -e "console.log(process.argv[1]); console.error('compile failed'); process.exit(1)" build`,
    )
      .label('build: release')
      .workingDir(projectDir)
      .build();

    await session.start(build);
    await expect(loadBuildState(projectDir)).resolves.toMatchObject({ status: BuildStatus.Running });
    const outcome = await pollUntilDone(session);

    expect(outcome.result).toMatchObject({ exitCode: 1, success: false, stdout: 'build\n', stderr: 'compile failed\n' });
    expect(outcome.category).toBe(CommandCategory.Build);
    expect(outcome.buildStatus).toBe(BuildStatus.Failed);

    const content = fs.readFileSync(outcome.logPath ?? '', 'utf8');
    expect(content).toContain(`Working Directory: ${projectDir}\n`);
    expect(content).toContain('Exit Code: 1\n');
    expect(content.endsWith('--- STDOUT ---\nbuild\n\n--- STDERR ---\ncompile failed\n')).toBe(true);
    await expect(loadBuildState(projectDir)).resolves.toMatchObject({ status: BuildStatus.Failed, task: 'release' });
  });

  test('a failing command outside the build category leaves the build state alone', async () => {
    await session.start(CommandBuilder.shell('node -e "process.exit(1)"').workingDir(projectDir).build());
    const outcome = await pollUntilDone(session);

    expect(outcome.result.exitCode).toBe(1);
    expect(outcome.category).toBe(CommandCategory.Other);
    expect(outcome.buildStatus).toBeNull();
    expect(path.basename(path.dirname(outcome.logPath ?? ''))).toBe('other');
    expect(fs.existsSync(buildStatePath(projectDir))).toBe(false);
  });
});
