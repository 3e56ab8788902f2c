/* eslint-env jest */
import { afterEach, describe, expect, jest, test } from '@jest/globals';
import { EventEmitter } from 'node:events';
import type { ChildProcess } from 'node:child_process';

jest.mock('node:child_process', () => ({
  spawn: jest.fn(),
}));

import { spawn } from 'node:child_process';
import { runCaptured, runInteractive, runStatusOnly } from '../run.js';
import { CommandBuilder } from '../commandBuilder.js';
import { ExecutionMode } from '../../contracts/command.js';
import { SpawnError } from '../../contracts/errors.js';

const spawnMock = jest.mocked(spawn);

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();

  stderr = new EventEmitter();
}

function useFakeChild(): FakeChild {
  const child = new FakeChild();
  spawnMock.mockReturnValue(child as unknown as ChildProcess);
  return child;
}

function enoent(program: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`spawn ${program} ENOENT`);
  error.code = 'ENOENT';
  return error;
}

describe('execution engine', () => {
  afterEach(() => {
    spawnMock.mockReset();
  });

  test('runCaptured spawns without a shell and collects both streams', async () => {
    const child = useFakeChild();
    const spec = CommandBuilder.shell('echo hi && echo oops >&2')
      .workingDir('/work/app')
      .env('FOO', 'bar')
      .build();

    const pending = runCaptured(spec);
    child.emit('spawn');
    child.stdout.emit('data', Buffer.from('hi\n'));
    child.stderr.emit('data', Buffer.from('oops\n'));
    child.emit('close', 0, null);

    const result = await pending;

    expect(spawnMock).toHaveBeenCalledTimes(1);
    const [program, args, options] = spawnMock.mock.calls[0] ?? [];
    expect(program).toBe('sh');
    expect(args).toEqual(['-c', 'echo hi && echo oops >&2']);
    expect(options).toMatchObject({
      cwd: '/work/app',
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: expect.objectContaining({ FOO: 'bar' }),
    });
    expect(result.commandDisplay).toBe('echo hi && echo oops >&2');
    expect(result.stdout).toBe('hi\n');
    expect(result.stderr).toBe('oops\n');
    expect(result.exitCode).toBe(0);
    expect(result.success).toBe(true);
  });

  test('decodes invalid UTF-8 with replacement characters', async () => {
    const child = useFakeChild();
    const pending = runCaptured(CommandBuilder.command('node').build());

    child.emit('spawn');
    child.stdout.emit('data', Buffer.from([0x66, 0xff, 0x6f]));
    child.emit('close', 0, null);

    await expect(pending).resolves.toMatchObject({ stdout: 'f\uFFFDo' });
  });

  test('maps a signal kill to exit code -1', async () => {
    const child = useFakeChild();
    const pending = runCaptured(CommandBuilder.command('make').build());

    child.emit('spawn');
    child.emit('close', null, 'SIGKILL');

    const result = await pending;
    expect(result.exitCode).toBe(-1);
    expect(result.success).toBe(false);
  });

  test('rejects with SpawnError when the program cannot be started', async () => {
    const child = useFakeChild();
    const pending = runCaptured(CommandBuilder.command('cargo').build());

    child.emit('error', enoent('cargo'));
    child.emit('close', -2, null);

    await expect(pending).rejects.toBeInstanceOf(SpawnError);
    await expect(pending).rejects.toThrow('Failed to start cargo: spawn cargo ENOENT');
  });

  test('rejects with SpawnError when spawn throws synchronously', async () => {
    spawnMock.mockImplementation(() => {
      throw new TypeError('bad cwd');
    });

    const pending = runCaptured(CommandBuilder.command('git').build());

    await expect(pending).rejects.toMatchObject({
      name: 'SpawnError',
      program: 'git',
      message: 'Failed to start git: bad cwd',
    });
  });

  test('appends errors raised after start to stderr', async () => {
    const child = useFakeChild();
    const pending = runCaptured(CommandBuilder.command('npm').build());

    child.emit('spawn');
    child.stderr.emit('data', Buffer.from('npm ERR!'));
    child.emit('error', new Error('write EPIPE'));
    child.emit('close', 1, null);

    const result = await pending;
    expect(result.stderr).toBe('npm ERR!\nwrite EPIPE');
    expect(result.exitCode).toBe(1);
  });

  test('runStatusOnly ignores output and reports success', async () => {
    const child = useFakeChild();
    const pending = runStatusOnly(
      CommandBuilder.command('which').arg('vim').mode(ExecutionMode.StatusOnly).build(),
    );

    child.emit('spawn');
    child.emit('close', 2, null);

    await expect(pending).resolves.toBe(false);
    expect(spawnMock.mock.calls[0]?.[2]).toMatchObject({ stdio: 'ignore' });
  });

  test('runInteractive inherits the terminal', async () => {
    const child = useFakeChild();
    const pending = runInteractive(
      CommandBuilder.command('vim').arg('notes.md').mode(ExecutionMode.Interactive).build(),
    );

    child.emit('spawn');
    child.emit('close', 0, null);

    await expect(pending).resolves.toBe(true);
    expect(spawnMock.mock.calls[0]?.[2]).toMatchObject({ stdio: 'inherit' });
  });
});
