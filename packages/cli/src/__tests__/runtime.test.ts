/* eslint-env jest */
import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { render } from 'ink';
import {
  BuildStatus,
  CommandBuilder,
  CommandSession,
  ExecutionSupervisor,
  loadBuildState,
  type CommandResult,
  type Logger,
} from '@devdeck/core';

import type { CliAppProps } from '../components/CliApp.js';
import type { EditorLauncher } from '../editor.js';
import { runTui } from '../runtime.js';

type RenderApp = typeof render;

function createLogger(): Logger {
  return { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
}

async function waitFor(condition: () => boolean): Promise<void> {
  for (let attempt = 0; attempt < 200; attempt += 1) {
    if (condition()) {
      return;
    }
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
  }
  throw new Error('condition not met');
}

describe('runTui', () => {
  let projectDir: string;
  let rendered: CliAppProps[];
  let unmounts: Array<jest.Mock<() => void>>;
  let renderApp: jest.Mock<RenderApp>;
  let logger: Logger;

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'devdeck-tui-'));
    fs.writeFileSync(path.join(projectDir, 'devdeck.json'), JSON.stringify({ commands: { test: 'npm test' } }));
    rendered = [];
    unmounts = [];
    logger = createLogger();
    renderApp = jest.fn<RenderApp>((tree) => {
      const props: CliAppProps = tree.props;
      rendered.push(props);
      const unmount = jest.fn<() => void>();
      unmounts.push(unmount);
      return {
        rerender: jest.fn(),
        unmount,
        waitUntilExit: () => new Promise<void>(() => undefined),
        cleanup: jest.fn(),
        clear: jest.fn(),
      };
    });
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  function start(env: NodeJS.ProcessEnv, launchEditor: EditorLauncher): Promise<void> {
    return runTui({
      projectDir,
      session: new CommandSession({ projectDir, logger }),
      logger,
      tickMs: 16,
      env,
      launchEditor,
      renderApp,
    });
  }

  test('quits when the app asks to exit', async () => {
    const launchEditor = jest.fn<EditorLauncher>(async () => true);
    const done = start({ EDITOR: 'vim' }, launchEditor);

    await waitFor(() => rendered.length === 1);
    expect(rendered[0]?.projectName).toBe(path.basename(projectDir));
    expect(rendered[0]?.commands.map((command) => command.name)).toEqual(['test', 'git status', 'git diff']);

    rendered[0]?.onExit();
    await done;

    expect(launchEditor).not.toHaveBeenCalled();
    expect(unmounts[0]).toHaveBeenCalledTimes(1);
  });

  test('hands the terminal to the editor and reloads the commands', async () => {
    const configPath = path.join(projectDir, 'devdeck.json');
    const launchEditor = jest.fn<EditorLauncher>(async () => {
      fs.writeFileSync(configPath, JSON.stringify({ commands: { lint: 'npx eslint .' } }));
      return true;
    });
    const done = start({ EDITOR: 'vim' }, launchEditor);

    await waitFor(() => rendered.length === 1);
    rendered[0]?.onEdit();
    await waitFor(() => rendered.length === 2);

    expect(unmounts[0]).toHaveBeenCalledTimes(1);
    expect(launchEditor.mock.calls[0]?.[0]).toMatchObject({ program: 'vim', args: [configPath] });
    expect(rendered[1]?.commands.map((command) => command.name)).toEqual(['lint', 'git status', 'git diff']);
    expect(rendered[1]?.initialStatus).toBeNull();

    rendered[1]?.onExit();
    await done;
    expect(unmounts[1]).toHaveBeenCalledTimes(1);
  });

  test('shows editor failures after re-rendering', async () => {
    const launchEditor = jest.fn<EditorLauncher>(async () => false);
    const done = start({ EDITOR: 'code' }, launchEditor);

    await waitFor(() => rendered.length === 1);
    rendered[0]?.onEdit();
    await waitFor(() => rendered.length === 2);

    expect(launchEditor).not.toHaveBeenCalled();
    expect(rendered[1]?.initialStatus).toEqual({ level: 'error', message: "Command 'code' is not whitelisted" });
    expect(logger.error).toHaveBeenCalledWith('EDIT', "Command 'code' is not whitelisted");

    rendered[1]?.onExit();
    await done;
  });

  test('warns when the editor exits with a failure', async () => {
    const launchEditor = jest.fn<EditorLauncher>(async () => false);
    const done = start({ EDITOR: 'nano' }, launchEditor);

    await waitFor(() => rendered.length === 1);
    rendered[0]?.onEdit();
    await waitFor(() => rendered.length === 2);

    expect(rendered[1]?.initialStatus).toEqual({ level: 'warn', message: 'Editor exited with a failure status.' });

    rendered[1]?.onExit();
    await done;
  });

  test('records an abandoned build before returning', async () => {
    const session = new CommandSession({
      projectDir,
      logger,
      supervisor: new ExecutionSupervisor({ runner: () => new Promise<CommandResult>(() => undefined) }),
    });
    const done = runTui({ projectDir, session, logger, tickMs: 16, env: {}, renderApp });

    await waitFor(() => rendered.length === 1);
    await session.start(CommandBuilder.shell('npm run build').label('build: release').build());
    session.abandon();
    rendered[0]?.onExit();
    await done;

    await expect(loadBuildState(projectDir)).resolves.toMatchObject({
      status: BuildStatus.Failed,
      task: 'release',
    });
  });
});
