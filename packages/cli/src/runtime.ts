import React from 'react';
import { render } from 'ink';
import { loadProjectCommands, type CommandSession, type Logger } from '@devdeck/core';

import CliApp from './components/CliApp.js';
import type { StatusPayload } from './components/StatusMessage.js';
import { openInEditor, type EditorLauncher } from './editor.js';
import { createRuntimeLifecycle, type AppExit } from './runtimeLifecycle.js';

export type TuiOptions = {
  projectDir: string;
  session: CommandSession;
  logger: Logger;
  tickMs: number;
  env?: NodeJS.ProcessEnv;
  launchEditor?: EditorLauncher;
  renderApp?: typeof render;
};

function describeError(error: unknown): string {
  return error instanceof Error && error.message ? error.message : String(error);
}

/**
 * Renders the command deck until the user quits. Editing the project file
 * unmounts the app, hands the terminal to the editor and renders again with
 * the reloaded commands.
 */
export async function runTui({
  projectDir,
  session,
  logger,
  tickMs,
  env = process.env,
  launchEditor,
  renderApp = render,
}: TuiOptions): Promise<void> {
  let notice: StatusPayload | null = null;

  for (;;) {
    const project = await loadProjectCommands(projectDir);
    const lifecycle = createRuntimeLifecycle();

    const app = renderApp(
      React.createElement(CliApp, {
        projectName: project.name,
        projectDir,
        commands: project.commands,
        session,
        tickMs,
        initialStatus: notice,
        onEdit: () => lifecycle.handleComplete({ kind: 'edit' }),
        onExit: () => lifecycle.handleComplete({ kind: 'exit' }),
      }),
    );
    lifecycle.observeExit(app);

    let next: AppExit;
    try {
      next = await lifecycle.promise;
    } finally {
      app.unmount();
    }

    if (next.kind === 'exit') {
      await session.flush();
      logger.debug('CLI', 'Command deck closed');
      return;
    }

    try {
      const saved = await openInEditor(project.configPath, {
        projectDir,
        logger,
        env,
        ...(launchEditor ? { launch: launchEditor } : {}),
      });
      notice = saved ? null : { level: 'warn', message: 'Editor exited with a failure status.' };
    } catch (error) {
      logger.error('EDIT', describeError(error));
      notice = { level: 'error', message: describeError(error) };
    }
  }
}

export default { runTui };
