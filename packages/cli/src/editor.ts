import {
  assertValidCommandSpec,
  buildEditorCommand,
  resolveDefaultEditor,
  runInteractive,
  type CommandSpec,
  type Logger,
} from '@devdeck/core';

export type EditorLauncher = (spec: CommandSpec) => Promise<boolean>;

export type OpenInEditorOptions = {
  projectDir: string;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  launch?: EditorLauncher;
};

/**
 * Resolves the user's editor and runs it on `filePath` with the terminal
 * handed over. The Ink app must already be unmounted.
 */
export async function openInEditor(
  filePath: string,
  { projectDir, logger, env = process.env, launch = runInteractive }: OpenInEditorOptions,
): Promise<boolean> {
  const editor = await resolveDefaultEditor(env);
  const spec = assertValidCommandSpec(buildEditorCommand(editor, filePath, projectDir));
  logger.info('EDIT', `Opening ${filePath} with ${spec.program}`);

  const success = await launch(spec);
  if (!success) {
    logger.warn('EDIT', `${spec.program} exited with a failure status`);
  }
  return success;
}
