import { CommandBuilder } from '../commands/commandBuilder.js';
import { runStatusOnly } from '../commands/run.js';
import { EDITOR_CANDIDATES, FALLBACK_EDITOR } from '../constants.js';
import { ExecutionMode, type CommandSpec } from '../contracts/command.js';
import { shellSplit } from './text.js';

export type ProgramProbe = (program: string) => Promise<boolean>;

export async function whichProbe(program: string): Promise<boolean> {
  const spec = CommandBuilder.command('which').arg(program).mode(ExecutionMode.StatusOnly).build();
  try {
    return await runStatusOnly(spec);
  } catch {
    // `which` itself missing: treat every candidate as absent.
    return false;
  }
}

/**
 * `$EDITOR`, then `$VISUAL`, then the first installed candidate, then `vi`.
 */
export async function resolveDefaultEditor(
  env: NodeJS.ProcessEnv = process.env,
  probe: ProgramProbe = whichProbe,
): Promise<string> {
  const fromEnv = env.EDITOR?.trim() || env.VISUAL?.trim();
  if (fromEnv) {
    return fromEnv;
  }

  for (const candidate of EDITOR_CANDIDATES) {
    if (await probe(candidate)) {
      return candidate;
    }
  }

  return FALLBACK_EDITOR;
}

/**
 * Builds the interactive spec for opening `filePath`. Editors are exec'd with
 * the file as their only argument, so flags in `$EDITOR` are dropped.
 */
export function buildEditorCommand(editor: string, filePath: string, workingDir?: string): CommandSpec {
  const [program = FALLBACK_EDITOR] = shellSplit(editor);
  const builder = CommandBuilder.command(program)
    .arg(filePath)
    .mode(ExecutionMode.Interactive)
    .label('edit');
  if (workingDir) {
    builder.workingDir(workingDir);
  }
  return builder.build();
}

export default {
  resolveDefaultEditor,
  buildEditorCommand,
  whichProbe,
};
