import { createCommandResult, type CommandResult, type CommandSpec } from '../contracts/command.js';
import { executeCommand } from './commandExecution.js';

/**
 * Runs `spec` with piped output and returns the full result. Rejects with
 * `SpawnError` only when the program never started.
 */
export async function runCaptured(spec: CommandSpec): Promise<CommandResult> {
  const outcome = await executeCommand(spec, 'pipe');
  return createCommandResult({
    commandDisplay: spec.display,
    stdout: outcome.stdout,
    stderr: outcome.stderr,
    exitCode: outcome.exitCode,
    startedAt: outcome.startedAt,
    durationMs: outcome.durationMs,
  });
}

export async function runStatusOnly(spec: CommandSpec): Promise<boolean> {
  const outcome = await executeCommand(spec, 'ignore');
  return outcome.exitCode === 0;
}

/**
 * Runs `spec` attached to the current terminal. The caller is responsible
 * for releasing the terminal before and restoring it afterwards.
 */
export async function runInteractive(spec: CommandSpec): Promise<boolean> {
  const outcome = await executeCommand(spec, 'inherit');
  return outcome.exitCode === 0;
}

export default {
  runCaptured,
  runStatusOnly,
  runInteractive,
};
