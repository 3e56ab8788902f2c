import type { SpawnOptions } from 'node:child_process';

import type { CommandSpec } from '../contracts/command.js';
import {
  createExecutionState,
  type CommandExecutionState,
  type ExecutionOutcome,
  type StdioMode,
} from './commandExecutionTypes.js';
import { startExecution } from './commandExecutionLifecycle.js';

export type { ExecutionOutcome, StdioMode } from './commandExecutionTypes.js';

export function createSpawnOptions(spec: CommandSpec, stdio: StdioMode): SpawnOptions {
  return {
    cwd: spec.workingDir,
    env: { ...process.env, ...spec.env },
    shell: false,
    stdio: stdio === 'pipe' ? ['ignore', 'pipe', 'pipe'] : stdio,
  };
}

/**
 * Spawns `spec` and settles exactly once: resolves with the exit outcome or
 * rejects with `SpawnError` when the program could not be started.
 */
export function executeCommand(spec: CommandSpec, stdio: StdioMode): Promise<ExecutionOutcome> {
  const state: CommandExecutionState = createExecutionState(spec, createSpawnOptions(spec, stdio));
  return new Promise((resolve, reject) => {
    state.resolve = resolve;
    state.reject = reject;
    startExecution(state);
  });
}
