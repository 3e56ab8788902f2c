import type { ChildProcess, SpawnOptions } from 'node:child_process';

import type { CommandSpec } from '../contracts/command.js';
import type { SpawnError } from '../contracts/errors.js';

export type StdioMode = 'pipe' | 'ignore' | 'inherit';

export interface ExecutionOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  startedAt: number;
  durationMs: number;
}

export interface CommandExecutionState {
  spec: CommandSpec;
  spawnOptions: SpawnOptions;
  startTime: number;
  child: ChildProcess | null;
  spawned: boolean;
  stdoutChunks: Buffer[];
  stderrChunks: Buffer[];
  stderrExtras: string;
  settled: boolean;
  resolve: ((outcome: ExecutionOutcome) => void) | null;
  reject: ((error: SpawnError) => void) | null;
}

export function createExecutionState(
  spec: CommandSpec,
  spawnOptions: SpawnOptions,
): CommandExecutionState {
  return {
    spec,
    spawnOptions,
    startTime: Date.now(),
    child: null,
    spawned: false,
    stdoutChunks: [],
    stderrChunks: [],
    stderrExtras: '',
    settled: false,
    resolve: null,
    reject: null,
  };
}
