/**
 * Command DTOs shared by the validator, the execution engine, the supervisor
 * and the persistence layer.
 */

import { SIGNAL_EXIT_CODE } from '../constants.js';

/**
 * How a command's standard streams are wired.
 */
export enum ExecutionMode {
  Captured = 'captured',
  StatusOnly = 'status-only',
  Interactive = 'interactive',
}

export enum CommandCategory {
  Build = 'Build',
  Test = 'Test',
  Lint = 'Lint',
  Git = 'Git',
  Other = 'Other',
}

export enum BuildStatus {
  Success = 'Success',
  Failed = 'Failed',
  Running = 'Running',
}

/**
 * Immutable description of one process to run. Produced by `CommandBuilder`.
 */
export interface CommandSpec {
  readonly program: string;
  readonly args: readonly string[];
  readonly workingDir?: string;
  readonly env: Readonly<Record<string, string>>;
  readonly mode: ExecutionMode;
  readonly logCategory?: string;
  /** Configured command name, used as the build-state task. */
  readonly label?: string;
  /** Carried for callers; the engine does not enforce it yet. */
  readonly timeoutMs?: number;
  /** Original invocation text for logs and the UI. */
  readonly display: string;
}

export interface CommandResult {
  readonly commandDisplay: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly success: boolean;
  /** Unix epoch milliseconds. */
  readonly startedAt: number;
  readonly durationMs: number;
  /** OS error text when the process never started. */
  readonly spawnError?: string;
}

export type CommandResultInput = {
  commandDisplay: string;
  stdout?: string;
  stderr?: string;
  exitCode: number | null;
  startedAt: number;
  durationMs: number;
  spawnError?: string;
};

/**
 * Single construction point for results so `success` always mirrors the exit code.
 */
export function createCommandResult(input: CommandResultInput): CommandResult {
  const exitCode =
    typeof input.exitCode === 'number' && Number.isInteger(input.exitCode)
      ? input.exitCode
      : SIGNAL_EXIT_CODE;

  const result: CommandResult = {
    commandDisplay: input.commandDisplay,
    stdout: input.stdout ?? '',
    stderr: input.stderr ?? '',
    exitCode,
    success: exitCode === 0,
    startedAt: input.startedAt,
    durationMs: Math.max(0, input.durationMs),
    ...(input.spawnError !== undefined ? { spawnError: input.spawnError } : {}),
  };

  return Object.freeze(result);
}

export interface BuildStateRecord {
  /** Unix epoch seconds. */
  timestamp: number;
  status: BuildStatus;
  task: string;
}
