import { runCaptured } from '../commands/run.js';
import {
  createCommandResult,
  type CommandResult,
  type CommandSpec,
} from '../contracts/command.js';
import { BusyError } from '../contracts/errors.js';
import { errorMessage } from '../utils/errno.js';
import { OneShotChannel } from '../utils/oneShotChannel.js';

export type CommandRunner = (spec: CommandSpec) => Promise<CommandResult>;

export interface PendingExecution {
  readonly id: number;
  readonly spec: CommandSpec;
  readonly startedAt: number;
  readonly channel: OneShotChannel<CommandResult>;
}

export interface ExecutionSupervisorOptions {
  runner?: CommandRunner;
  now?: () => number;
}

/**
 * Failed result standing in for a process that never started.
 */
export function createSpawnFailureResult(
  spec: CommandSpec,
  startedAt: number,
  error: unknown,
  finishedAt: number,
): CommandResult {
  const message = errorMessage(error);
  return createCommandResult({
    commandDisplay: spec.display,
    stdout: '',
    stderr: message,
    exitCode: null,
    startedAt,
    durationMs: finishedAt - startedAt,
    spawnError: message,
  });
}

/**
 * Owns the single in-flight execution. A second `spawn` before the first
 * result is taken is rejected with `BusyError`.
 */
export class ExecutionSupervisor {
  private readonly runner: CommandRunner;

  private readonly now: () => number;

  private pending: PendingExecution | null = null;

  private nextId = 1;

  constructor({ runner = runCaptured, now = Date.now }: ExecutionSupervisorOptions = {}) {
    this.runner = runner;
    this.now = now;
  }

  isBusy(): boolean {
    return this.pending !== null;
  }

  current(): PendingExecution | null {
    return this.pending;
  }

  /**
   * Starts `spec` in the background and returns immediately. The result,
   * success or failure, arrives on the returned execution's channel exactly once.
   */
  spawn(spec: CommandSpec): PendingExecution {
    if (this.pending) {
      throw new BusyError(this.pending.spec.display);
    }

    const pending: PendingExecution = {
      id: this.nextId,
      spec,
      startedAt: this.now(),
      channel: new OneShotChannel<CommandResult>(),
    };
    this.nextId += 1;
    this.pending = pending;

    let execution: Promise<CommandResult>;
    try {
      execution = this.runner(spec);
    } catch (error) {
      execution = Promise.reject(error);
    }

    void execution
      .then((result) => {
        pending.channel.send(result);
      })
      .catch((error: unknown) => {
        pending.channel.send(createSpawnFailureResult(spec, pending.startedAt, error, this.now()));
      });

    return pending;
  }

  /**
   * Non-blocking check for the result of `pending`. Taking the result frees
   * the supervisor for the next command.
   */
  tryTake(pending: PendingExecution): CommandResult | null {
    if (this.pending !== pending) {
      return null;
    }

    const result = pending.channel.tryReceive();
    if (result) {
      this.pending = null;
    }
    return result;
  }

  /**
   * Forget the in-flight execution. The process keeps running; its result is discarded.
   */
  abandon(): PendingExecution | null {
    const abandoned = this.pending;
    this.pending = null;
    return abandoned;
  }
}

export default { ExecutionSupervisor, createSpawnFailureResult };
