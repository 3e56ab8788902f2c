import { DEFAULT_LOG_RETENTION, DEFAULT_MIN_VISIBLE_MS } from '../constants.js';
import {
  BuildStatus,
  CommandCategory,
  ExecutionMode,
  type CommandResult,
  type CommandSpec,
} from '../contracts/command.js';
import { BusyError } from '../contracts/errors.js';
import {
  markBuildAbandoned,
  markBuildRunning,
  resolveBuildTask,
  updateBuildState,
} from '../services/buildStateService.js';
import { categorizeCommand } from '../services/commandCategorizer.js';
import { writeCommandLog } from '../services/commandLogWriter.js';
import {
  DEFAULT_COMMAND_POLICY,
  validateCommandSpec,
  type CommandPolicy,
} from '../services/commandPolicy/commandValidator.js';
import { errorMessage } from '../utils/errno.js';
import type { Logger } from '../utils/logger.js';
import { AnimationGate } from './animationGate.js';
import { ExecutionSupervisor, type PendingExecution } from './executionSupervisor.js';

const LOG_SCOPE = 'EXEC';

export interface CommandSessionOptions {
  projectDir: string;
  logger: Logger;
  policy?: CommandPolicy;
  minVisibleMs?: number;
  logRetention?: number;
  supervisor?: ExecutionSupervisor;
  now?: () => number;
}

export interface CommandOutcome {
  readonly result: CommandResult;
  readonly category: CommandCategory;
  /** Null when the log could not be written. */
  readonly logPath: string | null;
  /** Recorded build status, or null for non-build commands and failed writes. */
  readonly buildStatus: BuildStatus | null;
}

interface ActiveCommand {
  readonly spec: CommandSpec;
  readonly category: CommandCategory;
  readonly task: string;
  pending: PendingExecution | null;
  persisting: boolean;
}

/**
 * UI-facing entry point: validates and starts one captured command, then
 * hands its result back through `poll()` once it is both finished and past
 * the minimum visible duration. Logs and build state are written before the
 * outcome is returned.
 */
export class CommandSession {
  private readonly projectDir: string;

  private readonly logger: Logger;

  private readonly policy: CommandPolicy;

  private readonly logRetention: number;

  private readonly supervisor: ExecutionSupervisor;

  private readonly gate: AnimationGate;

  private readonly now: () => number;

  private active: ActiveCommand | null = null;

  // Build-state writes land in the order they were requested.
  private buildWrites: Promise<unknown> = Promise.resolve();

  constructor({
    projectDir,
    logger,
    policy = DEFAULT_COMMAND_POLICY,
    minVisibleMs = DEFAULT_MIN_VISIBLE_MS,
    logRetention = DEFAULT_LOG_RETENTION,
    supervisor,
    now = Date.now,
  }: CommandSessionOptions) {
    this.projectDir = projectDir;
    this.logger = logger;
    this.policy = policy;
    this.logRetention = logRetention;
    this.now = now;
    this.supervisor = supervisor ?? new ExecutionSupervisor({ now });
    this.gate = new AnimationGate(minVisibleMs);
  }

  isRunning(): boolean {
    return this.active !== null;
  }

  runningCommand(): CommandSpec | null {
    return this.active?.spec ?? null;
  }

  elapsedMs(now: number = this.now()): number {
    return this.gate.elapsedMs(now);
  }

  /**
   * Validate and start `spec`. Throws `CommandValidationError` when the
   * policy rejects it and `BusyError` while another command is unfinished.
   */
  async start(spec: CommandSpec): Promise<void> {
    const rejection = validateCommandSpec(spec, this.policy);
    if (rejection) {
      this.logger.warn(LOG_SCOPE, `Rejected ${spec.display}: ${rejection.message}`);
      throw rejection;
    }

    if (spec.mode === ExecutionMode.Interactive) {
      throw new TypeError('Interactive commands must run through the terminal hand-off.');
    }

    if (this.active) {
      throw new BusyError(this.active.spec.display);
    }

    const category = categorizeCommand(spec.display);
    const active: ActiveCommand = {
      spec,
      category,
      task: resolveBuildTask(spec),
      pending: null,
      persisting: false,
    };
    this.active = active;

    if (category === CommandCategory.Build) {
      await this.writeBuildState(() => markBuildRunning(this.projectDir, active.task, this.now()));
    }

    if (this.active !== active) {
      // Abandoned while the running state was being written; abandon() recorded it.
      return;
    }

    let pending: PendingExecution;
    try {
      pending = this.supervisor.spawn(spec);
    } catch (error) {
      this.active = null;
      throw error;
    }

    active.pending = pending;
    this.gate.start(pending.startedAt);
    this.logger.info(LOG_SCOPE, `Started ${spec.display}`);
  }

  /**
   * Called on every UI tick. Returns the outcome once, after it has been
   * persisted; null otherwise.
   */
  async poll(now: number = this.now()): Promise<CommandOutcome | null> {
    const active = this.active;
    if (!active || !active.pending || active.persisting) {
      return null;
    }

    if (this.gate.state.phase === 'running') {
      const result = this.supervisor.tryTake(active.pending);
      if (result) {
        this.gate.offer(result);
      }
    }

    const released = this.gate.release(now);
    if (!released) {
      return null;
    }

    active.persisting = true;
    try {
      return await this.persist(active, released);
    } finally {
      // abandon() and a new start() may have run while persisting.
      if (this.active === active) {
        this.active = null;
        this.gate.reset();
      }
    }
  }

  /**
   * Drop the running command without waiting. Its process finishes on its
   * own and the result is discarded. An abandoned build is recorded as
   * failed; `flush()` waits for that write.
   */
  abandon(): void {
    const active = this.active;
    const abandoned = this.supervisor.abandon();
    if (abandoned) {
      this.logger.info(LOG_SCOPE, `Abandoned ${abandoned.spec.display}`);
    }
    this.active = null;
    this.gate.reset();

    if (active && !active.persisting && active.category === CommandCategory.Build) {
      void this.writeBuildState(() => markBuildAbandoned(this.projectDir, active.task, this.now()));
    }
  }

  /**
   * Resolves once every requested build-state write has finished.
   */
  async flush(): Promise<void> {
    await this.buildWrites;
  }

  private async persist(active: ActiveCommand, result: CommandResult): Promise<CommandOutcome> {
    const { spec, category } = active;
    this.logger.info(
      LOG_SCOPE,
      `${result.commandDisplay} exited with ${result.exitCode} after ${result.durationMs}ms`,
    );
    if (result.spawnError) {
      this.logger.error(LOG_SCOPE, `Failed to start ${spec.display}: ${result.spawnError}`);
    }

    const logPath = await this.attempt('LOG', () =>
      writeCommandLog(this.projectDir, spec.logCategory ?? category, result, {
        workingDir: spec.workingDir ?? this.projectDir,
        keep: this.logRetention,
      }),
    );

    let buildStatus: BuildStatus | null = null;
    if (category === CommandCategory.Build) {
      const written = await this.writeBuildState(() =>
        updateBuildState(this.projectDir, result, active.task, this.now()),
      );
      if (written !== null) {
        buildStatus = result.success ? BuildStatus.Success : BuildStatus.Failed;
      }
    }

    return { result, category, logPath, buildStatus };
  }

  private writeBuildState<T>(task: () => Promise<T>): Promise<T | null> {
    const write = this.buildWrites.then(() => this.attempt('BUILD', task));
    this.buildWrites = write;
    return write;
  }

  // Persistence is best effort: failures are logged and the outcome still reaches the UI.
  private async attempt<T>(scope: string, task: () => Promise<T>): Promise<T | null> {
    try {
      return await task();
    } catch (error) {
      this.logger.error(scope, errorMessage(error));
      return null;
    }
  }
}

export default CommandSession;
