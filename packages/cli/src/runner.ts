/**
 * Argument parsing and subcommand dispatch for the `devdeck` executable.
 */
import * as path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import chalk from 'chalk';
import {
  BusyError,
  CommandSession,
  CommandValidationError,
  ConfigError,
  ExecutionSupervisor,
  PROJECT_CONFIG_FILE,
  SpawnError,
  createLogger,
  diagnosticsLogPath,
  listRecentLogs,
  loadProjectCommands,
  loadToolConfig,
  toCommandSpec,
  type CommandOutcome,
  type CommandRunner,
  type CommandSpec,
  type Logger,
  type ToolConfig,
} from '@devdeck/core';

import { openInEditor, type EditorLauncher } from './editor.js';
import { USAGE, formatCommandRow, formatLogEntry, printOutcome } from './render.js';
import { runTui, type TuiOptions } from './runtime.js';

type CliIo = {
  stdout?: (message: string) => void;
  stderr?: (message: string) => void;
};

type ResolvedCliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
};

function resolveIo(io?: CliIo): ResolvedCliIo {
  const target = io ?? {};
  const stdout = typeof target.stdout === 'function' ? target.stdout : console.log;
  const stderr = typeof target.stderr === 'function' ? target.stderr : console.error;
  return { stdout, stderr };
}

export type CliCommand = 'tui' | 'list' | 'run' | 'logs' | 'edit' | 'help';

const CLI_COMMANDS: readonly CliCommand[] = ['tui', 'list', 'run', 'logs', 'edit', 'help'];

export type ParsedCliArgs = {
  command: CliCommand;
  target: string | null;
  projectDir: string;
  limit: number | null;
};

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

function isCliCommand(value: string): value is CliCommand {
  return CLI_COMMANDS.some((command) => command === value);
}

function parseLimit(raw: string | undefined): number {
  const value = raw !== undefined && /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : 0;
  if (value < 1) {
    throw new CliUsageError('--limit expects a positive integer');
  }
  return value;
}

/**
 * `argv` is the full process argv; the first two entries are skipped.
 */
export function parseCliArgs(argv: readonly string[], cwd: string = process.cwd()): ParsedCliArgs {
  const args = argv.slice(2);
  const positionals: string[] = [];
  let projectDir = cwd;
  let limit: number | null = null;
  let help = false;

  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? '';
    if (arg === '-h' || arg === '--help') {
      help = true;
    } else if (arg === '--cwd') {
      const value = args[index + 1];
      if (!value) {
        throw new CliUsageError('--cwd expects a directory');
      }
      projectDir = path.resolve(cwd, value);
      index += 1;
    } else if (arg.startsWith('--cwd=')) {
      projectDir = path.resolve(cwd, arg.slice('--cwd='.length));
    } else if (arg === '--limit') {
      limit = parseLimit(args[index + 1]);
      index += 1;
    } else if (arg.startsWith('--limit=')) {
      limit = parseLimit(arg.slice('--limit='.length));
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  const [name = 'tui', target = null, extra] = positionals;
  if (!isCliCommand(name)) {
    throw new CliUsageError(`Unknown command: ${name}`);
  }
  if (extra !== undefined) {
    throw new CliUsageError(`Unexpected argument: ${extra}`);
  }

  return { command: help ? 'help' : name, target, projectDir, limit };
}

export type CliDependencies = {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaces the process-spawning engine behind the session. */
  runner?: CommandRunner;
  launchEditor?: EditorLauncher;
  startTui?: (options: TuiOptions) => Promise<void>;
};

type CliContext = {
  args: ParsedCliArgs;
  config: ToolConfig;
  io: ResolvedCliIo;
  deps: CliDependencies;
  env: NodeJS.ProcessEnv;
};

function createCliLogger({ args, config }: CliContext): Logger {
  return createLogger({ filePath: diagnosticsLogPath(args.projectDir), level: config.logLevel });
}

function createSession(context: CliContext, logger: Logger, minVisibleMs: number): CommandSession {
  const { args, config, deps } = context;
  return new CommandSession({
    projectDir: args.projectDir,
    logger,
    policy: { trustedConfigSource: config.trustedConfigSource },
    minVisibleMs,
    logRetention: config.logRetention,
    supervisor: new ExecutionSupervisor(deps.runner ? { runner: deps.runner } : {}),
  });
}

async function runToCompletion(
  session: CommandSession,
  spec: CommandSpec,
  tickMs: number,
): Promise<CommandOutcome> {
  await session.start(spec);
  for (;;) {
    const outcome = await session.poll();
    if (outcome) {
      return outcome;
    }
    await delay(tickMs);
  }
}

async function listCommand({ args, io }: CliContext): Promise<void> {
  const project = await loadProjectCommands(args.projectDir);
  io.stdout(chalk.bold(project.name));
  for (const command of project.commands) {
    io.stdout(formatCommandRow(command));
  }
}

async function logsCommand({ args, config, io }: CliContext): Promise<void> {
  const logs = await listRecentLogs(args.projectDir, args.limit ?? config.recentLogLimit);
  if (logs.length === 0) {
    io.stdout('No command logs yet.');
    return;
  }
  for (const log of logs) {
    io.stdout(formatLogEntry(log));
  }
}

async function runCommand(context: CliContext): Promise<void> {
  const { args, config, io } = context;
  if (!args.target) {
    throw new CliUsageError('run expects a command name');
  }

  const project = await loadProjectCommands(args.projectDir);
  const command = project.commands.find((candidate) => candidate.name === args.target);
  if (!command) {
    throw new CliUsageError(`No command named "${args.target}" in ${project.configPath}`);
  }

  const logger = createCliLogger(context);
  const session = createSession(context, logger, 0);
  const outcome = await runToCompletion(session, toCommandSpec(command, args.projectDir), config.tickMs);
  printOutcome(outcome, outcome.result.success ? io.stdout : io.stderr);
  if (!outcome.result.success) {
    process.exitCode = 1;
  }
}

async function editCommand(context: CliContext): Promise<void> {
  const { args, deps, env } = context;
  const filePath = path.resolve(args.projectDir, args.target ?? PROJECT_CONFIG_FILE);
  const saved = await openInEditor(filePath, {
    projectDir: args.projectDir,
    logger: createCliLogger(context),
    env,
    ...(deps.launchEditor ? { launch: deps.launchEditor } : {}),
  });
  if (!saved) {
    process.exitCode = 1;
  }
}

async function tuiCommand(context: CliContext): Promise<void> {
  const { args, config, deps, env } = context;
  const logger = createCliLogger(context);
  const startTui = deps.startTui ?? runTui;
  await startTui({
    projectDir: args.projectDir,
    session: createSession(context, logger, config.minVisibleMs),
    logger,
    tickMs: config.tickMs,
    env,
    ...(deps.launchEditor ? { launchEditor: deps.launchEditor } : {}),
  });
}

function isReportedError(error: unknown): error is Error {
  return (
    error instanceof CliUsageError ||
    error instanceof ConfigError ||
    error instanceof CommandValidationError ||
    error instanceof BusyError ||
    error instanceof SpawnError
  );
}

export async function runCli(
  argv: string[] = process.argv,
  io?: CliIo,
  deps: CliDependencies = {},
): Promise<void> {
  const resolvedIo = resolveIo(io);
  const env = deps.env ?? process.env;

  try {
    const args = parseCliArgs(argv, deps.cwd);
    if (args.command === 'help') {
      resolvedIo.stdout(USAGE);
      return;
    }

    const context: CliContext = { args, config: loadToolConfig({ env }), io: resolvedIo, deps, env };
    switch (args.command) {
      case 'list':
        await listCommand(context);
        return;
      case 'logs':
        await logsCommand(context);
        return;
      case 'run':
        await runCommand(context);
        return;
      case 'edit':
        await editCommand(context);
        return;
      case 'tui':
      default:
        await tuiCommand(context);
    }
  } catch (error: unknown) {
    process.exitCode = 1;
    if (isReportedError(error)) {
      resolvedIo.stderr(chalk.red(error.message));
      if (error instanceof CliUsageError) {
        resolvedIo.stderr(USAGE);
      }
      return;
    }
    throw error;
  }
}
