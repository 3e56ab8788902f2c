/**
 * Plain-text formatting shared by the one-shot subcommands and the Ink views.
 * Functions that return colored strings are only used for stdout output.
 */

import chalk from 'chalk';
import {
  CommandCategory,
  formatTimestamp,
  tailLines,
  type BuildStateRecord,
  type CommandLogFile,
  type CommandOutcome,
  type ProjectCommand,
} from '@devdeck/core';

export const OUTPUT_TAIL_LINES = 10;

export const USAGE = [
  'Usage: devdeck [command] [options]',
  '',
  'Commands:',
  '  tui               Open the interactive command deck (default)',
  '  list              Print the commands defined in devdeck.json',
  '  run <name>        Run one command and record its log',
  '  logs              Show the most recent command logs',
  '  edit [file]       Open a file (default devdeck.json) in your editor',
  '',
  'Options:',
  '  --cwd <dir>       Project directory (default: current directory)',
  '  --limit <n>       Number of logs shown by `logs`',
  '  -h, --help        Show this help',
].join('\n');

const CATEGORY_COLORS: Record<CommandCategory, (value: string) => string> = {
  [CommandCategory.Build]: chalk.blue,
  [CommandCategory.Test]: chalk.magenta,
  [CommandCategory.Lint]: chalk.yellow,
  [CommandCategory.Git]: chalk.green,
  [CommandCategory.Other]: chalk.gray,
};

export function formatDuration(durationMs: number): string {
  if (durationMs < 1000) {
    return `${durationMs}ms`;
  }
  return `${(durationMs / 1000).toFixed(1)}s`;
}

export function formatCommandRow(command: ProjectCommand): string {
  const category = CATEGORY_COLORS[command.category](command.category.padEnd(5));
  const suffix = command.command !== command.name ? `  ${chalk.dim(command.command)}` : '';
  return `${category}  ${chalk.bold(command.name)}${suffix}`;
}

export function describeOutcome(outcome: CommandOutcome): string {
  const { result } = outcome;
  if (result.spawnError) {
    return `✖ ${result.spawnError}`;
  }
  const symbol = result.success ? '✔' : '✖';
  return `${symbol} ${result.commandDisplay} exited with ${result.exitCode} in ${formatDuration(result.durationMs)}`;
}

/**
 * Output tail (failures only), log location and recorded build status.
 */
export function formatOutcomeDetails(outcome: CommandOutcome, lines: number = OUTPUT_TAIL_LINES): string {
  const { result } = outcome;
  const details: string[] = [];

  if (!result.success && !result.spawnError) {
    const output = result.stderr.trim() ? result.stderr : result.stdout;
    if (output.trim()) {
      details.push(tailLines(output, lines));
    }
  }

  details.push(outcome.logPath ? `Log: ${outcome.logPath}` : 'Log could not be written');
  if (outcome.buildStatus) {
    details.push(`Build state: ${outcome.buildStatus}`);
  }
  return details.join('\n');
}

export function formatBuildState(record: BuildStateRecord | null): string {
  if (!record) {
    return 'No build recorded';
  }
  const at = formatTimestamp(new Date(record.timestamp * 1000));
  return `Last build: ${record.status} (${record.task}) at ${at}`;
}

export function formatLogEntry(log: CommandLogFile): string {
  return `${formatTimestamp(log.modifiedAt)}  ${log.category.padEnd(6)}  ${log.path}`;
}

export function printOutcome(outcome: CommandOutcome, write: (message: string) => void): void {
  const colorize = outcome.result.success ? chalk.green : chalk.red;
  write(colorize(describeOutcome(outcome)));
  write(chalk.dim(formatOutcomeDetails(outcome)));
}
