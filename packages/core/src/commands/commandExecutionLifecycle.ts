import { spawn } from 'node:child_process';

import { SpawnError } from '../contracts/errors.js';
import type { CommandExecutionState, ExecutionOutcome } from './commandExecutionTypes.js';

export function startExecution(state: CommandExecutionState): void {
  try {
    state.child = spawn(state.spec.program, [...state.spec.args], state.spawnOptions);
  } catch (error) {
    fail(state, error);
    return;
  }

  attachOutputListeners(state);
  attachChildListeners(state);
}

function attachOutputListeners(state: CommandExecutionState): void {
  const { child } = state;
  if (!child) {
    return;
  }

  child.stdout?.on('data', (chunk: Buffer | string) => {
    state.stdoutChunks.push(toBuffer(chunk));
  });
  child.stderr?.on('data', (chunk: Buffer | string) => {
    state.stderrChunks.push(toBuffer(chunk));
  });
}

function attachChildListeners(state: CommandExecutionState): void {
  const { child } = state;
  if (!child) {
    return;
  }

  child.once('spawn', () => {
    state.spawned = true;
  });

  child.on('error', (error) => {
    if (state.settled) {
      return;
    }
    // Errors before `spawn` mean the program never started.
    if (!state.spawned) {
      fail(state, error);
      return;
    }
    state.stderrExtras = appendLine(state.stderrExtras, error.message);
  });

  child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
    complete(state, code, signal);
  });
}

function complete(
  state: CommandExecutionState,
  code: number | null,
  signal: NodeJS.Signals | null,
): void {
  let stderr = decode(state.stderrChunks);
  if (state.stderrExtras) {
    stderr = appendLine(stderr, state.stderrExtras);
  }

  finalize(state, {
    exitCode: code,
    signal,
    stdout: decode(state.stdoutChunks),
    stderr,
    startedAt: state.startTime,
    durationMs: Date.now() - state.startTime,
  });
}

function finalize(state: CommandExecutionState, outcome: ExecutionOutcome): void {
  if (state.settled) {
    return;
  }

  state.settled = true;
  if (state.resolve) {
    state.resolve(outcome);
    state.resolve = null;
  }
  state.reject = null;
}

function fail(state: CommandExecutionState, cause: unknown): void {
  if (state.settled) {
    return;
  }

  state.settled = true;
  if (state.reject) {
    state.reject(new SpawnError(state.spec.program, cause));
    state.reject = null;
  }
  state.resolve = null;
}

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
}

// Invalid UTF-8 sequences decode to U+FFFD rather than failing.
function decode(chunks: Buffer[]): string {
  return chunks.length === 0 ? '' : Buffer.concat(chunks).toString('utf8');
}

export function appendLine(existing: string, addition: string): string {
  if (!addition) {
    return existing;
  }
  if (!existing) {
    return addition;
  }
  return existing.endsWith('\n') ? `${existing}${addition}` : `${existing}\n${addition}`;
}
