import { ExecutionMode, type CommandSpec } from '../contracts/command.js';

export const SHELL_PROGRAM = 'sh';
export const SHELL_COMMAND_FLAG = '-c';

/**
 * Fluent builder for `CommandSpec`. Each `build()` call returns a frozen
 * snapshot, so a builder can be reused to derive variants.
 */
export class CommandBuilder {
  private readonly program: string;

  private readonly argv: string[] = [];

  private readonly envVars: Record<string, string> = {};

  private cwd: string | undefined;

  private executionMode: ExecutionMode = ExecutionMode.Captured;

  private category: string | undefined;

  private name: string | undefined;

  private timeoutMs: number | undefined;

  private displayText: string | undefined;

  private constructor(program: string) {
    this.program = program.trim();
  }

  static command(program: string): CommandBuilder {
    return new CommandBuilder(program);
  }

  /**
   * Run `text` through `sh -c`. Used for developer-authored command strings
   * that may chain steps or redirect output.
   */
  static shell(text: string): CommandBuilder {
    const builder = new CommandBuilder(SHELL_PROGRAM);
    builder.argv.push(SHELL_COMMAND_FLAG, text);
    builder.displayText = text.trim();
    return builder;
  }

  static git(subcommand: string, ...rest: string[]): CommandBuilder {
    return new CommandBuilder('git').arg(subcommand).args(rest);
  }

  arg(value: string): this {
    this.argv.push(value);
    return this;
  }

  args(values: readonly string[]): this {
    this.argv.push(...values);
    return this;
  }

  workingDir(dir: string): this {
    this.cwd = dir;
    return this;
  }

  env(key: string, value: string): this {
    this.envVars[key] = value;
    return this;
  }

  mode(mode: ExecutionMode): this {
    this.executionMode = mode;
    return this;
  }

  logAs(category: string): this {
    this.category = category;
    return this;
  }

  label(name: string): this {
    this.name = name;
    return this;
  }

  timeout(ms: number): this {
    this.timeoutMs = ms;
    return this;
  }

  display(text: string): this {
    this.displayText = text;
    return this;
  }

  build(): CommandSpec {
    const display = this.displayText ?? [this.program, ...this.argv].join(' ').trim();

    const spec: CommandSpec = {
      program: this.program,
      args: Object.freeze([...this.argv]),
      env: Object.freeze({ ...this.envVars }),
      mode: this.executionMode,
      display,
      ...(this.cwd !== undefined ? { workingDir: this.cwd } : {}),
      ...(this.category !== undefined ? { logCategory: this.category } : {}),
      ...(this.name !== undefined ? { label: this.name } : {}),
      ...(this.timeoutMs !== undefined ? { timeoutMs: this.timeoutMs } : {}),
    };

    return Object.freeze(spec);
  }
}

const SHELL_OPTION_CLUSTER = /^[-+][A-Za-z]+$/;

/**
 * Returns the script a shell program runs, otherwise null. The script
 * flag may sit in a cluster (`-lc`, `-ec`); the script is the first
 * operand after the options. A shell started without one (`sh build.sh`)
 * yields null.
 */
export function getShellScript(spec: CommandSpec): string | null {
  if (!isShellProgram(spec.program)) {
    return null;
  }

  let hasScriptFlag = false;
  for (let index = 0; index < spec.args.length; index += 1) {
    const arg = spec.args[index] ?? '';
    if (arg === '--') {
      return hasScriptFlag ? spec.args[index + 1] ?? '' : null;
    }
    if (!SHELL_OPTION_CLUSTER.test(arg)) {
      return hasScriptFlag ? arg : null;
    }
    if (arg.startsWith('-') && arg.includes('c')) {
      hasScriptFlag = true;
    }
  }

  return hasScriptFlag ? '' : null;
}

export function isShellProgram(program: string): boolean {
  return program === 'sh' || program === 'bash';
}

export default {
  CommandBuilder,
  getShellScript,
  isShellProgram,
};
