import { getShellScript, isShellProgram } from '../../commands/commandBuilder.js';
import { ExecutionMode, type CommandSpec } from '../../contracts/command.js';
import { CommandValidationError } from '../../contracts/errors.js';
import { isAllowlisted, isAllowlistedEditor } from './allowlist.js';
import { firstExecutedToken, isSimpleCommand } from './shellCommand.js';

export interface CommandPolicy {
  /**
   * Shell scripts come from a developer-authored project file. When true,
   * chaining and redirection are accepted; only the first executed program
   * is checked against the allow-list.
   */
  readonly trustedConfigSource: boolean;
}

export const DEFAULT_COMMAND_POLICY: CommandPolicy = Object.freeze({ trustedConfigSource: true });

function notWhitelisted(program: string): CommandValidationError {
  return new CommandValidationError(
    'NOT_WHITELISTED',
    program,
    `Command '${program}' is not whitelisted`,
  );
}

function emptyCommand(program: string): CommandValidationError {
  return new CommandValidationError('EMPTY_COMMAND', program, 'Empty command');
}

function validateEditor(spec: CommandSpec): CommandValidationError | null {
  if (!isAllowlistedEditor(spec.program)) {
    return notWhitelisted(spec.program);
  }

  const [filePath] = spec.args;
  if (spec.args.length !== 1 || !filePath || !filePath.trim() || filePath.startsWith('-')) {
    return new CommandValidationError(
      'INVALID_EDITOR_ARGUMENTS',
      spec.program,
      `Editor '${spec.program}' must be opened with exactly one file path`,
    );
  }

  return null;
}

function validateShellScript(
  spec: CommandSpec,
  script: string,
  policy: CommandPolicy,
): CommandValidationError | null {
  if (!script.trim()) {
    return emptyCommand(spec.program);
  }

  if (!policy.trustedConfigSource && !isSimpleCommand(script)) {
    return new CommandValidationError(
      'UNTRUSTED_SHELL_SYNTAX',
      spec.program,
      `Shell operators are not allowed in untrusted commands: ${script.trim()}`,
    );
  }

  const executed = firstExecutedToken(script);
  if (!executed) {
    return emptyCommand(spec.program);
  }

  return isAllowlisted(executed) ? null : notWhitelisted(executed);
}

/**
 * Checks `spec` against the allow-lists without touching the filesystem or
 * spawning anything. Returns the failure, or null when the spec may run.
 */
export function validateCommandSpec(
  spec: CommandSpec,
  policy: CommandPolicy = DEFAULT_COMMAND_POLICY,
): CommandValidationError | null {
  if (!spec.program.trim()) {
    return emptyCommand(spec.program);
  }

  if (spec.mode === ExecutionMode.Interactive) {
    return validateEditor(spec);
  }

  if (isShellProgram(spec.program)) {
    const script = getShellScript(spec);
    return script === null ? notWhitelisted(spec.program) : validateShellScript(spec, script, policy);
  }

  return isAllowlisted(spec.program) ? null : notWhitelisted(spec.program);
}

export function assertValidCommandSpec(
  spec: CommandSpec,
  policy: CommandPolicy = DEFAULT_COMMAND_POLICY,
): CommandSpec {
  const error = validateCommandSpec(spec, policy);
  if (error) {
    throw error;
  }
  return spec;
}

export default {
  validateCommandSpec,
  assertValidCommandSpec,
  DEFAULT_COMMAND_POLICY,
};
