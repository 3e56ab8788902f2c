/**
 * Typed failures raised by the command subsystem.
 *
 * Runtime failures (non-zero exits) are not errors: they travel as
 * `CommandResult` values with `success === false`.
 */
import { errorCode, errorMessage } from '../utils/errno.js';

export type ValidationErrorCode =
  | 'NOT_WHITELISTED'
  | 'EMPTY_COMMAND'
  | 'UNTRUSTED_SHELL_SYNTAX'
  | 'INVALID_EDITOR_ARGUMENTS';

/**
 * Raised before any process exists. Always recoverable and shown verbatim.
 */
export class CommandValidationError extends Error {
  public readonly code: ValidationErrorCode;

  public readonly program: string;

  constructor(code: ValidationErrorCode, program: string, message: string) {
    super(message);
    this.name = 'CommandValidationError';
    this.code = code;
    this.program = program;
  }
}

export class SpawnError extends Error {
  public readonly code = 'SPAWN_FAILED';

  public readonly program: string;

  public readonly osCode?: string;

  constructor(program: string, cause: unknown) {
    const detail = errorMessage(cause);
    super(`Failed to start ${program}: ${detail}`);
    this.name = 'SpawnError';
    this.program = program;
    const osCode = errorCode(cause);
    if (osCode !== undefined) {
      this.osCode = osCode;
    }
  }
}

/**
 * A new command was requested while the previous result is still unconsumed.
 */
export class BusyError extends Error {
  public readonly code = 'BUSY';

  public readonly runningCommand: string;

  constructor(runningCommand: string) {
    super(`A command is already running: ${runningCommand}`);
    this.name = 'BusyError';
    this.runningCommand = runningCommand;
  }
}

export class ConfigError extends Error {
  public readonly code = 'INVALID_CONFIG';

  public readonly source: string;

  constructor(source: string, message: string) {
    super(`${source}: ${message}`);
    this.name = 'ConfigError';
    this.source = source;
  }
}
