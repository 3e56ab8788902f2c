/**
 * Public entry for `@devdeck/core`: command specs, policy validation, the
 * execution engine, the background supervisor with its animation gate, and
 * log/state persistence.
 */

export * from './src/constants.js';
export * from './src/contracts/command.js';
export * from './src/contracts/errors.js';

export {
  CommandBuilder,
  getShellScript,
  isShellProgram,
  SHELL_COMMAND_FLAG,
  SHELL_PROGRAM,
} from './src/commands/commandBuilder.js';
export { runCaptured, runInteractive, runStatusOnly } from './src/commands/run.js';

export {
  DEFAULT_COMMAND_POLICY,
  assertValidCommandSpec,
  validateCommandSpec,
  type CommandPolicy,
} from './src/services/commandPolicy/commandValidator.js';
export {
  DIRECT_ALLOWLIST,
  EDITOR_ALLOWLIST,
  isAllowlisted,
  isAllowlistedEditor,
} from './src/services/commandPolicy/allowlist.js';
export { categorizeCommand, categoryLogDirectory } from './src/services/commandCategorizer.js';
export {
  commandLogRoot,
  listRecentLogs,
  pruneCategoryLogs,
  writeCommandLog,
  type CommandLogFile,
  type CommandLogOptions,
} from './src/services/commandLogWriter.js';
export {
  buildStatePath,
  loadBuildState,
  markBuildAbandoned,
  markBuildRunning,
  resolveBuildTask,
  saveBuildState,
  updateBuildState,
} from './src/services/buildStateService.js';

export { AnimationGate, type AnimationGateState } from './src/execution/animationGate.js';
export {
  ExecutionSupervisor,
  type CommandRunner,
  type PendingExecution,
} from './src/execution/executionSupervisor.js';
export {
  CommandSession,
  type CommandOutcome,
  type CommandSessionOptions,
} from './src/execution/commandSession.js';

export {
  loadToolConfig,
  resolveToolConfigPath,
  type ToolConfig,
} from './src/config/toolConfig.js';
export {
  COMMAND_FILTERS,
  filterProjectCommands,
  loadProjectCommands,
  nextCommandFilter,
  projectConfigPath,
  toCommandSpec,
  type CommandFilter,
  type LoadedProject,
  type ProjectCommand,
} from './src/config/projectCommands.js';

export { createLogger, diagnosticsLogPath, type Logger, type LogLevel } from './src/utils/logger.js';
export { buildEditorCommand, resolveDefaultEditor } from './src/utils/editor.js';
export { tailLines } from './src/utils/text.js';
export { formatTimestamp } from './src/utils/time.js';
