/**
 * Public entry point for the devdeck CLI package: the runner, the Ink
 * command deck and the plain-text formatters behind `list`, `run` and `logs`.
 */

export { runCli, parseCliArgs, CliUsageError, type CliDependencies, type ParsedCliArgs } from './src/runner.js';
export { runTui, type TuiOptions } from './src/runtime.js';
export { openInEditor, type EditorLauncher } from './src/editor.js';
export { createRuntimeLifecycle, type AppExit, type RuntimeLifecycle } from './src/runtimeLifecycle.js';
export {
  USAGE,
  describeOutcome,
  formatBuildState,
  formatCommandRow,
  formatDuration,
  formatLogEntry,
  formatOutcomeDetails,
} from './src/render.js';
export { formatElapsed } from './src/thinking.js';
export { default as CliApp, type CliAppProps } from './src/components/CliApp.js';
