/**
 * Shared runtime defaults for command execution and result persistence.
 *
 * Keep these values in a single module so config schemas, runtime guards,
 * and tests stay aligned when defaults change.
 */

export const TOOL_DIRECTORY = '.devdeck';
export const PROJECT_CONFIG_FILE = 'devdeck.json';

export const DEFAULT_MIN_VISIBLE_MS = 500;
export const DEFAULT_TICK_MS = 16;
export const DEFAULT_LOG_RETENTION = 20;
export const DEFAULT_RECENT_LOG_LIMIT = 10;

// Exit code reported when a process was killed by a signal or never started.
export const SIGNAL_EXIT_CODE = -1;

export const FALLBACK_EDITOR = 'vi';
export const EDITOR_CANDIDATES = ['vim', 'nano', 'vi', 'emacs'] as const;
