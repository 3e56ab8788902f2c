import { shellSplit } from '../../utils/text.js';

const COMMAND_CHAIN_PATTERNS: RegExp[] = [
  /;|&&|\|\|/,
  /\|/,
  /`/,
  /\$\(/,
  /<\s*\(/,
  />\s*\(/,
  /(^|[^&])&([^&]|$)/,
];

const REDIRECTION_PATTERN = /[<>]/;
const SUDO_PREFIX = /^\s*sudo\b/;
const NEWLINE_PATTERN = /\r|\n/;

const CD_PREFIX_PATTERN = /^\s*cd\s+(?:"[^"]*"|'[^']*'|[^\s&;|]+)\s*&&\s*/;
const ENV_ASSIGNMENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*=(?:"[^"]*"|'[^']*'|[^\s]*)\s+/;
const TOKEN_TERMINATORS = /[;&|<>()]/;

/**
 * Removes exactly one leading `cd <dir> &&` prefix.
 */
export function stripCdPrefix(text: string): string {
  return text.replace(CD_PREFIX_PATTERN, '');
}

function stripEnvAssignments(text: string): string {
  let remaining = text.trimStart();
  let match = ENV_ASSIGNMENT_PATTERN.exec(remaining);
  while (match) {
    remaining = remaining.slice(match[0].length).trimStart();
    match = ENV_ASSIGNMENT_PATTERN.exec(remaining);
  }
  return remaining;
}

/**
 * First program a shell would execute for `text`, after one `cd <dir> &&`
 * prefix and any leading `NAME=value` assignments.
 */
export function firstExecutedToken(text: string): string {
  const body = stripEnvAssignments(stripCdPrefix(text));
  const [first = ''] = shellSplit(body);
  const terminator = first.search(TOKEN_TERMINATORS);
  return terminator === -1 ? first : first.slice(0, terminator);
}

/**
 * True when `text` is a single simple command: no chaining, substitution,
 * redirection, background jobs or sudo.
 */
export function isSimpleCommand(text: string): boolean {
  const trimmed = text.trim();
  if (!trimmed) {
    return false;
  }

  if (NEWLINE_PATTERN.test(trimmed)) {
    return false;
  }

  if (COMMAND_CHAIN_PATTERNS.some((pattern) => pattern.test(trimmed))) {
    return false;
  }

  if (SUDO_PREFIX.test(trimmed)) {
    return false;
  }

  return !REDIRECTION_PATTERN.test(trimmed);
}
