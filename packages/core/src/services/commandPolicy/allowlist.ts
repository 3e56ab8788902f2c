/**
 * Static program allow-lists consulted by the command validator. They are
 * not editable at runtime. Shells are not listed; the validator checks the
 * script they run.
 */

export const DIRECT_ALLOWLIST: readonly string[] = Object.freeze([
  // package managers and runtimes
  'npm',
  'npx',
  'node',
  'pnpm',
  'yarn',
  'bun',
  'cargo',
  'go',
  'python',
  'python3',
  // compilers and formatters
  'rustc',
  'rustfmt',
  'clippy-driver',
  'gofmt',
  'tsc',
  'make',
  'cmake',
  // version control
  'git',
  // lookup
  'which',
  // editors
  'vim',
  'nvim',
  'vi',
  'nano',
  'emacs',
]);

export const EDITOR_ALLOWLIST: readonly string[] = Object.freeze(['vim', 'nvim', 'vi', 'nano', 'emacs']);

export function isAllowlisted(program: string, list: readonly string[] = DIRECT_ALLOWLIST): boolean {
  const normalized = program.trim();
  if (!normalized) {
    return false;
  }
  return list.includes(normalized);
}

export function isAllowlistedEditor(program: string): boolean {
  return isAllowlisted(program, EDITOR_ALLOWLIST);
}
