/**
 * Text helpers shared by the command policy, the log writer and the CLI.
 */

const SHELL_SPLIT_PATTERN = /"([^"\\]*(?:\\.[^"\\]*)*)"|'([^'\\]*(?:\\.[^'\\]*)*)'|\S+/g;

/**
 * Minimal shell-style word splitter. Quotes group words; escapes inside
 * quotes are kept verbatim.
 */
export function shellSplit(str: string): string[] {
  SHELL_SPLIT_PATTERN.lastIndex = 0; // reset global regex state between invocations
  const out: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = SHELL_SPLIT_PATTERN.exec(str))) {
    out.push(match[1] ?? match[2] ?? match[0]);
  }
  return out;
}

export function tailLines(text: string, lines?: number | null): string {
  if (!lines) return text;
  const allLines = text.replace(/\n+$/, '').split('\n');
  return allLines.slice(-lines).join('\n');
}

const textUtils = {
  shellSplit,
  tailLines,
};

export default textUtils;
