import { CommandCategory } from '../contracts/command.js';
import { stripCdPrefix } from './commandPolicy/shellCommand.js';

// Order matters: the first category with a matching keyword wins.
const KEYWORD_RULES: ReadonlyArray<readonly [CommandCategory, readonly string[]]> = [
  [CommandCategory.Test, ['test', 'spec', 'coverage', 'bench']],
  [CommandCategory.Build, ['build', 'compile', 'bundle', 'dev', 'run', 'start', 'watch', 'serve']],
  [CommandCategory.Lint, ['lint', 'fmt', 'format', 'clippy', 'check', 'prettier', 'eslint']],
];

/**
 * Classifies command text by substring keywords after one `cd <dir> &&`
 * prefix is removed. Git only applies when nothing else matched and the
 * remaining text starts with `git `.
 */
export function categorizeCommand(commandText: string): CommandCategory {
  const stripped = stripCdPrefix(commandText.toLowerCase()).trimStart();

  for (const [category, keywords] of KEYWORD_RULES) {
    if (keywords.some((keyword) => stripped.includes(keyword))) {
      return category;
    }
  }

  if (stripped.startsWith('git ')) {
    return CommandCategory.Git;
  }

  return CommandCategory.Other;
}

export function categoryLogDirectory(category: CommandCategory | string): string {
  const normalized = category.trim().toLowerCase().replace(/[^a-z0-9-]/g, '');
  return normalized || 'other';
}

export default {
  categorizeCommand,
  categoryLogDirectory,
};
