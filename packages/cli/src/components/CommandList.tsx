import { Box, Text } from 'ink';
import type { ReactElement } from 'react';
import { COMMAND_FILTERS, type CommandFilter, type ProjectCommand } from '@devdeck/core';

type CommandListProps = {
  commands: readonly ProjectCommand[];
  filter: CommandFilter;
  selectedIndex: number;
};

function FilterTabs({ active }: { active: CommandFilter }): ReactElement {
  return (
    <Box>
      {COMMAND_FILTERS.map((filter) =>
        filter === active ? (
          <Text key={filter} color="cyan" bold>
            [{filter}]{' '}
          </Text>
        ) : (
          <Text key={filter} dimColor>
            {filter}{' '}
          </Text>
        ),
      )}
    </Box>
  );
}

export function CommandList({ commands, filter, selectedIndex }: CommandListProps): ReactElement {
  return (
    <Box flexDirection="column" marginTop={1}>
      <FilterTabs active={filter} />
      {commands.length === 0 ? <Text dimColor>No commands in this category.</Text> : null}
      {commands.map((command, index) => {
        const selected = index === selectedIndex;
        return (
          <Box key={`${command.source}:${command.name}`}>
            <Text color={selected ? 'cyan' : undefined}>{selected ? '❯ ' : '  '}</Text>
            <Text bold={selected}>{command.name}</Text>
            {command.command !== command.name ? <Text dimColor>{`  ${command.command}`}</Text> : null}
          </Box>
        );
      })}
    </Box>
  );
}

export default CommandList;
