import { Box, Text } from 'ink';
import type { ReactElement } from 'react';

export type StatusLevel = 'warn' | 'error' | 'success' | 'info';

export type StatusPayload = {
  level?: StatusLevel;
  message: string;
  details?: string;
};

function resolveColor(level: StatusLevel | undefined): string | undefined {
  switch (level) {
    case 'warn':
      return 'yellow';
    case 'error':
      return 'red';
    case 'success':
      return 'green';
    default:
      return undefined;
  }
}

/**
 * One colored status line with optional dimmed details underneath.
 */
function StatusMessage({ status }: { status?: StatusPayload | null }): ReactElement | null {
  if (!status || !status.message) {
    return null;
  }

  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={resolveColor(status.level)}>{status.message}</Text>
      {status.details ? <Text dimColor>{status.details}</Text> : null}
    </Box>
  );
}

export default StatusMessage;
