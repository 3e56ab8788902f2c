import type { ReactElement } from 'react';
import { Box, Text } from 'ink';
import Spinner from 'ink-spinner';

import { formatElapsed } from '../thinking.js';

type ThinkingIndicatorProps = {
  active: boolean;
  label: string;
  elapsedMs: number;
};

/**
 * Spinner shown while a command runs or its result is held back.
 */
export function ThinkingIndicator({ active, label, elapsedMs }: ThinkingIndicatorProps): ReactElement | null {
  if (!active) {
    return null;
  }

  return (
    <Box marginTop={1}>
      <Text dimColor>
        <Spinner type="dots" key="spinner" /> Running {label} ({formatElapsed(elapsedMs)})
      </Text>
    </Box>
  );
}

export default ThinkingIndicator;
