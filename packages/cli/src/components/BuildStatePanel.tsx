import { Box, Text } from 'ink';
import type { ReactElement } from 'react';
import { BuildStatus, type BuildStateRecord } from '@devdeck/core';

import { formatBuildState } from '../render.js';

const STATUS_COLORS: Record<BuildStatus, string> = {
  [BuildStatus.Success]: 'green',
  [BuildStatus.Failed]: 'red',
  [BuildStatus.Running]: 'yellow',
};

export function BuildStatePanel({ record }: { record: BuildStateRecord | null }): ReactElement {
  return (
    <Box marginTop={1}>
      <Text color={record ? STATUS_COLORS[record.status] : 'gray'}>{formatBuildState(record)}</Text>
    </Box>
  );
}

export default BuildStatePanel;
