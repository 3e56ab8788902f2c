import { useCallback, useEffect, useMemo, useRef, useState, type ReactElement } from 'react';
import { Box, Text, useInput } from 'ink';
import {
  filterProjectCommands,
  loadBuildState,
  nextCommandFilter,
  toCommandSpec,
  type BuildStateRecord,
  type CommandFilter,
  type CommandOutcome,
  type CommandSession,
  type CommandSpec,
  type ProjectCommand,
} from '@devdeck/core';

import { describeOutcome, formatOutcomeDetails } from '../render.js';
import BuildStatePanel from './BuildStatePanel.js';
import CommandList from './CommandList.js';
import StatusMessage, { type StatusPayload } from './StatusMessage.js';
import ThinkingIndicator from './ThinkingIndicator.js';

export type CliAppProps = {
  projectName: string;
  projectDir: string;
  commands: readonly ProjectCommand[];
  session: CommandSession;
  /** Poll interval while a command runs. */
  tickMs: number;
  initialStatus?: StatusPayload | null;
  onEdit: () => void;
  onExit: () => void;
};

const KEY_HINTS = 'tab filter · ↑/↓ select · enter run · e edit config · q quit';

function describeError(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return String(error);
}

function outcomeStatus(outcome: CommandOutcome): StatusPayload {
  return {
    level: outcome.result.success ? 'success' : 'error',
    message: describeOutcome(outcome),
    details: formatOutcomeDetails(outcome),
  };
}

function CliApp({
  projectName,
  projectDir,
  commands,
  session,
  tickMs,
  initialStatus = null,
  onEdit,
  onExit,
}: CliAppProps): ReactElement {
  const [filter, setFilter] = useState<CommandFilter>('All');
  const [selectedIndex, setSelectedIndex] = useState(0);
  const [running, setRunning] = useState<CommandSpec | null>(() => session.runningCommand());
  const [elapsedMs, setElapsedMs] = useState(0);
  const [status, setStatus] = useState<StatusPayload | null>(initialStatus);
  const [buildState, setBuildState] = useState<BuildStateRecord | null>(null);
  const mountedRef = useRef(true);
  const pollingRef = useRef(false);

  const visible = useMemo(() => filterProjectCommands(commands, filter), [commands, filter]);

  const refreshBuildState = useCallback(() => {
    void loadBuildState(projectDir).then((record) => {
      if (mountedRef.current) {
        setBuildState(record);
      }
    });
  }, [projectDir]);

  useEffect(() => {
    mountedRef.current = true;
    refreshBuildState();
    return () => {
      mountedRef.current = false;
    };
  }, [refreshBuildState]);

  useEffect(() => {
    if (!running) {
      return undefined;
    }

    const handle = setInterval(() => {
      setElapsedMs(session.elapsedMs());
      if (pollingRef.current) {
        return;
      }
      pollingRef.current = true;
      void session
        .poll()
        .then((outcome) => {
          if (!outcome || !mountedRef.current) {
            return;
          }
          setRunning(null);
          setStatus(outcomeStatus(outcome));
          if (outcome.buildStatus) {
            refreshBuildState();
          }
        })
        .catch((error: unknown) => {
          if (mountedRef.current) {
            setRunning(null);
            setStatus({ level: 'error', message: describeError(error) });
          }
        })
        .finally(() => {
          pollingRef.current = false;
        });
    }, tickMs);

    return () => {
      clearInterval(handle);
    };
  }, [running, session, tickMs, refreshBuildState]);

  const startCommand = useCallback(
    (command: ProjectCommand) => {
      const spec = toCommandSpec(command, projectDir);
      void session
        .start(spec)
        .then(() => {
          if (!mountedRef.current) {
            return;
          }
          setElapsedMs(0);
          setStatus(null);
          setRunning(spec);
          refreshBuildState();
        })
        .catch((error: unknown) => {
          if (mountedRef.current) {
            setStatus({ level: 'error', message: describeError(error) });
          }
        });
    },
    [projectDir, session, refreshBuildState],
  );

  useInput((input, key) => {
    if (key.tab) {
      setFilter((current) => nextCommandFilter(current));
      setSelectedIndex(0);
      return;
    }

    if (key.upArrow) {
      setSelectedIndex((index) => Math.max(0, index - 1));
      return;
    }

    if (key.downArrow) {
      setSelectedIndex((index) => Math.min(Math.max(0, visible.length - 1), index + 1));
      return;
    }

    if (key.return) {
      const command = visible[selectedIndex];
      if (command) {
        startCommand(command);
      }
      return;
    }

    if (input === 'e') {
      if (session.isRunning()) {
        setStatus({ level: 'warn', message: 'Wait for the running command to finish before editing.' });
        return;
      }
      onEdit();
      return;
    }

    if (input === 'q' || key.escape) {
      session.abandon();
      onExit();
    }
  });

  return (
    <Box flexDirection="column">
      <Text bold>{projectName}</Text>
      <CommandList commands={visible} filter={filter} selectedIndex={selectedIndex} />
      <BuildStatePanel record={buildState} />
      <ThinkingIndicator active={running !== null} label={running?.display ?? ''} elapsedMs={elapsedMs} />
      <StatusMessage status={status} />
      <Box marginTop={1}>
        <Text dimColor>{KEY_HINTS}</Text>
      </Box>
    </Box>
  );
}

export default CliApp;
