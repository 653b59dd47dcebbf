import React from 'react';
import { Text, Box } from 'ink';
import type { JobState } from '@flywheel/core';
import { Spinner } from './Spinner.js';

const STAGES: Array<{ state: JobState; label: string }> = [
  { state: 'LOADING_DATA', label: 'Loading' },
  { state: 'BASELINE_EVAL', label: 'Baseline' },
  { state: 'PER_CANDIDATE', label: 'Candidates' },
  { state: 'AGGREGATING', label: 'Scoring' },
];

interface StageIndicatorProps {
  current: JobState | null;
  running: boolean;
}

export function StageIndicator({ current, running }: StageIndicatorProps) {
  const currentIndex = current === 'COMPLETE' ? STAGES.length : STAGES.findIndex((s) => s.state === current);
  const failed = current === 'FAILED';

  return (
    <Box marginBottom={1}>
      {STAGES.map((stage, index) => {
        const isActive = index === currentIndex;
        const isDone = index < currentIndex;
        if (isActive && running) {
          return (
            <Box key={stage.state} marginRight={2}>
              <Spinner label={stage.label} />
            </Box>
          );
        }
        const icon = isDone ? '✓' : isActive ? '▶' : '○';
        const color = isDone ? 'green' : isActive ? 'cyan' : 'gray';
        return (
          <Box key={stage.state} marginRight={2}>
            <Text color={color}>
              {icon} {stage.label}
            </Text>
          </Box>
        );
      })}
      {failed && <Text color="red" bold>✗ Failed</Text>}
    </Box>
  );
}
