import React from 'react';
import { Text, Box } from 'ink';
import type { CandidateView } from '../state/job-view.js';
import { formatProgress } from '../format.js';

const ICONS: Record<CandidateView['state'], string> = {
  QUEUED: '○',
  EVAL_PRE: '▶',
  CUSTOMIZING: '⚙',
  EVAL_POST: '▶',
  DONE: '✓',
  FAILED: '✗',
};

function colorFor(state: CandidateView['state']): string {
  if (state === 'DONE') return 'green';
  if (state === 'FAILED') return 'red';
  if (state === 'QUEUED') return 'gray';
  return 'cyan';
}

export function CandidateProgress({ candidate }: { candidate: CandidateView }) {
  const color = colorFor(candidate.state);
  const detail =
    candidate.state === 'EVAL_PRE'
      ? formatProgress(candidate.pre)
      : candidate.state === 'EVAL_POST'
        ? formatProgress(candidate.post)
        : candidate.state === 'CUSTOMIZING' && candidate.customization
          ? `${candidate.customization.externalJobId} ${candidate.customization.state.toLowerCase()}`
          : '';

  return (
    <Box>
      <Text color={color}>{ICONS[candidate.state]} </Text>
      <Text>{candidate.key.padEnd(30)}</Text>
      <Text color={color}>{candidate.state}</Text>
      {detail && <Text color="gray"> {detail}</Text>}
    </Box>
  );
}
