import React from 'react';
import { Box, Text } from 'ink';
import type { JobViewState } from './state/job-view.js';
import { JobView } from './JobView.js';

interface AppProps {
  state: JobViewState;
  workloadId: string;
  clientId: string;
}

export function App({ state, workloadId, clientId }: AppProps) {
  return (
    <Box flexDirection="column">
      <Box paddingX={2}>
        <Text bold color="cyan">Flywheel</Text>
        <Text color="gray"> {workloadId}/{clientId}</Text>
        {state.jobId && <Text color="gray"> job {state.jobId}</Text>}
      </Box>
      <JobView state={state} />
    </Box>
  );
}
