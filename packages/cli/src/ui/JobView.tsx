import React from 'react';
import { Box, Text } from 'ink';
import type { JobViewState } from './state/job-view.js';
import { StageIndicator } from './components/StageIndicator.js';
import { CandidateProgress } from './components/CandidateProgress.js';
import { ReportTable } from './components/ReportTable.js';
import { ScorePlot } from './components/ScorePlot.js';
import { formatProgress } from './format.js';

interface JobViewProps {
  state: JobViewState;
}

export function JobView({ state }: JobViewProps) {
  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <StageIndicator current={state.state} running={!state.done} />

      {state.baseline && (
        <Box marginBottom={1}>
          <Text color="yellow">Baseline: </Text>
          <Text>{formatProgress(state.baseline)}</Text>
        </Box>
      )}

      {state.candidates.size > 0 && (
        <Box flexDirection="column" marginBottom={1}>
          <Text bold color="yellow">Candidates:</Text>
          {Array.from(state.candidates.values()).map((candidate) => (
            <CandidateProgress key={candidate.key} candidate={candidate} />
          ))}
        </Box>
      )}

      {state.report && <ReportTable report={state.report} />}
      {state.report && <ScorePlot plot={state.report.plot} />}

      {state.error && (
        <Box marginTop={1}>
          <Text color="red" bold>Error: {state.error}</Text>
        </Box>
      )}
    </Box>
  );
}
