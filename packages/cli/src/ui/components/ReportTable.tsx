import React from 'react';
import { Text, Box } from 'ink';
import type { ReportArtifact } from '@flywheel/core';
import { formatDelta, formatScore } from '../format.js';

export function ReportTable({ report }: { report: ReportArtifact }) {
  return (
    <Box flexDirection="column" marginY={1}>
      <Text bold color="yellow">
        Baseline {report.baseline.modelIdentifier}: {formatScore(report.baseline.aggregateScore)}
      </Text>
      {report.candidates.map((c) => {
        const recommended = c.key === report.recommendation;
        return (
          <Box key={c.key}>
            <Text>{recommended ? '★ ' : '  '}</Text>
            <Text bold={recommended}>{c.key.padEnd(30)}</Text>
            <Text color="gray">pre {formatScore(c.pre?.aggregateScore)} </Text>
            <Text color="gray">post {formatScore(c.post?.aggregateScore)} </Text>
            <Text color={c.promotable ? 'green' : 'red'}>{formatDelta(c.deltaPost ?? c.deltaPre)}</Text>
            {c.status !== 'complete' && <Text color="yellow"> ({c.status})</Text>}
          </Box>
        );
      })}
      <Text>
        Recommendation: <Text bold color="green">{report.recommendation ?? 'none'}</Text>
      </Text>
    </Box>
  );
}
