import React from 'react';
import { Text, Box } from 'ink';
import type { ComparisonPlot } from '@flywheel/core';
import { renderBarPlot } from '../../formatters/plot.js';

export function ScorePlot({ plot }: { plot: ComparisonPlot }) {
  return (
    <Box flexDirection="column" marginBottom={1}>
      {renderBarPlot(plot, 24).map((line, index) => (
        <Text key={index} color={index === 0 ? 'yellow' : undefined}>
          {line}
        </Text>
      ))}
    </Box>
  );
}
