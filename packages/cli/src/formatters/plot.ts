import type { ComparisonPlot } from '@flywheel/core';
import { formatScore } from '../ui/format.js';

const SERIES_LABEL_WIDTH = 8;

/**
 * Text rendering of a report's grouped bar plot: one block per candidate,
 * one `#` bar per series scaled to `width` over the plot's y domain.
 */
export function renderBarPlot(plot: ComparisonPlot, width = 30): string[] {
  const [low, high] = plot.yDomain;
  const span = high - low || 1;
  const lines = [plot.title];

  plot.categories.forEach((category, index) => {
    lines.push(category);
    for (const series of plot.series) {
      const value = series.values[index] ?? null;
      const label = series.name.padEnd(SERIES_LABEL_WIDTH);
      if (value === null) {
        lines.push(`  ${label} ${''.padEnd(width)} -`);
        continue;
      }
      const clamped = Math.min(Math.max(value, low), high);
      const bar = '#'.repeat(Math.round(((clamped - low) / span) * width));
      lines.push(`  ${label} ${bar.padEnd(width)} ${formatScore(value)}`);
    }
  });

  return lines;
}
