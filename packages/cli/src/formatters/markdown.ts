import type { CandidateReport, ReportArtifact } from '@flywheel/core';
import { formatDelta, formatScore } from '../ui/format.js';
import type { OutputFormatter } from './formatter.js';
import { renderBarPlot } from './plot.js';

function candidateRow(c: CandidateReport): string {
  const cells = [
    c.key,
    String(c.config.computeUnitCount),
    c.status,
    formatScore(c.pre?.aggregateScore),
    formatScore(c.post?.aggregateScore),
    formatDelta(c.deltaPre),
    formatDelta(c.deltaPost),
    c.promotable ? 'yes' : 'no',
  ];
  return `| ${cells.join(' | ')} |`;
}

export class MarkdownFormatter implements OutputFormatter {
  formatReport(report: ReportArtifact): string {
    const lines = [
      `# Flywheel Report: ${report.workloadId}`,
      '',
      `**Job:** ${report.jobId}  `,
      `**Client:** ${report.clientId}  `,
      `**Baseline:** ${report.baseline.modelIdentifier} (${formatScore(report.baseline.aggregateScore)} over ${report.baseline.recordCount} records)  `,
      `**Tolerance:** ${report.tolerance}  `,
      `**Generated:** ${report.generatedAt}`,
      '',
      '## Candidates',
      '',
      '| Candidate | GPUs | Status | Pre | Post | Delta pre | Delta post | Promotable |',
      '|---|---|---|---|---|---|---|---|',
      ...report.candidates.map(candidateRow),
      '',
      `**Recommendation:** ${report.recommendation ?? 'none, no candidate is within tolerance of the baseline'}`,
    ];

    const issues = report.candidates.flatMap((c) =>
      c.issues.map((issue) => `- **${c.key}** \`${issue.code}\` in ${issue.stage}: ${issue.message}`),
    );
    if (issues.length > 0) {
      lines.push('', '## Issues', '', ...issues);
    }

    lines.push('', '## Scores', '', '```text', ...renderBarPlot(report.plot), '```');
    return lines.join('\n');
  }

  formatError(error: string): string {
    return `## Error\n\n${error}`;
  }
}
