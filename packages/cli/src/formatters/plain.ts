import type { ReportArtifact } from '@flywheel/core';
import { formatDelta, formatScore } from '../ui/format.js';
import type { OutputFormatter } from './formatter.js';

export class PlainFormatter implements OutputFormatter {
  formatReport(report: ReportArtifact): string {
    const keyWidth = Math.max(9, ...report.candidates.map((c) => c.key.length));
    const lines = [
      `Job ${report.jobId} (${report.workloadId}/${report.clientId})`,
      `Baseline ${report.baseline.modelIdentifier}: ${formatScore(report.baseline.aggregateScore)}`,
      '',
      `${'Candidate'.padEnd(keyWidth)}  ${'Status'.padEnd(13)}  ${'Pre'.padEnd(6)}  ${'Post'.padEnd(6)}  Best vs baseline`,
    ];
    for (const c of report.candidates) {
      const best = c.deltaPost ?? c.deltaPre;
      const flag = c.promotable ? '  promotable' : '';
      lines.push(
        `${c.key.padEnd(keyWidth)}  ${c.status.padEnd(13)}  ${formatScore(c.pre?.aggregateScore).padEnd(6)}  ${formatScore(c.post?.aggregateScore).padEnd(6)}  ${formatDelta(best)}${flag}`,
      );
    }
    lines.push('', `Recommendation: ${report.recommendation ?? 'none'}`);
    return lines.join('\n');
  }

  formatError(error: string): string {
    return `Error: ${error}`;
  }
}
