import type { ReportArtifact } from '@flywheel/core';
import type { OutputFormatter } from './formatter.js';

export class JsonFormatter implements OutputFormatter {
  formatReport(report: ReportArtifact): string {
    return JSON.stringify(report, null, 2);
  }

  formatError(error: string): string {
    return JSON.stringify({ error });
  }
}
