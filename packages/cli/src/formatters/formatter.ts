import { ConfigError, type ReportArtifact } from '@flywheel/core';
import { JsonFormatter } from './json.js';
import { MarkdownFormatter } from './markdown.js';
import { PlainFormatter } from './plain.js';

export interface OutputFormatter {
  formatReport(report: ReportArtifact): string;
  formatError(error: string): string;
}

export type OutputFormat = 'json' | 'md' | 'plain';

export function createFormatter(format: string = 'plain'): OutputFormatter {
  switch (format) {
    case 'json':
      return new JsonFormatter();
    case 'md':
    case 'markdown':
      return new MarkdownFormatter();
    case 'plain':
      return new PlainFormatter();
    default:
      throw new ConfigError(`Unknown format: ${format}. Valid formats: json, md, plain`);
  }
}
