import fs from 'node:fs';
import path from 'node:path';
import { type RunReport, serializeReport } from './runReport';
import { reportToMarkdown } from './markdownReport';

export type ReportFormat = 'json' | 'md';

export function reportFormatFor(outFile: string): ReportFormat {
  return path.extname(outFile).toLowerCase() === '.json' ? 'json' : 'md';
}

export function writeReportFile(outFile: string, report: RunReport, format: ReportFormat = reportFormatFor(outFile)): void {
  fs.mkdirSync(path.dirname(path.resolve(outFile)), { recursive: true });
  const content = format === 'json' ? serializeReport(report) : reportToMarkdown(report);
  fs.writeFileSync(outFile, content, 'utf8');
}
