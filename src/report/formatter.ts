import { GroupSource } from '../types/jamf-api.js';
import { GroupReport } from './types.js';

export const REPORT_KINDS = ['groups', 'os-versions'] as const;
export type ReportKind = (typeof REPORT_KINDS)[number];

export const OUTPUT_FORMATS = ['text', 'json'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export interface ReportLabels {
  /** Label for each result's name, e.g. "Smart Group Name" */
  nameLabel: string;
  /** Plural noun for what is counted, e.g. "Computers" */
  countLabel: string;
}

export interface ReportFormatOptions extends ReportLabels {
  output: OutputFormat;
}

export function reportLabelsFor(kind: ReportKind, source: GroupSource): ReportLabels {
  if (kind === 'os-versions') {
    return { nameLabel: 'OS Version', countLabel: 'Computers' };
  }

  switch (source) {
    case 'mobile-device-group':
      return { nameLabel: 'Smart Group Name', countLabel: 'Mobile Devices' };
    case 'advanced-computer-search':
      return { nameLabel: 'Advanced Search Name', countLabel: 'Computers' };
    case 'computer-group':
      return { nameLabel: 'Smart Group Name', countLabel: 'Computers' };
  }
}

/**
 * Render a report as output lines, results first and the total last
 */
export function formatReport(report: GroupReport, options: ReportFormatOptions): string[] {
  if (options.output === 'json') {
    return [JSON.stringify({ results: report.results, total: report.total }, null, 2)];
  }

  const lines = report.results.map(
    (result) => `${options.nameLabel}: ${result.name}, Number of ${options.countLabel}: ${result.count}`
  );
  lines.push(`Total ${options.countLabel}: ${report.total}`);
  return lines;
}
