import { ReportKind } from '../report/formatter.js';
import { GroupIdentifier, GroupReport } from '../report/types.js';

export interface ReportRun {
  report: ReportKind;
  identifiers: GroupIdentifier[];
}

/**
 * Number of requested groups missing from the report. Duplicated identifiers
 * count once per occurrence, matching how the aggregator fetches them.
 */
export const countSkippedGroups = (identifiers: GroupIdentifier[], report: GroupReport): number =>
  Math.max(identifiers.length - report.results.length, 0);

export function reportWarnings(run: ReportRun, report: GroupReport): string[] {
  if (run.report !== 'groups') return [];

  if (run.identifiers.length === 0) {
    return ['⚠️  No group IDs given. Pass --groups or set JAMF_GROUP_IDS.'];
  }

  const skipped = countSkippedGroups(run.identifiers, report);
  return skipped > 0
    ? [`⚠️  ${skipped} of ${run.identifiers.length} groups could not be fetched; see the log for details.`]
    : [];
}
