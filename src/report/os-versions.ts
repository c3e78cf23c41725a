import { buildReport } from './aggregator.js';
import { GroupReport } from './types.js';

export const UNKNOWN_OS_VERSION = 'Unknown';

export interface OsVersionMember {
  osVersion?: string;
}

/**
 * Tally members by OS version, in order of first appearance
 */
export function summarizeOsVersions(members: readonly OsVersionMember[]): GroupReport {
  const counts = new Map<string, number>();

  for (const member of members) {
    const version = member.osVersion?.trim() || UNKNOWN_OS_VERSION;
    counts.set(version, (counts.get(version) ?? 0) + 1);
  }

  return buildReport(Array.from(counts, ([name, count]) => ({ name, count })));
}
