import { FetchOutcome, GroupFetcher, GroupIdentifier, GroupReport, GroupResult } from './types.js';

/**
 * Freeze a list of results into a report with its running total
 */
export function buildReport(results: readonly GroupResult[]): GroupReport {
  let total = 0;
  for (const result of results) {
    if (!Number.isInteger(result.count) || result.count < 0) {
      throw new RangeError(`Group "${result.name}" has invalid count ${result.count}`);
    }
    total += result.count;
  }

  return Object.freeze({
    results: Object.freeze(results.map((result) => Object.freeze({ ...result }))),
    total,
  });
}

/**
 * Fetch every identifier in order, one at a time, and collect the successes.
 *
 * Failed fetches leave no entry and add nothing to the total. Results keep
 * the input order; duplicates are fetched and counted each time they appear.
 * A rejection from `fetchGroup` is systemic and propagates without a report.
 */
export async function aggregateGroups(
  identifiers: readonly GroupIdentifier[],
  fetchGroup: GroupFetcher
): Promise<GroupReport> {
  const results: GroupResult[] = [];

  for (const identifier of identifiers) {
    const outcome: FetchOutcome = await fetchGroup(identifier);
    if (outcome.success) {
      results.push(outcome.result);
    }
  }

  return buildReport(results);
}
