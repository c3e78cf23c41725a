import { describe, expect, test } from '@jest/globals';
import { countSkippedGroups, reportWarnings } from '../../cli/report-warnings.js';
import { buildReport } from '../../report/aggregator.js';

const report = buildReport([
  { name: 'G-A', count: 10 },
  { name: 'G-C', count: 5 },
]);

describe('countSkippedGroups', () => {
  test('counts identifiers missing from the report', () => {
    expect(countSkippedGroups(['A', 'B', 'C'], report)).toBe(1);
  });

  test('counts each duplicated identifier', () => {
    expect(countSkippedGroups(['A', 'B', 'B', 'C'], report)).toBe(2);
  });

  test('is zero when every group was fetched', () => {
    expect(countSkippedGroups(['A', 'C'], report)).toBe(0);
  });
});

describe('reportWarnings', () => {
  test('warns about skipped groups', () => {
    expect(reportWarnings({ report: 'groups', identifiers: ['A', 'B', 'C'] }, report)).toEqual([
      '⚠️  1 of 3 groups could not be fetched; see the log for details.',
    ]);
  });

  test('warns when no groups were requested', () => {
    expect(reportWarnings({ report: 'groups', identifiers: [] }, buildReport([]))).toEqual([
      '⚠️  No group IDs given. Pass --groups or set JAMF_GROUP_IDS.',
    ]);
  });

  test('is quiet when every group was fetched', () => {
    expect(reportWarnings({ report: 'groups', identifiers: ['A', 'C'] }, report)).toEqual([]);
  });

  test('is quiet for the OS version report', () => {
    expect(reportWarnings({ report: 'os-versions', identifiers: [] }, report)).toEqual([]);
  });
});
