import { describe, expect, test, jest } from '@jest/globals';
import { aggregateGroups, buildReport } from '../../report/aggregator.js';
import type { FetchOutcome, GroupIdentifier } from '../../report/types.js';
import { ConfigurationError } from '../../utils/errors.js';

const ok = (name: string, count: number): FetchOutcome => ({ success: true, result: { name, count } });
const failed = (identifier: GroupIdentifier): FetchOutcome => ({
  success: false,
  identifier,
  reason: 'HTTP 404',
});

describe('aggregateGroups', () => {
  test('skips failed fetches and totals the rest', async () => {
    const outcomes: Record<string, FetchOutcome> = {
      A: ok('G-A', 10),
      B: failed('B'),
      C: ok('G-C', 5),
    };
    const fetchGroup = jest.fn(async (identifier: GroupIdentifier) => outcomes[String(identifier)]);

    const report = await aggregateGroups(['A', 'B', 'C'], fetchGroup);

    expect(report).toEqual({
      results: [
        { name: 'G-A', count: 10 },
        { name: 'G-C', count: 5 },
      ],
      total: 15,
    });
    expect(fetchGroup.mock.calls.map(([identifier]) => identifier)).toEqual(['A', 'B', 'C']);
  });

  test('returns an empty report for no identifiers', async () => {
    const fetchGroup = jest.fn(async (identifier: GroupIdentifier) => failed(identifier));

    const report = await aggregateGroups([], fetchGroup);

    expect(report.results).toEqual([]);
    expect(report.total).toBe(0);
    expect(fetchGroup).not.toHaveBeenCalled();
  });

  test('returns an empty report when every fetch fails', async () => {
    const fetchGroup = jest.fn(async (identifier: GroupIdentifier) => failed(identifier));

    const report = await aggregateGroups([1, 2, 3], fetchGroup);

    expect(report).toEqual({ results: [], total: 0 });
    expect(fetchGroup).toHaveBeenCalledTimes(3);
  });

  test('fetches and counts duplicate identifiers each time', async () => {
    const fetchGroup = jest.fn(async (_identifier: GroupIdentifier) => ok('Laptops', 4));

    const report = await aggregateGroups(['7', '7'], fetchGroup);

    expect(fetchGroup).toHaveBeenCalledTimes(2);
    expect(report.results).toEqual([
      { name: 'Laptops', count: 4 },
      { name: 'Laptops', count: 4 },
    ]);
    expect(report.total).toBe(8);
  });

  test('keeps input order rather than sorting by count', async () => {
    const counts: Record<string, number> = { small: 1, large: 100, medium: 20 };
    const fetchGroup = async (identifier: GroupIdentifier) => ok(String(identifier), counts[String(identifier)] ?? 0);

    const report = await aggregateGroups(['small', 'large', 'medium'], fetchGroup);

    expect(report.results.map((r) => r.name)).toEqual(['small', 'large', 'medium']);
    expect(report.total).toBe(121);
  });

  test('waits for each fetch before starting the next', async () => {
    const events: string[] = [];
    const fetchGroup = async (identifier: GroupIdentifier) => {
      events.push(`start ${identifier}`);
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push(`end ${identifier}`);
      return ok(String(identifier), 1);
    };

    await aggregateGroups(['a', 'b'], fetchGroup);

    expect(events).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  test('propagates systemic failures without a report', async () => {
    const fetchGroup = jest.fn(async (_identifier: GroupIdentifier): Promise<FetchOutcome> => {
      throw new ConfigurationError('Jamf Pro URL is not configured');
    });

    await expect(aggregateGroups(['X'], fetchGroup)).rejects.toThrow('Jamf Pro URL is not configured');
  });

  test('produces a frozen report', async () => {
    const report = await aggregateGroups(['A'], async () => ok('G-A', 3));

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.results)).toBe(true);
  });
});

describe('buildReport', () => {
  test('total equals the sum of counts', () => {
    const report = buildReport([
      { name: 'One', count: 2 },
      { name: 'Two', count: 0 },
      { name: 'Three', count: 9 },
    ]);

    expect(report.total).toBe(11);
  });

  test('does not share the caller array', () => {
    const results = [{ name: 'One', count: 2 }];
    const report = buildReport(results);

    results.push({ name: 'Two', count: 3 });

    expect(report.results).toHaveLength(1);
    expect(report.total).toBe(2);
  });

  test('rejects negative or fractional counts', () => {
    expect(() => buildReport([{ name: 'Bad', count: -1 }])).toThrow(RangeError);
    expect(() => buildReport([{ name: 'Bad', count: 1.5 }])).toThrow('Group "Bad" has invalid count 1.5');
  });
});
