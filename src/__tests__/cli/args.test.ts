/**
 * CLI argument parsing tests
 */

import { describe, expect, test } from '@jest/globals';
import { parseArgs, USAGE } from '../../cli/args.js';

describe('parseArgs', () => {
  test('should parse --help flag', () => {
    expect(parseArgs(['--help']).help).toBe(true);
  });

  test('should parse -h short flag for help', () => {
    expect(parseArgs(['-h']).help).toBe(true);
  });

  test('should parse --groups option', () => {
    expect(parseArgs(['--groups', '12,15,31']).groups).toBe('12,15,31');
  });

  test('should parse -g short flag for groups', () => {
    expect(parseArgs(['-g', '4']).groups).toBe('4');
  });

  test('should parse source and response format', () => {
    const options = parseArgs(['-s', 'mobile-device-group', '--response-format', 'xml']);

    expect(options.source).toBe('mobile-device-group');
    expect(options.responseFormat).toBe('xml');
  });

  test('should parse the os-versions report options', () => {
    expect(parseArgs(['--report', 'os-versions', '--search', '7', '-o', 'json'])).toEqual({
      report: 'os-versions',
      search: '7',
      output: 'json',
    });
  });

  test('should parse --log-urls flag', () => {
    expect(parseArgs(['--log-urls']).logUrls).toBe(true);
  });

  test('should ignore unknown arguments', () => {
    expect(parseArgs(['--verbose', 'extra'])).toEqual({});
  });

  test('should leave a trailing option without a value unset', () => {
    expect(parseArgs(['--groups']).groups).toBeUndefined();
  });
});

describe('USAGE', () => {
  test('documents every option', () => {
    for (const flag of ['--groups', '--source', '--response-format', '--report', '--search', '--output', '--log-urls', '--help']) {
      expect(USAGE).toContain(flag);
    }
  });
});
