#!/usr/bin/env node
/**
 * Jamf Group Report CLI
 *
 * Usage:
 *   jamf-group-report --groups 12,15,31
 *   jamf-group-report --report os-versions --search 7
 */

import * as path from 'path';
import { JamfGroupClient } from '../jamf-group-client.js';
import { aggregateGroups } from '../report/aggregator.js';
import { formatReport, reportLabelsFor } from '../report/formatter.js';
import { GroupReport } from '../report/types.js';
import { defaultResolverDeps, resolveReportSettings } from '../config/resolve-settings.js';
import { loadDotenv } from '../utils/dotenv-loader.js';
import { validateReportEnv } from '../utils/env-validation.js';
import { logErrorWithContext, normalizeError, setupGlobalErrorHandlers } from '../utils/error-handler.js';
import { configureLogLevel } from '../utils/logger.js';
import { parseArgs, USAGE } from './args.js';
import { print, printError, printWarn } from './output.js';
import { reportWarnings } from './report-warnings.js';

async function main(): Promise<number> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    print(USAGE);
    return 0;
  }

  loadDotenv(path.resolve(__dirname, '../..'));
  configureLogLevel();

  const envValidation = validateReportEnv(process.env);
  if (!envValidation.valid || !envValidation.config) {
    printError(envValidation.error?.format() ?? 'Invalid report configuration');
    return 1;
  }

  const settings = await resolveReportSettings(envValidation.config, options, defaultResolverDeps());
  const client = new JamfGroupClient(settings.client);

  let report: GroupReport;
  try {
    report =
      settings.report === 'os-versions' && settings.searchId
        ? await client.fetchOsVersionReport(settings.searchId)
        : await aggregateGroups(settings.identifiers, (identifier) => client.fetchGroup(identifier));
  } finally {
    await client.invalidateToken();
  }

  const labels = reportLabelsFor(settings.report, client.source);
  formatReport(report, { output: settings.output, ...labels }).forEach((line) => print(line));

  reportWarnings(settings, report).forEach((warning) => printWarn(warning));

  return 0;
}

setupGlobalErrorHandlers();

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    const jamfError = normalizeError(error);
    logErrorWithContext(jamfError, 'Group report', 'cli');
    printError(`\n❌ ${jamfError.toDetailedString()}`);
    process.exitCode = 1;
  });
