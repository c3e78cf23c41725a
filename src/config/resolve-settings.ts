/**
 * Resolves everything a report run needs, once, before the first request.
 *
 * The result is a plain settings object injected into JamfGroupClient; nothing
 * here is kept in module or process state.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { createInterface } from 'readline/promises';
import { z } from 'zod';
import { CLIOptions } from '../cli/args.js';
import { JamfGroupClientConfig } from '../jamf-group-client.js';
import { OUTPUT_FORMATS, OutputFormat, REPORT_KINDS, ReportKind } from '../report/formatter.js';
import { GroupIdentifier } from '../report/types.js';
import { GROUP_SOURCES, RESPONSE_FORMATS } from '../types/jamf-api.js';
import { ReportEnvConfig } from '../utils/env-validation.js';
import { ConfigurationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('resolve-settings');
const execFileAsync = promisify(execFile);

const DEFAULTS_BINARY = '/usr/bin/defaults';
const JAMF_PREFERENCES_DOMAIN = '/Library/Preferences/com.jamfsoftware.jamf';

export interface SettingsResolverDeps {
  platform: NodeJS.Platform;
  /** Whether an operator can be prompted for missing credentials */
  interactive: boolean;
  /** Jamf Pro URL the managed Mac was enrolled with, if any */
  readManagedJssUrl: () => Promise<string | undefined>;
  promptForToken: () => Promise<string>;
}

export interface ReportSettings {
  client: JamfGroupClientConfig;
  report: ReportKind;
  identifiers: GroupIdentifier[];
  searchId?: string;
  output: OutputFormat;
}

export const readManagedJssUrl = async (): Promise<string | undefined> => {
  try {
    const { stdout } = await execFileAsync(DEFAULTS_BINARY, ['read', JAMF_PREFERENCES_DOMAIN, 'jss_url']);
    return stdout.trim() || undefined;
  } catch (error) {
    logger.debug('No managed jss_url available', {
      error: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
};

export const promptForToken = async (): Promise<string> => {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return (await rl.question('Jamf Pro bearer token: ')).trim();
  } finally {
    rl.close();
  }
};

export const defaultResolverDeps = (): SettingsResolverDeps => ({
  platform: process.platform,
  interactive: Boolean(process.stdin.isTTY),
  readManagedJssUrl,
  promptForToken,
});

export const normalizeBaseUrl = (url: string): string => url.trim().replace(/\/+$/, '');

export const parseGroupIdentifiers = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);

/**
 * Validate a CLI-supplied choice against its allowed values
 */
const pickOption = <T extends string>(
  flag: string,
  values: readonly [T, ...T[]],
  ...candidates: Array<string | undefined>
): T | undefined => {
  const raw = candidates.find((candidate) => candidate !== undefined);
  if (raw === undefined) return undefined;

  const parsed = z.enum(values).safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid value "${raw}" for ${flag}`, [
      `Use one of: ${values.join(', ')}`,
    ]);
  }
  return parsed.data;
};

async function resolveBaseUrl(env: ReportEnvConfig, deps: SettingsResolverDeps): Promise<string> {
  if (env.JAMF_URL) {
    return normalizeBaseUrl(env.JAMF_URL);
  }

  if (deps.platform === 'darwin') {
    const managedUrl = await deps.readManagedJssUrl();
    if (managedUrl) {
      logger.debug('Using managed jss_url', { url: managedUrl });
      return normalizeBaseUrl(managedUrl);
    }
  }

  throw new ConfigurationError('Jamf Pro URL is not configured', [
    'Set JAMF_URL to your Jamf Pro server URL (e.g., https://yourcompany.jamfcloud.com)',
    'On an enrolled Mac, the jss_url in com.jamfsoftware.jamf is used when JAMF_URL is unset',
  ]);
}

async function resolveCredentials(
  env: ReportEnvConfig,
  deps: SettingsResolverDeps
): Promise<Pick<JamfGroupClientConfig, 'bearerToken' | 'username' | 'password'>> {
  if (env.JAMF_BEARER_TOKEN) {
    return { bearerToken: env.JAMF_BEARER_TOKEN };
  }

  if (env.JAMF_USERNAME && env.JAMF_PASSWORD) {
    return { username: env.JAMF_USERNAME, password: env.JAMF_PASSWORD };
  }

  if (deps.interactive) {
    const token = await deps.promptForToken();
    if (token) {
      return { bearerToken: token };
    }
  }

  throw new ConfigurationError('Missing authentication credentials', [
    'Provide a bearer token: JAMF_BEARER_TOKEN',
    'Or provide Basic Auth: JAMF_USERNAME and JAMF_PASSWORD',
  ]);
}

export async function resolveReportSettings(
  env: ReportEnvConfig,
  options: CLIOptions,
  deps: SettingsResolverDeps
): Promise<ReportSettings> {
  const source = pickOption('--source', GROUP_SOURCES, options.source, env.JAMF_GROUP_SOURCE) ?? 'computer-group';
  const responseFormat =
    pickOption('--response-format', RESPONSE_FORMATS, options.responseFormat, env.JAMF_RESPONSE_FORMAT) ?? 'json';
  const report = pickOption('--report', REPORT_KINDS, options.report) ?? 'groups';
  const output = pickOption('--output', OUTPUT_FORMATS, options.output) ?? 'text';

  const searchId = options.search?.trim() || undefined;
  if (report === 'os-versions' && !searchId) {
    throw new ConfigurationError('The os-versions report needs an advanced computer search', [
      'Pass --search <id> with a search that displays "Operating System Version"',
    ]);
  }

  const baseUrl = await resolveBaseUrl(env, deps);
  const credentials = await resolveCredentials(env, deps);

  return {
    client: {
      baseUrl,
      ...credentials,
      source,
      responseFormat,
      timeout: env.JAMF_REQUEST_TIMEOUT,
      rejectUnauthorized: !env.JAMF_ALLOW_INSECURE,
      logRequestUrls: Boolean(options.logUrls) || env.JAMF_LOG_REQUEST_URLS,
    },
    report,
    identifiers: parseGroupIdentifiers(options.groups ?? env.JAMF_GROUP_IDS),
    searchId,
    output,
  };
}
