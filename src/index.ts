export { aggregateGroups, buildReport } from './report/aggregator.js';
export { summarizeOsVersions, UNKNOWN_OS_VERSION } from './report/os-versions.js';
export type { OsVersionMember } from './report/os-versions.js';
export { formatReport, reportLabelsFor, OUTPUT_FORMATS, REPORT_KINDS } from './report/formatter.js';
export type { OutputFormat, ReportFormatOptions, ReportKind, ReportLabels } from './report/formatter.js';
export type {
  FetchFailure,
  FetchOutcome,
  FetchSuccess,
  GroupFetcher,
  GroupIdentifier,
  GroupReport,
  GroupResult,
} from './report/types.js';
export { JamfGroupClient } from './jamf-group-client.js';
export type { JamfGroupClientConfig } from './jamf-group-client.js';
export { CLASSIC_GROUP_ENDPOINTS, GROUP_SOURCES, RESPONSE_FORMATS } from './types/jamf-api.js';
export type { GroupSource, ResponseFormat } from './types/jamf-api.js';
export { resolveReportSettings, parseGroupIdentifiers, normalizeBaseUrl } from './config/resolve-settings.js';
export type { ReportSettings, SettingsResolverDeps } from './config/resolve-settings.js';
export { validateReportEnv, EnvValidationError } from './utils/env-validation.js';
export { JamfAPIError, ConfigurationError, AuthenticationError, NetworkError } from './utils/errors.js';
