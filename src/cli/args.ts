export interface CLIOptions {
  groups?: string;
  source?: string;
  responseFormat?: string;
  report?: string;
  search?: string;
  output?: string;
  logUrls?: boolean;
  help?: boolean;
}

export const USAGE = `
Jamf Group Report
=================

Print smart group membership counts, or OS versions of an advanced search.

Usage:
  jamf-group-report [options]

Options:
  --groups, -g <ids>             Comma-separated group IDs (default: JAMF_GROUP_IDS)
  --source, -s <source>          computer-group, mobile-device-group,
                                 advanced-computer-search (default: computer-group)
  --response-format, -r <fmt>    json or xml (default: json)
  --report <kind>                groups or os-versions (default: groups)
  --search <id>                  Advanced computer search ID for --report os-versions
  --output, -o <fmt>             text or json (default: text)
  --log-urls                     Log the full URL of each request
  --help, -h                     Show this help message

Environment Variables:
  JAMF_URL                       Jamf Pro URL (macOS falls back to the managed jss_url)
  JAMF_BEARER_TOKEN              Bearer token (prompted for when interactive)
  JAMF_USERNAME, JAMF_PASSWORD   Credentials exchanged for a bearer token
  LOG_LEVEL                      fatal, error, warn, info, debug, trace, silent

Examples:
  jamf-group-report --groups 12,15,31
  jamf-group-report --source mobile-device-group --groups 4 --output json
  jamf-group-report --report os-versions --search 7
`;

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--groups':
      case '-g':
        options.groups = args[++i];
        break;
      case '--source':
      case '-s':
        options.source = args[++i];
        break;
      case '--response-format':
      case '-r':
        options.responseFormat = args[++i];
        break;
      case '--report':
        options.report = args[++i];
        break;
      case '--search':
        options.search = args[++i];
        break;
      case '--output':
      case '-o':
        options.output = args[++i];
        break;
      case '--log-urls':
        options.logUrls = true;
        break;
    }
  }

  return options;
}
