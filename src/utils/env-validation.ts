/**
 * Environment Variable Validation
 *
 * Validates the report's environment variables using Zod schemas.
 * Provides helpful error messages for invalid configuration.
 */

import { z } from 'zod';
import { GROUP_SOURCES, RESPONSE_FORMATS } from '../types/jamf-api.js';
import { LOG_LEVELS } from './logger.js';

/**
 * Custom error class for environment validation failures
 */
export class EnvValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: z.ZodError['errors'],
    public readonly suggestions: string[]
  ) {
    super(message);
    this.name = 'EnvValidationError';
  }

  /**
   * Format the error for display
   */
  format(): string {
    const lines: string[] = [this.message, ''];

    if (this.errors.length > 0) {
      lines.push('Validation errors:');
      for (const error of this.errors) {
        const path = error.path.join('.');
        lines.push(`  - ${path}: ${error.message}`);
      }
      lines.push('');
    }

    if (this.suggestions.length > 0) {
      lines.push('Suggestions:');
      for (const suggestion of this.suggestions) {
        lines.push(`  - ${suggestion}`);
      }
    }

    return lines.join('\n');
  }
}

// ============================================================================
// Helper Schemas
// ============================================================================

/** Boolean from string: 'true' = true, anything else = false */
const booleanFromString = z
  .string()
  .optional()
  .transform((val) => val === 'true');

/** Positive integer with bounds */
const positiveInt = (min: number, max: number, defaultVal: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : defaultVal))
    .pipe(z.number().int().min(min).max(max));

// ============================================================================
// Report Configuration
// ============================================================================

export const ReportEnvSchema = z.object({
  /** Jamf Pro URL; falls back to the managed jss_url on macOS */
  JAMF_URL: z.string().url().optional(),

  /** Pre-issued bearer token */
  JAMF_BEARER_TOKEN: z.string().min(1).optional(),

  /** Basic Auth Username, exchanged for a bearer token */
  JAMF_USERNAME: z.string().min(1).optional(),

  /** Basic Auth Password */
  JAMF_PASSWORD: z.string().min(1).optional(),

  /** Comma-separated group identifiers */
  JAMF_GROUP_IDS: z.string().optional(),

  JAMF_GROUP_SOURCE: z.enum(GROUP_SOURCES).optional(),

  JAMF_RESPONSE_FORMAT: z.enum(RESPONSE_FORMATS).optional(),

  /** Request timeout in ms (1000-300000) */
  JAMF_REQUEST_TIMEOUT: positiveInt(1000, 300000, 10000),

  /** Log full request URLs */
  JAMF_LOG_REQUEST_URLS: booleanFromString,

  /** Allow insecure TLS connections (self-signed certs) */
  JAMF_ALLOW_INSECURE: booleanFromString,

  LOG_LEVEL: z
    .string()
    .optional()
    .transform((val) => val?.toLowerCase())
    .pipe(z.enum(LOG_LEVELS).optional()),
});

export type ReportEnvConfig = z.infer<typeof ReportEnvSchema>;

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate the report configuration
 */
export function validateReportEnv(env: NodeJS.ProcessEnv): {
  valid: boolean;
  config?: ReportEnvConfig;
  error?: EnvValidationError;
} {
  const result = ReportEnvSchema.safeParse(env);

  if (!result.success) {
    const suggestions: string[] = [];

    for (const error of result.error.errors) {
      const field = String(error.path[0]);
      if (field === 'JAMF_URL') {
        suggestions.push('Set JAMF_URL to your Jamf Pro server URL (e.g., https://yourcompany.jamfcloud.com)');
      }
      if (field === 'JAMF_GROUP_SOURCE') {
        suggestions.push(`JAMF_GROUP_SOURCE must be one of: ${GROUP_SOURCES.join(', ')}`);
      }
      if (field === 'JAMF_RESPONSE_FORMAT') {
        suggestions.push(`JAMF_RESPONSE_FORMAT must be one of: ${RESPONSE_FORMATS.join(', ')}`);
      }
      if (field === 'JAMF_REQUEST_TIMEOUT') {
        suggestions.push('JAMF_REQUEST_TIMEOUT must be between 1000 and 300000 ms');
      }
      if (field === 'LOG_LEVEL') {
        suggestions.push(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
      }
    }

    return {
      valid: false,
      error: new EnvValidationError('Invalid report configuration', result.error.errors, suggestions),
    };
  }

  return { valid: true, config: result.data };
}
