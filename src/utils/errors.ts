/**
 * Error types shared by the Jamf client, configuration, and CLI layers
 */

export class JamfAPIError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode?: string,
    public readonly suggestions: string[] = [],
    public readonly context?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'JamfAPIError';
  }

  /**
   * Multi-line description including status, code, and suggestions
   */
  toDetailedString(): string {
    const lines = [`${this.name}: ${this.message}`];

    if (this.statusCode !== undefined) {
      lines.push(`  Status: ${this.statusCode}`);
    }
    if (this.errorCode) {
      lines.push(`  Code: ${this.errorCode}`);
    }
    if (this.suggestions.length > 0) {
      lines.push('  Suggestions:');
      for (const suggestion of this.suggestions) {
        lines.push(`    - ${suggestion}`);
      }
    }

    return lines.join('\n');
  }
}

/**
 * Raised when the run cannot start: missing URL, credentials, or report inputs
 */
export class ConfigurationError extends JamfAPIError {
  constructor(message: string, suggestions: string[] = [], context?: Record<string, unknown>) {
    super(message, undefined, 'CONFIGURATION_ERROR', suggestions, context);
    this.name = 'ConfigurationError';
  }
}

export class AuthenticationError extends JamfAPIError {
  constructor(message: string, context?: Record<string, unknown>, originalError?: Error) {
    super(
      message,
      401,
      'AUTHENTICATION_FAILED',
      ['Check JAMF_BEARER_TOKEN, or JAMF_USERNAME and JAMF_PASSWORD'],
      context,
      originalError
    );
    this.name = 'AuthenticationError';
  }
}

export class NetworkError extends JamfAPIError {
  constructor(message: string, context?: Record<string, unknown>, originalError?: Error) {
    super(
      message,
      undefined,
      'NETWORK_ERROR',
      ['Check that JAMF_URL is reachable from this machine'],
      context,
      originalError
    );
    this.name = 'NetworkError';
  }

  static fromError(error: Error, context?: Record<string, unknown>): NetworkError {
    return new NetworkError(`Network error: ${error.message}`, context, error);
  }
}
