import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import https from 'https';
import { z } from 'zod';
import { createLogger, Logger } from './utils/logger.js';
import {
  CLASSIC_GROUP_ENDPOINTS,
  ClassicGroupEndpoint,
  GroupSource,
  JamfAuthToken,
  OS_VERSION_FIELD,
  ResponseFormat,
} from './types/jamf-api.js';
import { FetchOutcome, GroupIdentifier, GroupReport, GroupResult } from './report/types.js';
import { OsVersionMember, summarizeOsVersions } from './report/os-versions.js';
import { parseGroupSummaryFromXml, parseOsVersionsFromXml } from './utils/jamf-group-xml.js';
import {
  getAxiosErrorData,
  getAxiosErrorStatus,
  getErrorMessage,
  isAxiosError,
  isUnreachableError,
} from './utils/type-guards.js';
import { AuthenticationError, ConfigurationError, JamfAPIError, NetworkError } from './utils/errors.js';

const defaultLogger = createLogger('jamf-group-client');

export interface JamfGroupClientConfig {
  baseUrl: string;
  /** Pre-issued bearer token, used as-is */
  bearerToken?: string;
  // Basic Auth credentials, exchanged for a bearer token
  username?: string;
  password?: string;
  source: GroupSource;
  responseFormat: ResponseFormat;
  /** Request timeout in ms (default: 10000) */
  timeout?: number;
  // Set to false only for servers with self-signed certificates
  rejectUnauthorized?: boolean;
  /** Log the full URL of every group request */
  logRequestUrls?: boolean;
  logger?: Logger;
}

/** Buffer time in milliseconds to refresh token before actual expiration */
const TOKEN_REFRESH_BUFFER_MS = 5 * 60 * 1000;
/** Jamf's default token lifetime when the response carries no expiry */
const DEFAULT_TOKEN_LIFETIME_MS = 30 * 60 * 1000;

const TokenResponseSchema = z.object({
  token: z.string().min(1),
  expires: z.string().optional(),
});

const ClassicGroupBodySchema = z
  .object({
    id: z.union([z.number(), z.string()]).optional(),
    name: z.string().min(1),
  })
  .passthrough();

const SearchMemberSchema = z
  .object({
    [OS_VERSION_FIELD]: z.string().optional(),
  })
  .passthrough();

/**
 * Reads smart group membership from the Jamf Pro Classic API.
 *
 * Authentication follows the hybrid approach of Jamf tooling: a supplied
 * bearer token is used directly, otherwise Basic credentials are exchanged
 * for one at /api/v1/auth/token.
 */
export class JamfGroupClient {
  private axiosInstance: AxiosInstance;
  private config: JamfGroupClientConfig;
  private endpoint: ClassicGroupEndpoint;
  private logger: Logger;

  private bearerToken: JamfAuthToken | null = null;
  private basicAuthHeader: string | null = null;
  private tokenExchanged = false;

  constructor(config: JamfGroupClientConfig) {
    if (!config.baseUrl) {
      throw new ConfigurationError('Jamf Pro base URL is required', [
        'Set JAMF_URL to your Jamf Pro server URL (e.g., https://yourcompany.jamfcloud.com)',
      ]);
    }

    const hasBasicAuth = !!(config.username && config.password);
    if (!config.bearerToken && !hasBasicAuth) {
      throw new ConfigurationError('No authentication credentials provided', [
        'Provide a bearer token: JAMF_BEARER_TOKEN',
        'Or provide Basic Auth: JAMF_USERNAME and JAMF_PASSWORD',
      ]);
    }

    this.config = config;
    this.endpoint = CLASSIC_GROUP_ENDPOINTS[config.source];
    this.logger = config.logger ?? defaultLogger;

    if (config.bearerToken) {
      // Supplied tokens carry no expiry we can see; treat them as valid for the run.
      const issuedAt = new Date();
      this.bearerToken = {
        token: config.bearerToken,
        issuedAt,
        expires: new Date(8.64e15),
      };
    } else {
      this.basicAuthHeader = `Basic ${Buffer.from(`${config.username}:${config.password}`).toString('base64')}`;
    }

    this.axiosInstance = axios.create({
      baseURL: config.baseUrl,
      headers: {
        'Accept': this.acceptHeader(),
      },
      timeout: config.timeout ?? 10000,
      ...(config.rejectUnauthorized === false
        ? { httpsAgent: new https.Agent({ rejectUnauthorized: false }) }
        : {}),
    });

    this.axiosInstance.interceptors.request.use((request) => {
      if (!request.headers.has('Authorization') && this.bearerToken) {
        request.headers.set('Authorization', `Bearer ${this.bearerToken.token}`);
      }
      return request;
    });
  }

  get source(): GroupSource {
    return this.config.source;
  }

  private acceptHeader(): string {
    return this.config.responseFormat === 'xml' ? 'application/xml' : 'application/json';
  }

  private requestOptions(): AxiosRequestConfig {
    return this.config.responseFormat === 'xml' ? { responseType: 'text' } : {};
  }

  private groupPath(identifier: GroupIdentifier, endpoint: ClassicGroupEndpoint = this.endpoint): string {
    return `${endpoint.path}/${encodeURIComponent(String(identifier))}`;
  }

  private logRequest(path: string, identifier: GroupIdentifier): void {
    if (this.config.logRequestUrls) {
      this.logger.info('Requesting group', { url: `${this.config.baseUrl}${path}` });
    } else {
      this.logger.debug('Requesting group', { source: this.config.source, identifier });
    }
  }

  /**
   * Check if a token is expired or will expire soon (within buffer time)
   */
  private isTokenExpiredOrExpiring(token: JamfAuthToken | null): boolean {
    if (!token) return true;
    const bufferTime = new Date(Date.now() + TOKEN_REFRESH_BUFFER_MS);
    return token.expires <= bufferTime;
  }

  /**
   * Get Bearer token using Basic Auth credentials
   */
  private async getBearerTokenWithBasicAuth(): Promise<void> {
    if (!this.basicAuthHeader) return;

    let data: unknown;
    try {
      const response = await this.axiosInstance.post('/api/v1/auth/token', null, {
        headers: {
          'Authorization': this.basicAuthHeader,
          'Accept': 'application/json',
        },
      });
      data = response.data;
    } catch (error) {
      if (isUnreachableError(error) && error instanceof Error) {
        throw NetworkError.fromError(error, { baseUrl: this.config.baseUrl });
      }
      throw new AuthenticationError(
        `Basic Auth to Bearer token failed: ${getErrorMessage(error)}`,
        { status: getAxiosErrorStatus(error) },
        error instanceof Error ? error : undefined
      );
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new AuthenticationError('Token response did not contain a token');
    }

    if (this.tokenExchanged && this.bearerToken) {
      await this.revokeToken(this.bearerToken.token);
    }

    const issuedAt = new Date();
    const expires = parsed.data.expires ? new Date(parsed.data.expires) : undefined;
    this.bearerToken = {
      token: parsed.data.token,
      issuedAt,
      expires:
        expires && !Number.isNaN(expires.getTime())
          ? expires
          : new Date(issuedAt.getTime() + DEFAULT_TOKEN_LIFETIME_MS),
    };
    this.tokenExchanged = true;
    this.logger.info('Bearer token obtained using Basic Auth', { expires: this.bearerToken.expires });
  }

  /**
   * Ensure we have a valid token, refreshing proactively before expiration
   */
  private async ensureAuthenticated(): Promise<void> {
    if (this.isTokenExpiredOrExpiring(this.bearerToken)) {
      this.logger.debug('Bearer token missing or expiring soon, refreshing...', {
        expires: this.bearerToken?.expires,
      });
      await this.getBearerTokenWithBasicAuth();
    }
  }

  /**
   * Fetch one group's name and member count.
   *
   * HTTP error statuses, timeouts and unreadable bodies resolve to a failure.
   * An unreachable server and authentication problems reject.
   */
  async fetchGroup(identifier: GroupIdentifier): Promise<FetchOutcome> {
    await this.ensureAuthenticated();

    const path = this.groupPath(identifier);
    this.logRequest(path, identifier);

    let data: unknown;
    try {
      const response = await this.axiosInstance.get<unknown>(path, this.requestOptions());
      data = response.data;
    } catch (error) {
      if (!isAxiosError(error)) throw error;
      if (isUnreachableError(error)) {
        throw NetworkError.fromError(error, { source: this.config.source, identifier });
      }

      const status = getAxiosErrorStatus(error);
      this.logger.warn('Failed to fetch group', {
        source: this.config.source,
        identifier,
        status,
        error: getErrorMessage(error),
        responseData: getAxiosErrorData(error),
      });
      return {
        success: false,
        identifier,
        reason: status !== undefined ? `HTTP ${status}` : getErrorMessage(error),
      };
    }

    const summary = this.parseGroupSummary(data);
    if (!summary) {
      this.logger.warn('Unexpected group response body', {
        source: this.config.source,
        identifier,
        format: this.config.responseFormat,
      });
      return { success: false, identifier, reason: 'Malformed response body' };
    }

    return { success: true, result: summary };
  }

  private parseGroupSummary(data: unknown): GroupResult | null {
    if (this.config.responseFormat === 'xml') {
      return typeof data === 'string' ? parseGroupSummaryFromXml(data, this.endpoint) : null;
    }

    const members = this.extractJsonMembers(data, this.endpoint);
    return members ? { name: members.name, count: members.items.length } : null;
  }

  private extractJsonMembers(
    data: unknown,
    endpoint: ClassicGroupEndpoint
  ): { name: string; items: unknown[] } | null {
    const envelope = z.record(z.unknown()).safeParse(data);
    if (!envelope.success) return null;

    const body = ClassicGroupBodySchema.safeParse(envelope.data[endpoint.rootKey]);
    if (!body.success) return null;

    const items = z.array(z.unknown()).safeParse(body.data[endpoint.membersKey]);
    if (!items.success) return null;

    return { name: body.data.name, items: items.data };
  }

  /**
   * Tally an advanced computer search's members by OS version.
   *
   * The search must include the "Operating System Version" display field.
   */
  async fetchOsVersionReport(searchId: GroupIdentifier): Promise<GroupReport> {
    await this.ensureAuthenticated();

    const endpoint = CLASSIC_GROUP_ENDPOINTS['advanced-computer-search'];
    const path = this.groupPath(searchId, endpoint);
    this.logRequest(path, searchId);

    let data: unknown;
    try {
      const response = await this.axiosInstance.get<unknown>(path, this.requestOptions());
      data = response.data;
    } catch (error) {
      if (!isAxiosError(error)) throw error;
      if (isUnreachableError(error)) {
        throw NetworkError.fromError(error, { searchId });
      }
      throw new JamfAPIError(
        `Failed to read advanced computer search ${searchId}: ${getErrorMessage(error)}`,
        getAxiosErrorStatus(error),
        'SEARCH_FETCH_FAILED',
        ['Check that the advanced computer search exists and the account can read it'],
        { searchId },
        error
      );
    }

    const members = this.parseOsVersionMembers(data, endpoint);
    if (!members) {
      throw new JamfAPIError(
        `Unexpected response body for advanced computer search ${searchId}`,
        undefined,
        'MALFORMED_RESPONSE',
        [],
        { searchId, format: this.config.responseFormat }
      );
    }

    return summarizeOsVersions(members);
  }

  private parseOsVersionMembers(data: unknown, endpoint: ClassicGroupEndpoint): OsVersionMember[] | null {
    if (this.config.responseFormat === 'xml') {
      return typeof data === 'string' ? parseOsVersionsFromXml(data) : null;
    }

    const members = this.extractJsonMembers(data, endpoint);
    if (!members) return null;

    return members.items.map((item) => {
      const parsed = SearchMemberSchema.safeParse(item);
      const osVersion = parsed.success ? parsed.data[OS_VERSION_FIELD] : undefined;
      return osVersion ? { osVersion } : {};
    });
  }

  /**
   * Invalidate a token this client obtained itself. Supplied tokens are left alone.
   */
  async invalidateToken(): Promise<void> {
    if (!this.tokenExchanged || !this.bearerToken) return;

    try {
      await this.revokeToken(this.bearerToken.token);
    } finally {
      this.bearerToken = null;
      this.tokenExchanged = false;
    }
  }

  private async revokeToken(token: string): Promise<void> {
    try {
      await this.axiosInstance.post('/api/v1/auth/invalidate-token', null, {
        headers: { Authorization: `Bearer ${token}` },
      });
      this.logger.info('Bearer token invalidated');
    } catch (error) {
      this.logger.warn('Failed to invalidate bearer token', {
        status: getAxiosErrorStatus(error),
        error: getErrorMessage(error),
      });
    }
  }
}
