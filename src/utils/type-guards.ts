import axios, { AxiosError } from 'axios';

export function isAxiosError(error: unknown): error is AxiosError {
  return axios.isAxiosError(error);
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function getAxiosErrorStatus(error: unknown): number | undefined {
  return isAxiosError(error) ? error.response?.status : undefined;
}

export function getAxiosErrorData(error: unknown): unknown {
  return isAxiosError(error) ? error.response?.data : undefined;
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * True when the request never reached a server: DNS failure, refused
 * connection, TLS error. Timeouts are excluded.
 */
export function isUnreachableError(error: unknown): boolean {
  return isAxiosError(error) && !error.response && !TIMEOUT_CODES.has(error.code ?? '');
}
