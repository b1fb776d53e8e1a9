import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';

function mockConfig(): InternalAxiosRequestConfig {
  return { headers: new AxiosHeaders() };
}

/**
 * Create a mock successful Axios response
 */
export function createMockResponse<T>(data: T, status = 200): AxiosResponse<T> {
  return {
    data,
    status,
    statusText: 'OK',
    headers: {},
    config: mockConfig(),
  };
}

/**
 * Create a mock Axios error carrying an HTTP response
 */
export function createMockError(
  status: number,
  data: unknown,
  message = 'Request failed'
): AxiosError {
  const config = mockConfig();
  return new AxiosError(message, AxiosError.ERR_BAD_RESPONSE, config, undefined, {
    data,
    status,
    statusText: status >= 400 ? 'Error' : 'OK',
    headers: {},
    config,
  });
}

/**
 * Create a mock Axios error with no response (connection-level failure)
 */
export function createMockNetworkError(code: string, message = 'socket hang up'): AxiosError {
  return new AxiosError(message, code, mockConfig());
}

/**
 * Sample purchase API response
 */
export const samplePurchaseResponse = {
  debitedSats: 1010,
  txid: 'txid-1',
};
