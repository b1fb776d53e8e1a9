import axios, { AxiosError, AxiosInstance } from "axios";
import axiosRetry, { IAxiosRetryConfig } from "axios-retry";

const axiosInstance: AxiosInstance = axios.create({
  timeout: 30000,
});

interface AxiosLikeError {
  response?: {
    status?: number;
    data?: unknown;
  };
  code?: string;
  message?: string;
}

function asAxiosError(error: unknown): AxiosLikeError {
  if (error && typeof error === 'object') {
    return error as AxiosLikeError;
  }
  return {};
}

/**
 * Helper to extract error message from various response formats
 */
export function getErrorMessage(error: unknown): string {
  const e = asAxiosError(error);
  const data = e.response?.data;
  if (!data) {
    if (e.code) return `Network error: ${e.code}`;
    if (e.message) return e.message;
    return 'Unknown error (no response data)';
  }
  if (typeof data === 'string') return data;
  const dataObj = data as Record<string, unknown>;
  return String(dataObj.error || dataObj.message || dataObj.detail || '');
}

/**
 * Check if error indicates a rate limit (by status code or message)
 */
export function isRateLimitError(error: unknown): boolean {
  const e = asAxiosError(error);
  const status = e.response?.status;
  if (status === 429) return true;
  if (status === 503 && /rate limit/i.test(getErrorMessage(error))) return true;

  const errorMessage = getErrorMessage(error);
  return /rate limit exceeded|too many requests|throttled/i.test(errorMessage);
}

/**
 * Check if error is a permanent purchase failure that no retry will fix
 */
export function isNonRetryableError(error: unknown): boolean {
  const e = asAxiosError(error);
  const status = e.response?.status;
  const errorText = getErrorMessage(error);

  // 400 Bad Request, 401 Unauthorized, 402 Payment Required, 403 Forbidden, 404 Not Found
  if (status !== undefined && [400, 401, 402, 403, 404].includes(status)) return true;

  // 422 Unprocessable Entity - validation errors that won't change on retry
  if (status === 422) return true;

  if (/Insufficient funds/i.test(errorText)) return true;
  if (/invalid signature|invalid api key|unknown token/i.test(errorText)) return true;

  return false;
}

const retryConfig: IAxiosRetryConfig = {
  retries: 3,
  retryDelay: (retryCount, _error: AxiosError) => {
    // Rate limits are left to the caller's limiter
    return axiosRetry.exponentialDelay(retryCount);
  },
  retryCondition: (error: AxiosError) => {
    if (isRateLimitError(error)) {
      return false;
    }

    if (isNonRetryableError(error)) {
      return false;
    }

    // Gateway errors are usually transient
    const status = asAxiosError(error).response?.status;
    if (status && [502, 503, 504].includes(status)) {
      return true;
    }

    return axiosRetry.isNetworkError(error);
  },
};

axiosRetry(axiosInstance, retryConfig);

export default axiosInstance;
