import type { AxiosRequestConfig, AxiosResponse } from 'axios';

export interface HttpClient {
  request<T = unknown, R = AxiosResponse<T>, D = unknown>(config: AxiosRequestConfig<D>): Promise<R>;
}

export function headerValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) {
    const parts = value.filter((part): part is string => typeof part === 'string');
    return parts.length > 0 ? parts.join(', ') : undefined;
  }
  return undefined;
}

export function describeHttpFailure(error: unknown): { message: string; status?: number } {
  if (error && typeof error === 'object') {
    const message = 'message' in error && typeof error.message === 'string' ? error.message : 'Unknown error';
    const response = 'response' in error ? error.response : undefined;
    const status =
      response && typeof response === 'object' && 'status' in response && typeof response.status === 'number'
        ? response.status
        : undefined;
    return { message, status };
  }
  return { message: String(error) };
}
