import axios, { AxiosInstance } from 'axios';
import https from 'https';
import { UnavailableReason } from '../interfaces/location';

// The only part of axios the upstream clients depend on.
export type HttpClient = Pick<AxiosInstance, 'get'>;

export function createHttpClient(timeoutMs: number): AxiosInstance {
  const httpsAgent = new https.Agent({
    keepAlive: true,
    maxSockets: 10,
  });

  return axios.create({
    timeout: timeoutMs,
    httpsAgent,
  });
}

export function classifyFailure(err: unknown): UnavailableReason {
  if (axios.isAxiosError(err)) {
    return err.code === 'ETIMEDOUT' || err.code === 'ECONNABORTED'
      ? 'timeout'
      : 'api_error';
  }
  return 'api_error';
}

export function describeFailure(err: unknown): {
  message: string;
  code?: string;
  status?: number;
} {
  if (axios.isAxiosError(err)) {
    return {
      message: err.message,
      code: err.code,
      status: err.response?.status,
    };
  }
  return { message: err instanceof Error ? err.message : String(err) };
}

export class SchemaMismatchError extends Error {
  constructor(
    source: string,
    readonly issues: unknown[]
  ) {
    super(`${source} schema mismatch`);
    this.name = 'SchemaMismatchError';
  }
}
