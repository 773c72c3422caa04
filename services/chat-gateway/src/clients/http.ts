import axios, { type AxiosInstance } from 'axios';
import { UpstreamError, UpstreamTimeoutError, errorMessage, isGatewayError, type GatewayError } from '../utils/errors.js';

export const USER_AGENT = 'IssueChatGateway/1.0.0';

export interface ServiceClientOptions {
  baseURL: string;
  timeout?: number;
  headers?: Record<string, string>;
}

/**
 * Axios instance for one collaborator, logging every failed call once.
 */
export function createServiceClient(service: string, options: ServiceClientOptions): AxiosInstance {
  const client = axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout ?? 0,
    headers: {
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
      ...options.headers,
    },
  });

  client.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
      if (axios.isAxiosError(error)) {
        console.error(`${service} API error:`, {
          message: error.message,
          code: error.code,
          status: error.response?.status,
        });
      }
      throw error;
    }
  );

  return client;
}

/**
 * Map an axios (or any other) failure onto the gateway's upstream errors
 */
export function toUpstreamError(service: string, error: unknown, timeoutMs?: number): GatewayError {
  if (isGatewayError(error)) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new UpstreamTimeoutError(service, timeoutMs ?? 0);
    }
    const status = error.response?.status;
    const message = status !== undefined ? `${service} responded with status ${status}` : `${service} unreachable: ${error.message}`;
    return new UpstreamError(service, message, status);
  }
  return new UpstreamError(service, errorMessage(error));
}
