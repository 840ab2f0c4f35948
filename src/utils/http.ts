// Minimal HTTP surface used by the service clients. axios satisfies it; tests
// inject a fake with the same shape.

import axios, { isAxiosError } from "axios";
import { errorMessage } from "../errors.js";

export interface HttpRequestConfig {
  /** Milliseconds before axios aborts the request; 0 disables it. */
  timeout: number;
  headers: Record<string, string>;
}

export interface HttpClient {
  post(url: string, data: unknown, config: HttpRequestConfig): Promise<{ data: unknown }>;
}

export const defaultHttpClient: HttpClient = axios;

/** "HTTP 503 Service Unavailable" for error responses, the transport message otherwise. */
export function httpErrorMessage(err: unknown): string {
  if (isAxiosError(err) && err.response) {
    return `HTTP ${err.response.status} ${err.response.statusText}`;
  }
  return errorMessage(err);
}
