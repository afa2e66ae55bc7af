/**
 * Host Dependencies Contract
 *
 * External collaborators (logging, time, HTTP) are injected so that engine
 * modules never reach for console, Date.now() or axios directly.
 */

import axios, { type AxiosInstance } from 'axios';

// ═══════════════════════════════════════════════════════════════
// CORE INTERFACES
// ═══════════════════════════════════════════════════════════════

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
  utcNow: () => Date;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number>;
  timeout?: number;
  signal?: AbortSignal;
}

export interface HttpResponse<T> {
  ok: boolean;
  status: number;
  data: T;
}

export interface HttpClient {
  get: <T = unknown>(url: string, options?: RequestOptions) => Promise<HttpResponse<T>>;
  post: <T = unknown>(url: string, body?: unknown, options?: RequestOptions) => Promise<HttpResponse<T>>;
}

// ═══════════════════════════════════════════════════════════════
// DEFAULT IMPLEMENTATIONS
// ═══════════════════════════════════════════════════════════════

export function createConsoleLogger(tag: string): Logger {
  return {
    info: (obj, msg) => console.log(`[${tag}] ${msg || ''}`, obj),
    warn: (obj, msg) => console.warn(`[${tag}] ${msg || ''}`, obj),
    error: (obj, msg) => console.error(`[${tag}] ${msg || ''}`, obj),
    debug: (obj, msg) => console.debug(`[${tag}] ${msg || ''}`, obj),
  };
}

export const defaultClock: Clock = {
  now: () => Date.now(),
  utcNow: () => new Date(),
};

/**
 * HttpClient over axios. Non-2xx responses resolve with ok=false;
 * transport failures (DNS, refused, timeout, abort) reject.
 */
export function createAxiosHttpClient(baseURL: string, token?: string): HttpClient {
  const instance: AxiosInstance = axios.create({
    baseURL,
    headers: token ? { Authorization: `Bearer ${token}` } : undefined,
    validateStatus: () => true,
  });

  return {
    async get<T>(url: string, options?: RequestOptions): Promise<HttpResponse<T>> {
      const res = await instance.get<T>(url, {
        headers: options?.headers,
        params: options?.params,
        timeout: options?.timeout,
        signal: options?.signal,
      });
      return { ok: res.status >= 200 && res.status < 300, status: res.status, data: res.data };
    },
    async post<T>(url: string, body?: unknown, options?: RequestOptions): Promise<HttpResponse<T>> {
      const res = await instance.post<T>(url, body, {
        headers: options?.headers,
        params: options?.params,
        timeout: options?.timeout,
        signal: options?.signal,
      });
      return { ok: res.status >= 200 && res.status < 300, status: res.status, data: res.data };
    },
  };
}
