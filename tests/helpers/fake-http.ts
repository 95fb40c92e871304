/**
 * In-process axios adapter: canned responses by URL, every request recorded.
 * Unrouted URLs get the fallback route (a 404 unless given).
 */

import { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface FakeResponse {
  status?: number;
  body: string | Buffer;
}

export type FakeRoute = FakeResponse | ((config: InternalAxiosRequestConfig) => FakeResponse);

export interface FakeHttp {
  adapter: AxiosAdapter;
  calls: InternalAxiosRequestConfig[];
}

const NOT_FOUND: FakeResponse = { status: 404, body: 'not found' };

/** Route that fails the way axios reports an exceeded `timeout` */
export function timesOut(ms = 1000): FakeRoute {
  return (config): FakeResponse => {
    throw new AxiosError(`timeout of ${ms}ms exceeded`, 'ECONNABORTED', config);
  };
}

export function fakeHttp(routes: Record<string, FakeRoute>, fallback: FakeRoute = NOT_FOUND): FakeHttp {
  const calls: InternalAxiosRequestConfig[] = [];

  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const url = config.url ?? '';
    const route = routes[url] ?? fallback;
    const result: FakeResponse = typeof route === 'function' ? route(config) : route;

    const status = result.status ?? 200;
    const response: AxiosResponse = {
      data: result.body,
      status,
      statusText: status === 200 ? 'OK' : 'Error',
      headers: {},
      config,
      request: {},
    };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, {}, response);
    }
    return response;
  };

  return { adapter, calls };
}

/** Form fields of a recorded POST */
export function formBody(config: InternalAxiosRequestConfig): URLSearchParams {
  return new URLSearchParams(typeof config.data === 'string' ? config.data : String(config.data));
}
