/**
 * HTTP plumbing shared by the HKEX clients
 *
 * Every request carries the configured timeout; any transport failure,
 * timeout or non-2xx status surfaces as a NetworkError.
 */

import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig } from 'axios';
import { Readable } from 'stream';
import { NetworkError } from './errors.js';

export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export interface HttpClientOptions {
  timeoutMs: number;
  adapter?: AxiosAdapter;  // tests plug an in-process adapter here
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs,
    maxRedirects: 5,
    headers: {
      'User-Agent': USER_AGENT,
      'Accept-Language': 'en-US,en;q=0.9',
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    },
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });
}

function toNetworkError(error: unknown, url: string): NetworkError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status ?? null;
    const reason = status !== null ? `HTTP ${status}` : error.code ?? error.message;
    return new NetworkError(`Request to ${url} failed: ${reason}`, url, status, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(`Request to ${url} failed: ${message}`, url, null, { cause: error });
}

function bodyToText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  if (data === null || data === undefined) return '';
  return JSON.stringify(data);
}

/**
 * GET (or POST a form) and return the body as text
 */
export async function fetchText(
  client: AxiosInstance,
  url: string,
  config: { method?: 'get' | 'post'; params?: Record<string, string> } = {},
): Promise<string> {
  const request: AxiosRequestConfig = {
    url,
    method: config.method ?? 'get',
    responseType: 'text',
    transformResponse: (raw: unknown) => raw,
  };
  if (config.params) {
    if (request.method === 'post') {
      request.data = new URLSearchParams(config.params);
    } else {
      request.params = config.params;
    }
  }

  try {
    const response = await client.request<unknown>(request);
    return bodyToText(response.data);
  } catch (error) {
    throw toNetworkError(error, url);
  }
}

/**
 * GET a binary body, truncated after maxBytes
 */
export async function fetchBytes(client: AxiosInstance, url: string, maxBytes: number): Promise<Buffer> {
  try {
    const response = await client.get<unknown>(url, {
      responseType: 'stream',
      headers: { Accept: 'application/pdf,*/*' },
    });
    const data = response.data;

    if (data instanceof Readable) {
      return await readCapped(data, maxBytes);
    }
    if (Buffer.isBuffer(data)) return data.subarray(0, maxBytes);
    if (data instanceof ArrayBuffer) return Buffer.from(data).subarray(0, maxBytes);
    if (typeof data === 'string') return Buffer.from(data, 'latin1').subarray(0, maxBytes);
    return Buffer.alloc(0);
  } catch (error) {
    throw toNetworkError(error, url);
  }
}

async function readCapped(stream: Readable, maxBytes: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of stream) {
    const buf: Buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    chunks.push(buf);
    total += buf.length;
    if (total >= maxBytes) {
      stream.destroy();
      break;
    }
  }
  return Buffer.concat(chunks).subarray(0, maxBytes);
}

/**
 * Resolve a link found on an HKEX page against its host
 */
export function absoluteUrl(href: string, base: string): string {
  try {
    return new URL(href, base).toString();
  } catch {
    return href;
  }
}
