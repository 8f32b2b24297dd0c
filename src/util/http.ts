/**
 * HTTP Utility Module
 *
 * Single entry point for reading JSON from the upstream APIs:
 * - Fixed timeout on every request
 * - Non-2xx responses and transport failures become NetworkError
 * - Bodies that do not parse become DecodeError
 */

import axios from 'axios';
import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { DecodeError, NetworkError } from '../errors/index.js';
import { parseJson, type JsonValue } from './json.js';

/**
 * Fetches a URL and returns its decoded JSON body
 *
 * Injected wherever a fetch cycle needs the network, so tests can swap it out.
 */
export type JsonFetcher = (url: string) => Promise<JsonValue>;

export interface HttpOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

/**
 * Performs an HTTP GET and decodes the body as JSON
 *
 * The body is requested as text so malformed JSON surfaces as a DecodeError
 * instead of being handed back as a string.
 *
 * @param url - Full URL to request
 * @param opts - Timeout override and extra headers
 * @returns Decoded JSON value
 * @throws NetworkError on connectivity failure, timeout or status >= 400
 * @throws DecodeError when the body is not valid JSON
 *
 * @example
 * const payload = await httpGetJson('https://site.web.api.espn.com/apis/v2/sports/football/nfl/standings?season=2024');
 */
export async function httpGetJson(url: string, opts: HttpOptions = {}): Promise<JsonValue> {
  const timeoutMs = opts.timeoutMs ?? cfg.http.timeoutMs;

  let res;
  try {
    res = await axios.get<string>(url, {
      headers: { 'User-Agent': cfg.http.userAgent, Accept: 'application/json', ...opts.headers },
      timeout: timeoutMs,
      responseType: 'text',
      validateStatus: () => true
    });
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    const timedOut = axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT');
    const message = timedOut
      ? `Request timed out after ${timeoutMs}ms`
      : `HTTP request failed: ${error.message}`;
    throw new NetworkError(message, url, 0, error);
  }

  if (res.status >= 400) {
    logger.warn({ url, status: res.status }, 'HTTP request failed');
    throw new NetworkError(`HTTP ${res.status} from ${url}`, url, res.status);
  }

  const body = typeof res.data === 'string' ? res.data : String(res.data ?? '');
  try {
    return parseJson(body);
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    throw new DecodeError(`Invalid JSON from ${url}: ${error.message}`, url, error);
  }
}

/**
 * Default fetcher bound to the configured timeout
 */
export const fetchJson: JsonFetcher = (url) => httpGetJson(url);
