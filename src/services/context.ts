/**
 * Fetch Context
 *
 * Everything a fetch cycle needs from the outside world, passed explicitly
 * instead of reached for through module globals.
 */

import { cfg } from '../core/config.js';
import { fetchJson, type JsonFetcher } from '../util/http.js';
import { sharedCollegeCache, type CollegeNameCache } from './collegeCache.js';

export interface FetchContext {
  fetchJson: JsonFetcher;
  collegeCache: CollegeNameCache;
  concurrency: {
    players: number;
    colleges: number;
  };
}

/**
 * Context backed by the real HTTP client and the process-wide college cache
 */
export function defaultContext(overrides: Partial<FetchContext> = {}): FetchContext {
  return {
    fetchJson,
    collegeCache: sharedCollegeCache,
    concurrency: { ...cfg.concurrency },
    ...overrides
  };
}
