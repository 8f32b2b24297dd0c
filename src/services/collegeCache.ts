/**
 * College Name Cache
 *
 * Roster athletes usually carry their college only as a $ref. Resolving the
 * same school for every team is wasteful, so names are cached per reference
 * for the life of the process and shared by all roster fetches.
 */

import { logger } from '../core/logger.js';
import { describeError } from '../errors/index.js';
import { asObject, getString } from '../util/json.js';
import { Mutex } from '../util/mutex.js';
import { mapSettled } from '../util/pool.js';
import type { JsonFetcher } from '../util/http.js';

export class CollegeNameCache {
  private readonly names = new Map<string, string>();
  private readonly lock = new Mutex();

  get(ref: string): Promise<string | undefined> {
    return this.lock.runExclusive(() => this.names.get(ref));
  }

  set(ref: string, name: string): Promise<void> {
    return this.lock.runExclusive(() => {
      this.names.set(ref, name);
    });
  }

  /**
   * Resolves a batch of references, fetching only those not yet cached
   *
   * @param refs - College $ref URLs (duplicates allowed)
   * @param fetchJson - Fetcher for the reference URLs
   * @param concurrency - Maximum lookups in flight
   * @returns Names for every reference that resolved; failures are left out
   */
  async resolve(refs: Iterable<string>, fetchJson: JsonFetcher, concurrency: number): Promise<Map<string, string>> {
    const resolved = new Map<string, string>();
    const missing: string[] = [];
    for (const ref of new Set(refs)) {
      const cached = await this.get(ref);
      if (cached) resolved.set(ref, cached);
      else missing.push(ref);
    }

    const settled = await mapSettled(missing, concurrency, async (ref) => {
      const payload = asObject(await fetchJson(ref));
      return getString(payload, 'name') ?? getString(payload, 'shortDisplayName') ?? getString(payload, 'displayName');
    });

    for (const [i, result] of settled.entries()) {
      const ref = missing[i];
      if (result.status === 'rejected') {
        logger.debug({ ref, reason: describeError(result.reason) }, 'college lookup failed');
        continue;
      }
      if (result.value) {
        resolved.set(ref, result.value);
        await this.set(ref, result.value);
      }
    }
    return resolved;
  }
}

/**
 * Process-wide cache shared by every roster fetch
 */
export const sharedCollegeCache = new CollegeNameCache();
