/**
 * Roster Service
 *
 * Fetches a team's roster for one season. The roster index mostly holds
 * $ref pointers, so each athlete (and each athlete's college) is resolved
 * with a follow-up GET, fanned out through a bounded worker pool.
 */

import { logger } from '../core/logger.js';
import { describeError, SchemaError } from '../errors/index.js';
import { normalizeRefUrl, rosterUrl } from '../http/espnClient.js';
import { parseRoster } from '../parsing/rosterNormalizer.js';
import { asObject, getArray, getObject, getString, type JsonObject } from '../util/json.js';
import { mapSettled } from '../util/pool.js';
import type { RosterEntry } from '../types/nfl.js';
import type { FetchContext } from './context.js';

function refOf(obj: JsonObject | null): string | null {
  const ref = getString(obj, '$ref');
  return ref ? normalizeRefUrl(ref) : null;
}

/**
 * College $ref for an athlete that has no inline college name
 */
function pendingCollegeRef(athlete: JsonObject): string | null {
  if (typeof athlete.college === 'string') return null;
  const college = getObject(athlete, 'college');
  if (getString(college, 'name')) return null;
  return refOf(college);
}

/**
 * Fills in college names that are only available as references
 *
 * Athletes whose lookup fails keep their unresolved college.
 */
async function populateCollegeNames(athletes: JsonObject[], ctx: FetchContext): Promise<JsonObject[]> {
  const refs = athletes.map(pendingCollegeRef);
  const pending = refs.filter((ref): ref is string => ref !== null);
  if (pending.length === 0) return athletes;

  const names = await ctx.collegeCache.resolve(pending, ctx.fetchJson, ctx.concurrency.colleges);
  return athletes.map((athlete, i) => {
    const ref = refs[i];
    const name = ref ? names.get(ref) : undefined;
    return name ? { ...athlete, college: { name } } : athlete;
  });
}

/**
 * Fetches the roster index and resolves it into full athlete objects
 *
 * A single athlete reference that fails is dropped; the roster is only a
 * failure when every item was a reference and none of them resolved.
 *
 * @returns Payload of the form { athletes: [...] }
 * @throws SchemaError when the index has no items list
 */
export async function fetchRosterPayload(teamId: string, seasonYear: number, ctx: FetchContext): Promise<JsonObject> {
  const url = rosterUrl(teamId, seasonYear);
  const index = asObject(await ctx.fetchJson(url));
  const items = getArray(index, 'items');
  if (!items) {
    throw new SchemaError('Roster index missing athlete items.', 'roster');
  }

  const refs: string[] = [];
  const athletes: JsonObject[] = [];
  for (const value of items) {
    const item = asObject(value);
    if (!item) continue;
    const ref = refOf(item);
    if (ref) refs.push(ref);
    else athletes.push(item);
  }

  if (refs.length > 0) {
    const settled = await mapSettled(refs, ctx.concurrency.players, async (ref) => asObject(await ctx.fetchJson(ref)));
    let failed = 0;
    let firstFailure: unknown;
    for (const [i, result] of settled.entries()) {
      if (result.status === 'fulfilled') {
        if (result.value) athletes.push(result.value);
        continue;
      }
      failed += 1;
      firstFailure ??= result.reason;
      logger.debug({ ref: refs[i], reason: describeError(result.reason) }, 'athlete lookup failed');
    }
    if (failed > 0) {
      logger.info({ teamId, seasonYear, failed, total: refs.length }, 'dropped unresolved athletes');
    }
    if (athletes.length === 0 && firstFailure !== undefined) {
      throw firstFailure;
    }
  }

  if (items.length > 0 && athletes.length === 0) {
    throw new SchemaError('Roster index returned no athletes.', 'roster');
  }

  return { athletes: await populateCollegeNames(athletes, ctx) };
}

/**
 * Fetches and normalizes a team's roster
 *
 * An index with an empty items list is a legitimately empty roster.
 */
export async function fetchRoster(teamId: string, seasonYear: number, ctx: FetchContext): Promise<RosterEntry[]> {
  const payload = await fetchRosterPayload(teamId, seasonYear, ctx);
  const roster = parseRoster(payload);
  logger.debug({ teamId, seasonYear, players: roster.length }, 'roster parsed');
  return roster;
}
