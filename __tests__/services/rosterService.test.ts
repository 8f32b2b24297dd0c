import { describe, it, expect, vi } from 'vitest';
import { fetchRoster, fetchRosterPayload } from '../../src/services/rosterService.js';
import { CollegeNameCache } from '../../src/services/collegeCache.js';
import { NetworkError, SchemaError } from '../../src/errors/index.js';
import { rosterUrl } from '../../src/http/espnClient.js';
import type { FetchContext } from '../../src/services/context.js';
import type { JsonValue } from '../../src/util/json.js';
import { refItem } from '../fixtures/espn.js';

const ATHLETE_BASE = 'https://sports.core.api.espn.com/v2/sports/football/leagues/nfl/seasons/2024/athletes';
const COLLEGE_BASE = 'https://sports.core.api.espn.com/v2/colleges';

/**
 * Fetcher that serves canned payloads and fails for anything else
 */
function fakeFetcher(routes: Record<string, JsonValue>) {
  return vi.fn(async (url: string): Promise<JsonValue> => {
    if (url in routes) return routes[url];
    throw new NetworkError(`HTTP 404 from ${url}`, url, 404);
  });
}

function context(fetchJson: FetchContext['fetchJson'], cache = new CollegeNameCache()): FetchContext {
  return { fetchJson, collegeCache: cache, concurrency: { players: 8, colleges: 4 } };
}

describe('rosterService', () => {
  describe('fetchRosterPayload', () => {
    it('should resolve athlete references and keep inline athletes', async () => {
      const fetchJson = fakeFetcher({
        [rosterUrl('2', 2024)]: {
          items: [refItem(`http://sports.core.api.espn.com/v2/sports/football/leagues/nfl/seasons/2024/athletes/1`), { fullName: 'Inline Player' }],
        },
        [`${ATHLETE_BASE}/1`]: { fullName: 'Referenced Player' },
      });

      const payload = await fetchRosterPayload('2', 2024, context(fetchJson));

      expect(payload).toEqual({ athletes: [{ fullName: 'Inline Player' }, { fullName: 'Referenced Player' }] });
      expect(fetchJson).toHaveBeenCalledWith(`${ATHLETE_BASE}/1`);
    });

    it('should drop a single failed reference and keep the other seven', async () => {
      const routes: Record<string, JsonValue> = {};
      const items: JsonValue[] = [];
      for (let i = 1; i <= 8; i++) {
        items.push(refItem(`${ATHLETE_BASE}/${i}`));
        if (i !== 5) routes[`${ATHLETE_BASE}/${i}`] = { fullName: `Player ${i}` };
      }
      routes[rosterUrl('2', 2024)] = { items };

      const roster = await fetchRoster('2', 2024, context(fakeFetcher(routes)));

      expect(roster.map((p) => p.name)).toEqual([
        'Player 1', 'Player 2', 'Player 3', 'Player 4', 'Player 6', 'Player 7', 'Player 8',
      ]);
    });

    it('should never have more than the configured number of references in flight', async () => {
      let inFlight = 0;
      let peak = 0;
      const items = Array.from({ length: 20 }, (_, i) => refItem(`${ATHLETE_BASE}/${i}`));
      const fetchJson = vi.fn(async (url: string): Promise<JsonValue> => {
        if (url === rosterUrl('2', 2024)) return { items };
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((r) => setTimeout(r, 1));
        inFlight -= 1;
        return { fullName: url };
      });

      const payload = await fetchRosterPayload('2', 2024, { ...context(fetchJson), concurrency: { players: 3, colleges: 1 } });

      expect(peak).toBe(3);
      expect(payload.athletes).toHaveLength(20);
    });

    it('should rethrow when every reference fails', async () => {
      const fetchJson = fakeFetcher({
        [rosterUrl('2', 2024)]: { items: [refItem(`${ATHLETE_BASE}/1`), refItem(`${ATHLETE_BASE}/2`)] },
      });

      await expect(fetchRosterPayload('2', 2024, context(fetchJson))).rejects.toThrow(NetworkError);
    });

    it('should throw SchemaError when the index has no items list', async () => {
      const fetchJson = fakeFetcher({ [rosterUrl('2', 2024)]: { count: 0 } });

      await expect(fetchRosterPayload('2', 2024, context(fetchJson))).rejects.toThrow('Roster index missing athlete items.');
    });

    it('should throw SchemaError when items hold nothing usable', async () => {
      const fetchJson = fakeFetcher({ [rosterUrl('2', 2024)]: { items: ['junk', 7] } });

      await expect(fetchRosterPayload('2', 2024, context(fetchJson))).rejects.toThrow(SchemaError);
    });

    it('should treat an empty items list as an empty roster', async () => {
      const fetchJson = fakeFetcher({ [rosterUrl('2', 2024)]: { items: [] } });

      await expect(fetchRoster('2', 2024, context(fetchJson))).resolves.toEqual([]);
    });

    it('should fill college names from references through the cache', async () => {
      const fetchJson = fakeFetcher({
        [rosterUrl('2', 2024)]: {
          items: [
            { fullName: 'A', college: { $ref: `http://sports.core.api.espn.com/v2/colleges/10` } },
            { fullName: 'B', college: { $ref: `${COLLEGE_BASE}/10` } },
            { fullName: 'C', college: { $ref: `${COLLEGE_BASE}/11` } },
            { fullName: 'D', college: { name: 'Inline U' } },
          ],
        },
        [`${COLLEGE_BASE}/10`]: { shortDisplayName: 'Northern State' },
      });
      const cache = new CollegeNameCache();

      const roster = await fetchRoster('2', 2024, context(fetchJson, cache));

      expect(roster.map((p) => p.college)).toEqual(['Northern State', 'Northern State', null, 'Inline U']);
      expect(fetchJson.mock.calls.filter(([url]) => url === `${COLLEGE_BASE}/10`)).toHaveLength(1);
      expect(await cache.get(`${COLLEGE_BASE}/10`)).toBe('Northern State');
      expect(await cache.get(`${COLLEGE_BASE}/11`)).toBeUndefined();
    });

    it('should reuse cached college names across rosters', async () => {
      const cache = new CollegeNameCache();
      await cache.set(`${COLLEGE_BASE}/10`, 'Cached College');
      const fetchJson = fakeFetcher({
        [rosterUrl('2', 2024)]: { items: [{ fullName: 'A', college: { $ref: `${COLLEGE_BASE}/10` } }] },
      });

      const roster = await fetchRoster('2', 2024, context(fetchJson, cache));

      expect(roster[0].college).toBe('Cached College');
      expect(fetchJson).toHaveBeenCalledTimes(1);
    });
  });
});
