import { describe, it, expect, vi } from 'vitest';
import { CollegeNameCache } from '../../src/services/collegeCache.js';
import type { JsonValue } from '../../src/util/json.js';

const REF_A = 'https://example.test/colleges/1';
const REF_B = 'https://example.test/colleges/2';
const REF_C = 'https://example.test/colleges/3';

describe('CollegeNameCache', () => {
  it('should fetch each missing reference once and prefer the full name', async () => {
    const fetchJson = vi.fn(async (url: string): Promise<JsonValue> => {
      if (url === REF_A) return { name: 'First College', shortDisplayName: 'First' };
      return { displayName: 'Second College' };
    });
    const cache = new CollegeNameCache();

    const names = await cache.resolve([REF_A, REF_B, REF_A], fetchJson, 2);

    expect(names).toEqual(new Map([[REF_A, 'First College'], [REF_B, 'Second College']]));
    expect(fetchJson).toHaveBeenCalledTimes(2);
  });

  it('should serve cached names without fetching', async () => {
    const cache = new CollegeNameCache();
    await cache.set(REF_A, 'First College');
    const fetchJson = vi.fn(async (): Promise<JsonValue> => ({}));

    const names = await cache.resolve([REF_A], fetchJson, 2);

    expect(names.get(REF_A)).toBe('First College');
    expect(fetchJson).not.toHaveBeenCalled();
  });

  it('should leave out failed and nameless references without caching them', async () => {
    const fetchJson = vi.fn(async (url: string): Promise<JsonValue> => {
      if (url === REF_B) throw new Error('HTTP 404');
      if (url === REF_C) return { id: '3' };
      return { name: 'First College' };
    });
    const cache = new CollegeNameCache();

    const names = await cache.resolve([REF_A, REF_B, REF_C], fetchJson, 1);

    expect(Array.from(names.keys())).toEqual([REF_A]);
    expect(await cache.get(REF_B)).toBeUndefined();
    expect(await cache.get(REF_C)).toBeUndefined();
  });
});
