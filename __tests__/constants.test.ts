import { describe, it, expect } from 'vitest';
import { CONFERENCES, DIVISION_ORDER, LAYOUT, REGULAR_SEASON_TYPE, STANDINGS_WRAPPER_KEYS } from '../src/core/constants.js';
import { TEAM_METADATA } from '../src/league/teams.js';

describe('constants', () => {
  it('should list both conferences by abbreviation and full name', () => {
    expect(CONFERENCES.ABBREVIATIONS).toEqual(['AFC', 'NFC']);
    expect(CONFERENCES.FULL_NAMES).toEqual(['American Football Conference', 'National Football Conference']);
  });

  it('should order exactly the divisions teams belong to', () => {
    const divisions = new Set(Array.from(TEAM_METADATA.values(), (t) => t.division));
    expect([...DIVISION_ORDER].sort()).toEqual(Array.from(divisions).sort());
  });

  it('should walk standings wrappers starting with standings', () => {
    expect(STANDINGS_WRAPPER_KEYS[0]).toBe('standings');
    expect(STANDINGS_WRAPPER_KEYS).toContain('children');
  });

  it('should have the layout and season type values', () => {
    expect(REGULAR_SEASON_TYPE).toBe(2);
    expect(LAYOUT.STANDINGS_COLUMN_WIDTH).toBe(42);
  });
});
