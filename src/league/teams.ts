/**
 * Team Metadata
 *
 * Static franchise table loaded from data/nfl-teams.json. Used when the
 * standings payload does not say which conference a team belongs to, for the
 * offline placeholder standings, and to bound the season picker.
 */

import { readFileSync } from 'node:fs';
import { PLACEHOLDER, SEASON_START_MONTH } from '../core/constants.js';
import { asArray, asObject, getNumber, getString, parseJson } from '../util/json.js';
import type { SeasonStandings, TeamMetadata, TeamRecord } from '../types/nfl.js';

const DATA_FILE = new URL('../../data/nfl-teams.json', import.meta.url);

function loadTeams(): TeamMetadata[] {
  const root = asObject(parseJson(readFileSync(DATA_FILE, 'utf8')));
  const rows = asArray(root?.teams) ?? [];
  const teams: TeamMetadata[] = [];
  for (const row of rows) {
    const obj = asObject(row);
    const name = getString(obj, 'name');
    const conference = getString(obj, 'conference');
    const division = getString(obj, 'division');
    const firstSeason = getNumber(obj, 'firstSeason');
    if (!name || !conference || !division || firstSeason === null) {
      throw new Error(`Malformed team metadata row in ${DATA_FILE.pathname}`);
    }
    teams.push({ name, conference, division, firstSeason });
  }
  return teams;
}

/** Every franchise, keyed by display name */
export const TEAM_METADATA: ReadonlyMap<string, TeamMetadata> = new Map(
  loadTeams().map((t) => [t.name, t])
);

/** Earliest first season across all franchises */
export const EARLIEST_FRANCHISE_SEASON = Math.min(
  ...Array.from(TEAM_METADATA.values(), (t) => t.firstSeason)
);

/**
 * Team names in alphabetical order (the team picker's contents)
 */
export function teamNames(): string[] {
  return Array.from(TEAM_METADATA.keys()).sort();
}

/**
 * Season year that most likely represents the current NFL season
 *
 * Seasons kick off in September, so before July we are still in the prior one.
 *
 * @example
 * currentSeasonYear(new Date(2025, 1, 10)) // 2024
 * currentSeasonYear(new Date(2025, 8, 10)) // 2025
 */
export function currentSeasonYear(today: Date = new Date()): number {
  return today.getMonth() + 1 >= SEASON_START_MONTH ? today.getFullYear() : today.getFullYear() - 1;
}

/**
 * Seasons a franchise has played, newest first
 */
export function seasonsForTeam(teamName: string, currentSeason: number): number[] {
  const start = TEAM_METADATA.get(teamName)?.firstSeason ?? EARLIEST_FRANCHISE_SEASON;
  const years: number[] = [];
  for (let y = currentSeason; y >= start; y--) years.push(y);
  return years;
}

/**
 * Standings shown before any live data arrives
 *
 * Stats are left empty rather than guessed.
 */
export function placeholderStandings(): SeasonStandings {
  const standings = new Map<string, TeamRecord>();
  for (const meta of TEAM_METADATA.values()) {
    standings.set(meta.name, {
      name: meta.name,
      conference: meta.conference,
      division: meta.division,
      record: PLACEHOLDER.RECORD,
      wins: null,
      losses: null,
      ties: null,
      pointsFor: null,
      pointsAgainst: null,
      winPct: null,
      streak: null,
      conferenceSeed: null,
      note: PLACEHOLDER.NOTE,
      externalId: null
    });
  }
  return standings;
}
