/**
 * ESPN API Client Module
 *
 * Constructs URLs for ESPN's public NFL endpoints. None of them need a key.
 */

import { cfg } from '../core/config.js';
import { REGULAR_SEASON_TYPE } from '../core/constants.js';
import { isValidSeasonYear, isValidTeamId, isValidUrl, ValidationError } from '../util/validation.js';

function checkSeason(seasonYear: number): void {
  if (!isValidSeasonYear(seasonYear)) {
    throw new ValidationError(`Invalid season year: ${seasonYear}`, 'seasonYear');
  }
}

/**
 * Constructs URL for league standings
 *
 * @param seasonYear - Season year (e.g. 2024 for the 2024-25 season)
 * @returns Full URL
 *
 * @example
 * standingsUrl(2024)
 * // Returns: https://site.web.api.espn.com/apis/v2/sports/football/nfl/standings?season=2024&seasontype=2
 */
export function standingsUrl(seasonYear: number): string {
  checkSeason(seasonYear);
  const base = cfg.espn.standingsUrl;
  if (!isValidUrl(base)) {
    throw new ValidationError(`Invalid standings URL: ${base}`, 'standingsUrl');
  }
  return `${base}?season=${seasonYear}&seasontype=${REGULAR_SEASON_TYPE}`;
}

/**
 * Constructs URL for a team's roster index
 *
 * The index lists athletes as $ref pointers that are fetched separately.
 *
 * @example
 * rosterUrl('2', 2024)
 * // Returns: https://sports.core.api.espn.com/v2/sports/football/leagues/nfl/seasons/2024/teams/2/athletes?limit=200
 */
export function rosterUrl(teamId: string, seasonYear: number): string {
  checkSeason(seasonYear);
  if (!isValidTeamId(teamId)) {
    throw new ValidationError(`Invalid team id: ${teamId}`, 'teamId');
  }
  const base = cfg.espn.rosterUrl
    .replace('{season_year}', String(seasonYear))
    .replace('{team_id}', teamId);
  return `${base}?limit=${cfg.espn.rosterPageLimit}`;
}

/**
 * ESPN hands out $ref URLs over plain http; upgrade them to https
 */
export function normalizeRefUrl(url: string): string {
  return url.startsWith('http://') ? `https://${url.slice('http://'.length)}` : url;
}
