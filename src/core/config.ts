/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';

/**
 * Reads a positive integer from the environment, falling back when unset or invalid
 *
 * @param name - Environment variable name
 * @param fallback - Value used when the variable is missing or not a positive integer
 */
function positiveInt(name: string, fallback: number): number {
  const n = Number(process.env[name]);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

/**
 * Which view the entry point renders first
 */
export type StartView = 'team' | 'standings';

function startView(): StartView {
  return process.env.HUDDLE_VIEW === 'standings' ? 'standings' : 'team';
}

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // ESPN public API endpoints (no key required)
  espn: {
    standingsUrl: process.env.ESPN_STANDINGS_URL || 'https://site.web.api.espn.com/apis/v2/sports/football/nfl/standings',
    // {season_year} and {team_id} are substituted per request
    rosterUrl: process.env.ESPN_ROSTER_URL
      || 'https://sports.core.api.espn.com/v2/sports/football/leagues/nfl/seasons/{season_year}/teams/{team_id}/athletes',
    rosterPageLimit: positiveInt('ROSTER_PAGE_LIMIT', 200)
  },
  // HTTP client configuration
  http: {
    timeoutMs: positiveInt('HTTP_TIMEOUT_MS', 10000), // Applied to every GET, including $ref lookups
    userAgent: process.env.HTTP_USER_AGENT || 'huddle-nfl-viewer/0.1'
  },
  // Bounded fan-out for $ref resolution inside one roster fetch
  concurrency: {
    players: positiveInt('PLAYER_FETCH_CONCURRENCY', 8),
    colleges: positiveInt('COLLEGE_FETCH_CONCURRENCY', 4)
  },
  // Initial selection for the viewer
  viewer: {
    team: process.env.HUDDLE_TEAM || 'Buffalo Bills',
    season: process.env.HUDDLE_SEASON || '', // Empty = current NFL season
    view: startView()
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal, silent)
};
