/**
 * Standings Service
 *
 * Fetches league standings for a season and normalizes them into TeamRecords.
 */

import { logger } from '../core/logger.js';
import { standingsUrl } from '../http/espnClient.js';
import { parseStandings } from '../parsing/standingsNormalizer.js';
import type { SeasonStandings } from '../types/nfl.js';
import type { FetchContext } from './context.js';

/**
 * Fetches the standings for a season
 *
 * @param seasonYear - Season year
 * @param ctx - Fetch context
 * @returns Team records keyed by name; empty when the season has none yet
 * @throws NetworkError, DecodeError or SchemaError
 */
export async function fetchStandings(seasonYear: number, ctx: FetchContext): Promise<SeasonStandings> {
  const url = standingsUrl(seasonYear);
  const payload = await ctx.fetchJson(url);
  const standings = parseStandings(payload);

  if (standings.size === 0) {
    logger.warn({ seasonYear, url }, 'standings payload had no teams');
  } else {
    logger.debug({ seasonYear, teams: standings.size }, 'standings parsed');
  }
  return standings;
}
