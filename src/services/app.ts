/**
 * Application Service
 *
 * One-shot run of the viewer: selects the configured team and season, fetches
 * what the chosen view needs, and prints it to stdout.
 */

import { cfg } from '../core/config.js';
import { logger } from '../core/logger.js';
import { parseSeasonYear, ValidationError } from '../util/validation.js';
import { ViewerSession } from '../viewer/session.js';
import { defaultContext } from './context.js';
import { espnRunners } from './fetchCoordinator.js';

/**
 * Resolves the configured season, or undefined for the current one
 */
function configuredSeason(): number | undefined {
  const raw = cfg.viewer.season;
  if (!raw) return undefined;
  const season = parseSeasonYear(raw);
  if (season === null) {
    throw new ValidationError(`Invalid configured season: ${raw}`, 'HUDDLE_SEASON');
  }
  return season;
}

function setupShutdownHandlers(): void {
  const shutdown = (signal: string) => {
    // In-flight requests are not cancellable; just leave
    logger.info(`${signal} received, exiting`);
    process.exit(130);
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * Main application logic
 *
 * 1. Builds a session over the real ESPN fetchers
 * 2. Waits for standings (and, for the team view, the roster) to settle
 * 3. Prints the view, then surfaces any fetch warning on stderr
 */
export async function startApp(out: NodeJS.WritableStream = process.stdout): Promise<ViewerSession> {
  setupShutdownHandlers();

  const session = new ViewerSession({
    runners: espnRunners(defaultContext()),
    team: cfg.viewer.team,
    season: configuredSeason()
  });
  logger.info({ team: session.selectedTeam, season: session.selectedSeason, view: cfg.viewer.view }, 'starting viewer');

  session.start();
  if (cfg.viewer.view === 'standings') session.showStandings();
  else session.showTeam();
  await session.settle();

  out.write(`${session.render().join('\n')}\n`);

  const warning = session.takeWarning();
  if (warning) logger.warn(warning);
  logger.info(session.status);
  return session;
}
