/**
 * Fetch Coordinator
 *
 * Starts fetch-and-parse cycles in the background and reports each outcome
 * through a single completion callback. A cycle either yields a complete
 * result or an error message; it never throws past this boundary and never
 * touches viewer state itself.
 */

import { logger } from '../core/logger.js';
import { describeError } from '../errors/index.js';
import type { FetchCompletion, FetchKey, RosterEntry, SeasonStandings } from '../types/nfl.js';
import type { FetchContext } from './context.js';
import { fetchRoster } from './rosterService.js';
import { fetchStandings } from './standingsService.js';

/**
 * The two kinds of fetch cycle
 */
export interface CycleRunners {
  standings(season: number): Promise<SeasonStandings>;
  roster(teamId: string, season: number): Promise<RosterEntry[]>;
}

export type CompletionCallback = (completion: FetchCompletion) => void;

/**
 * Runners that hit ESPN through the given context
 */
export function espnRunners(ctx: FetchContext): CycleRunners {
  return {
    standings: (season) => fetchStandings(season, ctx),
    roster: (teamId, season) => fetchRoster(teamId, season, ctx)
  };
}

/**
 * Stable string form of a fetch key
 *
 * @example
 * fetchKeyId({ kind: 'roster', season: 2024, teamId: '2', teamName: 'Buffalo Bills' }) // "roster:2024:2"
 */
export function fetchKeyId(key: FetchKey): string {
  return key.kind === 'standings' ? `standings:${key.season}` : `roster:${key.season}:${key.teamId}`;
}

export class FetchCoordinator {
  private readonly running = new Map<string, Promise<void>>();

  constructor(
    private readonly runners: CycleRunners,
    private readonly onComplete: CompletionCallback
  ) {}

  isInFlight(key: FetchKey): boolean {
    return this.running.has(fetchKeyId(key));
  }

  get inFlightCount(): number {
    return this.running.size;
  }

  /**
   * Starts a cycle for the key unless one is already running
   *
   * @returns False when suppressed because the key is in flight
   */
  start(key: FetchKey): boolean {
    const id = fetchKeyId(key);
    if (this.running.has(id)) {
      logger.debug({ key: id }, 'fetch already in flight');
      return false;
    }

    const cycle = this.run(key).then((completion) => {
      this.running.delete(id);
      try {
        this.onComplete(completion);
      } catch (err) {
        logger.error({ key: id, err }, 'completion handler failed');
      }
    });
    this.running.set(id, cycle);
    return true;
  }

  /**
   * Resolves once nothing is in flight, including cycles started meanwhile
   */
  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values());
    }
  }

  private async run(key: FetchKey): Promise<FetchCompletion> {
    const id = fetchKeyId(key);
    logger.info({ key: id }, 'fetch started');
    if (key.kind === 'standings') {
      try {
        const result = await this.runners.standings(key.season);
        logger.info({ key: id, teams: result.size }, 'fetch completed');
        return { kind: key.kind, key, result, errorMessage: '' };
      } catch (err) {
        logger.warn({ key: id, err }, 'standings fetch failed');
        return { kind: key.kind, key, result: null, errorMessage: `Live fetch failed: ${describeError(err)}` };
      }
    }

    try {
      const result = await this.runners.roster(key.teamId, key.season);
      logger.info({ key: id, players: result.length }, 'fetch completed');
      return { kind: key.kind, key, result, errorMessage: '' };
    } catch (err) {
      logger.warn({ key: id, err }, 'roster fetch failed');
      return { kind: key.kind, key, result: null, errorMessage: `Roster fetch failed: ${describeError(err)}` };
    }
  }
}
