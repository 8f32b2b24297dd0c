/**
 * Viewer Session
 *
 * Headless state machine behind the viewer: current team and season, which
 * view is showing, the status line, and the cache of everything fetched.
 *
 * The session is the only owner of that state. Fetch cycles run in the
 * background through the FetchCoordinator and post their outcome onto a
 * ResultChannel; nothing changes until the session drains the channel with
 * pump() (or settle()) and applies each completion.
 */

import { logger } from '../core/logger.js';
import { currentSeasonYear, placeholderStandings, seasonsForTeam, TEAM_METADATA, teamNames } from '../league/teams.js';
import { FetchCoordinator, fetchKeyId, type CycleRunners } from '../services/fetchCoordinator.js';
import { ResultChannel } from '../services/resultChannel.js';
import { SeasonCache } from '../services/seasonCache.js';
import { ValidationError } from '../util/validation.js';
import { renderStandings, renderTeamView, type RosterView } from './render.js';
import type { FetchCompletion, FetchKey, RosterEntry, SeasonStandings, TeamRecord } from '../types/nfl.js';

const EMPTY_REFRESH_MESSAGE = 'Standings payload returned no teams.';

export interface SessionOptions {
  runners: CycleRunners;
  /** Defaults to the first team alphabetically */
  team?: string;
  /** Defaults to the current season */
  season?: number;
  /** Clock used for the season default and the standings timestamp */
  now?: () => Date;
}

export class ViewerSession {
  readonly cache = new SeasonCache();
  readonly currentSeason: number;

  private readonly channel = new ResultChannel<FetchCompletion>();
  private readonly coordinator: FetchCoordinator;
  private readonly placeholder: SeasonStandings = placeholderStandings();
  private readonly now: () => Date;
  /** Fetches started and not yet applied; outlives the coordinator's own in-flight entry */
  private readonly pending = new Set<string>();

  private team: string;
  private season: number;
  private showingStandings = false;
  private statusText = 'Loading fallback teams...';
  private warning: string | null = null;

  constructor(opts: SessionOptions) {
    this.now = opts.now ?? (() => new Date());
    this.currentSeason = currentSeasonYear(this.now());
    this.coordinator = new FetchCoordinator(opts.runners, (completion) => this.channel.post(completion));

    const team = opts.team ?? teamNames()[0];
    this.assertTeam(team);
    this.team = team;
    this.season = this.pickSeason(opts.season ?? this.currentSeason);
  }

  get selectedTeam(): string {
    return this.team;
  }

  get selectedSeason(): number {
    return this.season;
  }

  get status(): string {
    return this.statusText;
  }

  get isShowingStandings(): boolean {
    return this.showingStandings;
  }

  /**
   * Seasons offered for the selected team, newest first
   */
  seasonOptions(): number[] {
    return seasonsForTeam(this.team, this.currentSeason);
  }

  /**
   * Standings for the selected season, or placeholders until they load
   */
  standings(): SeasonStandings {
    return this.cache.getStandings(this.season) ?? this.placeholder;
  }

  /**
   * Returns the pending warning once, then clears it
   */
  takeWarning(): string | null {
    const warning = this.warning;
    this.warning = null;
    return warning;
  }

  /**
   * Kicks off the first standings fetch
   */
  start(): void {
    this.requestStandings(this.season);
  }

  selectTeam(name: string): void {
    this.assertTeam(name);
    this.team = name;
    this.season = this.pickSeason(this.season);
    this.showingStandings = false;
    this.refreshView(true);
  }

  selectSeason(season: number): void {
    if (!this.seasonOptions().includes(season)) {
      throw new ValidationError(`${this.team} did not play in ${season}`, 'season');
    }
    this.season = season;
    this.showingStandings = false;
    this.refreshView(true);
  }

  showStandings(): void {
    this.showingStandings = true;
    this.statusText = `Showing conference standings for ${this.season}.`;
  }

  showTeam(): void {
    this.showingStandings = false;
    this.refreshView(true);
  }

  /**
   * Forces a re-fetch of the selected season and, when known, the selected roster
   */
  refresh(): void {
    this.requestStandings(this.season, true);
    const teamId = this.selectedRecord()?.externalId;
    if (teamId) {
      this.cache.clearRosterError(this.season, teamId);
      this.requestRoster(teamId, this.team, this.season, true);
    }
  }

  /**
   * Starts a standings fetch unless cached (and not forced) or already in flight
   *
   * @returns Whether a fetch was started
   */
  requestStandings(season: number, force = false): boolean {
    if (!force && this.cache.hasStandings(season)) return false;
    if (!this.begin({ kind: 'standings', season })) return false;
    this.statusText = `Fetching standings for ${season} from ESPN...`;
    return true;
  }

  /**
   * Starts a roster fetch unless cached or failed (and not forced) or already in flight
   *
   * @returns Whether a fetch was started
   */
  requestRoster(teamId: string, teamName: string, season: number, force = false): boolean {
    if (!force && this.cache.getRoster(season, teamId) !== undefined) return false;
    if (!this.begin({ kind: 'roster', season, teamId, teamName })) return false;
    this.statusText = `Fetching roster for ${teamName} (${season}) from ESPN...`;
    return true;
  }

  /**
   * Applies every completion posted so far
   *
   * @returns Number of completions applied
   */
  pump(): number {
    const completions = this.channel.drain();
    for (const completion of completions) this.apply(completion);
    return completions.length;
  }

  /**
   * Waits until no fetch is in flight and every completion has been applied
   *
   * Applying a completion can start another fetch (standings bring the team
   * ids that rosters need), so this loops until the session is quiet.
   */
  async settle(): Promise<void> {
    do {
      await this.coordinator.whenIdle();
      this.pump();
    } while (this.coordinator.inFlightCount > 0 || this.channel.size > 0);
  }

  /**
   * Lines for whichever view is showing
   */
  render(): string[] {
    if (this.showingStandings) {
      const standings = this.standings();
      if (standings.size === 0) {
        return [`Season: ${this.season}`, '', 'No standings published for this season yet.'];
      }
      return renderStandings(standings, this.season, this.now());
    }

    const record = this.selectedRecord();
    if (!record) {
      return [`Team: ${this.team}`, `Season: ${this.season}`, 'No data for that team yet; try refreshing.'];
    }
    return renderTeamView(record, this.season, this.rosterView(record));
  }

  private begin(key: FetchKey): boolean {
    const id = fetchKeyId(key);
    if (this.pending.has(id) || !this.coordinator.start(key)) return false;
    this.pending.add(id);
    return true;
  }

  private apply(completion: FetchCompletion): void {
    this.pending.delete(fetchKeyId(completion.key));
    if (completion.kind === 'standings') {
      this.applyStandings(completion.key.season, completion.result, completion.errorMessage);
    } else {
      const { season, teamId, teamName } = completion.key;
      this.applyRoster(season, teamId, teamName, completion.result, completion.errorMessage);
    }
  }

  private applyStandings(season: number, result: SeasonStandings | null, resultError: string): void {
    const selected = season === this.season;
    const cachedTeams = this.cache.getStandings(season)?.size ?? 0;
    // Zero teams only counts as a result while nothing real is cached
    const emptied = result !== null && result.size === 0 && cachedTeams > 0;
    const standings = emptied ? null : result;
    const errorMessage = emptied ? `Live fetch failed: ${EMPTY_REFRESH_MESSAGE}` : resultError;
    if (standings) {
      this.cache.setStandings(season, standings);
      if (!selected) return;
      this.statusText = standings.size > 0
        ? `Standings refreshed for ${season}.`
        : `No standings published for ${season} yet.`;
      this.refreshView();
      return;
    }

    logger.warn({ season, errorMessage }, 'keeping previous standings');
    if (!selected) return;
    this.statusText = this.cache.hasStandings(season)
      ? `Keeping cached standings for ${season}. Refresh to try again.`
      : `Using offline fallback data for ${season}. Connect to the internet and refresh.`;
    if (errorMessage) this.warning = `Could not fetch live data.\n\n${errorMessage}`;
  }

  private applyRoster(season: number, teamId: string, teamName: string, roster: RosterEntry[] | null, errorMessage: string): void {
    if (roster) {
      this.cache.setRoster(season, teamId, roster);
      this.statusText = `Roster updated for ${teamName} (${season}).`;
    } else {
      this.cache.setRosterError(season, teamId, errorMessage || 'Roster unavailable.');
      this.statusText = `Roster unavailable for ${teamName} (${season}).`;
    }
  }

  private selectedRecord(): TeamRecord | undefined {
    return this.standings().get(this.team);
  }

  private rosterView(record: TeamRecord): RosterView {
    if (!record.externalId) return { state: 'missing-id' };
    const slot = this.cache.getRoster(this.season, record.externalId);
    if (!slot) return { state: 'loading' };
    return slot.state === 'loaded' ? { state: 'loaded', roster: slot.roster } : { state: 'failed', error: slot.error };
  }

  /**
   * Fetches whatever the current view is missing
   *
   * @param announce - Set the status to the view being shown when nothing needs fetching
   */
  private refreshView(announce = false): void {
    this.requestStandings(this.season);
    if (this.showingStandings) return;

    const record = this.selectedRecord();
    if (record?.externalId) {
      this.requestRoster(record.externalId, this.team, this.season);
    }
    if (announce && record && this.coordinator.inFlightCount === 0) {
      this.statusText = `Showing data for ${this.team} (${this.season}).`;
    }
  }

  private assertTeam(name: string): void {
    if (!TEAM_METADATA.has(name)) {
      throw new ValidationError(`Unknown team: ${name}`, 'team');
    }
  }

  /**
   * Keeps the season if the team played it, else the current season, else its newest
   */
  private pickSeason(season: number): number {
    const options = this.seasonOptions();
    if (options.includes(season)) return season;
    return options.includes(this.currentSeason) ? this.currentSeason : options[0];
  }
}
