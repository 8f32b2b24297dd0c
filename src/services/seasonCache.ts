/**
 * Season Cache
 *
 * Process-lifetime store of fetched standings and rosters. Entries are only
 * ever replaced by a newer successful fetch; there is no eviction.
 */

import type { RosterEntry, SeasonStandings } from '../types/nfl.js';

/**
 * Cached roster state for one (season, team)
 */
export type RosterSlot =
  | { state: 'loaded'; roster: RosterEntry[] }
  | { state: 'failed'; error: string };

export class SeasonCache {
  private readonly standings = new Map<number, SeasonStandings>();
  private readonly rosters = new Map<number, Map<string, RosterSlot>>();

  getStandings(season: number): SeasonStandings | undefined {
    return this.standings.get(season);
  }

  hasStandings(season: number): boolean {
    return this.standings.has(season);
  }

  setStandings(season: number, standings: SeasonStandings): void {
    this.standings.set(season, standings);
  }

  getRoster(season: number, teamId: string): RosterSlot | undefined {
    return this.rosters.get(season)?.get(teamId);
  }

  /**
   * Stores a roster, clearing any error cached for the same key
   */
  setRoster(season: number, teamId: string, roster: RosterEntry[]): void {
    this.slots(season).set(teamId, { state: 'loaded', roster });
  }

  /**
   * Records a failure, unless a roster is already loaded for the key
   *
   * A failed refresh never replaces data that was fetched successfully.
   */
  setRosterError(season: number, teamId: string, error: string): void {
    const slots = this.slots(season);
    if (slots.get(teamId)?.state === 'loaded') return;
    slots.set(teamId, { state: 'failed', error });
  }

  /**
   * Forgets a cached failure so the next request fetches again
   */
  clearRosterError(season: number, teamId: string): void {
    const slots = this.rosters.get(season);
    if (slots?.get(teamId)?.state === 'failed') slots.delete(teamId);
  }

  private slots(season: number): Map<string, RosterSlot> {
    let slots = this.rosters.get(season);
    if (!slots) {
      slots = new Map();
      this.rosters.set(season, slots);
    }
    return slots;
  }
}
