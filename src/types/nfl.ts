/**
 * NFL Domain Types
 *
 * Normalized shapes produced from ESPN payloads. Raw payloads are never typed
 * beyond JsonValue; everything downstream works on these.
 */

/**
 * One team's line in the standings
 *
 * Replaced wholesale whenever a season is re-fetched.
 */
export interface TeamRecord {
  readonly name: string;
  readonly conference: string | null;
  readonly division: string | null;
  /** "12-5", or "9-7-1" when there are ties */
  readonly record: string;
  readonly wins: number | null;
  readonly losses: number | null;
  readonly ties: number | null;
  readonly pointsFor: number | null;
  readonly pointsAgainst: number | null;
  readonly winPct: number | null;
  readonly streak: string | null;
  readonly conferenceSeed: number | null;
  readonly note: string | null;
  /** ESPN team id, needed to fetch the roster */
  readonly externalId: string | null;
}

/**
 * Team records for one season, keyed by display name
 */
export type SeasonStandings = ReadonlyMap<string, TeamRecord>;

/**
 * One player on a roster, display-ready
 */
export interface RosterEntry {
  readonly name: string;
  /** Group and own position, de-duplicated and joined with "/" */
  readonly positions: string | null;
  readonly jerseyNumber: string | null;
  readonly age: number | null;
  readonly height: string | null;
  readonly weight: string | null;
  readonly experience: string | null;
  readonly college: string | null;
  readonly status: string | null;
}

/**
 * Static facts about a franchise
 */
export interface TeamMetadata {
  readonly name: string;
  readonly conference: string;
  readonly division: string;
  /** First season of the franchise, bounds the season picker */
  readonly firstSeason: number;
}

/**
 * Identifies one fetch cycle
 */
export type FetchKey =
  | { kind: 'standings'; season: number }
  | { kind: 'roster'; season: number; teamId: string; teamName: string };

/**
 * Outcome of one fetch cycle, delivered to the owner of the cache
 *
 * Exactly one of result / error is meaningful: result is null on failure and
 * errorMessage is empty on success.
 */
export type FetchCompletion =
  | {
      kind: 'standings';
      key: Extract<FetchKey, { kind: 'standings' }>;
      result: SeasonStandings | null;
      errorMessage: string;
    }
  | {
      kind: 'roster';
      key: Extract<FetchKey, { kind: 'roster' }>;
      result: RosterEntry[] | null;
      errorMessage: string;
    };
