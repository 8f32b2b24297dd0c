/**
 * Standings Normalizer
 *
 * Converts raw ESPN standings entries into TeamRecords.
 */

import { SchemaError } from '../errors/index.js';
import { TEAM_METADATA } from '../league/teams.js';
import { asObject, getArray, getObject, getString, toIdString, toInteger, toNumber, type JsonObject, type JsonValue } from '../util/json.js';
import { collectEntries } from './standingsWalker.js';
import type { SeasonStandings, TeamRecord } from '../types/nfl.js';

interface StatMaps {
  values: Map<string, JsonValue>;
  displayValues: Map<string, JsonValue>;
}

/**
 * Stats arrive as an unordered list of { name, value, displayValue }
 */
function buildStatMaps(entry: JsonObject): StatMaps {
  const values = new Map<string, JsonValue>();
  const displayValues = new Map<string, JsonValue>();
  for (const item of getArray(entry, 'stats') ?? []) {
    const stat = asObject(item);
    const name = getString(stat, 'name');
    if (!stat || !name) continue;
    values.set(name, stat.value ?? null);
    displayValues.set(name, stat.displayValue ?? null);
  }
  return { values, displayValues };
}

/**
 * Display name: displayName, then "location name", then name
 */
export function resolveTeamName(team: JsonObject | null): string {
  const displayName = getString(team, 'displayName');
  if (displayName) return displayName;
  const joined = [getString(team, 'location'), getString(team, 'name')]
    .filter((part): part is string => part !== null)
    .join(' ')
    .trim();
  return joined || getString(team, 'name') || 'Unknown Team';
}

/**
 * Formats a win-loss record, adding ties only when there are any
 *
 * @example
 * formatRecord(12, 5, 0) // "12-5"
 * formatRecord(9, 7, 1)  // "9-7-1"
 */
export function formatRecord(wins: number, losses: number, ties: number): string {
  return ties === 0 ? `${wins}-${losses}` : `${wins}-${losses}-${ties}`;
}

/**
 * Playoff seed as an integer; anything unparseable degrades to null
 */
export function parseSeed(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? Math.trunc(value) : null;
  if (typeof value === 'string' && /^\s*[-+]?\d+\s*$/.test(value)) return Number.parseInt(value, 10);
  return null;
}

function scalarText(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') return value.length > 0 ? value : null;
  if (typeof value === 'number') return value === 0 ? null : String(value);
  return null;
}

/**
 * Normalizes one raw entry
 *
 * @param entry - Raw entry from the standings payload
 * @param conference - Conference label found by the walker, if any
 */
export function normalizeEntry(entry: JsonObject, conference: string | null): TeamRecord {
  const team = getObject(entry, 'team');
  const name = resolveTeamName(team);
  const meta = TEAM_METADATA.get(name);
  const { values, displayValues } = buildStatMaps(entry);

  const wins = toInteger(values.get('wins')) ?? 0;
  const losses = toInteger(values.get('losses')) ?? 0;
  const ties = toInteger(values.get('ties')) ?? 0;
  const id = toIdString(team?.id);

  return {
    name,
    conference: conference ?? meta?.conference ?? null,
    division: meta?.division ?? null,
    record: formatRecord(wins, losses, ties),
    wins,
    losses,
    ties,
    pointsFor: toNumber(values.get('pointsFor')),
    pointsAgainst: toNumber(values.get('pointsAgainst')),
    winPct: toNumber(values.get('winPercent')),
    streak: scalarText(displayValues.get('streak')) ?? scalarText(values.get('streak')),
    conferenceSeed: parseSeed(values.get('playoffSeed')),
    note: getString(getObject(entry, 'note'), 'text'),
    externalId: id
  };
}

/**
 * Points for minus points against, or null when either is unknown
 */
export function pointDifferential(record: TeamRecord): number | null {
  if (record.pointsFor === null || record.pointsAgainst === null) return null;
  return record.pointsFor - record.pointsAgainst;
}

/**
 * Parses a full standings payload
 *
 * An empty result is legitimate when the payload has entry lists that are
 * all empty (e.g. a season that has not started). A payload with no entry
 * list anywhere means the shape changed under us.
 *
 * @throws SchemaError when no entry list is found
 */
export function parseStandings(payload: JsonValue): SeasonStandings {
  const { entries, sawEntryList } = collectEntries(payload);
  if (!sawEntryList) {
    throw new SchemaError('Standings payload missing expected fields.', 'standings');
  }

  const standings = new Map<string, TeamRecord>();
  for (const { entry, conference } of entries) {
    const record = normalizeEntry(entry, conference);
    standings.set(record.name, record);
  }
  return standings;
}
