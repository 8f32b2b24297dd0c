/**
 * Standings Walker
 *
 * ESPN has wrapped standings differently over the years: sometimes under
 * "children", sometimes under "standings", with conferences and divisions
 * nested to varying depth. Rather than bind to one shape, the walker searches
 * the whole tree for "entries" lists and remembers the nearest enclosing
 * conference on the way down.
 */

import { CONFERENCES, STANDINGS_WRAPPER_KEYS } from '../core/constants.js';
import { classify, getObject, getString, isTruthy, toIdString, type JsonObject, type JsonValue } from '../util/json.js';

/**
 * One raw team entry and the conference it was found under
 */
export interface WalkedEntry {
  entry: JsonObject;
  conference: string | null;
}

export interface WalkResult {
  entries: WalkedEntry[];
  /** True when at least one "entries" list was present, even an empty one */
  sawEntryList: boolean;
}

const CONFERENCE_ABBREVIATIONS: readonly string[] = CONFERENCES.ABBREVIATIONS;
const CONFERENCE_NAMES: readonly string[] = CONFERENCES.FULL_NAMES;

/**
 * Conference label for a node, or the inherited one when the node is not a conference
 */
function conferenceLabel(node: JsonObject, inherited: string | null): string | null {
  const abbreviation = getString(node, 'abbreviation');
  const shortName = getString(node, 'shortName');
  const name = getString(node, 'name');

  if (isTruthy(node.isConference)) {
    return abbreviation ?? shortName ?? name ?? inherited;
  }
  if (abbreviation && CONFERENCE_ABBREVIATIONS.includes(abbreviation)) {
    return abbreviation;
  }
  if (name && CONFERENCE_NAMES.includes(name)) {
    return abbreviation ?? shortName ?? name;
  }
  return inherited;
}

function walk(value: JsonValue, conference: string | null, out: WalkResult): void {
  const node = classify(value);
  if (node.kind === 'array') {
    for (const item of node.value) walk(item, conference, out);
    return;
  }
  if (node.kind !== 'object') return;

  const current = conferenceLabel(node.value, conference);

  // Collect entries here but keep descending: teams can sit at several depths
  const entries = node.value.entries;
  if (Array.isArray(entries)) {
    out.sawEntryList = true;
    for (const item of entries) {
      const entry = classify(item);
      if (entry.kind === 'object') out.entries.push({ entry: entry.value, conference: current });
    }
  }

  for (const key of STANDINGS_WRAPPER_KEYS) {
    const child = node.value[key];
    if (child !== undefined) walk(child, current, out);
  }
}

/**
 * Team id of a raw entry (entry.team.id), if it has one
 */
export function entryTeamId(entry: JsonObject): string | null {
  return toIdString(getObject(entry, 'team')?.id);
}

/**
 * Collects every team entry in a standings payload
 *
 * A team listed under several ancestors (league, conference and division
 * groupings) is returned once, with the conference of its first occurrence.
 * Entries without a team id cannot be deduplicated and are all kept.
 *
 * @param payload - Any JSON value; scalars yield nothing
 *
 * @example
 * collectEntries({ children: [{ abbreviation: 'AFC', standings: { entries: [{ team: { id: '2' } }] } }] })
 * // { entries: [{ entry: { team: { id: '2' } }, conference: 'AFC' }], sawEntryList: true }
 */
export function collectEntries(payload: JsonValue): WalkResult {
  const raw: WalkResult = { entries: [], sawEntryList: false };
  walk(payload, null, raw);

  const seen = new Set<string>();
  const entries = raw.entries.filter(({ entry }) => {
    const id = entryTeamId(entry);
    if (id === null) return true;
    if (seen.has(id)) return false;
    seen.add(id);
    return true;
  });

  return { entries, sawEntryList: raw.sawEntryList };
}
