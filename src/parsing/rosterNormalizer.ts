/**
 * Roster Normalizer
 *
 * Finds the player list inside a roster payload and turns each athlete into
 * a display-ready RosterEntry. References are expected to be resolved
 * already (see services/rosterService.ts).
 */

import { SchemaError } from '../errors/index.js';
import { asObject, getArray, getObject, getString, toInteger, type JsonObject, type JsonValue } from '../util/json.js';
import type { RosterEntry } from '../types/nfl.js';

/**
 * An athlete and the position label of the group it was listed under
 */
export interface RosterItem {
  athlete: JsonObject;
  positionGroup: string | null;
}

function positionLabel(position: JsonObject | null): string | null {
  return getString(position, 'abbreviation') ?? getString(position, 'name');
}

/**
 * Locates the athletes in a roster payload
 *
 * The list may sit under "roster", "team" or the root, and may be flat or
 * grouped by position ({ position, items: [...] }).
 *
 * @returns The athletes found, or null when the shape is not recognized
 */
export function extractRosterItems(payload: JsonValue): RosterItem[] | null {
  const root = asObject(payload);
  if (!root) return null;
  const data = getObject(root, 'roster') ?? getObject(root, 'team') ?? root;

  const athletes = getArray(data, 'athletes');
  if (athletes) {
    const items: RosterItem[] = [];
    for (const value of athletes) {
      const group = asObject(value);
      if (!group) continue;
      const groupItems = getArray(group, 'items');
      if (groupItems) {
        const label = positionLabel(getObject(group, 'position'));
        for (const athlete of groupItems) {
          const obj = asObject(athlete);
          if (obj) items.push({ athlete: obj, positionGroup: label });
        }
      } else {
        items.push({ athlete: group, positionGroup: null });
      }
    }
    return items;
  }

  for (const key of ['items', 'entries', 'players']) {
    const list = getArray(data, key);
    if (list) {
      return list.flatMap((value) => {
        const obj = asObject(value);
        return obj ? [{ athlete: obj, positionGroup: null }] : [];
      });
    }
  }

  return null;
}

/**
 * Height in inches to feet and inches; strings pass through trimmed
 *
 * @example
 * formatHeight(75) // 6'3"
 */
export function formatHeight(value: JsonValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') return value.trim();
  const inches = toInteger(value);
  if (inches === null) return null;
  return `${Math.floor(inches / 12)}'${inches % 12}"`;
}

/**
 * Weight in pounds; digit-only strings get the unit appended
 *
 * @example
 * formatWeight(245)   // "245 lb"
 * formatWeight('245') // "245 lb"
 */
export function formatWeight(value: JsonValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return /^\d+$/.test(trimmed) ? `${trimmed} lb` : trimmed;
  }
  const pounds = toInteger(value);
  if (pounds === null) return null;
  return `${pounds} lb`;
}

/**
 * Years of NFL experience
 *
 * Accepts a bare number or ESPN's { years, displayValue } object.
 *
 * @example
 * formatExperience(0)            // "Rookie"
 * formatExperience({ years: 1 }) // "1 yr"
 * formatExperience(4)            // "4 yrs"
 */
export function formatExperience(value: JsonValue | undefined): string | null {
  if (value === undefined || value === null) return null;
  let years: JsonValue | undefined = value;
  const obj = asObject(value);
  if (obj) {
    const display = getString(obj, 'displayValue') ?? getString(obj, 'display');
    years = obj.years;
    if ((years === undefined || years === null) && display) return display;
  }
  const n = toInteger(years);
  if (n === null) return typeof years === 'string' && years.trim() !== '' ? years.trim() : null;
  if (n === 0) return 'Rookie';
  return `${n} ${n === 1 ? 'yr' : 'yrs'}`;
}

function playerName(athlete: JsonObject): string {
  const named = getString(athlete, 'fullName') ?? getString(athlete, 'displayName') ?? getString(athlete, 'shortName');
  if (named) return named;
  const joined = [getString(athlete, 'firstName'), getString(athlete, 'lastName')]
    .filter((part): part is string => part !== null)
    .join(' ')
    .trim();
  return joined || 'Unknown Player';
}

function positions(athlete: JsonObject, group: string | null): string | null {
  const own = positionLabel(getObject(athlete, 'position'));
  const unique: string[] = [];
  for (const pos of [group, own]) {
    if (pos && !unique.includes(pos)) unique.push(pos);
  }
  return unique.length > 0 ? unique.join('/') : null;
}

function jerseyNumber(athlete: JsonObject): string | null {
  const value = athlete.jersey || athlete.jerseyNumber;
  if (typeof value === 'string' || typeof value === 'number') return String(value);
  return null;
}

function college(athlete: JsonObject): string | null {
  const value = athlete.college;
  if (typeof value === 'string') return value;
  return getString(asObject(value), 'name');
}

function status(athlete: JsonObject): string | null {
  const value = athlete.status;
  if (typeof value === 'string') return value || null;
  const obj = asObject(value);
  return getString(obj, 'name') ?? getString(obj, 'type');
}

/**
 * Normalizes one athlete
 */
export function normalizeAthlete({ athlete, positionGroup }: RosterItem): RosterEntry {
  return {
    name: playerName(athlete),
    positions: positions(athlete, positionGroup),
    jerseyNumber: jerseyNumber(athlete),
    age: toInteger(athlete.age),
    height: formatHeight(athlete.displayHeight || athlete.height),
    weight: formatWeight(athlete.displayWeight || athlete.weight),
    experience: formatExperience(athlete.experience),
    college: college(athlete),
    status: status(athlete)
  };
}

/**
 * Parses a roster payload whose references have already been resolved
 *
 * @throws SchemaError when no player list can be found
 */
export function parseRoster(payload: JsonValue): RosterEntry[] {
  const items = extractRosterItems(payload);
  if (items === null) {
    throw new SchemaError('Roster payload missing expected fields.', 'roster');
  }
  return items.map(normalizeAthlete);
}
