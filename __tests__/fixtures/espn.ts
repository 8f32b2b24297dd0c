/**
 * Builders for ESPN-shaped test payloads
 */

import type { JsonObject, JsonValue } from '../../src/util/json.js';

export interface StatLine {
  wins?: number;
  losses?: number;
  ties?: number;
  pointsFor?: number;
  pointsAgainst?: number;
  winPercent?: number;
  streak?: string;
  playoffSeed?: JsonValue;
}

export function teamEntry(id: string, displayName: string, line: StatLine = {}): JsonObject {
  const stats: JsonObject[] = [];
  for (const [name, value] of Object.entries(line)) {
    if (value === undefined) continue;
    if (name === 'streak') {
      stats.push({ name, value: 0, displayValue: String(value) });
    } else {
      stats.push({ name, value, displayValue: String(value) });
    }
  }
  return { team: { id, displayName }, stats };
}

export function conference(abbreviation: string, entries: JsonObject[]): JsonObject {
  return { name: `${abbreviation} conference`, abbreviation, isConference: true, standings: { entries } };
}

export function refItem(url: string): JsonObject {
  return { $ref: url };
}
