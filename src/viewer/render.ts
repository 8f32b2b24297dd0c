/**
 * Text Rendering
 *
 * Turns cached records into the plain-text lines the viewer prints: a single
 * team's numbers with its roster, or the league's conference and division
 * standings side by side.
 */

import { DIVISION_ORDER, LAYOUT } from '../core/constants.js';
import { pointDifferential } from '../parsing/standingsNormalizer.js';
import type { RosterEntry, SeasonStandings, TeamRecord } from '../types/nfl.js';

/**
 * What is known about the selected team's roster
 */
export type RosterView =
  | { state: 'missing-id' }
  | { state: 'loading' }
  | { state: 'failed'; error: string }
  | { state: 'loaded'; roster: RosterEntry[] };

const NA = 'N/A';

function show(value: string | number | null): string {
  return value === null ? NA : String(value);
}

/**
 * Trims long values so table rows stay aligned
 *
 * @example
 * truncate('Jacksonville State', 10) // "Jackson..."
 */
export function truncate(value: string | number | null, maxLen: number): string {
  const text = value === null ? NA : String(value);
  if (text.length <= maxLen) return text;
  if (maxLen <= 3) return text.slice(0, maxLen);
  return `${text.slice(0, maxLen - 3)}...`;
}

export const ROSTER_HEADER = 'Pos   #   Player                  Age  Ht/Wt    Exp   College             Status';

/**
 * One fixed-width roster row
 */
export function rosterRow(player: RosterEntry): string {
  const pos = truncate(player.positions || NA, 6);
  const jersey = truncate(player.jerseyNumber || NA, 3);
  const name = truncate(player.name || NA, 22);
  const age = truncate(player.age || NA, 3);
  const size = truncate(`${player.height || NA}/${player.weight || NA}`, 9);
  const exp = truncate(player.experience || NA, 5);
  const college = truncate(player.college || NA, 19);
  const status = truncate(player.status || NA, 10);
  return `${pos.padEnd(6)} ${jersey.padStart(2)}  ${name.padEnd(22)} ${age.padEnd(3)}  `
    + `${size.padEnd(9)} ${exp.padEnd(5)} ${college.padEnd(19)} ${status}`;
}

function rosterLines(season: number, view: RosterView): string[] {
  const lines = ['', `Roster (${season})`];
  switch (view.state) {
    case 'missing-id':
      lines.push('Roster pending: standings must load team IDs.');
      break;
    case 'loading':
      lines.push('Roster is loading...');
      break;
    case 'failed':
      lines.push('Roster unavailable. Refresh to retry.');
      break;
    case 'loaded':
      if (view.roster.length === 0) {
        lines.push('No roster entries found.');
      } else {
        lines.push(ROSTER_HEADER, ...view.roster.map(rosterRow));
      }
      break;
  }
  return lines;
}

/**
 * The selected team's numbers followed by its roster section
 */
export function renderTeamView(team: TeamRecord, season: number, roster: RosterView): string[] {
  const lines = [
    `Team: ${team.name}`,
    `Season: ${season}`,
    `Record: ${team.record}`,
    `Wins: ${show(team.wins)} | Losses: ${show(team.losses)} | Ties: ${show(team.ties)}`,
    `Win %: ${show(team.winPct)}`,
    `Points For: ${show(team.pointsFor)}`,
    `Points Against: ${show(team.pointsAgainst)}`,
    `Point Differential: ${show(pointDifferential(team))}`,
    `Streak: ${show(team.streak)}`,
  ];
  if (team.note) lines.push(`Note: ${team.note}`);
  lines.push(...rosterLines(season, roster));
  return lines;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  return a > b ? 1 : 0;
}

/**
 * Standings order: seeded teams first by seed, then by win %, wins, losses and name
 */
export function compareStanding(a: TeamRecord, b: TeamRecord): number {
  const seeded = (t: TeamRecord) => (t.conferenceSeed !== null ? 0 : 1);
  const seed = (t: TeamRecord) => t.conferenceSeed ?? LAYOUT.UNSEEDED_RANK;
  return (
    seeded(a) - seeded(b)
    || seed(a) - seed(b)
    || (b.winPct ?? 0) - (a.winPct ?? 0)
    || (b.wins ?? 0) - (a.wins ?? 0)
    || (a.losses ?? 0) - (b.losses ?? 0)
    || compareNames(a.name, b.name)
  );
}

function groupBy(teams: Iterable<TeamRecord>, label: (t: TeamRecord) => string): Map<string, TeamRecord[]> {
  const groups = new Map<string, TeamRecord[]>();
  for (const team of teams) {
    const key = label(team);
    const group = groups.get(key);
    if (group) group.push(team);
    else groups.set(key, [team]);
  }
  return groups;
}

function dropTrailingBlank(lines: string[]): string[] {
  return lines.length > 0 && lines[lines.length - 1] === '' ? lines.slice(0, -1) : lines;
}

/**
 * Local time as "YYYY-MM-DD hh:mm AM"
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(hour12)}:${pad(date.getMinutes())} ${hours < 12 ? 'AM' : 'PM'}`;
}

/**
 * Conference standings (left) beside division standings (right)
 *
 * Conference lines use the playoff seed when there is one, else the position.
 */
export function renderStandings(standings: SeasonStandings, season: number, now: Date): string[] {
  const teams = Array.from(standings.values());
  const conferences = groupBy(teams, (t) => t.conference || 'Unknown Conference');
  const divisions = groupBy(teams, (t) => t.division || 'Unknown Division');

  const left = [`Conference Standings (${season})`, ''];
  for (const conference of Array.from(conferences.keys()).sort()) {
    left.push(`${conference} Standings`);
    const sorted = [...(conferences.get(conference) ?? [])].sort(compareStanding);
    sorted.forEach((team, i) => {
      left.push(`${team.conferenceSeed || i + 1}. ${team.name} (${team.record})`);
    });
    left.push('');
  }

  const order: readonly string[] = DIVISION_ORDER;
  const extras = Array.from(divisions.keys()).filter((d) => !order.includes(d)).sort();
  const right = ['Division Standings', ''];
  for (const division of [...order, ...extras]) {
    const group = divisions.get(division);
    if (!group || group.length === 0) continue;
    right.push(division);
    [...group].sort(compareStanding).forEach((team, i) => {
      right.push(`${i + 1}. ${team.name} (${team.record})`);
    });
    right.push('');
  }

  const leftLines = dropTrailingBlank(left);
  const rightLines = dropTrailingBlank(right);
  const lines = [`Season: ${season}`, `Current as of: ${formatTimestamp(now)}`, ''];
  const rows = Math.max(leftLines.length, rightLines.length);
  for (let i = 0; i < rows; i++) {
    lines.push(`${(leftLines[i] ?? '').padEnd(LAYOUT.STANDINGS_COLUMN_WIDTH)}${rightLines[i] ?? ''}`);
  }
  return lines;
}
