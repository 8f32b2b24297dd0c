import { describe, it, expect } from 'vitest';
import { compareStanding, formatTimestamp, renderStandings, renderTeamView, rosterRow, truncate } from '../../src/viewer/render.js';
import type { RosterEntry, TeamRecord } from '../../src/types/nfl.js';

function team(overrides: Partial<TeamRecord> = {}): TeamRecord {
  return {
    name: 'Buffalo Bills',
    conference: 'AFC',
    division: 'AFC East',
    record: '13-4',
    wins: 13,
    losses: 4,
    ties: 0,
    pointsFor: 525,
    pointsAgainst: 368,
    winPct: 0.765,
    streak: 'W2',
    conferenceSeed: 1,
    note: null,
    externalId: '2',
    ...overrides,
  };
}

const sp = (n: number) => ' '.repeat(n);

describe('render', () => {
  describe('truncate', () => {
    it('should leave short values alone and shorten long ones with an ellipsis', () => {
      expect(truncate('QB', 6)).toBe('QB');
      expect(truncate('Jacksonville State', 10)).toBe('Jackson...');
      expect(truncate('abcdef', 3)).toBe('abc');
      expect(truncate(null, 5)).toBe('N/A');
    });
  });

  describe('rosterRow', () => {
    it('should lay out a player in fixed-width columns', () => {
      const player: RosterEntry = {
        name: 'Sample Player',
        positions: 'QB',
        jerseyNumber: '1',
        age: 25,
        height: `6'2"`,
        weight: null,
        experience: '3 yrs',
        college: 'State',
        status: 'Active',
      };

      expect(rosterRow(player)).toBe(
        `QB${sp(6)}1${sp(2)}Sample Player${sp(10)}25${sp(3)}6'2"/N/A${sp(2)}3 yrs${sp(1)}State${sp(15)}Active`
      );
    });
  });

  describe('renderTeamView', () => {
    it('should show every stat and the roster state', () => {
      expect(renderTeamView(team(), 2024, { state: 'loading' })).toEqual([
        'Team: Buffalo Bills',
        'Season: 2024',
        'Record: 13-4',
        'Wins: 13 | Losses: 4 | Ties: 0',
        'Win %: 0.765',
        'Points For: 525',
        'Points Against: 368',
        'Point Differential: 157',
        'Streak: W2',
        '',
        'Roster (2024)',
        'Roster is loading...',
      ]);
    });

    it('should show the note and an empty roster message', () => {
      const lines = renderTeamView(team({ note: 'Clinched division', streak: null }), 2024, { state: 'loaded', roster: [] });

      expect(lines.slice(8)).toEqual(['Streak: N/A', 'Note: Clinched division', '', 'Roster (2024)', 'No roster entries found.']);
    });
  });

  describe('compareStanding', () => {
    it('should put seeded teams first, then order by win %', () => {
      const teams = [
        team({ name: 'C', conferenceSeed: null, winPct: 0.9 }),
        team({ name: 'B', conferenceSeed: 3 }),
        team({ name: 'A', conferenceSeed: null, winPct: 0.9 }),
        team({ name: 'D', conferenceSeed: null, winPct: 0.95 }),
        team({ name: 'E', conferenceSeed: 1 }),
      ];

      expect(teams.sort(compareStanding).map((t) => t.name)).toEqual(['E', 'B', 'D', 'A', 'C']);
    });
  });

  describe('formatTimestamp', () => {
    it('should use a 12-hour clock', () => {
      expect(formatTimestamp(new Date(2024, 11, 1, 13, 5))).toBe('2024-12-01 01:05 PM');
      expect(formatTimestamp(new Date(2024, 0, 9, 0, 30))).toBe('2024-01-09 12:30 AM');
    });
  });

  describe('renderStandings', () => {
    it('should place conference standings beside division standings', () => {
      const standings = new Map([
        ['New York Jets', team({ name: 'New York Jets', record: '5-12', wins: 5, losses: 12, winPct: 0.294, conferenceSeed: null })],
        ['Buffalo Bills', team()],
      ]);

      const lines = renderStandings(standings, 2024, new Date(2024, 11, 1, 13, 5));

      expect(lines.map((l) => l.slice(0, 42).trimEnd())).toEqual([
        'Season: 2024',
        'Current as of: 2024-12-01 01:05 PM',
        '',
        'Conference Standings (2024)',
        '',
        'AFC Standings',
        '1. Buffalo Bills (13-4)',
        '2. New York Jets (5-12)',
      ]);
      expect(lines.map((l) => l.slice(42))).toEqual([
        '',
        '',
        '',
        'Division Standings',
        '',
        'AFC East',
        '1. Buffalo Bills (13-4)',
        '2. New York Jets (5-12)',
      ]);
    });

    it('should list unknown divisions after the known ones', () => {
      const standings = new Map([
        ['Mystery Team', team({ name: 'Mystery Team', conference: null, division: null, conferenceSeed: null })],
        ['Buffalo Bills', team()],
      ]);

      const right = renderStandings(standings, 2024, new Date(2024, 11, 1)).map((l) => l.slice(42));

      expect(right.filter((l) => l.includes('Division'))).toEqual(['Division Standings', 'Unknown Division']);
      expect(right.indexOf('Unknown Division')).toBeGreaterThan(right.indexOf('AFC East'));
    });
  });
});
