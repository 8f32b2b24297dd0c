/**
 * Application Constants
 *
 * Centralized location for labels, keys and layout numbers that are not
 * configurable at runtime.
 */

/**
 * Keys the standings walker descends into, in this order
 */
export const STANDINGS_WRAPPER_KEYS = [
  'standings',
  'children',
  'groups',
  'leagues',
  'conferences',
  'divisions',
] as const;

/**
 * Labels that mark a node as a conference boundary
 */
export const CONFERENCES = {
  /** Abbreviations ESPN uses for the two conferences */
  ABBREVIATIONS: ['AFC', 'NFC'],

  /** Full names ESPN uses for the two conferences */
  FULL_NAMES: ['American Football Conference', 'National Football Conference'],
} as const;

/**
 * Fixed display order for division standings; unknown divisions follow alphabetically
 */
export const DIVISION_ORDER = [
  'AFC East',
  'AFC North',
  'AFC South',
  'AFC West',
  'NFC East',
  'NFC North',
  'NFC South',
  'NFC West',
] as const;

/**
 * ESPN season type for the regular season
 */
export const REGULAR_SEASON_TYPE = 2;

/**
 * Month (1-based) from which the current calendar year is the current season
 */
export const SEASON_START_MONTH = 7;

/**
 * Text layout for the rendered views
 */
export const LAYOUT = {
  /** Width of the conference column in the standings view */
  STANDINGS_COLUMN_WIDTH: 42,

  /** Seed used to sort unseeded teams after seeded ones */
  UNSEEDED_RANK: 999,
} as const;

/**
 * Placeholder text shown before live standings arrive
 */
export const PLACEHOLDER = {
  RECORD: 'No live data yet.',
  NOTE: 'Refresh once you are online to pull standings.',
} as const;
