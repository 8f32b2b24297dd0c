/**
 * Validation Utilities
 *
 * Functions for validating caller input before it is baked into a URL.
 */

export { ValidationError } from '../errors/index.js';

/**
 * Validates a season year
 *
 * The NFL's first season was 1920; anything after 2100 is a typo.
 *
 * @param year - Season year to validate
 * @returns True if valid, false otherwise
 */
export function isValidSeasonYear(year: number): boolean {
  return Number.isInteger(year) && year >= 1920 && year <= 2100;
}

/**
 * Validates an ESPN team id (numeric string, e.g. "2" for Buffalo)
 */
export function isValidTeamId(teamId: string): boolean {
  return /^\d{1,6}$/.test(teamId);
}

/**
 * Validates a URL string
 *
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Parses a season year from free-form input (env var, dropdown value)
 *
 * @returns The year, or null when the input is empty or not a valid season
 */
export function parseSeasonYear(input: string): number | null {
  const trimmed = input.trim();
  if (!/^\d{4}$/.test(trimmed)) return null;
  const year = Number(trimmed);
  return isValidSeasonYear(year) ? year : null;
}
