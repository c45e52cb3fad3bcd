/**
 * Validation Utilities
 *
 * Functions for validating external inputs before they are put into URLs
 * or cache keys.
 */

export { ValidationError } from '../errors/index.js';

/**
 * Validates a platform routing value (e.g. "EUW1", "na1", "KR")
 *
 * @param platform - Platform identifier to validate
 * @returns True if alphanumeric and 2-5 characters long
 */
export function isValidPlatform(platform: string): boolean {
  return /^[a-z0-9]{2,5}$/i.test(platform);
}

/**
 * Validates an opaque upstream identifier (summoner id, puuid, match id)
 *
 * @param id - Identifier to validate
 * @returns True if non-empty and made of URL-safe characters only
 */
export function isValidId(id: string): boolean {
  return /^[A-Za-z0-9_-]{1,100}$/.test(id);
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
