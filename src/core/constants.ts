/**
 * Application Constants
 *
 * Centralized location for all magic numbers and lookup tables.
 */

/**
 * Cache TTL values (in seconds), chosen per endpoint by how fast the data changes
 */
export const CACHE_TTL = {
  /** Summoner profile: 1 hour */
  SUMMONER_SECONDS: 3600,

  /** Ranked entries: 30 minutes */
  RANK_SECONDS: 1800,

  /** Match id lists grow as games are played: 5 minutes */
  MATCH_IDS_SECONDS: 300,

  /** A finished match never changes: 1 day */
  MATCH_SECONDS: 86400,

  /** Champion mastery: 1 hour */
  MASTERY_SECONDS: 3600,

  /** Champion list for a patch: 1 day */
  CHAMPIONS_SECONDS: 86400,

  /** Patch version list: 1 hour */
  VERSIONS_SECONDS: 3600,
} as const;

/**
 * Throttling defaults
 */
export const THROTTLING = {
  /** Cool-down applied when a 429 carries no usable Retry-After */
  DEFAULT_RETRY_AFTER_SECONDS: 1,
} as const;

/**
 * Match-v5 routing values
 */
export type ContinentalRegion = 'AMERICAS' | 'ASIA' | 'EUROPE' | 'SEA';

/**
 * Platform routing value → continental routing value for match-v5
 */
export const CONTINENTAL_REGIONS: Readonly<Record<string, ContinentalRegion>> = {
  BR1: 'AMERICAS',
  LA1: 'AMERICAS',
  LA2: 'AMERICAS',
  NA1: 'AMERICAS',
  JP1: 'ASIA',
  KR: 'ASIA',
  EUN1: 'EUROPE',
  EUW1: 'EUROPE',
  TR1: 'EUROPE',
  RU: 'EUROPE',
  OC1: 'SEA',
  PH2: 'SEA',
  SG2: 'SEA',
  TH2: 'SEA',
  TW2: 'SEA',
  VN2: 'SEA',
};

/** Routing used for platforms missing from the table */
export const DEFAULT_CONTINENTAL_REGION: ContinentalRegion = 'EUROPE';
