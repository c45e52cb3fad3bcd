/**
 * Cache Key Generators
 *
 * Centralized key generation for response cache entries.
 * Every parameter that changes the upstream result is part of the key,
 * so equal keys always mean equal expected values.
 */

export const KEYS = {
  /** Summoner profile by display name on one platform (names are case-insensitive upstream) */
  summoner: (platform: string, name: string) => `summoner:${platform.toLowerCase()}:${name.toLowerCase()}`,

  /** Ranked queue entries for a summoner */
  rank: (platform: string, summonerId: string) => `rank:${platform.toLowerCase()}:${summonerId}`,

  /** One page of match ids; pagination window and queue filter change the result */
  matchIds: (region: string, puuid: string, start: number, count: number, queue?: number) =>
    `matchids:${region.toLowerCase()}:${puuid}:${start}:${count}:${queue ?? 'any'}`,

  /** Full match document */
  match: (region: string, matchId: string) => `match:${region.toLowerCase()}:${matchId}`,

  /** Champion mastery list for a summoner */
  mastery: (platform: string, summonerId: string) => `mastery:${platform.toLowerCase()}:${summonerId}`,

  /** Static champion list for a patch and locale */
  champions: (version: string, locale: string) => `champions:${version}:${locale}`,

  /** Static list of published patch versions */
  versions: () => 'versions',
};
