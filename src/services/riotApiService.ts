/**
 * Riot API Service
 *
 * Typed endpoint operations. Each one builds its URL and cache key and
 * hands the call to the dispatcher, which owns throttling, caching and
 * error classification.
 */

import { logger } from '../core/logger.js';
import { CACHE_TTL } from '../core/constants.js';
import { KEYS } from '../cache/keys.js';
import type { RequestDispatcher } from '../http/dispatcher.js';
import {
  championMasteryUrl,
  championsUrl,
  continentalRegion,
  leagueEntriesUrl,
  matchIdsUrl,
  matchUrl,
  summonerByNameUrl,
  versionsUrl,
  type ApiHosts
} from '../http/riotApiClient.js';
import {
  ChampionListSchema,
  ChampionMasteryListSchema,
  LeagueEntryListSchema,
  MatchIdListSchema,
  MatchSchema,
  SummonerSchema,
  VersionListSchema,
  type ChampionList,
  type ChampionMastery,
  type LeagueEntry,
  type Match,
  type Summoner
} from '../types/api.js';
import { NotFoundError } from '../errors/index.js';
import { ValidationError } from '../util/validation.js';

export interface MatchIdsOptions {
  start?: number;
  count?: number;
  queue?: number;
}

export class RiotApiService {
  constructor(
    private readonly dispatcher: RequestDispatcher,
    private readonly hosts: ApiHosts
  ) {}

  async getSummonerByName(name: string, platform: string, signal?: AbortSignal): Promise<Summoner> {
    const summoner = await this.dispatcher.call({
      url: summonerByNameUrl(platform, name, this.hosts),
      schema: SummonerSchema,
      cacheKey: KEYS.summoner(platform, name),
      ttlSeconds: CACHE_TTL.SUMMONER_SECONDS
    }, signal);
    logger.debug({ platform, summonerId: summoner.id }, 'summoner resolved');
    return summoner;
  }

  async getSummonerRank(summonerId: string, platform: string, signal?: AbortSignal): Promise<LeagueEntry[]> {
    return this.dispatcher.call({
      url: leagueEntriesUrl(platform, summonerId, this.hosts),
      schema: LeagueEntryListSchema,
      cacheKey: KEYS.rank(platform, summonerId),
      ttlSeconds: CACHE_TTL.RANK_SECONDS
    }, signal);
  }

  /**
   * One page of match ids, newest first
   *
   * @param options - start (default 0), count (default 20, max 100), optional queue id
   */
  async getMatchIds(puuid: string, platform: string, options: MatchIdsOptions = {}, signal?: AbortSignal): Promise<string[]> {
    const { start = 0, count = 20, queue } = options;
    if (!Number.isInteger(start) || start < 0) {
      throw new ValidationError(`Invalid start: ${start}`, 'start');
    }
    if (!Number.isInteger(count) || count < 1 || count > 100) {
      throw new ValidationError(`Invalid count: ${count}`, 'count');
    }
    const region = continentalRegion(platform);
    return this.dispatcher.call({
      url: matchIdsUrl(platform, puuid, { start, count, queue }, this.hosts),
      schema: MatchIdListSchema,
      cacheKey: KEYS.matchIds(region, puuid, start, count, queue),
      ttlSeconds: CACHE_TTL.MATCH_IDS_SECONDS
    }, signal);
  }

  async getMatchDetails(matchId: string, platform: string, signal?: AbortSignal): Promise<Match> {
    return this.dispatcher.call({
      url: matchUrl(platform, matchId, this.hosts),
      schema: MatchSchema,
      cacheKey: KEYS.match(continentalRegion(platform), matchId),
      ttlSeconds: CACHE_TTL.MATCH_SECONDS
    }, signal);
  }

  async getChampionMastery(summonerId: string, platform: string, signal?: AbortSignal): Promise<ChampionMastery[]> {
    return this.dispatcher.call({
      url: championMasteryUrl(platform, summonerId, this.hosts),
      schema: ChampionMasteryListSchema,
      cacheKey: KEYS.mastery(platform, summonerId),
      ttlSeconds: CACHE_TTL.MASTERY_SECONDS
    }, signal);
  }

  /**
   * Champion list from Data Dragon. Static CDN: no API key, not rate limited.
   *
   * @param version - Patch such as "14.1.1"; the newest published patch when omitted
   */
  async getChampions(version?: string, locale: string = 'fr_FR', signal?: AbortSignal): Promise<ChampionList> {
    const patch = version ?? await this.latestVersion(signal);
    return this.dispatcher.call({
      url: championsUrl(patch, locale, this.hosts),
      schema: ChampionListSchema,
      cacheKey: KEYS.champions(patch, locale),
      ttlSeconds: CACHE_TTL.CHAMPIONS_SECONDS,
      rateLimited: false,
      authenticated: false
    }, signal);
  }

  /**
   * Published patch versions from Data Dragon, newest first
   */
  async getLatestVersions(signal?: AbortSignal): Promise<string[]> {
    return this.dispatcher.call({
      url: versionsUrl(this.hosts),
      schema: VersionListSchema,
      cacheKey: KEYS.versions(),
      ttlSeconds: CACHE_TTL.VERSIONS_SECONDS,
      rateLimited: false,
      authenticated: false
    }, signal);
  }

  private async latestVersion(signal?: AbortSignal): Promise<string> {
    const [latest] = await this.getLatestVersions(signal);
    if (latest === undefined) {
      throw new NotFoundError(versionsUrl(this.hosts));
    }
    return latest;
  }
}
