/**
 * Riot API URL Module
 *
 * Constructs URLs for the League of Legends web API and the Data Dragon
 * static CDN. Summoner, league and mastery endpoints are served per
 * platform (EUW1, NA1, ...); match-v5 is served per continental region.
 */

import { cfg } from '../core/config.js';
import { CONTINENTAL_REGIONS, DEFAULT_CONTINENTAL_REGION, type ContinentalRegion } from '../core/constants.js';
import { isValidId, isValidPlatform, isValidUrl, ValidationError } from '../util/validation.js';

/**
 * Host templates; `{platform}` and `{region}` are substituted in lower case
 */
export interface ApiHosts {
  platformUrl: string;
  regionalUrl: string;
  dataDragonUrl: string;
}

export interface MatchIdsPage {
  start: number;
  count: number;
  queue?: number;
}

function checkPlatform(platform: string): string {
  if (!isValidPlatform(platform)) {
    throw new ValidationError(`Invalid platform: ${platform}`, 'platform');
  }
  return platform.toUpperCase();
}

function checkId(id: string, field: string): string {
  if (!isValidId(id)) {
    throw new ValidationError(`Invalid ${field}: ${id}`, field);
  }
  return id;
}

function resolveHost(template: string, placeholder: string, value: string): string {
  const url = template.replace(placeholder, value.toLowerCase()).replace(/\/$/, '');
  if (!isValidUrl(url)) {
    throw new ValidationError(`Invalid API host: ${url}`, 'host');
  }
  return url;
}

function platformBase(platform: string, hosts: ApiHosts): string {
  return resolveHost(hosts.platformUrl, '{platform}', checkPlatform(platform));
}

function regionalBase(platform: string, hosts: ApiHosts): string {
  return resolveHost(hosts.regionalUrl, '{region}', continentalRegion(platform));
}

/**
 * Maps a platform routing value to the continental region serving its matches
 *
 * Unknown platforms fall back to EUROPE.
 *
 * @example
 * continentalRegion('na1') // 'AMERICAS'
 */
export function continentalRegion(platform: string): ContinentalRegion {
  return CONTINENTAL_REGIONS[checkPlatform(platform)] ?? DEFAULT_CONTINENTAL_REGION;
}

/**
 * Endpoint: /lol/summoner/v4/summoners/by-name/{name}
 *
 * @example
 * summonerByNameUrl('EUW1', 'Some Player')
 * // Returns: https://euw1.api.riotgames.com/lol/summoner/v4/summoners/by-name/Some%20Player
 */
export function summonerByNameUrl(platform: string, name: string, hosts: ApiHosts = cfg.riotApi): string {
  if (!name.trim()) {
    throw new ValidationError('Summoner name cannot be empty', 'name');
  }
  return `${platformBase(platform, hosts)}/lol/summoner/v4/summoners/by-name/${encodeURIComponent(name)}`;
}

/**
 * Endpoint: /lol/league/v4/entries/by-summoner/{summonerId}
 */
export function leagueEntriesUrl(platform: string, summonerId: string, hosts: ApiHosts = cfg.riotApi): string {
  return `${platformBase(platform, hosts)}/lol/league/v4/entries/by-summoner/${checkId(summonerId, 'summonerId')}`;
}

/**
 * Endpoint: /lol/match/v5/matches/by-puuid/{puuid}/ids?start=&count=[&queue=]
 */
export function matchIdsUrl(platform: string, puuid: string, page: MatchIdsPage, hosts: ApiHosts = cfg.riotApi): string {
  const params = new URLSearchParams({ start: String(page.start), count: String(page.count) });
  if (page.queue !== undefined) params.set('queue', String(page.queue));
  return `${regionalBase(platform, hosts)}/lol/match/v5/matches/by-puuid/${checkId(puuid, 'puuid')}/ids?${params}`;
}

/**
 * Endpoint: /lol/match/v5/matches/{matchId}
 */
export function matchUrl(platform: string, matchId: string, hosts: ApiHosts = cfg.riotApi): string {
  return `${regionalBase(platform, hosts)}/lol/match/v5/matches/${checkId(matchId, 'matchId')}`;
}

/**
 * Endpoint: /lol/champion-mastery/v4/champion-masteries/by-summoner/{summonerId}
 */
export function championMasteryUrl(platform: string, summonerId: string, hosts: ApiHosts = cfg.riotApi): string {
  return `${platformBase(platform, hosts)}/lol/champion-mastery/v4/champion-masteries/by-summoner/${checkId(summonerId, 'summonerId')}`;
}

/**
 * Data Dragon: /cdn/{version}/data/{locale}/champion.json
 */
export function championsUrl(version: string, locale: string, hosts: ApiHosts = cfg.riotApi): string {
  if (!/^[\w.]+$/.test(version)) {
    throw new ValidationError(`Invalid version: ${version}`, 'version');
  }
  if (!/^[a-z]{2}_[A-Z]{2}$/.test(locale)) {
    throw new ValidationError(`Invalid locale: ${locale}`, 'locale');
  }
  return `${hosts.dataDragonUrl.replace(/\/$/, '')}/cdn/${version}/data/${locale}/champion.json`;
}

/**
 * Data Dragon: /api/versions.json
 */
export function versionsUrl(hosts: ApiHosts = cfg.riotApi): string {
  return `${hosts.dataDragonUrl.replace(/\/$/, '')}/api/versions.json`;
}
