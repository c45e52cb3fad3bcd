/**
 * Application Service
 *
 * Builds the limiter, cache, dispatcher and endpoint service from
 * configuration. Each call returns a fresh, independent stack; nothing is
 * held in module-level state.
 */

import { cfg, required, type Config } from '../core/config.js';
import { logger } from '../core/logger.js';
import { ResponseCache } from '../cache/responseCache.js';
import { RequestDispatcher } from '../http/dispatcher.js';
import { MultiWindowLimiter } from '../limiter/multiWindowLimiter.js';
import { RiotApiService } from './riotApiService.js';
import type { Transport } from '../util/http.js';

export interface RiotApiStack {
  limiter: MultiWindowLimiter;
  cache: ResponseCache;
  dispatcher: RequestDispatcher;
  api: RiotApiService;
}

export function createRiotApi(config: Config = cfg, transport?: Transport): RiotApiStack {
  const limiter = new MultiWindowLimiter(config.rateLimits);
  const cache = new ResponseCache();
  const dispatcher = new RequestDispatcher({
    limiter,
    cache,
    apiKey: config.riotApi.apiKey,
    tokenHeader: config.riotApi.tokenHeader,
    transport,
    defaultRetryAfterSeconds: config.dispatcher.defaultRetryAfterSeconds,
    dedupeInFlight: config.dispatcher.dedupeInFlight,
    timeoutMs: config.dispatcher.timeoutMs
  });
  const api = new RiotApiService(dispatcher, config.riotApi);

  logger.info(
    { windows: config.rateLimits.map(w => `${w.durationMs / 1000}s:${w.capacity}`), dedupeInFlight: config.dispatcher.dedupeInFlight },
    'Riot API client initialised'
  );
  return { limiter, cache, dispatcher, api };
}

/**
 * CLI logic: resolves a summoner and prints their ranked entries
 *
 * @param args - [summonerName, platform]
 */
export async function startApp(args: string[]): Promise<void> {
  const [name, platform = 'EUW1'] = args;
  if (!name) {
    throw new Error('Usage: riot-api-dispatcher <summonerName> [platform]');
  }
  required('RIOT_API_KEY');

  const { api, dispatcher } = createRiotApi();
  const summoner = await api.getSummonerByName(name, platform);
  logger.info({ name: summoner.name, level: summoner.summonerLevel, puuid: summoner.puuid }, 'summoner');

  const entries = await api.getSummonerRank(summoner.id, platform);
  for (const entry of entries) {
    logger.info(
      { queue: entry.queueType, tier: entry.tier, rank: entry.rank, lp: entry.leaguePoints, wins: entry.wins, losses: entry.losses },
      'ranked entry'
    );
  }
  logger.info(dispatcher.stats, 'done');
}
