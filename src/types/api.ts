/**
 * Riot API Type Definitions
 *
 * Zod schemas for the upstream JSON bodies, with the TypeScript types
 * inferred from them. The dispatcher validates every successful body
 * against the schema of its request. Only the fields consumers read are
 * listed; `.passthrough()` keeps the rest.
 */

import { z } from 'zod';

/**
 * Summoner profile (summoner-v4)
 */
export const SummonerSchema = z
  .object({
    id: z.string(),
    accountId: z.string(),
    puuid: z.string(),
    name: z.string(),
    profileIconId: z.number().int(),
    revisionDate: z.number(),
    summonerLevel: z.number().int()
  })
  .passthrough();
export type Summoner = z.infer<typeof SummonerSchema>;

/**
 * One ranked queue entry (league-v4)
 */
export const LeagueEntrySchema = z
  .object({
    leagueId: z.string().optional(),
    summonerId: z.string(),
    queueType: z.string(),
    tier: z.string().optional(),
    rank: z.string().optional(),
    leaguePoints: z.number().int(),
    wins: z.number().int(),
    losses: z.number().int(),
    hotStreak: z.boolean(),
    veteran: z.boolean(),
    freshBlood: z.boolean(),
    inactive: z.boolean()
  })
  .passthrough();
export type LeagueEntry = z.infer<typeof LeagueEntrySchema>;
export const LeagueEntryListSchema = z.array(LeagueEntrySchema);

export const MatchIdListSchema = z.array(z.string());

const ParticipantSchema = z
  .object({
    puuid: z.string(),
    championId: z.number().int(),
    championName: z.string(),
    teamId: z.number().int(),
    teamPosition: z.string().optional(),
    kills: z.number().int(),
    deaths: z.number().int(),
    assists: z.number().int(),
    win: z.boolean()
  })
  .passthrough();
export type Participant = z.infer<typeof ParticipantSchema>;

const TeamSchema = z
  .object({
    teamId: z.number().int(),
    win: z.boolean(),
    bans: z.array(z.object({ championId: z.number().int(), pickTurn: z.number().int() })).optional()
  })
  .passthrough();

/**
 * Full match document (match-v5)
 */
export const MatchSchema = z
  .object({
    metadata: z
      .object({
        dataVersion: z.string(),
        matchId: z.string(),
        participants: z.array(z.string())
      })
      .passthrough(),
    info: z
      .object({
        gameCreation: z.number(),
        gameDuration: z.number(),
        gameMode: z.string(),
        gameVersion: z.string(),
        mapId: z.number().int(),
        queueId: z.number().int(),
        platformId: z.string(),
        participants: z.array(ParticipantSchema),
        teams: z.array(TeamSchema)
      })
      .passthrough()
  })
  .passthrough();
export type Match = z.infer<typeof MatchSchema>;

/**
 * Champion mastery entry (champion-mastery-v4)
 */
export const ChampionMasterySchema = z
  .object({
    championId: z.number().int(),
    championLevel: z.number().int(),
    championPoints: z.number().int(),
    lastPlayTime: z.number(),
    championPointsSinceLastLevel: z.number().int().optional(),
    championPointsUntilNextLevel: z.number().int().optional(),
    chestGranted: z.boolean().optional(),
    tokensEarned: z.number().int().optional()
  })
  .passthrough();
export type ChampionMastery = z.infer<typeof ChampionMasterySchema>;
export const ChampionMasteryListSchema = z.array(ChampionMasterySchema);

const ChampionDataSchema = z
  .object({
    id: z.string(),
    key: z.string(),
    name: z.string(),
    title: z.string(),
    tags: z.array(z.string())
  })
  .passthrough();
export type ChampionData = z.infer<typeof ChampionDataSchema>;

/**
 * Champion list for one patch (Data Dragon)
 */
export const ChampionListSchema = z
  .object({
    type: z.string(),
    version: z.string(),
    data: z.record(ChampionDataSchema)
  })
  .passthrough();
export type ChampionList = z.infer<typeof ChampionListSchema>;

/** Published patch versions, newest first (Data Dragon) */
export const VersionListSchema = z.array(z.string());
