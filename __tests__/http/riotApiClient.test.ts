import { describe, it, expect } from 'vitest';
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
} from '../../src/http/riotApiClient.js';
import { ValidationError } from '../../src/errors/index.js';

const hosts: ApiHosts = {
  platformUrl: 'https://{platform}.api.riotgames.com',
  regionalUrl: 'https://{region}.api.riotgames.com',
  dataDragonUrl: 'https://ddragon.leagueoflegends.com/'
};

describe('riotApiClient', () => {
  describe('continentalRegion', () => {
    it('should map platforms to their continental region', () => {
      expect(continentalRegion('na1')).toBe('AMERICAS');
      expect(continentalRegion('BR1')).toBe('AMERICAS');
      expect(continentalRegion('kr')).toBe('ASIA');
      expect(continentalRegion('EUN1')).toBe('EUROPE');
      expect(continentalRegion('vn2')).toBe('SEA');
    });

    it('should fall back to EUROPE for unknown platforms', () => {
      expect(continentalRegion('XX1')).toBe('EUROPE');
    });

    it('should reject malformed platforms', () => {
      expect(() => continentalRegion('eu w')).toThrow(ValidationError);
    });
  });

  it('should build platform URLs with the platform in lower case', () => {
    expect(summonerByNameUrl('EUW1', 'Some Player', hosts))
      .toBe('https://euw1.api.riotgames.com/lol/summoner/v4/summoners/by-name/Some%20Player');
    expect(leagueEntriesUrl('NA1', 'summoner-1', hosts))
      .toBe('https://na1.api.riotgames.com/lol/league/v4/entries/by-summoner/summoner-1');
    expect(championMasteryUrl('kr', 'summoner-1', hosts))
      .toBe('https://kr.api.riotgames.com/lol/champion-mastery/v4/champion-masteries/by-summoner/summoner-1');
  });

  it('should build match URLs on the continental host', () => {
    expect(matchIdsUrl('EUW1', 'puuid-1', { start: 0, count: 20 }, hosts))
      .toBe('https://europe.api.riotgames.com/lol/match/v5/matches/by-puuid/puuid-1/ids?start=0&count=20');
    expect(matchIdsUrl('NA1', 'puuid-1', { start: 20, count: 10, queue: 420 }, hosts))
      .toBe('https://americas.api.riotgames.com/lol/match/v5/matches/by-puuid/puuid-1/ids?start=20&count=10&queue=420');
    expect(matchUrl('OC1', 'OC1_123', hosts))
      .toBe('https://sea.api.riotgames.com/lol/match/v5/matches/OC1_123');
  });

  it('should build Data Dragon URLs', () => {
    expect(championsUrl('14.1.1', 'fr_FR', hosts))
      .toBe('https://ddragon.leagueoflegends.com/cdn/14.1.1/data/fr_FR/champion.json');
    expect(versionsUrl(hosts)).toBe('https://ddragon.leagueoflegends.com/api/versions.json');
  });

  it('should reject inputs that would break the URL', () => {
    expect(() => summonerByNameUrl('EUW1', '   ', hosts)).toThrow(ValidationError);
    expect(() => leagueEntriesUrl('EUW1', '../x', hosts)).toThrow(ValidationError);
    expect(() => championsUrl('14.1.1', 'french', hosts)).toThrow(ValidationError);
    expect(() => championsUrl('14/1', 'fr_FR', hosts)).toThrow(ValidationError);
  });
});
