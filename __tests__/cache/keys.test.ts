import { describe, it, expect } from 'vitest';
import { KEYS } from '../../src/cache/keys.js';

describe('cache keys', () => {
  it('should normalise platform and summoner name case', () => {
    expect(KEYS.summoner('EUW1', 'Some Player')).toBe('summoner:euw1:some player');
    expect(KEYS.summoner('euw1', 'SOME PLAYER')).toBe(KEYS.summoner('EUW1', 'Some Player'));
  });

  it('should encode the pagination window and queue filter in match id keys', () => {
    expect(KEYS.matchIds('EUROPE', 'puuid-1', 0, 20)).toBe('matchids:europe:puuid-1:0:20:any');
    expect(KEYS.matchIds('EUROPE', 'puuid-1', 20, 20, 420)).toBe('matchids:europe:puuid-1:20:20:420');
  });

  it('should keep platforms and regions apart', () => {
    expect(KEYS.rank('EUW1', 'abc')).not.toBe(KEYS.rank('NA1', 'abc'));
    expect(KEYS.match('AMERICAS', 'NA1_1')).toBe('match:americas:NA1_1');
  });

  it('should build static data keys', () => {
    expect(KEYS.champions('14.1.1', 'fr_FR')).toBe('champions:14.1.1:fr_FR');
    expect(KEYS.versions()).toBe('versions');
  });
});
