/**
 * Configuration Module
 *
 * Centralizes all application configuration from environment variables.
 * Loads .env file automatically via dotenv/config import.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { parseRateLimits } from '../limiter/rateWindow.js';

/**
 * Helper function to ensure required environment variables are present
 *
 * @param name - Environment variable name
 * @returns The environment variable value
 * @throws ConfigurationError if the variable is not set
 */
export function required(name: string): string {
  const v = process.env[name];
  if (!v) throw new ConfigurationError(`Missing required env var ${name}`, name);
  return v;
}

/**
 * Reads a numeric environment variable, falling back when unset or empty
 *
 * @param schema - Constraints the number must meet
 * @throws ConfigurationError if the value is not a number or breaks the constraints
 */
export function numberEnv(name: string, schema: z.ZodNumber, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = schema.safeParse(Number(raw));
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${name}: ${raw} (${parsed.error.issues[0]?.message})`, name);
  }
  return parsed.data;
}

/**
 * Application configuration object
 *
 * All configuration values are read from environment variables with sensible defaults.
 */
export const cfg = {
  // Riot API configuration
  riotApi: {
    apiKey: process.env.RIOT_API_KEY || '', // Checked with required() by the CLI, tests inject their own
    platformUrl: process.env.RIOT_PLATFORM_URL || 'https://{platform}.api.riotgames.com', // Summoner, league, mastery hosts
    regionalUrl: process.env.RIOT_REGIONAL_URL || 'https://{region}.api.riotgames.com', // Match-v5 hosts
    dataDragonUrl: process.env.DDRAGON_URL || 'https://ddragon.leagueoflegends.com', // Static data CDN (not rate limited)
    tokenHeader: process.env.RIOT_TOKEN_HEADER || 'X-Riot-Token'
  },
  // Admission control: comma-separated seconds:calls pairs, all enforced at once
  rateLimits: parseRateLimits(process.env.RATE_LIMITS || '1:20,120:100'),
  // Dispatcher behaviour
  dispatcher: {
    defaultRetryAfterSeconds: numberEnv('DEFAULT_RETRY_AFTER_SECONDS', z.number().finite().nonnegative(), 1), // Used when a 429 carries no Retry-After
    dedupeInFlight: process.env.DEDUPE_IN_FLIGHT === 'true', // Share one upstream call between concurrent misses on the same key
    timeoutMs: numberEnv('HTTP_TIMEOUT_MS', z.number().int().positive(), 10000)
  },
  // Logging configuration
  logLevel: process.env.LOG_LEVEL || 'info' // Log level (trace, debug, info, warn, error, fatal, silent)
};

export type Config = typeof cfg;
