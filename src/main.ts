#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Looks up a summoner through the rate-limited, cached client.
 * Usage: riot-api-dispatcher <summonerName> [platform]
 */

import { logger } from './core/logger.js';
import { startApp } from './services/app.js';

// Run and handle any uncaught errors
startApp(process.argv.slice(2)).catch((err) => {
  logger.error({ err }, 'Fatal error occurred');
  process.exitCode = 1;
});
