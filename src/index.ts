#!/usr/bin/env node
/**
 * HUDDLE NFL Viewer - Main Entry Point
 *
 * Pulls NFL standings and rosters from ESPN's public APIs and prints a team
 * view or the league standings. Configuration comes from the environment
 * (see .env.example).
 */

import { logger } from './core/logger.js';
import { startApp } from './services/app.js';

// Run the viewer and report anything that escaped the fetch boundary
startApp()
  .then(() => process.exit(0))
  .catch((err) => {
    logger.error({ err }, 'Fatal error occurred');
    process.exit(1);
  });
