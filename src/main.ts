#!/usr/bin/env node
import { config } from 'dotenv';
import { createDdnsUpdater, createLogger } from './app.js';
import { loadSettings, type Settings } from './settings.js';
import { EXIT_ABORTED } from './services/ddnsUpdater.js';
import { ConfigError } from './types/errors.js';

// Load environment variables from .env file
config();

async function main(): Promise<number> {
  let settings: Settings;

  try {
    settings = loadSettings();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return EXIT_ABORTED;
    }
    throw error;
  }

  const logger = createLogger(settings);

  logger.debug('Settings loaded', {
    configFile: settings.configFile,
    logFile: settings.logFile,
    ipEchoUrl: settings.ipEchoUrl,
    porkbunApiUrl: settings.porkbunApiUrl,
    healthchecksUrl: settings.healthchecksUrl,
    httpTimeoutMs: settings.httpTimeoutMs
  });

  const result = await createDdnsUpdater(settings, logger).run();

  return result.exitCode;
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    // Same status Node gives an uncaught exception
    console.error('Unexpected failure:', error);
    process.exitCode = 1;
  }
);
