#!/usr/bin/env node
/**
 * Composition root: config, logger, cache, model client and HTTP server.
 *
 * Run with: npx tsx src/main.ts
 */

import 'dotenv/config';
import { createAnswerClient } from './answer-client.js';
import { createAskHandler } from './ask.js';
import { DEFAULT_MODEL, loadConfig } from './config.js';
import { createCacheFromConfig } from './create-cache.js';
import { createLogger } from './logger.js';
import { createApp } from './server.js';

const VERSION = '0.1.0';

function main(): void {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  logger.info(`Logging configured with level ${config.logLevel}`);

  const cache = createCacheFromConfig(config.cache, { logger });

  const generate = createAnswerClient({
    apiUrl: config.model.apiUrl,
    token: config.model.token,
    timeoutMs: config.model.timeoutMs,
    logger: logger.child('model'),
  });

  const ask = createAskHandler({ cache, generate, logger: logger.child('ask') });

  const app = createApp({
    ask,
    cacheBackend: cache.backend,
    model: DEFAULT_MODEL,
    version: VERSION,
    logger: logger.child('http'),
  });

  app.listen(config.port, () => {
    logger.info(`Starting CultureBot API on http://0.0.0.0:${config.port}`);
  });
}

main();
