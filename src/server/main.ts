#!/usr/bin/env node
/**
 * Starts the target web server.
 */

import { TargetGenerator } from '../core/TargetGenerator.js';
import { errorMessage } from '../core/errors.js';
import { createLogger } from '../utils/Logger.js';
import { createApp } from './app.js';
import { loadServerConfig } from './config.js';

function main(): void {
  const config = loadServerConfig();
  const logger = createLogger(config.logLevel, 'server');
  const generator = new TargetGenerator({ logger: logger.child('generator') });
  const app = createApp({ generator, logger });

  const server = app.listen(config.port, config.host, () => {
    logger.info('Listening', { host: config.host, port: config.port });
  });

  server.on('error', (error) => {
    logger.error('Server error', { error: errorMessage(error) });
    process.exitCode = 1;
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  main();
} catch (error) {
  console.error('Error:', errorMessage(error));
  process.exit(1);
}
