/**
 * Extraction API entry point
 */

import {
  ConfigurationError,
  ExtractionOrchestrator,
  LocalFileStore,
  collectDefaultMetrics,
  createLlmClient,
  loadConfig,
  logger,
  setLogLevel,
  settingsFromConfig,
} from '@docmeta/shared';
import { createApp } from './app';

function start(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const client = createLlmClient(config);
  const orchestrator = new ExtractionOrchestrator(client, settingsFromConfig(config));

  collectDefaultMetrics();

  const app = createApp({ config, orchestrator, store: new LocalFileStore() });

  const server = app.listen(config.port, () => {
    logger.info('Extraction API started', {
      port: config.port,
      provider: client.provider,
      model: client.model,
    });
  });

  // Graceful shutdown
  function shutdown(signal: string): void {
    logger.info(`${signal} received, shutting down`);
    server.close(() => process.exit(0));
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

try {
  start();
} catch (error) {
  if (error instanceof ConfigurationError) {
    logger.error('Invalid configuration', error, error.details);
  } else {
    logger.error('Extraction API failed to start', error);
  }
  process.exitCode = 2;
}
