import { serve } from '@hono/node-server';
import { loadConfig, type AppConfig } from '../config/env';
import { createServiceClients } from '../clients';
import { SessionRegistry } from '../services/SessionRegistry';
import { AppError } from '../types/errors';
import { createLogger } from '../utils/logger';
import { createApp } from './app';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof AppError) {
      // Startup halts here: nothing is usable without the credentials
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = readConfig();
  const logger = createLogger('audio-transcriber', config.debug);
  const { transcriber, translator } = createServiceClients(config, logger);

  const registry = new SessionRegistry({
    transcriber,
    translator,
    sessionTtlMs: config.sessionTtlMs,
    logger: logger.child('sessions'),
  });
  const app = createApp({ registry, logger: logger.child('http'), logRequests: true });

  const pruneTimer = setInterval(() => registry.pruneExpired(), 60 * 1000);
  pruneTimer.unref();

  serve({ fetch: app.fetch, port: config.port }, (info) => {
    logger.info(`Listening on http://localhost:${info.port} (translation provider: ${config.translationProvider})`);
  });
}

main();
