// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Process Entry Point
// ═══════════════════════════════════════════════════════════════════════════════
//
//   CONVERTER_CONFIG_FILE=./converter.config.json node dist/server.js
//
// ═══════════════════════════════════════════════════════════════════════════════

import { createApp } from './api/app.js';
import { ConfigError, createCredentialStore, loadConfig } from './config/index.js';
import { ConversionService } from './conversion/index.js';
import { configureLogger, getLogger } from './logging/index.js';
import { createProvider } from './providers/index.js';
import { FileDocumentStore, StateStore } from './storage/index.js';

function main(): void {
  const config = loadConfig();
  configureLogger({
    level: config.logging.level,
    pretty: config.logging.pretty ?? config.environment !== 'production',
    environment: config.environment,
  });
  const logger = getLogger({ component: 'server' });

  const credentials = createCredentialStore();
  const documents = new FileDocumentStore(config.storage.dataDir);
  const store = new StateStore(documents);

  const service = new ConversionService({
    store,
    llm: config.llm,
    batch: config.batch,
    defaultUnitSystem: config.conversion.unitSystem,
    providerFactory: (settings) => createProvider(settings, credentials),
  });

  const app = createApp({ config, service, store, documents, credentials });
  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server listening', {
      host: config.server.host,
      port: config.server.port,
      provider: config.llm.provider,
      dataDir: documents.location,
      credentialSources: credentials.getSourceNames(),
    });
  });

  const shutdown = (signal: string): void => {
    logger.info('Shutting down', { signal });
    server.close((error) => {
      if (error) {
        logger.error('Shutdown failed', error);
        process.exitCode = 1;
      }
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  const logger = getLogger({ component: 'server' });
  if (error instanceof ConfigError) {
    logger.fatal('Invalid configuration', error, { issues: error.issues });
  } else {
    logger.fatal('Startup failed', error);
  }
  process.exitCode = 1;
}
