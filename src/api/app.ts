// ═══════════════════════════════════════════════════════════════════════════════
// APP — Express Application Assembly
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express } from 'express';
import type { AppConfig, CredentialStore } from '../config/index.js';
import type { ConversionService } from '../conversion/index.js';
import type { DocumentStore, StateStore } from '../storage/index.js';
import { errorHandler, notFoundHandler } from './middleware/error-handler.js';
import { requestId } from './middleware/request-id.js';
import { createApiRouter, createHealthRouter } from './routes/index.js';

export const SERVICE_VERSION = '1.0.0';

export interface AppDeps {
  config: AppConfig;
  service: ConversionService;
  store: StateStore;
  documents: DocumentStore;
  credentials: CredentialStore;
}

/**
 * Build the application. Health endpoints sit at the root, the API under /api/v1.
 */
export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestId);
  app.use(express.json({ limit: '1mb' }));

  app.use(createHealthRouter({
    documents: deps.documents,
    credentials: deps.credentials,
    defaultProvider: deps.config.llm.provider,
    version: SERVICE_VERSION,
  }));

  app.use('/api/v1', createApiRouter({
    service: deps.service,
    store: deps.store,
    credentials: deps.credentials,
    defaultProvider: deps.config.llm.provider,
    maxUploadBytes: deps.config.server.maxUploadBytes,
  }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
