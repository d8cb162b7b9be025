// ═══════════════════════════════════════════════════════════════════════════════
// ROUTES INDEX — API Route Registration
// ═══════════════════════════════════════════════════════════════════════════════
//
// Usage:
//   import { createApiRouter } from './api/routes/index.js';
//   app.use('/api/v1', createApiRouter(deps));
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router } from 'express';
import type { CredentialStore, ProviderName } from '../../config/index.js';
import type { ConversionService } from '../../conversion/index.js';
import { getLogger } from '../../logging/index.js';
import type { StateStore } from '../../storage/index.js';
import { createConversionRouter } from './conversions.js';
import { createProviderRouter } from './providers.js';
import { createTemplateRouter } from './templates.js';

// ─────────────────────────────────────────────────────────────────────────────────
// RE-EXPORTS
// ─────────────────────────────────────────────────────────────────────────────────

export { createConversionRouter, type ConversionRouterOptions } from './conversions.js';
export { createTemplateRouter } from './templates.js';
export { createProviderRouter } from './providers.js';
export {
  createHealthRouter,
  checkStorage,
  checkProvider,
  type HealthCheck,
  type HealthRouterOptions,
  type ReadinessCheck,
  type ComponentHealth,
} from './health.js';

// ─────────────────────────────────────────────────────────────────────────────────
// COMBINED ROUTER
// ─────────────────────────────────────────────────────────────────────────────────

export interface ApiRouterDeps {
  service: ConversionService;
  store: StateStore;
  credentials: CredentialStore;
  defaultProvider: ProviderName;
  maxUploadBytes: number;
}

/**
 * Mount every resource router under one prefix.
 */
export function createApiRouter(deps: ApiRouterDeps): Router {
  const router = Router();
  const logger = getLogger({ component: 'routes' });

  router.use('/sessions', createConversionRouter({
    service: deps.service,
    maxUploadBytes: deps.maxUploadBytes,
  }));
  router.use('/templates', createTemplateRouter(deps.store));
  router.use('/providers', createProviderRouter(deps.credentials, deps.defaultProvider));

  logger.debug('API routes registered', { routes: ['/sessions', '/templates', '/providers'] });

  return router;
}
