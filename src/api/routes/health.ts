// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /health and /ready endpoints
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { CredentialStore, ProviderName } from '../../config/index.js';
import { getLogger } from '../../logging/index.js';
import { describeProviders, isCredentialConfigured } from '../../providers/index.js';
import type { DocumentStore } from '../../storage/index.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface HealthCheck {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    storage: ComponentHealth;
    provider: ComponentHealth;
  };
  /** Credential availability per provider */
  providers: Partial<Record<ProviderName, boolean>>;
}

export interface ReadinessCheck {
  ready: boolean;
  timestamp: string;
  checks: {
    storage: boolean;
  };
}

export interface ComponentHealth {
  status: 'up' | 'degraded' | 'down';
  latency?: number;
  message?: string;
}

export interface HealthRouterOptions {
  documents: DocumentStore;
  credentials: CredentialStore;
  /** Provider used when a run names none */
  defaultProvider: ProviderName;
  version: string;
}

// ─────────────────────────────────────────────────────────────────────────────────
// HEALTH CHECK FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export async function checkStorage(documents: DocumentStore): Promise<ComponentHealth> {
  const start = Date.now();

  try {
    await documents.read('importTemplates');
    const latency = Date.now() - start;

    if (latency > 1000) {
      return { status: 'degraded', latency, message: 'High latency' };
    }

    return { status: 'up', latency, message: documents.location };
  } catch (error) {
    return {
      status: 'down',
      message: error instanceof Error ? error.message : 'Storage check failed',
    };
  }
}

/**
 * The service still runs in local mode without a credential, so a missing key degrades.
 */
export function checkProvider(provider: ProviderName, credentials: CredentialStore): ComponentHealth {
  if (isCredentialConfigured(provider, credentials)) {
    return { status: 'up', message: provider };
  }
  return { status: 'degraded', message: `No credential configured for ${provider}` };
}

function availability(credentials: CredentialStore): Partial<Record<ProviderName, boolean>> {
  const result: Partial<Record<ProviderName, boolean>> = {};
  for (const provider of describeProviders(credentials)) {
    result[provider.name] = provider.available;
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(options: HealthRouterOptions): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── HEALTH CHECK (liveness) ───
  router.get('/health', async (_req: Request, res: Response) => {
    const storageHealth = await checkStorage(options.documents);
    const providerHealth = checkProvider(options.defaultProvider, options.credentials);

    const allUp = storageHealth.status === 'up' && providerHealth.status === 'up';
    const anyDown = storageHealth.status === 'down';

    const health: HealthCheck = {
      status: anyDown ? 'unhealthy' : (allUp ? 'healthy' : 'degraded'),
      timestamp: new Date().toISOString(),
      version: options.version,
      uptime: process.uptime(),
      checks: {
        storage: storageHealth,
        provider: providerHealth,
      },
      providers: availability(options.credentials),
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check degraded', {
        status: health.status,
        storage: storageHealth.status,
        provider: providerHealth.status,
      });
    }

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  // ─── READINESS CHECK ───
  router.get('/ready', async (_req: Request, res: Response) => {
    const storageHealth = await checkStorage(options.documents);

    const ready: ReadinessCheck = {
      ready: storageHealth.status !== 'down',
      timestamp: new Date().toISOString(),
      checks: {
        storage: storageHealth.status !== 'down',
      },
    };

    if (!ready.ready) {
      logger.error('Readiness check failed', undefined, {
        storage: storageHealth.status,
        message: storageHealth.message,
      });
    }

    res.status(ready.ready ? 200 : 503).json(ready);
  });

  return router;
}
