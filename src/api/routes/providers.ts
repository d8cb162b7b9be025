// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER ROUTES — Available Providers and Models
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { CredentialStore, ProviderName } from '../../config/index.js';
import { describeProviders } from '../../providers/index.js';

export function createProviderRouter(credentials: CredentialStore, defaultProvider: ProviderName): Router {
  const router = Router();

  // GET /providers
  router.get('/', (_req: Request, res: Response) => {
    res.json({ providers: describeProviders(credentials), defaultProvider });
  });

  return router;
}
