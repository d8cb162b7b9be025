// ═══════════════════════════════════════════════════════════════════════════════
// TEMPLATE ROUTES — Formula and Import Templates
// ═══════════════════════════════════════════════════════════════════════════════
//
// Endpoints:
//   GET    /formula-templates            List
//   POST   /formula-templates            Create
//   PATCH  /formula-templates/:id        Update
//   DELETE /formula-templates/:id        Delete
//   GET    /import-templates             List
//   POST   /import-templates             Create
//   DELETE /import-templates/:id         Delete
//
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import { getLogger } from '../../logging/index.js';
import type { StateStore } from '../../storage/index.js';
import { asyncHandler, NotFoundError } from '../middleware/error-handler.js';
import {
  CreateFormulaTemplateSchema,
  CreateImportTemplateSchema,
  IdParamSchema,
  UpdateFormulaTemplateSchema,
  parseInput,
} from '../schemas/index.js';

const logger = getLogger({ component: 'template-routes' });

export function createTemplateRouter(store: StateStore): Router {
  const router = Router();

  // ─────────────────────────────────────────────────────────────────────────────
  // FORMULA TEMPLATES
  // ─────────────────────────────────────────────────────────────────────────────

  router.get(
    '/formula-templates',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({ templates: await store.listFormulaTemplates() });
    })
  );

  router.post(
    '/formula-templates',
    asyncHandler(async (req: Request, res: Response) => {
      const input = parseInput(CreateFormulaTemplateSchema, req.body);
      const template = await store.createFormulaTemplate(input);
      logger.info('Formula template created', { templateId: template.id, requestId: req.requestId });
      res.status(201).json({ template });
    })
  );

  router.patch(
    '/formula-templates/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      const input = parseInput(UpdateFormulaTemplateSchema, req.body);
      const template = await store.updateFormulaTemplate(id, input);
      if (!template) {
        throw new NotFoundError('Formula template', id);
      }
      res.json({ template });
    })
  );

  router.delete(
    '/formula-templates/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      if (!(await store.deleteFormulaTemplate(id))) {
        throw new NotFoundError('Formula template', id);
      }
      res.status(204).end();
    })
  );

  // ─────────────────────────────────────────────────────────────────────────────
  // IMPORT TEMPLATES
  // ─────────────────────────────────────────────────────────────────────────────

  router.get(
    '/import-templates',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json({ templates: await store.listImportTemplates() });
    })
  );

  router.post(
    '/import-templates',
    asyncHandler(async (req: Request, res: Response) => {
      const input = parseInput(CreateImportTemplateSchema, req.body);
      const template = await store.createImportTemplate(input);
      logger.info('Import template created', { templateId: template.id, requestId: req.requestId });
      res.status(201).json({ template });
    })
  );

  router.delete(
    '/import-templates/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const { id } = parseInput(IdParamSchema, req.params);
      if (!(await store.deleteImportTemplate(id))) {
        throw new NotFoundError('Import template', id);
      }
      res.status(204).end();
    })
  );

  return router;
}
